import type { Decimal } from "decimal.js";
import type {
  MinimalTransfer,
  Payment,
  PersonSummary,
  SettlementIssue,
  UserId,
} from "../types/index.js";
import { currencyUnit, sumDecimals, withinEpsilon, ZERO } from "./money.js";

/**
 * Check that a set of pending transfers actually settles a trip
 *
 * Issues are returned, never thrown. An empty list means the settlement is sound.
 * @param payments - Transfers already settled; pending transfers only cover what is left
 */
export function validateSettlement(
  summaries: ReadonlyMap<UserId, PersonSummary>,
  transfers: MinimalTransfer[],
  currency: string,
  payments: Payment[] = []
): SettlementIssue[] {
  const epsilon = currencyUnit(currency);

  return [
    ...checkConservation(summaries, epsilon),
    ...checkParties(summaries, transfers),
    ...checkDuplicates(transfers),
    ...checkAmounts(transfers),
    ...checkBalances(summaries, transfers, payments, epsilon),
  ];
}

function checkConservation(
  summaries: ReadonlyMap<UserId, PersonSummary>,
  epsilon: Decimal
): SettlementIssue[] {
  const total = sumDecimals(Array.from(summaries.values(), (s) => s.netBase));
  if (withinEpsilon(total, ZERO, epsilon)) return [];

  return [
    {
      code: "BALANCE_CONSERVATION_VIOLATION",
      message: `Sum of balances is ${total.toString()}, expected 0`,
    },
  ];
}

function checkParties(
  summaries: ReadonlyMap<UserId, PersonSummary>,
  transfers: MinimalTransfer[]
): SettlementIssue[] {
  const issues: SettlementIssue[] = [];

  for (const transfer of transfers) {
    for (const userId of [transfer.fromUserId, transfer.toUserId]) {
      if (!summaries.has(userId)) {
        issues.push({
          code: "TRANSFER_UNKNOWN_PARTY",
          message: `Transfer ${transfer.id} names unknown user ${userId}`,
          transferId: transfer.id,
          userId,
        });
      }
    }

    if (transfer.fromUserId === transfer.toUserId) {
      issues.push({
        code: "TRANSFER_SAME_PARTY",
        message: `Transfer ${transfer.id} has the same payer and receiver`,
        transferId: transfer.id,
        userId: transfer.fromUserId,
      });
    }
  }

  return issues;
}

function checkDuplicates(transfers: MinimalTransfer[]): SettlementIssue[] {
  const byPair = new Map<string, MinimalTransfer[]>();
  for (const transfer of transfers) {
    const key = `${transfer.fromUserId}->${transfer.toUserId}`;
    byPair.set(key, [...(byPair.get(key) ?? []), transfer]);
  }

  const issues: SettlementIssue[] = [];
  for (const [pair, group] of byPair) {
    if (group.length > 1) {
      issues.push({
        code: "TRANSFER_DUPLICATE_PAIR",
        message: `${group.length} transfers for pair ${pair}`,
        transferId: group[1].id,
      });
    }
  }
  return issues;
}

function checkAmounts(transfers: MinimalTransfer[]): SettlementIssue[] {
  return transfers
    .filter((t) => t.amountBase.lte(0))
    .map((t): SettlementIssue => ({
      code: "TRANSFER_NON_POSITIVE_AMOUNT",
      message: `Transfer ${t.id} has amount ${t.amountBase.toString()}`,
      transferId: t.id,
    }));
}

// incoming - outgoing must match each person's balance left after payments
function checkBalances(
  summaries: ReadonlyMap<UserId, PersonSummary>,
  transfers: MinimalTransfer[],
  payments: Payment[],
  epsilon: Decimal
): SettlementIssue[] {
  // Pairs below epsilon are dropped, so each person may be off by up to one unit per counterpart
  const tolerance = epsilon.times(Math.max(summaries.size, 1));
  const issues: SettlementIssue[] = [];

  for (const [userId, summary] of summaries) {
    let expected = summary.netBase;
    for (const payment of payments) {
      if (payment.fromUserId === userId) expected = expected.plus(payment.amount);
      if (payment.toUserId === userId) expected = expected.minus(payment.amount);
    }

    let net = ZERO;
    for (const transfer of transfers) {
      if (transfer.toUserId === userId) net = net.plus(transfer.amountBase);
      if (transfer.fromUserId === userId) net = net.minus(transfer.amountBase);
    }

    const difference = net.minus(expected).abs();
    if (difference.gt(tolerance)) {
      issues.push({
        code: "TRANSFER_BALANCE_MISMATCH",
        message: `Transfers give ${userId} a net of ${net.toString()}, balance is ${expected.toString()}`,
        userId,
      });
    }
  }

  return issues;
}
