import type { Decimal } from "decimal.js";
import type {
  Balance,
  Expense,
  MinimalTransfer,
  Payment,
  PersonSummary,
  TransferStrategyName,
  UserId,
} from "../types/index.js";
import { currencyUnit, ZERO } from "./money.js";
import { calculatePairwiseDebts } from "./netting.js";

export interface TransferInput {
  tripId: string;
  currency: string;
  expenses: Expense[];
  summaries: ReadonlyMap<UserId, PersonSummary>;
  payments?: Payment[]; // settled transfers, already paid
  computedAt: Date;
}

/** Turns a trip's balances into payable transfers */
export interface TransferStrategy {
  readonly name: TransferStrategyName;
  computeTransfers(input: TransferInput): MinimalTransfer[];
}

interface TransferContext {
  tripId: string;
  currency: string;
  computedAt: Date;
}

export function transferId(tripId: string, fromUserId: UserId, toUserId: UserId): string {
  return `${tripId}:${fromUserId}:${toUserId}`;
}

function buildTransfer(
  context: TransferContext,
  fromUserId: UserId,
  toUserId: UserId,
  amountBase: Decimal
): MinimalTransfer {
  return {
    id: transferId(context.tripId, fromUserId, toUserId),
    tripId: context.tripId,
    fromUserId,
    toUserId,
    amountBase,
    currency: context.currency,
    computedAt: context.computedAt,
    isSettled: false,
  };
}

/**
 * One transfer per pair of people, netting everything they owe each other.
 * Each transfer traces back to that pair's own expenses.
 */
export const pairwiseNetStrategy: TransferStrategy = {
  name: "pairwise",
  computeTransfers(input) {
    const debts = calculatePairwiseDebts(input.expenses, {
      tripId: input.tripId,
      epsilon: currencyUnit(input.currency),
      computedAt: input.computedAt,
      payments: input.payments,
    });

    return debts.map((debt) => buildTransfer(input, debt.fromUserId, debt.toUserId, debt.nettedBase));
  },
};

/**
 * Greedy matching over net balances, fewest transfers in practice.
 * Kept for compatibility with older settlements; prefer pairwise.
 */
export const greedyMinimalStrategy: TransferStrategy = {
  name: "greedy",
  computeTransfers(input) {
    let balances: Balance[] = Array.from(input.summaries.values()).map((summary) => ({
      userId: summary.userId,
      balance: summary.netBase,
    }));

    for (const payment of input.payments ?? []) {
      balances = applySettlement(balances, payment);
    }

    return simplifyDebts(balances, input);
  },
};

export const transferStrategies: Record<TransferStrategyName, TransferStrategy> = {
  pairwise: pairwiseNetStrategy,
  greedy: greedyMinimalStrategy,
};

export function getTransferStrategy(name: TransferStrategyName): TransferStrategy {
  return transferStrategies[name];
}

/**
 * Simplify debts to minimize number of transactions (greedy algorithm)
 *
 * Creditors and debtors are each sorted once by amount, largest first, ties by
 * user id in code-unit order, then matched front to front. A party leaves its
 * list once what it has left falls below the currency's smallest unit.
 */
export function simplifyDebts(balances: Balance[], context: TransferContext): MinimalTransfer[] {
  const epsilon = currencyUnit(context.currency);
  const byAmountThenId = (a: Balance, b: Balance) => {
    const cmp = b.balance.comparedTo(a.balance);
    if (cmp !== 0) return cmp;
    return a.userId < b.userId ? -1 : a.userId > b.userId ? 1 : 0;
  };

  const creditors = balances
    .filter((b) => b.balance.gt(0))
    .map((b) => ({ userId: b.userId, balance: b.balance }))
    .sort(byAmountThenId);
  const debtors = balances
    .filter((b) => b.balance.lt(0))
    .map((b) => ({ userId: b.userId, balance: b.balance.abs() }))
    .sort(byAmountThenId);

  const transfers: MinimalTransfer[] = [];
  let c = 0;
  let d = 0;

  while (c < creditors.length && d < debtors.length) {
    const creditor = creditors[c];
    const debtor = debtors[d];
    const amount = creditor.balance.lt(debtor.balance) ? creditor.balance : debtor.balance;

    transfers.push(buildTransfer(context, debtor.userId, creditor.userId, amount));

    creditor.balance = creditor.balance.minus(amount);
    debtor.balance = debtor.balance.minus(amount);

    if (creditor.balance.lt(epsilon)) c++;
    if (debtor.balance.lt(epsilon)) d++;
  }

  return transfers;
}

/**
 * Apply a payment to balances
 * @returns New balances; the payer moves up, the receiver moves down
 */
export function applySettlement(balances: Balance[], payment: Payment): Balance[] {
  const balanceMap = new Map(balances.map((b) => [b.userId, b.balance]));

  balanceMap.set(payment.fromUserId, (balanceMap.get(payment.fromUserId) ?? ZERO).plus(payment.amount));
  balanceMap.set(payment.toUserId, (balanceMap.get(payment.toUserId) ?? ZERO).minus(payment.amount));

  return Array.from(balanceMap.entries()).map(([userId, balance]) => ({
    userId,
    balance,
  }));
}
