import type { Decimal } from "decimal.js";
import type { Expense, PairwiseDebt, Payment, UserId } from "../types/index.js";
import { ZERO } from "./money.js";
import { calculateShares } from "./shares.js";

/** Raw directed debts: debtor -> creditor -> accumulated amount */
export type DirectedDebts = Map<UserId, Map<UserId, Decimal>>;

export interface NettingOptions {
  tripId: string;
  epsilon: Decimal;
  computedAt: Date;
}

function addDebt(debts: DirectedDebts, from: UserId, to: UserId, amount: Decimal): void {
  let creditors = debts.get(from);
  if (!creditors) {
    creditors = new Map();
    debts.set(from, creditors);
  }
  creditors.set(to, (creditors.get(to) ?? ZERO).plus(amount));
}

export function debtBetween(debts: DirectedDebts, from: UserId, to: UserId): Decimal {
  return debts.get(from)?.get(to) ?? ZERO;
}

/**
 * Accumulate what each participant owes each payer, expense by expense
 * @param payments - Money already handed over; a payment A -> B offsets A's debt to B
 */
export function accumulateDebts(expenses: Expense[], payments: Payment[] = []): DirectedDebts {
  const debts: DirectedDebts = new Map();

  for (const expense of expenses) {
    const payerId = expense.payerUserId;
    const shares = calculateShares(expense);

    for (const [participantId, share] of shares) {
      // Nobody owes themselves
      if (participantId === payerId || share.isZero()) continue;
      addDebt(debts, participantId, payerId, share);
    }
  }

  for (const payment of payments) {
    if (payment.fromUserId === payment.toUserId || payment.amount.isZero()) continue;
    addDebt(debts, payment.toUserId, payment.fromUserId, payment.amount);
  }

  return debts;
}

/**
 * Collapse the debts of every pair into a single directional amount
 * Pairs whose net is below epsilon are settled and produce nothing.
 * Output order follows the order in which pairs first appear.
 */
export function netPairwiseDebts(debts: DirectedDebts, options: NettingOptions): PairwiseDebt[] {
  const result: PairwiseDebt[] = [];
  const processed = new Map<UserId, Set<UserId>>();
  const markProcessed = (a: UserId, b: UserId) => {
    const seen = processed.get(a) ?? new Set<UserId>();
    seen.add(b);
    processed.set(a, seen);
  };

  for (const [userA, creditors] of debts) {
    for (const userB of creditors.keys()) {
      if (processed.get(userA)?.has(userB)) continue;
      markProcessed(userA, userB);
      markProcessed(userB, userA);

      const net = debtBetween(debts, userA, userB).minus(debtBetween(debts, userB, userA));
      if (net.abs().lt(options.epsilon)) continue;

      const aOwesB = net.gt(0);
      result.push({
        tripId: options.tripId,
        fromUserId: aOwesB ? userA : userB,
        toUserId: aOwesB ? userB : userA,
        nettedBase: net.abs(),
        computedAt: options.computedAt,
      });
    }
  }

  return result;
}

export function calculatePairwiseDebts(
  expenses: Expense[],
  options: NettingOptions & { payments?: Payment[] }
): PairwiseDebt[] {
  return netPairwiseDebts(accumulateDebts(expenses, options.payments), options);
}
