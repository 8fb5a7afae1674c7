import type { Decimal } from "decimal.js";
import type { Expense, ExpenseBreakdown, TransferBreakdown, UserId } from "../types/index.js";
import { sumDecimals, ZERO } from "./money.js";
import { calculateShares } from "./shares.js";

export interface TransferBreakdownInput {
  fromUserId: UserId;
  toUserId: UserId;
  amount: Decimal;
  expenses: Expense[];
}

/**
 * Explain a transfer expense by expense
 *
 * Only the direct debt between the two people counts: when `to` paid, `from`
 * owes their share; when `from` paid, `to` owes theirs back; an expense paid by
 * someone else contributes nothing.
 */
export function calculateTransferBreakdown(input: TransferBreakdownInput): TransferBreakdown {
  const { fromUserId, toUserId } = input;

  const expenseBreakdowns = input.expenses.map((expense): ExpenseBreakdown => {
    const shares = calculateShares(expense);
    const fromOwes = shares.get(fromUserId) ?? ZERO;
    const toOwes = shares.get(toUserId) ?? ZERO;

    let netContribution = ZERO;
    if (expense.payerUserId === toUserId) {
      netContribution = fromOwes;
    } else if (expense.payerUserId === fromUserId) {
      netContribution = toOwes.neg();
    }

    return {
      expense,
      fromPaid: expense.payerUserId === fromUserId ? expense.amount : ZERO,
      fromOwes,
      toPaid: expense.payerUserId === toUserId ? expense.amount : ZERO,
      toOwes,
      netContribution,
    };
  });

  return {
    fromUserId,
    toUserId,
    totalAmount: input.amount,
    expenseBreakdowns,
  };
}

// Breakdowns that move the debt at all
export function relevantBreakdowns(breakdown: TransferBreakdown): ExpenseBreakdown[] {
  return breakdown.expenseBreakdowns.filter((b) => !b.netContribution.isZero());
}

export function totalPositiveContributions(breakdown: TransferBreakdown): Decimal {
  return sumDecimals(
    breakdown.expenseBreakdowns.filter((b) => b.netContribution.gt(0)).map((b) => b.netContribution)
  );
}

/** Sum of the contributions that reduce the debt, as a positive amount */
export function totalNegativeContributions(breakdown: TransferBreakdown): Decimal {
  return sumDecimals(
    breakdown.expenseBreakdowns
      .filter((b) => b.netContribution.lt(0))
      .map((b) => b.netContribution.abs())
  );
}
