import type { Decimal } from "decimal.js";
import type { Expense, RoundingConfig, UserId } from "../types/index.js";
import { currencyUnit, sumDecimals } from "./money.js";
import { roundShares } from "./rounding.js";

/**
 * Rounding applied to equal and weighted splits: the currency's smallest
 * unit, half-up, remainder to the largest share (first listed on ties)
 */
export function currencyRounding(currency: string): RoundingConfig {
  return {
    precision: currencyUnit(currency),
    mode: "roundHalfUp",
    remainderPolicy: "largestShare",
  };
}

/**
 * Split an amount equally among participants
 * @param participants - Ordered user IDs; the first one absorbs the rounding remainder
 * @returns Map of userId to share, summing to `amount` exactly
 */
export function splitEqually(
  amount: Decimal,
  participants: UserId[],
  currency: string
): Map<UserId, Decimal> {
  const unique = Array.from(new Set(participants));
  if (unique.length === 0) {
    return new Map();
  }

  const raw = new Map<UserId, Decimal>();
  const each = amount.div(unique.length);
  for (const userId of unique) {
    raw.set(userId, each);
  }

  return roundShares(raw, currencyRounding(currency), { total: amount });
}

/**
 * Split an amount proportionally to weights
 * Returns an empty map when no weight is positive
 */
export function splitByWeights(
  amount: Decimal,
  weights: ReadonlyMap<UserId, Decimal>,
  currency: string
): Map<UserId, Decimal> {
  const usable = Array.from(weights.entries()).filter(([, weight]) => weight.gte(0));
  const totalWeight = sumDecimals(usable.map(([, weight]) => weight));

  if (usable.length === 0 || totalWeight.lte(0)) {
    return new Map();
  }

  const raw = new Map<UserId, Decimal>();
  for (const [userId, weight] of usable) {
    raw.set(userId, amount.times(weight).div(totalWeight));
  }

  return roundShares(raw, currencyRounding(currency), { total: amount });
}

/**
 * Per-participant share of an expense
 * Itemized expenses return their stored amounts untouched
 */
export function calculateShares(expense: Expense): Map<UserId, Decimal> {
  switch (expense.splitType) {
    case "equal":
      return splitEqually(expense.amount, expense.participants, expense.currency);
    case "weighted":
      return splitByWeights(expense.amount, expense.weights, expense.currency);
    case "itemized":
      return new Map(expense.participantAmounts);
  }
}
