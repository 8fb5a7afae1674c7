import { Decimal } from "decimal.js";
import type { Expense, UserId } from "../../src/types/index.js";

export const d = (value: Decimal.Value) => new Decimal(value);

export function amounts(map: ReadonlyMap<string, Decimal>): Record<string, string> {
  return Object.fromEntries(Array.from(map, ([key, amount]) => [key, amount.toFixed()]));
}

const createdAt = new Date("2024-05-01T12:00:00Z");

export function equalExpense(
  id: string,
  payerUserId: UserId,
  amount: Decimal.Value,
  participants: UserId[],
  overrides: { currency?: string; categoryId?: string | null; tripId?: string } = {}
): Expense {
  return {
    id,
    tripId: overrides.tripId ?? "trip1",
    description: id,
    payerUserId,
    currency: overrides.currency ?? "USD",
    amount: new Decimal(amount),
    categoryId: overrides.categoryId ?? null,
    createdAt,
    splitType: "equal",
    participants,
  };
}

export function itemizedExpense(
  id: string,
  payerUserId: UserId,
  participantAmounts: Record<UserId, string>,
  overrides: { categoryId?: string | null } = {}
): Expense {
  const shares = new Map(Object.entries(participantAmounts).map(([userId, v]) => [userId, new Decimal(v)]));
  let total = new Decimal(0);
  for (const share of shares.values()) total = total.plus(share);

  return {
    id,
    tripId: "trip1",
    description: id,
    payerUserId,
    currency: "USD",
    amount: total,
    categoryId: overrides.categoryId ?? null,
    createdAt,
    splitType: "itemized",
    participantAmounts: shares,
  };
}
