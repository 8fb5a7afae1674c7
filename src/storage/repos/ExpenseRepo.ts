import { asc, eq, inArray, sql } from "drizzle-orm";
import type { Decimal } from "decimal.js";
import type { AppDatabase } from "../db.js";
import { expenseParticipants, expenses } from "../schema.js";
import { deserializeReceipt, serializeReceipt } from "../codec.js";
import { parseDecimalString, toDecimalString } from "../../engine/money.js";
import type { Expense, UserId } from "../../types/index.js";

type ExpenseRow = typeof expenses.$inferSelect;
type ParticipantRow = typeof expenseParticipants.$inferSelect;

function participantRows(expense: Expense): Array<{ userId: UserId; value: string | null }> {
  switch (expense.splitType) {
    case "equal":
      return expense.participants.map((userId) => ({ userId, value: null }));
    case "weighted":
      return Array.from(expense.weights, ([userId, weight]) => ({
        userId,
        value: toDecimalString(weight),
      }));
    case "itemized":
      return Array.from(expense.participantAmounts, ([userId, amount]) => ({
        userId,
        value: toDecimalString(amount),
      }));
  }
}

function toValueMap(rows: ParticipantRow[]): Map<UserId, Decimal> {
  return new Map(rows.map((row) => [row.userId, parseDecimalString(row.value ?? "0")]));
}

function toExpense(row: ExpenseRow, participants: ParticipantRow[]): Expense {
  const base = {
    id: row.id,
    tripId: row.tripId,
    description: row.description,
    payerUserId: row.payerUserId,
    currency: row.currency,
    amount: parseDecimalString(row.amount),
    categoryId: row.categoryId,
    createdAt: row.createdAt,
  };

  switch (row.splitType) {
    case "equal":
      return { ...base, splitType: "equal", participants: participants.map((p) => p.userId) };
    case "weighted":
      return { ...base, splitType: "weighted", weights: toValueMap(participants) };
    case "itemized":
      return {
        ...base,
        splitType: "itemized",
        participantAmounts: toValueMap(participants),
        receipt: row.receipt ? deserializeReceipt(row.receipt) : undefined,
      };
  }
}

export class ExpenseRepo {
  private db: AppDatabase;

  constructor(db: AppDatabase) {
    this.db = db;
  }

  async create(expense: Expense): Promise<Expense> {
    const rows = participantRows(expense);

    this.db.transaction((tx) => {
      tx.insert(expenses)
        .values({
          id: expense.id,
          tripId: expense.tripId,
          description: expense.description,
          amount: toDecimalString(expense.amount),
          currency: expense.currency,
          payerUserId: expense.payerUserId,
          splitType: expense.splitType,
          categoryId: expense.categoryId ?? null,
          receipt:
            expense.splitType === "itemized" && expense.receipt
              ? serializeReceipt(expense.receipt)
              : null,
          createdAt: expense.createdAt,
        })
        .run();

      if (rows.length > 0) {
        tx.insert(expenseParticipants)
          .values(
            rows.map((row, position) => ({
              id: `${expense.id}_${row.userId}`,
              expenseId: expense.id,
              userId: row.userId,
              position,
              value: row.value,
            }))
          )
          .run();
      }
    });

    return expense;
  }

  async findById(id: string): Promise<Expense | null> {
    const expense = await this.db.select().from(expenses).where(eq(expenses.id, id)).get();

    if (!expense) return null;

    const participants = await this.db
      .select()
      .from(expenseParticipants)
      .where(eq(expenseParticipants.expenseId, id))
      .orderBy(asc(expenseParticipants.position));

    return toExpense(expense, participants);
  }

  // Oldest first: settlement order follows the order expenses were recorded
  async findByTripId(tripId: string): Promise<Expense[]> {
    const expenseRecords = await this.db
      .select()
      .from(expenses)
      .where(eq(expenses.tripId, tripId))
      .orderBy(asc(expenses.createdAt), sql`rowid`);

    if (expenseRecords.length === 0) return [];

    const participants = await this.db
      .select()
      .from(expenseParticipants)
      .where(
        inArray(
          expenseParticipants.expenseId,
          expenseRecords.map((e) => e.id)
        )
      )
      .orderBy(asc(expenseParticipants.position));

    const byExpense = new Map<string, ParticipantRow[]>();
    for (const participant of participants) {
      byExpense.set(participant.expenseId, [...(byExpense.get(participant.expenseId) ?? []), participant]);
    }

    return expenseRecords.map((expense) => toExpense(expense, byExpense.get(expense.id) ?? []));
  }

  async delete(id: string): Promise<void> {
    await this.db.delete(expenses).where(eq(expenses.id, id));
  }
}
