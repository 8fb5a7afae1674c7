import type { Decimal } from "decimal.js";
import { CategoryRepo, ExpenseRepo, TripRepo } from "../storage/index.js";
import {
  calculateItemized,
  DEFAULT_EXTREME_PERCENT_THRESHOLD,
  formatAmount,
  sumDecimals,
} from "../engine/index.js";
import { ExpenseValidationError, NotFoundError, RequestValidationError } from "../errors.js";
import { makeId } from "./ids.js";
import type {
  Expense,
  ExpenseSplit,
  ItemizedReceipt,
  ItemizedResult,
  Trip,
  UserId,
  WarningIssue,
} from "../types/index.js";

export type NewExpenseSplit =
  | { splitType: "equal"; amount: Decimal; participants: UserId[] }
  | { splitType: "weighted"; amount: Decimal; weights: ReadonlyMap<UserId, Decimal> }
  | { splitType: "itemized"; receipt: ItemizedReceipt; participants?: UserId[] };

export interface NewExpense {
  id?: string;
  description: string;
  payerUserId: UserId;
  currency?: string; // defaults to the trip's base currency
  categoryId?: string | null;
  split: NewExpenseSplit;
}

export interface ItemizedPreview {
  receipt: ItemizedReceipt;
  participants: UserId[];
  payerId: UserId;
  currency: string;
}

export interface ExpenseServiceOptions {
  extremePercentThreshold?: Decimal;
}

// Everyone assigned to an item, in order of first appearance
function assignedUsers(receipt: ItemizedReceipt): UserId[] {
  const users = new Set<UserId>();
  for (const item of receipt.items) {
    for (const userId of item.assignment.users) {
      users.add(userId);
    }
  }
  return Array.from(users);
}

export class ExpenseService {
  private expenseRepo: ExpenseRepo;
  private tripRepo: TripRepo;
  private categoryRepo: CategoryRepo;
  private extremePercentThreshold: Decimal;

  constructor(
    expenseRepo: ExpenseRepo,
    tripRepo: TripRepo,
    categoryRepo: CategoryRepo,
    options: ExpenseServiceOptions = {}
  ) {
    this.expenseRepo = expenseRepo;
    this.tripRepo = tripRepo;
    this.categoryRepo = categoryRepo;
    this.extremePercentThreshold = options.extremePercentThreshold ?? DEFAULT_EXTREME_PERCENT_THRESHOLD;
  }

  /**
   * Record an expense on a trip
   * Itemized receipts go through the calculator; its warnings come back with the expense.
   * @throws ExpenseValidationError when the calculator finds blocking issues
   */
  async createExpense(
    tripId: string,
    params: NewExpense
  ): Promise<{ expense: Expense; warnings: WarningIssue[] }> {
    const trip = await this.tripRepo.findById(tripId);
    if (!trip) {
      throw new NotFoundError(`Trip ${tripId} not found`);
    }

    if (params.categoryId) {
      const category = await this.categoryRepo.findById(params.categoryId);
      if (!category) {
        throw new NotFoundError(`Category ${params.categoryId} not found`);
      }
    }

    const currency = (params.currency ?? trip.baseCurrency).toUpperCase();
    const { amount, split, warnings } = this.buildSplit(trip, params, currency);

    const expense = await this.expenseRepo.create({
      id: params.id ?? makeId("exp"),
      tripId,
      description: params.description,
      payerUserId: params.payerUserId,
      currency,
      amount,
      categoryId: params.categoryId ?? null,
      createdAt: new Date(),
      ...split,
    });

    console.log(
      `💸 Expense ${expense.id} on ${tripId}: ${expense.description} ${formatAmount(amount, currency)} ${currency} (${expense.splitType})`
    );
    return { expense, warnings };
  }

  /** Run the itemized calculator without saving anything */
  previewItemized(preview: ItemizedPreview): ItemizedResult {
    return calculateItemized({
      ...preview.receipt,
      participants: preview.participants,
      payerId: preview.payerId,
      currency: preview.currency,
      extremePercentThreshold: this.extremePercentThreshold,
    });
  }

  async getExpense(expenseId: string): Promise<Expense | null> {
    return this.expenseRepo.findById(expenseId);
  }

  async getTripExpenses(tripId: string): Promise<Expense[]> {
    return this.expenseRepo.findByTripId(tripId);
  }

  async deleteExpense(tripId: string, expenseId: string): Promise<void> {
    const expense = await this.expenseRepo.findById(expenseId);
    if (!expense || expense.tripId !== tripId) {
      throw new NotFoundError(`Expense ${expenseId} not found`);
    }
    await this.expenseRepo.delete(expenseId);
  }

  private buildSplit(
    trip: Trip,
    params: NewExpense,
    currency: string
  ): { amount: Decimal; split: ExpenseSplit; warnings: WarningIssue[] } {
    const { split } = params;
    const involved =
      split.splitType === "equal"
        ? split.participants
        : split.splitType === "weighted"
          ? Array.from(split.weights.keys())
          : (split.participants ?? assignedUsers(split.receipt));
    // Item assignees join an itemized expense even when a participant list is given
    const assignees = split.splitType === "itemized" ? assignedUsers(split.receipt) : [];
    this.assertMembers(trip, [params.payerUserId, ...involved, ...assignees]);

    switch (split.splitType) {
      case "equal":
        if (split.participants.length === 0) {
          throw new RequestValidationError(["An equal split needs at least one participant"]);
        }
        if (split.amount.lte(0)) {
          throw new RequestValidationError(["Amount must be positive"]);
        }
        return {
          amount: split.amount,
          split: { splitType: "equal", participants: Array.from(new Set(split.participants)) },
          warnings: [],
        };

      case "weighted": {
        const weights = Array.from(split.weights.values());
        if (weights.some((w) => w.lt(0)) || sumDecimals(weights).lte(0)) {
          throw new RequestValidationError(["Weights must be non-negative with a positive total"]);
        }
        if (split.amount.lte(0)) {
          throw new RequestValidationError(["Amount must be positive"]);
        }
        return {
          amount: split.amount,
          split: { splitType: "weighted", weights: new Map(split.weights) },
          warnings: [],
        };
      }

      case "itemized": {
        const result = this.previewItemized({
          receipt: split.receipt,
          participants: involved,
          payerId: params.payerUserId,
          currency,
        });
        if (!result.ok) {
          throw new ExpenseValidationError(result.errors, result.warnings);
        }
        return {
          amount: result.grandTotal,
          split: {
            splitType: "itemized",
            participantAmounts: result.participantAmounts,
            receipt: split.receipt,
          },
          warnings: result.warnings,
        };
      }
    }
  }

  private assertMembers(trip: Trip, userIds: UserId[]): void {
    const members = new Set(trip.members.map((m) => m.userId));
    const unknown = Array.from(new Set(userIds)).filter((userId) => !members.has(userId));
    if (unknown.length > 0) {
      throw new RequestValidationError(unknown.map((userId) => `${userId} is not a member of trip ${trip.id}`));
    }
  }
}
