import type { Decimal } from "decimal.js";
import type {
  BlockingIssue,
  Category,
  CategorySpending,
  Expense,
  PersonCategorySpending,
  PersonSummary,
  SettlementComputation,
  UserId,
  WarningIssue,
} from "../types/index.js";
import { currencyUnit, sumDecimals, withinEpsilon, ZERO } from "./money.js";
import { calculateShares } from "./shares.js";

export const UNCATEGORIZED_ID = "uncategorized";
const UNCATEGORIZED_NAME = "Uncategorized";

export interface AggregateInput {
  tripId: string;
  baseCurrency: string;
  participants: UserId[]; // listed members appear even with no activity
  expenses: Expense[];
  categories?: Category[]; // when given, category spending is computed too
  computedAt: Date;
}

interface PersonTotals {
  paid: Decimal;
  owed: Decimal;
  byCategory: Map<string, Decimal>;
}

/**
 * Accumulates a trip's expenses in one pass.
 * Nothing is readable until `finalize`, which may be called once.
 */
class SettlementBuilder {
  private people = new Map<UserId, PersonTotals>();
  private warnings: WarningIssue[] = [];
  private finalized = false;
  private baseCurrency: string;
  private categories?: Map<string, Category>;

  constructor(baseCurrency: string, participants: UserId[], categories?: Category[]) {
    this.baseCurrency = baseCurrency;
    this.categories = categories ? new Map(categories.map((c) => [c.id, c])) : undefined;
    for (const userId of participants) {
      this.person(userId);
    }
  }

  add(expense: Expense): this {
    if (this.finalized) {
      throw new Error("SettlementBuilder already finalized");
    }

    if (expense.currency !== this.baseCurrency) {
      this.warnings.push({
        severity: "warning",
        code: "CURRENCY_MISMATCH",
        message: `Expense "${expense.description}" is in ${expense.currency}, trip base currency is ${this.baseCurrency}`,
        expenseId: expense.id,
      });
    }

    const payer = this.person(expense.payerUserId);
    payer.paid = payer.paid.plus(expense.amount);

    const categoryId = this.bucketFor(expense.categoryId);
    for (const [userId, share] of calculateShares(expense)) {
      const person = this.person(userId);
      person.owed = person.owed.plus(share);
      if (this.categories) {
        person.byCategory.set(categoryId, (person.byCategory.get(categoryId) ?? ZERO).plus(share));
      }
    }

    return this;
  }

  finalize(tripId: string, computedAt: Date): SettlementComputation {
    this.finalized = true;

    const personSummaries = new Map<UserId, PersonSummary>();
    for (const [userId, totals] of this.people) {
      personSummaries.set(userId, {
        userId,
        totalPaidBase: totals.paid,
        totalOwedBase: totals.owed,
        netBase: totals.paid.minus(totals.owed),
      });
    }

    const violation = validateBalances(personSummaries, currencyUnit(this.baseCurrency));
    if (violation) {
      return { ok: false, error: violation, warnings: this.warnings };
    }

    return {
      ok: true,
      summary: {
        tripId,
        baseCurrency: this.baseCurrency,
        personSummaries,
        computedAt,
      },
      categorySpending: this.categories ? this.categorySpending(personSummaries) : undefined,
      warnings: this.warnings,
    };
  }

  private person(userId: UserId): PersonTotals {
    let totals = this.people.get(userId);
    if (!totals) {
      totals = { paid: ZERO, owed: ZERO, byCategory: new Map() };
      this.people.set(userId, totals);
    }
    return totals;
  }

  // Unknown ids land in the default bucket
  private bucketFor(categoryId: string | null | undefined): string {
    if (categoryId && this.categories?.has(categoryId)) {
      return categoryId;
    }
    return UNCATEGORIZED_ID;
  }

  private categorySpending(
    summaries: Map<UserId, PersonSummary>
  ): Map<UserId, PersonCategorySpending> {
    const result = new Map<UserId, PersonCategorySpending>();

    for (const [userId, summary] of summaries) {
      const byCategory = this.people.get(userId)?.byCategory ?? new Map<string, Decimal>();
      const categories: CategorySpending[] = Array.from(byCategory.entries()).map(
        ([categoryId, amount]) => {
          const category = this.categories?.get(categoryId);
          return {
            categoryId,
            categoryName: category?.name ?? UNCATEGORIZED_NAME,
            amount,
            color: category?.color ?? null,
            icon: category?.icon ?? null,
          };
        }
      );

      categories.sort((a, b) => {
        const cmp = b.amount.comparedTo(a.amount);
        if (cmp !== 0) return cmp;
        return a.categoryId < b.categoryId ? -1 : a.categoryId > b.categoryId ? 1 : 0;
      });

      result.set(userId, { ...summary, categories });
    }

    return result;
  }
}

/**
 * Money is conserved: every net balance together must come to zero
 * @returns The violation, or undefined when balanced
 */
export function validateBalances(
  summaries: ReadonlyMap<UserId, PersonSummary>,
  epsilon: Decimal
): BlockingIssue | undefined {
  const total = sumDecimals(Array.from(summaries.values(), (s) => s.netBase));
  if (withinEpsilon(total, ZERO, epsilon)) {
    return undefined;
  }

  return {
    severity: "error",
    code: "BALANCE_CONSERVATION_VIOLATION",
    message: `Net balances sum to ${total.toString()} instead of zero`,
  };
}

/**
 * Fold a trip's expenses into person summaries and, optionally, category spending
 * Fails with BALANCE_CONSERVATION_VIOLATION when the balances do not sum to zero.
 */
export function aggregateSettlement(input: AggregateInput): SettlementComputation {
  const builder = input.expenses.reduce(
    (acc, expense) => acc.add(expense),
    new SettlementBuilder(input.baseCurrency, input.participants, input.categories)
  );

  return builder.finalize(input.tripId, input.computedAt);
}
