import type { Decimal } from "decimal.js";

// All amounts are decimal.js values, serialized as exact decimal strings
export type UserId = string;

// Rounding and allocation
export type RoundingMode = "roundHalfUp" | "roundHalfEven" | "floor" | "ceil";

export type RemainderPolicy = "largestShare" | "payer" | "firstListed" | "deterministic";

export interface RoundingConfig {
  precision: Decimal; // e.g. 0.01 or 1
  mode: RoundingMode;
  remainderPolicy: RemainderPolicy;
  seed?: number; // only read by the "deterministic" policy
}

export type PercentBase =
  | "preTaxItemSubtotals"
  | "taxableItemSubtotalsOnly"
  | "postDiscountItemSubtotals"
  | "postTaxSubtotals"
  | "postFeesSubtotals";

export type AbsoluteSplitMode = "proportional" | "even";

export interface AllocationRule {
  percentBase: PercentBase; // default base for percent extras that name none
  absoluteSplitMode: AbsoluteSplitMode;
  rounding: RoundingConfig;
}

// Receipt
export type ItemAssignment =
  | { mode: "even"; users: UserId[] }
  | { mode: "custom"; users: UserId[]; shares: ReadonlyMap<UserId, Decimal> };

export interface LineItem {
  id: string;
  name: string;
  quantity: Decimal;
  unitPrice: Decimal;
  taxable: boolean;
  serviceChargeable: boolean;
  assignment: ItemAssignment;
}

export type ExtraAmount =
  | { type: "percent"; value: Decimal; base?: PercentBase }
  | { type: "absolute"; value: Decimal };

export type FeeExtra = ExtraAmount & { id: string; name: string };
export type DiscountExtra = ExtraAmount & { id: string; name: string };

export interface Extras {
  tax?: ExtraAmount;
  tip?: ExtraAmount;
  fees: FeeExtra[];
  discounts: DiscountExtra[];
}

export interface ItemizedReceipt {
  items: LineItem[];
  extras: Extras;
  allocation: AllocationRule;
}

// Calculator output
export type ExtraKind = "discount" | "tax" | "fee" | "tip";

export interface ExtraAllocation {
  kind: ExtraKind;
  id: string; // "tax" and "tip" for the singletons
  name: string;
  amount: Decimal; // discounts are positive here and subtracted from the total
}

export interface ItemContribution {
  itemId: string;
  itemName: string;
  quantity: Decimal;
  unitPrice: Decimal;
  assignedShare: Decimal; // fraction of the item, 0..1
  contributionAmount: Decimal;
}

export interface ParticipantBreakdown {
  userId: UserId;
  itemsSubtotal: Decimal;
  discountTotal: Decimal;
  taxTotal: Decimal;
  feeTotal: Decimal;
  tipTotal: Decimal;
  extras: ExtraAllocation[];
  unroundedTotal: Decimal;
  roundingAdjustment: Decimal; // total - unroundedTotal, remainder included
  total: Decimal;
  items: ItemContribution[];
}

// Issues are returned as data, never thrown
export type BlockingIssueCode =
  | "UNASSIGNED_ITEM"
  | "SHARES_DO_NOT_SUM_TO_ONE"
  | "INVALID_LINE_ITEM"
  | "INVALID_EXTRA"
  | "INVALID_ROUNDING"
  | "NEGATIVE_TOTAL"
  | "COMPUTATION_MISMATCH"
  | "BALANCE_CONSERVATION_VIOLATION";

export type WarningIssueCode = "EXTREME_PERCENTAGE" | "CURRENCY_MISMATCH";

export type ValidationIssue =
  | {
      severity: "error";
      code: BlockingIssueCode;
      message: string;
      itemId?: string;
      userId?: UserId;
    }
  | {
      severity: "warning";
      code: WarningIssueCode;
      message: string;
      expenseId?: string;
    };

export type BlockingIssue = Extract<ValidationIssue, { severity: "error" }>;
export type WarningIssue = Extract<ValidationIssue, { severity: "warning" }>;

export interface ItemizedInput {
  items: LineItem[];
  extras: Extras;
  allocation: AllocationRule;
  participants: UserId[]; // order drives "firstListed" and tie-breaking
  payerId: UserId;
  currency: string;
  extremePercentThreshold?: Decimal;
}

export type ItemizedResult =
  | {
      ok: true;
      grandTotal: Decimal;
      participantAmounts: Map<UserId, Decimal>;
      participantBreakdown: Map<UserId, ParticipantBreakdown>;
      warnings: WarningIssue[];
    }
  | {
      ok: false;
      errors: BlockingIssue[];
      warnings: WarningIssue[];
    };

// Expenses
export type SplitType = "equal" | "weighted" | "itemized";

interface ExpenseBase {
  id: string;
  tripId: string;
  description: string;
  payerUserId: UserId;
  currency: string;
  amount: Decimal;
  categoryId?: string | null;
  createdAt: Date;
}

export type ExpenseSplit =
  | { splitType: "equal"; participants: UserId[] }
  | { splitType: "weighted"; weights: ReadonlyMap<UserId, Decimal> }
  | {
      splitType: "itemized";
      participantAmounts: ReadonlyMap<UserId, Decimal>; // ground truth, never recomputed
      receipt?: ItemizedReceipt;
    };

export type Expense = ExpenseBase & ExpenseSplit;

export interface Category {
  id: string;
  name: string;
  color?: string | null;
  icon?: string | null;
}

// Settlement
export interface PersonSummary {
  userId: UserId;
  totalPaidBase: Decimal;
  totalOwedBase: Decimal;
  netBase: Decimal; // positive = owed money, negative = owes money
}

export interface PairwiseDebt {
  tripId: string;
  fromUserId: UserId; // who owes
  toUserId: UserId; // who is owed
  nettedBase: Decimal; // always > 0
  computedAt: Date;
}

export interface MinimalTransfer {
  id: string;
  tripId: string;
  fromUserId: UserId; // who pays
  toUserId: UserId; // who receives
  amountBase: Decimal; // always > 0
  currency?: string;
  computedAt: Date;
  isSettled: boolean;
  settledAt?: Date;
}

// A payment already made between two people, e.g. a settled transfer
export interface Payment {
  fromUserId: UserId;
  toUserId: UserId;
  amount: Decimal;
}

export interface Balance {
  userId: UserId;
  balance: Decimal;
}

export interface CategorySpending {
  categoryId: string;
  categoryName: string;
  amount: Decimal;
  color?: string | null;
  icon?: string | null;
}

export interface PersonCategorySpending {
  userId: UserId;
  totalPaidBase: Decimal;
  totalOwedBase: Decimal;
  netBase: Decimal;
  categories: CategorySpending[]; // sorted by amount, descending
}

export interface SettlementSummary {
  tripId: string;
  baseCurrency: string;
  personSummaries: Map<UserId, PersonSummary>;
  computedAt: Date;
}

export type SettlementComputation =
  | {
      ok: true;
      summary: SettlementSummary;
      categorySpending?: Map<UserId, PersonCategorySpending>;
      warnings: WarningIssue[];
    }
  | {
      ok: false;
      error: BlockingIssue;
      warnings: WarningIssue[];
    };

export type TransferStrategyName = "pairwise" | "greedy";

export type SettlementIssueCode =
  | "BALANCE_CONSERVATION_VIOLATION"
  | "TRANSFER_UNKNOWN_PARTY"
  | "TRANSFER_SAME_PARTY"
  | "TRANSFER_DUPLICATE_PAIR"
  | "TRANSFER_NON_POSITIVE_AMOUNT"
  | "TRANSFER_BALANCE_MISMATCH";

export interface SettlementIssue {
  code: SettlementIssueCode;
  message: string;
  transferId?: string;
  userId?: UserId;
}

// How one expense feeds the debt between two people
export interface ExpenseBreakdown {
  expense: Expense;
  fromPaid: Decimal;
  fromOwes: Decimal;
  toPaid: Decimal;
  toOwes: Decimal;
  netContribution: Decimal; // positive grows from -> to, negative shrinks it
}

export interface TransferBreakdown {
  fromUserId: UserId;
  toUserId: UserId;
  totalAmount: Decimal;
  expenseBreakdowns: ExpenseBreakdown[];
}

// Trips (persistence collaborator)
export interface TripMember {
  userId: UserId;
  displayName: string;
}

export interface Trip {
  id: string;
  name: string;
  baseCurrency: string;
  members: TripMember[]; // ordered
  createdAt: Date;
}

// A transfer someone has actually paid; it offsets later settlements
export interface SettledTransfer {
  id: string;
  tripId: string;
  transferId: string; // `${tripId}:${from}:${to}` of the transfer it paid
  fromUserId: UserId;
  toUserId: UserId;
  amount: Decimal;
  currency: string;
  settledAt: Date;
}
