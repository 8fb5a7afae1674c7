import { Decimal } from "decimal.js";
import type {
  AllocationRule,
  BlockingIssue,
  ExtraAllocation,
  ExtraAmount,
  ExtraKind,
  ItemContribution,
  ItemizedInput,
  ItemizedResult,
  LineItem,
  ParticipantBreakdown,
  PercentBase,
  UserId,
  WarningIssue,
} from "../types/index.js";
import { currencyUnit, sumDecimals, withinEpsilon, ZERO } from "./money.js";
import { roundAmount, roundShares } from "./rounding.js";

export const SHARE_SUM_TOLERANCE = new Decimal("0.0001");
export const DEFAULT_EXTREME_PERCENT_THRESHOLD = new Decimal(50);

const HUNDRED = new Decimal(100);

/**
 * Running subtotals for one participant, or for the whole receipt.
 * Stages not yet applied stay at zero.
 */
interface Subtotals {
  items: Decimal;
  taxable: Decimal;
  chargeable: Decimal; // service-chargeable items
  taxableChargeable: Decimal;
  discount: Decimal;
  tax: Decimal;
  fees: Decimal;
  tip: Decimal;
}

interface ParticipantLedger extends Subtotals {
  assigned: boolean;
  extras: ExtraAllocation[];
  contributions: ItemContribution[];
}

interface NamedExtra {
  kind: ExtraKind;
  id: string;
  name: string;
  amount: ExtraAmount;
}

function emptySubtotals(): Subtotals {
  return {
    items: ZERO,
    taxable: ZERO,
    chargeable: ZERO,
    taxableChargeable: ZERO,
    discount: ZERO,
    tax: ZERO,
    fees: ZERO,
    tip: ZERO,
  };
}

function itemTotal(item: LineItem): Decimal {
  return item.quantity.times(item.unitPrice);
}

function totalOf(subtotals: Subtotals): Decimal {
  return subtotals.items
    .minus(subtotals.discount)
    .plus(subtotals.tax)
    .plus(subtotals.fees)
    .plus(subtotals.tip);
}

/**
 * Subtotal a percent extra is computed against. A base naming a stage that
 * has not run yet reads zero for that stage, i.e. the latest computed stage.
 *
 * With `chargeableOnly`, later stages count in the proportion that
 * service-chargeable items make up of all items, and the base never drops
 * below zero.
 */
function resolvePercentBase(s: Subtotals, base: PercentBase, chargeableOnly: boolean): Decimal {
  if (!chargeableOnly) {
    return stageBase(s.items, s.taxable, s.discount, s.tax, s.fees, base);
  }

  const ratio = s.items.isZero() ? ZERO : s.chargeable.div(s.items);
  const chargeableBase = stageBase(
    s.chargeable,
    s.taxableChargeable,
    s.discount.times(ratio),
    s.tax.times(ratio),
    s.fees.times(ratio),
    base
  );
  return Decimal.max(chargeableBase, ZERO);
}

function stageBase(
  items: Decimal,
  taxable: Decimal,
  discount: Decimal,
  tax: Decimal,
  fees: Decimal,
  base: PercentBase
): Decimal {
  switch (base) {
    case "preTaxItemSubtotals":
      return items;
    case "taxableItemSubtotalsOnly":
      return taxable;
    case "postDiscountItemSubtotals":
      return items.minus(discount);
    case "postTaxSubtotals":
      return items.minus(discount).plus(tax);
    case "postFeesSubtotals":
      return items.minus(discount).plus(tax).plus(fees);
  }
}

/**
 * Split an itemized receipt into exact per-participant totals
 *
 * Items are allocated first, then discounts, tax, fees and tip in that order,
 * each percent extra reading the subtotal its base names at that point.
 * Totals are rounded independently and the remainder goes to one participant.
 */
export function calculateItemized(input: ItemizedInput): ItemizedResult {
  const inputErrors = validateReceipt(input);
  if (inputErrors.length > 0) {
    return { ok: false, errors: inputErrors, warnings: [] };
  }

  const { items, extras, allocation, currency, payerId } = input;
  const ledgers = allocateItems(items, input.participants);
  const receipt = receiptSubtotals(items);

  const discounts: NamedExtra[] = extras.discounts.map((discount) => ({
    kind: "discount",
    id: discount.id,
    name: discount.name,
    amount: discount,
  }));
  const fees: NamedExtra[] = extras.fees.map((fee) => ({
    kind: "fee",
    id: fee.id,
    name: fee.name,
    amount: fee,
  }));

  applyStage(ledgers, receipt, discounts, allocation);
  if (extras.tax) {
    applyStage(ledgers, receipt, [{ kind: "tax", id: "tax", name: "Tax", amount: extras.tax }], allocation);
  }
  applyStage(ledgers, receipt, fees, allocation);
  if (extras.tip) {
    applyStage(ledgers, receipt, [{ kind: "tip", id: "tip", name: "Tip", amount: extras.tip }], allocation);
  }

  const unrounded = new Map<UserId, Decimal>();
  for (const [userId, ledger] of ledgers) {
    unrounded.set(userId, totalOf(ledger));
  }

  const { rounding } = allocation;
  const grandTotal = roundAmount(totalOf(receipt), rounding.precision, rounding.mode);

  // Only people with items share the remainder; everyone else owes exactly zero
  const assignedTotals = new Map(
    Array.from(unrounded).filter(([userId]) => ledgers.get(userId)?.assigned === true)
  );
  const rounded = roundShares(assignedTotals, rounding, { payerId, total: grandTotal });
  const participantAmounts = new Map<UserId, Decimal>();
  for (const userId of ledgers.keys()) {
    participantAmounts.set(userId, rounded.get(userId) ?? ZERO);
  }

  const warnings = percentageWarnings(input, receipt);
  const errors: BlockingIssue[] = [];

  for (const [userId, amount] of participantAmounts) {
    if (amount.lt(0)) {
      errors.push({
        severity: "error",
        code: "NEGATIVE_TOTAL",
        userId,
        message: `Total for ${userId} is negative (${amount.toFixed()})`,
      });
    }
  }

  const distributed = sumDecimals(participantAmounts.values());
  if (!withinEpsilon(distributed, grandTotal, currencyUnit(currency))) {
    errors.push({
      severity: "error",
      code: "COMPUTATION_MISMATCH",
      message: `Distributed ${distributed.toFixed()} but receipt total is ${grandTotal.toFixed()}`,
    });
  }

  if (errors.length > 0) {
    return { ok: false, errors, warnings };
  }

  const participantBreakdown = new Map<UserId, ParticipantBreakdown>();
  for (const [userId, ledger] of ledgers) {
    const total = participantAmounts.get(userId) ?? ZERO;
    const unroundedTotal = unrounded.get(userId) ?? ZERO;
    participantBreakdown.set(userId, {
      userId,
      itemsSubtotal: ledger.items,
      discountTotal: ledger.discount,
      taxTotal: ledger.tax,
      feeTotal: ledger.fees,
      tipTotal: ledger.tip,
      extras: ledger.extras,
      unroundedTotal,
      roundingAdjustment: total.minus(unroundedTotal),
      total,
      items: ledger.contributions,
    });
  }

  return { ok: true, grandTotal, participantAmounts, participantBreakdown, warnings };
}

/**
 * Blocking input problems. The calculation does not run when any is found.
 */
export function validateReceipt(input: ItemizedInput): BlockingIssue[] {
  const issues: BlockingIssue[] = [];

  if (input.items.length === 0) {
    issues.push({
      severity: "error",
      code: "INVALID_LINE_ITEM",
      message: "Receipt needs at least one line item",
    });
  }

  for (const item of input.items) {
    const { assignment } = item;

    if (assignment.users.length === 0) {
      issues.push({
        severity: "error",
        code: "UNASSIGNED_ITEM",
        itemId: item.id,
        message: `Item "${item.name}" is not assigned to anyone`,
      });
    } else if (new Set(assignment.users).size !== assignment.users.length) {
      issues.push({
        severity: "error",
        code: "INVALID_LINE_ITEM",
        itemId: item.id,
        message: `Item "${item.name}" lists a participant more than once`,
      });
    }

    if (item.name.trim() === "") {
      issues.push({
        severity: "error",
        code: "INVALID_LINE_ITEM",
        itemId: item.id,
        message: `Item ${item.id} has no name`,
      });
    }
    if (item.quantity.lte(0)) {
      issues.push({
        severity: "error",
        code: "INVALID_LINE_ITEM",
        itemId: item.id,
        message: `Item "${item.name}" must have a positive quantity`,
      });
    }
    if (item.unitPrice.lt(0)) {
      issues.push({
        severity: "error",
        code: "INVALID_LINE_ITEM",
        itemId: item.id,
        message: `Item "${item.name}" has a negative unit price`,
      });
    }

    if (assignment.mode === "custom" && assignment.users.length > 0) {
      const shareError = validateCustomShares(assignment.users, assignment.shares);
      if (shareError) {
        issues.push({
          severity: "error",
          code: "SHARES_DO_NOT_SUM_TO_ONE",
          itemId: item.id,
          message: `Item "${item.name}": ${shareError}`,
        });
      }
    }
  }

  const { extras } = input;
  const extraChecks: Array<[string, ExtraAmount, boolean]> = [];
  if (extras.tax) extraChecks.push(["Tax", extras.tax, false]);
  if (extras.tip) extraChecks.push(["Tip", extras.tip, true]);
  for (const fee of extras.fees) extraChecks.push([`Fee "${fee.name}"`, fee, false]);
  for (const discount of extras.discounts) extraChecks.push([`Discount "${discount.name}"`, discount, false]);

  for (const [label, extra, zeroAllowed] of extraChecks) {
    const valid = zeroAllowed ? extra.value.gte(0) : extra.value.gt(0);
    if (!valid) {
      issues.push({
        severity: "error",
        code: "INVALID_EXTRA",
        message: zeroAllowed
          ? `${label} cannot be negative`
          : `${label} must be greater than 0`,
      });
    }
  }

  if (input.allocation.rounding.precision.lte(0)) {
    issues.push({
      severity: "error",
      code: "INVALID_ROUNDING",
      message: "Rounding precision must be positive",
    });
  }

  return issues;
}

function validateCustomShares(
  users: UserId[],
  shares: ReadonlyMap<UserId, Decimal>
): string | null {
  const userSet = new Set(users);
  const keys = Array.from(shares.keys());
  if (keys.length !== userSet.size || keys.some((key) => !userSet.has(key))) {
    return "share keys must match the assigned users";
  }

  for (const share of shares.values()) {
    if (share.lt(0)) {
      return "shares cannot be negative";
    }
  }

  const sum = sumDecimals(shares.values());
  if (sum.minus(1).abs().gt(SHARE_SUM_TOLERANCE)) {
    return `shares must sum to 1 (got ${sum.toFixed()})`;
  }

  return null;
}

function allocateItems(items: LineItem[], participants: UserId[]): Map<UserId, ParticipantLedger> {
  const ledgers = new Map<UserId, ParticipantLedger>();
  const ledgerFor = (userId: UserId): ParticipantLedger => {
    let ledger = ledgers.get(userId);
    if (!ledger) {
      ledger = { ...emptySubtotals(), assigned: false, extras: [], contributions: [] };
      ledgers.set(userId, ledger);
    }
    return ledger;
  };

  // Listed participants first, in order; anyone else assigned is appended
  for (const userId of participants) {
    ledgerFor(userId);
  }

  for (const item of items) {
    const total = itemTotal(item);
    const { assignment } = item;

    const fractions = new Map<UserId, Decimal>();
    if (assignment.mode === "even") {
      const share = new Decimal(1).div(assignment.users.length);
      for (const userId of assignment.users) {
        fractions.set(userId, share);
      }
    } else {
      // Normalized by their sum, so the whole item total is allocated
      const shareSum = sumDecimals(assignment.shares.values());
      for (const userId of assignment.users) {
        const share = assignment.shares.get(userId) ?? ZERO;
        fractions.set(userId, shareSum.isZero() ? ZERO : share.div(shareSum));
      }
    }

    for (const [userId, fraction] of fractions) {
      const amount =
        assignment.mode === "even" ? total.div(assignment.users.length) : total.times(fraction);
      const ledger = ledgerFor(userId);

      ledger.assigned = true;
      ledger.items = ledger.items.plus(amount);
      if (item.taxable) ledger.taxable = ledger.taxable.plus(amount);
      if (item.serviceChargeable) ledger.chargeable = ledger.chargeable.plus(amount);
      if (item.taxable && item.serviceChargeable) {
        ledger.taxableChargeable = ledger.taxableChargeable.plus(amount);
      }

      ledger.contributions.push({
        itemId: item.id,
        itemName: item.name,
        quantity: item.quantity,
        unitPrice: item.unitPrice,
        assignedShare: fraction,
        contributionAmount: amount,
      });
    }
  }

  return ledgers;
}

function receiptSubtotals(items: LineItem[]): Subtotals {
  const receipt = emptySubtotals();
  for (const item of items) {
    const total = itemTotal(item);
    receipt.items = receipt.items.plus(total);
    if (item.taxable) receipt.taxable = receipt.taxable.plus(total);
    if (item.serviceChargeable) receipt.chargeable = receipt.chargeable.plus(total);
    if (item.taxable && item.serviceChargeable) {
      receipt.taxableChargeable = receipt.taxableChargeable.plus(total);
    }
  }
  return receipt;
}

/**
 * Allocate every extra of one stage against the subtotals as they stood
 * before the stage, then add the results. Extras of the same stage never
 * see each other.
 */
function applyStage(
  ledgers: Map<UserId, ParticipantLedger>,
  receipt: Subtotals,
  stage: NamedExtra[],
  allocation: AllocationRule
): void {
  const perUser = new Map<UserId, ExtraAllocation[]>();
  let receiptStageTotal = ZERO;

  for (const extra of stage) {
    const chargeableOnly = extra.kind === "fee";
    const { amount } = extra;

    let shares: Map<UserId, Decimal>;
    let extraTotal: Decimal;

    if (amount.type === "percent") {
      const base = amount.base ?? allocation.percentBase;
      const rate = amount.value.div(HUNDRED);
      shares = new Map();
      for (const [userId, ledger] of ledgers) {
        shares.set(userId, resolvePercentBase(ledger, base, chargeableOnly).times(rate));
      }
      // Chargeable-only bases are clamped per person, so the receipt takes their sum
      extraTotal = chargeableOnly
        ? sumDecimals(shares.values())
        : resolvePercentBase(receipt, base, chargeableOnly).times(rate);
    } else {
      extraTotal = amount.value;
      shares = splitAbsolute(amount.value, ledgers, receipt, allocation);
    }

    receiptStageTotal = receiptStageTotal.plus(extraTotal);
    for (const [userId, share] of shares) {
      const list = perUser.get(userId) ?? [];
      list.push({ kind: extra.kind, id: extra.id, name: extra.name, amount: share });
      perUser.set(userId, list);
    }
  }

  for (const [userId, allocations] of perUser) {
    const ledger = ledgers.get(userId);
    if (!ledger) continue;
    for (const allocated of allocations) {
      addToStage(ledger, allocated.kind, allocated.amount);
      ledger.extras.push(allocated);
    }
  }

  if (stage.length > 0) {
    addToStage(receipt, stage[0].kind, receiptStageTotal);
  }
}

function addToStage(subtotals: Subtotals, kind: ExtraKind, amount: Decimal): void {
  switch (kind) {
    case "discount":
      subtotals.discount = subtotals.discount.plus(amount);
      break;
    case "tax":
      subtotals.tax = subtotals.tax.plus(amount);
      break;
    case "fee":
      subtotals.fees = subtotals.fees.plus(amount);
      break;
    case "tip":
      subtotals.tip = subtotals.tip.plus(amount);
      break;
  }
}

/**
 * Split a flat amount proportionally to item subtotals, or evenly across the
 * people who were assigned items. No item value at all falls back to even.
 */
function splitAbsolute(
  total: Decimal,
  ledgers: Map<UserId, ParticipantLedger>,
  receipt: Subtotals,
  allocation: AllocationRule
): Map<UserId, Decimal> {
  const shares = new Map<UserId, Decimal>();

  if (allocation.absoluteSplitMode === "proportional" && !receipt.items.isZero()) {
    for (const [userId, ledger] of ledgers) {
      shares.set(userId, total.times(ledger.items).div(receipt.items));
    }
    return shares;
  }

  const assigned = Array.from(ledgers.entries()).filter(([, ledger]) => ledger.assigned);
  const recipients = assigned.length > 0 ? assigned : Array.from(ledgers.entries());
  const each = total.div(recipients.length);
  for (const [userId] of ledgers) {
    shares.set(userId, ZERO);
  }
  for (const [userId] of recipients) {
    shares.set(userId, each);
  }
  return shares;
}

function percentageWarnings(input: ItemizedInput, receipt: Subtotals): WarningIssue[] {
  const threshold = input.extremePercentThreshold ?? DEFAULT_EXTREME_PERCENT_THRESHOLD;
  const warnings: WarningIssue[] = [];
  const checks: Array<[string, ExtraAmount | undefined, Decimal]> = [
    ["Tax", input.extras.tax, receipt.tax],
    ["Tip", input.extras.tip, receipt.tip],
  ];

  for (const [label, extra, allocated] of checks) {
    if (!extra) continue;

    let percent: Decimal | null = null;
    if (extra.type === "percent") {
      percent = extra.value;
    } else if (!receipt.items.isZero()) {
      percent = allocated.div(receipt.items).times(HUNDRED);
    }

    if (percent !== null && percent.gt(threshold)) {
      warnings.push({
        severity: "warning",
        code: "EXTREME_PERCENTAGE",
        message: `${label} is ${percent.toDecimalPlaces(2).toFixed()}% of the items, above ${threshold.toFixed()}%`,
      });
    }
  }

  return warnings;
}
