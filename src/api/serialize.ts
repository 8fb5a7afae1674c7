import type { Decimal } from "decimal.js";
import { toDecimalString } from "../engine/money.js";
import {
  relevantBreakdowns,
  totalNegativeContributions,
  totalPositiveContributions,
} from "../engine/breakdown.js";
import { encodeReceipt } from "../storage/codec.js";
import type { TripSettlement } from "../services/index.js";
import type {
  Expense,
  ItemizedResult,
  MinimalTransfer,
  ParticipantBreakdown,
  SettledTransfer,
  TransferBreakdown,
} from "../types/index.js";

// JSON views of domain values: amounts as decimal strings, dates as ISO strings

function amountRecord(amounts: ReadonlyMap<string, Decimal>): Record<string, string> {
  const record: Record<string, string> = {};
  for (const [userId, amount] of amounts) {
    record[userId] = toDecimalString(amount);
  }
  return record;
}

export function serializeExpense(expense: Expense) {
  const base = {
    id: expense.id,
    tripId: expense.tripId,
    description: expense.description,
    payerUserId: expense.payerUserId,
    currency: expense.currency,
    amount: toDecimalString(expense.amount),
    categoryId: expense.categoryId ?? null,
    createdAt: expense.createdAt.toISOString(),
    splitType: expense.splitType,
  };

  switch (expense.splitType) {
    case "equal":
      return { ...base, participants: expense.participants };
    case "weighted":
      return { ...base, weights: amountRecord(expense.weights) };
    case "itemized":
      return {
        ...base,
        participantAmounts: amountRecord(expense.participantAmounts),
        receipt: expense.receipt ? encodeReceipt(expense.receipt) : null,
      };
  }
}

function serializeBreakdown(breakdown: ParticipantBreakdown) {
  return {
    userId: breakdown.userId,
    itemsSubtotal: toDecimalString(breakdown.itemsSubtotal),
    discountTotal: toDecimalString(breakdown.discountTotal),
    taxTotal: toDecimalString(breakdown.taxTotal),
    feeTotal: toDecimalString(breakdown.feeTotal),
    tipTotal: toDecimalString(breakdown.tipTotal),
    extras: breakdown.extras.map((extra) => ({ ...extra, amount: toDecimalString(extra.amount) })),
    unroundedTotal: toDecimalString(breakdown.unroundedTotal),
    roundingAdjustment: toDecimalString(breakdown.roundingAdjustment),
    total: toDecimalString(breakdown.total),
    items: breakdown.items.map((item) => ({
      itemId: item.itemId,
      itemName: item.itemName,
      quantity: toDecimalString(item.quantity),
      unitPrice: toDecimalString(item.unitPrice),
      assignedShare: toDecimalString(item.assignedShare),
      contributionAmount: toDecimalString(item.contributionAmount),
    })),
  };
}

export function serializeItemizedResult(result: ItemizedResult) {
  if (!result.ok) {
    return { ok: false, errors: result.errors, warnings: result.warnings };
  }

  return {
    ok: true,
    grandTotal: toDecimalString(result.grandTotal),
    participantAmounts: amountRecord(result.participantAmounts),
    participantBreakdown: Array.from(result.participantBreakdown.values(), serializeBreakdown),
    warnings: result.warnings,
  };
}

export function serializeTransfer(transfer: MinimalTransfer) {
  return {
    id: transfer.id,
    fromUserId: transfer.fromUserId,
    toUserId: transfer.toUserId,
    amount: toDecimalString(transfer.amountBase),
    currency: transfer.currency ?? null,
    computedAt: transfer.computedAt.toISOString(),
    isSettled: transfer.isSettled,
  };
}

export function serializeSettledTransfer(transfer: SettledTransfer) {
  return {
    id: transfer.id,
    transferId: transfer.transferId,
    fromUserId: transfer.fromUserId,
    toUserId: transfer.toUserId,
    amount: toDecimalString(transfer.amount),
    currency: transfer.currency,
    settledAt: transfer.settledAt.toISOString(),
  };
}

export function serializeSettlement(settlement: TripSettlement) {
  const { summary } = settlement;

  return {
    tripId: summary.tripId,
    baseCurrency: summary.baseCurrency,
    strategy: settlement.strategy,
    computedAt: summary.computedAt.toISOString(),
    people: Array.from(summary.personSummaries.values(), (person) => ({
      userId: person.userId,
      totalPaid: toDecimalString(person.totalPaidBase),
      totalOwed: toDecimalString(person.totalOwedBase),
      net: toDecimalString(person.netBase),
      categories: (settlement.categorySpending?.get(person.userId)?.categories ?? []).map((c) => ({
        categoryId: c.categoryId,
        categoryName: c.categoryName,
        amount: toDecimalString(c.amount),
        color: c.color ?? null,
        icon: c.icon ?? null,
      })),
    })),
    pendingTransfers: settlement.pendingTransfers.map(serializeTransfer),
    settledTransfers: settlement.settledTransfers.map(serializeSettledTransfer),
    warnings: settlement.warnings,
    issues: settlement.issues,
  };
}

export function serializeTransferBreakdown(breakdown: TransferBreakdown) {
  return {
    fromUserId: breakdown.fromUserId,
    toUserId: breakdown.toUserId,
    totalAmount: toDecimalString(breakdown.totalAmount),
    totalPositive: toDecimalString(totalPositiveContributions(breakdown)),
    totalNegative: toDecimalString(totalNegativeContributions(breakdown)),
    relevantExpenseIds: relevantBreakdowns(breakdown).map((b) => b.expense.id),
    expenses: breakdown.expenseBreakdowns.map((b) => ({
      expenseId: b.expense.id,
      description: b.expense.description,
      fromPaid: toDecimalString(b.fromPaid),
      fromOwes: toDecimalString(b.fromOwes),
      toPaid: toDecimalString(b.toPaid),
      toOwes: toDecimalString(b.toOwes),
      netContribution: toDecimalString(b.netContribution),
    })),
  };
}
