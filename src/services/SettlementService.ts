import type { Decimal } from "decimal.js";
import { CategoryRepo, ExpenseRepo, SettledTransferRepo, TripRepo } from "../storage/index.js";
import {
  aggregateSettlement,
  calculateTransferBreakdown,
  formatAmount,
  getTransferStrategy,
  pairwiseNetStrategy,
  transferId,
  validateSettlement,
  ZERO,
} from "../engine/index.js";
import { NotFoundError, RequestValidationError, SettlementComputationError } from "../errors.js";
import { makeId } from "./ids.js";
import type {
  MinimalTransfer,
  Payment,
  PersonCategorySpending,
  SettledTransfer,
  SettlementIssue,
  SettlementSummary,
  TransferBreakdown,
  TransferStrategyName,
  Trip,
  UserId,
  WarningIssue,
} from "../types/index.js";

export interface TripSettlement {
  strategy: TransferStrategyName;
  summary: SettlementSummary;
  pendingTransfers: MinimalTransfer[];
  settledTransfers: SettledTransfer[];
  categorySpending?: Map<UserId, PersonCategorySpending>;
  warnings: WarningIssue[];
  issues: SettlementIssue[]; // validator findings on the pending transfers
}

export interface SettlementServiceOptions {
  defaultStrategy?: TransferStrategyName;
}

function toPayment(transfer: SettledTransfer): Payment {
  return { fromUserId: transfer.fromUserId, toUserId: transfer.toUserId, amount: transfer.amount };
}

export class SettlementService {
  private tripRepo: TripRepo;
  private expenseRepo: ExpenseRepo;
  private categoryRepo: CategoryRepo;
  private settledTransferRepo: SettledTransferRepo;
  private defaultStrategy: TransferStrategyName;

  constructor(
    tripRepo: TripRepo,
    expenseRepo: ExpenseRepo,
    categoryRepo: CategoryRepo,
    settledTransferRepo: SettledTransferRepo,
    options: SettlementServiceOptions = {}
  ) {
    this.tripRepo = tripRepo;
    this.expenseRepo = expenseRepo;
    this.categoryRepo = categoryRepo;
    this.settledTransferRepo = settledTransferRepo;
    this.defaultStrategy = options.defaultStrategy ?? "pairwise";
  }

  /**
   * Balances, pending transfers and category spending for a trip
   * Settled transfers are subtracted before pending ones are computed.
   * @throws SettlementComputationError when balances do not sum to zero
   */
  async getSettlement(
    tripId: string,
    options: { strategy?: TransferStrategyName; computedAt?: Date } = {}
  ): Promise<TripSettlement> {
    const trip = await this.getTrip(tripId);
    const strategy = getTransferStrategy(options.strategy ?? this.defaultStrategy);
    const computedAt = options.computedAt ?? new Date();

    const expenses = await this.expenseRepo.findByTripId(tripId);
    const categories = await this.categoryRepo.findAll();
    const settledTransfers = await this.settledTransferRepo.findByTripId(tripId);

    const result = aggregateSettlement({
      tripId,
      baseCurrency: trip.baseCurrency,
      participants: trip.members.map((m) => m.userId),
      expenses,
      categories,
      computedAt,
    });

    if (!result.ok) {
      console.error(`Settlement for trip ${tripId} failed:`, result.error.message);
      throw new SettlementComputationError(result.error);
    }

    const payments = settledTransfers.map(toPayment);
    const pendingTransfers = strategy.computeTransfers({
      tripId,
      currency: trip.baseCurrency,
      expenses,
      summaries: result.summary.personSummaries,
      payments,
      computedAt,
    });

    const issues = validateSettlement(
      result.summary.personSummaries,
      pendingTransfers,
      trip.baseCurrency,
      payments
    );
    if (issues.length > 0) {
      console.warn(`⚠️  Settlement for trip ${tripId} has ${issues.length} issue(s):`, issues.map((i) => i.code));
    }

    return {
      strategy: strategy.name,
      summary: result.summary,
      pendingTransfers,
      settledTransfers,
      categorySpending: result.categorySpending,
      warnings: result.warnings,
      issues,
    };
  }

  /** Record that `from` has paid `to`; later settlements only cover what remains */
  async markTransferSettled(
    tripId: string,
    params: { fromUserId: UserId; toUserId: UserId; amount: Decimal; settledAt?: Date }
  ): Promise<SettledTransfer> {
    const trip = await this.getTrip(tripId);
    const members = new Set(trip.members.map((m) => m.userId));
    const problems: string[] = [];

    for (const userId of [params.fromUserId, params.toUserId]) {
      if (!members.has(userId)) problems.push(`${userId} is not a member of trip ${tripId}`);
    }
    if (params.fromUserId === params.toUserId) problems.push("Payer and receiver must differ");
    if (params.amount.lte(0)) problems.push("Amount must be positive");
    if (problems.length > 0) {
      throw new RequestValidationError(problems);
    }

    const settled = await this.settledTransferRepo.create({
      id: makeId("stl"),
      tripId,
      transferId: transferId(tripId, params.fromUserId, params.toUserId),
      fromUserId: params.fromUserId,
      toUserId: params.toUserId,
      amount: params.amount,
      currency: trip.baseCurrency,
      settledAt: params.settledAt ?? new Date(),
    });

    console.log(
      `✅ Marked paid on ${tripId}: ${settled.fromUserId} → ${settled.toUserId} ${formatAmount(settled.amount, settled.currency)} ${settled.currency}`
    );
    return settled;
  }

  async unmarkTransferSettled(tripId: string, settledTransferId: string): Promise<void> {
    const settled = await this.settledTransferRepo.findById(settledTransferId);
    if (!settled || settled.tripId !== tripId) {
      throw new NotFoundError(`Settled transfer ${settledTransferId} not found`);
    }

    await this.settledTransferRepo.delete(settledTransferId);
    console.log(`↩️  Unmarked settled transfer ${settledTransferId} on ${tripId}`);
  }

  /**
   * Which expenses make up what `from` owes `to`
   * The amount is the open pairwise transfer between them, zero when there is none.
   */
  async explainTransfer(tripId: string, fromUserId: UserId, toUserId: UserId): Promise<TransferBreakdown> {
    const trip = await this.getTrip(tripId);
    const expenses = await this.expenseRepo.findByTripId(tripId);
    const payments = (await this.settledTransferRepo.findByTripId(tripId)).map(toPayment);

    const transfers = pairwiseNetStrategy.computeTransfers({
      tripId,
      currency: trip.baseCurrency,
      expenses,
      summaries: new Map(),
      payments,
      computedAt: new Date(),
    });
    const open = transfers.find((t) => t.fromUserId === fromUserId && t.toUserId === toUserId);

    return calculateTransferBreakdown({
      fromUserId,
      toUserId,
      amount: open?.amountBase ?? ZERO,
      expenses,
    });
  }

  private async getTrip(tripId: string): Promise<Trip> {
    const trip = await this.tripRepo.findById(tripId);
    if (!trip) {
      throw new NotFoundError(`Trip ${tripId} not found`);
    }
    return trip;
  }
}
