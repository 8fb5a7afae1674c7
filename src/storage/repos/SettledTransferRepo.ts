import { asc, eq } from "drizzle-orm";
import type { AppDatabase } from "../db.js";
import { settledTransfers } from "../schema.js";
import { parseDecimalString, toDecimalString } from "../../engine/money.js";
import type { SettledTransfer } from "../../types/index.js";

type SettledTransferRow = typeof settledTransfers.$inferSelect;

function toSettledTransfer(row: SettledTransferRow): SettledTransfer {
  return {
    id: row.id,
    tripId: row.tripId,
    transferId: row.transferId,
    fromUserId: row.fromUserId,
    toUserId: row.toUserId,
    amount: parseDecimalString(row.amount),
    currency: row.currency,
    settledAt: row.settledAt,
  };
}

export class SettledTransferRepo {
  private db: AppDatabase;

  constructor(db: AppDatabase) {
    this.db = db;
  }

  async create(transfer: SettledTransfer): Promise<SettledTransfer> {
    await this.db.insert(settledTransfers).values({
      id: transfer.id,
      tripId: transfer.tripId,
      transferId: transfer.transferId,
      fromUserId: transfer.fromUserId,
      toUserId: transfer.toUserId,
      amount: toDecimalString(transfer.amount),
      currency: transfer.currency,
      settledAt: transfer.settledAt,
    });

    return { ...transfer };
  }

  async findById(id: string): Promise<SettledTransfer | null> {
    const row = await this.db.select().from(settledTransfers).where(eq(settledTransfers.id, id)).get();
    return row ? toSettledTransfer(row) : null;
  }

  async findByTripId(tripId: string): Promise<SettledTransfer[]> {
    const rows = await this.db
      .select()
      .from(settledTransfers)
      .where(eq(settledTransfers.tripId, tripId))
      .orderBy(asc(settledTransfers.settledAt), asc(settledTransfers.id));

    return rows.map(toSettledTransfer);
  }

  async delete(id: string): Promise<void> {
    await this.db.delete(settledTransfers).where(eq(settledTransfers.id, id));
  }
}
