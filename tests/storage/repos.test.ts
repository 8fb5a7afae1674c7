import { beforeEach, describe, it, expect } from "vitest";
import { sql } from "drizzle-orm";
import { getTableConfig } from "drizzle-orm/sqlite-core";
import {
  categories,
  CategoryRepo,
  createDatabase,
  expenseParticipants,
  ExpenseRepo,
  expenses as expenseTable,
  SettledTransferRepo,
  settledTransfers,
  TripRepo,
  tripMembers,
  trips,
  type AppDatabase,
} from "../../src/storage/index.js";
import type { Expense } from "../../src/types/index.js";
import { amounts, d } from "../support/fixtures.js";

describe("storage repositories", () => {
  let db: AppDatabase;
  let tripRepo: TripRepo;
  let expenseRepo: ExpenseRepo;

  beforeEach(async () => {
    db = createDatabase(":memory:");
    tripRepo = new TripRepo(db);
    expenseRepo = new ExpenseRepo(db);

    await tripRepo.create({
      id: "trip1",
      name: "Lisbon",
      baseCurrency: "EUR",
      members: [
        { userId: "carol", displayName: "Carol" },
        { userId: "alice", displayName: "Alice" },
      ],
    });
  });

  describe("createDatabase", () => {
    it.each([trips, tripMembers, categories, expenseTable, expenseParticipants, settledTransfers])(
      "should create the columns the drizzle schema declares (table %#)",
      (table) => {
        const config = getTableConfig(table);
        const rows = db.all<{ name: string; type: string; notnull: number; pk: number }>(
          sql.raw(`PRAGMA table_info(${config.name})`)
        );

        const byName = (a: { name: string }, b: { name: string }) => a.name.localeCompare(b.name);
        const created = rows
          .map((row) => ({ name: row.name, type: row.type.toLowerCase(), notNull: row.notnull === 1, primary: row.pk > 0 }))
          .sort(byName);
        const declared = config.columns
          .map((column) => ({
            name: column.name,
            type: column.getSQLType().toLowerCase(),
            notNull: column.notNull,
            primary: column.primary,
          }))
          .sort(byName);

        expect(created).toEqual(declared);
      }
    );
  });

  describe("TripRepo", () => {
    it("should keep members in the order they were given", async () => {
      await tripRepo.addMember("trip1", { userId: "bob", displayName: "Bob" });

      const trip = await tripRepo.findById("trip1");

      expect(trip?.name).toBe("Lisbon");
      expect(trip?.baseCurrency).toBe("EUR");
      expect(trip?.members.map((m) => m.userId)).toEqual(["carol", "alice", "bob"]);
    });

    it("should return null for an unknown trip", async () => {
      expect(await tripRepo.findById("nope")).toBeNull();
    });
  });

  describe("ExpenseRepo", () => {
    const base = {
      tripId: "trip1",
      payerUserId: "alice",
      currency: "EUR",
      categoryId: null,
    };

    const expenses: Expense[] = [
      {
        ...base,
        id: "e1",
        description: "Dinner",
        amount: d("45.10"),
        createdAt: new Date("2024-05-01T20:00:00.123Z"),
        splitType: "equal",
        participants: ["carol", "alice"],
      },
      {
        ...base,
        id: "e2",
        description: "Taxi",
        amount: d(30),
        createdAt: new Date("2024-05-01T20:00:00.123Z"),
        splitType: "weighted",
        weights: new Map([
          ["alice", d("1.5")],
          ["carol", d(1)],
        ]),
      },
      {
        ...base,
        id: "e3",
        description: "Market",
        amount: d("7.5"),
        createdAt: new Date("2024-05-02T09:30:00.000Z"),
        splitType: "itemized",
        participantAmounts: new Map([
          ["carol", d("5.25")],
          ["alice", d("2.25")],
        ]),
        receipt: {
          items: [
            {
              id: "figs",
              name: "Figs",
              quantity: d(3),
              unitPrice: d("2.5"),
              taxable: false,
              serviceChargeable: false,
              assignment: { mode: "even", users: ["carol", "alice"] },
            },
          ],
          extras: { fees: [], discounts: [] },
          allocation: {
            percentBase: "preTaxItemSubtotals",
            absoluteSplitMode: "proportional",
            rounding: { precision: d("0.01"), mode: "roundHalfUp", remainderPolicy: "largestShare" },
          },
        },
      },
    ];

    it("should read expenses back in recording order with exact amounts", async () => {
      for (const expense of expenses) {
        await expenseRepo.create(expense);
      }

      const stored = await expenseRepo.findByTripId("trip1");

      expect(stored.map((e) => e.id)).toEqual(["e1", "e2", "e3"]);
      expect(stored[0].amount.toFixed()).toBe("45.1");
      expect(stored[0].createdAt.getTime()).toBe(expenses[0].createdAt.getTime());

      const [equal, weighted, itemized] = stored;
      expect(equal.splitType === "equal" && equal.participants).toEqual(["carol", "alice"]);
      expect(weighted.splitType === "weighted" && amounts(weighted.weights)).toEqual({ alice: "1.5", carol: "1" });
      if (itemized.splitType !== "itemized") throw new Error("expected itemized");
      expect(amounts(itemized.participantAmounts)).toEqual({ carol: "5.25", alice: "2.25" });
      expect(itemized.receipt?.items[0].unitPrice.toFixed()).toBe("2.5");
    });

    it("should delete an expense with its participants", async () => {
      await expenseRepo.create(expenses[0]);
      await expenseRepo.delete("e1");

      expect(await expenseRepo.findById("e1")).toBeNull();
      expect(await expenseRepo.findByTripId("trip1")).toEqual([]);
    });
  });

  describe("CategoryRepo", () => {
    it("should list categories by name", async () => {
      const repo = new CategoryRepo(db);
      await repo.create({ id: "c2", name: "Transport" });
      await repo.create({ id: "c1", name: "Food", color: "#00ff00", icon: null });

      expect(await repo.findAll()).toEqual([
        { id: "c1", name: "Food", color: "#00ff00", icon: null },
        { id: "c2", name: "Transport", color: null, icon: null },
      ]);
    });
  });

  describe("SettledTransferRepo", () => {
    it("should store, list and remove settled transfers", async () => {
      const repo = new SettledTransferRepo(db);
      await repo.create({
        id: "stl1",
        tripId: "trip1",
        transferId: "trip1:carol:alice",
        fromUserId: "carol",
        toUserId: "alice",
        amount: d("12.34"),
        currency: "EUR",
        settledAt: new Date("2024-05-03T10:00:00.000Z"),
      });

      const [stored] = await repo.findByTripId("trip1");
      expect(stored.transferId).toBe("trip1:carol:alice");
      expect(stored.amount.toFixed()).toBe("12.34");

      await repo.delete("stl1");
      expect(await repo.findById("stl1")).toBeNull();
    });
  });
});
