import { afterEach, beforeEach, describe, it, expect, vi } from "vitest";
import { createDatabase, ExpenseRepo, type AppDatabase } from "../../src/storage/index.js";
import { createServices, type AppServices, type TripSettlement } from "../../src/services/index.js";
import { NotFoundError, RequestValidationError, SettlementComputationError } from "../../src/errors.js";
import { d } from "../support/fixtures.js";

const computedAt = new Date("2024-05-04T08:00:00.000Z");

function transfers(settlement: TripSettlement): string[] {
  return settlement.pendingTransfers.map((t) => `${t.fromUserId}->${t.toUserId} ${t.amountBase.toFixed()}`);
}

describe("SettlementService", () => {
  let db: AppDatabase;
  let services: AppServices;

  afterEach(() => {
    vi.restoreAllMocks();
  });

  beforeEach(async () => {
    db = createDatabase(":memory:");
    services = createServices(db);

    await services.trips.createTrip({
      id: "trip1",
      name: "Kyoto",
      baseCurrency: "USD",
      members: [
        { userId: "alice", displayName: "Alice" },
        { userId: "bob", displayName: "Bob" },
        { userId: "carol", displayName: "Carol" },
      ],
    });
    await services.categories.createCategory({ id: "food", name: "Food", color: "#ff8800" });

    // alice +60, bob -15, carol -45
    await services.expenses.createExpense("trip1", {
      id: "e1",
      description: "Dinner",
      payerUserId: "alice",
      categoryId: "food",
      split: { splitType: "equal", amount: d(90), participants: ["alice", "bob", "carol"] },
    });
    await services.expenses.createExpense("trip1", {
      id: "e2",
      description: "Train",
      payerUserId: "bob",
      split: { splitType: "equal", amount: d(30), participants: ["bob", "carol"] },
    });
  });

  it("should net each pair of people by default", async () => {
    const settlement = await services.settlements.getSettlement("trip1", { computedAt });

    expect(settlement.strategy).toBe("pairwise");
    expect(transfers(settlement)).toEqual(["bob->alice 30", "carol->alice 30", "carol->bob 15"]);
    expect(settlement.pendingTransfers[0].id).toBe("trip1:bob:alice");
    expect(settlement.issues).toEqual([]);
    expect(settlement.warnings).toEqual([]);

    const nets = Array.from(settlement.summary.personSummaries.values(), (s) => [s.userId, s.netBase.toFixed()]);
    expect(nets).toEqual([
      ["alice", "60"],
      ["bob", "-15"],
      ["carol", "-45"],
    ]);
  });

  it("should match largest balances first with the greedy strategy", async () => {
    const settlement = await services.settlements.getSettlement("trip1", { strategy: "greedy", computedAt });

    expect(settlement.strategy).toBe("greedy");
    expect(transfers(settlement)).toEqual(["carol->alice 45", "bob->alice 15"]);
    expect(settlement.issues).toEqual([]);
  });

  it("should break each person's share down by category", async () => {
    const { categorySpending } = await services.settlements.getSettlement("trip1", { computedAt });

    const bob = categorySpending?.get("bob");
    expect(bob?.categories.map((c) => [c.categoryId, c.categoryName, c.amount.toFixed(), c.color])).toEqual([
      ["food", "Food", "30", "#ff8800"],
      ["uncategorized", "Uncategorized", "15", null],
    ]);
  });

  it("should only leave what is still open after a transfer is marked paid", async () => {
    const settled = await services.settlements.markTransferSettled("trip1", {
      fromUserId: "carol",
      toUserId: "alice",
      amount: d(30),
    });
    expect(settled.transferId).toBe("trip1:carol:alice");
    expect(settled.currency).toBe("USD");

    const pairwise = await services.settlements.getSettlement("trip1", { computedAt });
    expect(transfers(pairwise)).toEqual(["bob->alice 30", "carol->bob 15"]);
    expect(pairwise.settledTransfers.map((t) => t.id)).toEqual([settled.id]);
    expect(pairwise.issues).toEqual([]);

    const greedy = await services.settlements.getSettlement("trip1", { strategy: "greedy", computedAt });
    expect(transfers(greedy)).toEqual(["bob->alice 15", "carol->alice 15"]);
    expect(greedy.issues).toEqual([]);

    await services.settlements.unmarkTransferSettled("trip1", settled.id);
    const restored = await services.settlements.getSettlement("trip1", { computedAt });
    expect(transfers(restored)).toEqual(["bob->alice 30", "carol->alice 30", "carol->bob 15"]);
  });

  it("should log a paid transfer in the currency's minor units", async () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => undefined);

    await services.settlements.markTransferSettled("trip1", { fromUserId: "bob", toUserId: "alice", amount: d(30) });

    expect(log).toHaveBeenLastCalledWith("✅ Marked paid on trip1: bob → alice 30.00 USD");
  });

  it("should reject a settled transfer between unknown or identical people", async () => {
    const attempt = services.settlements.markTransferSettled("trip1", {
      fromUserId: "alice",
      toUserId: "alice",
      amount: d(0),
    });

    await expect(attempt).rejects.toBeInstanceOf(RequestValidationError);
    await expect(attempt).rejects.toMatchObject({
      details: ["Payer and receiver must differ", "Amount must be positive"],
    });
    await expect(services.settlements.unmarkTransferSettled("trip1", "stl_missing")).rejects.toBeInstanceOf(
      NotFoundError
    );
  });

  it("should explain a transfer expense by expense", async () => {
    const breakdown = await services.settlements.explainTransfer("trip1", "carol", "alice");

    expect(breakdown.totalAmount.toFixed()).toBe("30");
    expect(
      breakdown.expenseBreakdowns.map((b) => [b.expense.id, b.fromOwes.toFixed(), b.netContribution.toFixed()])
    ).toEqual([
      ["e1", "30", "30"],
      ["e2", "15", "0"],
    ]);
  });

  it("should fail when stored amounts do not balance", async () => {
    await new ExpenseRepo(db).create({
      id: "broken",
      tripId: "trip1",
      description: "Corrupt import",
      payerUserId: "alice",
      currency: "USD",
      amount: d(10),
      categoryId: null,
      createdAt: new Date("2024-05-03T00:00:00.000Z"),
      splitType: "itemized",
      participantAmounts: new Map([
        ["alice", d(4)],
        ["bob", d(4)],
      ]),
    });

    const attempt = services.settlements.getSettlement("trip1", { computedAt });
    await expect(attempt).rejects.toBeInstanceOf(SettlementComputationError);
    await expect(attempt).rejects.toThrow("Net balances sum to 2 instead of zero");
  });

  it("should throw NotFoundError for an unknown trip", async () => {
    await expect(services.settlements.getSettlement("missing")).rejects.toBeInstanceOf(NotFoundError);
  });
});
