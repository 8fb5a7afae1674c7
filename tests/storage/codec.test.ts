import { describe, it, expect } from "vitest";
import { ZodError } from "zod";
import { decodeReceipt, deserializeReceipt, encodeReceipt, serializeReceipt } from "../../src/storage/codec.js";
import type { ItemizedReceipt } from "../../src/types/index.js";
import { d } from "../support/fixtures.js";

const receipt: ItemizedReceipt = {
  items: [
    {
      id: "i1",
      name: "Ramen",
      quantity: d(2),
      unitPrice: d("12.50"),
      taxable: true,
      serviceChargeable: false,
      assignment: {
        mode: "custom",
        users: ["alice", "bob"],
        shares: new Map([
          ["alice", d("0.75")],
          ["bob", d("0.25")],
        ]),
      },
    },
  ],
  extras: {
    tax: { type: "percent", value: d("8.875") },
    tip: { type: "absolute", value: d(5) },
    fees: [{ id: "svc", name: "Service", type: "percent", value: d(3), base: "postDiscountItemSubtotals" }],
    discounts: [],
  },
  allocation: {
    percentBase: "preTaxItemSubtotals",
    absoluteSplitMode: "even",
    rounding: { precision: d("0.01"), mode: "roundHalfEven", remainderPolicy: "deterministic", seed: 7 },
  },
};

describe("receipt codec", () => {
  it("should write every amount as a decimal string", () => {
    const json = encodeReceipt(receipt);

    expect(json.items[0].unitPrice).toBe("12.5");
    expect(json.items[0].assignment).toEqual({
      mode: "custom",
      users: ["alice", "bob"],
      shares: { alice: "0.75", bob: "0.25" },
    });
    expect(json.extras.tax).toEqual({ type: "percent", value: "8.875", base: undefined });
    expect(json.allocation.rounding.precision).toBe("0.01");
  });

  it("should read back identical values", () => {
    const decoded = deserializeReceipt(serializeReceipt(receipt));
    const [item] = decoded.items;

    expect(item.unitPrice.eq(receipt.items[0].unitPrice)).toBe(true);
    expect(item.assignment.mode).toBe("custom");
    if (item.assignment.mode === "custom") {
      expect(item.assignment.shares.get("alice")?.toFixed()).toBe("0.75");
    }
    expect(decoded.extras.tax?.value.toFixed()).toBe("8.875");
    expect(decoded.extras.fees[0]).toMatchObject({ id: "svc", type: "percent", base: "postDiscountItemSubtotals" });
    expect(decoded.allocation.rounding).toMatchObject({ mode: "roundHalfEven", remainderPolicy: "deterministic", seed: 7 });
  });

  it("should fill in defaults for omitted fields", () => {
    const decoded = decodeReceipt({
      items: [
        { id: "i1", name: "Tea", quantity: "1", unitPrice: "3", assignment: { mode: "even", users: ["alice"] } },
      ],
      extras: {},
      allocation: { rounding: { precision: "0.01" } },
    });

    expect(decoded.items[0].taxable).toBe(true);
    expect(decoded.items[0].serviceChargeable).toBe(true);
    expect(decoded.extras.fees).toEqual([]);
    expect(decoded.allocation.percentBase).toBe("preTaxItemSubtotals");
    expect(decoded.allocation.absoluteSplitMode).toBe("proportional");
    expect(decoded.allocation.rounding.remainderPolicy).toBe("largestShare");
  });

  it("should reject amounts that are not decimal strings", () => {
    expect(() =>
      decodeReceipt({
        items: [{ id: "i1", name: "Tea", quantity: "1", unitPrice: 3, assignment: { mode: "even", users: [] } }],
        extras: {},
        allocation: { rounding: { precision: "1e-2" } },
      })
    ).toThrow(ZodError);
  });
});
