import { describe, it, expect } from "vitest";
import { Decimal } from "decimal.js";
import { distributeRemainder, roundAmount, roundShares } from "../../src/engine/index.js";
import type { RoundingConfig } from "../../src/types/index.js";

const d = (value: string | number) => new Decimal(value);

function amounts(map: Map<string, Decimal>): Record<string, string> {
  return Object.fromEntries(Array.from(map, ([userId, amount]) => [userId, amount.toFixed()]));
}

describe("roundAmount", () => {
  it("should round half up away from zero", () => {
    expect(roundAmount(d("2.345"), d("0.01"), "roundHalfUp").toFixed()).toBe("2.35");
    expect(roundAmount(d("-2.345"), d("0.01"), "roundHalfUp").toFixed()).toBe("-2.35");
  });

  it("should round half even to the even cent", () => {
    expect(roundAmount(d("2.345"), d("0.01"), "roundHalfEven").toFixed()).toBe("2.34");
    expect(roundAmount(d("2.355"), d("0.01"), "roundHalfEven").toFixed()).toBe("2.36");
  });

  it("should floor and ceil", () => {
    expect(roundAmount(d("2.349"), d("0.01"), "floor").toFixed()).toBe("2.34");
    expect(roundAmount(d("2.341"), d("0.01"), "ceil").toFixed()).toBe("2.35");
  });

  it("should round to whole units and to coarser steps", () => {
    expect(roundAmount(d("333.5"), d(1), "roundHalfUp").toFixed()).toBe("334");
    expect(roundAmount(d("1.12"), d("0.05"), "roundHalfUp").toFixed()).toBe("1.1");
  });

  it("should reject a non-positive precision", () => {
    expect(() => roundAmount(d(1), d(0), "roundHalfUp")).toThrow("Rounding precision must be positive");
  });
});

describe("distributeRemainder", () => {
  const rounded = new Map([
    ["alice", d("3.33")],
    ["bob", d("3.33")],
    ["carol", d("3.33")],
  ]);

  it("should give the remainder to the first listed on a largest-share tie", () => {
    const result = distributeRemainder(rounded, d("0.01"), { policy: "largestShare" });
    expect(amounts(result)).toEqual({ alice: "3.34", bob: "3.33", carol: "3.33" });
  });

  it("should read raw amounts to find the largest share", () => {
    const result = distributeRemainder(rounded, d("0.01"), {
      policy: "largestShare",
      rawAmounts: new Map([
        ["alice", d("3.331")],
        ["bob", d("3.334")],
        ["carol", d("3.332")],
      ]),
    });
    expect(amounts(result)).toEqual({ alice: "3.33", bob: "3.34", carol: "3.33" });
  });

  it("should give the remainder to the payer", () => {
    const result = distributeRemainder(rounded, d("0.01"), { policy: "payer", payerId: "carol" });
    expect(amounts(result)).toEqual({ alice: "3.33", bob: "3.33", carol: "3.34" });
  });

  it("should fall back to the first listed when the payer is not a participant", () => {
    const result = distributeRemainder(rounded, d("0.01"), { policy: "payer", payerId: "dave" });
    expect(result.get("alice")?.toFixed()).toBe("3.34");
  });

  it("should pick the same recipient for the same seed", () => {
    const first = distributeRemainder(rounded, d("0.01"), { policy: "deterministic", seed: 42 });
    const second = distributeRemainder(rounded, d("0.01"), { policy: "deterministic", seed: 42 });
    expect(amounts(first)).toEqual(amounts(second));
    expect(Array.from(first.values()).filter((v) => v.eq("3.34"))).toHaveLength(1);
  });

  it("should leave the input untouched and skip a zero remainder", () => {
    const result = distributeRemainder(rounded, d(0), { policy: "firstListed" });
    expect(result).not.toBe(rounded);
    expect(amounts(result)).toEqual({ alice: "3.33", bob: "3.33", carol: "3.33" });
  });
});

describe("roundShares", () => {
  const usd: RoundingConfig = {
    precision: d("0.01"),
    mode: "roundHalfUp",
    remainderPolicy: "firstListed",
  };

  it("should sum to the given total exactly", () => {
    const raw = new Map([
      ["alice", d(10).div(3)],
      ["bob", d(10).div(3)],
      ["carol", d(10).div(3)],
    ]);

    const result = roundShares(raw, usd, { total: d(10) });

    expect(amounts(result)).toEqual({ alice: "3.34", bob: "3.33", carol: "3.33" });
  });

  it("should take away from one participant when rounding overshoots", () => {
    const raw = new Map([
      ["alice", d("0.005")],
      ["bob", d("0.005")],
    ]);

    // Each rounds up to 0.01 but the total is 0.01
    const result = roundShares(raw, usd, { total: d("0.01") });

    expect(amounts(result)).toEqual({ alice: "0", bob: "0.01" });
  });
});
