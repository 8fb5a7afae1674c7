import { describe, it, expect } from "vitest";
import { Decimal } from "decimal.js";
import {
  currencyDigits,
  currencyUnit,
  formatAmount,
  isDecimalString,
  parseDecimalString,
  toDecimalString,
  withinEpsilon,
} from "../../src/engine/index.js";

describe("currencyDigits", () => {
  it("should use two digits for common currencies", () => {
    expect(currencyDigits("USD")).toBe(2);
    expect(currencyDigits("eur")).toBe(2);
  });

  it("should know zero and three digit currencies", () => {
    expect(currencyDigits("JPY")).toBe(0);
    expect(currencyDigits("VND")).toBe(0);
    expect(currencyDigits("KWD")).toBe(3);
  });

  it("should fall back to two digits for unknown codes", () => {
    expect(currencyDigits("")).toBe(2);
    expect(currencyDigits("not-a-code")).toBe(2);
  });
});

describe("currencyUnit", () => {
  it("should be the smallest unit of the currency", () => {
    expect(currencyUnit("USD").toFixed()).toBe("0.01");
    expect(currencyUnit("VND").toFixed()).toBe("1");
    expect(currencyUnit("BHD").toFixed()).toBe("0.001");
  });
});

describe("decimal strings", () => {
  it("should accept plain decimals only", () => {
    expect(isDecimalString("12.50")).toBe(true);
    expect(isDecimalString("-3")).toBe(true);
    expect(isDecimalString("1e5")).toBe(false);
    expect(isDecimalString("12.")).toBe(false);
    expect(isDecimalString("abc")).toBe(false);
  });

  it("should throw on malformed strings", () => {
    expect(() => parseDecimalString("1,000")).toThrow('Not a decimal string: "1,000"');
  });

  it("should write tiny and huge values without exponents", () => {
    expect(toDecimalString(new Decimal("0.0000001"))).toBe("0.0000001");
    expect(toDecimalString(new Decimal("123456789012345678901234"))).toBe("123456789012345678901234");
  });

  it("should reproduce the same value after a string round trip", () => {
    const value = new Decimal(100).div(3);
    expect(parseDecimalString(toDecimalString(value)).eq(value)).toBe(true);
  });
});

describe("formatAmount", () => {
  it("should pad to the currency's digits", () => {
    expect(formatAmount(new Decimal("5.5"), "USD")).toBe("5.50");
    expect(formatAmount(new Decimal("1000"), "JPY")).toBe("1000");
  });
});

describe("withinEpsilon", () => {
  it("should be strict at the boundary", () => {
    const epsilon = new Decimal("0.01");
    expect(withinEpsilon(new Decimal("1.005"), new Decimal("1"), epsilon)).toBe(true);
    expect(withinEpsilon(new Decimal("1.01"), new Decimal("1"), epsilon)).toBe(false);
  });
});
