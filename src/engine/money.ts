import { Decimal } from "decimal.js";

const DECIMAL_STRING = /^-?\d+(\.\d+)?$/;

// ISO 4217 minor units that differ from the usual two digits
const currencyMinorUnitOverrides: Record<string, number> = {
  BIF: 0,
  CLP: 0,
  DJF: 0,
  GNF: 0,
  ISK: 0,
  JPY: 0,
  KMF: 0,
  KRW: 0,
  PYG: 0,
  RWF: 0,
  UGX: 0,
  VND: 0,
  VUV: 0,
  XAF: 0,
  XOF: 0,
  XPF: 0,
  BHD: 3,
  IQD: 3,
  JOD: 3,
  KWD: 3,
  LYD: 3,
  OMR: 3,
  TND: 3,
};

export const ZERO = new Decimal(0);

export function sumDecimals(values: Iterable<Decimal>): Decimal {
  let total = ZERO;
  for (const value of values) {
    total = total.plus(value);
  }
  return total;
}

/**
 * Number of fractional digits in the currency's smallest unit
 * Unknown or malformed codes fall back to 2
 */
export function currencyDigits(currency: string): number {
  const code = currency.trim().toUpperCase();
  if (!code) {
    return 2;
  }

  const override = currencyMinorUnitOverrides[code];
  if (override !== undefined) {
    return override;
  }

  try {
    const { maximumFractionDigits } = new Intl.NumberFormat("en-US", {
      style: "currency",
      currency: code,
    }).resolvedOptions();
    return maximumFractionDigits ?? 2;
  } catch {
    return 2;
  }
}

/**
 * Smallest unit of a currency (0.01 for USD, 1 for VND, 0.001 for KWD)
 * Every tolerance in the engine is expressed in this unit
 */
export function currencyUnit(currency: string): Decimal {
  return new Decimal(10).pow(-currencyDigits(currency));
}

export function formatAmount(amount: Decimal, currency: string): string {
  return amount.toFixed(currencyDigits(currency));
}

/** Plain decimal notation, never exponent form, so parsing gives back the same value */
export function toDecimalString(amount: Decimal): string {
  return amount.toFixed();
}

export function isDecimalString(value: string): boolean {
  return DECIMAL_STRING.test(value.trim());
}

export function parseDecimalString(value: string): Decimal {
  if (!isDecimalString(value)) {
    throw new Error(`Not a decimal string: "${value}"`);
  }
  return new Decimal(value.trim());
}

export function withinEpsilon(a: Decimal, b: Decimal, epsilon: Decimal): boolean {
  return a.minus(b).abs().lt(epsilon);
}
