import { Decimal } from "decimal.js";
import type { RemainderPolicy, RoundingConfig, RoundingMode, UserId } from "../types/index.js";
import { sumDecimals } from "./money.js";

const DECIMAL_ROUNDING: Record<RoundingMode, Decimal.Rounding> = {
  roundHalfUp: Decimal.ROUND_HALF_UP,
  roundHalfEven: Decimal.ROUND_HALF_EVEN,
  floor: Decimal.ROUND_FLOOR,
  ceil: Decimal.ROUND_CEIL,
};

export interface RemainderOptions {
  policy: RemainderPolicy;
  payerId?: UserId;
  rawAmounts?: ReadonlyMap<UserId, Decimal>; // pre-rounding amounts, read by "largestShare"
  seed?: number;
}

/**
 * Round an amount to the nearest multiple of `precision`
 * @param precision - Step to round to, e.g. 0.01 or 1. Must be positive
 * @param mode - roundHalfUp sends ties away from zero, roundHalfEven to the even multiple
 */
export function roundAmount(amount: Decimal, precision: Decimal, mode: RoundingMode): Decimal {
  if (precision.lte(0)) {
    throw new Error(`Rounding precision must be positive, got ${precision.toString()}`);
  }

  return amount.toNearest(precision, DECIMAL_ROUNDING[mode]);
}

/**
 * Add the whole rounding remainder to exactly one participant
 * @param rounded - Independently rounded amounts, in participant order
 * @param remainder - True total minus the sum of rounded amounts
 * @returns A new map; the input is left untouched
 */
export function distributeRemainder(
  rounded: ReadonlyMap<UserId, Decimal>,
  remainder: Decimal,
  options: RemainderOptions
): Map<UserId, Decimal> {
  const adjusted = new Map(rounded);

  if (remainder.isZero() || adjusted.size === 0) {
    return adjusted;
  }

  const recipient = selectRemainderRecipient(rounded, options);
  const current = adjusted.get(recipient) ?? new Decimal(0);
  adjusted.set(recipient, current.plus(remainder));

  return adjusted;
}

/**
 * Round every raw amount and push the remainder onto one participant,
 * so the result sums to the rounded total exactly
 * @param options.total - Grand total to reconcile against; defaults to the rounded sum of `raw`
 */
export function roundShares(
  raw: ReadonlyMap<UserId, Decimal>,
  config: RoundingConfig,
  options: { payerId?: UserId; total?: Decimal } = {}
): Map<UserId, Decimal> {
  const rounded = new Map<UserId, Decimal>();
  for (const [userId, amount] of raw) {
    rounded.set(userId, roundAmount(amount, config.precision, config.mode));
  }

  const total =
    options.total ?? roundAmount(sumDecimals(raw.values()), config.precision, config.mode);
  const remainder = total.minus(sumDecimals(rounded.values()));

  return distributeRemainder(rounded, remainder, {
    policy: config.remainderPolicy,
    payerId: options.payerId,
    rawAmounts: raw,
    seed: config.seed,
  });
}

function selectRemainderRecipient(
  rounded: ReadonlyMap<UserId, Decimal>,
  options: RemainderOptions
): UserId {
  const userIds = Array.from(rounded.keys());
  const firstListed = userIds[0];

  switch (options.policy) {
    case "largestShare": {
      const amounts = options.rawAmounts ?? rounded;
      let largest = firstListed;
      let largestAmount = amounts.get(firstListed) ?? new Decimal(0);
      for (const userId of userIds) {
        const amount = amounts.get(userId) ?? new Decimal(0);
        // Strictly greater, so ties stay with the first listed
        if (amount.gt(largestAmount)) {
          largest = userId;
          largestAmount = amount;
        }
      }
      return largest;
    }

    case "payer":
      if (options.payerId !== undefined && rounded.has(options.payerId)) {
        return options.payerId;
      }
      return firstListed;

    case "firstListed":
      return firstListed;

    case "deterministic": {
      const random = mulberry32(options.seed ?? hashUserIds(userIds));
      return userIds[Math.floor(random() * userIds.length)];
    }
  }
}

// Seeded PRNG: the same seed always yields the same sequence
function mulberry32(seed: number): () => number {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

// FNV-1a over the ordered ids
function hashUserIds(userIds: UserId[]): number {
  let hash = 0x811c9dc5;
  for (const char of userIds.join("\u0000")) {
    hash ^= char.codePointAt(0) ?? 0;
    hash = Math.imul(hash, 0x01000193) >>> 0;
  }
  return hash;
}
