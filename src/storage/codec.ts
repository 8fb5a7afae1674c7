import { Decimal } from "decimal.js";
import { z } from "zod";
import { isDecimalString, toDecimalString } from "../engine/money.js";
import type {
  AllocationRule,
  ExtraAmount,
  ItemAssignment,
  ItemizedReceipt,
  LineItem,
} from "../types/index.js";

// Receipts travel as JSON with every amount as an exact decimal string

export const decimalStringSchema = z
  .string()
  .refine(isDecimalString, { message: "Expected a decimal string such as \"12.50\"" })
  .transform((value) => new Decimal(value));

export const percentBaseSchema = z.enum([
  "preTaxItemSubtotals",
  "taxableItemSubtotalsOnly",
  "postDiscountItemSubtotals",
  "postTaxSubtotals",
  "postFeesSubtotals",
]);

const percentExtraSchema = z.object({
  type: z.literal("percent"),
  value: decimalStringSchema,
  base: percentBaseSchema.optional(),
});

const absoluteExtraSchema = z.object({
  type: z.literal("absolute"),
  value: decimalStringSchema,
});

const named = { id: z.string().min(1), name: z.string() };

export const extraAmountSchema = z.discriminatedUnion("type", [percentExtraSchema, absoluteExtraSchema]);

const namedExtraSchema = z.discriminatedUnion("type", [
  percentExtraSchema.extend(named),
  absoluteExtraSchema.extend(named),
]);

const userIdSchema = z.string().min(1);

const assignmentSchema = z.discriminatedUnion("mode", [
  z.object({ mode: z.literal("even"), users: z.array(userIdSchema) }),
  z.object({
    mode: z.literal("custom"),
    users: z.array(userIdSchema),
    shares: z
      .record(z.string(), decimalStringSchema)
      .transform((shares) => new Map(Object.entries(shares))),
  }),
]);

export const lineItemSchema = z.object({
  id: z.string().min(1),
  name: z.string(),
  quantity: decimalStringSchema,
  unitPrice: decimalStringSchema,
  taxable: z.boolean().default(true),
  serviceChargeable: z.boolean().default(true),
  assignment: assignmentSchema,
});

export const extrasSchema = z.object({
  tax: extraAmountSchema.optional(),
  tip: extraAmountSchema.optional(),
  fees: z.array(namedExtraSchema).default([]),
  discounts: z.array(namedExtraSchema).default([]),
});

export const allocationRuleSchema = z.object({
  percentBase: percentBaseSchema.default("preTaxItemSubtotals"),
  absoluteSplitMode: z.enum(["proportional", "even"]).default("proportional"),
  rounding: z.object({
    precision: decimalStringSchema,
    mode: z.enum(["roundHalfUp", "roundHalfEven", "floor", "ceil"]).default("roundHalfUp"),
    remainderPolicy: z
      .enum(["largestShare", "payer", "firstListed", "deterministic"])
      .default("largestShare"),
    seed: z.number().int().optional(),
  }),
});

export const itemizedReceiptSchema = z.object({
  items: z.array(lineItemSchema),
  extras: extrasSchema,
  allocation: allocationRuleSchema,
});

export type ReceiptJson = z.input<typeof itemizedReceiptSchema>;
type ExtraJson = z.input<typeof extraAmountSchema>;
type AssignmentJson = z.input<typeof assignmentSchema>;
type LineItemJson = z.input<typeof lineItemSchema>;

function encodeExtra(extra: ExtraAmount): ExtraJson {
  return extra.type === "percent"
    ? { type: extra.type, value: toDecimalString(extra.value), base: extra.base }
    : { type: extra.type, value: toDecimalString(extra.value) };
}

function encodeAssignment(assignment: ItemAssignment): AssignmentJson {
  if (assignment.mode === "even") {
    return { mode: assignment.mode, users: [...assignment.users] };
  }

  const shares: Record<string, string> = {};
  for (const [userId, share] of assignment.shares) {
    shares[userId] = toDecimalString(share);
  }
  return { mode: assignment.mode, users: [...assignment.users], shares };
}

function encodeItem(item: LineItem): LineItemJson {
  return {
    id: item.id,
    name: item.name,
    quantity: toDecimalString(item.quantity),
    unitPrice: toDecimalString(item.unitPrice),
    taxable: item.taxable,
    serviceChargeable: item.serviceChargeable,
    assignment: encodeAssignment(item.assignment),
  };
}

function encodeAllocation(allocation: AllocationRule): ReceiptJson["allocation"] {
  return {
    percentBase: allocation.percentBase,
    absoluteSplitMode: allocation.absoluteSplitMode,
    rounding: {
      precision: toDecimalString(allocation.rounding.precision),
      mode: allocation.rounding.mode,
      remainderPolicy: allocation.rounding.remainderPolicy,
      seed: allocation.rounding.seed,
    },
  };
}

export function encodeReceipt(receipt: ItemizedReceipt): ReceiptJson {
  return {
    items: receipt.items.map(encodeItem),
    extras: {
      tax: receipt.extras.tax ? encodeExtra(receipt.extras.tax) : undefined,
      tip: receipt.extras.tip ? encodeExtra(receipt.extras.tip) : undefined,
      fees: receipt.extras.fees.map((fee) => ({ ...encodeExtra(fee), id: fee.id, name: fee.name })),
      discounts: receipt.extras.discounts.map((discount) => ({
        ...encodeExtra(discount),
        id: discount.id,
        name: discount.name,
      })),
    },
    allocation: encodeAllocation(receipt.allocation),
  };
}

/** @throws ZodError when the value is not a well-formed receipt */
export function decodeReceipt(value: unknown): ItemizedReceipt {
  return itemizedReceiptSchema.parse(value);
}

export function serializeReceipt(receipt: ItemizedReceipt): string {
  return JSON.stringify(encodeReceipt(receipt));
}

export function deserializeReceipt(text: string): ItemizedReceipt {
  return decodeReceipt(JSON.parse(text));
}
