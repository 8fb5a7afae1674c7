import { z } from "zod";
import { decimalStringSchema, itemizedReceiptSchema } from "../storage/codec.js";
import { RequestValidationError } from "../errors.js";

const userIdSchema = z.string().min(1);
const currencySchema = z
  .string()
  .regex(/^[A-Za-z]{3}$/, "Expected a three-letter currency code")
  .transform((code) => code.toUpperCase());

export const memberSchema = z.object({
  userId: userIdSchema,
  displayName: z.string().min(1),
});

export const createTripSchema = z.object({
  id: z.string().min(1).optional(),
  name: z.string().min(1),
  baseCurrency: currencySchema,
  members: z.array(memberSchema).min(1),
});

const splitSchema = z.discriminatedUnion("splitType", [
  z.object({
    splitType: z.literal("equal"),
    amount: decimalStringSchema,
    participants: z.array(userIdSchema).min(1),
  }),
  z.object({
    splitType: z.literal("weighted"),
    amount: decimalStringSchema,
    weights: z
      .record(z.string(), decimalStringSchema)
      .transform((weights) => new Map(Object.entries(weights))),
  }),
  z.object({
    splitType: z.literal("itemized"),
    receipt: itemizedReceiptSchema,
    participants: z.array(userIdSchema).optional(),
  }),
]);

export const createExpenseSchema = z.object({
  id: z.string().min(1).optional(),
  description: z.string().min(1),
  payerUserId: userIdSchema,
  currency: currencySchema.optional(),
  categoryId: z.string().min(1).nullable().optional(),
  split: splitSchema,
});

export const itemizedPreviewSchema = z.object({
  receipt: itemizedReceiptSchema,
  participants: z.array(userIdSchema),
  payerId: userIdSchema,
  currency: currencySchema,
});

export const settleTransferSchema = z.object({
  fromUserId: userIdSchema,
  toUserId: userIdSchema,
  amount: decimalStringSchema,
  settledAt: z
    .string()
    .datetime()
    .transform((value) => new Date(value))
    .optional(),
});

export const createCategorySchema = z.object({
  id: z.string().min(1).optional(),
  name: z.string().min(1),
  color: z.string().nullable().optional(),
  icon: z.string().nullable().optional(),
});

export const settlementQuerySchema = z.object({
  strategy: z.enum(["pairwise", "greedy"]).optional(),
});

export const breakdownQuerySchema = z.object({
  from: userIdSchema,
  to: userIdSchema,
});

/**
 * Parse a request body or query
 * @throws RequestValidationError listing every problem, path first
 */
export function parseRequest<Output, Input>(
  schema: z.ZodType<Output, z.ZodTypeDef, Input>,
  value: unknown
): Output {
  const parsed = schema.safeParse(value);
  if (!parsed.success) {
    throw new RequestValidationError(
      parsed.error.issues.map((issue) => `${issue.path.join(".") || "request"}: ${issue.message}`)
    );
  }
  return parsed.data;
}
