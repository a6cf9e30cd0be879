import { z } from "zod";
import { Cents } from "../shared/cents";
import { FIELD_LIMITS } from "../shared/field-limits";
import { PAYMENT_STATUSES } from "../shared/payment-status";
import { RELATED_OBJECT_TYPES } from "../shared/related-object";

const recordId = z.number().int().positive().max(FIELD_LIMITS.int4Max);

/** Length in characters, as varchar(n) counts it, not UTF-16 code units. */
function varchar(maxLength: number, minLength = 0) {
  return z
    .string()
    .min(minLength)
    .refine((value) => [...value].length <= maxLength, {
      message: `Expected at most ${maxLength} characters`,
    });
}

/**
 * Monetary amount for numeric(8, 2) columns. Accepts a number or a decimal
 * string and yields the canonical two-decimal string.
 */
export const moneySchema = z
  .union([z.number(), z.string()])
  .transform((value, ctx) => {
    const cents = Cents.fromDecimalString(String(value));
    if (!cents) {
      ctx.addIssue({
        code: "custom",
        message: "Expected a decimal with at most 2 decimal places",
      });
      return z.NEVER;
    }
    if (!cents.fitsPrecision(FIELD_LIMITS.moneyPrecision)) {
      ctx.addIssue({
        code: "custom",
        message: `Expected at most ${FIELD_LIMITS.moneyPrecision} digits`,
      });
      return z.NEVER;
    }
    return cents.toDecimalString();
  });

export const paymentStatusSchema = z.enum(PAYMENT_STATUSES);

export const relatedObjectSchema = z.object({
  type: z.enum(RELATED_OBJECT_TYPES),
  id: z.number().int().nonnegative().max(FIELD_LIMITS.int4Max),
});

export const quantitySchema = z
  .number()
  .int()
  .positive()
  .max(FIELD_LIMITS.int4Max);

export const createItemSchema = z.object({
  identifier: varchar(FIELD_LIMITS.itemIdentifier).optional(),
  name: varchar(FIELD_LIMITS.itemName, 1),
  description: varchar(FIELD_LIMITS.itemDescription, 1),
  value: moneySchema,
  currency: varchar(FIELD_LIMITS.currency, 1).optional(),
});

export const updateItemSchema = z.object({
  id: recordId,
  identifier: varchar(FIELD_LIMITS.itemIdentifier).optional(),
  name: varchar(FIELD_LIMITS.itemName, 1).optional(),
  description: varchar(FIELD_LIMITS.itemDescription, 1).optional(),
  value: moneySchema.optional(),
  currency: varchar(FIELD_LIMITS.currency, 1).optional(),
});

export const purchasedItemLineSchema = z
  .object({
    identifier: varchar(FIELD_LIMITS.purchasedItemIdentifier).optional(),
    itemId: recordId.nullish(),
    relatedObject: relatedObjectSchema.nullish(),
    price: z.number().nonnegative().nullish(),
    quantity: quantitySchema,
  })
  .refine((line) => line.itemId != null || line.relatedObject != null, {
    message: "A purchased item needs an itemId or a relatedObject",
    path: ["itemId"],
  });

export const recordPaymentTransactionSchema = z.object({
  userId: recordId,
  relatedObject: relatedObjectSchema.nullish(),
  transactionId: varchar(FIELD_LIMITS.transactionId, 1),
  value: moneySchema.optional(),
  status: paymentStatusSchema.default("checkout"),
  purchasedItems: z.array(purchasedItemLineSchema).default([]),
});

export const updatePaymentTransactionStatusSchema = z.object({
  transactionId: varchar(FIELD_LIMITS.transactionId, 1),
  status: paymentStatusSchema,
  value: moneySchema.optional(),
});

export const logPaymentTransactionErrorSchema = z.object({
  userId: recordId,
  paypalApiUrl: varchar(FIELD_LIMITS.paypalApiUrl).default(""),
  requestData: z.string().default(""),
  response: z.string().default(""),
  paymentTransactionId: recordId.nullish(),
});

export const listPurchasedItemsSchema = z.object({
  userId: recordId,
  itemId: recordId.optional(),
  identifier: varchar(FIELD_LIMITS.purchasedItemIdentifier).optional(),
});

export const recordIdSchema = z.object({ id: recordId });

export interface ValidationIssue {
  path: string;
  message: string;
}

export function toValidationIssues(error: z.ZodError): ValidationIssue[] {
  return error.issues.map((issue) => ({
    path: issue.path.map(String).join("."),
    message: issue.message,
  }));
}
