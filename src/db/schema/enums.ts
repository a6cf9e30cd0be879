import { pgEnum } from "drizzle-orm/pg-core";
import { PAYMENT_STATUSES } from "../../shared/payment-status";
import { RELATED_OBJECT_TYPES } from "../../shared/related-object";

export const paymentStatusEnum = pgEnum("payment_status", PAYMENT_STATUSES);

export const relatedObjectTypeEnum = pgEnum(
  "related_object_type",
  RELATED_OBJECT_TYPES
);
