import { InferSelectModel, sql } from "drizzle-orm";
import {
  check,
  index,
  integer,
  numeric,
  pgTable,
  serial,
  timestamp,
  varchar,
} from "drizzle-orm/pg-core";
import { FIELD_LIMITS } from "../../shared/field-limits";
import { paymentStatusEnum, relatedObjectTypeEnum } from "./enums";
import { users } from "./users";

export const paymentTransactions = pgTable(
  "payment_transactions",
  {
    id: serial("id").primaryKey(),
    userId: integer("user_id")
      .notNull()
      .references(() => users.id, { onDelete: "restrict" }),
    relatedObjectType: relatedObjectTypeEnum("content_type"),
    relatedObjectId: integer("object_id"),
    // Written once by the insert default; updates never touch it.
    creationDate: timestamp("creation_date", { mode: "date" }).defaultNow(),
    date: timestamp("date", { mode: "date" })
      .notNull()
      .defaultNow()
      .$onUpdate(() => new Date()),
    transactionId: varchar("transaction_id", {
      length: FIELD_LIMITS.transactionId,
    }).notNull(),
    value: numeric("value", {
      precision: FIELD_LIMITS.moneyPrecision,
      scale: 2,
    }).notNull(),
    status: paymentStatusEnum("status").notNull(),
  },
  (table) => [
    index("payment_transactions_ordering_idx").on(
      table.creationDate.desc(),
      table.transactionId
    ),
    index("payment_transactions_transaction_id_idx").on(table.transactionId),
    index("payment_transactions_user_id_idx").on(table.userId),
    check(
      "payment_transactions_related_object_check",
      sql`(${table.relatedObjectType} IS NULL) = (${table.relatedObjectId} IS NULL)`
    ),
    check(
      "payment_transactions_object_id_check",
      sql`${table.relatedObjectId} >= 0`
    ),
  ]
);

export type PaymentTransactionRow = InferSelectModel<typeof paymentTransactions>;
