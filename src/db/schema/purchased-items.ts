import { InferSelectModel, sql } from "drizzle-orm";
import {
  check,
  doublePrecision,
  index,
  integer,
  pgTable,
  serial,
  varchar,
} from "drizzle-orm/pg-core";
import { FIELD_LIMITS } from "../../shared/field-limits";
import { relatedObjectTypeEnum } from "./enums";
import { items } from "./items";
import { paymentTransactions } from "./payment-transactions";
import { users } from "./users";

export const purchasedItems = pgTable(
  "purchased_items",
  {
    id: serial("id").primaryKey(),
    userId: integer("user_id")
      .notNull()
      .references(() => users.id, { onDelete: "restrict" }),
    identifier: varchar("identifier", {
      length: FIELD_LIMITS.purchasedItemIdentifier,
    })
      .notNull()
      .default(""),
    paymentTransactionId: integer("transaction_id")
      .notNull()
      .references(() => paymentTransactions.id, { onDelete: "restrict" }),
    itemId: integer("item_id").references(() => items.id, {
      onDelete: "restrict",
    }),
    relatedObjectType: relatedObjectTypeEnum("content_type"),
    relatedObjectId: integer("object_id"),
    // Captured at purchase time; the item's value may change later.
    price: doublePrecision("price"),
    quantity: integer("quantity").notNull(),
  },
  (table) => [
    index("purchased_items_transaction_id_idx").on(table.paymentTransactionId),
    index("purchased_items_user_id_idx").on(table.userId),
    index("purchased_items_item_id_idx").on(table.itemId),
    check("purchased_items_quantity_check", sql`${table.quantity} > 0`),
    check(
      "purchased_items_related_object_check",
      sql`(${table.relatedObjectType} IS NULL) = (${table.relatedObjectId} IS NULL)`
    ),
    check(
      "purchased_items_object_id_check",
      sql`${table.relatedObjectId} >= 0`
    ),
  ]
);

export type PurchasedItemRow = InferSelectModel<typeof purchasedItems>;
