import { InferSelectModel } from "drizzle-orm";
import { numeric, pgTable, serial, varchar } from "drizzle-orm/pg-core";
import { FIELD_LIMITS } from "../../shared/field-limits";

export const items = pgTable("items", {
  id: serial("id").primaryKey(),
  identifier: varchar("identifier", { length: FIELD_LIMITS.itemIdentifier })
    .notNull()
    .default(""),
  name: varchar("name", { length: FIELD_LIMITS.itemName }).notNull(),
  description: varchar("description", {
    length: FIELD_LIMITS.itemDescription,
  }).notNull(),
  value: numeric("value", {
    precision: FIELD_LIMITS.moneyPrecision,
    scale: 2,
  }).notNull(),
  currency: varchar("currency", { length: FIELD_LIMITS.currency })
    .notNull()
    .default("USD"),
});

export type ItemRow = InferSelectModel<typeof items>;
