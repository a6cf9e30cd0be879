import { InferSelectModel } from "drizzle-orm";
import { pgTable, serial, varchar } from "drizzle-orm/pg-core";
import { FIELD_LIMITS } from "../../shared/field-limits";

// Accounts live in the host application; this table only anchors the
// foreign keys of the payment records.
export const users = pgTable("users", {
  id: serial("id").primaryKey(),
  email: varchar("email", { length: FIELD_LIMITS.userEmail })
    .notNull()
    .unique(),
});

export type UserRow = InferSelectModel<typeof users>;
