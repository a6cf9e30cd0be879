import { InferSelectModel } from "drizzle-orm";
import {
  index,
  integer,
  pgTable,
  serial,
  text,
  timestamp,
  varchar,
} from "drizzle-orm/pg-core";
import { FIELD_LIMITS } from "../../shared/field-limits";
import { paymentTransactions } from "./payment-transactions";
import { users } from "./users";

// Audit log of failed gateway calls. Rows are inserted once and never
// updated.
export const paymentTransactionErrors = pgTable(
  "payment_transaction_errors",
  {
    id: serial("id").primaryKey(),
    date: timestamp("date", { mode: "date" }).notNull().defaultNow(),
    userId: integer("user_id")
      .notNull()
      .references(() => users.id, { onDelete: "restrict" }),
    paypalApiUrl: varchar("paypal_api_url", {
      length: FIELD_LIMITS.paypalApiUrl,
    })
      .notNull()
      .default(""),
    requestData: text("request_data").notNull().default(""),
    response: text("response").notNull().default(""),
    paymentTransactionId: integer("transaction_id").references(
      () => paymentTransactions.id,
      { onDelete: "restrict" }
    ),
  },
  (table) => [
    index("payment_transaction_errors_transaction_id_idx").on(
      table.paymentTransactionId
    ),
    index("payment_transaction_errors_user_id_idx").on(table.userId),
  ]
);

export type PaymentTransactionErrorRow = InferSelectModel<
  typeof paymentTransactionErrors
>;
