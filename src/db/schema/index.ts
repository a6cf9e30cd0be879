import { paymentStatusEnum, relatedObjectTypeEnum } from "./enums";
import { items } from "./items";
import { paymentTransactionErrors } from "./payment-transaction-errors";
import { paymentTransactions } from "./payment-transactions";
import { purchasedItems } from "./purchased-items";
import { users } from "./users";

export * from "./enums";
export * from "./items";
export * from "./payment-transaction-errors";
export * from "./payment-transactions";
export * from "./purchased-items";
export * from "./users";

export const schema = {
  paymentStatusEnum,
  relatedObjectTypeEnum,
  users,
  items,
  paymentTransactions,
  purchasedItems,
  paymentTransactionErrors,
};
