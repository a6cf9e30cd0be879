import type {
  PaymentTransactionErrorRow,
  PaymentTransactionRow,
  PurchasedItemRow,
} from "../../db/schema";
import { fromRelatedObjectColumns } from "../../shared/related-object";
import type { PaymentTransactionData } from "../payment-transaction-repository";
import type { PaymentTransactionErrorData } from "../payment-transaction-error-repository";
import type { PurchasedItemData } from "../purchased-item-repository";

export function toPaymentTransactionData(
  row: PaymentTransactionRow
): PaymentTransactionData {
  return {
    id: row.id,
    userId: row.userId,
    relatedObject: fromRelatedObjectColumns(row),
    creationDate: row.creationDate,
    date: row.date,
    transactionId: row.transactionId,
    value: row.value,
    status: row.status,
  };
}

export function toPurchasedItemData(row: PurchasedItemRow): PurchasedItemData {
  return {
    id: row.id,
    userId: row.userId,
    identifier: row.identifier,
    paymentTransactionId: row.paymentTransactionId,
    itemId: row.itemId,
    relatedObject: fromRelatedObjectColumns(row),
    price: row.price,
    quantity: row.quantity,
  };
}

export function toPaymentTransactionErrorData(
  row: PaymentTransactionErrorRow
): PaymentTransactionErrorData {
  return { ...row };
}
