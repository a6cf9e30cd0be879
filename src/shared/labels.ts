import type { ItemData } from "../repositories/item-repository";
import type { PaymentTransactionData } from "../repositories/payment-transaction-repository";
import type { PurchasedItemData } from "../repositories/purchased-item-repository";
import { formatRelatedObject } from "./related-object";

export function formatItemLabel(item: ItemData): string {
  return `${item.name} - ${item.value} ${item.currency}`;
}

export function formatTransactionLabel(
  transaction: PaymentTransactionData
): string {
  return transaction.transactionId;
}

export function formatPurchasedItemLabel(context: {
  purchasedItem: PurchasedItemData;
  item: ItemData | null;
  userEmail: string;
  transaction: PaymentTransactionData;
}): string {
  const { purchasedItem, item, userEmail, transaction } = context;
  let subject = "no item";
  if (item) {
    subject = formatItemLabel(item);
  } else if (purchasedItem.relatedObject) {
    subject = formatRelatedObject(purchasedItem.relatedObject);
  }
  return `${purchasedItem.quantity} ${subject} of ${userEmail} [${formatTransactionLabel(transaction)}]`;
}
