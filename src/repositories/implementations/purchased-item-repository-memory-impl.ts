import type { FastifyBaseLogger } from "fastify";
import { FIELD_LIMITS } from "../../shared/field-limits";
import type {
  CreatePurchasedItemInput,
  PurchasedItemData,
  PurchasedItemQuery,
  PurchasedItemRepository,
  UpdatePurchasedItemInput,
} from "../purchased-item-repository";
import {
  cloneRecord,
  compareDatesDescending,
  compareText,
  type MemoryStore,
} from "./memory-store";

export interface PurchasedItemRepositoryMemoryImplDeps {
  store: MemoryStore;
  logger: FastifyBaseLogger;
}

export class PurchasedItemRepositoryMemoryImpl
  implements PurchasedItemRepository
{
  private readonly store: MemoryStore;
  private readonly logger: FastifyBaseLogger;

  constructor(deps: PurchasedItemRepositoryMemoryImplDeps) {
    this.store = deps.store;
    this.logger = deps.logger;
  }

  async createPurchasedItem(
    input: CreatePurchasedItemInput
  ): Promise<PurchasedItemData> {
    const purchasedItem = this.checked({
      id: 0,
      userId: input.userId,
      identifier: input.identifier ?? "",
      paymentTransactionId: input.paymentTransactionId,
      itemId: input.itemId ?? null,
      relatedObject: input.relatedObject ?? null,
      price: input.price ?? null,
      quantity: input.quantity,
    });
    purchasedItem.id = this.store.nextId("purchasedItems");
    this.store.purchasedItems.set(purchasedItem.id, purchasedItem);
    this.logger.debug(
      {
        purchasedItemId: purchasedItem.id,
        paymentTransactionId: purchasedItem.paymentTransactionId,
      },
      "Purchased item created in memory"
    );
    return cloneRecord(purchasedItem);
  }

  async getPurchasedItemById(id: number): Promise<PurchasedItemData | null> {
    const purchasedItem = this.store.purchasedItems.get(id);
    return purchasedItem ? cloneRecord(purchasedItem) : null;
  }

  async listPurchasedItems(
    query: PurchasedItemQuery = {}
  ): Promise<PurchasedItemData[]> {
    const { paymentTransactions } = this.store;
    return [...this.store.purchasedItems.values()]
      .filter(
        (purchasedItem) =>
          (query.userId === undefined ||
            purchasedItem.userId === query.userId) &&
          (query.paymentTransactionId === undefined ||
            purchasedItem.paymentTransactionId ===
              query.paymentTransactionId) &&
          (query.itemId === undefined ||
            purchasedItem.itemId === query.itemId) &&
          (query.identifier === undefined ||
            purchasedItem.identifier === query.identifier)
      )
      .map((purchasedItem) => ({
        purchasedItem,
        transaction: paymentTransactions.get(purchasedItem.paymentTransactionId),
      }))
      .sort(
        (a, b) =>
          compareDatesDescending(
            a.transaction?.date ?? null,
            b.transaction?.date ?? null
          ) ||
          compareText(
            a.transaction?.transactionId ?? "",
            b.transaction?.transactionId ?? ""
          ) ||
          a.purchasedItem.id - b.purchasedItem.id
      )
      .map(({ purchasedItem }) => cloneRecord(purchasedItem));
  }

  async updatePurchasedItem(
    id: number,
    input: UpdatePurchasedItemInput
  ): Promise<PurchasedItemData | null> {
    const current = this.store.purchasedItems.get(id);
    if (!current) {
      return null;
    }
    const updated = this.checked({
      ...current,
      identifier: input.identifier ?? current.identifier,
      itemId: input.itemId === undefined ? current.itemId : input.itemId,
      relatedObject:
        input.relatedObject === undefined
          ? current.relatedObject
          : input.relatedObject,
      price: input.price === undefined ? current.price : input.price,
      quantity: input.quantity ?? current.quantity,
    });
    this.store.purchasedItems.set(id, updated);
    this.logger.debug(
      { purchasedItemId: id },
      "Purchased item updated in memory"
    );
    return cloneRecord(updated);
  }

  async deletePurchasedItem(id: number): Promise<boolean> {
    const deleted = this.store.purchasedItems.delete(id);
    if (deleted) {
      this.logger.debug(
        { purchasedItemId: id },
        "Purchased item deleted from memory"
      );
    }
    return deleted;
  }

  private checked(purchasedItem: PurchasedItemData): PurchasedItemData {
    const { store } = this;
    store.assertUserExists(
      purchasedItem.userId,
      "purchased_items_user_id_users_id_fk"
    );
    store.assertTransactionExists(
      purchasedItem.paymentTransactionId,
      "purchased_items_transaction_id_payment_transactions_id_fk"
    );
    store.assertItemExists(
      purchasedItem.itemId,
      "purchased_items_item_id_items_id_fk"
    );
    store.assertMaxLength(
      purchasedItem.identifier,
      FIELD_LIMITS.purchasedItemIdentifier,
      "identifier"
    );
    store.assertRelatedObject(
      purchasedItem.relatedObject,
      "purchased_items_object_id_check"
    );
    store.assertQuantity(purchasedItem.quantity);
    return purchasedItem;
  }
}
