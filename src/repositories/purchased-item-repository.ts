import type { RelatedObjectRef } from "../shared/related-object";

export interface PurchasedItemData {
  id: number;
  userId: number;
  identifier: string;
  paymentTransactionId: number;
  itemId: number | null;
  relatedObject: RelatedObjectRef | null;
  price: number | null;
  quantity: number;
}

export interface CreatePurchasedItemInput {
  userId: number;
  identifier?: string;
  paymentTransactionId: number;
  itemId?: number | null;
  relatedObject?: RelatedObjectRef | null;
  price?: number | null;
  quantity: number;
}

export type UpdatePurchasedItemInput = Partial<
  Pick<
    CreatePurchasedItemInput,
    "identifier" | "itemId" | "relatedObject" | "price" | "quantity"
  >
>;

export interface PurchasedItemQuery {
  userId?: number;
  paymentTransactionId?: number;
  itemId?: number;
  identifier?: string;
}

/**
 * Lists are ordered by the parent transaction's date (newest first), then
 * its gateway transaction id.
 */
export interface PurchasedItemRepository {
  createPurchasedItem(input: CreatePurchasedItemInput): Promise<PurchasedItemData>;
  getPurchasedItemById(id: number): Promise<PurchasedItemData | null>;
  listPurchasedItems(query?: PurchasedItemQuery): Promise<PurchasedItemData[]>;
  updatePurchasedItem(
    id: number,
    input: UpdatePurchasedItemInput
  ): Promise<PurchasedItemData | null>;
  deletePurchasedItem(id: number): Promise<boolean>;
}
