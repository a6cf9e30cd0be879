import type { PaymentStatus } from "../shared/payment-status";
import type { RelatedObjectRef } from "../shared/related-object";

export interface PaymentTransactionData {
  id: number;
  userId: number;
  relatedObject: RelatedObjectRef | null;
  creationDate: Date | null;
  date: Date;
  /** Identifier issued by the gateway. */
  transactionId: string;
  value: string;
  status: PaymentStatus;
}

export interface PurchasedItemLine {
  identifier?: string;
  itemId?: number | null;
  relatedObject?: RelatedObjectRef | null;
  price?: number | null;
  quantity: number;
}

export interface CreatePaymentTransactionInput {
  userId: number;
  relatedObject?: RelatedObjectRef | null;
  transactionId: string;
  value: string;
  status: PaymentStatus;
  /** Inserted in the same database transaction, owned by the same user. */
  purchasedItems?: PurchasedItemLine[];
}

// No creationDate: it is fixed at insert time.
export interface UpdatePaymentTransactionInput {
  relatedObject?: RelatedObjectRef | null;
  transactionId?: string;
  value?: string;
  status?: PaymentStatus;
}

export interface PaymentTransactionQuery {
  userId?: number;
  status?: PaymentStatus;
}

/**
 * Lists are ordered by creation date (newest first), then gateway
 * transaction id.
 */
export interface PaymentTransactionRepository {
  createTransaction(
    input: CreatePaymentTransactionInput
  ): Promise<PaymentTransactionData>;
  getTransactionById(id: number): Promise<PaymentTransactionData | null>;
  getTransactionByTransactionId(
    transactionId: string
  ): Promise<PaymentTransactionData | null>;
  listTransactions(
    query?: PaymentTransactionQuery
  ): Promise<PaymentTransactionData[]>;
  updateTransaction(
    id: number,
    input: UpdatePaymentTransactionInput
  ): Promise<PaymentTransactionData | null>;
  deleteTransaction(id: number): Promise<boolean>;
}
