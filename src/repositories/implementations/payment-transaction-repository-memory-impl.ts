import type { FastifyBaseLogger } from "fastify";
import { ErrorCode, RepositoryException } from "../../shared/errors";
import { FIELD_LIMITS } from "../../shared/field-limits";
import type {
  CreatePaymentTransactionInput,
  PaymentTransactionData,
  PaymentTransactionQuery,
  PaymentTransactionRepository,
  UpdatePaymentTransactionInput,
} from "../payment-transaction-repository";
import type { PurchasedItemData } from "../purchased-item-repository";
import {
  cloneRecord,
  compareDatesDescending,
  compareText,
  type MemoryStore,
} from "./memory-store";

export interface PaymentTransactionRepositoryMemoryImplDeps {
  store: MemoryStore;
  logger: FastifyBaseLogger;
}

export function comparePaymentTransactions(
  a: PaymentTransactionData,
  b: PaymentTransactionData
): number {
  return (
    compareDatesDescending(a.creationDate, b.creationDate) ||
    compareText(a.transactionId, b.transactionId) ||
    a.id - b.id
  );
}

export class PaymentTransactionRepositoryMemoryImpl
  implements PaymentTransactionRepository
{
  private readonly store: MemoryStore;
  private readonly logger: FastifyBaseLogger;

  constructor(deps: PaymentTransactionRepositoryMemoryImplDeps) {
    this.store = deps.store;
    this.logger = deps.logger;
  }

  async createTransaction(
    input: CreatePaymentTransactionInput
  ): Promise<PaymentTransactionData> {
    const { store } = this;
    store.assertUserExists(
      input.userId,
      "payment_transactions_user_id_users_id_fk"
    );
    const now = store.now();
    const transaction = this.checked({
      id: store.nextId("paymentTransactions"),
      userId: input.userId,
      relatedObject: input.relatedObject ?? null,
      creationDate: now,
      date: now,
      transactionId: input.transactionId,
      value: input.value,
      status: input.status,
    });
    // Every line is checked before anything is written.
    const lines = (input.purchasedItems ?? []).map((line) => {
      const purchasedItem: PurchasedItemData = {
        id: 0,
        userId: input.userId,
        identifier: line.identifier ?? "",
        paymentTransactionId: transaction.id,
        itemId: line.itemId ?? null,
        relatedObject: line.relatedObject ?? null,
        price: line.price ?? null,
        quantity: line.quantity,
      };
      store.assertMaxLength(
        purchasedItem.identifier,
        FIELD_LIMITS.purchasedItemIdentifier,
        "identifier"
      );
      store.assertItemExists(
        purchasedItem.itemId,
        "purchased_items_item_id_items_id_fk"
      );
      store.assertRelatedObject(
        purchasedItem.relatedObject,
        "purchased_items_object_id_check"
      );
      store.assertQuantity(purchasedItem.quantity);
      return purchasedItem;
    });
    store.paymentTransactions.set(transaction.id, transaction);
    for (const line of lines) {
      const purchasedItem = { ...line, id: store.nextId("purchasedItems") };
      store.purchasedItems.set(purchasedItem.id, purchasedItem);
    }
    this.logger.debug(
      {
        paymentTransactionId: transaction.id,
        transactionId: transaction.transactionId,
        purchasedItems: lines.length,
      },
      "Payment transaction created in memory"
    );
    return cloneRecord(transaction);
  }

  async getTransactionById(id: number): Promise<PaymentTransactionData | null> {
    const transaction = this.store.paymentTransactions.get(id);
    return transaction ? cloneRecord(transaction) : null;
  }

  async getTransactionByTransactionId(
    transactionId: string
  ): Promise<PaymentTransactionData | null> {
    const [match] = [...this.store.paymentTransactions.values()]
      .filter((candidate) => candidate.transactionId === transactionId)
      .sort(comparePaymentTransactions);
    return match ? cloneRecord(match) : null;
  }

  async listTransactions(
    query: PaymentTransactionQuery = {}
  ): Promise<PaymentTransactionData[]> {
    return [...this.store.paymentTransactions.values()]
      .filter(
        (transaction) =>
          (query.userId === undefined || transaction.userId === query.userId) &&
          (query.status === undefined || transaction.status === query.status)
      )
      .sort(comparePaymentTransactions)
      .map(cloneRecord);
  }

  async updateTransaction(
    id: number,
    input: UpdatePaymentTransactionInput
  ): Promise<PaymentTransactionData | null> {
    const current = this.store.paymentTransactions.get(id);
    if (!current) {
      return null;
    }
    const updated = this.checked({
      ...current,
      relatedObject:
        input.relatedObject === undefined
          ? current.relatedObject
          : input.relatedObject,
      transactionId: input.transactionId ?? current.transactionId,
      value: input.value ?? current.value,
      status: input.status ?? current.status,
      date: this.store.now(),
    });
    this.store.paymentTransactions.set(id, updated);
    this.logger.debug(
      { paymentTransactionId: id, status: updated.status },
      "Payment transaction updated in memory"
    );
    return cloneRecord(updated);
  }

  async deleteTransaction(id: number): Promise<boolean> {
    if (!this.store.paymentTransactions.has(id)) {
      return false;
    }
    const constraint = this.store.findTransactionReference(id);
    if (constraint) {
      throw new RepositoryException(ErrorCode.PROTECTED_RECORD, constraint);
    }
    this.store.paymentTransactions.delete(id);
    this.logger.debug(
      { paymentTransactionId: id },
      "Payment transaction deleted from memory"
    );
    return true;
  }

  private checked(transaction: PaymentTransactionData): PaymentTransactionData {
    const { store } = this;
    store.assertMaxLength(
      transaction.transactionId,
      FIELD_LIMITS.transactionId,
      "transaction_id"
    );
    store.assertRelatedObject(
      transaction.relatedObject,
      "payment_transactions_object_id_check"
    );
    return { ...transaction, value: store.toMoney(transaction.value, "value") };
  }
}
