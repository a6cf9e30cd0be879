import type { FastifyBaseLogger } from "fastify";
import { FIELD_LIMITS } from "../../shared/field-limits";
import type {
  CreatePaymentTransactionErrorInput,
  PaymentTransactionErrorData,
  PaymentTransactionErrorQuery,
  PaymentTransactionErrorRepository,
} from "../payment-transaction-error-repository";
import {
  cloneRecord,
  compareDatesDescending,
  type MemoryStore,
} from "./memory-store";

export interface PaymentTransactionErrorRepositoryMemoryImplDeps {
  store: MemoryStore;
  logger: FastifyBaseLogger;
}

export class PaymentTransactionErrorRepositoryMemoryImpl
  implements PaymentTransactionErrorRepository
{
  private readonly store: MemoryStore;
  private readonly logger: FastifyBaseLogger;

  constructor(deps: PaymentTransactionErrorRepositoryMemoryImplDeps) {
    this.store = deps.store;
    this.logger = deps.logger;
  }

  async createError(
    input: CreatePaymentTransactionErrorInput
  ): Promise<PaymentTransactionErrorData> {
    const { store } = this;
    const paymentTransactionId = input.paymentTransactionId ?? null;
    const paypalApiUrl = input.paypalApiUrl ?? "";
    store.assertUserExists(
      input.userId,
      "payment_transaction_errors_user_id_users_id_fk"
    );
    store.assertTransactionExists(
      paymentTransactionId,
      "payment_transaction_errors_transaction_id_payment_transactions_id_fk"
    );
    store.assertMaxLength(
      paypalApiUrl,
      FIELD_LIMITS.paypalApiUrl,
      "paypal_api_url"
    );
    const error: PaymentTransactionErrorData = {
      id: store.nextId("paymentTransactionErrors"),
      date: store.now(),
      userId: input.userId,
      paypalApiUrl,
      requestData: input.requestData ?? "",
      response: input.response ?? "",
      paymentTransactionId,
    };
    store.paymentTransactionErrors.set(error.id, error);
    this.logger.debug(
      { paymentTransactionErrorId: error.id, paymentTransactionId },
      "Payment transaction error stored in memory"
    );
    return cloneRecord(error);
  }

  async getErrorById(id: number): Promise<PaymentTransactionErrorData | null> {
    const error = this.store.paymentTransactionErrors.get(id);
    return error ? cloneRecord(error) : null;
  }

  async listErrors(
    query: PaymentTransactionErrorQuery = {}
  ): Promise<PaymentTransactionErrorData[]> {
    return [...this.store.paymentTransactionErrors.values()]
      .filter(
        (error) =>
          (query.userId === undefined || error.userId === query.userId) &&
          (query.paymentTransactionId === undefined ||
            error.paymentTransactionId === query.paymentTransactionId)
      )
      .sort((a, b) => compareDatesDescending(a.date, b.date) || b.id - a.id)
      .map(cloneRecord);
  }
}
