export interface PaymentTransactionErrorData {
  id: number;
  date: Date;
  userId: number;
  paypalApiUrl: string;
  requestData: string;
  response: string;
  paymentTransactionId: number | null;
}

export interface CreatePaymentTransactionErrorInput {
  userId: number;
  paypalApiUrl?: string;
  requestData?: string;
  response?: string;
  paymentTransactionId?: number | null;
}

export interface PaymentTransactionErrorQuery {
  userId?: number;
  paymentTransactionId?: number;
}

/**
 * Append-only: there is no update or delete.
 */
export interface PaymentTransactionErrorRepository {
  createError(
    input: CreatePaymentTransactionErrorInput
  ): Promise<PaymentTransactionErrorData>;
  getErrorById(id: number): Promise<PaymentTransactionErrorData | null>;
  listErrors(
    query?: PaymentTransactionErrorQuery
  ): Promise<PaymentTransactionErrorData[]>;
}
