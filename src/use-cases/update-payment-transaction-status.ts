import type { FastifyBaseLogger } from "fastify";
import type { z } from "zod";
import type {
  PaymentTransactionData,
  PaymentTransactionRepository,
} from "../repositories/payment-transaction-repository";
import { type Either, failure, success } from "../shared/either";
import type { IInstrumentation } from "../shared/instrumentation";
import { UseCase } from "../shared/use-case";
import {
  invalidInput,
  notFound,
  type UseCaseError,
} from "../shared/use-case-error";
import { updatePaymentTransactionStatusSchema } from "../validation/schemas";

export type UpdatePaymentTransactionStatusRequest = z.input<
  typeof updatePaymentTransactionStatusSchema
>;

export type UpdatePaymentTransactionStatusResponse = Either<
  PaymentTransactionData,
  UseCaseError
>;

export interface UpdatePaymentTransactionStatusDeps {
  paymentTransactionRepository: PaymentTransactionRepository;
  logger: FastifyBaseLogger;
}

/**
 * Applies a status reported by the gateway callback. Which transitions are
 * allowed is up to the gateway integration; any status is stored.
 */
export class UpdatePaymentTransactionStatus extends UseCase<
  UpdatePaymentTransactionStatusRequest,
  UpdatePaymentTransactionStatusResponse
> {
  serviceName = "update-payment-transaction-status";
  private readonly paymentTransactionRepository: UpdatePaymentTransactionStatusDeps["paymentTransactionRepository"];

  constructor(deps: UpdatePaymentTransactionStatusDeps) {
    super(deps.logger);
    this.paymentTransactionRepository = deps.paymentTransactionRepository;
  }

  async run(
    instrumentation: IInstrumentation,
    request: UpdatePaymentTransactionStatusRequest
  ): Promise<UpdatePaymentTransactionStatusResponse> {
    const parsed = updatePaymentTransactionStatusSchema.safeParse(request);
    if (!parsed.success) {
      return failure(invalidInput(parsed.error));
    }
    const { transactionId, status, value } = parsed.data;
    const current =
      await this.paymentTransactionRepository.getTransactionByTransactionId(
        transactionId
      );
    if (!current) {
      instrumentation.logWarning("Unknown gateway transaction", {
        transactionId,
      });
      return failure(notFound(`Transaction ${transactionId} not found`));
    }
    const updated = await this.paymentTransactionRepository.updateTransaction(
      current.id,
      { status, value }
    );
    if (!updated) {
      return failure(notFound(`Transaction ${transactionId} not found`));
    }
    instrumentation.logInfo("Payment transaction status changed", {
      paymentTransactionId: updated.id,
      transactionId,
      from: current.status,
      to: updated.status,
    });
    return success(updated);
  }
}
