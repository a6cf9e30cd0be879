import type { FastifyBaseLogger } from "fastify";
import type { z } from "zod";
import type {
  PaymentTransactionErrorData,
  PaymentTransactionErrorRepository,
} from "../repositories/payment-transaction-error-repository";
import { type Either, failure, success } from "../shared/either";
import { ErrorCode, isRepositoryException } from "../shared/errors";
import type { IInstrumentation } from "../shared/instrumentation";
import { UseCase } from "../shared/use-case";
import {
  invalidInput,
  notFound,
  type UseCaseError,
} from "../shared/use-case-error";
import { logPaymentTransactionErrorSchema } from "../validation/schemas";

export type LogPaymentTransactionErrorRequest = z.input<
  typeof logPaymentTransactionErrorSchema
>;

export type LogPaymentTransactionErrorResponse = Either<
  PaymentTransactionErrorData,
  UseCaseError
>;

export interface LogPaymentTransactionErrorDeps {
  paymentTransactionErrorRepository: PaymentTransactionErrorRepository;
  logger: FastifyBaseLogger;
}

export class LogPaymentTransactionError extends UseCase<
  LogPaymentTransactionErrorRequest,
  LogPaymentTransactionErrorResponse
> {
  serviceName = "log-payment-transaction-error";
  private readonly paymentTransactionErrorRepository: LogPaymentTransactionErrorDeps["paymentTransactionErrorRepository"];

  constructor(deps: LogPaymentTransactionErrorDeps) {
    super(deps.logger);
    this.paymentTransactionErrorRepository =
      deps.paymentTransactionErrorRepository;
  }

  async run(
    instrumentation: IInstrumentation,
    request: LogPaymentTransactionErrorRequest
  ): Promise<LogPaymentTransactionErrorResponse> {
    const parsed = logPaymentTransactionErrorSchema.safeParse(request);
    if (!parsed.success) {
      return failure(invalidInput(parsed.error));
    }
    try {
      const record = await this.paymentTransactionErrorRepository.createError(
        parsed.data
      );
      instrumentation.logWarning("Gateway call failure recorded", {
        paymentTransactionErrorId: record.id,
        paymentTransactionId: record.paymentTransactionId,
        paypalApiUrl: record.paypalApiUrl,
      });
      return success(record);
    } catch (error) {
      if (isRepositoryException(error, ErrorCode.REFERENCED_RECORD_NOT_FOUND)) {
        return failure(notFound(error.message));
      }
      throw error;
    }
  }
}
