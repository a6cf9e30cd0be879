import type { FastifyBaseLogger } from "fastify";
import type { PaymentTransactionRepository } from "../repositories/payment-transaction-repository";
import { type Either, failure, success } from "../shared/either";
import { ErrorCode, isRepositoryException } from "../shared/errors";
import type { IInstrumentation } from "../shared/instrumentation";
import { UseCase } from "../shared/use-case";
import {
  invalidInput,
  notFound,
  protectedRecord,
  type UseCaseError,
} from "../shared/use-case-error";
import { recordIdSchema } from "../validation/schemas";

export interface DeletePaymentTransactionRequest {
  id: number;
}

export type DeletePaymentTransactionResponse = Either<
  { id: number },
  UseCaseError
>;

export interface DeletePaymentTransactionDeps {
  paymentTransactionRepository: PaymentTransactionRepository;
  logger: FastifyBaseLogger;
}

export class DeletePaymentTransaction extends UseCase<
  DeletePaymentTransactionRequest,
  DeletePaymentTransactionResponse
> {
  serviceName = "delete-payment-transaction";
  private readonly paymentTransactionRepository: DeletePaymentTransactionDeps["paymentTransactionRepository"];

  constructor(deps: DeletePaymentTransactionDeps) {
    super(deps.logger);
    this.paymentTransactionRepository = deps.paymentTransactionRepository;
  }

  async run(
    instrumentation: IInstrumentation,
    request: DeletePaymentTransactionRequest
  ): Promise<DeletePaymentTransactionResponse> {
    const parsed = recordIdSchema.safeParse(request);
    if (!parsed.success) {
      return failure(invalidInput(parsed.error));
    }
    const { id } = parsed.data;
    try {
      const deleted = await this.paymentTransactionRepository.deleteTransaction(
        id
      );
      if (!deleted) {
        return failure(notFound(`Payment transaction ${id} not found`));
      }
    } catch (error) {
      if (isRepositoryException(error, ErrorCode.PROTECTED_RECORD)) {
        instrumentation.logWarning("Payment transaction has dependent rows", {
          paymentTransactionId: id,
          constraint: error.detail,
        });
        return failure(
          protectedRecord(
            `Payment transaction ${id} is referenced by purchased items or error records`
          )
        );
      }
      throw error;
    }
    instrumentation.logDebug("Payment transaction deleted", {
      paymentTransactionId: id,
    });
    return success({ id });
  }
}
