import type { FastifyBaseLogger } from "fastify";
import { and, desc, eq, type SQL } from "drizzle-orm";
import type { DrizzleDB } from "../../db/database-manager";
import { translatePostgresError } from "../../db/postgres-error";
import { paymentTransactionErrors } from "../../db/schema";
import type {
  CreatePaymentTransactionErrorInput,
  PaymentTransactionErrorData,
  PaymentTransactionErrorQuery,
  PaymentTransactionErrorRepository,
} from "../payment-transaction-error-repository";
import { toPaymentTransactionErrorData } from "./drizzle-mappers";

export interface PaymentTransactionErrorRepositoryDrizzleImplDeps {
  db: DrizzleDB;
  logger: FastifyBaseLogger;
}

export class PaymentTransactionErrorRepositoryDrizzleImpl
  implements PaymentTransactionErrorRepository
{
  private readonly db: DrizzleDB;
  private readonly logger: FastifyBaseLogger;

  constructor(deps: PaymentTransactionErrorRepositoryDrizzleImplDeps) {
    this.db = deps.db;
    this.logger = deps.logger;
  }

  async createError(
    input: CreatePaymentTransactionErrorInput
  ): Promise<PaymentTransactionErrorData> {
    try {
      const [row] = await this.db
        .insert(paymentTransactionErrors)
        .values({
          userId: input.userId,
          paypalApiUrl: input.paypalApiUrl,
          requestData: input.requestData,
          response: input.response,
          paymentTransactionId: input.paymentTransactionId ?? null,
        })
        .returning();
      this.logger.info(
        {
          paymentTransactionErrorId: row.id,
          paymentTransactionId: row.paymentTransactionId,
          paypalApiUrl: row.paypalApiUrl,
        },
        "Payment transaction error recorded"
      );
      return toPaymentTransactionErrorData(row);
    } catch (error) {
      this.logger.error(
        { error, userId: input.userId },
        "Failed to record payment transaction error"
      );
      throw translatePostgresError(error, "write");
    }
  }

  async getErrorById(id: number): Promise<PaymentTransactionErrorData | null> {
    try {
      const result = await this.db
        .select()
        .from(paymentTransactionErrors)
        .where(eq(paymentTransactionErrors.id, id))
        .limit(1);
      return result[0] ? toPaymentTransactionErrorData(result[0]) : null;
    } catch (error) {
      this.logger.error(
        { error, paymentTransactionErrorId: id },
        "Failed to get payment transaction error by ID"
      );
      throw error;
    }
  }

  async listErrors(
    query: PaymentTransactionErrorQuery = {}
  ): Promise<PaymentTransactionErrorData[]> {
    try {
      const conditions: SQL[] = [];
      if (query.userId !== undefined) {
        conditions.push(eq(paymentTransactionErrors.userId, query.userId));
      }
      if (query.paymentTransactionId !== undefined) {
        conditions.push(
          eq(
            paymentTransactionErrors.paymentTransactionId,
            query.paymentTransactionId
          )
        );
      }
      const rows = await this.db
        .select()
        .from(paymentTransactionErrors)
        .where(and(...conditions))
        .orderBy(
          desc(paymentTransactionErrors.date),
          desc(paymentTransactionErrors.id)
        );
      return rows.map(toPaymentTransactionErrorData);
    } catch (error) {
      this.logger.error(
        { error, query },
        "Failed to list payment transaction errors"
      );
      throw error;
    }
  }
}
