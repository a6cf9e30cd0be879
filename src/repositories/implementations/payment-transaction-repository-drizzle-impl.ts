import type { FastifyBaseLogger } from "fastify";
import { and, asc, desc, eq, type SQL } from "drizzle-orm";
import type { DrizzleDB } from "../../db/database-manager";
import { ascByCodePoint } from "../../db/ordering";
import { translatePostgresError } from "../../db/postgres-error";
import { paymentTransactions, purchasedItems } from "../../db/schema";
import { toRelatedObjectColumns } from "../../shared/related-object";
import type {
  CreatePaymentTransactionInput,
  PaymentTransactionData,
  PaymentTransactionQuery,
  PaymentTransactionRepository,
  UpdatePaymentTransactionInput,
} from "../payment-transaction-repository";
import { toPaymentTransactionData } from "./drizzle-mappers";

export interface PaymentTransactionRepositoryDrizzleImplDeps {
  db: DrizzleDB;
  logger: FastifyBaseLogger;
}

export class PaymentTransactionRepositoryDrizzleImpl
  implements PaymentTransactionRepository
{
  private readonly db: DrizzleDB;
  private readonly logger: FastifyBaseLogger;

  constructor(deps: PaymentTransactionRepositoryDrizzleImplDeps) {
    this.db = deps.db;
    this.logger = deps.logger;
  }

  async createTransaction(
    input: CreatePaymentTransactionInput
  ): Promise<PaymentTransactionData> {
    const lines = input.purchasedItems ?? [];
    try {
      const row = await this.db.transaction(async (tx) => {
        const [created] = await tx
          .insert(paymentTransactions)
          .values({
            userId: input.userId,
            ...toRelatedObjectColumns(input.relatedObject),
            transactionId: input.transactionId,
            value: input.value,
            status: input.status,
          })
          .returning();
        if (lines.length > 0) {
          await tx.insert(purchasedItems).values(
            lines.map((line) => ({
              userId: input.userId,
              identifier: line.identifier,
              paymentTransactionId: created.id,
              itemId: line.itemId ?? null,
              ...toRelatedObjectColumns(line.relatedObject),
              price: line.price ?? null,
              quantity: line.quantity,
            }))
          );
        }
        return created;
      });
      this.logger.info(
        {
          paymentTransactionId: row.id,
          transactionId: row.transactionId,
          status: row.status,
          purchasedItems: lines.length,
        },
        "Payment transaction record created"
      );
      return toPaymentTransactionData(row);
    } catch (error) {
      this.logger.error(
        { error, transactionId: input.transactionId },
        "Failed to create payment transaction record"
      );
      throw translatePostgresError(error, "write");
    }
  }

  async getTransactionById(id: number): Promise<PaymentTransactionData | null> {
    try {
      const result = await this.db
        .select()
        .from(paymentTransactions)
        .where(eq(paymentTransactions.id, id))
        .limit(1);
      return result[0] ? toPaymentTransactionData(result[0]) : null;
    } catch (error) {
      this.logger.error(
        { error, paymentTransactionId: id },
        "Failed to get payment transaction by ID"
      );
      throw error;
    }
  }

  async getTransactionByTransactionId(
    transactionId: string
  ): Promise<PaymentTransactionData | null> {
    try {
      const result = await this.db
        .select()
        .from(paymentTransactions)
        .where(eq(paymentTransactions.transactionId, transactionId))
        .orderBy(...this.defaultOrdering())
        .limit(1);
      return result[0] ? toPaymentTransactionData(result[0]) : null;
    } catch (error) {
      this.logger.error(
        { error, transactionId },
        "Failed to get payment transaction by gateway ID"
      );
      throw error;
    }
  }

  async listTransactions(
    query: PaymentTransactionQuery = {}
  ): Promise<PaymentTransactionData[]> {
    try {
      const conditions: SQL[] = [];
      if (query.userId !== undefined) {
        conditions.push(eq(paymentTransactions.userId, query.userId));
      }
      if (query.status !== undefined) {
        conditions.push(eq(paymentTransactions.status, query.status));
      }
      const rows = await this.db
        .select()
        .from(paymentTransactions)
        .where(and(...conditions))
        .orderBy(...this.defaultOrdering());
      return rows.map(toPaymentTransactionData);
    } catch (error) {
      this.logger.error(
        { error, query },
        "Failed to list payment transactions"
      );
      throw error;
    }
  }

  async updateTransaction(
    id: number,
    input: UpdatePaymentTransactionInput
  ): Promise<PaymentTransactionData | null> {
    // `date` is refreshed by $onUpdate; creation_date is never set here.
    const patch: Partial<typeof paymentTransactions.$inferInsert> = {
      transactionId: input.transactionId,
      value: input.value,
      status: input.status,
      ...(input.relatedObject === undefined
        ? {}
        : toRelatedObjectColumns(input.relatedObject)),
    };
    try {
      const result = await this.db
        .update(paymentTransactions)
        .set(patch)
        .where(eq(paymentTransactions.id, id))
        .returning();
      const updated = result[0] ? toPaymentTransactionData(result[0]) : null;
      if (updated) {
        this.logger.info(
          { paymentTransactionId: id, status: updated.status },
          "Payment transaction record updated"
        );
      }
      return updated;
    } catch (error) {
      this.logger.error(
        { error, paymentTransactionId: id },
        "Failed to update payment transaction record"
      );
      throw translatePostgresError(error, "write");
    }
  }

  async deleteTransaction(id: number): Promise<boolean> {
    try {
      const result = await this.db
        .delete(paymentTransactions)
        .where(eq(paymentTransactions.id, id))
        .returning({ id: paymentTransactions.id });
      const deleted = result.length > 0;
      if (deleted) {
        this.logger.info(
          { paymentTransactionId: id },
          "Payment transaction record deleted"
        );
      }
      return deleted;
    } catch (error) {
      this.logger.error(
        { error, paymentTransactionId: id },
        "Failed to delete payment transaction record"
      );
      throw translatePostgresError(error, "delete");
    }
  }

  private defaultOrdering(): SQL[] {
    return [
      desc(paymentTransactions.creationDate),
      ascByCodePoint(paymentTransactions.transactionId),
      asc(paymentTransactions.id),
    ];
  }
}
