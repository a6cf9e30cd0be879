import type { FastifyBaseLogger } from "fastify";
import { and, asc, desc, eq, type SQL } from "drizzle-orm";
import type { DrizzleDB } from "../../db/database-manager";
import { ascByCodePoint } from "../../db/ordering";
import { translatePostgresError } from "../../db/postgres-error";
import { paymentTransactions, purchasedItems } from "../../db/schema";
import { toRelatedObjectColumns } from "../../shared/related-object";
import type {
  CreatePurchasedItemInput,
  PurchasedItemData,
  PurchasedItemQuery,
  PurchasedItemRepository,
  UpdatePurchasedItemInput,
} from "../purchased-item-repository";
import { toPurchasedItemData } from "./drizzle-mappers";

export interface PurchasedItemRepositoryDrizzleImplDeps {
  db: DrizzleDB;
  logger: FastifyBaseLogger;
}

export class PurchasedItemRepositoryDrizzleImpl
  implements PurchasedItemRepository
{
  private readonly db: DrizzleDB;
  private readonly logger: FastifyBaseLogger;

  constructor(deps: PurchasedItemRepositoryDrizzleImplDeps) {
    this.db = deps.db;
    this.logger = deps.logger;
  }

  async createPurchasedItem(
    input: CreatePurchasedItemInput
  ): Promise<PurchasedItemData> {
    try {
      const [row] = await this.db
        .insert(purchasedItems)
        .values({
          userId: input.userId,
          identifier: input.identifier,
          paymentTransactionId: input.paymentTransactionId,
          itemId: input.itemId ?? null,
          ...toRelatedObjectColumns(input.relatedObject),
          price: input.price ?? null,
          quantity: input.quantity,
        })
        .returning();
      this.logger.info(
        {
          purchasedItemId: row.id,
          paymentTransactionId: row.paymentTransactionId,
          quantity: row.quantity,
        },
        "Purchased item record created"
      );
      return toPurchasedItemData(row);
    } catch (error) {
      this.logger.error(
        { error, paymentTransactionId: input.paymentTransactionId },
        "Failed to create purchased item record"
      );
      throw translatePostgresError(error, "write");
    }
  }

  async getPurchasedItemById(id: number): Promise<PurchasedItemData | null> {
    try {
      const result = await this.db
        .select()
        .from(purchasedItems)
        .where(eq(purchasedItems.id, id))
        .limit(1);
      return result[0] ? toPurchasedItemData(result[0]) : null;
    } catch (error) {
      this.logger.error(
        { error, purchasedItemId: id },
        "Failed to get purchased item by ID"
      );
      throw error;
    }
  }

  async listPurchasedItems(
    query: PurchasedItemQuery = {}
  ): Promise<PurchasedItemData[]> {
    try {
      const conditions: SQL[] = [];
      if (query.userId !== undefined) {
        conditions.push(eq(purchasedItems.userId, query.userId));
      }
      if (query.paymentTransactionId !== undefined) {
        conditions.push(
          eq(purchasedItems.paymentTransactionId, query.paymentTransactionId)
        );
      }
      if (query.itemId !== undefined) {
        conditions.push(eq(purchasedItems.itemId, query.itemId));
      }
      if (query.identifier !== undefined) {
        conditions.push(eq(purchasedItems.identifier, query.identifier));
      }
      // Ordered through the parent transaction.
      const rows = await this.db
        .select({ purchasedItem: purchasedItems })
        .from(purchasedItems)
        .innerJoin(
          paymentTransactions,
          eq(purchasedItems.paymentTransactionId, paymentTransactions.id)
        )
        .where(and(...conditions))
        .orderBy(
          desc(paymentTransactions.date),
          ascByCodePoint(paymentTransactions.transactionId),
          asc(purchasedItems.id)
        );
      return rows.map(({ purchasedItem }) => toPurchasedItemData(purchasedItem));
    } catch (error) {
      this.logger.error({ error, query }, "Failed to list purchased items");
      throw error;
    }
  }

  async updatePurchasedItem(
    id: number,
    input: UpdatePurchasedItemInput
  ): Promise<PurchasedItemData | null> {
    const patch: Partial<typeof purchasedItems.$inferInsert> = {
      identifier: input.identifier,
      itemId: input.itemId,
      price: input.price,
      quantity: input.quantity,
      ...(input.relatedObject === undefined
        ? {}
        : toRelatedObjectColumns(input.relatedObject)),
    };
    if (Object.values(patch).every((value) => value === undefined)) {
      return this.getPurchasedItemById(id);
    }
    try {
      const result = await this.db
        .update(purchasedItems)
        .set(patch)
        .where(eq(purchasedItems.id, id))
        .returning();
      const updated = result[0] ? toPurchasedItemData(result[0]) : null;
      if (updated) {
        this.logger.info({ purchasedItemId: id }, "Purchased item record updated");
      }
      return updated;
    } catch (error) {
      this.logger.error(
        { error, purchasedItemId: id },
        "Failed to update purchased item record"
      );
      throw translatePostgresError(error, "write");
    }
  }

  async deletePurchasedItem(id: number): Promise<boolean> {
    try {
      const result = await this.db
        .delete(purchasedItems)
        .where(eq(purchasedItems.id, id))
        .returning({ id: purchasedItems.id });
      const deleted = result.length > 0;
      if (deleted) {
        this.logger.info({ purchasedItemId: id }, "Purchased item record deleted");
      }
      return deleted;
    } catch (error) {
      this.logger.error(
        { error, purchasedItemId: id },
        "Failed to delete purchased item record"
      );
      throw translatePostgresError(error, "delete");
    }
  }
}
