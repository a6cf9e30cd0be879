import type { FastifyBaseLogger } from "fastify";
import { asc, eq, inArray } from "drizzle-orm";
import type { DrizzleDB } from "../../db/database-manager";
import { translatePostgresError } from "../../db/postgres-error";
import { items } from "../../db/schema";
import type {
  CreateItemInput,
  ItemData,
  ItemRepository,
  UpdateItemInput,
} from "../item-repository";

export interface ItemRepositoryDrizzleImplDeps {
  db: DrizzleDB;
  logger: FastifyBaseLogger;
}

export class ItemRepositoryDrizzleImpl implements ItemRepository {
  private readonly db: DrizzleDB;
  private readonly logger: FastifyBaseLogger;

  constructor(deps: ItemRepositoryDrizzleImplDeps) {
    this.db = deps.db;
    this.logger = deps.logger;
  }

  async createItem(input: CreateItemInput): Promise<ItemData> {
    try {
      const [item] = await this.db
        .insert(items)
        .values({
          identifier: input.identifier,
          name: input.name,
          description: input.description,
          value: input.value,
          currency: input.currency,
        })
        .returning();
      this.logger.info(
        { itemId: item.id, value: item.value, currency: item.currency },
        "Item record created"
      );
      return item;
    } catch (error) {
      this.logger.error({ error, name: input.name }, "Failed to create item");
      throw translatePostgresError(error, "write");
    }
  }

  async getItemById(id: number): Promise<ItemData | null> {
    try {
      const result = await this.db
        .select()
        .from(items)
        .where(eq(items.id, id))
        .limit(1);
      return result[0] ?? null;
    } catch (error) {
      this.logger.error({ error, itemId: id }, "Failed to get item by ID");
      throw error;
    }
  }

  async getItemsByIds(ids: number[]): Promise<ItemData[]> {
    if (ids.length === 0) {
      return [];
    }
    try {
      return await this.db
        .select()
        .from(items)
        .where(inArray(items.id, ids))
        .orderBy(asc(items.id));
    } catch (error) {
      this.logger.error({ error, itemIds: ids }, "Failed to get items by IDs");
      throw error;
    }
  }

  async listItems(): Promise<ItemData[]> {
    try {
      return await this.db.select().from(items).orderBy(asc(items.id));
    } catch (error) {
      this.logger.error({ error }, "Failed to list items");
      throw error;
    }
  }

  async updateItem(id: number, input: UpdateItemInput): Promise<ItemData | null> {
    const patch: Partial<typeof items.$inferInsert> = {
      identifier: input.identifier,
      name: input.name,
      description: input.description,
      value: input.value,
      currency: input.currency,
    };
    if (Object.values(patch).every((value) => value === undefined)) {
      return this.getItemById(id);
    }
    try {
      const result = await this.db
        .update(items)
        .set(patch)
        .where(eq(items.id, id))
        .returning();
      const updated = result[0] ?? null;
      if (updated) {
        this.logger.info({ itemId: id }, "Item record updated");
      }
      return updated;
    } catch (error) {
      this.logger.error({ error, itemId: id }, "Failed to update item");
      throw translatePostgresError(error, "write");
    }
  }

  async deleteItem(id: number): Promise<boolean> {
    try {
      const result = await this.db
        .delete(items)
        .where(eq(items.id, id))
        .returning({ id: items.id });
      const deleted = result.length > 0;
      if (deleted) {
        this.logger.info({ itemId: id }, "Item record deleted");
      }
      return deleted;
    } catch (error) {
      this.logger.error({ error, itemId: id }, "Failed to delete item");
      throw translatePostgresError(error, "delete");
    }
  }
}
