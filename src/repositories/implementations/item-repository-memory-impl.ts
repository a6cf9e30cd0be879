import type { FastifyBaseLogger } from "fastify";
import { ErrorCode, RepositoryException } from "../../shared/errors";
import { FIELD_LIMITS } from "../../shared/field-limits";
import type {
  CreateItemInput,
  ItemData,
  ItemRepository,
  UpdateItemInput,
} from "../item-repository";
import { cloneRecord, type MemoryStore } from "./memory-store";

export interface ItemRepositoryMemoryImplDeps {
  store: MemoryStore;
  logger: FastifyBaseLogger;
}

export class ItemRepositoryMemoryImpl implements ItemRepository {
  private readonly store: MemoryStore;
  private readonly logger: FastifyBaseLogger;

  constructor(deps: ItemRepositoryMemoryImplDeps) {
    this.store = deps.store;
    this.logger = deps.logger;
  }

  async createItem(input: CreateItemInput): Promise<ItemData> {
    const item = this.checked({
      id: this.store.nextId("items"),
      identifier: input.identifier ?? "",
      name: input.name,
      description: input.description,
      value: input.value,
      currency: input.currency ?? "USD",
    });
    this.store.items.set(item.id, item);
    this.logger.debug({ itemId: item.id }, "Item created in memory");
    return cloneRecord(item);
  }

  async getItemById(id: number): Promise<ItemData | null> {
    const item = this.store.items.get(id);
    return item ? cloneRecord(item) : null;
  }

  async getItemsByIds(ids: number[]): Promise<ItemData[]> {
    return this.sorted(
      [...this.store.items.values()].filter((item) => ids.includes(item.id))
    );
  }

  async listItems(): Promise<ItemData[]> {
    return this.sorted([...this.store.items.values()]);
  }

  async updateItem(id: number, input: UpdateItemInput): Promise<ItemData | null> {
    const current = this.store.items.get(id);
    if (!current) {
      return null;
    }
    const updated = this.checked({
      id,
      identifier: input.identifier ?? current.identifier,
      name: input.name ?? current.name,
      description: input.description ?? current.description,
      value: input.value ?? current.value,
      currency: input.currency ?? current.currency,
    });
    this.store.items.set(id, updated);
    this.logger.debug({ itemId: id }, "Item updated in memory");
    return cloneRecord(updated);
  }

  async deleteItem(id: number): Promise<boolean> {
    if (!this.store.items.has(id)) {
      return false;
    }
    if (this.store.isItemReferenced(id)) {
      throw new RepositoryException(
        ErrorCode.PROTECTED_RECORD,
        "purchased_items_item_id_items_id_fk"
      );
    }
    this.store.items.delete(id);
    this.logger.debug({ itemId: id }, "Item deleted from memory");
    return true;
  }

  private checked(item: ItemData): ItemData {
    const { store } = this;
    store.assertMaxLength(item.identifier, FIELD_LIMITS.itemIdentifier, "identifier");
    store.assertMaxLength(item.name, FIELD_LIMITS.itemName, "name");
    store.assertMaxLength(item.description, FIELD_LIMITS.itemDescription, "description");
    store.assertMaxLength(item.currency, FIELD_LIMITS.currency, "currency");
    return { ...item, value: store.toMoney(item.value, "value") };
  }

  private sorted(items: ItemData[]): ItemData[] {
    return items.sort((a, b) => a.id - b.id).map(cloneRecord);
  }
}
