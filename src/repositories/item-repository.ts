export interface ItemData {
  id: number;
  identifier: string;
  name: string;
  description: string;
  /** Decimal string with two fractional digits, e.g. "19.90". */
  value: string;
  currency: string;
}

export interface CreateItemInput {
  identifier?: string;
  name: string;
  description: string;
  value: string;
  currency?: string;
}

export type UpdateItemInput = Partial<CreateItemInput>;

export interface ItemRepository {
  createItem(input: CreateItemInput): Promise<ItemData>;
  getItemById(id: number): Promise<ItemData | null>;
  getItemsByIds(ids: number[]): Promise<ItemData[]>;
  listItems(): Promise<ItemData[]>;
  updateItem(id: number, input: UpdateItemInput): Promise<ItemData | null>;
  /** Rejects with PROTECTED_RECORD while purchased items reference the item. */
  deleteItem(id: number): Promise<boolean>;
}
