import { Cents } from "../../shared/cents";
import { ErrorCode, RepositoryException } from "../../shared/errors";
import { FIELD_LIMITS } from "../../shared/field-limits";
import type { RelatedObjectRef } from "../../shared/related-object";
import type { ItemData } from "../item-repository";
import type { PaymentTransactionErrorData } from "../payment-transaction-error-repository";
import type { PaymentTransactionData } from "../payment-transaction-repository";
import type { PurchasedItemData } from "../purchased-item-repository";
import type { UserData } from "../user-repository";

type MemoryTable =
  | "users"
  | "items"
  | "paymentTransactions"
  | "purchasedItems"
  | "paymentTransactionErrors";

export interface MemoryStoreOptions {
  now?: () => Date;
}

/**
 * Process-local tables shared by the in-memory repositories. Applies the
 * same foreign keys, restrict-on-delete rules and check constraints as the
 * Postgres schema.
 */
export class MemoryStore {
  readonly users = new Map<number, UserData>();
  readonly items = new Map<number, ItemData>();
  readonly paymentTransactions = new Map<number, PaymentTransactionData>();
  readonly purchasedItems = new Map<number, PurchasedItemData>();
  readonly paymentTransactionErrors = new Map<
    number,
    PaymentTransactionErrorData
  >();
  readonly now: () => Date;
  private readonly sequences: Record<MemoryTable, number> = {
    users: 0,
    items: 0,
    paymentTransactions: 0,
    purchasedItems: 0,
    paymentTransactionErrors: 0,
  };

  constructor(options: MemoryStoreOptions = {}) {
    this.now = options.now ?? (() => new Date());
  }

  nextId(table: MemoryTable): number {
    this.sequences[table] += 1;
    return this.sequences[table];
  }

  assertUserExists(userId: number, constraint: string): void {
    this.assertInteger(userId, "user_id");
    if (!this.users.has(userId)) {
      throw new RepositoryException(
        ErrorCode.REFERENCED_RECORD_NOT_FOUND,
        constraint
      );
    }
  }

  assertItemExists(itemId: number | null, constraint: string): void {
    if (itemId === null) {
      return;
    }
    this.assertInteger(itemId, "item_id");
    if (!this.items.has(itemId)) {
      throw new RepositoryException(
        ErrorCode.REFERENCED_RECORD_NOT_FOUND,
        constraint
      );
    }
  }

  assertTransactionExists(
    paymentTransactionId: number | null,
    constraint: string
  ): void {
    if (paymentTransactionId === null) {
      return;
    }
    this.assertInteger(paymentTransactionId, "transaction_id");
    if (!this.paymentTransactions.has(paymentTransactionId)) {
      throw new RepositoryException(
        ErrorCode.REFERENCED_RECORD_NOT_FOUND,
        constraint
      );
    }
  }

  // varchar(n) counts characters, not UTF-16 code units.
  assertMaxLength(value: string, maxLength: number, column: string): void {
    if ([...value].length > maxLength) {
      throw new RepositoryException(
        ErrorCode.CONSTRAINT_VIOLATION,
        `${column} exceeds ${maxLength} characters`
      );
    }
  }

  /** Same range as a Postgres integer column. */
  assertInteger(value: number, column: string): void {
    if (
      !Number.isInteger(value) ||
      value > FIELD_LIMITS.int4Max ||
      value < -FIELD_LIMITS.int4Max - 1
    ) {
      throw new RepositoryException(
        ErrorCode.CONSTRAINT_VIOLATION,
        `${column} is out of range for type integer`
      );
    }
  }

  assertRelatedObject(ref: RelatedObjectRef | null, constraint: string): void {
    if (ref === null) {
      return;
    }
    this.assertInteger(ref.id, "object_id");
    if (ref.id < 0) {
      throw new RepositoryException(ErrorCode.CONSTRAINT_VIOLATION, constraint);
    }
  }

  assertQuantity(quantity: number): void {
    this.assertInteger(quantity, "quantity");
    if (quantity <= 0) {
      throw new RepositoryException(
        ErrorCode.CONSTRAINT_VIOLATION,
        "purchased_items_quantity_check"
      );
    }
  }

  /** Normalizes like numeric(8, 2) does: "5" is stored as "5.00". */
  toMoney(value: string, column: string): string {
    const cents = Cents.fromDecimalString(value);
    if (!cents || !cents.fitsPrecision(FIELD_LIMITS.moneyPrecision)) {
      throw new RepositoryException(
        ErrorCode.CONSTRAINT_VIOLATION,
        `${column} is not a numeric(8, 2) value`
      );
    }
    return cents.toDecimalString();
  }

  isItemReferenced(itemId: number): boolean {
    return [...this.purchasedItems.values()].some(
      (purchasedItem) => purchasedItem.itemId === itemId
    );
  }

  /** Name of a foreign key that still points at the transaction, if any. */
  findTransactionReference(paymentTransactionId: number): string | null {
    for (const purchasedItem of this.purchasedItems.values()) {
      if (purchasedItem.paymentTransactionId === paymentTransactionId) {
        return "purchased_items_transaction_id_payment_transactions_id_fk";
      }
    }
    for (const error of this.paymentTransactionErrors.values()) {
      if (error.paymentTransactionId === paymentTransactionId) {
        return "payment_transaction_errors_transaction_id_payment_transactions_id_fk";
      }
    }
    return null;
  }
}

/** Stored rows are handed out as copies. */
export function cloneRecord<T>(record: T): T {
  return structuredClone(record);
}

// Code point order, as Postgres sorts under COLLATE "C".
export function compareText(a: string, b: string): number {
  const left = [...a];
  const right = [...b];
  const length = Math.min(left.length, right.length);
  for (let index = 0; index < length; index++) {
    const diff =
      (left[index]?.codePointAt(0) ?? 0) - (right[index]?.codePointAt(0) ?? 0);
    if (diff !== 0) return diff;
  }
  return left.length - right.length;
}

// Postgres sorts NULL first in descending order.
export function compareDatesDescending(a: Date | null, b: Date | null): number {
  if (a === null || b === null) {
    if (a === b) return 0;
    return a === null ? -1 : 1;
  }
  return b.getTime() - a.getTime();
}
