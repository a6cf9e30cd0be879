import type { FastifyBaseLogger } from "fastify";
import type { DrizzleDB } from "../../db/database-manager";
import type { ItemRepository } from "../item-repository";
import type { PaymentTransactionErrorRepository } from "../payment-transaction-error-repository";
import type { PaymentTransactionRepository } from "../payment-transaction-repository";
import type { PurchasedItemRepository } from "../purchased-item-repository";
import type { UserRepository } from "../user-repository";
import { ItemRepositoryDrizzleImpl } from "./item-repository-drizzle-impl";
import { ItemRepositoryMemoryImpl } from "./item-repository-memory-impl";
import { MemoryStore } from "./memory-store";
import { PaymentTransactionErrorRepositoryDrizzleImpl } from "./payment-transaction-error-repository-drizzle-impl";
import { PaymentTransactionErrorRepositoryMemoryImpl } from "./payment-transaction-error-repository-memory-impl";
import { PaymentTransactionRepositoryDrizzleImpl } from "./payment-transaction-repository-drizzle-impl";
import { PaymentTransactionRepositoryMemoryImpl } from "./payment-transaction-repository-memory-impl";
import { PurchasedItemRepositoryDrizzleImpl } from "./purchased-item-repository-drizzle-impl";
import { PurchasedItemRepositoryMemoryImpl } from "./purchased-item-repository-memory-impl";
import { UserRepositoryDrizzleImpl } from "./user-repository-drizzle-impl";
import { UserRepositoryMemoryImpl } from "./user-repository-memory-impl";

export interface Repositories {
  userRepository: UserRepository;
  itemRepository: ItemRepository;
  paymentTransactionRepository: PaymentTransactionRepository;
  purchasedItemRepository: PurchasedItemRepository;
  paymentTransactionErrorRepository: PaymentTransactionErrorRepository;
}

export interface PostgresRepositoryDeps {
  db: DrizzleDB;
  logger: FastifyBaseLogger;
}

export interface MemoryRepositoryDeps {
  store?: MemoryStore;
  logger: FastifyBaseLogger;
}

export type RepositoryFactoryOptions =
  | ({ driver: "postgres" } & PostgresRepositoryDeps)
  | ({ driver: "memory" } & MemoryRepositoryDeps);

export class RepositoryFactory {
  static createPostgresImplementation(
    deps: PostgresRepositoryDeps
  ): Repositories {
    return {
      userRepository: new UserRepositoryDrizzleImpl(deps),
      itemRepository: new ItemRepositoryDrizzleImpl(deps),
      paymentTransactionRepository: new PaymentTransactionRepositoryDrizzleImpl(
        deps
      ),
      purchasedItemRepository: new PurchasedItemRepositoryDrizzleImpl(deps),
      paymentTransactionErrorRepository:
        new PaymentTransactionErrorRepositoryDrizzleImpl(deps),
    };
  }

  static createMemoryImplementation(deps: MemoryRepositoryDeps): Repositories {
    const store = deps.store ?? new MemoryStore();
    const memoryDeps = { store, logger: deps.logger };
    return {
      userRepository: new UserRepositoryMemoryImpl(memoryDeps),
      itemRepository: new ItemRepositoryMemoryImpl(memoryDeps),
      paymentTransactionRepository: new PaymentTransactionRepositoryMemoryImpl(
        memoryDeps
      ),
      purchasedItemRepository: new PurchasedItemRepositoryMemoryImpl(
        memoryDeps
      ),
      paymentTransactionErrorRepository:
        new PaymentTransactionErrorRepositoryMemoryImpl(memoryDeps),
    };
  }

  static create(options: RepositoryFactoryOptions): Repositories {
    switch (options.driver) {
      case "postgres":
        return this.createPostgresImplementation(options);
      case "memory":
        return this.createMemoryImplementation(options);
    }
  }
}
