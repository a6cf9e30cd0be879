import type {
  FastifyBaseLogger,
  FastifyInstance,
  FastifyPluginAsync,
} from "fastify";
import fp from "fastify-plugin";
import { diContainer, fastifyAwilixPlugin } from "@fastify/awilix";
import { asClass, asValue } from "awilix";
import type { AppConfig } from "./config-plugin";
import type { ItemRepository } from "../repositories/item-repository";
import type { PaymentTransactionErrorRepository } from "../repositories/payment-transaction-error-repository";
import type { PaymentTransactionRepository } from "../repositories/payment-transaction-repository";
import type { PurchasedItemRepository } from "../repositories/purchased-item-repository";
import type { UserRepository } from "../repositories/user-repository";
import {
  type Repositories,
  RepositoryFactory,
} from "../repositories/implementations/repository-factory";
import { MemoryStore } from "../repositories/implementations/memory-store";
import { RelatedObjectResolver } from "../shared/related-object";
import { CreateItem } from "../use-cases/create-item";
import { UpdateItem } from "../use-cases/update-item";
import { DeleteItem } from "../use-cases/delete-item";
import { RecordPaymentTransaction } from "../use-cases/record-payment-transaction";
import { UpdatePaymentTransactionStatus } from "../use-cases/update-payment-transaction-status";
import { DeletePaymentTransaction } from "../use-cases/delete-payment-transaction";
import { LogPaymentTransactionError } from "../use-cases/log-payment-transaction-error";
import { ListPurchasedItems } from "../use-cases/list-purchased-items";

declare module "@fastify/awilix" {
  interface Cradle {
    appConfig: AppConfig;
    logger: FastifyBaseLogger;
    userRepository: UserRepository;
    itemRepository: ItemRepository;
    paymentTransactionRepository: PaymentTransactionRepository;
    purchasedItemRepository: PurchasedItemRepository;
    paymentTransactionErrorRepository: PaymentTransactionErrorRepository;
    relatedObjectResolver: RelatedObjectResolver;
    createItem: CreateItem;
    updateItem: UpdateItem;
    deleteItem: DeleteItem;
    recordPaymentTransaction: RecordPaymentTransaction;
    updatePaymentTransactionStatus: UpdatePaymentTransactionStatus;
    deletePaymentTransaction: DeletePaymentTransaction;
    logPaymentTransactionError: LogPaymentTransactionError;
    listPurchasedItems: ListPurchasedItems;
  }
}

function createRepositories(fastify: FastifyInstance): Repositories {
  if (fastify.appConfig.STORAGE_DRIVER === "memory") {
    fastify.log.warn("Using in-memory storage, records are not persisted");
    return RepositoryFactory.create({
      driver: "memory",
      store: new MemoryStore(),
      logger: fastify.log,
    });
  }
  if (!fastify.hasDecorator("db")) {
    throw new Error("Postgres storage needs the drizzle plugin registered");
  }
  return RepositoryFactory.create({
    driver: "postgres",
    db: fastify.db,
    logger: fastify.log,
  });
}

export function createRelatedObjectResolver(
  repositories: Repositories,
  logger: FastifyBaseLogger
): RelatedObjectResolver {
  return new RelatedObjectResolver({ logger })
    .register("item", (id) => repositories.itemRepository.getItemById(id))
    .register("payment_transaction", (id) =>
      repositories.paymentTransactionRepository.getTransactionById(id)
    )
    .register("purchased_item", (id) =>
      repositories.purchasedItemRepository.getPurchasedItemById(id)
    )
    .register("user", (id) => repositories.userRepository.getUserById(id));
}

const diContainerPlugin: FastifyPluginAsync = async (
  fastify: FastifyInstance
) => {
  fastify.log.info("Registering DI Container plugin...");
  await fastify.register(fastifyAwilixPlugin, {
    disposeOnClose: true,
    disposeOnResponse: true,
  });
  const repositories = createRepositories(fastify);
  diContainer.register({
    appConfig: asValue(fastify.appConfig),
    logger: asValue(fastify.log),
    userRepository: asValue(repositories.userRepository),
    itemRepository: asValue(repositories.itemRepository),
    paymentTransactionRepository: asValue(
      repositories.paymentTransactionRepository
    ),
    purchasedItemRepository: asValue(repositories.purchasedItemRepository),
    paymentTransactionErrorRepository: asValue(
      repositories.paymentTransactionErrorRepository
    ),
    relatedObjectResolver: asValue(
      createRelatedObjectResolver(repositories, fastify.log)
    ),
    createItem: asClass(CreateItem).singleton(),
    updateItem: asClass(UpdateItem).singleton(),
    deleteItem: asClass(DeleteItem).singleton(),
    recordPaymentTransaction: asClass(RecordPaymentTransaction).singleton(),
    updatePaymentTransactionStatus: asClass(
      UpdatePaymentTransactionStatus
    ).singleton(),
    deletePaymentTransaction: asClass(DeletePaymentTransaction).singleton(),
    logPaymentTransactionError: asClass(LogPaymentTransactionError).singleton(),
    listPurchasedItems: asClass(ListPurchasedItems).singleton(),
  });
  fastify.log.info("DI Container plugin registered successfully");
};

export default fp(diContainerPlugin, {
  name: "di-container-plugin",
  dependencies: ["config-plugin"],
});
