import type { FastifyBaseLogger } from "fastify";
import type { z } from "zod";
import type { ItemData, ItemRepository } from "../repositories/item-repository";
import type {
  PaymentTransactionData,
  PaymentTransactionRepository,
  PurchasedItemLine,
} from "../repositories/payment-transaction-repository";
import type {
  PurchasedItemData,
  PurchasedItemRepository,
} from "../repositories/purchased-item-repository";
import type { UserRepository } from "../repositories/user-repository";
import { Cents } from "../shared/cents";
import { type Either, failure, success } from "../shared/either";
import { ErrorCode, isRepositoryException } from "../shared/errors";
import { FIELD_LIMITS } from "../shared/field-limits";
import type { IInstrumentation } from "../shared/instrumentation";
import { formatPurchasedItemLabel } from "../shared/labels";
import { UseCase } from "../shared/use-case";
import {
  invalidInput,
  invalidValue,
  notFound,
  type UseCaseError,
} from "../shared/use-case-error";
import { recordPaymentTransactionSchema } from "../validation/schemas";

export type RecordPaymentTransactionRequest = z.input<
  typeof recordPaymentTransactionSchema
>;

export type RecordPaymentTransactionResponse = Either<
  {
    transaction: PaymentTransactionData;
    purchasedItems: PurchasedItemData[];
  },
  UseCaseError
>;

export interface RecordPaymentTransactionDeps {
  userRepository: UserRepository;
  itemRepository: ItemRepository;
  paymentTransactionRepository: PaymentTransactionRepository;
  purchasedItemRepository: PurchasedItemRepository;
  logger: FastifyBaseLogger;
}

/**
 * Stores a gateway transaction together with the purchased-item lines it
 * pays for. Lines that point at an item and carry no price capture the
 * item's current value.
 */
export class RecordPaymentTransaction extends UseCase<
  RecordPaymentTransactionRequest,
  RecordPaymentTransactionResponse
> {
  serviceName = "record-payment-transaction";
  private readonly userRepository: RecordPaymentTransactionDeps["userRepository"];
  private readonly itemRepository: RecordPaymentTransactionDeps["itemRepository"];
  private readonly paymentTransactionRepository: RecordPaymentTransactionDeps["paymentTransactionRepository"];
  private readonly purchasedItemRepository: RecordPaymentTransactionDeps["purchasedItemRepository"];

  constructor(deps: RecordPaymentTransactionDeps) {
    super(deps.logger);
    this.userRepository = deps.userRepository;
    this.itemRepository = deps.itemRepository;
    this.paymentTransactionRepository = deps.paymentTransactionRepository;
    this.purchasedItemRepository = deps.purchasedItemRepository;
  }

  async run(
    instrumentation: IInstrumentation,
    request: RecordPaymentTransactionRequest
  ): Promise<RecordPaymentTransactionResponse> {
    const parsed = recordPaymentTransactionSchema.safeParse(request);
    if (!parsed.success) {
      instrumentation.logWarning("Invalid payment transaction input");
      return failure(invalidInput(parsed.error));
    }
    const input = parsed.data;
    const user = await this.userRepository.getUserById(input.userId);
    if (!user) {
      return failure(notFound(`User ${input.userId} not found`));
    }
    const itemIds = [
      ...new Set(
        input.purchasedItems.flatMap((line) => (line.itemId ? [line.itemId] : []))
      ),
    ];
    const items = new Map(
      (await this.itemRepository.getItemsByIds(itemIds)).map((item) => [
        item.id,
        item,
      ])
    );
    const missingItemIds = itemIds.filter((id) => !items.has(id));
    if (missingItemIds.length > 0) {
      return failure(notFound(`Items not found: ${missingItemIds.join(", ")}`));
    }
    const lines: PurchasedItemLine[] = input.purchasedItems.map((line) => ({
      identifier: line.identifier,
      itemId: line.itemId ?? null,
      relatedObject: line.relatedObject ?? null,
      price:
        line.price ??
        this.currentPrice(line.itemId ? items.get(line.itemId) : undefined),
      quantity: line.quantity,
    }));
    const value = input.value ?? this.totalOf(lines).toDecimalString();
    const total = Cents.fromDecimalString(value);
    if (!total || !total.fitsPrecision(FIELD_LIMITS.moneyPrecision)) {
      return failure(
        invalidValue(`Transaction value ${value} does not fit numeric(8, 2)`)
      );
    }
    let transaction: PaymentTransactionData;
    try {
      transaction = await this.paymentTransactionRepository.createTransaction({
        userId: input.userId,
        relatedObject: input.relatedObject ?? null,
        transactionId: input.transactionId,
        value,
        status: input.status,
        purchasedItems: lines,
      });
    } catch (error) {
      if (isRepositoryException(error, ErrorCode.CONSTRAINT_VIOLATION)) {
        instrumentation.logWarning("Payment transaction rejected by a constraint", {
          constraint: error.detail,
        });
        return failure(invalidValue(error.message));
      }
      throw error;
    }
    const purchasedItems = await this.purchasedItemRepository.listPurchasedItems({
      paymentTransactionId: transaction.id,
    });
    instrumentation.logInfo("Payment transaction recorded", {
      paymentTransactionId: transaction.id,
      transactionId: transaction.transactionId,
      value: transaction.value,
      status: transaction.status,
    });
    for (const purchasedItem of purchasedItems) {
      instrumentation.logDebug("Purchased item recorded", {
        purchasedItemId: purchasedItem.id,
        label: formatPurchasedItemLabel({
          purchasedItem,
          item: purchasedItem.itemId
            ? items.get(purchasedItem.itemId) ?? null
            : null,
          userEmail: user.email,
          transaction,
        }),
      });
    }
    return success({ transaction, purchasedItems });
  }

  private currentPrice(item: ItemData | undefined): number | null {
    if (!item) {
      return null;
    }
    return Cents.fromDecimalString(item.value)?.toFloat() ?? null;
  }

  private totalOf(lines: PurchasedItemLine[]): Cents {
    return lines.reduce(
      (total, line) =>
        total.add(Cents.fromFloat(line.price ?? 0).multiply(line.quantity)),
      Cents.create(0)
    );
  }
}
