import type { FastifyBaseLogger } from "fastify";
import type { z } from "zod";
import type {
  PurchasedItemData,
  PurchasedItemRepository,
} from "../repositories/purchased-item-repository";
import { type Either, failure, success } from "../shared/either";
import type { IInstrumentation } from "../shared/instrumentation";
import { UseCase } from "../shared/use-case";
import { invalidInput, type UseCaseError } from "../shared/use-case-error";
import { listPurchasedItemsSchema } from "../validation/schemas";

export type ListPurchasedItemsRequest = z.input<
  typeof listPurchasedItemsSchema
>;

export type ListPurchasedItemsResponse = Either<
  {
    purchasedItems: PurchasedItemData[];
    /** Zero means the user never bought a matching item. */
    totalQuantity: number;
  },
  UseCaseError
>;

export interface ListPurchasedItemsDeps {
  purchasedItemRepository: PurchasedItemRepository;
  logger: FastifyBaseLogger;
}

export class ListPurchasedItems extends UseCase<
  ListPurchasedItemsRequest,
  ListPurchasedItemsResponse
> {
  serviceName = "list-purchased-items";
  private readonly purchasedItemRepository: ListPurchasedItemsDeps["purchasedItemRepository"];

  constructor(deps: ListPurchasedItemsDeps) {
    super(deps.logger);
    this.purchasedItemRepository = deps.purchasedItemRepository;
  }

  async run(
    instrumentation: IInstrumentation,
    request: ListPurchasedItemsRequest
  ): Promise<ListPurchasedItemsResponse> {
    const parsed = listPurchasedItemsSchema.safeParse(request);
    if (!parsed.success) {
      return failure(invalidInput(parsed.error));
    }
    const purchasedItems =
      await this.purchasedItemRepository.listPurchasedItems(parsed.data);
    const totalQuantity = purchasedItems.reduce(
      (total, purchasedItem) => total + purchasedItem.quantity,
      0
    );
    instrumentation.logDebug("Purchased items listed", {
      count: purchasedItems.length,
      totalQuantity,
    });
    return success({ purchasedItems, totalQuantity });
  }
}
