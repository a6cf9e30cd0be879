import type { FastifyBaseLogger } from "fastify";
import type { z } from "zod";
import type { ItemData, ItemRepository } from "../repositories/item-repository";
import { type Either, failure, success } from "../shared/either";
import type { IInstrumentation } from "../shared/instrumentation";
import { formatItemLabel } from "../shared/labels";
import { UseCase } from "../shared/use-case";
import { invalidInput, type UseCaseError } from "../shared/use-case-error";
import { createItemSchema } from "../validation/schemas";

export type CreateItemRequest = z.input<typeof createItemSchema>;

export type CreateItemResponse = Either<ItemData, UseCaseError>;

export interface CreateItemDeps {
  itemRepository: ItemRepository;
  logger: FastifyBaseLogger;
}

export class CreateItem extends UseCase<CreateItemRequest, CreateItemResponse> {
  serviceName = "create-item";
  private readonly itemRepository: CreateItemDeps["itemRepository"];

  constructor(deps: CreateItemDeps) {
    super(deps.logger);
    this.itemRepository = deps.itemRepository;
  }

  async run(
    instrumentation: IInstrumentation,
    request: CreateItemRequest
  ): Promise<CreateItemResponse> {
    const parsed = createItemSchema.safeParse(request);
    if (!parsed.success) {
      instrumentation.logWarning("Invalid item input");
      return failure(invalidInput(parsed.error));
    }
    const item = await this.itemRepository.createItem(parsed.data);
    instrumentation.logDebug("Item created", {
      itemId: item.id,
      label: formatItemLabel(item),
    });
    return success(item);
  }
}
