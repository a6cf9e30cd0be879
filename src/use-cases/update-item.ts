import type { FastifyBaseLogger } from "fastify";
import type { z } from "zod";
import type { ItemData, ItemRepository } from "../repositories/item-repository";
import { type Either, failure, success } from "../shared/either";
import type { IInstrumentation } from "../shared/instrumentation";
import { UseCase } from "../shared/use-case";
import {
  invalidInput,
  notFound,
  type UseCaseError,
} from "../shared/use-case-error";
import { updateItemSchema } from "../validation/schemas";

export type UpdateItemRequest = z.input<typeof updateItemSchema>;

export type UpdateItemResponse = Either<ItemData, UseCaseError>;

export interface UpdateItemDeps {
  itemRepository: ItemRepository;
  logger: FastifyBaseLogger;
}

export class UpdateItem extends UseCase<UpdateItemRequest, UpdateItemResponse> {
  serviceName = "update-item";
  private readonly itemRepository: UpdateItemDeps["itemRepository"];

  constructor(deps: UpdateItemDeps) {
    super(deps.logger);
    this.itemRepository = deps.itemRepository;
  }

  async run(
    instrumentation: IInstrumentation,
    request: UpdateItemRequest
  ): Promise<UpdateItemResponse> {
    const parsed = updateItemSchema.safeParse(request);
    if (!parsed.success) {
      instrumentation.logWarning("Invalid item update");
      return failure(invalidInput(parsed.error));
    }
    const { id, ...changes } = parsed.data;
    const item = await this.itemRepository.updateItem(id, changes);
    if (!item) {
      return failure(notFound(`Item ${id} not found`));
    }
    instrumentation.logDebug("Item updated", { itemId: id });
    return success(item);
  }
}
