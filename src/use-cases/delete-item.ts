import type { FastifyBaseLogger } from "fastify";
import type { ItemRepository } from "../repositories/item-repository";
import { type Either, failure, success } from "../shared/either";
import { ErrorCode, isRepositoryException } from "../shared/errors";
import type { IInstrumentation } from "../shared/instrumentation";
import { UseCase } from "../shared/use-case";
import {
  invalidInput,
  notFound,
  protectedRecord,
  type UseCaseError,
} from "../shared/use-case-error";
import { recordIdSchema } from "../validation/schemas";

export interface DeleteItemRequest {
  id: number;
}

export type DeleteItemResponse = Either<{ id: number }, UseCaseError>;

export interface DeleteItemDeps {
  itemRepository: ItemRepository;
  logger: FastifyBaseLogger;
}

export class DeleteItem extends UseCase<DeleteItemRequest, DeleteItemResponse> {
  serviceName = "delete-item";
  private readonly itemRepository: DeleteItemDeps["itemRepository"];

  constructor(deps: DeleteItemDeps) {
    super(deps.logger);
    this.itemRepository = deps.itemRepository;
  }

  async run(
    instrumentation: IInstrumentation,
    request: DeleteItemRequest
  ): Promise<DeleteItemResponse> {
    const parsed = recordIdSchema.safeParse(request);
    if (!parsed.success) {
      return failure(invalidInput(parsed.error));
    }
    const { id } = parsed.data;
    try {
      const deleted = await this.itemRepository.deleteItem(id);
      if (!deleted) {
        return failure(notFound(`Item ${id} not found`));
      }
    } catch (error) {
      if (isRepositoryException(error, ErrorCode.PROTECTED_RECORD)) {
        instrumentation.logWarning("Item is still referenced", { itemId: id });
        return failure(
          protectedRecord(`Item ${id} is referenced by purchased items`)
        );
      }
      throw error;
    }
    instrumentation.logDebug("Item deleted", { itemId: id });
    return success({ id });
  }
}
