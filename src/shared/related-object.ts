import type { FastifyBaseLogger } from "fastify";

export const RELATED_OBJECT_TYPES = [
  "item",
  "payment_transaction",
  "purchased_item",
  "user",
] as const;

export type RelatedObjectType = (typeof RELATED_OBJECT_TYPES)[number];

/**
 * Tagged reference to a record of any registered entity type. Stored as the
 * `content_type` / `object_id` column pair.
 */
export interface RelatedObjectRef {
  type: RelatedObjectType;
  id: number;
}

export interface RelatedObjectColumns {
  relatedObjectType: RelatedObjectType | null;
  relatedObjectId: number | null;
}

export function toRelatedObjectColumns(
  ref: RelatedObjectRef | null | undefined
): RelatedObjectColumns {
  if (!ref) {
    return { relatedObjectType: null, relatedObjectId: null };
  }
  return { relatedObjectType: ref.type, relatedObjectId: ref.id };
}

export function fromRelatedObjectColumns(
  columns: RelatedObjectColumns
): RelatedObjectRef | null {
  const { relatedObjectType, relatedObjectId } = columns;
  if (relatedObjectType === null && relatedObjectId === null) {
    return null;
  }
  if (relatedObjectType === null || relatedObjectId === null) {
    throw new Error(
      `Incomplete related object reference (type=${relatedObjectType}, id=${relatedObjectId})`
    );
  }
  return { type: relatedObjectType, id: relatedObjectId };
}

export function formatRelatedObject(ref: RelatedObjectRef): string {
  return `${ref.type}#${ref.id}`;
}

export type RelatedObjectLoader = (id: number) => Promise<object | null>;

export interface RelatedObjectResolverDeps {
  logger: FastifyBaseLogger;
}

export class RelatedObjectResolver {
  private readonly logger: FastifyBaseLogger;
  private readonly loaders = new Map<RelatedObjectType, RelatedObjectLoader>();

  constructor(deps: RelatedObjectResolverDeps) {
    this.logger = deps.logger;
  }

  register(type: RelatedObjectType, loader: RelatedObjectLoader): this {
    if (this.loaders.has(type)) {
      throw new Error(`Loader for related object type '${type}' already registered`);
    }
    this.loaders.set(type, loader);
    this.logger.debug({ type }, "Related object loader registered");
    return this;
  }

  hasLoader(type: RelatedObjectType): boolean {
    return this.loaders.has(type);
  }

  async resolve(ref: RelatedObjectRef | null): Promise<object | null> {
    if (!ref) {
      return null;
    }
    const loader = this.loaders.get(ref.type);
    if (!loader) {
      throw new Error(`No loader registered for related object type '${ref.type}'`);
    }
    const record = await loader(ref.id);
    if (!record) {
      this.logger.warn({ ref }, "Related object not found");
    }
    return record;
  }
}
