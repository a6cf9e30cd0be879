import type { FastifyBaseLogger } from "fastify";
import {
  type Repositories,
  RepositoryFactory,
} from "../repositories/implementations/repository-factory";
import { MemoryStore } from "../repositories/implementations/memory-store";
import { createMockLogger } from "./mock-logger";

/** Clock that moves one minute forward on every reading. */
export function createClock(start = "2024-01-01T00:00:00.000Z"): () => Date {
  let time = new Date(start).getTime();
  return () => {
    const now = new Date(time);
    time += 60_000;
    return now;
  };
}

export interface MemoryFixture extends Repositories {
  store: MemoryStore;
  logger: FastifyBaseLogger;
}

export function createMemoryFixture(
  now: () => Date = createClock()
): MemoryFixture {
  const store = new MemoryStore({ now });
  const logger = createMockLogger();
  return {
    store,
    logger,
    ...RepositoryFactory.createMemoryImplementation({ store, logger }),
  };
}
