import type { FastifyBaseLogger } from "fastify";

export function createMockLogger(): FastifyBaseLogger {
  const logger: FastifyBaseLogger = {
    info: jest.fn(),
    error: jest.fn(),
    warn: jest.fn(),
    debug: jest.fn(),
    trace: jest.fn(),
    fatal: jest.fn(),
    child: jest.fn(() => logger),
    level: "info",
    silent: jest.fn(),
  } as unknown as FastifyBaseLogger;
  return logger;
}
