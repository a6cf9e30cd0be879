import { ErrorCode, RepositoryException } from "../shared/errors";

export const PostgresErrorCode = {
  FOREIGN_KEY_VIOLATION: "23503",
  CHECK_VIOLATION: "23514",
  UNIQUE_VIOLATION: "23505",
  NOT_NULL_VIOLATION: "23502",
  NUMERIC_VALUE_OUT_OF_RANGE: "22003",
  STRING_DATA_RIGHT_TRUNCATION: "22001",
} as const;

/**
 * SQLSTATE of a node-postgres error. Drizzle wraps driver errors, so the
 * `cause` chain is followed.
 */
export function getPostgresErrorCode(error: unknown): string | undefined {
  if (typeof error !== "object" || error === null) {
    return undefined;
  }
  if ("code" in error && typeof error.code === "string") {
    return error.code;
  }
  if ("cause" in error) {
    return getPostgresErrorCode(error.cause);
  }
  return undefined;
}

function getConstraintName(error: unknown): string | undefined {
  if (typeof error !== "object" || error === null) {
    return undefined;
  }
  if ("constraint" in error && typeof error.constraint === "string") {
    return error.constraint;
  }
  if ("cause" in error) {
    return getConstraintName(error.cause);
  }
  return undefined;
}

/**
 * A foreign key violation means a missing parent on insert/update and a
 * restricted child on delete.
 */
export function translatePostgresError(
  error: unknown,
  operation: "write" | "delete"
): unknown {
  const constraint = getConstraintName(error);
  switch (getPostgresErrorCode(error)) {
    case PostgresErrorCode.FOREIGN_KEY_VIOLATION:
      return new RepositoryException(
        operation === "delete"
          ? ErrorCode.PROTECTED_RECORD
          : ErrorCode.REFERENCED_RECORD_NOT_FOUND,
        constraint,
        error
      );
    case PostgresErrorCode.CHECK_VIOLATION:
    case PostgresErrorCode.UNIQUE_VIOLATION:
    case PostgresErrorCode.NOT_NULL_VIOLATION:
    case PostgresErrorCode.NUMERIC_VALUE_OUT_OF_RANGE:
    case PostgresErrorCode.STRING_DATA_RIGHT_TRUNCATION:
      return new RepositoryException(
        ErrorCode.CONSTRAINT_VIOLATION,
        constraint,
        error
      );
    default:
      return error;
  }
}
