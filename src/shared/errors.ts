export const ErrorCode = {
  REFERENCED_RECORD_NOT_FOUND: {
    code: "R001",
    message: "Referenced record does not exist",
  },
  PROTECTED_RECORD: {
    code: "R002",
    message: "Record is referenced by other records",
  },
  CONSTRAINT_VIOLATION: {
    code: "R003",
    message: "Value violates a column constraint",
  },
} as const;

export type ErrorCodeEntry = (typeof ErrorCode)[keyof typeof ErrorCode];

/**
 * Raised by repositories when a write breaks a relational rule: a foreign
 * key, a restrict-on-delete or a check constraint.
 */
export class RepositoryException extends Error {
  constructor(
    public readonly errorCode: ErrorCodeEntry,
    public readonly detail?: string,
    public readonly originalError?: unknown
  ) {
    super(detail ? `${errorCode.message}: ${detail}` : errorCode.message);
    this.name = "RepositoryException";
    Object.setPrototypeOf(this, RepositoryException.prototype);
  }
}

export function isRepositoryException(
  error: unknown,
  errorCode?: ErrorCodeEntry
): error is RepositoryException {
  return (
    error instanceof RepositoryException &&
    (errorCode === undefined || error.errorCode.code === errorCode.code)
  );
}
