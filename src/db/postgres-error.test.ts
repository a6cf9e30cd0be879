import { ErrorCode, isRepositoryException } from "../shared/errors";
import { getPostgresErrorCode, translatePostgresError } from "./postgres-error";

function pgError(code: string, constraint?: string) {
  return Object.assign(new Error("pg failure"), { code, constraint });
}

describe("translatePostgresError", () => {
  it("should read the SQLSTATE through wrapping errors", () => {
    const wrapped = new Error("Failed query", {
      cause: pgError("23503", "purchased_items_item_id_items_id_fk"),
    });
    expect(getPostgresErrorCode(wrapped)).toBe("23503");
  });

  it("should turn a foreign key violation on delete into a protected record", () => {
    const error = translatePostgresError(
      pgError("23503", "purchased_items_item_id_items_id_fk"),
      "delete"
    );
    expect(isRepositoryException(error, ErrorCode.PROTECTED_RECORD)).toBe(true);
    expect(error).toHaveProperty(
      "message",
      "Record is referenced by other records: purchased_items_item_id_items_id_fk"
    );
  });

  it("should turn a foreign key violation on write into a missing reference", () => {
    const error = translatePostgresError(
      new Error("Failed query", {
        cause: pgError("23503", "payment_transactions_user_id_users_id_fk"),
      }),
      "write"
    );
    expect(
      isRepositoryException(error, ErrorCode.REFERENCED_RECORD_NOT_FOUND)
    ).toBe(true);
    expect(error).toHaveProperty(
      "detail",
      "payment_transactions_user_id_users_id_fk"
    );
  });

  it.each(["23514", "23505", "23502", "22003", "22001"])(
    "should report SQLSTATE %s as a constraint violation",
    (code) => {
      const error = translatePostgresError(pgError(code), "write");
      expect(isRepositoryException(error, ErrorCode.CONSTRAINT_VIOLATION)).toBe(
        true
      );
    }
  );

  it("should pass other errors through unchanged", () => {
    const original = new Error("connection reset");
    expect(translatePostgresError(original, "write")).toBe(original);
    expect(translatePostgresError("boom", "delete")).toBe("boom");
  });
});
