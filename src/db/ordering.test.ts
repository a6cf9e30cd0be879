import { PgDialect } from "drizzle-orm/pg-core";
import { ascByCodePoint } from "./ordering";
import { paymentTransactions } from "./schema";

describe("ascByCodePoint", () => {
  it("should sort with the C collation", () => {
    const query = new PgDialect().sqlToQuery(
      ascByCodePoint(paymentTransactions.transactionId)
    );

    expect(query.sql).toMatch(/"transaction_id" collate "C" asc$/);
  });
});
