import { errorOf, valueOf } from "../test/either";
import { createMemoryFixture, type MemoryFixture } from "../test/fixtures";
import { DeletePaymentTransaction } from "./delete-payment-transaction";

describe("DeletePaymentTransaction", () => {
  let fixture: MemoryFixture;
  let deletePaymentTransaction: DeletePaymentTransaction;
  let userId: number;

  beforeEach(async () => {
    fixture = createMemoryFixture();
    deletePaymentTransaction = new DeletePaymentTransaction(fixture);
    userId = (await fixture.userRepository.createUser({ email: "buyer@example.com" })).id;
  });

  it("should delete a transaction without dependent rows", async () => {
    const transaction =
      await fixture.paymentTransactionRepository.createTransaction({
        userId,
        transactionId: "EC-1",
        value: "1",
        status: "canceled",
      });

    const result = await deletePaymentTransaction.execute({ id: transaction.id });

    expect(valueOf(result)).toEqual({ id: transaction.id });
  });

  it("should keep a transaction that has purchased items", async () => {
    const transaction =
      await fixture.paymentTransactionRepository.createTransaction({
        userId,
        transactionId: "EC-1",
        value: "1",
        status: "completed",
        purchasedItems: [
          { relatedObject: { type: "user", id: userId }, quantity: 1 },
        ],
      });

    const result = await deletePaymentTransaction.execute({ id: transaction.id });

    expect(errorOf(result)).toEqual({
      kind: "protected",
      error: `Payment transaction ${transaction.id} is referenced by purchased items or error records`,
    });
    expect(fixture.store.paymentTransactions.has(transaction.id)).toBe(true);
  });

  it("should report a missing transaction", async () => {
    const result = await deletePaymentTransaction.execute({ id: 5 });

    expect(errorOf(result)).toEqual({
      kind: "not_found",
      error: "Payment transaction 5 not found",
    });
  });

  it("should reject an invalid id", async () => {
    const result = await deletePaymentTransaction.execute({ id: 0 });

    expect(errorOf(result).kind).toBe("invalid_input");
  });
});
