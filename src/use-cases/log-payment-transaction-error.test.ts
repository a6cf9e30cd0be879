import { errorOf, valueOf } from "../test/either";
import { createMemoryFixture, type MemoryFixture } from "../test/fixtures";
import { LogPaymentTransactionError } from "./log-payment-transaction-error";

describe("LogPaymentTransactionError", () => {
  let fixture: MemoryFixture;
  let logPaymentTransactionError: LogPaymentTransactionError;
  let userId: number;

  beforeEach(async () => {
    fixture = createMemoryFixture();
    logPaymentTransactionError = new LogPaymentTransactionError(fixture);
    userId = (await fixture.userRepository.createUser({ email: "buyer@example.com" })).id;
  });

  it("should append an error linked to a transaction", async () => {
    const transaction =
      await fixture.paymentTransactionRepository.createTransaction({
        userId,
        transactionId: "EC-1",
        value: "1",
        status: "checkout",
      });

    const result = await logPaymentTransactionError.execute({
      userId,
      paymentTransactionId: transaction.id,
      paypalApiUrl: "https://gateway.test/nvp",
      requestData: "METHOD=DoExpressCheckoutPayment",
      response: "ACK=Failure",
    });

    expect(valueOf(result)).toEqual({
      id: 1,
      date: new Date("2024-01-01T00:01:00.000Z"),
      userId,
      paypalApiUrl: "https://gateway.test/nvp",
      requestData: "METHOD=DoExpressCheckoutPayment",
      response: "ACK=Failure",
      paymentTransactionId: transaction.id,
    });
  });

  it("should append an error without a transaction", async () => {
    const result = await logPaymentTransactionError.execute({ userId });

    expect(valueOf(result)).toMatchObject({
      paypalApiUrl: "",
      requestData: "",
      response: "",
      paymentTransactionId: null,
    });
  });

  it("should report an unknown transaction", async () => {
    const result = await logPaymentTransactionError.execute({
      userId,
      paymentTransactionId: 31,
    });

    expect(errorOf(result)).toEqual({
      kind: "not_found",
      error:
        "Referenced record does not exist: payment_transaction_errors_transaction_id_payment_transactions_id_fk",
    });
  });
});
