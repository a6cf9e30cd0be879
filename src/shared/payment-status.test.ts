import { isPaymentStatus } from "./payment-status";

describe("isPaymentStatus", () => {
  it.each(["checkout", "pending", "completed", "canceled"])(
    "should accept %p",
    (status) => {
      expect(isPaymentStatus(status)).toBe(true);
    }
  );

  it.each(["cancelled", "COMPLETED", "", 1, null])("should reject %p", (value) => {
    expect(isPaymentStatus(value)).toBe(false);
  });
});
