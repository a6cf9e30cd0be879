import {
  createItemSchema,
  moneySchema,
  purchasedItemLineSchema,
  recordPaymentTransactionSchema,
  toValidationIssues,
  updatePaymentTransactionStatusSchema,
} from "./schemas";

describe("validation schemas", () => {
  describe("moneySchema", () => {
    it("should normalize numbers and strings to two decimals", () => {
      expect(moneySchema.parse(5)).toBe("5.00");
      expect(moneySchema.parse("19.9")).toBe("19.90");
      expect(moneySchema.parse("0.05")).toBe("0.05");
    });

    it("should reject a third decimal place", () => {
      const result = moneySchema.safeParse(1.005);
      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.issues[0]?.message).toBe(
          "Expected a decimal with at most 2 decimal places"
        );
      }
    });

    it("should reject values wider than numeric(8, 2)", () => {
      const result = moneySchema.safeParse("1000000");
      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.issues[0]?.message).toBe(
          "Expected at most 8 digits"
        );
      }
    });
  });

  describe("createItemSchema", () => {
    it("should require a name and a description", () => {
      const result = createItemSchema.safeParse({ value: "10" });
      expect(result.success).toBe(false);
      if (!result.success) {
        expect(
          toValidationIssues(result.error).map((issue) => issue.path)
        ).toEqual(["name", "description"]);
      }
    });

    it("should reject a name longer than 2048 characters", () => {
      const result = createItemSchema.safeParse({
        name: "n".repeat(2049),
        description: "Too long",
        value: "10",
      });
      expect(result.success).toBe(false);
    });
  });

  describe("purchasedItemLineSchema", () => {
    it("should need an item or a related object", () => {
      const result = purchasedItemLineSchema.safeParse({ quantity: 1 });
      expect(result.success).toBe(false);
      if (!result.success) {
        expect(toValidationIssues(result.error)).toEqual([
          {
            path: "itemId",
            message: "A purchased item needs an itemId or a relatedObject",
          },
        ]);
      }
    });

    it("should accept a line that points at a related object", () => {
      const result = purchasedItemLineSchema.safeParse({
        relatedObject: { type: "user", id: 3 },
        quantity: 2,
      });
      expect(result.success).toBe(true);
    });

    it.each([0, -1, 1.5])("should reject quantity %p", (quantity) => {
      const result = purchasedItemLineSchema.safeParse({ itemId: 1, quantity });
      expect(result.success).toBe(false);
    });
  });

  describe("recordPaymentTransactionSchema", () => {
    it("should default the status and the lines", () => {
      const parsed = recordPaymentTransactionSchema.parse({
        userId: 1,
        transactionId: "EC-1",
      });
      expect(parsed).toEqual({
        userId: 1,
        transactionId: "EC-1",
        status: "checkout",
        purchasedItems: [],
      });
    });

    it("should reject a gateway id longer than 32 characters", () => {
      const result = recordPaymentTransactionSchema.safeParse({
        userId: 1,
        transactionId: "x".repeat(33),
      });
      expect(result.success).toBe(false);
    });

    it("should report nested line issues with their path", () => {
      const result = recordPaymentTransactionSchema.safeParse({
        userId: 1,
        transactionId: "EC-1",
        purchasedItems: [{ itemId: 1, quantity: 0 }],
      });
      expect(result.success).toBe(false);
      if (!result.success) {
        expect(
          toValidationIssues(result.error).map((issue) => issue.path)
        ).toEqual(["purchasedItems.0.quantity"]);
      }
    });
  });

  describe("integer columns", () => {
    it("should accept the largest integer value", () => {
      const result = recordPaymentTransactionSchema.safeParse({
        userId: 2 ** 31 - 1,
        transactionId: "EC-1",
        relatedObject: { type: "user", id: 2 ** 31 - 1 },
        purchasedItems: [{ itemId: 2 ** 31 - 1, quantity: 2 ** 31 - 1 }],
      });
      expect(result.success).toBe(true);
    });

    it("should reject ids and quantities past the integer range", () => {
      const result = recordPaymentTransactionSchema.safeParse({
        userId: 2 ** 31,
        transactionId: "EC-1",
        relatedObject: { type: "user", id: 2 ** 31 },
        purchasedItems: [{ itemId: 1, quantity: 3_000_000_000 }],
      });
      expect(result.success).toBe(false);
      if (!result.success) {
        expect(
          toValidationIssues(result.error).map((issue) => issue.path)
        ).toEqual(["userId", "relatedObject.id", "purchasedItems.0.quantity"]);
      }
    });
  });

  describe("text lengths", () => {
    it("should count characters, not UTF-16 code units", () => {
      const result = recordPaymentTransactionSchema.safeParse({
        userId: 1,
        transactionId: "💳".repeat(32),
      });
      expect(result.success).toBe(true);
    });

    it("should reject one character too many", () => {
      const result = recordPaymentTransactionSchema.safeParse({
        userId: 1,
        transactionId: "💳".repeat(33),
      });
      expect(result.success).toBe(false);
      if (!result.success) {
        expect(toValidationIssues(result.error)).toEqual([
          { path: "transactionId", message: "Expected at most 32 characters" },
        ]);
      }
    });
  });

  describe("updatePaymentTransactionStatusSchema", () => {
    it("should reject an unknown status", () => {
      const result = updatePaymentTransactionStatusSchema.safeParse({
        transactionId: "EC-1",
        status: "refunded",
      });
      expect(result.success).toBe(false);
    });
  });
});
