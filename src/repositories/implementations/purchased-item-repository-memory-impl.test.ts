import { ErrorCode } from "../../shared/errors";
import { createMemoryFixture, type MemoryFixture } from "../../test/fixtures";

describe("PurchasedItemRepositoryMemoryImpl", () => {
  let fixture: MemoryFixture;
  let userId: number;
  let itemId: number;

  async function createTransaction(transactionId: string) {
    return fixture.paymentTransactionRepository.createTransaction({
      userId,
      transactionId,
      value: "1",
      status: "pending",
    });
  }

  beforeEach(async () => {
    fixture = createMemoryFixture();
    userId = (await fixture.userRepository.createUser({ email: "buyer@example.com" })).id;
    itemId = (
      await fixture.itemRepository.createItem({
        name: "Gold plan",
        description: "Twelve months of gold",
        value: "49.90",
      })
    ).id;
  });

  it("should create a line with defaults", async () => {
    const transaction = await createTransaction("EC-1");

    const purchasedItem =
      await fixture.purchasedItemRepository.createPurchasedItem({
        userId,
        paymentTransactionId: transaction.id,
        relatedObject: { type: "item", id: itemId },
        quantity: 3,
      });

    expect(purchasedItem).toEqual({
      id: 1,
      userId,
      identifier: "",
      paymentTransactionId: transaction.id,
      itemId: null,
      relatedObject: { type: "item", id: itemId },
      price: null,
      quantity: 3,
    });
  });

  it.each([0, -2])("should reject quantity %p", async (quantity) => {
    const transaction = await createTransaction("EC-1");

    await expect(
      fixture.purchasedItemRepository.createPurchasedItem({
        userId,
        paymentTransactionId: transaction.id,
        itemId,
        quantity,
      })
    ).rejects.toHaveProperty("detail", "purchased_items_quantity_check");
  });

  it("should reject a quantity past the integer range", async () => {
    const transaction = await createTransaction("EC-1");

    await expect(
      fixture.purchasedItemRepository.createPurchasedItem({
        userId,
        paymentTransactionId: transaction.id,
        itemId,
        quantity: 2 ** 31,
      })
    ).rejects.toThrow(
      "Value violates a column constraint: quantity is out of range for type integer"
    );
    expect(fixture.store.purchasedItems.size).toBe(0);
  });

  it("should reject an object id past the integer range", async () => {
    const transaction = await createTransaction("EC-1");

    await expect(
      fixture.purchasedItemRepository.createPurchasedItem({
        userId,
        paymentTransactionId: transaction.id,
        relatedObject: { type: "user", id: 2 ** 31 },
        quantity: 1,
      })
    ).rejects.toHaveProperty(
      "detail",
      "object_id is out of range for type integer"
    );
  });

  it("should reject an update to a non-positive quantity", async () => {
    const transaction = await createTransaction("EC-1");
    const created = await fixture.purchasedItemRepository.createPurchasedItem({
      userId,
      paymentTransactionId: transaction.id,
      itemId,
      quantity: 1,
    });

    await expect(
      fixture.purchasedItemRepository.updatePurchasedItem(created.id, {
        quantity: 0,
      })
    ).rejects.toHaveProperty("errorCode", ErrorCode.CONSTRAINT_VIOLATION);
    await expect(
      fixture.purchasedItemRepository.getPurchasedItemById(created.id)
    ).resolves.toHaveProperty("quantity", 1);
  });

  it("should reject a missing transaction or item", async () => {
    await expect(
      fixture.purchasedItemRepository.createPurchasedItem({
        userId,
        paymentTransactionId: 77,
        itemId,
        quantity: 1,
      })
    ).rejects.toHaveProperty(
      "detail",
      "purchased_items_transaction_id_payment_transactions_id_fk"
    );
    const transaction = await createTransaction("EC-1");
    await expect(
      fixture.purchasedItemRepository.createPurchasedItem({
        userId,
        paymentTransactionId: transaction.id,
        itemId: 77,
        quantity: 1,
      })
    ).rejects.toHaveProperty("detail", "purchased_items_item_id_items_id_fk");
  });

  it("should keep the price paid when the item price changes", async () => {
    const transaction = await createTransaction("EC-1");
    const created = await fixture.purchasedItemRepository.createPurchasedItem({
      userId,
      paymentTransactionId: transaction.id,
      itemId,
      price: 49.9,
      quantity: 1,
    });

    await fixture.itemRepository.updateItem(itemId, { value: "59.90" });

    await expect(
      fixture.purchasedItemRepository.getPurchasedItemById(created.id)
    ).resolves.toHaveProperty("price", 49.9);
  });

  it("should order lines by the parent transaction date, newest first", async () => {
    const older = await createTransaction("EC-1");
    const newer = await createTransaction("EC-2");
    for (const paymentTransactionId of [older.id, newer.id, older.id]) {
      await fixture.purchasedItemRepository.createPurchasedItem({
        userId,
        paymentTransactionId,
        itemId,
        quantity: 1,
      });
    }

    const lines = await fixture.purchasedItemRepository.listPurchasedItems({
      userId,
    });

    expect(lines.map((line) => [line.paymentTransactionId, line.id])).toEqual([
      [newer.id, 2],
      [older.id, 1],
      [older.id, 3],
    ]);
  });

  it("should follow the parent date after the parent is updated", async () => {
    const first = await createTransaction("EC-1");
    const second = await createTransaction("EC-2");
    await fixture.purchasedItemRepository.createPurchasedItem({
      userId,
      paymentTransactionId: first.id,
      itemId,
      quantity: 1,
    });
    await fixture.purchasedItemRepository.createPurchasedItem({
      userId,
      paymentTransactionId: second.id,
      itemId,
      quantity: 1,
    });

    await fixture.paymentTransactionRepository.updateTransaction(first.id, {
      status: "completed",
    });

    const lines = await fixture.purchasedItemRepository.listPurchasedItems();
    expect(lines.map((line) => line.paymentTransactionId)).toEqual([
      first.id,
      second.id,
    ]);
  });

  it("should filter by identifier and item", async () => {
    const transaction = await createTransaction("EC-1");
    await fixture.purchasedItemRepository.createPurchasedItem({
      userId,
      paymentTransactionId: transaction.id,
      itemId,
      identifier: "seat",
      quantity: 1,
    });
    await fixture.purchasedItemRepository.createPurchasedItem({
      userId,
      paymentTransactionId: transaction.id,
      relatedObject: { type: "user", id: userId },
      identifier: "gift",
      quantity: 1,
    });

    const seats = await fixture.purchasedItemRepository.listPurchasedItems({
      identifier: "seat",
    });
    const gold = await fixture.purchasedItemRepository.listPurchasedItems({
      itemId,
    });

    expect(seats.map((line) => line.id)).toEqual([1]);
    expect(gold.map((line) => line.id)).toEqual([1]);
  });

  it("should delete a line and free its item", async () => {
    const transaction = await createTransaction("EC-1");
    const created = await fixture.purchasedItemRepository.createPurchasedItem({
      userId,
      paymentTransactionId: transaction.id,
      itemId,
      quantity: 1,
    });

    await expect(fixture.itemRepository.deleteItem(itemId)).rejects.toHaveProperty(
      "errorCode",
      ErrorCode.PROTECTED_RECORD
    );
    await expect(
      fixture.purchasedItemRepository.deletePurchasedItem(created.id)
    ).resolves.toBe(true);
    await expect(fixture.itemRepository.deleteItem(itemId)).resolves.toBe(true);
  });
});
