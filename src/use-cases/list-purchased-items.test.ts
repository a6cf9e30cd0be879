import { errorOf, valueOf } from "../test/either";
import { createMemoryFixture, type MemoryFixture } from "../test/fixtures";
import { ListPurchasedItems } from "./list-purchased-items";

describe("ListPurchasedItems", () => {
  let fixture: MemoryFixture;
  let listPurchasedItems: ListPurchasedItems;
  let userId: number;
  let goldId: number;
  let silverId: number;

  beforeEach(async () => {
    fixture = createMemoryFixture();
    listPurchasedItems = new ListPurchasedItems(fixture);
    userId = (await fixture.userRepository.createUser({ email: "buyer@example.com" })).id;
    goldId = (
      await fixture.itemRepository.createItem({
        name: "Gold plan",
        description: "Twelve months of gold",
        value: "49.90",
      })
    ).id;
    silverId = (
      await fixture.itemRepository.createItem({
        name: "Silver plan",
        description: "Twelve months of silver",
        value: "19.90",
      })
    ).id;
    await fixture.paymentTransactionRepository.createTransaction({
      userId,
      transactionId: "EC-1",
      value: "99.80",
      status: "completed",
      purchasedItems: [{ itemId: goldId, quantity: 2, identifier: "seat" }],
    });
    await fixture.paymentTransactionRepository.createTransaction({
      userId,
      transactionId: "EC-2",
      value: "49.90",
      status: "completed",
      purchasedItems: [{ itemId: goldId, quantity: 1 }],
    });
  });

  it("should list the user's lines newest first with the total quantity", async () => {
    const result = await listPurchasedItems.execute({ userId });

    const { purchasedItems, totalQuantity } = valueOf(result);
    expect(purchasedItems.map((line) => line.id)).toEqual([2, 1]);
    expect(totalQuantity).toBe(3);
  });

  it("should narrow to an identifier", async () => {
    const result = await listPurchasedItems.execute({
      userId,
      identifier: "seat",
    });

    expect(valueOf(result).totalQuantity).toBe(2);
  });

  it("should tell that an item was never bought", async () => {
    const result = await listPurchasedItems.execute({
      userId,
      itemId: silverId,
    });

    expect(valueOf(result)).toEqual({ purchasedItems: [], totalQuantity: 0 });
  });

  it("should require a user", async () => {
    const result = await listPurchasedItems.execute({ userId: -1 });

    expect(errorOf(result).kind).toBe("invalid_input");
  });
});
