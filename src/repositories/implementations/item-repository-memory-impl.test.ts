import { ErrorCode } from "../../shared/errors";
import { createMemoryFixture, type MemoryFixture } from "../../test/fixtures";

describe("ItemRepositoryMemoryImpl", () => {
  let fixture: MemoryFixture;

  beforeEach(() => {
    fixture = createMemoryFixture();
  });

  it("should apply the column defaults", async () => {
    const item = await fixture.itemRepository.createItem({
      name: "Gold plan",
      description: "Twelve months of gold",
      value: "49.9",
    });

    expect(item).toEqual({
      id: 1,
      identifier: "",
      name: "Gold plan",
      description: "Twelve months of gold",
      value: "49.90",
      currency: "USD",
    });
  });

  it("should reject a currency longer than 16 characters", async () => {
    await expect(
      fixture.itemRepository.createItem({
        name: "Gold plan",
        description: "Twelve months of gold",
        value: "1",
        currency: "C".repeat(17),
      })
    ).rejects.toThrow("currency exceeds 16 characters");
  });

  it("should update only the given fields", async () => {
    const item = await fixture.itemRepository.createItem({
      identifier: "gold",
      name: "Gold plan",
      description: "Twelve months of gold",
      value: "49.90",
      currency: "EUR",
    });

    const updated = await fixture.itemRepository.updateItem(item.id, {
      value: "39.90",
    });

    expect(updated).toEqual({ ...item, value: "39.90" });
  });

  it("should fetch several items by id", async () => {
    for (const name of ["Bronze", "Silver", "Gold"]) {
      await fixture.itemRepository.createItem({
        name,
        description: `${name} plan`,
        value: "1",
      });
    }

    const found = await fixture.itemRepository.getItemsByIds([3, 1, 9]);

    expect(found.map((item) => item.name)).toEqual(["Bronze", "Gold"]);
  });

  it("should report a missing item on delete", async () => {
    await expect(fixture.itemRepository.deleteItem(5)).resolves.toBe(false);
  });

  it("should reject a duplicate user email", async () => {
    await fixture.userRepository.createUser({ email: "buyer@example.com" });

    await expect(
      fixture.userRepository.createUser({ email: "buyer@example.com" })
    ).rejects.toHaveProperty("errorCode", ErrorCode.CONSTRAINT_VIOLATION);
  });
});
