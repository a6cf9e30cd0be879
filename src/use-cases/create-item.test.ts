import { errorOf, valueOf } from "../test/either";
import { createMemoryFixture, type MemoryFixture } from "../test/fixtures";
import { CreateItem } from "./create-item";

describe("CreateItem", () => {
  let fixture: MemoryFixture;
  let createItem: CreateItem;

  beforeEach(() => {
    fixture = createMemoryFixture();
    createItem = new CreateItem(fixture);
  });

  it("should create an item with a normalized value", async () => {
    const result = await createItem.execute({
      name: "Gold plan",
      description: "Twelve months of gold",
      value: 49.9,
      currency: "EUR",
    });

    expect(valueOf(result)).toEqual({
      id: 1,
      identifier: "",
      name: "Gold plan",
      description: "Twelve months of gold",
      value: "49.90",
      currency: "EUR",
    });
  });

  it("should return the validation issues", async () => {
    const result = await createItem.execute({
      name: "",
      description: "Twelve months of gold",
      value: "4.999",
    });

    expect(errorOf(result)).toEqual({
      kind: "invalid_input",
      error: "Invalid input",
      issues: [
        {
          path: "name",
          message: expect.any(String),
        },
        {
          path: "value",
          message: "Expected a decimal with at most 2 decimal places",
        },
      ],
    });
    expect(fixture.store.items.size).toBe(0);
  });

  it("should log and rethrow unexpected repository errors", async () => {
    const failing = new CreateItem({
      logger: fixture.logger,
      itemRepository: {
        createItem: jest.fn().mockRejectedValue(new Error("connection lost")),
        getItemById: jest.fn(),
        getItemsByIds: jest.fn(),
        listItems: jest.fn(),
        updateItem: jest.fn(),
        deleteItem: jest.fn(),
      },
    });

    await expect(
      failing.execute({
        name: "Gold plan",
        description: "Twelve months of gold",
        value: "1",
      })
    ).rejects.toThrow("connection lost");
    expect(fixture.logger.error).toHaveBeenCalledWith(
      expect.objectContaining({
        serviceName: "create-item",
        error: "connection lost",
      }),
      expect.stringContaining("Service failed")
    );
  });
});
