import { describe, expect, it } from "vitest";
import { isGeneratedId, isGridstashError } from "@gridstash/shared";
import { InventoryErrorCode, Item, isInventoryError, itemArea, itemLongestSide } from "../src/index.js";
import { captureError } from "./helpers.js";

describe("Item", () => {
  it("derives area and longest side from its size", () => {
    const bow = new Item("Bow", 2, 4);

    expect(bow.area).toBe(8);
    expect(bow.longestSide).toBe(4);
    expect(itemArea(bow)).toBe(8);
    expect(itemLongestSide(bow)).toBe(4);
  });

  it("generates an id unless one is given", () => {
    expect(isGeneratedId(new Item("Gem", 1, 1).id)).toBe(true);
    expect(new Item("Gem", 1, 1, "gem-1").id).toBe("gem-1");
  });

  it("gives equal names distinct identities", () => {
    const first = new Item("Potion", 1, 1);
    const second = new Item("Potion", 1, 1);

    expect(first.id).not.toBe(second.id);
  });

  it("prints as its name", () => {
    expect(String(new Item("Shield", 2, 2))).toBe("Shield");
  });

  it("freezes its size", () => {
    const item = new Item("Axe", 1, 2);

    expect(Object.isFrozen(item.size)).toBe(true);
    expect(item.size).toEqual({ width: 1, height: 2 });
  });

  it("builds from a size object", () => {
    const item = Item.fromSize("Map", { width: 3, height: 1 }, "map");

    expect(item.size).toEqual({ width: 3, height: 1 });
    expect(item.id).toBe("map");
  });

  it.each([
    [0, 1],
    [1, 0],
    [-2, 1],
    [1.5, 1],
    [Number.NaN, 1],
  ])("rejects a %s x %s size", (width, height) => {
    const error = captureError(() => new Item("Broken", width, height));

    expect(isInventoryError(error, InventoryErrorCode.INVALID_SIZE)).toBe(true);
  });

  it("rejects an empty id", () => {
    const error = captureError(() => new Item("Nameless", 1, 1, ""));

    expect(isInventoryError(error, InventoryErrorCode.INVALID_ITEM)).toBe(true);
  });

  it("raises errors that share the gridstash base", () => {
    const error = captureError(() => new Item("Broken", 0, 1));

    expect(isGridstashError(error)).toBe(true);
    expect(error).toBeInstanceOf(Error);
    expect(isInventoryError(error, InventoryErrorCode.INVALID_ITEM)).toBe(false);
  });
});
