import { uuid } from "@gridstash/shared";
import { InventoryError, InventoryErrorCode } from "./errors.js";
import type { GridSize, InventoryItem, ItemId } from "./types.js";
import { assertValidSize } from "./validation.js";

/**
 * Immutable rectangular item. Names are labels and need not be unique;
 * identity is the generated `id`.
 *
 * @example
 * const sword = new Item("Sword", 1, 3);
 * sword.area        // 3
 * sword.longestSide // 3
 */
export class Item implements InventoryItem {
  readonly id: ItemId;
  readonly name: string;
  readonly size: GridSize;

  constructor(name: string, width: number, height: number, id: ItemId = uuid()) {
    if (typeof name !== "string") {
      throw new InventoryError("item name must be a string", InventoryErrorCode.INVALID_ITEM, {
        name: String(name),
      });
    }
    if (typeof id !== "string" || id.length === 0) {
      throw new InventoryError("item id must be a non-empty string", InventoryErrorCode.INVALID_ITEM, {
        name,
      });
    }
    const size = { width, height };
    assertValidSize(size, `item "${name}" size`);

    this.id = id;
    this.name = name;
    this.size = Object.freeze(size);
  }

  static fromSize(name: string, size: GridSize, id?: ItemId): Item {
    return new Item(name, size.width, size.height, id);
  }

  get area(): number {
    return itemArea(this);
  }

  get longestSide(): number {
    return itemLongestSide(this);
  }

  toString(): string {
    return this.name;
  }
}

export function itemArea(item: InventoryItem): number {
  return item.size.width * item.size.height;
}

export function itemLongestSide(item: InventoryItem): number {
  return Math.max(item.size.width, item.size.height);
}
