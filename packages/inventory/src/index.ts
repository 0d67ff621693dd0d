/**
 * @gridstash/inventory
 *
 * Bounded 2D grid inventory: overlap-free placement of rectangular items,
 * first-fit free-space search, relocation and compaction.
 *
 * @example
 * ```typescript
 * const inventory = new GridInventory(5, 5);
 * const sword = new Item("Sword", 1, 3);
 * inventory.placeAnywhere(sword);      // true, anchored at (0, 0)
 * inventory.getFootprint(sword);       // [{x:0,y:0}, {x:0,y:1}, {x:0,y:2}]
 * ```
 */

export { GridInventory, compareForPacking, DEFAULT_INVENTORY_NAME } from "./GridInventory.js";
export { Item, itemArea, itemLongestSide } from "./Item.js";
export { InventoryError, InventoryErrorCode, isInventoryError } from "./errors.js";
export type { InventoryErrorCodeType } from "./errors.js";
export { InventoryEventType } from "./events.js";
export type {
  InventoryEventMap,
  InventoryItemAddedPayload,
  InventoryItemRemovedPayload,
  InventoryItemMovedPayload,
  InventoryClearedPayload,
} from "./events.js";
export { formatGrid } from "./formatGrid.js";
export { isValidSize, assertValidSize } from "./validation.js";
export type {
  GridInventoryOptions,
  GridMatrix,
  GridPosition,
  GridSize,
  InitialEntry,
  InventoryItem,
  ItemId,
  ItemPlacement,
  ReorganizeResult,
} from "./types.js";
