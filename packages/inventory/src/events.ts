import type { GridPosition, InventoryItem } from "./types.js";

export enum InventoryEventType {
  ITEM_ADDED = "inventory:item-added",
  ITEM_REMOVED = "inventory:item-removed",
  ITEM_MOVED = "inventory:item-moved",
  CLEARED = "inventory:cleared",
}

export interface InventoryItemAddedPayload<T extends InventoryItem> {
  item: T;
  position: GridPosition;
}

export interface InventoryItemRemovedPayload<T extends InventoryItem> {
  item: T;
  /** Anchor the item occupied before it was removed */
  position: GridPosition;
}

export interface InventoryItemMovedPayload<T extends InventoryItem> {
  item: T;
  position: GridPosition;
  from: GridPosition;
}

export type InventoryClearedPayload = Record<string, never>;

export interface InventoryEventMap<T extends InventoryItem> {
  [InventoryEventType.ITEM_ADDED]: InventoryItemAddedPayload<T>;
  [InventoryEventType.ITEM_REMOVED]: InventoryItemRemovedPayload<T>;
  [InventoryEventType.ITEM_MOVED]: InventoryItemMovedPayload<T>;
  [InventoryEventType.CLEARED]: InventoryClearedPayload;
}
