import type { ILogger } from "@gridstash/shared";

/**
 * 0-based grid coordinate; x grows to the right, y grows downwards.
 */
export interface GridPosition {
  readonly x: number;
  readonly y: number;
}

export interface GridSize {
  readonly width: number;
  readonly height: number;
}

export type ItemId = string;

/**
 * Anything the inventory can hold. Placements are keyed by `id`, so two
 * objects sharing an id count as the same item.
 */
export interface InventoryItem {
  readonly id: ItemId;
  readonly name: string;
  readonly size: GridSize;
}

/** An item together with its anchor (top-left cell) */
export interface ItemPlacement<T extends InventoryItem = InventoryItem> {
  readonly item: T;
  readonly position: GridPosition;
}

/** Seed entry: a bare item to auto-place, or an item with an explicit anchor */
export type InitialEntry<T extends InventoryItem> = T | ItemPlacement<T>;

/**
 * Column-major occupancy snapshot: `matrix[x][y]`, `width` columns of
 * `height` cells each.
 */
export type GridMatrix<T> = Array<Array<T | null>>;

export interface ReorganizeResult<T extends InventoryItem> {
  /** Items that were re-inserted, with their new anchors, in packing order */
  placed: ItemPlacement<T>[];
  /** Items that no longer fitted and were taken out of the inventory */
  dropped: T[];
}

export interface GridInventoryOptions {
  /** Defaults to a SystemLogger named "GridInventory" */
  logger?: ILogger;
  /** Label used as the event source and in log lines */
  name?: string;
  /** Emitted events retained for debugging; 0 disables history */
  eventHistorySize?: number;
}
