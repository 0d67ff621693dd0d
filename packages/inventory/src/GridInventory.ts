/**
 * GridInventory - bounded 2D grid of variable-sized rectangular items
 *
 * Owns a fixed `width × height` occupancy grid and the item → anchor index.
 * Every query and mutation goes through this class so the two stay
 * consistent:
 * - every cell of a placed item's footprint references that item,
 * - no two footprints intersect,
 * - an item is indexed iff its whole footprint is stamped.
 *
 * Contract violations (bad dimensions, bad sizes, malformed positions,
 * asserting lookups that miss) throw {@link InventoryError}. Expected
 * negative outcomes (occupied, out of bounds, absent, no room) come back as
 * `false` or `null`.
 *
 * Notifications are synchronous and fire after the mutation completes.
 */

import { EventBus, SystemLogger, isGridPosition, isInRange } from "@gridstash/shared";
import type { EventHandler, EventSubscription, ILogger, SystemEvent } from "@gridstash/shared";
import { InventoryError, InventoryErrorCode } from "./errors.js";
import { InventoryEventType } from "./events.js";
import type { InventoryEventMap } from "./events.js";
import { formatGrid } from "./formatGrid.js";
import { Item, itemArea, itemLongestSide } from "./Item.js";
import type {
  GridInventoryOptions,
  GridMatrix,
  GridPosition,
  GridSize,
  InitialEntry,
  InventoryItem,
  ItemPlacement,
  ReorganizeResult,
} from "./types.js";
import {
  assertValidDimensions,
  assertValidSize,
  isIntegerPosition,
  resolvePosition,
} from "./validation.js";

export const DEFAULT_INVENTORY_NAME = "inventory";

function isItemPlacement<T extends InventoryItem>(entry: InitialEntry<T>): entry is ItemPlacement<T> {
  return "item" in entry && "position" in entry;
}

/**
 * Packing order used by {@link GridInventory.reorganizeSpace}: larger area
 * first, then longer side first. Array.prototype.sort is stable, so ties
 * keep their current order.
 */
export function compareForPacking(a: InventoryItem, b: InventoryItem): number {
  return itemArea(b) - itemArea(a) || itemLongestSide(b) - itemLongestSide(a);
}

export class GridInventory<T extends InventoryItem = Item> implements Iterable<T> {
  readonly width: number;
  readonly height: number;

  /** Row-major cells: index = y * width + x */
  private readonly cells: Array<T | null>;
  private readonly placementsById = new Map<string, ItemPlacement<T>>();
  private readonly events: EventBus<InventoryEventMap<T>>;
  private readonly logger: ILogger;
  private readonly name: string;

  constructor(
    width: number,
    height: number,
    initialItems?: Iterable<InitialEntry<T>>,
    options: GridInventoryOptions = {},
  ) {
    assertValidDimensions(width, height);

    this.width = width;
    this.height = height;
    this.cells = new Array<T | null>(width * height).fill(null);
    this.name = options.name ?? DEFAULT_INVENTORY_NAME;
    this.logger = options.logger ?? new SystemLogger("GridInventory");
    this.events = new EventBus<InventoryEventMap<T>>({ maxHistorySize: options.eventHistorySize });

    if (initialItems) {
      this.seed(initialItems);
    }
  }

  get count(): number {
    return this.placementsById.size;
  }

  get isEmpty(): boolean {
    return this.placementsById.size === 0;
  }

  // ===========================================================================
  // PLACEMENT
  // ===========================================================================

  /**
   * True iff `item` is absent and its footprint at the given anchor lies in
   * bounds over empty cells. Throws if the item's size is not positive.
   */
  canPlace(item: T | null | undefined, position: GridPosition): boolean;
  canPlace(item: T | null | undefined, x: number, y: number): boolean;
  canPlace(item: T | null | undefined, xOrPosition: number | GridPosition, y?: number): boolean {
    return this.canPlaceAt(item, resolvePosition(xOrPosition, y));
  }

  place(item: T | null | undefined, position: GridPosition): boolean;
  place(item: T | null | undefined, x: number, y: number): boolean;
  place(item: T | null | undefined, xOrPosition: number | GridPosition, y?: number): boolean {
    return this.placeAt(item, resolvePosition(xOrPosition, y));
  }

  canPlaceAnywhere(item: T | null | undefined): boolean {
    if (!item) return false;
    assertValidSize(item.size, `item "${item.name}" size`);
    if (this.contains(item)) return false;
    return this.findFreePosition(item.size) !== null;
  }

  placeAnywhere(item: T | null | undefined): boolean {
    if (!item) return false;
    assertValidSize(item.size, `item "${item.name}" size`);
    if (this.contains(item)) return false;

    const position = this.findFreePosition(item.size);
    if (!position) return false;
    return this.placeAt(item, position);
  }

  /**
   * First anchor, scanning rows top to bottom and each row left to right,
   * whose footprint is in bounds and empty. `null` when nothing fits.
   */
  findFreePosition(size: GridSize): GridPosition | null {
    assertValidSize(size);
    if (size.width > this.width || size.height > this.height) return null;

    for (let y = 0; y <= this.height - size.height; y++) {
      for (let x = 0; x <= this.width - size.width; x++) {
        if (this.isAreaFree(x, y, size)) {
          return { x, y };
        }
      }
    }

    return null;
  }

  // ===========================================================================
  // QUERIES
  // ===========================================================================

  contains(item: T | null | undefined): boolean {
    if (!item) return false;
    return this.placementsById.has(item.id);
  }

  /**
   * Out-of-bounds cells are never free.
   */
  isFree(position: GridPosition): boolean;
  isFree(x: number, y: number): boolean;
  isFree(xOrPosition: number | GridPosition, y?: number): boolean {
    const { x, y: row } = resolvePosition(xOrPosition, y);
    const index = this.cellIndex(x, row);
    return index !== null && this.cells[index] === null;
  }

  isOccupied(position: GridPosition): boolean;
  isOccupied(x: number, y: number): boolean;
  isOccupied(xOrPosition: number | GridPosition, y?: number): boolean {
    const { x, y: row } = resolvePosition(xOrPosition, y);
    const index = this.cellIndex(x, row);
    return index === null || this.cells[index] !== null;
  }

  /**
   * Item covering the cell, or `null` for an empty or out-of-bounds cell.
   */
  tryGetItemAt(position: GridPosition): T | null;
  tryGetItemAt(x: number, y: number): T | null;
  tryGetItemAt(xOrPosition: number | GridPosition, y?: number): T | null {
    const { x, y: row } = resolvePosition(xOrPosition, y);
    const index = this.cellIndex(x, row);
    return index === null ? null : this.cells[index];
  }

  getItemAt(position: GridPosition): T;
  getItemAt(x: number, y: number): T;
  getItemAt(xOrPosition: number | GridPosition, y?: number): T {
    const position = resolvePosition(xOrPosition, y);
    const item = this.tryGetItemAt(position);
    if (item === null) {
      throw new InventoryError(
        `no item at (${position.x}, ${position.y})`,
        InventoryErrorCode.ITEM_NOT_FOUND,
        { x: position.x, y: position.y },
      );
    }
    return item;
  }

  tryGetPosition(item: T | null | undefined): GridPosition | null {
    if (!item) return null;
    return this.placementsById.get(item.id)?.position ?? null;
  }

  getPosition(item: T): GridPosition {
    const position = this.tryGetPosition(item);
    if (position === null) {
      throw this.notFound(item);
    }
    return position;
  }

  /**
   * Every cell the item covers, row by row within its bounds, or `null`
   * when the item is not placed.
   */
  tryGetFootprint(item: T | null | undefined): GridPosition[] | null {
    if (!item) return null;
    const placement = this.placementsById.get(item.id);
    if (!placement) return null;
    return footprintOf(placement.position, placement.item.size);
  }

  getFootprint(item: T): GridPosition[] {
    const footprint = this.tryGetFootprint(item);
    if (footprint === null) {
      throw this.notFound(item);
    }
    return footprint;
  }

  countByName(name: string): number {
    let count = 0;
    for (const { item } of this.placementsById.values()) {
      if (item.name === name) count++;
    }
    return count;
  }

  // ===========================================================================
  // MUTATION
  // ===========================================================================

  remove(item: T | null | undefined): boolean {
    return this.removeWithPosition(item) !== null;
  }

  /**
   * Removes the item and returns the anchor it occupied, or `null` if it
   * was not placed.
   */
  removeWithPosition(item: T | null | undefined): GridPosition | null {
    if (!item) return null;
    const placement = this.placementsById.get(item.id);
    if (!placement) return null;

    this.fill(placement.position, placement.item.size, null);
    this.placementsById.delete(item.id);

    this.logger.debug("Removed item", this.logContext(placement.item, placement.position));
    this.events.emitEvent(
      InventoryEventType.ITEM_REMOVED,
      { item: placement.item, position: placement.position },
      this.name,
    );
    return placement.position;
  }

  /**
   * Relocates a placed item. Its own current footprint does not block the
   * move; any other item or the grid edge does, in which case nothing
   * changes and `false` is returned.
   */
  moveItem(item: T | null | undefined, position: GridPosition): boolean;
  moveItem(item: T | null | undefined, x: number, y: number): boolean;
  moveItem(item: T | null | undefined, xOrPosition: number | GridPosition, y?: number): boolean {
    const to = resolvePosition(xOrPosition, y);
    if (!item) return false;
    const placement = this.placementsById.get(item.id);
    if (!placement) return false;

    const moving = placement.item;
    if (!this.isAreaFree(to.x, to.y, moving.size, moving.id)) return false;

    const from = placement.position;
    this.fill(from, moving.size, null);
    this.fill(to, moving.size, moving);
    this.placementsById.set(moving.id, { item: moving, position: to });

    this.logger.debug("Moved item", { ...this.logContext(moving, to), fromX: from.x, fromY: from.y });
    this.events.emitEvent(InventoryEventType.ITEM_MOVED, { item: moving, position: to, from }, this.name);
    return true;
  }

  /**
   * Empties the grid. Emits a single cleared notification, and nothing at
   * all when the inventory is already empty.
   */
  clear(): void {
    if (this.placementsById.size === 0) return;

    const removed = this.placementsById.size;
    this.cells.fill(null);
    this.placementsById.clear();

    this.logger.debug("Cleared inventory", { inventory: this.name, removed });
    this.events.emitEvent(InventoryEventType.CLEARED, {}, this.name);
  }

  /**
   * Repacks every item toward the top-left: items are ordered by
   * {@link compareForPacking} and re-inserted with the same first-fit search
   * as {@link findFreePosition}.
   *
   * First-fit can fail to rebuild an arrangement that was placed by hand.
   * Items that no longer fit are removed and returned in `dropped`; each one
   * gets an item-removed notification. Items whose anchor changed get an
   * item-moved notification.
   */
  reorganizeSpace(): ReorganizeResult<T> {
    const ordered = [...this.placementsById.values()].sort((a, b) => compareForPacking(a.item, b.item));

    this.cells.fill(null);
    this.placementsById.clear();

    const placed: ItemPlacement<T>[] = [];
    const moved: Array<{ item: T; position: GridPosition; from: GridPosition }> = [];
    const dropped: ItemPlacement<T>[] = [];

    for (const previous of ordered) {
      const { item } = previous;
      const position = this.findFreePosition(item.size);
      if (!position) {
        dropped.push(previous);
        continue;
      }

      this.fill(position, item.size, item);
      const placement = { item, position };
      this.placementsById.set(item.id, placement);
      placed.push(placement);

      if (position.x !== previous.position.x || position.y !== previous.position.y) {
        moved.push({ item, position, from: previous.position });
      }
    }

    if (dropped.length > 0) {
      this.logger.warn("Reorganize could not re-fit items; they were removed", {
        inventory: this.name,
        dropped: dropped.map(({ item }) => item.id),
      });
    }

    for (const event of moved) {
      this.events.emitEvent(InventoryEventType.ITEM_MOVED, event, this.name);
    }
    for (const { item, position } of dropped) {
      this.events.emitEvent(InventoryEventType.ITEM_REMOVED, { item, position }, this.name);
    }

    return { placed, dropped: dropped.map(({ item }) => item) };
  }

  // ===========================================================================
  // SNAPSHOTS & ITERATION
  // ===========================================================================

  /**
   * Fills a caller-owned `matrix[x][y]` (exactly `width` columns of
   * `height` cells) with the current occupancy.
   */
  copyGridTo(matrix: GridMatrix<T>): void {
    if (!this.matchesShape(matrix)) {
      throw new InventoryError(
        `matrix must be ${this.width} columns of ${this.height} cells`,
        InventoryErrorCode.INVALID_MATRIX,
        {
          expectedWidth: this.width,
          expectedHeight: this.height,
          actualWidth: Array.isArray(matrix) ? matrix.length : -1,
        },
      );
    }

    for (let x = 0; x < this.width; x++) {
      const column = matrix[x];
      for (let y = 0; y < this.height; y++) {
        column[y] = this.cells[y * this.width + x];
      }
    }
  }

  toMatrix(): GridMatrix<T> {
    return Array.from({ length: this.width }, (_, x) =>
      Array.from({ length: this.height }, (_, y) => this.cells[y * this.width + x]),
    );
  }

  *[Symbol.iterator](): Iterator<T> {
    for (const { item } of this.placementsById.values()) {
      yield item;
    }
  }

  *items(): IterableIterator<T> {
    yield* this;
  }

  *placements(): IterableIterator<ItemPlacement<T>> {
    yield* this.placementsById.values();
  }

  toString(): string {
    return formatGrid(this.toMatrix());
  }

  // ===========================================================================
  // NOTIFICATIONS
  // ===========================================================================

  subscribe<K extends InventoryEventType>(type: K, handler: EventHandler<InventoryEventMap<T>[K]>): EventSubscription {
    return this.events.subscribe(type, handler);
  }

  subscribeOnce<K extends InventoryEventType>(
    type: K,
    handler: EventHandler<InventoryEventMap<T>[K]>,
  ): EventSubscription {
    return this.events.subscribeOnce(type, handler);
  }

  getEventHistory(type?: InventoryEventType): SystemEvent<InventoryEventMap<T>[InventoryEventType]>[] {
    return this.events.getEventHistory(type);
  }

  /**
   * Drops every subscription and the event history.
   */
  dispose(): void {
    this.events.cleanup();
  }

  // ===========================================================================
  // INTERNALS
  // ===========================================================================

  private seed(entries: Iterable<InitialEntry<T>>): void {
    for (const entry of entries) {
      if (!entry) continue;

      let added: boolean;
      let label: string;
      if (isItemPlacement(entry)) {
        label = entry.item?.id ?? "unknown";
        added = isGridPosition(entry.position) && this.placeAt(entry.item, entry.position);
      } else {
        label = entry.id;
        added = this.placeAnywhere(entry);
      }

      if (!added) {
        this.logger.debug("Skipped initial item", { inventory: this.name, item: label });
      }
    }
  }

  private canPlaceAt(item: T | null | undefined, position: GridPosition): boolean {
    if (!item) return false;
    assertValidSize(item.size, `item "${item.name}" size`);
    if (this.contains(item)) return false;
    return this.isAreaFree(position.x, position.y, item.size);
  }

  private placeAt(item: T | null | undefined, position: GridPosition): boolean {
    if (!item || !this.canPlaceAt(item, position)) return false;

    const anchor = { x: position.x, y: position.y };
    this.fill(anchor, item.size, item);
    this.placementsById.set(item.id, { item, position: anchor });

    this.logger.debug("Placed item", this.logContext(item, anchor));
    this.events.emitEvent(InventoryEventType.ITEM_ADDED, { item, position: anchor }, this.name);
    return true;
  }

  /**
   * Footprint in bounds and every covered cell empty (or held by `ignoreId`).
   */
  private isAreaFree(x: number, y: number, size: GridSize, ignoreId?: string): boolean {
    if (!isIntegerPosition({ x, y })) return false;
    if (!isInRange(x, 0, this.width - size.width) || !isInRange(y, 0, this.height - size.height)) {
      return false;
    }

    for (let row = y; row < y + size.height; row++) {
      for (let col = x; col < x + size.width; col++) {
        const occupant = this.cells[row * this.width + col];
        if (occupant !== null && occupant.id !== ignoreId) return false;
      }
    }

    return true;
  }

  private fill(position: GridPosition, size: GridSize, value: T | null): void {
    for (let row = position.y; row < position.y + size.height; row++) {
      for (let col = position.x; col < position.x + size.width; col++) {
        this.cells[row * this.width + col] = value;
      }
    }
  }

  private cellIndex(x: number, y: number): number | null {
    if (!isIntegerPosition({ x, y })) return null;
    if (!isInRange(x, 0, this.width - 1) || !isInRange(y, 0, this.height - 1)) return null;
    return y * this.width + x;
  }

  /**
   * Indexed so that holes in a sparse array count as missing columns.
   */
  private matchesShape(matrix: GridMatrix<T>): boolean {
    if (!Array.isArray(matrix) || matrix.length !== this.width) return false;
    for (let x = 0; x < this.width; x++) {
      const column = matrix[x];
      if (!Array.isArray(column) || column.length !== this.height) return false;
    }
    return true;
  }

  private notFound(item: T): InventoryError {
    return new InventoryError(
      `item "${item.name}" (${item.id}) is not in the inventory`,
      InventoryErrorCode.ITEM_NOT_FOUND,
      { item: item.id, name: item.name },
    );
  }

  private logContext(item: T, position: GridPosition): Record<string, unknown> {
    return { inventory: this.name, item: item.id, name: item.name, x: position.x, y: position.y };
  }
}

function footprintOf(position: GridPosition, size: GridSize): GridPosition[] {
  const cells: GridPosition[] = [];
  for (let y = position.y; y < position.y + size.height; y++) {
    for (let x = position.x; x < position.x + size.width; x++) {
      cells.push({ x, y });
    }
  }
  return cells;
}
