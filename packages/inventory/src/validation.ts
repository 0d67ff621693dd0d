/**
 * Contract checks. Each throws an InventoryError and narrows on success.
 */

import { isInteger, isPositiveInteger } from "@gridstash/shared";
import { InventoryError, InventoryErrorCode } from "./errors.js";
import type { GridPosition, GridSize } from "./types.js";

export function isValidSize(size: unknown): size is GridSize {
  if (!size || typeof size !== "object") return false;
  return (
    "width" in size &&
    "height" in size &&
    isPositiveInteger(size.width) &&
    isPositiveInteger(size.height)
  );
}

export function assertValidSize(size: unknown, field: string = "size"): asserts size is GridSize {
  if (isValidSize(size)) return;
  const width = size && typeof size === "object" && "width" in size ? String(size.width) : "undefined";
  const height = size && typeof size === "object" && "height" in size ? String(size.height) : "undefined";
  throw new InventoryError(
    `${field} must have positive integer width and height, got ${width}x${height}`,
    InventoryErrorCode.INVALID_SIZE,
    { field, width, height },
  );
}

/** Largest cell count a JavaScript array can hold */
export const MAX_GRID_CELLS = 2 ** 32 - 1;

export function assertValidDimensions(width: number, height: number): void {
  if (!isPositiveInteger(width)) {
    throw new InventoryError(
      `width must be a positive integer, got ${width}`,
      InventoryErrorCode.INVALID_DIMENSION,
      { width },
    );
  }
  if (!isPositiveInteger(height)) {
    throw new InventoryError(
      `height must be a positive integer, got ${height}`,
      InventoryErrorCode.INVALID_DIMENSION,
      { height },
    );
  }
  if (width * height > MAX_GRID_CELLS) {
    throw new InventoryError(
      `grid of ${width}x${height} exceeds ${MAX_GRID_CELLS} cells`,
      InventoryErrorCode.INVALID_DIMENSION,
      { width, height },
    );
  }
}

/**
 * Normalises the `(x, y)` / `(position)` argument pair used across the
 * inventory API. Non-integer coordinates pass through; they simply never
 * fall inside the grid.
 */
export function resolvePosition(xOrPosition: number | GridPosition, y: number | undefined): GridPosition {
  if (typeof xOrPosition === "number") {
    if (typeof y !== "number") {
      throw new InventoryError(
        "y coordinate is required when x is given as a number",
        InventoryErrorCode.INVALID_POSITION,
        { x: xOrPosition },
      );
    }
    return { x: xOrPosition, y };
  }
  if (!xOrPosition || typeof xOrPosition !== "object" || typeof xOrPosition.x !== "number" || typeof xOrPosition.y !== "number") {
    throw new InventoryError(
      "position must be an object with numeric x and y",
      InventoryErrorCode.INVALID_POSITION,
    );
  }
  return { x: xOrPosition.x, y: xOrPosition.y };
}

export function isIntegerPosition(position: GridPosition): boolean {
  return isInteger(position.x) && isInteger(position.y);
}
