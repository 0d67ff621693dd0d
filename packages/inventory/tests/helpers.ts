import { vi } from "vitest";
import type { GridInventory, GridPosition, InventoryItem } from "../src/index.js";

/**
 * Runs `fn` and returns whatever it threw, or undefined.
 */
export function captureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  return undefined;
}

export function createTestLogger() {
  return {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  };
}

/**
 * Builds the expected `matrix[x][y]` from the placement index alone and
 * fails if two footprints overlap or leave the grid.
 */
export function expectedMatrix<T extends InventoryItem>(inventory: GridInventory<T>): Array<Array<T | null>> {
  const matrix = Array.from({ length: inventory.width }, () => new Array<T | null>(inventory.height).fill(null));

  for (const { item, position } of inventory.placements()) {
    for (let y = position.y; y < position.y + item.size.height; y++) {
      for (let x = position.x; x < position.x + item.size.width; x++) {
        if (x >= inventory.width || y >= inventory.height) {
          throw new Error(`footprint of ${item.id} leaves the grid at (${x}, ${y})`);
        }
        if (matrix[x][y] !== null) {
          throw new Error(`footprints overlap at (${x}, ${y})`);
        }
        matrix[x][y] = item;
      }
    }
  }

  return matrix;
}

export function at(x: number, y: number): GridPosition {
  return { x, y };
}
