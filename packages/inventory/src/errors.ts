import { GridstashError } from "@gridstash/shared";
import type { ErrorContext } from "@gridstash/shared";

/**
 * Error codes for inventory contract violations
 */
export const InventoryErrorCode = {
  /** Grid width or height is not a positive integer */
  INVALID_DIMENSION: "INVALID_DIMENSION",
  /** Item or search size is not a positive integer pair */
  INVALID_SIZE: "INVALID_SIZE",
  /** Item is missing required fields */
  INVALID_ITEM: "INVALID_ITEM",
  /** Position argument is malformed */
  INVALID_POSITION: "INVALID_POSITION",
  /** Asserting lookup found nothing */
  ITEM_NOT_FOUND: "ITEM_NOT_FOUND",
  /** Destination matrix does not match the grid dimensions */
  INVALID_MATRIX: "INVALID_MATRIX",
} as const;

export type InventoryErrorCodeType =
  (typeof InventoryErrorCode)[keyof typeof InventoryErrorCode];

export class InventoryError extends GridstashError {
  declare readonly code: InventoryErrorCodeType;

  constructor(message: string, code: InventoryErrorCodeType, context: ErrorContext = {}) {
    super(message, code, context);
    this.name = "InventoryError";
  }
}

export function isInventoryError(error: unknown, code?: InventoryErrorCodeType): error is InventoryError {
  return error instanceof InventoryError && (code === undefined || error.code === code);
}
