/**
 * Type Guards - Runtime type validation with type narrowing
 *
 * Each guard returns a type predicate for TypeScript type narrowing, so
 * callers can validate values that cross an API boundary without casts.
 *
 * @example
 * ```typescript
 * if (!isPositiveInteger(width)) {
 *   throw new Error(`width must be a positive integer, got ${width}`);
 * }
 * ```
 */

// =============================================================================
// NUMERIC GUARDS
// =============================================================================

export function isInteger(value: unknown): value is number {
  return typeof value === "number" && Number.isInteger(value);
}

/**
 * Integer strictly greater than zero
 */
export function isPositiveInteger(value: unknown): value is number {
  return isInteger(value) && value > 0;
}

/**
 * Integer greater than or equal to zero
 */
export function isNonNegativeInteger(value: unknown): value is number {
  return isInteger(value) && value >= 0;
}

// =============================================================================
// SHAPE GUARDS
// =============================================================================

/**
 * Integer 2D coordinate
 */
export interface IntPoint {
  readonly x: number;
  readonly y: number;
}

/**
 * Check if value is an object with integer x and y
 *
 * @param value - Value to check
 * @returns true if value has integer x and y properties
 */
export function isGridPosition(value: unknown): value is IntPoint {
  if (!value || typeof value !== "object") return false;
  return "x" in value && "y" in value && isInteger(value.x) && isInteger(value.y);
}
