/**
 * Core math utilities for grid calculations
 */

/**
 * Check whether a value lies in [min, max], inclusive on both ends.
 */
export function isInRange(value: number, min: number, max: number): boolean {
  return value >= min && value <= max;
}

/**
 * Clamp a value between min and max
 */
export function clamp(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, value));
}
