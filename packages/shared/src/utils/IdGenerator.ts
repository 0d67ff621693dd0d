/**
 * ID Generation Utilities
 *
 * Provides unique ID generation for items and other handles.
 */

import { customAlphabet } from "nanoid";

const ALPHABET =
  "1234567890abcdefghijklmnopqrstuvwxyzABCDEFGHIJKLMNOPQRSTUVWXYZ";

export const ID_LENGTH = 10;

/**
 * Generates a unique 10-character alphanumeric ID
 *
 * Collision probability: ~1% chance after 129 million IDs
 * See: https://zelark.github.io/nano-id-cc/
 *
 * @example
 * const itemId = uuid() // => "a3B9xK7m2Q"
 */
export const uuid = customAlphabet(ALPHABET, ID_LENGTH);

const ID_PATTERN = new RegExp(`^[0-9a-zA-Z]{${ID_LENGTH}}$`);

/**
 * True if the value has the shape produced by {@link uuid}.
 */
export function isGeneratedId(value: unknown): value is string {
  return typeof value === "string" && ID_PATTERN.test(value);
}
