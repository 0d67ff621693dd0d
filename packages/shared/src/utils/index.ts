/**
 * Utility functions
 */

export * from "./IdGenerator.js";
export * from "./Logger.js";
export * from "./MathUtils.js";
export * from "./SeededRandom.js";
export * from "./typeGuards.js";
