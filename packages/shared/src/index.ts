/**
 * index.ts - @gridstash/shared Package Entry Point
 *
 * Cross-package building blocks:
 *
 * 1. Logging: Logger singleton, SystemLogger, ILogger
 * 2. Events: EventBus, SystemEvent, EventSubscription
 * 3. Errors: GridstashError
 * 4. Utilities: uuid, isInRange, clamp, SeededRandom, numeric type guards
 */

export {
  EventBus,
  DEFAULT_EVENT_HISTORY_SIZE,
  MAX_EVENT_HISTORY_SIZE,
} from "./systems/EventBus.js";
export type {
  SystemEvent,
  EventHandler,
  EventSubscription,
  EventBusOptions,
} from "./systems/EventBus.js";

export { GridstashError, isGridstashError } from "./types/errors.js";
export type { ErrorContext } from "./types/errors.js";

export * from "./utils/index.js";
