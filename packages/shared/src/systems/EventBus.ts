/**
 * Event System
 *
 * Type-safe, synchronous event bus keyed by an event map
 * (event type → payload type). Handlers receive the payload wrapped in a
 * {@link SystemEvent} envelope.
 */

import { EventEmitter } from "eventemitter3";
import { clamp } from "../utils/MathUtils.js";

export interface SystemEvent<T = unknown> {
  type: string;
  data: T;
  source: string;
  timestamp: number;
  id: string;
}

export type EventHandler<T> = (event: SystemEvent<T>) => void;

export interface EventSubscription {
  unsubscribe(): void;
  readonly active: boolean;
}

export interface EventBusOptions {
  /** How many emitted events to retain for debugging; 0 disables history */
  maxHistorySize?: number;
}

export const DEFAULT_EVENT_HISTORY_SIZE = 100;
export const MAX_EVENT_HISTORY_SIZE = 10000;

/**
 * Type-safe event bus
 */
export class EventBus<TEvents extends object> extends EventEmitter {
  private subscriptionCounter = 0;
  private activeSubscriptions = new Map<string, EventSubscription>();
  private eventHistory: SystemEvent<TEvents[keyof TEvents]>[] = [];
  private readonly maxHistorySize: number;

  constructor(options: EventBusOptions = {}) {
    super();
    this.maxHistorySize = clamp(
      Math.floor(options.maxHistorySize ?? DEFAULT_EVENT_HISTORY_SIZE),
      0,
      MAX_EVENT_HISTORY_SIZE,
    );
  }

  /**
   * Emit a typed event
   */
  emitEvent<K extends keyof TEvents & string>(
    type: K,
    data: TEvents[K],
    source: string = "unknown",
  ): SystemEvent<TEvents[K]> {
    const event: SystemEvent<TEvents[K]> = {
      type,
      data,
      source,
      timestamp: Date.now(),
      id: `${source}-${type}-${++this.subscriptionCounter}`,
    };

    if (this.maxHistorySize > 0) {
      this.eventHistory.push(event);
      if (this.eventHistory.length > this.maxHistorySize) {
        this.eventHistory.shift();
      }
    }

    this.emit(type, event);
    return event;
  }

  /**
   * Subscribe to typed events
   */
  subscribe<K extends keyof TEvents & string>(
    type: K,
    handler: EventHandler<TEvents[K]>,
    once: boolean = false,
  ): EventSubscription {
    const subscriptionId = `sub-${++this.subscriptionCounter}`;
    let active = true;

    const wrappedHandler = (event: SystemEvent<TEvents[K]>) => {
      if (!active) return;
      if (once) {
        subscription.unsubscribe();
      }
      handler(event);
    };

    this.on(type, wrappedHandler);

    const subscription: EventSubscription = {
      unsubscribe: () => {
        if (!active) return;
        active = false;
        this.off(type, wrappedHandler);
        this.activeSubscriptions.delete(subscriptionId);
      },
      get active() {
        return active;
      },
    };

    this.activeSubscriptions.set(subscriptionId, subscription);
    return subscription;
  }

  /**
   * Subscribe to an event only once
   */
  subscribeOnce<K extends keyof TEvents & string>(
    type: K,
    handler: EventHandler<TEvents[K]>,
  ): EventSubscription {
    return this.subscribe(type, handler, true);
  }

  /**
   * Get event history for debugging
   */
  getEventHistory(filterByType?: keyof TEvents & string): SystemEvent<TEvents[keyof TEvents]>[] {
    if (filterByType) {
      return this.eventHistory.filter((event) => event.type === filterByType);
    }
    return [...this.eventHistory];
  }

  getActiveSubscriptionCount(): number {
    return this.activeSubscriptions.size;
  }

  /**
   * Cleanup all subscriptions
   */
  cleanup(): void {
    this.activeSubscriptions.forEach((subscription) => {
      subscription.unsubscribe();
    });
    this.activeSubscriptions.clear();
    this.eventHistory.length = 0;
    this.removeAllListeners();
  }
}
