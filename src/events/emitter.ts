/**
 * rowscroll - Event Emitter
 * Type-safe event system; a throwing handler is reported, never propagated
 */

import type { EventHandler, Unsubscribe, EventMap } from "../types";
import type { Logger } from "../logger";

/** Internal listener storage */
type Listeners<T extends EventMap> = {
  [K in keyof T]?: Set<EventHandler<T[K]>>;
};

// =============================================================================
// Event Emitter
// =============================================================================

/**
 * Create a type-safe event emitter.
 * Handler errors go to `logger.error` so a faulty listener cannot abort
 * a layout pass.
 */
export const createEmitter = <T extends EventMap>(logger: Logger) => {
  const listeners: Listeners<T> = {};

  const on = <K extends keyof T>(
    event: K,
    handler: EventHandler<T[K]>,
  ): Unsubscribe => {
    const set = listeners[event] ?? new Set<EventHandler<T[K]>>();
    set.add(handler);
    listeners[event] = set;

    return () => off(event, handler);
  };

  const off = <K extends keyof T>(
    event: K,
    handler: EventHandler<T[K]>,
  ): void => {
    listeners[event]?.delete(handler);
  };

  const emit = <K extends keyof T>(event: K, payload: T[K]): void => {
    // Copy so handlers may unsubscribe while being notified
    const handlers = listeners[event];
    if (!handlers || handlers.size === 0) return;

    for (const handler of [...handlers]) {
      try {
        handler(payload);
      } catch (error) {
        logger.error(`Error in event handler for "${String(event)}":`, error);
      }
    }
  };

  /** Detaches itself before the handler runs, so a re-emit inside it is not seen */
  const once = <K extends keyof T>(
    event: K,
    handler: EventHandler<T[K]>,
  ): Unsubscribe => {
    const onceHandler: EventHandler<T[K]> = (payload) => {
      off(event, onceHandler);
      handler(payload);
    };
    return on(event, onceHandler);
  };

  const clear = <K extends keyof T>(event?: K): void => {
    if (event !== undefined) {
      delete listeners[event];
      return;
    }
    for (const key in listeners) {
      delete listeners[key];
    }
  };

  const listenerCount = <K extends keyof T>(event: K): number =>
    listeners[event]?.size ?? 0;

  return {
    on,
    off,
    emit,
    once,
    clear,
    listenerCount,
  };
};

/** Event emitter type */
export type Emitter<T extends EventMap> = ReturnType<typeof createEmitter<T>>;
