/**
 * anchor-scroll - Event Emitter
 * Small, type-safe event dispatch; a throwing handler never breaks the others
 */

import type { EventHandler, EventMap, Logger, Unsubscribe } from "../types";
import { createLogger } from "../core/diagnostics";

/** Internal listener storage */
type Listeners<T extends EventMap> = {
  [K in keyof T]?: Set<EventHandler<T[K]>>;
};

// =============================================================================
// Event Emitter
// =============================================================================

/**
 * Create the emitter behind a controller's `on` / `off` / `once`.
 * Handler failures are reported through `logger`.
 */
export const createEmitter = <T extends EventMap>(
  logger: Logger = createLogger(),
) => {
  const listeners: Listeners<T> = {};

  const off = <K extends keyof T>(
    event: K,
    handler: EventHandler<T[K]>,
  ): void => {
    listeners[event]?.delete(handler);
  };

  const on = <K extends keyof T>(
    event: K,
    handler: EventHandler<T[K]>,
  ): Unsubscribe => {
    let handlers = listeners[event];
    if (!handlers) {
      handlers = new Set();
      listeners[event] = handlers;
    }
    handlers.add(handler);

    return () => off(event, handler);
  };

  // Handlers run in subscription order
  const emit = <K extends keyof T>(event: K, payload: T[K]): void => {
    listeners[event]?.forEach((handler) => {
      try {
        handler(payload);
      } catch (error) {
        logger.error(`Error in event handler for "${String(event)}":`, error);
      }
    });
  };

  /** Unsubscribes before the first call runs */
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

  return {
    on,
    off,
    emit,
    once,
  };
};

/** Event emitter type */
export type Emitter<T extends EventMap> = ReturnType<typeof createEmitter<T>>;
