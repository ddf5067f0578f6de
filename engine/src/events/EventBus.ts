/**
 * EventBus - pub/sub for engine progress events
 *
 * - Typed: handlers for a given event type receive that event's payload
 * - Error-isolated: a throwing or rejecting handler is logged and never
 *   affects other handlers or the run that emitted the event
 * - Non-blocking: emit() does not wait for async handlers
 *
 * @example
 * ```ts
 * const bus = new EventBus();
 * bus.on(EngineEventType.NODE_STATUS_CHANGED, (event) => {
 *   console.log(event.payload.nodeId, event.payload.to);
 * });
 * bus.onAny((event) => logger.debug(event.type));
 * ```
 */

import { createSilentLogger, type EngineLogger } from '../core/EngineLogger.js';
import { isEventOfType, type EngineEvent, type EngineEventType } from './EngineEvents.js';

export type EventHandler<E> = (event: E) => void | Promise<void>;

export class EventBus {
  private listeners: Map<EngineEventType, Set<EventHandler<EngineEvent>>> = new Map();
  private wildcardListeners: Set<EventHandler<EngineEvent>> = new Set();
  private readonly logger: EngineLogger;

  constructor(logger: EngineLogger = createSilentLogger()) {
    this.logger = logger;
  }

  /**
   * Subscribe to one event type
   *
   * @returns Unsubscribe function
   */
  on<K extends EngineEventType>(eventType: K, handler: EventHandler<EngineEvent<K>>): () => void {
    const wrapped: EventHandler<EngineEvent> = event =>
      isEventOfType(event, eventType) ? handler(event) : undefined;

    let handlers = this.listeners.get(eventType);
    if (!handlers) {
      handlers = new Set();
      this.listeners.set(eventType, handlers);
    }
    handlers.add(wrapped);

    return () => {
      this.listeners.get(eventType)?.delete(wrapped);
    };
  }

  /**
   * Subscribe to every event
   */
  onAny(handler: EventHandler<EngineEvent>): () => void {
    this.wildcardListeners.add(handler);
    return () => {
      this.wildcardListeners.delete(handler);
    };
  }

  /**
   * Fire once, then unsubscribe
   */
  once<K extends EngineEventType>(eventType: K, handler: EventHandler<EngineEvent<K>>): () => void {
    const unsubscribe = this.on(eventType, event => {
      unsubscribe();
      return handler(event);
    });
    return unsubscribe;
  }

  /**
   * Deliver an event to its handlers, then to wildcard handlers, in
   * registration order.
   */
  emit<K extends EngineEventType>(event: EngineEvent<K>): void {
    const handlers = [...(this.listeners.get(event.type) ?? []), ...this.wildcardListeners];

    for (const handler of handlers) {
      try {
        const result = handler(event);
        if (result instanceof Promise) {
          result.catch((error: unknown) => this.reportHandlerError(event.type, error));
        }
      } catch (error) {
        this.reportHandlerError(event.type, error);
      }
    }
  }

  /**
   * Remove handlers for one event type, or all handlers
   */
  off(eventType?: EngineEventType): void {
    if (eventType) {
      this.listeners.delete(eventType);
      return;
    }
    this.listeners.clear();
    this.wildcardListeners.clear();
  }

  listenerCount(eventType: EngineEventType): number {
    return (this.listeners.get(eventType)?.size ?? 0) + this.wildcardListeners.size;
  }

  private reportHandlerError(eventType: EngineEventType, error: unknown): void {
    this.logger.error(`Event handler failed for "${eventType}"`, error, { eventType });
  }
}
