import { EventName, EventPayload } from './DomainEvents';

/**
 * Event handler function type.
 */
export type EventHandler<T> = (data: T) => void | Promise<void>;

/**
 * Publish-subscribe bus for domain events inside the foreground process.
 */
export interface IEventBus {
  /**
   * Emit an event and wait for every handler. Handler failures are logged,
   * never thrown back to the emitter.
   */
  emit<K extends EventName>(event: K, data: EventPayload<K>): Promise<void>;

  on<K extends EventName>(event: K, handler: EventHandler<EventPayload<K>>): void;

  off<K extends EventName>(event: K, handler: EventHandler<EventPayload<K>>): void;

  once<K extends EventName>(event: K, handler: EventHandler<EventPayload<K>>): void;

  /**
   * Remove all listeners for an event, or for every event when omitted.
   */
  removeAllListeners(event?: EventName): void;

  listenerCount(event: EventName): number;
}
