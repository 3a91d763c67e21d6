import { EventEmitter } from 'events';
import { IEventBus, EventHandler } from '../../domain/events/IEventBus';
import { EventName, EventPayload } from '../../domain/events/DomainEvents';
import { ILogger } from '../../domain/common/ILogger';
import { toError } from '../../domain/common/Errors';

/**
 * In-memory event bus implementation using Node.js EventEmitter.
 * Handlers run concurrently and `emit` resolves once all of them settle.
 */
export class InMemoryEventBus implements IEventBus {
  private emitter: EventEmitter;
  private logger: ILogger;

  constructor(logger: ILogger) {
    this.emitter = new EventEmitter();
    this.logger = logger.child({ component: 'event-bus' });
    this.emitter.setMaxListeners(100);
  }

  async emit<K extends EventName>(event: K, data: EventPayload<K>): Promise<void> {
    this.logger.debug(`Event emitted: ${event}`);

    // rawListeners keeps the once() wrappers so one-time handlers unregister themselves
    const listeners = this.emitter.rawListeners(event);

    const promises = listeners.map(async (listener) => {
      try {
        await listener(data);
      } catch (error) {
        this.logger.error(`Error in event handler for ${event}:`, toError(error));
      }
    });

    await Promise.all(promises);
  }

  on<K extends EventName>(event: K, handler: EventHandler<EventPayload<K>>): void {
    this.emitter.on(event, handler);
    this.logger.debug(`Handler registered for: ${event}`);
  }

  off<K extends EventName>(event: K, handler: EventHandler<EventPayload<K>>): void {
    this.emitter.off(event, handler);
    this.logger.debug(`Handler removed for: ${event}`);
  }

  once<K extends EventName>(event: K, handler: EventHandler<EventPayload<K>>): void {
    this.emitter.once(event, handler);
    this.logger.debug(`One-time handler registered for: ${event}`);
  }

  removeAllListeners(event?: EventName): void {
    if (event) {
      this.emitter.removeAllListeners(event);
    } else {
      this.emitter.removeAllListeners();
    }
  }

  listenerCount(event: EventName): number {
    return this.emitter.listenerCount(event);
  }
}
