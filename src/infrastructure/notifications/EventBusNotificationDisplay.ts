import { ILogger } from '../../domain/common/ILogger';
import { IEventBus } from '../../domain/events/IEventBus';
import { INotificationDisplay } from '../../domain/services/INotificationDisplay';
import { NotificationRequest } from '../../types';

/**
 * Notification surface for a headless server: notifications are published
 * on the event bus, which the WebSocket bridge forwards to connected clients.
 */
export class EventBusNotificationDisplay implements INotificationDisplay {
  private readonly logger: ILogger;
  private readonly visible = new Map<number, NotificationRequest>();

  constructor(private readonly eventBus: IEventBus, logger: ILogger) {
    this.logger = logger.child({ component: 'notifications' });
  }

  async show(request: NotificationRequest): Promise<void> {
    this.visible.set(request.id, request);
    this.logger.info(`Notification: ${request.title}`, { id: request.id, body: request.body });
    await this.eventBus.emit('notification:shown', request);
  }

  async cancel(id: number): Promise<void> {
    if (!this.visible.delete(id)) {
      this.logger.debug('Cancel for a notification that is not shown', { id });
    }
    await this.eventBus.emit('notification:cancelled', { id });
  }

  /**
   * Notifications shown and not yet cancelled, oldest first.
   */
  list(): NotificationRequest[] {
    return [...this.visible.values()];
  }
}
