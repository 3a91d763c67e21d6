import { z } from 'zod';
import { ILogger } from '../../domain/common/ILogger';
import { toError } from '../../domain/common/Errors';
import { Clock, systemClock } from '../../domain/common/Clock';
import { IMailboxDirectory, MailboxReceiver } from '../../domain/services/IMailboxDirectory';
import { AckOutcome, GeofenceEvent } from '../../types';

export const GEOFENCE_EVENT_PORT = 'geofence-event-port';
export const NOTIFICATION_HISTORY_PORT = 'notification-history-port';

export function ackMailboxName(notificationId: number): string {
  return `geofence-ack-${notificationId}`;
}

const geoPointSchema = z.object({
  latitude: z.number(),
  longitude: z.number(),
});

export const triggerAnnouncementSchema = z.object({
  kind: z.literal('geofence-trigger'),
  event: z.enum(['enter', 'exit']),
  geofenceIds: z.array(z.string()),
  location: geoPointSchema.nullable(),
  notificationId: z.number().int(),
  ackMailbox: z.string(),
  sentAt: z.number(),
});

export type TriggerAnnouncement = z.infer<typeof triggerAnnouncementSchema>;

export const triggerAckSchema = z.object({
  notificationId: z.number().int(),
  outcome: z.enum(['queued', 'preempt']),
});

export type TriggerAck = z.infer<typeof triggerAckSchema>;

export const historyRecordedSchema = z.object({
  kind: z.literal('notification-recorded'),
  notificationId: z.number().int(),
  geofenceIds: z.array(z.string()),
  recorded: z.number().int(),
});

export type HistoryRecordedMessage = z.infer<typeof historyRecordedSchema>;

export type AnnouncementHandler = (announcement: TriggerAnnouncement) => Promise<void>;
export type HistoryRecordedHandler = (message: HistoryRecordedMessage) => Promise<void>;

/**
 * Foreground/background protocol over the mailbox directory. The background
 * side announces triggers and waits briefly for an ack; the foreground side
 * listens on the well-known ports.
 */
export class GeofenceEventChannel {
  private readonly logger: ILogger;
  private listeners: MailboxReceiver[] = [];

  constructor(
    private readonly directory: IMailboxDirectory,
    logger: ILogger,
    private readonly clock: Clock = systemClock
  ) {
    this.logger = logger.child({ component: 'event-channel' });
  }

  /**
   * Announce a trigger to the foreground and wait up to `timeoutMs` for its
   * ack. Resolves null when the foreground is absent, stays silent, or
   * answers with something malformed.
   */
  async announceAndAwaitAck(event: GeofenceEvent, notificationId: number, timeoutMs: number): Promise<AckOutcome | null> {
    const ackName = ackMailboxName(notificationId);
    const ackMailbox = this.directory.register(ackName);

    try {
      const port = this.directory.lookup(GEOFENCE_EVENT_PORT);
      if (!port) {
        this.logger.debug('No foreground listening, skipping handshake', { notificationId });
        return null;
      }

      const announcement: TriggerAnnouncement = {
        kind: 'geofence-trigger',
        event: event.event,
        geofenceIds: [...event.geofenceIds],
        location: event.location,
        notificationId,
        ackMailbox: ackName,
        sentAt: this.clock().getTime(),
      };
      port.send(announcement);

      const reply = await ackMailbox.receive(timeoutMs);
      if (reply === null) {
        this.logger.debug('No ack before timeout', { notificationId, timeoutMs });
        return null;
      }

      const ack = triggerAckSchema.safeParse(reply);
      if (!ack.success || ack.data.notificationId !== notificationId) {
        this.logger.warn('Ignoring malformed ack', { notificationId });
        return null;
      }
      return ack.data.outcome;
    } finally {
      this.directory.unregister(ackName);
    }
  }

  /**
   * Answer an announcement. A vanished ack mailbox means the background
   * side already timed out; that is logged, not thrown.
   */
  acknowledge(announcement: TriggerAnnouncement, outcome: AckOutcome): boolean {
    const sender = this.directory.lookup(announcement.ackMailbox);
    if (!sender) {
      this.logger.info('Ack mailbox gone, background already moved on', {
        notificationId: announcement.notificationId,
      });
      return false;
    }
    const ack: TriggerAck = { notificationId: announcement.notificationId, outcome };
    sender.send(ack);
    return true;
  }

  notifyHistoryRecorded(notificationId: number, geofenceIds: readonly string[], recorded: number): void {
    const port = this.directory.lookup(NOTIFICATION_HISTORY_PORT);
    if (!port) return;
    const message: HistoryRecordedMessage = {
      kind: 'notification-recorded',
      notificationId,
      geofenceIds: [...geofenceIds],
      recorded,
    };
    port.send(message);
  }

  /**
   * Register the foreground ports and dispatch incoming messages until
   * `close` is called. Returns once both ports are registered.
   */
  listen(onAnnouncement: AnnouncementHandler, onHistoryRecorded: HistoryRecordedHandler): void {
    if (this.listeners.length > 0) return;

    const eventPort = this.directory.register(GEOFENCE_EVENT_PORT);
    const historyPort = this.directory.register(NOTIFICATION_HISTORY_PORT);
    this.listeners = [eventPort, historyPort];

    void this.consume(eventPort, async (message) => {
      const parsed = triggerAnnouncementSchema.safeParse(message);
      if (!parsed.success) {
        this.logger.warn('Ignoring malformed trigger announcement');
        return;
      }
      await onAnnouncement(parsed.data);
    });

    void this.consume(historyPort, async (message) => {
      const parsed = historyRecordedSchema.safeParse(message);
      if (!parsed.success) {
        this.logger.warn('Ignoring malformed history message');
        return;
      }
      await onHistoryRecorded(parsed.data);
    });

    this.logger.info('Listening for background triggers');
  }

  get isListening(): boolean {
    return this.listeners.length > 0;
  }

  close(): void {
    for (const receiver of this.listeners) {
      this.directory.unregister(receiver.name);
    }
    this.listeners = [];
  }

  private async consume(receiver: MailboxReceiver, handle: (message: unknown) => Promise<void>): Promise<void> {
    for await (const message of receiver) {
      try {
        await handle(message);
      } catch (err) {
        this.logger.error(`Handler failed on ${receiver.name}`, toError(err));
      }
    }
  }
}
