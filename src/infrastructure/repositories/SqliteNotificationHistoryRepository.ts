import { z } from 'zod';
import { ILogger } from '../../domain/common/ILogger';
import { INotificationHistoryRepository } from '../../domain/repositories/INotificationHistoryRepository';
import { NewNotificationHistoryEntry, NotificationHistoryEntry } from '../../types';
import { IDatabaseConnection } from '../database/IDatabaseConnection';
import { RetryPolicy } from '../database/retry';
import { SqliteRepository, normalizeTimestamp, placeholders } from './SqliteRepository';

const notificationRowSchema = z.object({
  id: z.number(),
  notification_id: z.number(),
  geofence_id: z.string(),
  task_name: z.string().nullable(),
  event_type: z.enum(['enter', 'exit']),
  body: z.string(),
  timestamp: z.number(),
});

function toEntry(row: z.infer<typeof notificationRowSchema>): NotificationHistoryEntry {
  return {
    id: row.id,
    notificationId: row.notification_id,
    geofenceId: row.geofence_id,
    taskName: row.task_name,
    eventType: row.event_type,
    body: row.body,
    timestamp: normalizeTimestamp(row.timestamp),
  };
}

/**
 * SQLite implementation of INotificationHistoryRepository.
 */
export class SqliteNotificationHistoryRepository extends SqliteRepository implements INotificationHistoryRepository {
  constructor(db: IDatabaseConnection, retryPolicy: RetryPolicy, logger: ILogger) {
    super(db, retryPolicy, logger.child({ repository: 'notification-history' }));
  }

  async insert(entry: NewNotificationHistoryEntry): Promise<NotificationHistoryEntry> {
    const result = await this.execute('notification history insert', () => this.db.run(
      `INSERT INTO notification_history (notification_id, geofence_id, task_name, event_type, body, timestamp)
       VALUES (${placeholders(6)})`,
      [entry.notificationId, entry.geofenceId, entry.taskName, entry.eventType, entry.body, entry.timestamp]
    ));
    return { ...entry, id: result.lastId };
  }

  async findAll(limit?: number): Promise<NotificationHistoryEntry[]> {
    const sql = 'SELECT * FROM notification_history ORDER BY timestamp DESC, id DESC';
    const rows = await this.execute('notification history query', () => limit !== undefined
      ? this.db.all(`${sql} LIMIT ?`, [limit])
      : this.db.all(sql));
    return z.array(notificationRowSchema).parse(rows).map(toEntry);
  }

  async clearAll(): Promise<number> {
    const result = await this.execute('notification history clear', () => this.db.run('DELETE FROM notification_history'));
    this.logger.info('Notification history cleared', { removed: result.changes });
    return result.changes;
  }

  async restore(entry: NotificationHistoryEntry): Promise<void> {
    await this.execute('notification history restore', () => this.db.run(
      `INSERT INTO notification_history (id, notification_id, geofence_id, task_name, event_type, body, timestamp)
       VALUES (${placeholders(7)})`,
      [entry.id, entry.notificationId, entry.geofenceId, entry.taskName, entry.eventType, entry.body, entry.timestamp]
    ));
  }
}
