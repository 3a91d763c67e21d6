import { NewNotificationHistoryEntry, NotificationHistoryEntry } from '../../types';

/**
 * Append-only audit of shown notifications.
 */
export interface INotificationHistoryRepository {
  /**
   * Append one row. Transient storage errors are retried before this rejects.
   */
  insert(entry: NewNotificationHistoryEntry): Promise<NotificationHistoryEntry>;

  /**
   * Newest first.
   */
  findAll(limit?: number): Promise<NotificationHistoryEntry[]>;

  /**
   * Bulk clear. The only way rows ever leave the table.
   * @returns number of rows removed
   */
  clearAll(): Promise<number>;

  /**
   * Insert a row keeping its id (backup import).
   */
  restore(entry: NotificationHistoryEntry): Promise<void>;
}
