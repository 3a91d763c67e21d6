import { IGeofenceRepository } from './IGeofenceRepository';
import { INotificationHistoryRepository } from './INotificationHistoryRepository';
import { ITaskHistoryRepository } from './ITaskHistoryRepository';
import { ITaskRepository } from './ITaskRepository';

export interface OpenStorageOptions {
  readOnly: boolean;
}

/**
 * Repositories bound to one independent connection. A session belongs to
 * the context that opened it and is never handed to another.
 */
export interface StorageSession {
  tasks: ITaskRepository;
  geofences: IGeofenceRepository;
  taskHistory: ITaskHistoryRepository;
  notificationHistory: INotificationHistoryRepository;

  /**
   * Run `body` atomically; any rejection rolls everything back.
   */
  transaction<T>(body: () => Promise<T>): Promise<T>;

  close(): Promise<void>;
}

export interface IntegrityReport {
  healthy: boolean;
  problems: string[];
  backupPath: string | null;
}

/**
 * Entry point to persistent storage.
 */
export interface IStorageGateway {
  /**
   * Open a fresh connection for the calling context.
   */
  open(options: OpenStorageOptions): Promise<StorageSession>;

  /**
   * Check the database. A corrupt file is backed up, deleted and recreated
   * empty before this resolves with `healthy: false`.
   */
  checkIntegrity(): Promise<IntegrityReport>;
}
