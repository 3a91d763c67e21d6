import { z } from 'zod';
import { Clock, systemClock } from '../../domain/common/Clock';
import { ILogger } from '../../domain/common/ILogger';
import { ValidationError } from '../../domain/common/Errors';
import { RecurrencePattern } from '../../domain/recurrence/RecurrencePattern';
import { StorageSession } from '../../domain/repositories/IStorageGateway';
import { BackupDocument, Task } from '../../types';

const dateKey = z.string().regex(/^\d{4}-\d{2}-\d{2}$/);

const recurrenceSchema = z.object({
  type: z.enum(['none', 'daily', 'weekly', 'weekdaysOnly']),
  weekdays: z.array(z.number().int().min(1).max(7)),
  endDate: dateKey.nullable(),
});

const backupSchema = z.object({
  version: z.literal(1),
  exportedAt: z.number(),
  tasks: z.array(z.object({
    id: z.number().int().positive(),
    name: z.string().min(1),
    priority: z.number().int().min(1).max(5),
    scheduledDate: dateKey.nullable(),
    scheduledTime: z.string().regex(/^([01]\d|2[0-3]):[0-5]\d$/).nullable(),
    isRecurring: z.boolean(),
    recurrence: recurrenceSchema,
    geofenceId: z.string().nullable(),
    isCompleted: z.boolean(),
    notificationSound: z.string().nullable(),
    enableSpeech: z.boolean().nullable(),
    createdAt: z.number(),
  })),
  geofences: z.array(z.object({
    id: z.string().min(1),
    latitude: z.number().min(-90).max(90),
    longitude: z.number().min(-180).max(180),
    radiusMeters: z.number().positive(),
    fillColor: z.string(),
    fillOpacity: z.number(),
    strokeColor: z.string(),
    strokeWidth: z.number(),
    task: z.string().nullable(),
    createdAt: z.number(),
  })),
  taskHistory: z.array(z.object({
    id: z.number().int().positive(),
    taskId: z.number().int().nullable(),
    taskName: z.string(),
    taskPriority: z.number().int(),
    startTime: z.number(),
    endTime: z.number().nullable(),
    durationSeconds: z.number().int().nullable(),
    completionDate: dateKey.nullable(),
    geofenceId: z.string().nullable(),
    createdAt: z.number(),
  })),
  notificationHistory: z.array(z.object({
    id: z.number().int().positive(),
    notificationId: z.number().int(),
    geofenceId: z.string(),
    taskName: z.string().nullable(),
    eventType: z.enum(['enter', 'exit']),
    body: z.string(),
    timestamp: z.number(),
  })),
});

export interface ImportSummary {
  tasks: number;
  geofences: number;
  taskHistory: number;
  notificationHistory: number;
}

/**
 * Whole-database export and replace-all import.
 */
export class BackupService {
  private readonly logger: ILogger;

  constructor(
    private storage: Omit<StorageSession, 'close'>,
    logger: ILogger,
    private clock: Clock = systemClock
  ) {
    this.logger = logger.child({ service: 'backup' });
  }

  async exportData(): Promise<BackupDocument> {
    const [tasks, geofences, taskHistory, notificationHistory] = await Promise.all([
      this.storage.tasks.findAll(),
      this.storage.geofences.findAll(),
      this.storage.taskHistory.findAll(),
      this.storage.notificationHistory.findAll(),
    ]);

    return {
      version: 1,
      exportedAt: this.clock().getTime(),
      tasks: tasks.map(task => ({ ...task, recurrence: task.recurrence.toData() })),
      geofences,
      taskHistory,
      notificationHistory,
    };
  }

  /**
   * Replace every table with the document's content. Nothing changes when
   * the document is invalid or any insert fails.
   * @throws {ValidationError} if the document does not match the backup format
   */
  async importData(document: unknown): Promise<ImportSummary> {
    const parsed = backupSchema.safeParse(document);
    if (!parsed.success) {
      throw new ValidationError('Invalid backup document', parsed.error.issues.map(issue => ({
        path: issue.path.join('.'),
        message: issue.message,
      })));
    }
    const backup = parsed.data;
    const tasks: Task[] = backup.tasks.map(task => {
      const recurrence = RecurrencePattern.fromData(task.recurrence);
      return { ...task, recurrence, isRecurring: recurrence.isRecurring };
    });

    await this.storage.transaction(async () => {
      await this.storage.notificationHistory.clearAll();
      await this.storage.taskHistory.deleteAll();
      await this.storage.tasks.deleteAll();
      await this.storage.geofences.deleteAll();

      for (const geofence of backup.geofences) await this.storage.geofences.create(geofence);
      for (const task of tasks) await this.storage.tasks.restore(task);
      for (const entry of backup.taskHistory) await this.storage.taskHistory.restore(entry);
      for (const entry of backup.notificationHistory) await this.storage.notificationHistory.restore(entry);
    });

    const summary: ImportSummary = {
      tasks: tasks.length,
      geofences: backup.geofences.length,
      taskHistory: backup.taskHistory.length,
      notificationHistory: backup.notificationHistory.length,
    };
    this.logger.info('Backup imported', { ...summary });
    return summary;
  }
}
