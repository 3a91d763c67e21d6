import { z } from 'zod';
import { ILogger } from '../../domain/common/ILogger';
import { NotFoundError } from '../../domain/common/Errors';
import { CloseHistoryEntry, ITaskHistoryRepository } from '../../domain/repositories/ITaskHistoryRepository';
import { NewTaskHistoryEntry, TaskHistoryEntry } from '../../types';
import { IDatabaseConnection, SqlParam } from '../database/IDatabaseConnection';
import { RetryPolicy } from '../database/retry';
import { SqliteRepository, normalizeTimestamp, placeholders } from './SqliteRepository';

const historyRowSchema = z.object({
  id: z.number(),
  task_id: z.number().nullable(),
  task_name: z.string(),
  task_priority: z.number(),
  start_time: z.number(),
  end_time: z.number().nullable(),
  duration_seconds: z.number().nullable(),
  completion_date: z.string().nullable(),
  geofence_id: z.string().nullable(),
  created_at: z.number(),
});

function toEntry(row: z.infer<typeof historyRowSchema>): TaskHistoryEntry {
  return {
    id: row.id,
    taskId: row.task_id,
    taskName: row.task_name,
    taskPriority: row.task_priority,
    startTime: normalizeTimestamp(row.start_time),
    endTime: row.end_time === null ? null : normalizeTimestamp(row.end_time),
    durationSeconds: row.duration_seconds,
    completionDate: row.completion_date,
    geofenceId: row.geofence_id,
    createdAt: normalizeTimestamp(row.created_at),
  };
}

/**
 * SQLite implementation of ITaskHistoryRepository.
 */
export class SqliteTaskHistoryRepository extends SqliteRepository implements ITaskHistoryRepository {
  constructor(db: IDatabaseConnection, retryPolicy: RetryPolicy, logger: ILogger) {
    super(db, retryPolicy, logger.child({ repository: 'task-history' }));
  }

  private async query(sql: string, params: SqlParam[] = []): Promise<TaskHistoryEntry[]> {
    const rows = await this.execute('task history query', () => this.db.all(sql, params));
    return z.array(historyRowSchema).parse(rows).map(toEntry);
  }

  private async findById(id: number): Promise<TaskHistoryEntry | null> {
    const [entry] = await this.query('SELECT * FROM task_history WHERE id = ?', [id]);
    return entry ?? null;
  }

  async open(entry: NewTaskHistoryEntry): Promise<TaskHistoryEntry> {
    const createdAt = Date.now();
    const result = await this.execute('task history open', () => this.db.run(
      `INSERT INTO task_history (task_id, task_name, task_priority, start_time, geofence_id, created_at)
       VALUES (${placeholders(6)})`,
      [entry.taskId, entry.taskName, entry.taskPriority, entry.startTime, entry.geofenceId, createdAt]
    ));
    return {
      ...entry,
      id: result.lastId,
      endTime: null,
      durationSeconds: null,
      completionDate: null,
      createdAt,
    };
  }

  async findOpenByTaskId(taskId: number): Promise<TaskHistoryEntry | null> {
    const [entry] = await this.query(
      'SELECT * FROM task_history WHERE task_id = ? AND end_time IS NULL ORDER BY id DESC LIMIT 1',
      [taskId]
    );
    return entry ?? null;
  }

  async close(id: number, closing: CloseHistoryEntry): Promise<TaskHistoryEntry> {
    const result = await this.execute('task history close', () => this.db.run(
      `UPDATE task_history SET end_time = ?, duration_seconds = ?, completion_date = ?
       WHERE id = ? AND end_time IS NULL`,
      [closing.endTime, closing.durationSeconds, closing.completionDate, id]
    ));
    const entry = result.changes > 0 ? await this.findById(id) : null;
    if (!entry) {
      throw new NotFoundError('Open task history entry', id);
    }
    return entry;
  }

  async delete(id: number): Promise<boolean> {
    const result = await this.execute('task history delete', () => this.db.run('DELETE FROM task_history WHERE id = ?', [id]));
    return result.changes > 0;
  }

  async findAll(filter: { taskId?: number } = {}): Promise<TaskHistoryEntry[]> {
    if (filter.taskId !== undefined) {
      return this.query('SELECT * FROM task_history WHERE task_id = ? ORDER BY start_time DESC, id DESC', [filter.taskId]);
    }
    return this.query('SELECT * FROM task_history ORDER BY start_time DESC, id DESC');
  }

  async restore(entry: TaskHistoryEntry): Promise<void> {
    await this.execute('task history restore', () => this.db.run(
      `INSERT INTO task_history (id, task_id, task_name, task_priority, start_time, end_time, duration_seconds, completion_date, geofence_id, created_at)
       VALUES (${placeholders(10)})`,
      [
        entry.id,
        entry.taskId,
        entry.taskName,
        entry.taskPriority,
        entry.startTime,
        entry.endTime,
        entry.durationSeconds,
        entry.completionDate,
        entry.geofenceId,
        entry.createdAt,
      ]
    ));
  }

  async deleteAll(): Promise<number> {
    const result = await this.execute('task history delete all', () => this.db.run('DELETE FROM task_history'));
    return result.changes;
  }
}
