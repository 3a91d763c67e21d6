import { z } from 'zod';
import { ILogger } from '../../domain/common/ILogger';
import { NotFoundError } from '../../domain/common/Errors';
import { ITaskRepository } from '../../domain/repositories/ITaskRepository';
import { RecurrencePattern } from '../../domain/recurrence/RecurrencePattern';
import { Task, TaskDraft, TaskFilter } from '../../types';
import { IDatabaseConnection, SqlParam } from '../database/IDatabaseConnection';
import { RetryPolicy } from '../database/retry';
import { SqliteRepository, normalizeTimestamp, placeholders } from './SqliteRepository';

const taskRowSchema = z.object({
  id: z.number(),
  name: z.string(),
  priority: z.number(),
  scheduled_date: z.string().nullable(),
  scheduled_time: z.string().nullable(),
  is_recurring: z.number(),
  recurrence: z.string().nullable(),
  geofence_id: z.string().nullable(),
  is_completed: z.number(),
  notification_sound: z.string().nullable(),
  enable_speech: z.number().nullable(),
  created_at: z.number(),
});

type TaskRow = z.infer<typeof taskRowSchema>;

function toTask(row: TaskRow): Task {
  const recurrence = RecurrencePattern.fromJson(row.recurrence);
  return {
    id: row.id,
    name: row.name,
    priority: row.priority,
    scheduledDate: row.scheduled_date,
    scheduledTime: row.scheduled_time,
    isRecurring: row.is_recurring === 1 && recurrence.isRecurring,
    recurrence,
    geofenceId: row.geofence_id,
    isCompleted: row.is_completed === 1,
    notificationSound: row.notification_sound,
    enableSpeech: row.enable_speech === null ? null : row.enable_speech === 1,
    createdAt: normalizeTimestamp(row.created_at),
  };
}

function toColumns(task: TaskDraft): SqlParam[] {
  return [
    task.name,
    task.priority,
    task.scheduledDate,
    task.scheduledTime,
    task.isRecurring ? 1 : 0,
    task.recurrence.isRecurring ? task.recurrence.toJson() : null,
    task.geofenceId,
    task.isCompleted ? 1 : 0,
    task.notificationSound,
    task.enableSpeech === null ? null : task.enableSpeech ? 1 : 0,
  ];
}

const COLUMNS = 'name, priority, scheduled_date, scheduled_time, is_recurring, recurrence, geofence_id, is_completed, notification_sound, enable_speech';

/**
 * SQLite implementation of ITaskRepository.
 */
export class SqliteTaskRepository extends SqliteRepository implements ITaskRepository {
  constructor(db: IDatabaseConnection, retryPolicy: RetryPolicy, logger: ILogger) {
    super(db, retryPolicy, logger.child({ repository: 'tasks' }));
  }

  private async query(sql: string, params: SqlParam[] = []): Promise<Task[]> {
    const rows = await this.execute('task query', () => this.db.all(sql, params));
    return z.array(taskRowSchema).parse(rows).map(toTask);
  }

  async create(draft: TaskDraft): Promise<Task> {
    const createdAt = Date.now();
    const result = await this.execute('task insert', () => this.db.run(
      `INSERT INTO tasks (${COLUMNS}, created_at) VALUES (${placeholders(11)})`,
      [...toColumns(draft), createdAt]
    ));
    this.logger.debug('Task created', { id: result.lastId });
    return { ...draft, id: result.lastId, createdAt };
  }

  async findById(id: number): Promise<Task | null> {
    const [task] = await this.query('SELECT * FROM tasks WHERE id = ?', [id]);
    return task ?? null;
  }

  async findAll(filter: TaskFilter = {}): Promise<Task[]> {
    const clauses: string[] = [];
    const params: SqlParam[] = [];

    if (filter.completed !== undefined) {
      clauses.push('is_completed = ?');
      params.push(filter.completed ? 1 : 0);
    }
    if (filter.geofenceId !== undefined) {
      clauses.push('geofence_id = ?');
      params.push(filter.geofenceId);
    }

    const where = clauses.length > 0 ? ` WHERE ${clauses.join(' AND ')}` : '';
    return this.query(`SELECT * FROM tasks${where} ORDER BY id`, params);
  }

  async findOpenByGeofenceIds(geofenceIds: readonly string[]): Promise<Task[]> {
    if (geofenceIds.length === 0) return [];
    return this.query(
      `SELECT * FROM tasks WHERE is_completed = 0 AND geofence_id IN (${placeholders(geofenceIds.length)}) ORDER BY id`,
      [...geofenceIds]
    );
  }

  async findOpenByName(name: string): Promise<Task | null> {
    const [task] = await this.query(
      'SELECT * FROM tasks WHERE is_completed = 0 AND name = ? ORDER BY id LIMIT 1',
      [name]
    );
    return task ?? null;
  }

  async update(task: Task): Promise<Task> {
    const result = await this.execute('task update', () => this.db.run(
      `UPDATE tasks SET name = ?, priority = ?, scheduled_date = ?, scheduled_time = ?, is_recurring = ?,
         recurrence = ?, geofence_id = ?, is_completed = ?, notification_sound = ?, enable_speech = ?
       WHERE id = ?`,
      [...toColumns(task), task.id]
    ));
    if (result.changes === 0) {
      throw new NotFoundError('Task', task.id);
    }
    return task;
  }

  async delete(id: number): Promise<boolean> {
    const result = await this.execute('task delete', () => this.db.run('DELETE FROM tasks WHERE id = ?', [id]));
    return result.changes > 0;
  }

  async clearGeofence(geofenceId: string): Promise<number> {
    const result = await this.execute('task geofence detach', () => this.db.run(
      'UPDATE tasks SET geofence_id = NULL WHERE geofence_id = ?',
      [geofenceId]
    ));
    return result.changes;
  }

  async restore(task: Task): Promise<void> {
    await this.execute('task restore', () => this.db.run(
      `INSERT INTO tasks (id, ${COLUMNS}, created_at) VALUES (${placeholders(12)})`,
      [task.id, ...toColumns(task), task.createdAt]
    ));
  }

  async deleteAll(): Promise<number> {
    const result = await this.execute('task delete all', () => this.db.run('DELETE FROM tasks'));
    return result.changes;
  }
}
