import { z } from 'zod';
import { IKeyValueStore, KeyValueEntry } from '../../domain/repositories/IKeyValueStore';
import { ILogger } from '../../domain/common/ILogger';
import { Clock, systemClock } from '../../domain/common/Clock';
import { PendingTask } from '../../types';

const PENDING_PREFIX = 'pending:';

const pendingSchema = z.object({
  taskId: z.number().int(),
  geofenceId: z.string().nullable(),
  notificationId: z.number().int().nullable(),
  queuedAt: z.number(),
});

export interface EnqueueRequest {
  taskId: number;
  geofenceId: string | null;
  notificationId: number | null;
}

/**
 * "Do Later" queue. Each entry expires after the snooze window and is then
 * ignored, which makes the task eligible for a fresh alert.
 */
export class PendingTaskQueue {
  constructor(
    private readonly store: IKeyValueStore,
    private readonly snoozeMs: number,
    private readonly logger: ILogger,
    private readonly clock: Clock = systemClock
  ) {}

  private key(taskId: number): string {
    return `${PENDING_PREFIX}${taskId}`;
  }

  private toPending(entry: KeyValueEntry): PendingTask | null {
    const parsed = pendingSchema.safeParse(entry.value);
    if (!parsed.success) {
      this.logger.warn('Discarding malformed pending entry', { key: entry.key });
      return null;
    }
    return { ...parsed.data, expiresAt: entry.expiresAt ?? parsed.data.queuedAt + this.snoozeMs };
  }

  /**
   * Queue a task, restarting its snooze window if it is already queued.
   */
  async enqueue(request: EnqueueRequest): Promise<PendingTask> {
    const queuedAt = this.clock().getTime();
    const value = { ...request, queuedAt };
    await this.store.set(this.key(request.taskId), value, { ttlMs: this.snoozeMs });
    return { ...value, expiresAt: queuedAt + this.snoozeMs };
  }

  async get(taskId: number): Promise<PendingTask | null> {
    const entry = await this.store.get(this.key(taskId));
    return entry ? this.toPending(entry) : null;
  }

  async isPending(taskId: number): Promise<boolean> {
    return (await this.get(taskId)) !== null;
  }

  /**
   * Live entries, oldest first.
   */
  async list(): Promise<PendingTask[]> {
    const entries = await this.store.list(PENDING_PREFIX);
    return entries
      .map(entry => this.toPending(entry))
      .filter((pending): pending is PendingTask => pending !== null)
      .sort((a, b) => a.queuedAt - b.queuedAt || a.taskId - b.taskId);
  }

  async remove(taskId: number): Promise<boolean> {
    return this.store.delete(this.key(taskId));
  }
}
