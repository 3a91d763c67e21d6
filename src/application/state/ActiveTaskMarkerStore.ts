import { z } from 'zod';
import { IKeyValueStore } from '../../domain/repositories/IKeyValueStore';
import { ILogger } from '../../domain/common/ILogger';
import { ActiveTaskMarker } from '../../types';

export const ACTIVE_TASK_KEY = 'active-task';

const markerSchema = z.object({
  taskId: z.number().int(),
  startedAt: z.number(),
});

/**
 * Persisted pointer to the task the user is working on. Written by the
 * foreground, read by every background trigger.
 */
export class ActiveTaskMarkerStore {
  constructor(
    private readonly store: IKeyValueStore,
    private readonly logger: ILogger
  ) {}

  async read(): Promise<ActiveTaskMarker | null> {
    const entry = await this.store.get(ACTIVE_TASK_KEY);
    if (!entry) return null;

    const parsed = markerSchema.safeParse(entry.value);
    if (!parsed.success) {
      this.logger.warn('Discarding malformed active task marker', { issues: parsed.error.issues.length });
      return null;
    }
    return parsed.data;
  }

  async write(marker: ActiveTaskMarker): Promise<void> {
    await this.store.set(ACTIVE_TASK_KEY, marker);
  }

  async clear(): Promise<void> {
    await this.store.delete(ACTIVE_TASK_KEY);
  }
}
