import { rankTasks } from '../../domain/priority/priorityModel';
import { StorageSession } from '../../domain/repositories/IStorageGateway';
import { Task } from '../../types';

export interface ResolvedCandidates {
  /** Ranked, highest effective priority first. */
  tasks: Task[];
  /** Best candidate per fired geofence id, null when none applies. */
  byGeofence: Map<string, Task | null>;
}

/**
 * Open tasks bound to any of the fired geofences. Geofences no task points
 * at fall back to their legacy task name.
 */
export async function resolveCandidates(
  storage: Pick<StorageSession, 'tasks' | 'geofences'>,
  geofenceIds: readonly string[],
  now: Date
): Promise<ResolvedCandidates> {
  const bound = await storage.tasks.findOpenByGeofenceIds(geofenceIds);
  const covered = new Set(bound.map(task => task.geofenceId));
  const uncovered = geofenceIds.filter(id => !covered.has(id));

  const fallbackByGeofence = new Map<string, Task>();
  if (uncovered.length > 0) {
    const geofences = await storage.geofences.findByIds(uncovered);
    for (const geofence of geofences) {
      if (!geofence.task) continue;
      const task = await storage.tasks.findOpenByName(geofence.task);
      if (task) fallbackByGeofence.set(geofence.id, task);
    }
  }

  const unique = new Map<number, Task>();
  for (const task of [...bound, ...fallbackByGeofence.values()]) {
    unique.set(task.id, task);
  }
  const tasks = rankTasks([...unique.values()], now);

  const byGeofence = new Map<string, Task | null>();
  for (const geofenceId of geofenceIds) {
    const best = tasks.find(task => task.geofenceId === geofenceId) ?? fallbackByGeofence.get(geofenceId) ?? null;
    byGeofence.set(geofenceId, best);
  }

  return { tasks, byGeofence };
}
