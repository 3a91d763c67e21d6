import { differenceInHours, set, startOfDay } from 'date-fns';
import { parseDateKey, parseTimeOfDay } from '../common/dates';
import { Task } from '../../types';

export type PrioritizedTask = Pick<Task, 'priority' | 'geofenceId' | 'scheduledDate' | 'scheduledTime'>;

export type RankableTask = PrioritizedTask & { id: number | null; name: string };

export type UrgencyLabel = 'OVERDUE' | 'DUE NOW' | 'DUE SOON' | 'DUE TODAY' | 'UPCOMING';

export const MIN_PRIORITY = 1;
export const MAX_PRIORITY = 5;

const PRIORITY_LABELS = ['Very Low', 'Low', 'Medium', 'High', 'Very High'];

/**
 * Resolve a task's schedule to an instant. A date without a time means
 * midnight; a time without a date means that time today.
 */
export function scheduledDateTime(task: PrioritizedTask, now: Date): Date | null {
  if (!task.scheduledDate && !task.scheduledTime) return null;

  const day = task.scheduledDate ? parseDateKey(task.scheduledDate) : startOfDay(now);
  if (!day) return null;

  const time = task.scheduledTime ? parseTimeOfDay(task.scheduledTime) : null;
  return set(day, { hours: time?.hours ?? 0, minutes: time?.minutes ?? 0, seconds: 0, milliseconds: 0 });
}

/**
 * Whole hours until the scheduled instant, truncated toward zero.
 */
export function hoursUntilScheduled(task: PrioritizedTask, now: Date): number | null {
  const scheduled = scheduledDateTime(task, now);
  return scheduled ? differenceInHours(scheduled, now) : null;
}

export function urgencyBonus(hoursUntil: number): number {
  if (hoursUntil <= 0) return 2.0;
  if (hoursUntil <= 1) return 1.5;
  if (hoursUntil <= 3) return 1.0;
  if (hoursUntil <= 24) return 0.5;
  return 0;
}

/**
 * Base priority plus the urgency bonus. Tasks without a geofence are
 * alarm-style and keep their base priority; so do unscheduled tasks.
 */
export function effectivePriority(task: PrioritizedTask, now: Date): number {
  if (!task.geofenceId) return task.priority;
  const hoursUntil = hoursUntilScheduled(task, now);
  if (hoursUntil === null) return task.priority;
  return task.priority + urgencyBonus(hoursUntil);
}

/**
 * Highest effective priority first. Ties go to the lower task id, unsaved
 * tasks sort after saved ones, and the name settles anything left.
 */
export function compareByEffectivePriority(now: Date): (a: RankableTask, b: RankableTask) => number {
  return (a, b) => {
    const diff = effectivePriority(b, now) - effectivePriority(a, now);
    if (diff !== 0) return diff;
    if (a.id !== b.id) {
      if (a.id === null) return 1;
      if (b.id === null) return -1;
      return a.id - b.id;
    }
    return a.name.localeCompare(b.name);
  };
}

export function rankTasks<T extends RankableTask>(tasks: readonly T[], now: Date): T[] {
  return [...tasks].sort(compareByEffectivePriority(now));
}

export function highestEffectivePriority(tasks: readonly PrioritizedTask[], now: Date): number | null {
  if (tasks.length === 0) return null;
  return Math.max(...tasks.map(task => effectivePriority(task, now)));
}

export function urgencyLabel(task: PrioritizedTask, now: Date): UrgencyLabel | null {
  const hoursUntil = hoursUntilScheduled(task, now);
  if (hoursUntil === null) return null;
  if (hoursUntil < 0) return 'OVERDUE';
  if (hoursUntil === 0) return 'DUE NOW';
  if (hoursUntil <= 3) return 'DUE SOON';
  if (hoursUntil <= 24) return 'DUE TODAY';
  return 'UPCOMING';
}

export function priorityLabel(priority: number): string {
  const index = Math.min(Math.max(Math.round(priority), MIN_PRIORITY), MAX_PRIORITY) - 1;
  return PRIORITY_LABELS[index];
}

export function isValidPriority(priority: number): boolean {
  return Number.isInteger(priority) && priority >= MIN_PRIORITY && priority <= MAX_PRIORITY;
}
