import { isDateKey, isTimeOfDay, toDateKey } from '../common/dates';
import { ValidationError } from '../common/Errors';
import { isValidPriority } from '../priority/priorityModel';
import { RecurrencePattern } from '../recurrence/RecurrencePattern';
import { CreateTaskPayload, Task, TaskDraft, UpdateTaskPayload } from '../../types';

export const DEFAULT_TASK_PRIORITY = 3;

function assertName(name: string): string {
  const trimmed = name.trim();
  if (!trimmed) {
    throw new ValidationError('Task name is required');
  }
  return trimmed;
}

function assertPriority(priority: number): number {
  if (!isValidPriority(priority)) {
    throw new ValidationError('Priority must be an integer from 1 to 5', { priority });
  }
  return priority;
}

function assertScheduledDate(date: string | null | undefined): string | null {
  if (date === null || date === undefined) return null;
  if (!isDateKey(date)) {
    throw new ValidationError('scheduledDate must be a yyyy-MM-dd date', { scheduledDate: date });
  }
  return date;
}

function assertScheduledTime(time: string | null | undefined): string | null {
  if (time === null || time === undefined) return null;
  if (!isTimeOfDay(time)) {
    throw new ValidationError('scheduledTime must be HH:mm', { scheduledTime: time });
  }
  return time;
}

/**
 * Build a validated, unsaved task from user input.
 */
export function buildTaskDraft(payload: CreateTaskPayload): TaskDraft {
  const recurrence = payload.recurrence ? RecurrencePattern.fromData(payload.recurrence) : RecurrencePattern.none();
  return {
    name: assertName(payload.name),
    priority: assertPriority(payload.priority ?? DEFAULT_TASK_PRIORITY),
    scheduledDate: assertScheduledDate(payload.scheduledDate),
    scheduledTime: assertScheduledTime(payload.scheduledTime),
    isRecurring: recurrence.isRecurring,
    recurrence,
    geofenceId: payload.geofenceId ?? null,
    isCompleted: false,
    notificationSound: payload.notificationSound ?? null,
    enableSpeech: payload.enableSpeech ?? null,
  };
}

/**
 * Apply an edit. Fields left undefined keep their value; null clears them.
 */
export function applyTaskUpdate(task: Task, update: UpdateTaskPayload): Task {
  const recurrence = update.recurrence === undefined
    ? task.recurrence
    : update.recurrence === null ? RecurrencePattern.none() : RecurrencePattern.fromData(update.recurrence);

  return {
    ...task,
    name: update.name !== undefined ? assertName(update.name) : task.name,
    priority: update.priority !== undefined ? assertPriority(update.priority) : task.priority,
    scheduledDate: update.scheduledDate !== undefined ? assertScheduledDate(update.scheduledDate) : task.scheduledDate,
    scheduledTime: update.scheduledTime !== undefined ? assertScheduledTime(update.scheduledTime) : task.scheduledTime,
    isRecurring: recurrence.isRecurring,
    recurrence,
    geofenceId: update.geofenceId !== undefined ? update.geofenceId : task.geofenceId,
    isCompleted: update.isCompleted ?? task.isCompleted,
    notificationSound: update.notificationSound !== undefined ? update.notificationSound : task.notificationSound,
    enableSpeech: update.enableSpeech !== undefined ? update.enableSpeech : task.enableSpeech,
  };
}

/**
 * Clone a task for another date: not completed, no identity.
 */
export function copyWithDate(task: Task | TaskDraft, date: Date): TaskDraft {
  return {
    name: task.name,
    priority: task.priority,
    scheduledDate: toDateKey(date),
    scheduledTime: task.scheduledTime,
    isRecurring: task.isRecurring,
    recurrence: task.recurrence,
    geofenceId: task.geofenceId,
    isCompleted: false,
    notificationSound: task.notificationSound,
    enableSpeech: task.enableSpeech,
  };
}
