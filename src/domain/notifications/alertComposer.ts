import { priorityLabel } from '../priority/priorityModel';
import { GeofenceEventType, NotificationAction, NotificationRequest, Task } from '../../types';

export const DO_NOW_ACTION: NotificationAction = { id: 'do_now', label: 'Do Now', showsUI: true };
export const DO_LATER_ACTION: NotificationAction = { id: 'do_later', label: 'Do Later', showsUI: false };

export function taskActions(): NotificationAction[] {
  return [{ ...DO_NOW_ACTION }, { ...DO_LATER_ACTION }];
}

/**
 * Alert for a geofence trigger. `candidates` must already be ranked; the
 * first one decides the title and the sound.
 */
export function composeTriggerAlert(
  notificationId: number,
  candidates: readonly Task[],
  event: GeofenceEventType,
  geofenceIds: readonly string[]
): NotificationRequest {
  const top = candidates.length > 0 ? candidates[0] : null;
  return {
    id: notificationId,
    title: top ? `${priorityLabel(top.priority)} Priority Task` : 'Task reminder',
    body: top
      ? candidates.map(task => `You have task ${task.name}`).join('\n')
      : `Event: ${event} for geofences: ${geofenceIds.join(', ')}`,
    actions: taskActions(),
    sound: top ? top.notificationSound : null,
    persistent: true,
  };
}

/**
 * Prompt asking whether to switch from the active task to a higher ranked one.
 */
export function composePreemptionPrompt(notificationId: number, incoming: Task, active: Task): NotificationRequest {
  return {
    id: notificationId,
    title: `Switch to ${incoming.name}?`,
    body: `${incoming.name} outranks your active task ${active.name}.`,
    actions: taskActions(),
    sound: incoming.notificationSound,
    persistent: true,
  };
}

export function queuedSpeechText(taskName: string): string {
  return `${taskName} added to pending queue.`;
}
