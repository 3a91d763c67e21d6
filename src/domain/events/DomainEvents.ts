import {
  ActiveSession,
  Geofence,
  NotificationRequest,
  PendingTask,
  Task,
  TaskHistoryEntry,
  TriggerDecisionKind,
} from '../../types';

/**
 * Payload shared by the trigger events the foreground publishes for UI clients.
 */
export interface TriggerNotice {
  notificationId: number;
  geofenceIds: string[];
  taskIds: number[];
  decision: TriggerDecisionKind;
  incomingHighest: number | null;
  activePriority: number | null;
  activeTaskId: number | null;
}

/**
 * Type-safe event map for the event bus.
 * Maps event name strings to their payload types.
 */
export interface TypedEventMap {
  'task:created': Task;
  'task:updated': Task;
  'task:deleted': { id: number };
  'task:completed': { task: Task; nextInstance: Task | null };
  'geofence:created': Geofence;
  'geofence:deleted': { id: string };
  'session:started': ActiveSession;
  'session:ended': { taskId: number; entry: TaskHistoryEntry };
  'session:abandoned': { taskId: number };
  'pending:added': PendingTask;
  'pending:removed': { taskId: number };
  'trigger:announced': TriggerNotice;
  'trigger:queued': TriggerNotice;
  'trigger:preempt_prompt': TriggerNotice;
  'notification:shown': NotificationRequest;
  'notification:cancelled': { id: number };
  'notification_history:recorded': { notificationId: number; geofenceIds: string[]; recorded: number };
}

/**
 * All valid event names.
 */
export type EventName = keyof TypedEventMap;

/**
 * Get the payload type for a specific event name.
 */
export type EventPayload<K extends EventName> = TypedEventMap[K];

export const ALL_EVENT_NAMES: readonly EventName[] = [
  'task:created',
  'task:updated',
  'task:deleted',
  'task:completed',
  'geofence:created',
  'geofence:deleted',
  'session:started',
  'session:ended',
  'session:abandoned',
  'pending:added',
  'pending:removed',
  'trigger:announced',
  'trigger:queued',
  'trigger:preempt_prompt',
  'notification:shown',
  'notification:cancelled',
  'notification_history:recorded',
];
