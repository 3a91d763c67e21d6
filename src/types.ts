import type { RecurrencePattern } from './domain/recurrence/RecurrencePattern';

// Recurrence
export type RecurrenceType = 'none' | 'daily' | 'weekly' | 'weekdaysOnly';

export interface RecurrencePatternData {
  type: RecurrenceType;
  weekdays: number[];     // ISO weekdays, Monday = 1
  endDate: string | null; // yyyy-MM-dd
}

// Tasks
export interface Task {
  id: number;
  name: string;
  priority: number;               // 1 (lowest) to 5 (highest)
  scheduledDate: string | null;   // yyyy-MM-dd
  scheduledTime: string | null;   // HH:mm
  isRecurring: boolean;
  recurrence: RecurrencePattern;
  geofenceId: string | null;
  isCompleted: boolean;
  notificationSound: string | null;
  enableSpeech: boolean | null;   // null inherits the configured default
  createdAt: number;
}

/**
 * A task the store has not assigned an id to yet.
 */
export type TaskDraft = Omit<Task, 'id' | 'createdAt'>;

export interface CreateTaskPayload {
  name: string;
  priority?: number;
  scheduledDate?: string | null;
  scheduledTime?: string | null;
  recurrence?: RecurrencePatternData | null;
  geofenceId?: string | null;
  notificationSound?: string | null;
  enableSpeech?: boolean | null;
}

export interface UpdateTaskPayload {
  name?: string;
  priority?: number;
  scheduledDate?: string | null;
  scheduledTime?: string | null;
  recurrence?: RecurrencePatternData | null;
  geofenceId?: string | null;
  isCompleted?: boolean;
  notificationSound?: string | null;
  enableSpeech?: boolean | null;
}

export interface TaskFilter {
  completed?: boolean;
  geofenceId?: string;
}

// Geofences
export interface GeoPoint {
  latitude: number;
  longitude: number;
}

export interface Geofence extends GeoPoint {
  id: string;
  radiusMeters: number;
  fillColor: string;
  fillOpacity: number;
  strokeColor: string;
  strokeWidth: number;
  task: string | null;   // legacy binding by task name
  createdAt: number;
}

export interface CreateGeofencePayload extends GeoPoint {
  id?: string;
  radiusMeters?: number;
  fillColor?: string;
  fillOpacity?: number;
  strokeColor?: string;
  strokeWidth?: number;
  task?: string | null;
  taskId?: number;
}

export type GeofenceEventType = 'enter' | 'exit';

export interface GeofenceEvent {
  event: GeofenceEventType;
  geofenceIds: string[];
  location: GeoPoint | null;
}

// History
export interface TaskHistoryEntry {
  id: number;
  taskId: number | null;
  taskName: string;
  taskPriority: number;
  startTime: number;
  endTime: number | null;
  durationSeconds: number | null;
  completionDate: string | null;
  geofenceId: string | null;
  createdAt: number;
}

export type NewTaskHistoryEntry = Omit<TaskHistoryEntry, 'id' | 'endTime' | 'durationSeconds' | 'completionDate' | 'createdAt'>;

export interface NotificationHistoryEntry {
  id: number;
  notificationId: number;
  geofenceId: string;
  taskName: string | null;
  eventType: GeofenceEventType;
  body: string;
  timestamp: number;
}

export type NewNotificationHistoryEntry = Omit<NotificationHistoryEntry, 'id'>;

export interface DailyStatistics {
  date: string;
  sessions: number;
  totalSeconds: number;
}

export interface TaskStatistics {
  totalSessions: number;
  openSessions: number;
  totalSeconds: number;
  byDate: DailyStatistics[];
  byTask: Array<{ taskId: number | null; taskName: string; sessions: number; totalSeconds: number }>;
}

// Cross-context state
export interface ActiveTaskMarker {
  taskId: number;
  startedAt: number;
}

export interface ActiveSession {
  marker: ActiveTaskMarker;
  task: Task;
}

export interface PendingTask {
  taskId: number;
  geofenceId: string | null;
  notificationId: number | null;
  queuedAt: number;
  expiresAt: number;
}

// Notifications and speech
export type NotificationActionId = 'do_now' | 'do_later';

export interface NotificationAction {
  id: NotificationActionId;
  label: string;
  showsUI: boolean;
}

export interface NotificationRequest {
  id: number;
  title: string;
  body: string;
  actions: NotificationAction[];
  sound: string | null;
  persistent: boolean;
}

export type SpeechMode = 'location' | 'snooze';

// Trigger arbitration
export type TriggerDecisionKind = 'none' | 'announce' | 'queue' | 'preempt';

export type AckOutcome = 'queued' | 'preempt';

export interface TriggerReport {
  notificationId: number;
  event: GeofenceEventType;
  geofenceIds: string[];
  ackOutcome: AckOutcome | null;
  decision: TriggerDecisionKind;
  candidateTaskIds: number[];
  alertShown: boolean;
  spoken: string[];
  historyRecorded: number;
}

// Backup
export interface BackupDocument {
  version: 1;
  exportedAt: number;
  tasks: Array<Omit<Task, 'recurrence'> & { recurrence: RecurrencePatternData }>;
  geofences: Geofence[];
  taskHistory: TaskHistoryEntry[];
  notificationHistory: NotificationHistoryEntry[];
}
