import { z } from 'zod';

// Response shapes the CLI reads. Unknown fields are tolerated.

export const recurrenceSchema = z.object({
  type: z.enum(['none', 'daily', 'weekly', 'weekdaysOnly']),
  weekdays: z.array(z.number()),
  endDate: z.string().nullable(),
});

export const taskSchema = z.object({
  id: z.number(),
  name: z.string(),
  priority: z.number(),
  scheduledDate: z.string().nullable(),
  scheduledTime: z.string().nullable(),
  isRecurring: z.boolean(),
  recurrence: recurrenceSchema,
  geofenceId: z.string().nullable(),
  isCompleted: z.boolean(),
});

export type TaskView = z.infer<typeof taskSchema>;

export const rankedTaskSchema = z.object({
  task: taskSchema,
  effectivePriority: z.number(),
  urgency: z.string().nullable(),
});

export const completionSchema = z.object({
  task: taskSchema,
  nextInstance: taskSchema.nullable(),
});

export const geofenceSchema = z.object({
  id: z.string(),
  latitude: z.number(),
  longitude: z.number(),
  radiusMeters: z.number(),
  task: z.string().nullable(),
});

export const createdGeofenceSchema = z.object({
  geofence: geofenceSchema,
  linkedTaskId: z.number().nullable(),
});

export const activeSessionSchema = z.object({
  marker: z.object({ taskId: z.number(), startedAt: z.number() }),
  task: taskSchema,
});

export const activeSessionResponseSchema = z.object({
  session: activeSessionSchema.nullable(),
});

export const endedSessionSchema = z.object({
  entry: z.object({
    id: z.number(),
    taskId: z.number().nullable(),
    durationSeconds: z.number().nullable(),
    completionDate: z.string().nullable(),
  }),
  completion: completionSchema.nullable(),
});

export const pendingSchema = z.object({
  taskId: z.number(),
  geofenceId: z.string().nullable(),
  notificationId: z.number().nullable(),
  queuedAt: z.number(),
  expiresAt: z.number(),
});

export const triggerReportSchema = z.object({
  notificationId: z.number(),
  event: z.enum(['enter', 'exit']),
  geofenceIds: z.array(z.string()),
  ackOutcome: z.enum(['queued', 'preempt']).nullable(),
  decision: z.enum(['none', 'announce', 'queue', 'preempt']),
  candidateTaskIds: z.array(z.number()),
  alertShown: z.boolean(),
  spoken: z.array(z.string()),
  historyRecorded: z.number(),
});

export const triggerResponseSchema = z.object({
  handled: z.boolean(),
  report: triggerReportSchema.nullable(),
});

export const locationResponseSchema = z.object({
  events: z.array(z.object({
    event: z.enum(['enter', 'exit']),
    geofenceIds: z.array(z.string()),
  })),
});

export const successSchema = z.object({ success: z.boolean() }).passthrough();
