import { z } from 'zod';
import { Request, Response, NextFunction } from 'express';

// --- Reusable patterns ---

// Geofence ids travel in URLs and mailbox messages
const safeId = z.string().regex(/^[a-zA-Z0-9_.-]+$/, 'ID must be alphanumeric with dots, hyphens or underscores only');

const shortString = z.string().min(1).max(500);
const dateKey = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'Expected yyyy-MM-dd');
const timeOfDay = z.string().regex(/^([01]\d|2[0-3]):[0-5]\d$/, 'Expected HH:mm');
const numericId = z.coerce.number().int().positive();
const booleanQuery = z.enum(['true', 'false']).transform(value => value === 'true');

// --- Enums ---

const prioritySchema = z.number().int().min(1).max(5);
const recurrenceTypeSchema = z.enum(['none', 'daily', 'weekly', 'weekdaysOnly']);
const geofenceEventTypeSchema = z.enum(['enter', 'exit']);
const notificationActionSchema = z.enum(['do_now', 'do_later']);

const recurrenceSchema = z.object({
  type: recurrenceTypeSchema,
  weekdays: z.array(z.number().int().min(1).max(7)).default([]),
  endDate: dateKey.nullable().default(null),
});

const geoPointSchema = z.object({
  latitude: z.number().min(-90).max(90),
  longitude: z.number().min(-180).max(180),
});

// --- Param schemas ---

export const taskIdParamSchema = z.object({
  id: numericId,
});

export const geofenceIdParamSchema = z.object({
  id: safeId,
});

export const pendingParamSchema = z.object({
  taskId: numericId,
});

// --- Task schemas ---

export const createTaskSchema = z.object({
  name: shortString,
  priority: prioritySchema.optional(),
  scheduledDate: dateKey.nullable().optional(),
  scheduledTime: timeOfDay.nullable().optional(),
  recurrence: recurrenceSchema.nullable().optional(),
  geofenceId: safeId.nullable().optional(),
  notificationSound: z.string().max(200).nullable().optional(),
  enableSpeech: z.boolean().nullable().optional(),
});

export const updateTaskSchema = createTaskSchema.partial().extend({
  isCompleted: z.boolean().optional(),
});

export const listTasksQuerySchema = z.object({
  completed: booleanQuery.optional(),
  geofenceId: safeId.optional(),
});

export const occurrencesQuerySchema = z.object({
  from: dateKey,
  to: dateKey,
});

// --- Geofence schemas ---

export const createGeofenceSchema = geoPointSchema.extend({
  id: safeId.optional(),
  radiusMeters: z.number().positive().optional(),
  fillColor: z.string().max(50).optional(),
  fillOpacity: z.number().min(0).max(1).optional(),
  strokeColor: z.string().max(50).optional(),
  strokeWidth: z.number().min(0).optional(),
  task: shortString.nullable().optional(),
  taskId: z.number().int().positive().optional(),
});

export const locationSchema = geoPointSchema;

export const geofenceEventSchema = z.object({
  event: geofenceEventTypeSchema,
  geofenceIds: z.array(safeId),
  location: geoPointSchema.nullable().default(null),
});

// --- Session schemas ---

export const startSessionSchema = z.object({
  taskId: z.number().int().positive(),
});

export const endSessionSchema = z.object({
  taskId: z.number().int().positive(),
  endedAt: z.number().int().nonnegative().optional(),
  markCompleted: z.boolean().default(false),
});

export const abandonSessionSchema = startSessionSchema;

export const notificationActionBodySchema = z.object({
  action: notificationActionSchema,
  taskId: z.number().int().positive(),
  notificationId: z.number().int().positive().optional(),
});

// --- History schemas ---

export const historyQuerySchema = z.object({
  taskId: numericId.optional(),
});

export const statsQuerySchema = z.object({
  from: dateKey.optional(),
  to: dateKey.optional(),
});

export const notificationHistoryQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(1000).optional(),
});

// --- Middleware ---

function issuesOf(error: z.ZodError) {
  return error.issues.map(i => ({
    path: i.path.join('.'),
    message: i.message,
  }));
}

/**
 * Validate request body against a Zod schema and replace it with the
 * parsed value (defaults applied).
 */
export function validateBody(schema: z.ZodSchema) {
  return (req: Request, res: Response, next: NextFunction) => {
    const result = schema.safeParse(req.body);
    if (!result.success) {
      return res.status(400).json({
        error: true,
        code: 'VALIDATION_ERROR',
        message: 'Invalid request body',
        details: issuesOf(result.error),
      });
    }
    req.body = result.data;
    next();
  };
}

/**
 * Validate URL parameters against a Zod schema.
 */
export function validateParams(schema: z.ZodSchema) {
  return (req: Request, res: Response, next: NextFunction) => {
    const result = schema.safeParse(req.params);
    if (!result.success) {
      return res.status(400).json({
        error: true,
        code: 'VALIDATION_ERROR',
        message: 'Invalid URL parameters',
        details: issuesOf(result.error),
      });
    }
    next();
  };
}

/**
 * Validate request query against a Zod schema.
 */
export function validateQuery(schema: z.ZodSchema) {
  return (req: Request, res: Response, next: NextFunction) => {
    const result = schema.safeParse(req.query);
    if (!result.success) {
      return res.status(400).json({
        error: true,
        code: 'VALIDATION_ERROR',
        message: 'Invalid query parameters',
        details: issuesOf(result.error),
      });
    }
    next();
  };
}
