import express, { Request, Response } from 'express';
import { z } from 'zod';
import { GeofenceService } from '../application/services/GeofenceService';
import { ILogger } from '../domain/common/ILogger';
import { DistanceGeofencePlatform } from '../infrastructure/geofencing/DistanceGeofencePlatform';
import { GeofenceEvent, TriggerReport } from '../types';
import { handleError } from './handleError';
import {
  createGeofenceSchema,
  geofenceEventSchema,
  geofenceIdParamSchema,
  locationSchema,
  validateBody,
  validateParams,
} from './validation';

export interface GeofenceRouteDeps {
  geofenceService: GeofenceService;
  platform: DistanceGeofencePlatform;
  handleGeofenceEvent: (event: GeofenceEvent) => Promise<TriggerReport | null>;
  logger?: ILogger;
}

/**
 * Geofence CRUD plus the two ways events enter the system: location fixes
 * run through the platform, raw events go straight to a trigger handler.
 */
export function createGeofenceRoutes({ geofenceService, platform, handleGeofenceEvent, logger }: GeofenceRouteDeps) {
  const router = express.Router();

  router.get('/geofences', async (_req: Request, res: Response) => {
    try {
      res.json(await geofenceService.listGeofences());
    } catch (err) {
      handleError(err, res, logger);
    }
  });

  router.post('/geofences', validateBody(createGeofenceSchema), async (req: Request, res: Response) => {
    try {
      const input: z.infer<typeof createGeofenceSchema> = req.body;
      const created = await geofenceService.createGeofence(input);
      res.status(201).json(created);
    } catch (err) {
      handleError(err, res, logger);
    }
  });

  // Registered before /geofences/:id so "cleanup" is never read as an id
  router.post('/geofences/cleanup', async (_req: Request, res: Response) => {
    try {
      const removed = await geofenceService.cleanupOrphans();
      res.json({ removed });
    } catch (err) {
      handleError(err, res, logger);
    }
  });

  router.get('/geofences/:id', validateParams(geofenceIdParamSchema), async (req: Request, res: Response) => {
    try {
      const { id } = geofenceIdParamSchema.parse(req.params);
      res.json(await geofenceService.getGeofence(id));
    } catch (err) {
      handleError(err, res, logger);
    }
  });

  router.delete('/geofences/:id', validateParams(geofenceIdParamSchema), async (req: Request, res: Response) => {
    try {
      const { id } = geofenceIdParamSchema.parse(req.params);
      await geofenceService.deleteGeofence(id);
      res.json({ success: true, id });
    } catch (err) {
      handleError(err, res, logger);
    }
  });

  router.post('/location', validateBody(locationSchema), async (req: Request, res: Response) => {
    try {
      const location: z.infer<typeof locationSchema> = req.body;
      const events = await platform.updateLocation(location);
      res.json({ events });
    } catch (err) {
      handleError(err, res, logger);
    }
  });

  router.post('/geofence-events', validateBody(geofenceEventSchema), async (req: Request, res: Response) => {
    try {
      const event: z.infer<typeof geofenceEventSchema> = req.body;
      const report = await handleGeofenceEvent(event);
      res.status(report ? 200 : 202).json({ handled: report !== null, report });
    } catch (err) {
      handleError(err, res, logger);
    }
  });

  return router;
}
