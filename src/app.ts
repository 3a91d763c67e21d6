import express, { Request, Response, NextFunction } from 'express';
import cors from 'cors';
import { Container } from './container';
import { createTaskRoutes } from './api/taskRoutes';
import { createGeofenceRoutes } from './api/geofenceRoutes';
import { createSessionRoutes } from './api/sessionRoutes';
import { createHistoryRoutes } from './api/historyRoutes';
import { createBackupRoutes } from './api/backupRoutes';
import { handleError } from './api/handleError';

/**
 * Build the express application for a wired container. The HTTP and
 * WebSocket servers are attached by the caller.
 */
export function createApp(container: Container) {
  const { config, logger } = container;
  const app = express();

  if (config.cors.enabled) {
    app.use(cors({
      origin: config.cors.origins.includes('*') ? true : config.cors.origins,
      credentials: true,
      methods: ['GET', 'POST', 'PATCH', 'DELETE', 'OPTIONS'],
      allowedHeaders: ['Content-Type', 'Authorization', 'X-Requested-With'],
    }));
  }
  app.use(express.json({ limit: '10mb' }));

  app.get('/health', (_req: Request, res: Response) => {
    res.json({
      status: 'ok',
      timestamp: Date.now(),
      uptime: process.uptime()
    });
  });

  app.use('/api', createTaskRoutes(container.taskService, logger));
  app.use('/api', createGeofenceRoutes({
    geofenceService: container.geofenceService,
    platform: container.platform,
    handleGeofenceEvent: event => container.handleGeofenceEvent(event),
    logger,
  }));
  app.use('/api', createSessionRoutes(container.arbiter, logger));
  app.use('/api', createHistoryRoutes(container.historyService, logger));
  app.use('/api', createBackupRoutes({
    backupService: container.backupService,
    geofenceService: container.geofenceService,
    storageGateway: container.storageGateway,
    logger,
  }));

  // Malformed JSON bodies and anything a route did not catch
  app.use((err: Error, _req: Request, res: Response, _next: NextFunction) => {
    if (err instanceof SyntaxError) {
      return res.status(400).json({ error: true, code: 'VALIDATION_ERROR', message: 'Malformed JSON body' });
    }
    return handleError(err, res, logger);
  });

  return app;
}
