import express, { Request, Response } from 'express';
import { BackupService } from '../application/services/BackupService';
import { GeofenceService } from '../application/services/GeofenceService';
import { ILogger } from '../domain/common/ILogger';
import { IStorageGateway } from '../domain/repositories/IStorageGateway';
import { handleError } from './handleError';

export interface BackupRouteDeps {
  backupService: BackupService;
  geofenceService: GeofenceService;
  storageGateway: IStorageGateway;
  logger?: ILogger;
}

/**
 * Backup export/import and the integrity repair operation.
 */
export function createBackupRoutes({ backupService, geofenceService, storageGateway, logger }: BackupRouteDeps) {
  const router = express.Router();

  router.get('/backup', async (_req: Request, res: Response) => {
    try {
      res.json(await backupService.exportData());
    } catch (err) {
      handleError(err, res, logger);
    }
  });

  router.post('/backup', async (req: Request, res: Response) => {
    try {
      const imported = await backupService.importData(req.body);
      const regions = await geofenceService.syncPlatform();
      res.json({ imported, regions });
    } catch (err) {
      handleError(err, res, logger);
    }
  });

  // Runs on its own connection. A repaired database is a new file, which the
  // foreground connection only picks up after a restart.
  router.post('/maintenance/integrity', async (_req: Request, res: Response) => {
    try {
      const report = await storageGateway.checkIntegrity();
      if (!report.healthy) {
        logger?.warn('Database recreated, restart required', { backupPath: report.backupPath });
      }
      res.json({ ...report, restartRequired: !report.healthy });
    } catch (err) {
      handleError(err, res, logger);
    }
  });

  return router;
}
