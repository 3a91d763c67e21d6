import express, { Request, Response } from 'express';
import { HistoryService } from '../application/services/HistoryService';
import { ILogger } from '../domain/common/ILogger';
import { handleError } from './handleError';
import { historyQuerySchema, notificationHistoryQuerySchema, statsQuerySchema, validateQuery } from './validation';

export function createHistoryRoutes(historyService: HistoryService, logger?: ILogger) {
  const router = express.Router();

  router.get('/history', validateQuery(historyQuerySchema), async (req: Request, res: Response) => {
    try {
      const { taskId } = historyQuerySchema.parse(req.query);
      res.json(await historyService.getTaskHistory(taskId));
    } catch (err) {
      handleError(err, res, logger);
    }
  });

  router.get('/history/stats', validateQuery(statsQuerySchema), async (req: Request, res: Response) => {
    try {
      res.json(await historyService.getStatistics(statsQuerySchema.parse(req.query)));
    } catch (err) {
      handleError(err, res, logger);
    }
  });

  router.get('/notifications/history', validateQuery(notificationHistoryQuerySchema), async (req: Request, res: Response) => {
    try {
      const { limit } = notificationHistoryQuerySchema.parse(req.query);
      res.json(await historyService.listNotificationHistory(limit));
    } catch (err) {
      handleError(err, res, logger);
    }
  });

  router.delete('/notifications/history', async (_req: Request, res: Response) => {
    try {
      const removed = await historyService.clearNotificationHistory();
      res.json({ success: true, removed });
    } catch (err) {
      handleError(err, res, logger);
    }
  });

  return router;
}
