import express, { Request, Response } from 'express';
import { z } from 'zod';
import { ActiveTaskArbiter } from '../application/services/ActiveTaskArbiter';
import { ILogger } from '../domain/common/ILogger';
import { handleError } from './handleError';
import {
  abandonSessionSchema,
  endSessionSchema,
  notificationActionBodySchema,
  pendingParamSchema,
  startSessionSchema,
  validateBody,
  validateParams,
} from './validation';

/**
 * Work sessions, the pending queue and notification actions, all owned by
 * the arbiter.
 */
export function createSessionRoutes(arbiter: ActiveTaskArbiter, logger?: ILogger) {
  const router = express.Router();

  router.get('/sessions/active', async (_req: Request, res: Response) => {
    try {
      res.json({ session: await arbiter.getActiveSession() });
    } catch (err) {
      handleError(err, res, logger);
    }
  });

  router.post('/sessions/start', validateBody(startSessionSchema), async (req: Request, res: Response) => {
    try {
      const { taskId }: z.infer<typeof startSessionSchema> = req.body;
      res.status(201).json(await arbiter.startSession(taskId));
    } catch (err) {
      handleError(err, res, logger);
    }
  });

  router.post('/sessions/end', validateBody(endSessionSchema), async (req: Request, res: Response) => {
    try {
      const { taskId, endedAt, markCompleted }: z.infer<typeof endSessionSchema> = req.body;
      const ended = await arbiter.endSession(
        taskId,
        endedAt !== undefined ? new Date(endedAt) : undefined,
        { markCompleted }
      );
      res.json(ended);
    } catch (err) {
      handleError(err, res, logger);
    }
  });

  router.post('/sessions/abandon', validateBody(abandonSessionSchema), async (req: Request, res: Response) => {
    try {
      const { taskId }: z.infer<typeof abandonSessionSchema> = req.body;
      await arbiter.abandonSession(taskId);
      res.json({ success: true, taskId });
    } catch (err) {
      handleError(err, res, logger);
    }
  });

  router.get('/pending', async (_req: Request, res: Response) => {
    try {
      res.json(await arbiter.listPending());
    } catch (err) {
      handleError(err, res, logger);
    }
  });

  router.delete('/pending/:taskId', validateParams(pendingParamSchema), async (req: Request, res: Response) => {
    try {
      const { taskId } = pendingParamSchema.parse(req.params);
      await arbiter.dismissPending(taskId);
      res.json({ success: true, taskId });
    } catch (err) {
      handleError(err, res, logger);
    }
  });

  router.post('/notifications/actions', validateBody(notificationActionBodySchema), async (req: Request, res: Response) => {
    try {
      const { action, taskId, notificationId }: z.infer<typeof notificationActionBodySchema> = req.body;
      res.json(await arbiter.respondToAction(action, taskId, notificationId));
    } catch (err) {
      handleError(err, res, logger);
    }
  });

  return router;
}
