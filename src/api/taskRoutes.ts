import express, { Request, Response } from 'express';
import { z } from 'zod';
import { TaskService } from '../application/services/TaskService';
import { ILogger } from '../domain/common/ILogger';
import { handleError } from './handleError';
import {
  createTaskSchema,
  listTasksQuerySchema,
  occurrencesQuerySchema,
  taskIdParamSchema,
  updateTaskSchema,
  validateBody,
  validateParams,
  validateQuery,
} from './validation';

/**
 * Create task routes using the TaskService.
 */
export function createTaskRoutes(taskService: TaskService, logger?: ILogger) {
  const router = express.Router();

  // List tasks, highest effective priority first
  router.get('/tasks', validateQuery(listTasksQuerySchema), async (req: Request, res: Response) => {
    try {
      const filter = listTasksQuerySchema.parse(req.query);
      res.json(await taskService.listTasks(filter));
    } catch (err) {
      handleError(err, res, logger);
    }
  });

  router.post('/tasks', validateBody(createTaskSchema), async (req: Request, res: Response) => {
    try {
      const input: z.infer<typeof createTaskSchema> = req.body;
      const task = await taskService.createTask(input);
      res.status(201).json(task);
    } catch (err) {
      handleError(err, res, logger);
    }
  });

  router.get('/tasks/:id', validateParams(taskIdParamSchema), async (req: Request, res: Response) => {
    try {
      const { id } = taskIdParamSchema.parse(req.params);
      res.json(await taskService.getTask(id));
    } catch (err) {
      handleError(err, res, logger);
    }
  });

  router.patch('/tasks/:id', validateParams(taskIdParamSchema), validateBody(updateTaskSchema), async (req: Request, res: Response) => {
    try {
      const { id } = taskIdParamSchema.parse(req.params);
      const updates: z.infer<typeof updateTaskSchema> = req.body;
      res.json(await taskService.updateTask(id, updates));
    } catch (err) {
      handleError(err, res, logger);
    }
  });

  router.delete('/tasks/:id', validateParams(taskIdParamSchema), async (req: Request, res: Response) => {
    try {
      const { id } = taskIdParamSchema.parse(req.params);
      await taskService.deleteTask(id);
      res.json({ success: true, id });
    } catch (err) {
      handleError(err, res, logger);
    }
  });

  // Complete; recurring tasks answer with their next instance
  router.post('/tasks/:id/complete', validateParams(taskIdParamSchema), async (req: Request, res: Response) => {
    try {
      const { id } = taskIdParamSchema.parse(req.params);
      res.json(await taskService.completeTask(id));
    } catch (err) {
      handleError(err, res, logger);
    }
  });

  router.get(
    '/tasks/:id/occurrences',
    validateParams(taskIdParamSchema),
    validateQuery(occurrencesQuerySchema),
    async (req: Request, res: Response) => {
      try {
        const { id } = taskIdParamSchema.parse(req.params);
        const { from, to } = occurrencesQuerySchema.parse(req.query);
        res.json({ taskId: id, dates: await taskService.getOccurrences(id, from, to) });
      } catch (err) {
        handleError(err, res, logger);
      }
    }
  );

  return router;
}
