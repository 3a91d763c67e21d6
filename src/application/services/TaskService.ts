import { isAfter } from 'date-fns';
import { Clock, systemClock } from '../../domain/common/Clock';
import { parseDateKey, toDateKey } from '../../domain/common/dates';
import { NotFoundError, ValidationError } from '../../domain/common/Errors';
import { IEventBus } from '../../domain/events/IEventBus';
import { effectivePriority, rankTasks, urgencyLabel, UrgencyLabel } from '../../domain/priority/priorityModel';
import { nextOccurrence, occurrencesInRange } from '../../domain/recurrence/recurrenceEvaluator';
import { ITaskRepository } from '../../domain/repositories/ITaskRepository';
import { applyTaskUpdate, buildTaskDraft, copyWithDate } from '../../domain/tasks/taskRules';
import { CreateTaskPayload, Task, TaskFilter, UpdateTaskPayload } from '../../types';

export interface RankedTask {
  task: Task;
  effectivePriority: number;
  urgency: UrgencyLabel | null;
}

export interface CompletionResult {
  task: Task;
  nextInstance: Task | null;
}

/**
 * Application service for task operations.
 * Manages task lifecycle, recurrence and events.
 */
export class TaskService {
  constructor(
    private taskRepo: ITaskRepository,
    private eventBus: IEventBus,
    private clock: Clock = systemClock
  ) {}

  async createTask(input: CreateTaskPayload): Promise<Task> {
    const task = await this.taskRepo.create(buildTaskDraft(input));
    await this.eventBus.emit('task:created', task);
    return task;
  }

  async getTask(id: number): Promise<Task> {
    const task = await this.taskRepo.findById(id);
    if (!task) {
      throw new NotFoundError('Task', id);
    }
    return task;
  }

  /**
   * Tasks ordered by effective priority at the current time.
   */
  async listTasks(filter?: TaskFilter): Promise<RankedTask[]> {
    const now = this.clock();
    const tasks = await this.taskRepo.findAll(filter);
    return rankTasks(tasks, now).map(task => ({
      task,
      effectivePriority: effectivePriority(task, now),
      urgency: urgencyLabel(task, now),
    }));
  }

  async updateTask(id: number, updates: UpdateTaskPayload): Promise<Task> {
    const task = await this.getTask(id);
    const updated = await this.taskRepo.update(applyTaskUpdate(task, updates));
    await this.eventBus.emit('task:updated', updated);
    return updated;
  }

  async deleteTask(id: number): Promise<void> {
    const deleted = await this.taskRepo.delete(id);
    if (!deleted) {
      throw new NotFoundError('Task', id);
    }
    await this.eventBus.emit('task:deleted', { id });
  }

  /**
   * Mark a task completed. A recurring task gets its next instance created
   * on the first matching day after both today and its own scheduled date.
   */
  async completeTask(id: number): Promise<CompletionResult> {
    const task = await this.getTask(id);
    if (task.isCompleted) {
      throw new ValidationError(`Task ${id} is already completed`);
    }

    const completed = await this.taskRepo.update({ ...task, isCompleted: true });

    let nextInstance: Task | null = null;
    if (completed.isRecurring) {
      const now = this.clock();
      const scheduled = completed.scheduledDate ? parseDateKey(completed.scheduledDate) : null;
      const after = scheduled && isAfter(scheduled, now) ? scheduled : now;
      const nextDate = nextOccurrence(completed.recurrence, after);
      if (nextDate) {
        nextInstance = await this.taskRepo.create(copyWithDate(completed, nextDate));
        await this.eventBus.emit('task:created', nextInstance);
      }
    }

    await this.eventBus.emit('task:completed', { task: completed, nextInstance });
    return { task: completed, nextInstance };
  }

  /**
   * Dates in [from, to] on which the task's recurrence applies.
   */
  async getOccurrences(id: number, from: string, to: string): Promise<string[]> {
    const task = await this.getTask(id);
    const start = parseDateKey(from);
    const end = parseDateKey(to);
    if (!start || !end) {
      throw new ValidationError('from and to must be yyyy-MM-dd dates', { from, to });
    }
    if (isAfter(start, end)) {
      throw new ValidationError('from must not be after to', { from, to });
    }
    return occurrencesInRange(task.recurrence, start, end).map(toDateKey);
  }
}
