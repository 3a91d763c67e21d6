import { Clock, systemClock } from '../../domain/common/Clock';
import { toDateKey } from '../../domain/common/dates';
import { ILogger } from '../../domain/common/ILogger';
import { ConflictError, NotFoundError, ValidationError, toError } from '../../domain/common/Errors';
import { TriggerNotice } from '../../domain/events/DomainEvents';
import { IEventBus } from '../../domain/events/IEventBus';
import { composePreemptionPrompt } from '../../domain/notifications/alertComposer';
import { decideTriggerOutcome } from '../../domain/priority/triggerPolicy';
import { StorageSession } from '../../domain/repositories/IStorageGateway';
import { INotificationDisplay } from '../../domain/services/INotificationDisplay';
import {
  ActiveSession,
  NotificationActionId,
  PendingTask,
  Task,
  TaskHistoryEntry,
  TriggerDecisionKind,
} from '../../types';
import { GeofenceEventChannel, HistoryRecordedMessage, TriggerAnnouncement } from '../channel/GeofenceEventChannel';
import { ActiveTaskMarkerStore } from '../state/ActiveTaskMarkerStore';
import { PendingTaskQueue } from '../state/PendingTaskQueue';
import { resolveCandidates } from './CandidateResolver';
import { CompletionResult, TaskService } from './TaskService';

export interface EndSessionOptions {
  markCompleted?: boolean;
}

export interface EndedSession {
  entry: TaskHistoryEntry;
  completion: CompletionResult | null;
}

export interface ActionResult {
  action: NotificationActionId;
  session: ActiveSession | null;
  pending: PendingTask | null;
}

/**
 * Foreground owner of the active-task state. Starts and ends work sessions
 * and answers the trigger announcements posted by background handlers.
 */
export class ActiveTaskArbiter {
  private readonly logger: ILogger;

  constructor(
    private storage: Pick<StorageSession, 'tasks' | 'geofences' | 'taskHistory'>,
    private taskService: TaskService,
    private markers: ActiveTaskMarkerStore,
    private pending: PendingTaskQueue,
    private channel: GeofenceEventChannel,
    private display: INotificationDisplay,
    private eventBus: IEventBus,
    logger: ILogger,
    private clock: Clock = systemClock
  ) {
    this.logger = logger.child({ service: 'arbiter' });
  }

  /**
   * Begin listening for background triggers on the well-known ports.
   */
  start(): void {
    this.channel.listen(
      announcement => this.handleAnnouncement(announcement).then(() => undefined),
      message => this.republishHistory(message)
    );
  }

  stop(): void {
    this.channel.close();
  }

  async getActiveSession(): Promise<ActiveSession | null> {
    const marker = await this.markers.read();
    if (!marker) return null;

    const task = await this.storage.tasks.findById(marker.taskId);
    if (!task) {
      this.logger.warn('Active task marker points at a missing task', { taskId: marker.taskId });
      return null;
    }
    return { marker, task };
  }

  /**
   * @throws {NotFoundError} if the task does not exist
   * @throws {ValidationError} if the task is already completed
   * @throws {ConflictError} if another session is active
   */
  async startSession(taskId: number): Promise<ActiveSession> {
    const task = await this.storage.tasks.findById(taskId);
    if (!task) {
      throw new NotFoundError('Task', taskId);
    }
    if (task.isCompleted) {
      throw new ValidationError(`Task ${taskId} is already completed`);
    }

    const marker = await this.markers.read();
    if (marker) {
      const markedTask = await this.storage.tasks.findById(marker.taskId);
      if (markedTask) {
        throw new ConflictError('A task session is already active', { activeTaskId: marker.taskId });
      }
      this.logger.warn('Clearing stale active task marker', { taskId: marker.taskId });
      await this.markers.clear();
    }

    // An open entry surviving a crash is resumed instead of duplicated
    const entry = await this.storage.taskHistory.findOpenByTaskId(taskId) ?? await this.storage.taskHistory.open({
      taskId,
      taskName: task.name,
      taskPriority: task.priority,
      startTime: this.clock().getTime(),
      geofenceId: task.geofenceId,
    });

    const session: ActiveSession = { marker: { taskId, startedAt: entry.startTime }, task };
    await this.markers.write(session.marker);
    if (await this.pending.remove(taskId)) {
      await this.eventBus.emit('pending:removed', { taskId });
    }

    await this.eventBus.emit('session:started', session);
    this.logger.info('Session started', { taskId, historyId: entry.id });
    return session;
  }

  /**
   * Close the open session of a task.
   * @throws {NotFoundError} if the task has no open session
   */
  async endSession(taskId: number, endedAt: Date = this.clock(), options: EndSessionOptions = {}): Promise<EndedSession> {
    const open = await this.storage.taskHistory.findOpenByTaskId(taskId);
    if (!open) {
      throw new NotFoundError('Open session for task', taskId);
    }

    const endTime = endedAt.getTime();
    const entry = await this.storage.taskHistory.close(open.id, {
      endTime,
      durationSeconds: Math.max(0, Math.floor((endTime - open.startTime) / 1000)),
      completionDate: toDateKey(endedAt),
    });
    await this.clearMarkerFor(taskId);

    let completion: CompletionResult | null = null;
    if (options.markCompleted) {
      const task = await this.storage.tasks.findById(taskId);
      if (task && !task.isCompleted) {
        completion = await this.taskService.completeTask(taskId);
      }
    }

    await this.eventBus.emit('session:ended', { taskId, entry });
    this.logger.info('Session ended', { taskId, durationSeconds: entry.durationSeconds, completed: completion !== null });
    return { entry, completion };
  }

  /**
   * Drop the open session of a task without recording it.
   * @throws {NotFoundError} if the task has no open session
   */
  async abandonSession(taskId: number): Promise<void> {
    const open = await this.storage.taskHistory.findOpenByTaskId(taskId);
    if (!open) {
      throw new NotFoundError('Open session for task', taskId);
    }
    await this.storage.taskHistory.delete(open.id);
    await this.clearMarkerFor(taskId);

    await this.eventBus.emit('session:abandoned', { taskId });
    this.logger.info('Session abandoned', { taskId });
  }

  /**
   * React to a trigger announced by a background handler. Only the queue
   * and preempt outcomes are acknowledged; otherwise the background alerts.
   */
  async handleAnnouncement(announcement: TriggerAnnouncement): Promise<TriggerDecisionKind> {
    const now = this.clock();
    const { tasks: candidates } = await resolveCandidates(this.storage, announcement.geofenceIds, now);
    const active = await this.getActiveSession();
    const activeTask = active ? active.task : null;
    const decision = decideTriggerOutcome(candidates, activeTask, now);
    const contenders = activeTask ? candidates.filter(task => task.id !== activeTask.id) : candidates;

    const notice: TriggerNotice = {
      notificationId: announcement.notificationId,
      geofenceIds: announcement.geofenceIds,
      taskIds: contenders.map(task => task.id),
      decision: decision.kind,
      incomingHighest: decision.incomingHighest,
      activePriority: decision.activePriority,
      activeTaskId: decision.activeTaskId,
    };

    switch (decision.kind) {
      case 'none':
        this.logger.debug('Trigger has no candidates', { notificationId: announcement.notificationId });
        break;

      case 'announce':
        await this.eventBus.emit('trigger:announced', notice);
        break;

      case 'queue':
        this.channel.acknowledge(announcement, 'queued');
        for (const task of contenders) {
          await this.enqueue(task, announcement.notificationId);
        }
        await this.eventBus.emit('trigger:queued', notice);
        break;

      case 'preempt':
        this.channel.acknowledge(announcement, 'preempt');
        if (activeTask) {
          await this.promptPreemption(announcement.notificationId, contenders[0], activeTask);
        }
        await this.eventBus.emit('trigger:preempt_prompt', notice);
        break;
    }

    this.logger.info('Trigger arbitrated', { notificationId: announcement.notificationId, decision: decision.kind });
    return decision.kind;
  }

  /**
   * Apply the user's answer to an alert or preemption prompt.
   */
  async respondToAction(action: NotificationActionId, taskId: number, notificationId?: number): Promise<ActionResult> {
    const task = await this.storage.tasks.findById(taskId);
    if (!task) {
      throw new NotFoundError('Task', taskId);
    }

    let result: ActionResult;
    if (action === 'do_now') {
      const active = await this.getActiveSession();
      if (active && active.task.id === taskId) {
        result = { action, session: active, pending: null };
      } else {
        if (active) {
          await this.endSession(active.task.id, this.clock(), { markCompleted: false });
        }
        result = { action, session: await this.startSession(taskId), pending: null };
      }
    } else {
      result = { action, session: null, pending: await this.enqueue(task, notificationId ?? null) };
    }

    if (notificationId !== undefined) {
      await this.display.cancel(notificationId);
    }
    return result;
  }

  async listPending(): Promise<PendingTask[]> {
    return this.pending.list();
  }

  /**
   * @throws {NotFoundError} if the task is not queued
   */
  async dismissPending(taskId: number): Promise<void> {
    if (!(await this.pending.remove(taskId))) {
      throw new NotFoundError('Pending task', taskId);
    }
    await this.eventBus.emit('pending:removed', { taskId });
  }

  private async enqueue(task: Task, notificationId: number | null): Promise<PendingTask> {
    const pending = await this.pending.enqueue({ taskId: task.id, geofenceId: task.geofenceId, notificationId });
    await this.eventBus.emit('pending:added', pending);
    return pending;
  }

  private async promptPreemption(notificationId: number, incoming: Task, active: Task): Promise<void> {
    try {
      await this.display.show(composePreemptionPrompt(notificationId, incoming, active));
    } catch (err) {
      this.logger.error('Could not show preemption prompt', toError(err), { notificationId });
    }
  }

  private async clearMarkerFor(taskId: number): Promise<void> {
    const marker = await this.markers.read();
    if (marker && marker.taskId === taskId) {
      await this.markers.clear();
    }
  }

  private async republishHistory(message: HistoryRecordedMessage): Promise<void> {
    await this.eventBus.emit('notification_history:recorded', {
      notificationId: message.notificationId,
      geofenceIds: message.geofenceIds,
      recorded: message.recorded,
    });
  }
}
