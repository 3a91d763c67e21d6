import { Clock, systemClock } from '../../domain/common/Clock';
import { INotificationIdGenerator } from '../../domain/common/IIdGenerator';
import { ILogger } from '../../domain/common/ILogger';
import { toError } from '../../domain/common/Errors';
import { composeTriggerAlert, queuedSpeechText } from '../../domain/notifications/alertComposer';
import { decideTriggerOutcome, TriggerDecision } from '../../domain/priority/triggerPolicy';
import { IKeyValueStore } from '../../domain/repositories/IKeyValueStore';
import { IStorageGateway, StorageSession } from '../../domain/repositories/IStorageGateway';
import { IMailboxDirectory } from '../../domain/services/IMailboxDirectory';
import { INotificationDisplay } from '../../domain/services/INotificationDisplay';
import { ISpeechService } from '../../domain/services/ISpeechService';
import { AckOutcome, GeofenceEvent, NewNotificationHistoryEntry, SpeechMode, Task, TriggerReport } from '../../types';
import { GeofenceEventChannel } from '../channel/GeofenceEventChannel';
import { ActiveTaskMarkerStore } from '../state/ActiveTaskMarkerStore';
import { PendingTaskQueue } from '../state/PendingTaskQueue';
import { resolveCandidates } from './CandidateResolver';

export interface TriggerSettings {
  ackTimeoutMs: number;
  snoozeMinutes: number;
  alertSettleMs: number;
  speechEnabledByDefault: boolean;
  speechPollIntervalMs: number;
  speechMaxWaitMs: number;
}

/**
 * Everything a background invocation may touch. Nothing here holds state
 * owned by the foreground except the shared files and the mailbox directory.
 */
export interface TriggerCapabilities {
  storage: IStorageGateway;
  state: IKeyValueStore;
  mailboxes: IMailboxDirectory;
  display: INotificationDisplay;
  speech: ISpeechService;
  ids: INotificationIdGenerator;
  logger: ILogger;
  settings: TriggerSettings;
  clock?: Clock;
  sleep?: (ms: number) => Promise<void>;
}

const defaultSleep = (ms: number) => new Promise<void>(resolve => setTimeout(resolve, ms));

/**
 * Handles one geofence event outside the foreground. A new instance is
 * created per event and discarded afterwards.
 */
export class GeofenceTriggerHandler {
  private readonly logger: ILogger;
  private readonly clock: Clock;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly channel: GeofenceEventChannel;
  private readonly markers: ActiveTaskMarkerStore;
  private readonly pending: PendingTaskQueue;
  private readonly sessions: StorageSession[] = [];

  constructor(private readonly caps: TriggerCapabilities) {
    this.logger = caps.logger.child({ component: 'trigger-handler' });
    this.clock = caps.clock ?? systemClock;
    this.sleep = caps.sleep ?? defaultSleep;
    this.channel = new GeofenceEventChannel(caps.mailboxes, this.logger, this.clock);
    this.markers = new ActiveTaskMarkerStore(caps.state, this.logger);
    this.pending = new PendingTaskQueue(caps.state, caps.settings.snoozeMinutes * 60_000, this.logger, this.clock);
  }

  /**
   * Run the whole trigger flow. Resolves null for events that are ignored
   * (no geofence ids, or an exit).
   * @throws when no storage connection can be opened
   */
  async handle(event: GeofenceEvent): Promise<TriggerReport | null> {
    if (event.geofenceIds.length === 0) {
      this.logger.warn('Geofence event without geofence ids, ignoring', { event: event.event });
      return null;
    }
    if (event.event === 'exit') {
      this.logger.info('Exit event ignored', { geofenceIds: event.geofenceIds });
      return null;
    }

    try {
      let storage = await this.openSession();

      const notificationId = this.caps.ids.next();
      const ackOutcome = await this.handshake(event, notificationId);

      const now = this.clock();
      const { tasks: candidates, byGeofence } = await resolveCandidates(storage, event.geofenceIds, now);
      const { decision, activeTask } = await this.decide(storage, candidates, now);
      const contenders = activeTask ? candidates.filter(task => task.id !== activeTask.id) : candidates;
      const preemptivelySuppressed = decision.kind === 'queue';

      const alert = composeTriggerAlert(notificationId, candidates, event.event, event.geofenceIds);
      let alertShown = false;

      if (ackOutcome !== null) {
        this.logger.info('Foreground handled trigger, no alert', { notificationId, ackOutcome });
      } else if (preemptivelySuppressed) {
        await this.enqueue(contenders, byGeofence, notificationId);
      } else {
        alertShown = await this.showAlert(alert.id, () => this.caps.display.show(alert));
      }

      const spoken = await this.speak(contenders, preemptivelySuppressed || ackOutcome === 'queued');

      let recorded = 0;
      for (const geofenceId of event.geofenceIds) {
        const entry: NewNotificationHistoryEntry = {
          notificationId,
          geofenceId,
          taskName: byGeofence.get(geofenceId)?.name ?? null,
          eventType: event.event,
          body: alert.body,
          timestamp: this.clock().getTime(),
        };
        const result = await this.recordHistory(storage, entry);
        storage = result.storage;
        if (result.ok) recorded++;
      }
      if (recorded > 0) {
        this.channel.notifyHistoryRecorded(notificationId, event.geofenceIds, recorded);
      }

      const report: TriggerReport = {
        notificationId,
        event: event.event,
        geofenceIds: [...event.geofenceIds],
        ackOutcome,
        decision: decision.kind,
        candidateTaskIds: candidates.map(task => task.id),
        alertShown,
        spoken,
        historyRecorded: recorded,
      };
      this.logger.info('Trigger handled', { ...report });
      return report;
    } finally {
      await this.closeSessions();
    }
  }

  private async openSession(): Promise<StorageSession> {
    try {
      const session = await this.caps.storage.open({ readOnly: false });
      this.sessions.push(session);
      return session;
    } catch (err) {
      this.logger.error('Could not open storage for trigger', toError(err));
      throw err;
    }
  }

  private async handshake(event: GeofenceEvent, notificationId: number): Promise<AckOutcome | null> {
    try {
      return await this.channel.announceAndAwaitAck(event, notificationId, this.caps.settings.ackTimeoutMs);
    } catch (err) {
      this.logger.warn('Handshake failed, continuing without ack', { notificationId, error: toError(err).message });
      return null;
    }
  }

  private async decide(
    storage: StorageSession,
    candidates: readonly Task[],
    now: Date
  ): Promise<{ decision: TriggerDecision; activeTask: Task | null }> {
    let activeTask: Task | null = null;
    try {
      const marker = await this.markers.read();
      if (marker) {
        activeTask = await storage.tasks.findById(marker.taskId);
      }
    } catch (err) {
      this.logger.warn('Active task unreadable, treating as none', { error: toError(err).message });
      activeTask = null;
    }
    return { decision: decideTriggerOutcome(candidates, activeTask, now), activeTask };
  }

  private async enqueue(tasks: readonly Task[], byGeofence: Map<string, Task | null>, notificationId: number): Promise<void> {
    for (const task of tasks) {
      const geofenceId = task.geofenceId ?? [...byGeofence].find(([, best]) => best?.id === task.id)?.[0] ?? null;
      try {
        await this.pending.enqueue({ taskId: task.id, geofenceId, notificationId });
      } catch (err) {
        this.logger.error('Could not queue pending task', toError(err), { taskId: task.id });
      }
    }
    this.logger.info('Trigger suppressed by active task, candidates queued', {
      notificationId,
      taskIds: tasks.map(task => task.id),
    });
  }

  private async showAlert(notificationId: number, show: () => Promise<void>): Promise<boolean> {
    try {
      await show();
    } catch (err) {
      this.logger.error('Could not show trigger alert', toError(err), { notificationId });
      return false;
    }
    if (this.caps.settings.alertSettleMs > 0) {
      await this.sleep(this.caps.settings.alertSettleMs);
    }
    return true;
  }

  private async speak(tasks: readonly Task[], suppressed: boolean): Promise<string[]> {
    const speakable = tasks.filter(task =>
      task.name.trim() !== '' && (task.enableSpeech ?? this.caps.settings.speechEnabledByDefault)
    );
    if (speakable.length === 0) return [];

    const { speech } = this.caps;
    try {
      if (!(await speech.isAvailable())) {
        this.logger.debug('Speech unavailable, skipping');
        return [];
      }
    } catch (err) {
      this.logger.warn('Speech availability check failed', { error: toError(err).message });
      return [];
    }

    const mode: SpeechMode = suppressed ? 'snooze' : 'location';
    const spoken: string[] = [];
    for (const task of speakable) {
      const text = suppressed ? queuedSpeechText(task.name) : task.name;
      try {
        await speech.speak(text, mode);
        spoken.push(text);
        await this.waitForSpeech();
      } catch (err) {
        this.logger.warn('Speech failed', { taskId: task.id, error: toError(err).message });
      }
    }
    return spoken;
  }

  private async waitForSpeech(): Promise<void> {
    const { speechPollIntervalMs, speechMaxWaitMs } = this.caps.settings;
    for (let waited = 0; this.caps.speech.isSpeaking() && waited < speechMaxWaitMs; waited += speechPollIntervalMs) {
      await this.sleep(speechPollIntervalMs);
    }
  }

  /**
   * Insert one history row. A failure after the repository's own retries
   * gets one more attempt on a freshly opened connection.
   */
  private async recordHistory(
    storage: StorageSession,
    entry: NewNotificationHistoryEntry
  ): Promise<{ ok: boolean; storage: StorageSession }> {
    try {
      await storage.notificationHistory.insert(entry);
      return { ok: true, storage };
    } catch (err) {
      this.logger.warn('History insert failed, retrying on a new connection', {
        geofenceId: entry.geofenceId,
        error: toError(err).message,
      });
    }

    let fresh: StorageSession;
    try {
      fresh = await this.caps.storage.open({ readOnly: false });
      this.sessions.push(fresh);
    } catch (err) {
      this.logger.error('Could not reopen storage for history', toError(err), { geofenceId: entry.geofenceId });
      return { ok: false, storage };
    }

    try {
      await fresh.notificationHistory.insert(entry);
      return { ok: true, storage: fresh };
    } catch (err) {
      this.logger.error('Notification history not recorded', toError(err), { geofenceId: entry.geofenceId });
      return { ok: false, storage: fresh };
    }
  }

  private async closeSessions(): Promise<void> {
    for (const session of this.sessions.splice(0)) {
      try {
        await session.close();
      } catch (err) {
        this.logger.warn('Failed to close storage session', { error: toError(err).message });
      }
    }
  }
}

/**
 * Entry point for the platform: one fresh handler per event.
 */
export function handleGeofenceEvent(event: GeofenceEvent, caps: TriggerCapabilities): Promise<TriggerReport | null> {
  return new GeofenceTriggerHandler(caps).handle(event);
}
