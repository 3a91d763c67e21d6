import { Container } from '../../src/container';
import { GeofenceTriggerHandler } from '../../src/application/services/GeofenceTriggerHandler';
import { IStorageGateway, OpenStorageOptions, StorageSession } from '../../src/domain/repositories/IStorageGateway';
import { PendingTaskQueue } from '../../src/application/state/PendingTaskQueue';
import { FileSystemKeyValueStore } from '../../src/infrastructure/state/FileSystemKeyValueStore';
import {
  FakeNotificationDisplay,
  FakeSpeechService,
  RecordingLogger,
  SequenceIdGenerator,
  TestDataDir,
  createTestContainer,
  noSleep,
  waitFor,
} from '../helpers';

describe('GeofenceTriggerHandler', () => {
  let testDataDir: TestDataDir;
  let container: Container;
  let display: FakeNotificationDisplay;
  let speech: FakeSpeechService;
  let logger: RecordingLogger;

  beforeEach(async () => {
    testDataDir = new TestDataDir();
    ({ container, display, speech, logger } = await createTestContainer(testDataDir, { trigger: { ackTimeoutMs: 1000 } }));
  });

  afterEach(async () => {
    await container.shutdown();
    await testDataDir.cleanup();
  });

  it('should ignore events without geofence ids', async () => {
    expect(await container.handleGeofenceEvent({ event: 'enter', geofenceIds: [], location: null })).toBeNull();
    expect(display.shown).toEqual([]);
  });

  it('should ignore exit events', async () => {
    await container.taskService.createTask({ name: 'Buy milk', geofenceId: 'shop' });

    expect(await container.handleGeofenceEvent({ event: 'exit', geofenceIds: ['shop'], location: null })).toBeNull();
    expect(display.shown).toEqual([]);
    expect(await container.historyService.listNotificationHistory()).toEqual([]);
  });

  describe('without a foreground listener', () => {
    it('should alert, speak and record history', async () => {
      const task = await container.taskService.createTask({ name: 'Buy milk', geofenceId: 'shop' });

      const report = await container.handleGeofenceEvent({ event: 'enter', geofenceIds: ['shop'], location: null });

      expect(report).toEqual({
        notificationId: 1001,
        event: 'enter',
        geofenceIds: ['shop'],
        ackOutcome: null,
        decision: 'announce',
        candidateTaskIds: [task.id],
        alertShown: true,
        spoken: ['Buy milk'],
        historyRecorded: 1,
      });
      expect(display.shown).toHaveLength(1);
      expect(display.shown[0]).toMatchObject({ id: 1001, title: 'Medium Priority Task', body: 'You have task Buy milk' });
      expect(speech.spoken).toEqual([{ text: 'Buy milk', mode: 'location' }]);

      const history = await container.historyService.listNotificationHistory();
      expect(history).toHaveLength(1);
      expect(history[0]).toMatchObject({
        notificationId: 1001,
        geofenceId: 'shop',
        taskName: 'Buy milk',
        eventType: 'enter',
        body: 'You have task Buy milk',
      });
    });

    it('should record one history row per geofence, even without a task', async () => {
      await container.taskService.createTask({ name: 'Buy milk', geofenceId: 'shop' });

      const report = await container.handleGeofenceEvent({ event: 'enter', geofenceIds: ['shop', 'park'], location: null });

      expect(report?.historyRecorded).toBe(2);
      const history = await container.historyService.listNotificationHistory();
      expect(history.map(entry => [entry.geofenceId, entry.taskName]).sort()).toEqual([['park', null], ['shop', 'Buy milk']]);
    });

    it('should fall back to the legacy task name of a geofence', async () => {
      await container.geofenceService.createGeofence({ id: 'bakery', latitude: 1, longitude: 1, task: 'Bread' });
      const task = await container.taskService.createTask({ name: 'Bread' });

      const report = await container.handleGeofenceEvent({ event: 'enter', geofenceIds: ['bakery'], location: null });

      expect(report?.candidateTaskIds).toEqual([task.id]);
      expect(display.shown[0].body).toBe('You have task Bread');
    });

    it('should alert without candidates and skip speech', async () => {
      const report = await container.handleGeofenceEvent({ event: 'enter', geofenceIds: ['nowhere'], location: null });

      expect(report?.decision).toBe('none');
      expect(report?.alertShown).toBe(true);
      expect(display.shown[0].body).toBe('Event: enter for geofences: nowhere');
      expect(speech.spoken).toEqual([]);
    });

    it('should not speak tasks that opted out', async () => {
      await container.taskService.createTask({ name: 'Quiet', geofenceId: 'shop', enableSpeech: false });

      const report = await container.handleGeofenceEvent({ event: 'enter', geofenceIds: ['shop'], location: null });

      expect(report?.spoken).toEqual([]);
      expect(speech.spoken).toEqual([]);
    });

    it('should queue instead of alerting when the active task wins', async () => {
      const active = await container.taskService.createTask({ name: 'Report', priority: 5 });
      await container.arbiter.startSession(active.id);
      const incoming = await container.taskService.createTask({ name: 'Laundry', priority: 2, geofenceId: 'home' });

      const report = await container.handleGeofenceEvent({ event: 'enter', geofenceIds: ['home'], location: null });

      expect(report).toMatchObject({ ackOutcome: null, decision: 'queue', alertShown: false, historyRecorded: 1 });
      expect(display.shown).toEqual([]);
      expect(speech.spoken).toEqual([{ text: 'Laundry added to pending queue.', mode: 'snooze' }]);

      const pending = await container.arbiter.listPending();
      expect(pending).toHaveLength(1);
      expect(pending[0]).toMatchObject({ taskId: incoming.id, geofenceId: 'home', notificationId: 1001 });
    });
  });

  describe('with the foreground listening', () => {
    beforeEach(() => {
      container.arbiter.start();
    });

    it('should let the foreground prompt when an incoming task outranks the active one', async () => {
      const active = await container.taskService.createTask({ name: 'Reading', priority: 2 });
      await container.arbiter.startSession(active.id);
      await container.taskService.createTask({ name: 'Pharmacy', priority: 5, geofenceId: 'pharmacy' });

      const report = await container.handleGeofenceEvent({ event: 'enter', geofenceIds: ['pharmacy'], location: null });

      expect(report).toMatchObject({ ackOutcome: 'preempt', decision: 'preempt', alertShown: false });
      expect(speech.spoken).toEqual([{ text: 'Pharmacy', mode: 'location' }]);

      await waitFor(() => display.shown.length === 1);
      expect(display.shown[0]).toMatchObject({
        id: 1001,
        title: 'Switch to Pharmacy?',
        body: 'Pharmacy outranks your active task Reading.',
      });
    });

    it('should let the foreground queue when the active task wins', async () => {
      const active = await container.taskService.createTask({ name: 'Report', priority: 5 });
      await container.arbiter.startSession(active.id);
      const incoming = await container.taskService.createTask({ name: 'Laundry', priority: 1, geofenceId: 'home' });

      const report = await container.handleGeofenceEvent({ event: 'enter', geofenceIds: ['home'], location: null });

      expect(report).toMatchObject({ ackOutcome: 'queued', decision: 'queue', alertShown: false });
      expect(display.shown).toEqual([]);
      expect(speech.spoken).toEqual([{ text: 'Laundry added to pending queue.', mode: 'snooze' }]);
      await waitFor(async () => (await container.arbiter.listPending()).length === 1);
      expect((await container.arbiter.listPending())[0].taskId).toBe(incoming.id);
    });

    it('should not acknowledge plain announcements', async () => {
      await container.taskService.createTask({ name: 'Buy milk', geofenceId: 'shop' });
      const announced: number[] = [];
      container.eventBus.on('trigger:announced', (notice) => {
        announced.push(notice.notificationId);
      });

      const report = await container.handleGeofenceEvent({ event: 'enter', geofenceIds: ['shop'], location: null });

      expect(report).toMatchObject({ ackOutcome: null, decision: 'announce', alertShown: true });
      expect(announced).toEqual([1001]);
    });

    it('should republish recorded history on the event bus', async () => {
      const recorded: number[] = [];
      container.eventBus.on('notification_history:recorded', (message) => {
        recorded.push(message.recorded);
      });

      await container.handleGeofenceEvent({ event: 'enter', geofenceIds: ['a', 'b'], location: null });

      await waitFor(() => recorded.length === 1);
      expect(recorded).toEqual([2]);
    });
  });

  it('should retry a failed history insert on a fresh connection', async () => {
    const gateway = container.storageGateway;
    let opened = 0;
    const flaky: IStorageGateway = {
      async open(options: OpenStorageOptions): Promise<StorageSession> {
        const real = await gateway.open(options);
        opened++;
        if (opened > 1) return real;
        return {
          tasks: real.tasks,
          geofences: real.geofences,
          taskHistory: real.taskHistory,
          notificationHistory: {
            insert: async () => {
              throw new Error('disk I/O error');
            },
            findAll: (limit) => real.notificationHistory.findAll(limit),
            clearAll: () => real.notificationHistory.clearAll(),
            restore: (entry) => real.notificationHistory.restore(entry),
          },
          transaction<T>(body: () => Promise<T>): Promise<T> {
            return real.transaction(body);
          },
          close: () => real.close(),
        };
      },
      checkIntegrity: () => gateway.checkIntegrity(),
    };

    const handler = new GeofenceTriggerHandler({
      storage: flaky,
      state: container.stateStore,
      mailboxes: container.mailboxes,
      display,
      speech,
      ids: new SequenceIdGenerator(5000),
      logger,
      settings: {
        ackTimeoutMs: 100,
        snoozeMinutes: 5,
        alertSettleMs: 0,
        speechEnabledByDefault: true,
        speechPollIntervalMs: 10,
        speechMaxWaitMs: 100,
      },
      sleep: noSleep,
    });

    const report = await handler.handle({ event: 'enter', geofenceIds: ['gate'], location: null });

    expect(report?.historyRecorded).toBe(1);
    expect(opened).toBe(2);
    expect(logger.messages('warn')).toContain('History insert failed, retrying on a new connection');
    const history = await container.historyService.listNotificationHistory();
    expect(history.map(entry => entry.notificationId)).toEqual([5000]);
  });

  it('should wait for speech to finish before the next utterance', async () => {
    const slowSpeech = new FakeSpeechService(true, 3);
    const sleeps: number[] = [];
    await container.taskService.createTask({ name: 'One', geofenceId: 'x' });
    await container.taskService.createTask({ name: 'Two', geofenceId: 'x' });

    const handler = new GeofenceTriggerHandler({
      storage: container.storageGateway,
      state: container.stateStore,
      mailboxes: container.mailboxes,
      display,
      speech: slowSpeech,
      ids: new SequenceIdGenerator(),
      logger,
      settings: {
        ackTimeoutMs: 100,
        snoozeMinutes: 5,
        alertSettleMs: 0,
        speechEnabledByDefault: true,
        speechPollIntervalMs: 10,
        speechMaxWaitMs: 100,
      },
      sleep: async (ms) => { sleeps.push(ms); },
    });

    const report = await handler.handle({ event: 'enter', geofenceIds: ['x'], location: null });

    expect(report?.spoken).toEqual(['One', 'Two']);
    expect(sleeps).toEqual([10, 10, 10, 10, 10, 10]);
  });
});

describe('PendingTaskQueue', () => {
  let testDataDir: TestDataDir;
  let now: number;
  let queue: PendingTaskQueue;

  beforeEach(() => {
    testDataDir = new TestDataDir();
    now = 1_767_600_000_000;
    const clock = () => new Date(now);
    const store = new FileSystemKeyValueStore(testDataDir.getPath('state'), new RecordingLogger(), clock);
    queue = new PendingTaskQueue(store, 300_000, new RecordingLogger(), clock);
  });

  afterEach(async () => {
    await testDataDir.cleanup();
  });

  it('should expire entries after the snooze window', async () => {
    const pending = await queue.enqueue({ taskId: 3, geofenceId: 'home', notificationId: 9 });
    expect(pending.expiresAt).toBe(now + 300_000);

    now += 299_999;
    expect(await queue.isPending(3)).toBe(true);
    now += 1;
    expect(await queue.isPending(3)).toBe(false);
  });

  it('should list entries oldest first', async () => {
    await queue.enqueue({ taskId: 8, geofenceId: null, notificationId: null });
    now += 1000;
    await queue.enqueue({ taskId: 2, geofenceId: null, notificationId: null });

    expect((await queue.list()).map(pending => pending.taskId)).toEqual([8, 2]);
    expect(await queue.remove(8)).toBe(true);
    expect(await queue.remove(8)).toBe(false);
  });
});
