import * as fs from 'fs/promises';
import { SqliteStorageGateway } from '../../src/infrastructure/database/SqliteStorageGateway';
import { StorageSession } from '../../src/domain/repositories/IStorageGateway';
import { normalizeTimestamp } from '../../src/infrastructure/repositories/SqliteRepository';
import { buildTaskDraft } from '../../src/domain/tasks/taskRules';
import { RecurrencePattern } from '../../src/domain/recurrence/RecurrencePattern';
import { Geofence } from '../../src/types';
import { RecordingLogger, TestDataDir } from '../helpers';

function geofence(id: string, overrides: Partial<Geofence> = {}): Geofence {
  return {
    id,
    latitude: 52.52,
    longitude: 13.405,
    radiusMeters: 50,
    fillColor: '#3388ff',
    fillOpacity: 0.2,
    strokeColor: '#3388ff',
    strokeWidth: 2,
    task: null,
    createdAt: 1767600000000,
    ...overrides,
  };
}

describe('SqliteStorageGateway', () => {
  let testDataDir: TestDataDir;
  let gateway: SqliteStorageGateway;
  let logger: RecordingLogger;
  const sessions: StorageSession[] = [];

  async function openSession(readOnly = false): Promise<StorageSession> {
    const session = await gateway.open({ readOnly });
    sessions.push(session);
    return session;
  }

  beforeEach(() => {
    testDataDir = new TestDataDir();
    logger = new RecordingLogger();
    gateway = new SqliteStorageGateway({
      databaseFile: testDataDir.getPath('geotask.db'),
      busyTimeoutMs: 2000,
      retry: { maxAttempts: 3, baseDelayMs: 1, maxDelayMs: 5 },
    }, logger);
  });

  afterEach(async () => {
    for (const session of sessions.splice(0)) {
      await session.close();
    }
    await testDataDir.cleanup();
  });

  describe('tasks', () => {
    it('should store and read back a task', async () => {
      await gateway.initialize();
      const storage = await openSession();

      const created = await storage.tasks.create(buildTaskDraft({
        name: 'Gym',
        priority: 4,
        scheduledTime: '18:00',
        recurrence: { type: 'weekly', weekdays: [1, 3], endDate: null },
        geofenceId: 'gym',
        enableSpeech: false,
      }));
      const found = await storage.tasks.findById(created.id);

      expect(found).not.toBeNull();
      expect(found?.name).toBe('Gym');
      expect(found?.priority).toBe(4);
      expect(found?.scheduledTime).toBe('18:00');
      expect(found?.isRecurring).toBe(true);
      expect(found?.recurrence.equals(RecurrencePattern.weekly([1, 3]))).toBe(true);
      expect(found?.enableSpeech).toBe(false);
      expect(found?.notificationSound).toBeNull();
    });

    it('should find open tasks by geofence and by name', async () => {
      const storage = await openSession();
      const a = await storage.tasks.create(buildTaskDraft({ name: 'A', geofenceId: 'home' }));
      const b = await storage.tasks.create(buildTaskDraft({ name: 'B', geofenceId: 'work' }));
      await storage.tasks.update({ ...b, isCompleted: true });
      await storage.tasks.create(buildTaskDraft({ name: 'C', geofenceId: 'shop' }));

      const open = await storage.tasks.findOpenByGeofenceIds(['home', 'work']);
      expect(open.map(task => task.id)).toEqual([a.id]);
      expect((await storage.tasks.findOpenByName('C'))?.geofenceId).toBe('shop');
      expect(await storage.tasks.findOpenByName('B')).toBeNull();
      expect(await storage.tasks.findOpenByGeofenceIds([])).toEqual([]);
    });

    it('should filter by completion and detach a geofence', async () => {
      const storage = await openSession();
      await storage.tasks.create(buildTaskDraft({ name: 'A', geofenceId: 'home' }));
      await storage.tasks.create(buildTaskDraft({ name: 'B', geofenceId: 'home' }));

      expect(await storage.tasks.clearGeofence('home')).toBe(2);
      expect((await storage.tasks.findAll({ completed: false })).map(task => task.geofenceId)).toEqual([null, null]);
      expect(await storage.tasks.findAll({ completed: true })).toEqual([]);
    });

    it('should report deletes of unknown ids', async () => {
      const storage = await openSession();
      expect(await storage.tasks.delete(999)).toBe(false);
    });
  });

  describe('geofences', () => {
    it('should find orphaned geofences', async () => {
      const storage = await openSession();
      await storage.geofences.create(geofence('used'));
      await storage.geofences.create(geofence('legacy', { task: 'Buy milk' }));
      await storage.geofences.create(geofence('orphan'));
      await storage.tasks.create(buildTaskDraft({ name: 'X', geofenceId: 'used' }));

      const orphans = await storage.geofences.findOrphaned();
      expect(orphans.map(g => g.id)).toEqual(['orphan']);
      expect((await storage.geofences.findByIds(['legacy', 'missing'])).map(g => g.task)).toEqual(['Buy milk']);
    });
  });

  describe('history', () => {
    it('should open and close a history entry', async () => {
      const storage = await openSession();
      const entry = await storage.taskHistory.open({
        taskId: 3,
        taskName: 'Read',
        taskPriority: 2,
        startTime: 1767600000000,
        geofenceId: null,
      });

      expect((await storage.taskHistory.findOpenByTaskId(3))?.id).toBe(entry.id);

      const closed = await storage.taskHistory.close(entry.id, {
        endTime: 1767600090000,
        durationSeconds: 90,
        completionDate: '2026-01-05',
      });
      expect(closed.durationSeconds).toBe(90);
      expect(await storage.taskHistory.findOpenByTaskId(3)).toBeNull();
      await expect(storage.taskHistory.close(entry.id, {
        endTime: 1767600100000,
        durationSeconds: 100,
        completionDate: '2026-01-05',
      })).rejects.toThrow("Open task history entry with id '1' not found");
    });

    it('should allow only one open entry per task', async () => {
      const storage = await openSession();
      const open = { taskId: 3, taskName: 'Read', taskPriority: 2, startTime: 1767600000000, geofenceId: null };
      await storage.taskHistory.open(open);

      await expect(storage.taskHistory.open(open)).rejects.toThrow(/UNIQUE constraint failed/);
    });

    it('should list notification history newest first', async () => {
      const storage = await openSession();
      for (const [notificationId, timestamp] of [[1, 1000], [2, 3000], [3, 2000]]) {
        await storage.notificationHistory.insert({
          notificationId,
          geofenceId: 'home',
          taskName: null,
          eventType: 'enter',
          body: `body ${notificationId}`,
          timestamp: timestamp * 1_000_000_000,
        });
      }

      expect((await storage.notificationHistory.findAll()).map(entry => entry.notificationId)).toEqual([2, 3, 1]);
      expect((await storage.notificationHistory.findAll(1)).map(entry => entry.notificationId)).toEqual([2]);
      expect(await storage.notificationHistory.clearAll()).toBe(3);
    });
  });

  describe('sessions', () => {
    it('should roll back a failed transaction', async () => {
      const storage = await openSession();

      await expect(storage.transaction(async () => {
        await storage.tasks.create(buildTaskDraft({ name: 'Doomed' }));
        throw new Error('abort');
      })).rejects.toThrow('abort');

      expect(await storage.tasks.findAll()).toEqual([]);
    });

    it('should let independent sessions see committed writes', async () => {
      const writer = await openSession();
      const reader = await openSession(true);

      const task = await writer.tasks.create(buildTaskDraft({ name: 'Shared' }));
      expect((await reader.tasks.findById(task.id))?.name).toBe('Shared');
    });
  });

  describe('checkIntegrity', () => {
    it('should report a fresh database as healthy', async () => {
      await gateway.initialize();
      expect(await gateway.checkIntegrity()).toEqual({ healthy: true, problems: [], backupPath: null });
    });

    it('should back up and recreate a corrupt file', async () => {
      const file = gateway.databaseFile;
      await fs.writeFile(file, Buffer.alloc(1024, 'x'));

      const report = await gateway.checkIntegrity();

      expect(report.healthy).toBe(false);
      expect(report.problems).toHaveLength(1);
      expect(report.backupPath).not.toBeNull();
      const backup = await fs.readFile(report.backupPath ?? '', 'utf-8');
      expect(backup).toBe('x'.repeat(1024));

      const storage = await openSession();
      expect(await storage.tasks.findAll()).toEqual([]);
    });
  });

  it('should read second-based timestamps as milliseconds', () => {
    expect(normalizeTimestamp(1_700_000_000)).toBe(1_700_000_000_000);
    expect(normalizeTimestamp(1_700_000_000_000)).toBe(1_700_000_000_000);
  });
});
