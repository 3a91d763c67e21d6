import * as fs from 'fs/promises';
import { FileSystemKeyValueStore } from '../../src/infrastructure/state/FileSystemKeyValueStore';
import { RecordingLogger, TestDataDir } from '../helpers';

describe('FileSystemKeyValueStore', () => {
  let testDataDir: TestDataDir;
  let logger: RecordingLogger;
  let now: number;
  let store: FileSystemKeyValueStore;

  beforeEach(async () => {
    testDataDir = new TestDataDir();
    logger = new RecordingLogger();
    now = 1_000_000;
    store = new FileSystemKeyValueStore(testDataDir.getPath('state'), logger, () => new Date(now));
    await store.initialize();
  });

  afterEach(async () => {
    await testDataDir.cleanup();
  });

  it('should store and read a value', async () => {
    await store.set('active-task', { taskId: 4, startedAt: 10 });

    expect(await store.get('active-task')).toEqual({
      key: 'active-task',
      value: { taskId: 4, startedAt: 10 },
      expiresAt: null,
      updatedAt: 1_000_000,
    });
  });

  it('should share state between store instances on the same directory', async () => {
    await store.set('pending:1', { taskId: 1 });
    const other = new FileSystemKeyValueStore(testDataDir.getPath('state'), logger);

    expect((await other.get('pending:1'))?.value).toEqual({ taskId: 1 });
  });

  it('should ignore expired entries', async () => {
    await store.set('pending:1', 'x', { ttlMs: 500 });
    now += 499;
    expect((await store.get('pending:1'))?.expiresAt).toBe(1_000_500);
    now += 1;
    expect(await store.get('pending:1')).toBeNull();
  });

  it('should list live entries by prefix', async () => {
    await store.set('pending:2', 'b');
    await store.set('pending:1', 'a');
    await store.set('pending:3', 'c', { ttlMs: 10 });
    await store.set('active-task', 'z');
    now += 10;

    const entries = await store.list('pending:');
    expect(entries.map(entry => entry.value)).toEqual(['a', 'b']);
  });

  it('should report whether a delete removed anything', async () => {
    await store.set('k', 1);
    expect(await store.delete('k')).toBe(true);
    expect(await store.delete('k')).toBe(false);
    expect(await store.get('k')).toBeNull();
  });

  it('should skip unreadable files with a warning', async () => {
    await fs.writeFile(testDataDir.getPath('state', 'broken.json'), '{ not json');

    expect(await store.get('broken')).toBeNull();
    expect(logger.messages('warn')).toEqual(['Ignoring unreadable state file: broken.json']);
  });
});
