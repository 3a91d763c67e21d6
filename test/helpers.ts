import * as fs from 'fs';
import * as fsp from 'fs/promises';
import * as path from 'path';
import * as os from 'os';
import { Config, TriggerConfig } from '../src/infrastructure/config/Config';
import { Container, createContainer } from '../src/container';
import { ILogger, LogMetadata } from '../src/domain/common/ILogger';
import { INotificationIdGenerator } from '../src/domain/common/IIdGenerator';
import { INotificationDisplay } from '../src/domain/services/INotificationDisplay';
import { ISpeechService } from '../src/domain/services/ISpeechService';
import { RecurrencePattern } from '../src/domain/recurrence/RecurrencePattern';
import { NotificationRequest, SpeechMode, Task } from '../src/types';

/**
 * Test helper utilities
 */

export class TestDataDir {
  private testDir: string;

  constructor() {
    this.testDir = fs.mkdtempSync(path.join(os.tmpdir(), 'geotask-test-'));
  }

  getPath(...segments: string[]): string {
    return path.join(this.testDir, ...segments);
  }

  async cleanup(): Promise<void> {
    await fsp.rm(this.testDir, { recursive: true, force: true });
  }
}

/**
 * Wait for a condition to be true
 */
export async function waitFor(
  condition: () => boolean | Promise<boolean>,
  timeout: number = 5000,
  interval: number = 20
): Promise<void> {
  const startTime = Date.now();

  while (Date.now() - startTime < timeout) {
    if (await condition()) {
      return;
    }
    await wait(interval);
  }

  throw new Error(`Condition not met within ${timeout}ms`);
}

export function wait(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

export const noSleep = async (_ms: number): Promise<void> => undefined;

export interface LoggedLine {
  level: 'error' | 'warn' | 'info' | 'debug';
  message: string;
  meta?: LogMetadata;
}

/**
 * Logger that records instead of printing.
 */
export class RecordingLogger implements ILogger {
  constructor(readonly lines: LoggedLine[] = []) {}

  error(message: string, error?: Error, meta?: LogMetadata): void {
    this.lines.push({ level: 'error', message, meta: { ...meta, error: error?.message } });
  }
  warn(message: string, meta?: LogMetadata): void {
    this.lines.push({ level: 'warn', message, meta });
  }
  info(message: string, meta?: LogMetadata): void {
    this.lines.push({ level: 'info', message, meta });
  }
  debug(message: string, meta?: LogMetadata): void {
    this.lines.push({ level: 'debug', message, meta });
  }
  child(): ILogger {
    return new RecordingLogger(this.lines);
  }

  messages(level: LoggedLine['level']): string[] {
    return this.lines.filter(line => line.level === level).map(line => line.message);
  }
}

export class FakeNotificationDisplay implements INotificationDisplay {
  shown: NotificationRequest[] = [];
  cancelled: number[] = [];

  async show(request: NotificationRequest): Promise<void> {
    this.shown.push(request);
  }

  async cancel(id: number): Promise<void> {
    this.cancelled.push(id);
  }
}

/**
 * Speech that "talks" for a fixed number of isSpeaking polls.
 */
export class FakeSpeechService implements ISpeechService {
  spoken: Array<{ text: string; mode: SpeechMode }> = [];
  private remainingPolls = 0;

  constructor(private available: boolean = true, private pollsPerUtterance: number = 0) {}

  async isAvailable(): Promise<boolean> {
    return this.available;
  }

  async speak(text: string, mode: SpeechMode): Promise<void> {
    this.spoken.push({ text, mode });
    this.remainingPolls = this.pollsPerUtterance;
  }

  isSpeaking(): boolean {
    if (this.remainingPolls <= 0) return false;
    this.remainingPolls--;
    return true;
  }
}

export class SequenceIdGenerator implements INotificationIdGenerator {
  constructor(private nextId: number = 1001) {}

  next(): number {
    return this.nextId++;
  }
}

export function fixedClock(iso: string): () => Date {
  const time = new Date(iso).getTime();
  return () => new Date(time);
}

/**
 * Config rooted in a temp dir with fast timings.
 */
export function testConfig(dir: TestDataDir, trigger: Partial<TriggerConfig> = {}): Config {
  return Config.fromObject({
    dataDir: dir.getPath(),
    stateDir: dir.getPath('state'),
    storage: {
      databaseFile: dir.getPath('geotask.db'),
      busyTimeoutMs: 2000,
      retry: { maxAttempts: 3, baseDelayMs: 1, maxDelayMs: 5 },
    },
    trigger: { ackTimeoutMs: 300, snoozeMinutes: 5, alertSettleMs: 0, ...trigger },
    speech: { command: null, enabledByDefault: true, pollIntervalMs: 10, maxWaitMs: 100 },
    nodeEnv: 'test',
  });
}

export function makeTask(overrides: Partial<Task> = {}): Task {
  return {
    id: 1,
    name: 'Buy milk',
    priority: 3,
    scheduledDate: null,
    scheduledTime: null,
    isRecurring: false,
    recurrence: RecurrencePattern.none(),
    geofenceId: null,
    isCompleted: false,
    notificationSound: null,
    enableSpeech: null,
    createdAt: 0,
    ...overrides,
  };
}

export interface TestContainer {
  container: Container;
  display: FakeNotificationDisplay;
  speech: FakeSpeechService;
  logger: RecordingLogger;
}

/**
 * Fully wired container on a temp directory with recording fakes for the
 * notification display and speech.
 */
export async function createTestContainer(
  dir: TestDataDir,
  options: { clock?: () => Date; trigger?: Partial<TriggerConfig> } = {}
): Promise<TestContainer> {
  const display = new FakeNotificationDisplay();
  const speech = new FakeSpeechService();
  const logger = new RecordingLogger();
  const container = await createContainer({
    config: testConfig(dir, options.trigger),
    logger,
    display,
    speech,
    notificationIds: new SequenceIdGenerator(),
    clock: options.clock,
    sleep: noSleep,
  });
  return { container, display, speech, logger };
}
