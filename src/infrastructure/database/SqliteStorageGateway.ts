import * as fs from 'fs/promises';
import * as path from 'path';
import { z } from 'zod';
import { ILogger } from '../../domain/common/ILogger';
import { toError } from '../../domain/common/Errors';
import { IntegrityReport, IStorageGateway, OpenStorageOptions, StorageSession } from '../../domain/repositories/IStorageGateway';
import { SqliteGeofenceRepository } from '../repositories/SqliteGeofenceRepository';
import { SqliteNotificationHistoryRepository } from '../repositories/SqliteNotificationHistoryRepository';
import { SqliteTaskHistoryRepository } from '../repositories/SqliteTaskHistoryRepository';
import { SqliteTaskRepository } from '../repositories/SqliteTaskRepository';
import { IDatabaseConnection } from './IDatabaseConnection';
import { runMigrations } from './migrations';
import { RetryPolicy } from './retry';
import { SqliteConnection } from './SqliteConnection';

export interface SqliteStorageOptions {
  databaseFile: string;
  busyTimeoutMs: number;
  retry: RetryPolicy;
}

const integrityRowSchema = z.object({ integrity_check: z.string() });

export function isCorruptionError(err: unknown): boolean {
  if (!(err instanceof Error)) return false;
  if ('code' in err && (err.code === 'SQLITE_CORRUPT' || err.code === 'SQLITE_NOTADB')) {
    return true;
  }
  return /SQLITE_CORRUPT|SQLITE_NOTADB|malformed|not a database/i.test(err.message);
}

class SqliteStorageSession implements StorageSession {
  readonly tasks: SqliteTaskRepository;
  readonly geofences: SqliteGeofenceRepository;
  readonly taskHistory: SqliteTaskHistoryRepository;
  readonly notificationHistory: SqliteNotificationHistoryRepository;

  constructor(private readonly connection: IDatabaseConnection, retry: RetryPolicy, logger: ILogger) {
    this.tasks = new SqliteTaskRepository(connection, retry, logger);
    this.geofences = new SqliteGeofenceRepository(connection, retry, logger);
    this.taskHistory = new SqliteTaskHistoryRepository(connection, retry, logger);
    this.notificationHistory = new SqliteNotificationHistoryRepository(connection, retry, logger);
  }

  transaction<T>(body: () => Promise<T>): Promise<T> {
    return this.connection.transaction(body);
  }

  close(): Promise<void> {
    return this.connection.close();
  }
}

/**
 * SQLite-backed storage. Every `open` creates an independent connection;
 * concurrency between contexts is left to SQLite's locking.
 */
export class SqliteStorageGateway implements IStorageGateway {
  private readonly logger: ILogger;

  constructor(private readonly options: SqliteStorageOptions, logger: ILogger) {
    this.logger = logger.child({ component: 'storage' });
  }

  get databaseFile(): string {
    return this.options.databaseFile;
  }

  /**
   * Create the data directory and bring the schema up to date.
   */
  async initialize(): Promise<void> {
    await fs.mkdir(path.dirname(this.options.databaseFile), { recursive: true });
    const connection = await this.connect(false);
    try {
      const applied = await runMigrations(connection, this.logger);
      this.logger.info('Storage initialized', { databaseFile: this.options.databaseFile, migrationsApplied: applied });
    } finally {
      await connection.close();
    }
  }

  async open(options: OpenStorageOptions): Promise<StorageSession> {
    const connection = await this.connect(options.readOnly);
    if (!options.readOnly) {
      try {
        await runMigrations(connection, this.logger);
      } catch (err) {
        await connection.close();
        throw err;
      }
    }
    return new SqliteStorageSession(connection, this.options.retry, this.logger);
  }

  async checkIntegrity(): Promise<IntegrityReport> {
    let problems: string[];
    try {
      problems = await this.runIntegrityCheck();
    } catch (err) {
      if (!isCorruptionError(err)) throw err;
      problems = [toError(err).message];
    }

    if (problems.length === 0) {
      return { healthy: true, problems, backupPath: null };
    }

    this.logger.error('Database failed integrity check', undefined, { problems });
    const backupPath = await this.backupAndRecreate();
    return { healthy: false, problems, backupPath };
  }

  private connect(readOnly: boolean): Promise<SqliteConnection> {
    return SqliteConnection.open(
      this.options.databaseFile,
      { readOnly, busyTimeoutMs: this.options.busyTimeoutMs },
      this.logger
    );
  }

  private async runIntegrityCheck(): Promise<string[]> {
    const connection = await this.connect(false);
    try {
      const rows = z.array(integrityRowSchema).parse(await connection.all('PRAGMA integrity_check'));
      return rows.map(row => row.integrity_check).filter(message => message !== 'ok');
    } finally {
      await connection.close();
    }
  }

  private async backupAndRecreate(): Promise<string> {
    const file = this.options.databaseFile;
    const backupPath = `${file}.corrupt-${Date.now()}.bak`;

    await fs.copyFile(file, backupPath);
    for (const suffix of ['', '-wal', '-shm']) {
      await fs.rm(`${file}${suffix}`, { force: true });
    }
    this.logger.warn('Corrupt database backed up and removed', { backupPath });

    await this.initialize();
    return backupPath;
  }
}
