import * as sqlite3 from 'sqlite3';
import { ILogger } from '../../domain/common/ILogger';
import { toError } from '../../domain/common/Errors';
import { IDatabaseConnection, RunResult, SqlParam } from './IDatabaseConnection';

export interface SqliteOpenOptions {
  readOnly: boolean;
  busyTimeoutMs: number;
}

/**
 * Promise wrapper over a single sqlite3 handle.
 */
export class SqliteConnection implements IDatabaseConnection {
  private inTransaction = false;
  private closed = false;

  private constructor(
    private readonly db: sqlite3.Database,
    readonly readOnly: boolean,
    private readonly logger: ILogger
  ) {}

  /**
   * Open a handle with the engine's busy timeout applied. Writable handles
   * switch the file to WAL so readers in other contexts are not blocked.
   */
  static async open(filename: string, options: SqliteOpenOptions, logger: ILogger): Promise<SqliteConnection> {
    const mode = options.readOnly ? sqlite3.OPEN_READONLY : sqlite3.OPEN_READWRITE | sqlite3.OPEN_CREATE;
    const db = await new Promise<sqlite3.Database>((resolve, reject) => {
      const handle = new sqlite3.Database(filename, mode, (err) => {
        if (err) return reject(err);
        resolve(handle);
      });
    });
    db.configure('busyTimeout', options.busyTimeoutMs);

    const connection = new SqliteConnection(db, options.readOnly, logger);
    try {
      if (!options.readOnly) {
        await connection.exec('PRAGMA journal_mode = WAL');
      }
      await connection.exec('PRAGMA foreign_keys = ON');
    } catch (err) {
      await connection.close();
      throw err;
    }
    return connection;
  }

  run(sql: string, params: readonly SqlParam[] = []): Promise<RunResult> {
    return new Promise((resolve, reject) => {
      this.db.run(sql, [...params], function (err) {
        if (err) return reject(err);
        resolve({ lastId: this.lastID, changes: this.changes });
      });
    });
  }

  get(sql: string, params: readonly SqlParam[] = []): Promise<unknown> {
    return new Promise((resolve, reject) => {
      this.db.get(sql, [...params], (err: Error | null, row: unknown) => {
        if (err) return reject(err);
        resolve(row);
      });
    });
  }

  all(sql: string, params: readonly SqlParam[] = []): Promise<unknown[]> {
    return new Promise((resolve, reject) => {
      this.db.all(sql, [...params], (err: Error | null, rows: unknown[]) => {
        if (err) return reject(err);
        resolve(rows);
      });
    });
  }

  exec(sql: string): Promise<void> {
    return new Promise((resolve, reject) => {
      this.db.exec(sql, (err) => {
        if (err) return reject(err);
        resolve();
      });
    });
  }

  async transaction<T>(body: () => Promise<T>): Promise<T> {
    if (this.inTransaction) {
      return body();
    }

    this.inTransaction = true;
    try {
      await this.exec(this.readOnly ? 'BEGIN' : 'BEGIN IMMEDIATE');
    } catch (err) {
      this.inTransaction = false;
      throw err;
    }

    try {
      const result = await body();
      await this.exec('COMMIT');
      return result;
    } catch (err) {
      await this.rollback();
      throw err;
    } finally {
      this.inTransaction = false;
    }
  }

  private async rollback(): Promise<void> {
    try {
      await this.exec('ROLLBACK');
    } catch (err) {
      // SQLite may already have rolled back on its own (e.g. after SQLITE_FULL)
      this.logger.warn('Rollback failed', { error: toError(err).message });
    }
  }

  close(): Promise<void> {
    if (this.closed) return Promise.resolve();
    this.closed = true;
    return new Promise((resolve, reject) => {
      this.db.close((err) => {
        if (err) return reject(err);
        resolve();
      });
    });
  }
}
