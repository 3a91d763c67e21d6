import { z } from 'zod';
import { ILogger } from '../../domain/common/ILogger';
import { IDatabaseConnection } from './IDatabaseConnection';

export interface Migration {
  version: number;
  name: string;
  up: (db: IDatabaseConnection) => Promise<void>;
}

export const MIGRATIONS: Migration[] = [
  {
    version: 1,
    name: 'Initial schema',
    up: async (db) => {
      await db.exec(`
        CREATE TABLE IF NOT EXISTS tasks (
          id INTEGER PRIMARY KEY AUTOINCREMENT,
          name TEXT NOT NULL,
          priority INTEGER NOT NULL CHECK (priority BETWEEN 1 AND 5),
          scheduled_date TEXT,
          scheduled_time TEXT,
          is_recurring INTEGER NOT NULL DEFAULT 0,
          recurrence TEXT,
          geofence_id TEXT,
          is_completed INTEGER NOT NULL DEFAULT 0,
          notification_sound TEXT,
          enable_speech INTEGER,
          created_at INTEGER NOT NULL
        );
        CREATE INDEX IF NOT EXISTS idx_tasks_geofence ON tasks (geofence_id, is_completed);

        CREATE TABLE IF NOT EXISTS geofences (
          id TEXT PRIMARY KEY,
          latitude REAL NOT NULL,
          longitude REAL NOT NULL,
          radius_meters REAL NOT NULL,
          fill_color TEXT NOT NULL,
          fill_opacity REAL NOT NULL,
          stroke_color TEXT NOT NULL,
          stroke_width REAL NOT NULL,
          task TEXT,
          created_at INTEGER NOT NULL
        );

        CREATE TABLE IF NOT EXISTS task_history (
          id INTEGER PRIMARY KEY AUTOINCREMENT,
          task_id INTEGER,
          task_name TEXT NOT NULL,
          task_priority INTEGER NOT NULL,
          start_time INTEGER NOT NULL,
          end_time INTEGER,
          duration_seconds INTEGER,
          completion_date TEXT,
          geofence_id TEXT,
          created_at INTEGER NOT NULL
        );
        CREATE INDEX IF NOT EXISTS idx_task_history_task ON task_history (task_id);
        CREATE INDEX IF NOT EXISTS idx_task_history_date ON task_history (completion_date);

        CREATE TABLE IF NOT EXISTS notification_history (
          id INTEGER PRIMARY KEY AUTOINCREMENT,
          notification_id INTEGER NOT NULL,
          geofence_id TEXT NOT NULL,
          task_name TEXT,
          event_type TEXT NOT NULL,
          body TEXT NOT NULL,
          timestamp INTEGER NOT NULL
        );
        CREATE INDEX IF NOT EXISTS idx_notification_history_timestamp ON notification_history (timestamp);
      `);
    }
  },
  {
    version: 2,
    name: 'One open history entry per task',
    up: async (db) => {
      await db.exec(`
        CREATE UNIQUE INDEX IF NOT EXISTS idx_task_history_one_open
          ON task_history (task_id) WHERE end_time IS NULL AND task_id IS NOT NULL;
      `);
    }
  }
];

export const LATEST_SCHEMA_VERSION = MIGRATIONS[MIGRATIONS.length - 1].version;

const userVersionSchema = z.object({ user_version: z.number() });

export async function readSchemaVersion(db: IDatabaseConnection): Promise<number> {
  return userVersionSchema.parse(await db.get('PRAGMA user_version')).user_version;
}

/**
 * Apply every migration above the stored `user_version`, each in its own
 * transaction together with the version bump.
 */
export async function runMigrations(db: IDatabaseConnection, logger: ILogger): Promise<number> {
  const currentVersion = await readSchemaVersion(db);
  const pendingMigrations = MIGRATIONS.filter(migration => migration.version > currentVersion);

  for (const migration of pendingMigrations) {
    logger.info(`Running migration ${migration.version}: ${migration.name}`);
    await db.transaction(async () => {
      await migration.up(db);
      await db.exec(`PRAGMA user_version = ${migration.version}`);
    });
  }

  return pendingMigrations.length;
}
