import { z } from 'zod';
import { ILogger } from '../../domain/common/ILogger';
import { IGeofenceRepository } from '../../domain/repositories/IGeofenceRepository';
import { Geofence } from '../../types';
import { IDatabaseConnection, SqlParam } from '../database/IDatabaseConnection';
import { RetryPolicy } from '../database/retry';
import { SqliteRepository, normalizeTimestamp, placeholders } from './SqliteRepository';

const geofenceRowSchema = z.object({
  id: z.string(),
  latitude: z.number(),
  longitude: z.number(),
  radius_meters: z.number(),
  fill_color: z.string(),
  fill_opacity: z.number(),
  stroke_color: z.string(),
  stroke_width: z.number(),
  task: z.string().nullable(),
  created_at: z.number(),
});

function toGeofence(row: z.infer<typeof geofenceRowSchema>): Geofence {
  return {
    id: row.id,
    latitude: row.latitude,
    longitude: row.longitude,
    radiusMeters: row.radius_meters,
    fillColor: row.fill_color,
    fillOpacity: row.fill_opacity,
    strokeColor: row.stroke_color,
    strokeWidth: row.stroke_width,
    task: row.task,
    createdAt: normalizeTimestamp(row.created_at),
  };
}

/**
 * SQLite implementation of IGeofenceRepository.
 */
export class SqliteGeofenceRepository extends SqliteRepository implements IGeofenceRepository {
  constructor(db: IDatabaseConnection, retryPolicy: RetryPolicy, logger: ILogger) {
    super(db, retryPolicy, logger.child({ repository: 'geofences' }));
  }

  private async query(sql: string, params: SqlParam[] = []): Promise<Geofence[]> {
    const rows = await this.execute('geofence query', () => this.db.all(sql, params));
    return z.array(geofenceRowSchema).parse(rows).map(toGeofence);
  }

  async create(geofence: Geofence): Promise<Geofence> {
    await this.execute('geofence insert', () => this.db.run(
      `INSERT INTO geofences (id, latitude, longitude, radius_meters, fill_color, fill_opacity, stroke_color, stroke_width, task, created_at)
       VALUES (${placeholders(10)})`,
      [
        geofence.id,
        geofence.latitude,
        geofence.longitude,
        geofence.radiusMeters,
        geofence.fillColor,
        geofence.fillOpacity,
        geofence.strokeColor,
        geofence.strokeWidth,
        geofence.task,
        geofence.createdAt,
      ]
    ));
    return geofence;
  }

  async findById(id: string): Promise<Geofence | null> {
    const [geofence] = await this.query('SELECT * FROM geofences WHERE id = ?', [id]);
    return geofence ?? null;
  }

  async findByIds(ids: readonly string[]): Promise<Geofence[]> {
    if (ids.length === 0) return [];
    return this.query(`SELECT * FROM geofences WHERE id IN (${placeholders(ids.length)}) ORDER BY id`, [...ids]);
  }

  async findAll(): Promise<Geofence[]> {
    return this.query('SELECT * FROM geofences ORDER BY created_at, id');
  }

  async delete(id: string): Promise<boolean> {
    const result = await this.execute('geofence delete', () => this.db.run('DELETE FROM geofences WHERE id = ?', [id]));
    return result.changes > 0;
  }

  async findOrphaned(): Promise<Geofence[]> {
    return this.query(
      `SELECT * FROM geofences g
       WHERE (g.task IS NULL OR g.task = '')
         AND NOT EXISTS (SELECT 1 FROM tasks t WHERE t.geofence_id = g.id)
       ORDER BY g.id`
    );
  }

  async deleteAll(): Promise<number> {
    const result = await this.execute('geofence delete all', () => this.db.run('DELETE FROM geofences'));
    return result.changes;
  }
}
