import { Geofence } from '../../types';

/**
 * Repository interface for Geofence persistence operations.
 */
export interface IGeofenceRepository {
  create(geofence: Geofence): Promise<Geofence>;

  findById(id: string): Promise<Geofence | null>;

  findByIds(ids: readonly string[]): Promise<Geofence[]>;

  findAll(): Promise<Geofence[]>;

  delete(id: string): Promise<boolean>;

  /**
   * Geofences that no task references and that carry no legacy task name.
   */
  findOrphaned(): Promise<Geofence[]>;

  deleteAll(): Promise<number>;
}
