import { Clock, systemClock } from '../../domain/common/Clock';
import { IIdGenerator } from '../../domain/common/IIdGenerator';
import { ILogger } from '../../domain/common/ILogger';
import { ConflictError, NotFoundError, ValidationError } from '../../domain/common/Errors';
import { IEventBus } from '../../domain/events/IEventBus';
import { StorageSession } from '../../domain/repositories/IStorageGateway';
import { IGeofencePlatform } from '../../domain/services/IGeofencePlatform';
import { CreateGeofencePayload, Geofence } from '../../types';

export interface GeofenceLimits {
  minRadiusMeters: number;
  maxRadiusMeters: number;
  defaultRadiusMeters: number;
}

export const DEFAULT_GEOFENCE_STYLE = {
  fillColor: '#3388ff',
  fillOpacity: 0.2,
  strokeColor: '#3388ff',
  strokeWidth: 2,
};

export interface CreatedGeofence {
  geofence: Geofence;
  linkedTaskId: number | null;
}

/**
 * Application service for geofences. Keeps the store and the platform's
 * registered regions in step.
 */
export class GeofenceService {
  private readonly logger: ILogger;

  constructor(
    private storage: Pick<StorageSession, 'tasks' | 'geofences' | 'transaction'>,
    private platform: IGeofencePlatform,
    private eventBus: IEventBus,
    private idGenerator: IIdGenerator,
    private limits: GeofenceLimits,
    logger: ILogger,
    private clock: Clock = systemClock
  ) {
    this.logger = logger.child({ service: 'geofences' });
  }

  /**
   * Create a geofence and optionally bind a task to it. The insert and the
   * task update commit together.
   */
  async createGeofence(input: CreateGeofencePayload): Promise<CreatedGeofence> {
    const radiusMeters = input.radiusMeters ?? this.limits.defaultRadiusMeters;
    if (radiusMeters < this.limits.minRadiusMeters || radiusMeters > this.limits.maxRadiusMeters) {
      throw new ValidationError(
        `Radius must be between ${this.limits.minRadiusMeters} and ${this.limits.maxRadiusMeters} meters`,
        { radiusMeters }
      );
    }
    if (input.latitude < -90 || input.latitude > 90 || input.longitude < -180 || input.longitude > 180) {
      throw new ValidationError('Coordinates out of range', { latitude: input.latitude, longitude: input.longitude });
    }

    const id = input.id ?? this.idGenerator.generate('geo');
    const geofence: Geofence = {
      id,
      latitude: input.latitude,
      longitude: input.longitude,
      radiusMeters,
      fillColor: input.fillColor ?? DEFAULT_GEOFENCE_STYLE.fillColor,
      fillOpacity: input.fillOpacity ?? DEFAULT_GEOFENCE_STYLE.fillOpacity,
      strokeColor: input.strokeColor ?? DEFAULT_GEOFENCE_STYLE.strokeColor,
      strokeWidth: input.strokeWidth ?? DEFAULT_GEOFENCE_STYLE.strokeWidth,
      task: input.task ?? null,
      createdAt: this.clock().getTime(),
    };

    const created = await this.storage.transaction(async () => {
      if (await this.storage.geofences.findById(id)) {
        throw new ConflictError(`Geofence '${id}' already exists`);
      }
      const saved = await this.storage.geofences.create(geofence);
      if (input.taskId !== undefined) {
        const task = await this.storage.tasks.findById(input.taskId);
        if (!task) {
          throw new NotFoundError('Task', input.taskId);
        }
        await this.storage.tasks.update({ ...task, geofenceId: saved.id });
      }
      return saved;
    });

    this.platform.register({
      id: created.id,
      center: { latitude: created.latitude, longitude: created.longitude },
      radiusMeters: created.radiusMeters,
    });
    await this.eventBus.emit('geofence:created', created);
    this.logger.info('Geofence created', { id: created.id, linkedTaskId: input.taskId ?? null });

    return { geofence: created, linkedTaskId: input.taskId ?? null };
  }

  async getGeofence(id: string): Promise<Geofence> {
    const geofence = await this.storage.geofences.findById(id);
    if (!geofence) {
      throw new NotFoundError('Geofence', id);
    }
    return geofence;
  }

  async listGeofences(): Promise<Geofence[]> {
    return this.storage.geofences.findAll();
  }

  /**
   * Delete a geofence, detach its tasks and stop monitoring it.
   */
  async deleteGeofence(id: string): Promise<void> {
    const detached = await this.storage.transaction(async () => {
      const deleted = await this.storage.geofences.delete(id);
      if (!deleted) {
        throw new NotFoundError('Geofence', id);
      }
      return this.storage.tasks.clearGeofence(id);
    });

    this.platform.unregister(id);
    await this.eventBus.emit('geofence:deleted', { id });
    this.logger.info('Geofence deleted', { id, detachedTasks: detached });
  }

  /**
   * Remove geofences no task references.
   * @returns ids of the removed geofences
   */
  async cleanupOrphans(): Promise<string[]> {
    const removed = await this.storage.transaction(async () => {
      const orphans = await this.storage.geofences.findOrphaned();
      for (const orphan of orphans) {
        await this.storage.geofences.delete(orphan.id);
      }
      return orphans.map(orphan => orphan.id);
    });

    for (const id of removed) {
      this.platform.unregister(id);
      await this.eventBus.emit('geofence:deleted', { id });
    }
    if (removed.length > 0) {
      this.logger.info('Orphaned geofences removed', { count: removed.length });
    }
    return removed;
  }

  /**
   * Register every stored geofence with the platform, dropping regions
   * that no longer exist.
   */
  async syncPlatform(): Promise<number> {
    const geofences = await this.storage.geofences.findAll();
    const known = new Set(geofences.map(geofence => geofence.id));

    for (const id of this.platform.registeredIds()) {
      if (!known.has(id)) this.platform.unregister(id);
    }
    for (const geofence of geofences) {
      this.platform.register({
        id: geofence.id,
        center: { latitude: geofence.latitude, longitude: geofence.longitude },
        radiusMeters: geofence.radiusMeters,
      });
    }
    return geofences.length;
  }
}
