import { ILogger } from '../../domain/common/ILogger';
import { toError } from '../../domain/common/Errors';
import { GeofenceEventListener, GeofenceRegion, IGeofencePlatform } from '../../domain/services/IGeofencePlatform';
import { GeofenceEvent, GeoPoint } from '../../types';

const EARTH_RADIUS_METERS = 6371000;

const toRadians = (degrees: number) => (degrees * Math.PI) / 180;

/**
 * Great-circle distance in meters.
 */
export function haversineDistance(a: GeoPoint, b: GeoPoint): number {
  const dLat = toRadians(b.latitude - a.latitude);
  const dLng = toRadians(b.longitude - a.longitude);
  const h = Math.sin(dLat / 2) ** 2
    + Math.cos(toRadians(a.latitude)) * Math.cos(toRadians(b.latitude)) * Math.sin(dLng / 2) ** 2;
  return 2 * EARTH_RADIUS_METERS * Math.asin(Math.min(1, Math.sqrt(h)));
}

/**
 * Geofence monitoring driven by location fixes pushed into `updateLocation`.
 * Each fix yields at most one grouped enter and one grouped exit event.
 */
export class DistanceGeofencePlatform implements IGeofencePlatform {
  private readonly regions = new Map<string, GeofenceRegion>();
  private readonly inside = new Set<string>();
  private readonly listeners = new Set<GeofenceEventListener>();
  private readonly logger: ILogger;

  constructor(logger: ILogger) {
    this.logger = logger.child({ component: 'geofencing' });
  }

  register(region: GeofenceRegion): void {
    this.regions.set(region.id, region);
    this.logger.debug(`Region registered: ${region.id}`, { radiusMeters: region.radiusMeters });
  }

  unregister(id: string): boolean {
    this.inside.delete(id);
    return this.regions.delete(id);
  }

  registeredIds(): string[] {
    return [...this.regions.keys()].sort();
  }

  onEvent(listener: GeofenceEventListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /**
   * Feed a location fix and dispatch the resulting transitions.
   * @returns the events dispatched, enter first
   */
  async updateLocation(location: GeoPoint): Promise<GeofenceEvent[]> {
    const entered: string[] = [];
    const exited: string[] = [];

    for (const region of this.regions.values()) {
      const isInside = haversineDistance(location, region.center) <= region.radiusMeters;
      const wasInside = this.inside.has(region.id);
      if (isInside && !wasInside) {
        this.inside.add(region.id);
        entered.push(region.id);
      } else if (!isInside && wasInside) {
        this.inside.delete(region.id);
        exited.push(region.id);
      }
    }

    const events: GeofenceEvent[] = [];
    if (entered.length > 0) events.push({ event: 'enter', geofenceIds: entered.sort(), location });
    if (exited.length > 0) events.push({ event: 'exit', geofenceIds: exited.sort(), location });

    for (const event of events) {
      await this.dispatch(event);
    }
    return events;
  }

  /**
   * Deliver an event as if the platform had detected it.
   */
  async dispatch(event: GeofenceEvent): Promise<void> {
    this.logger.info(`Geofence ${event.event}`, { geofenceIds: event.geofenceIds });
    await Promise.all([...this.listeners].map(async (listener) => {
      try {
        await listener(event);
      } catch (err) {
        this.logger.error('Geofence listener failed', toError(err), { event: event.event });
      }
    }));
  }
}
