import { GeofenceEvent, GeoPoint } from '../../types';

export interface GeofenceRegion {
  id: string;
  center: GeoPoint;
  radiusMeters: number;
}

export type GeofenceEventListener = (event: GeofenceEvent) => Promise<void>;

/**
 * Monitors registered regions and delivers enter/exit events.
 */
export interface IGeofencePlatform {
  /**
   * Register or replace a region.
   */
  register(region: GeofenceRegion): void;

  unregister(id: string): boolean;

  registeredIds(): string[];

  /**
   * @returns a function removing the listener
   */
  onEvent(listener: GeofenceEventListener): () => void;
}
