import { DistanceGeofencePlatform, haversineDistance } from '../../src/infrastructure/geofencing/DistanceGeofencePlatform';
import { GeofenceEvent } from '../../src/types';
import { RecordingLogger } from '../helpers';

describe('DistanceGeofencePlatform', () => {
  let platform: DistanceGeofencePlatform;
  let logger: RecordingLogger;
  let received: GeofenceEvent[];

  beforeEach(() => {
    logger = new RecordingLogger();
    platform = new DistanceGeofencePlatform(logger);
    received = [];
    platform.onEvent(async (event) => {
      received.push(event);
    });
    platform.register({ id: 'home', center: { latitude: 0, longitude: 0 }, radiusMeters: 100 });
    platform.register({ id: 'cafe', center: { latitude: 0, longitude: 0.0005 }, radiusMeters: 100 });
  });

  it('should measure great-circle distance', () => {
    expect(haversineDistance({ latitude: 0, longitude: 0 }, { latitude: 0, longitude: 1 })).toBeCloseTo(111195, -1);
    expect(haversineDistance({ latitude: 10, longitude: 20 }, { latitude: 10, longitude: 20 })).toBe(0);
  });

  it('should group regions entered by one fix', async () => {
    const events = await platform.updateLocation({ latitude: 0, longitude: 0.0002 });

    expect(events).toEqual([
      { event: 'enter', geofenceIds: ['cafe', 'home'], location: { latitude: 0, longitude: 0.0002 } },
    ]);
    expect(received).toEqual(events);
  });

  it('should only report transitions', async () => {
    await platform.updateLocation({ latitude: 0, longitude: 0 });
    expect(await platform.updateLocation({ latitude: 0, longitude: 0 })).toEqual([]);

    const events = await platform.updateLocation({ latitude: 1, longitude: 1 });
    expect(events.map(event => [event.event, event.geofenceIds])).toEqual([['exit', ['cafe', 'home']]]);
  });

  it('should stop tracking unregistered regions', async () => {
    expect(platform.unregister('cafe')).toBe(true);
    expect(platform.registeredIds()).toEqual(['home']);

    const events = await platform.updateLocation({ latitude: 0, longitude: 0 });
    expect(events[0].geofenceIds).toEqual(['home']);
  });

  it('should keep delivering when a listener fails', async () => {
    platform.onEvent(async () => {
      throw new Error('listener broke');
    });

    await platform.dispatch({ event: 'enter', geofenceIds: ['home'], location: null });

    expect(received).toHaveLength(1);
    expect(logger.messages('error')).toEqual(['Geofence listener failed']);
  });

  it('should remove a listener with the returned function', async () => {
    const calls: string[] = [];
    const off = platform.onEvent(async (event) => {
      calls.push(event.event);
    });
    off();

    await platform.dispatch({ event: 'exit', geofenceIds: ['home'], location: null });
    expect(calls).toEqual([]);
  });
});
