import request from 'supertest';
import express from 'express';
import { Container } from '../../src/container';
import { createApp } from '../../src/app';
import { FakeNotificationDisplay, TestDataDir, createTestContainer } from '../helpers';

describe('Geofences API', () => {
  let app: express.Application;
  let container: Container;
  let display: FakeNotificationDisplay;
  let testDataDir: TestDataDir;

  beforeEach(async () => {
    testDataDir = new TestDataDir();
    ({ container, display } = await createTestContainer(testDataDir));
    app = createApp(container);
  });

  afterEach(async () => {
    await container.shutdown();
    await testDataDir.cleanup();
  });

  it('should create, list, fetch and delete a geofence', async () => {
    const created = await request(app)
      .post('/api/geofences')
      .send({ id: 'home', latitude: 10, longitude: 20, radiusMeters: 80 })
      .expect(201);
    expect(created.body).toMatchObject({ geofence: { id: 'home', radiusMeters: 80 }, linkedTaskId: null });

    const list = await request(app).get('/api/geofences').expect(200);
    expect(list.body.map((g: { id: string }) => g.id)).toEqual(['home']);

    await request(app).get('/api/geofences/home').expect(200);
    await request(app).delete('/api/geofences/home').expect(200);
    await request(app).get('/api/geofences/home').expect(404);
  });

  it('should reject out-of-range coordinates and unsafe ids', async () => {
    await request(app).post('/api/geofences').send({ latitude: 100, longitude: 0 }).expect(400);
    await request(app).get('/api/geofences/bad%20id').expect(400);
  });

  it('should answer 409 for a duplicate id', async () => {
    await request(app).post('/api/geofences').send({ id: 'home', latitude: 1, longitude: 1 }).expect(201);
    const response = await request(app).post('/api/geofences').send({ id: 'home', latitude: 1, longitude: 1 }).expect(409);
    expect(response.body.code).toBe('CONFLICT');
  });

  it('should clean up orphans', async () => {
    await request(app).post('/api/geofences').send({ id: 'lonely', latitude: 1, longitude: 1 });

    const response = await request(app).post('/api/geofences/cleanup').expect(200);
    expect(response.body).toEqual({ removed: ['lonely'] });
  });

  describe('POST /api/geofence-events', () => {
    it('should handle an enter event', async () => {
      await request(app).post('/api/tasks').send({ name: 'Buy milk', geofenceId: 'shop' });

      const response = await request(app)
        .post('/api/geofence-events')
        .send({ event: 'enter', geofenceIds: ['shop'] })
        .expect(200);

      expect(response.body.handled).toBe(true);
      expect(response.body.report).toMatchObject({ decision: 'announce', alertShown: true, historyRecorded: 1 });
      expect(display.shown[0].body).toBe('You have task Buy milk');
    });

    it('should accept but ignore exit events', async () => {
      const response = await request(app)
        .post('/api/geofence-events')
        .send({ event: 'exit', geofenceIds: ['shop'] })
        .expect(202);

      expect(response.body).toEqual({ handled: false, report: null });
    });

    it('should reject unknown event types', async () => {
      await request(app).post('/api/geofence-events').send({ event: 'dwell', geofenceIds: ['shop'] }).expect(400);
    });
  });

  it('should turn a location fix into a trigger', async () => {
    await container.initialize();
    await request(app).post('/api/geofences').send({ id: 'park', latitude: 10, longitude: 10, radiusMeters: 100 });
    await request(app).post('/api/tasks').send({ name: 'Walk the dog', geofenceId: 'park' });

    const response = await request(app).post('/api/location').send({ latitude: 10, longitude: 10 }).expect(200);

    expect(response.body.events).toEqual([
      { event: 'enter', geofenceIds: ['park'], location: { latitude: 10, longitude: 10 } },
    ]);
    expect(display.shown.map(n => n.body)).toEqual(['You have task Walk the dog']);
  });
});
