import request from 'supertest';
import express from 'express';
import { Container } from '../../src/container';
import { createApp } from '../../src/app';
import { TestDataDir, createTestContainer } from '../helpers';

describe('History and backup API', () => {
  let app: express.Application;
  let container: Container;
  let testDataDir: TestDataDir;

  beforeEach(async () => {
    testDataDir = new TestDataDir();
    ({ container } = await createTestContainer(testDataDir));
    app = createApp(container);
  });

  afterEach(async () => {
    await container.shutdown();
    await testDataDir.cleanup();
  });

  it('should report session statistics', async () => {
    const task = await request(app).post('/api/tasks').send({ name: 'Write' });
    const started = await request(app).post('/api/sessions/start').send({ taskId: task.body.id });
    await request(app)
      .post('/api/sessions/end')
      .send({ taskId: task.body.id, endedAt: started.body.marker.startedAt + 60_000 })
      .expect(200);

    const stats = await request(app).get('/api/history/stats').expect(200);

    expect(stats.body).toMatchObject({ totalSessions: 1, openSessions: 0, totalSeconds: 60 });
    expect(stats.body.byTask).toEqual([{ taskId: task.body.id, taskName: 'Write', sessions: 1, totalSeconds: 60 }]);
    await request(app).get('/api/history/stats?from=last-week').expect(400);
  });

  it('should list and clear notification history', async () => {
    await request(app).post('/api/geofence-events').send({ event: 'enter', geofenceIds: ['a', 'b'] }).expect(200);

    const history = await request(app).get('/api/notifications/history?limit=1').expect(200);
    expect(history.body).toHaveLength(1);

    const cleared = await request(app).delete('/api/notifications/history').expect(200);
    expect(cleared.body).toEqual({ success: true, removed: 2 });
  });

  it('should export and re-import a backup', async () => {
    await request(app).post('/api/geofences').send({ id: 'home', latitude: 1, longitude: 1 });
    await request(app).post('/api/tasks').send({ name: 'Plants', geofenceId: 'home' });
    const exported = await request(app).get('/api/backup').expect(200);
    await request(app).delete('/api/geofences/home').expect(200);

    const response = await request(app).post('/api/backup').send(exported.body).expect(200);

    expect(response.body).toEqual({
      imported: { tasks: 1, geofences: 1, taskHistory: 0, notificationHistory: 0 },
      regions: 1,
    });
    expect(container.platform.registeredIds()).toEqual(['home']);
    const task = await request(app).get(`/api/tasks/${exported.body.tasks[0].id}`).expect(200);
    expect(task.body.geofenceId).toBe('home');
  });

  it('should reject an invalid backup', async () => {
    const response = await request(app).post('/api/backup').send({ version: 1 }).expect(400);
    expect(response.body.message).toBe('Invalid backup document');
  });

  it('should report a healthy database', async () => {
    const response = await request(app).post('/api/maintenance/integrity').expect(200);
    expect(response.body).toEqual({ healthy: true, problems: [], backupPath: null, restartRequired: false });
  });
});
