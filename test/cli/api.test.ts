import fetch from 'node-fetch';
import { z } from 'zod';
import { APIClient, HttpError } from '../../src/cli/api';

jest.mock('node-fetch', () => ({
  __esModule: true,
  default: jest.fn(),
}));

const { Response } = jest.requireActual<typeof import('node-fetch')>('node-fetch');
const fetchMock = jest.mocked(fetch);

const okSchema = z.object({ ok: z.boolean() });

function jsonResponse(status: number, body: unknown) {
  return new Response(JSON.stringify(body), { status });
}

function withCode(message: string, code: string): Error {
  return Object.assign(new Error(message), { code });
}

describe('APIClient', () => {
  let delays: number[];
  let client: APIClient;

  beforeEach(() => {
    fetchMock.mockReset();
    delays = [];
    client = new APIClient('http://server.test/', { retries: 2, retryDelay: 100, debug: false }, async ms => {
      delays.push(ms);
    });
  });

  it('should join the base url and parse the body', async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse(200, { ok: true }));

    await expect(client.get('api/health', okSchema)).resolves.toEqual({ ok: true });
    expect(fetchMock).toHaveBeenCalledWith('http://server.test/api/health', {
      headers: { 'Content-Type': 'application/json' },
    });
  });

  it('should send JSON bodies on post', async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse(201, { ok: true }));

    await client.post('/api/tasks', { name: 'Buy milk' }, okSchema);

    expect(fetchMock).toHaveBeenCalledWith('http://server.test/api/tasks', {
      method: 'POST',
      body: '{"name":"Buy milk"}',
      headers: { 'Content-Type': 'application/json' },
    });
  });

  it('should not retry client errors', async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse(404, { code: 'NOT_FOUND', message: "Task with id '9' not found" }));

    const error = await client.get('/api/tasks/9', okSchema).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(HttpError);
    expect(error).toMatchObject({ status: 404, message: "Task with id '9' not found", url: 'http://server.test/api/tasks/9' });
    expect(fetchMock).toHaveBeenCalledTimes(1);
    expect(delays).toEqual([]);
  });

  it('should use the raw text of a non-JSON error body', async () => {
    fetchMock.mockResolvedValueOnce(new Response('bad gateway body', { status: 400 }));

    await expect(client.get('/api/tasks', okSchema)).rejects.toThrow('bad gateway body');
  });

  it('should retry server errors with exponential backoff', async () => {
    fetchMock
      .mockResolvedValueOnce(jsonResponse(500, { message: 'boom' }))
      .mockResolvedValueOnce(jsonResponse(503, { message: 'busy' }))
      .mockResolvedValueOnce(jsonResponse(200, { ok: true }));

    await expect(client.get('/api/health', okSchema)).resolves.toEqual({ ok: true });
    expect(fetchMock).toHaveBeenCalledTimes(3);
    expect(delays).toEqual([100, 200]);
  });

  it('should give up after the last retry', async () => {
    fetchMock.mockImplementation(async () => jsonResponse(500, { message: 'still down' }));

    await expect(client.get('/api/health', okSchema)).rejects.toThrow('still down');
    expect(fetchMock).toHaveBeenCalledTimes(3);
  });

  it('should retry refused connections only', async () => {
    fetchMock
      .mockRejectedValueOnce(withCode('connect ECONNREFUSED', 'ECONNREFUSED'))
      .mockResolvedValueOnce(jsonResponse(200, { ok: true }));

    await expect(client.get('/api/health', okSchema)).resolves.toEqual({ ok: true });
    expect(delays).toEqual([100]);

    fetchMock.mockRejectedValueOnce(new Error('socket exploded'));
    await expect(client.get('/api/health', okSchema)).rejects.toThrow('socket exploded');
    expect(delays).toEqual([100]);
  });

  it('should reject bodies of the wrong shape', async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse(200, { ok: 'yes' }));

    await expect(client.get('/api/health', okSchema)).rejects.toThrow(z.ZodError);
  });
});
