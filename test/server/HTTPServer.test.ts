import { describe, it, expect, vi, beforeEach } from 'vitest';
import request from 'supertest';
import { createApplication, Application } from '../../src/app';
import { DEFAULT_CONFIG } from '../../src/common/Config';
import { HTTPServer } from '../../src/server/HTTPServer';
import { INVALID_JSON_REQUEST_MESSAGE } from '../../src/server/RequestValidator';
import { IKeyValueStore } from '../../src/interfaces/Storage';

function silentLogger() {
  return { log: vi.fn(), error: vi.fn() };
}

describe('HTTPServer', () => {
  let logger: ReturnType<typeof silentLogger>;
  let app: Application;

  beforeEach(() => {
    logger = silentLogger();
    app = createApplication({ ...DEFAULT_CONFIG }, logger);
  });

  const http = () => request(app.httpServer.getApp());

  it('round-trips a value through set and get', async () => {
    const set = await http().post('/set').send({ key: 'a', value: 1 });
    expect(set.status).toBe(200);
    expect(set.headers['content-type']).toMatch(/^application\/json/);
    expect(set.body).toEqual({ key: 'a', value: 1 });

    const get = await http().get('/get').query({ key: 'a' });
    expect(get.status).toBe(200);
    expect(get.headers['content-type']).toMatch(/^application\/json/);
    expect(get.body).toEqual({ key: 'a', value: 1 });
  });

  it('keeps only the latest value on overwrite', async () => {
    await http().post('/set').send({ key: 'a', value: 'old' });
    await http().post('/set').send({ key: 'a', value: 'new' });

    const get = await http().get('/get?key=a');

    expect(get.body).toEqual({ key: 'a', value: 'new' });
    expect(app.store.size()).toBe(1);
    expect(logger.log).toHaveBeenCalledWith('Overriding existing key a --> "old" with new value: "new"');
  });

  it('preserves null and nested values', async () => {
    await http().post('/set').send({ key: 'n', value: null });
    await http().post('/set').send({ key: 'doc', value: { list: [1, false, 'x'] } });

    expect((await http().get('/get?key=n')).body).toEqual({ key: 'n', value: null });
    expect((await http().get('/get?key=doc')).body).toEqual({ key: 'doc', value: { list: [1, false, 'x'] } });
  });

  it('names the missing field on set', async () => {
    const res = await http().post('/set').send({ key: 'a' });

    expect(res.status).toBe(400);
    expect(res.body).toEqual({
      error: 'Request is missing parameters. Expected: ["key","value"], Found: ["key"]',
    });
  });

  it('rejects a plain-text body regardless of content', async () => {
    const res = await http()
      .post('/set')
      .set('Content-Type', 'text/plain')
      .send('{"key":"a","value":1}');

    expect(res.status).toBe(400);
    expect(res.body).toEqual({ error: INVALID_JSON_REQUEST_MESSAGE });
    expect(app.store.size()).toBe(0);
  });

  it('rejects a client that will not accept JSON', async () => {
    const res = await http().post('/set').set('Accept', 'text/html').send({ key: 'a', value: 1 });

    expect(res.status).toBe(400);
    expect(res.body).toEqual({ error: INVALID_JSON_REQUEST_MESSAGE });
  });

  it('accepts JSON among several acceptable types and a charset parameter', async () => {
    const res = await http()
      .post('/set')
      .set('Accept', 'text/html, application/json;q=0.9')
      .set('Content-Type', 'application/json; charset=utf-8')
      .send('{"key":"a","value":1}');

    expect(res.status).toBe(200);
    expect(res.body).toEqual({ key: 'a', value: 1 });
  });

  it('treats a malformed body as empty', async () => {
    const res = await http()
      .post('/set')
      .set('Content-Type', 'application/json')
      .send('{"key":');

    expect(res.status).toBe(400);
    expect(res.body).toEqual({ error: 'Request is missing parameters. Expected: ["key","value"], Found: []' });
  });

  it('deletes idempotently', async () => {
    await http().post('/set').send({ key: 'a', value: 1 });

    const first = await http().post('/delete').send({ key: 'a' });
    expect(first.status).toBe(200);
    expect(first.body).toEqual({ key: 'a', value: 1 });

    const second = await http().post('/delete').send({ key: 'a' });
    expect(second.status).toBe(200);
    expect(second.body).toEqual({ message: 'Key `a` does not exist' });

    const get = await http().get('/get?key=a');
    expect(get.status).toBe(404);
    expect(logger.log).toHaveBeenCalledWith('Tried to delete non-existent key: a');
  });

  it('accepts the empty string as a key for set and delete', async () => {
    const set = await http().post('/set').send({ key: '', value: 1 });
    expect(set.status).toBe(200);
    expect(set.body).toEqual({ key: '', value: 1 });

    const removed = await http().post('/delete').send({ key: '' });
    expect(removed.status).toBe(200);
    expect(removed.body).toEqual({ key: '', value: 1 });
  });

  it('validates the key on get', async () => {
    const missing = await http().get('/get');
    expect(missing.status).toBe(400);
    expect(missing.body).toEqual({ error: 'Missing key parameter' });

    const unknown = await http().get('/get?key=ghost');
    expect(unknown.status).toBe(404);
    expect(unknown.body).toEqual({ error: 'Key `ghost` does not exist in the database' });
  });

  it('routes unknown paths and wrong methods', async () => {
    const nowhere = await http().get('/nonexistent');
    expect(nowhere.status).toBe(404);
    expect(nowhere.body).toEqual({ error: 'invalid path `/nonexistent`. Unavailable resource' });

    expect((await http().get('/set')).status).toBe(405);
    expect((await http().get('/delete')).status).toBe(405);
    expect((await http().post('/get').send({ key: 'a' })).status).toBe(405);
    expect((await http().post('/elsewhere').send({ key: 'a' })).status).toBe(404);
    expect((await http().put('/set').send({ key: 'a', value: 1 })).status).toBe(405);
  });

  it('matches routes by prefix', async () => {
    const set = await http().post('/set/').send({ key: 'a', value: 2 });
    expect(set.status).toBe(200);

    const get = await http().get('/get/anything?key=a');
    expect(get.body).toEqual({ key: 'a', value: 2 });
  });

  it('keeps one of the submitted values under concurrent writers', async () => {
    const values = Array.from({ length: 20 }, (_, i) => `v${i}`);

    const responses = await Promise.all(
      values.map((value) => http().post('/set').send({ key: 'shared', value }))
    );

    expect(responses.every((res) => res.status === 200)).toBe(true);
    const get = await http().get('/get?key=shared');
    expect(values).toContain(get.body.value);
    expect(app.store.size()).toBe(1);
  });

  it('answers an oversized body with the reader status', async () => {
    const small = createApplication({ ...DEFAULT_CONFIG, bodyLimit: '16b' }, logger);

    const res = await request(small.httpServer.getApp())
      .post('/set')
      .send({ key: 'a', value: 'x'.repeat(64) });

    expect(res.status).toBe(413);
    expect(res.body).toEqual({ error: 'request entity too large' });
  });

  it('answers 200 for a committed write even if the operator log fails', async () => {
    const logFailure = new Error('stdout closed');
    const failing = {
      log: vi.fn(() => {
        throw logFailure;
      }),
      error: vi.fn(),
    };
    const fragile = createApplication({ ...DEFAULT_CONFIG }, failing);

    const res = await request(fragile.httpServer.getApp()).post('/set').send({ key: 'a', value: 1 });

    expect(res.status).toBe(200);
    expect(res.body).toEqual({ key: 'a', value: 1 });
    expect(await fragile.store.get('a')).toEqual({ found: true, value: 1 });
    expect(failing.error).toHaveBeenCalledWith('Mutation hook failed for insert of key a:', logFailure);
  });

  it('returns a generic 500 and logs the cause', async () => {
    const failure = new Error('boom');
    const broken: IKeyValueStore = {
      get: () => Promise.reject(failure),
      set: () => Promise.reject(failure),
      delete: () => Promise.reject(failure),
      size: () => 0,
    };
    const server = new HTTPServer(broken, { ...DEFAULT_CONFIG }, logger);

    const res = await request(server.getApp()).get('/get?key=a');

    expect(res.status).toBe(500);
    expect(res.body).toEqual({ error: 'Internal Server Error' });
    expect(logger.error).toHaveBeenCalledWith('Unhandled error:', failure);
  });

  it('listens on an ephemeral port and stops', async () => {
    const server = new HTTPServer(app.store, { ...DEFAULT_CONFIG, host: '127.0.0.1', port: 0 }, logger);

    await server.start();
    const port = server.getPort();
    expect(port).toBeGreaterThan(0);

    const res = await request(`http://127.0.0.1:${port}`).get('/get');
    expect(res.status).toBe(400);

    await server.stop();
    expect(logger.log).toHaveBeenCalledWith('HTTP server stopped');
  });
});
