import { once } from 'node:events';
import { Worker } from 'node:worker_threads';
import { afterAll, afterEach, beforeAll, describe, expect, it } from 'vitest';
import { HTTPError } from '../error/httpError.js';
import { ConnectError, ReadTimeoutError, TransportError } from '../error/transportError.js';
import { SyncFetchClient } from './syncClient.js';

// The client blocks this thread while it waits, so the server runs on its own thread.
const serverSource = `
const { createServer } = require('node:http');
const { parentPort } = require('node:worker_threads');

const server = createServer((req, res) => {
  let body = '';
  req.on('data', (chunk) => { body += chunk; });
  req.on('end', () => {
    if (req.url.startsWith('/slow')) {
      return;
    }
    if (req.url.startsWith('/status/')) {
      res.writeHead(Number(req.url.slice('/status/'.length)), { 'content-type': 'text/plain' });
      res.end('unavailable');
      return;
    }
    res.writeHead(200, { 'content-type': 'application/json' });
    res.end(JSON.stringify({ method: req.method, url: req.url, key: req.headers['x-api-key'] || null, body }));
  });
});

server.listen(0, '127.0.0.1', () => parentPort.postMessage(server.address().port));
parentPort.on('message', () => {
  server.closeAllConnections();
  server.close(() => parentPort.close());
});
`;

describe('SyncFetchClient', () => {
  let server: Worker;
  let baseUrl: string;
  let client: SyncFetchClient;

  beforeAll(async () => {
    server = new Worker(serverSource, { eval: true });
    const [port] = await once(server, 'message');
    baseUrl = `http://127.0.0.1:${port}`;
  });

  afterAll(async () => {
    server.postMessage('stop');
    await once(server, 'exit');
  });

  afterEach(() => {
    client.close();
  });

  it('returns buffered responses synchronously', async () => {
    client = new SyncFetchClient({ timeout: 10_000, proxy: { kind: 'none' } });

    const [err, res] = client.request({
      method: 'GET',
      url: `${baseUrl}/v1/example.com/whois/parsed`,
      headers: { 'X-API-KEY': 'test-key' },
      params: { limit: 5 },
    });

    expect(err).toBeNull();
    expect(res?.status).toBe(200);
    expect(await res?.json()).toEqual({
      method: 'GET',
      url: '/v1/example.com/whois/parsed?limit=5',
      key: 'test-key',
      body: '',
    });
  });

  it('sends form bodies', async () => {
    client = new SyncFetchClient({ timeout: 10_000, proxy: { kind: 'none' } });

    const [, res] = client.request({
      method: 'POST',
      url: `${baseUrl}/url/`,
      headers: {},
      body: { form: { url: 'example.com', key: 'test-key' } },
    });

    expect(await res?.json()).toEqual({
      method: 'POST',
      url: '/url/',
      key: null,
      body: 'url=example.com&key=test-key',
    });
  });

  it('rebuilds HTTP errors from the worker', async () => {
    client = new SyncFetchClient({ timeout: 10_000, proxy: { kind: 'none' } });

    const [err, res] = client.request({ method: 'GET', url: `${baseUrl}/status/503`, headers: {} });

    expect(res).toBeNull();
    expect(err).toBeInstanceOf(HTTPError);
    expect(err instanceof HTTPError && err.status).toBe(503);
    expect(err instanceof HTTPError && (await err.response.text())).toBe('unavailable');
  });

  it('rebuilds timeouts from the worker', () => {
    client = new SyncFetchClient({ timeout: 200, proxy: { kind: 'none' } });

    const [err] = client.request({ method: 'GET', url: `${baseUrl}/slow`, headers: {} });

    expect(err).toBeInstanceOf(ReadTimeoutError);
    expect(err?.message).toBe('error request timed out after 200ms');
  });

  it('reports refused connections as ConnectError', () => {
    client = new SyncFetchClient({ timeout: 10_000, proxy: { kind: 'none' } });

    // Port 1 is privileged and never listened on in the test environment.
    const [err] = client.request({ method: 'GET', url: 'http://127.0.0.1:1/', headers: {} });

    expect(err).toBeInstanceOf(ConnectError);
    expect(err).toHaveProperty('code', 'ECONNREFUSED');
  });

  it('refuses requests after close', () => {
    client = new SyncFetchClient({ timeout: 10_000, proxy: { kind: 'none' } });
    client.close();

    const [err] = client.request({ method: 'GET', url: `${baseUrl}/`, headers: {} });

    expect(err?.message).toBe('error cannot send a request, the client has been closed');
  });

  it('rejects client options that cannot cross the thread boundary', () => {
    expect(
      () => new SyncFetchClient({ timeout: 1_000, proxy: { kind: 'none' }, clientOptions: { connect: () => {} } }),
    ).toThrow('error starting sync worker, clientOptions must be structured-cloneable');
    client = new SyncFetchClient({ timeout: 1_000, proxy: { kind: 'none' } });
  });

  it('reports a worker that fails to load instead of crashing the process', () => {
    // ProxyAgent rejects the URL while the worker module loads.
    client = new SyncFetchClient({ timeout: 10_000, proxy: { kind: 'single', url: 'not a url' } });
    const startedAt = Date.now();

    const [err, res] = client.request({ method: 'GET', url: `${baseUrl}/`, headers: {} });

    expect(res).toBeNull();
    expect(err).toBeInstanceOf(TransportError);
    expect(err?.message).toBe('error sync worker failed');
    expect(err?.cause).toBeInstanceOf(Error);
    expect(err?.cause).toHaveProperty('message', 'Invalid URL');
    expect(Date.now() - startedAt).toBeLessThan(10_000);

    const [again] = client.request({ method: 'GET', url: `${baseUrl}/`, headers: {} });
    expect(again).toBe(err);
  });
});
