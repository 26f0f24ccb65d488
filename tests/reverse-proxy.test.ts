import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { createServer, type IncomingHttpHeaders } from 'node:http';
import os from 'node:os';
import path from 'node:path';

import express from 'express';
import { afterAll, beforeAll, describe, expect, it } from 'vitest';

import { errorHandler } from '../src/middleware/error-handler.js';
import { AppContext } from '../src/services/app-context.js';
import { dispatchRequest } from '../src/services/dispatcher.js';
import { buildTargetUrl, handleReverseProxy } from '../src/services/reverse-proxy.js';

import {
  closeServer,
  findFreePort,
  listen,
  type RunningServer,
  sendRequest,
  settingsFrom,
  startBackend,
  startGateway,
  type TestGateway,
} from './helpers/http.js';

const HOST = { host: 'localhost:8080' };

interface SeenRequest {
  readonly method: string | undefined;
  readonly url: string | undefined;
  readonly headers: IncomingHttpHeaders;
  readonly body: string;
}

let seen: SeenRequest[] = [];
let backend: RunningServer;
let slowBackend: RunningServer;
let blueBackend: RunningServer;
let greenBackend: RunningServer;
let gateway: TestGateway;

beforeAll(async () => {
  backend = await startBackend((req, res) => {
    const chunks: Buffer[] = [];
    req.on('data', (chunk: Buffer) => chunks.push(chunk));
    req.on('end', () => {
      seen.push({
        method: req.method,
        url: req.url,
        headers: req.headers,
        body: Buffer.concat(chunks).toString('utf8'),
      });
      res.setHeader('Content-Type', 'text/plain');
      res.setHeader('X-Upstream', 'yes');
      res.setHeader('Server', 'backend');
      res.setHeader('X-Route', 'backend');
      res.setHeader('Proxy-Authenticate', 'Basic realm="backend"');
      res.setHeader('Connection', 'close, x-internal');
      res.setHeader('X-Internal', 'hidden');
      res.end(`echo:${req.method ?? ''}:${req.url ?? ''}`);
    });
  });
  slowBackend = await startBackend((_req, res) => {
    setTimeout(() => res.end('late'), 1500);
  });
  blueBackend = await startBackend((_req, res) => res.end('blue'));
  greenBackend = await startBackend((_req, res) => res.end('green'));
  const closedPort = await findFreePort();

  gateway = await startGateway(
    settingsFrom(`
upstream:
  - name: pool
    method: roundrobin
    server:
      - server: 127.0.0.1:${blueBackend.port}
      - server: 127.0.0.1:${greenBackend.port}
host:
  - port: 8080
    route:
      - location: /api
        proxy_pass: http://127.0.0.1:${backend.port}/base/
        headers:
          X-Route: gateway
      - location: /small
        proxy_pass: http://127.0.0.1:${backend.port}
        max_body_size: 4
      - location: /slow
        proxy_pass: http://127.0.0.1:${slowBackend.port}
        proxy_timeout: 1
      - location: /down
        proxy_pass: http://127.0.0.1:${closedPort}
      - location: /pool
        upstream: pool
`)
  );
});

afterAll(async () => {
  await gateway.close();
  await Promise.all(
    [backend, slowBackend, blueBackend, greenBackend].map((server) =>
      server.close()
    )
  );
});

describe('buildTargetUrl', () => {
  it('joins base and capture with a single slash', () => {
    expect(buildTargetUrl('http://b:9000/base/', 'users/7', '?x=1')).toBe(
      'http://b:9000/base/users/7?x=1'
    );
    expect(buildTargetUrl('http://b:9000', '/users', '')).toBe(
      'http://b:9000/users'
    );
    expect(buildTargetUrl('http://b:9000/base', undefined, '')).toBe(
      'http://b:9000/base/'
    );
  });
});

describe('reverse proxy', () => {
  it('forwards path and query below the target base', async () => {
    seen = [];
    const response = await sendRequest(gateway.port, {
      path: '/api/users/7?x=1',
      headers: HOST,
    });

    expect(response.status).toBe(200);
    expect(response.text).toBe('echo:GET:/base/users/7?x=1');
    expect(seen[0]?.url).toBe('/base/users/7?x=1');
  });

  it('drops hop-by-hop request headers and adds forwarding headers', async () => {
    seen = [];
    await sendRequest(gateway.port, {
      path: '/api/',
      headers: {
        ...HOST,
        connection: 'keep-alive, x-drop',
        'x-drop': '1',
        'keep-alive': 'timeout=5',
        'proxy-authorization': 'Basic test-secret',
        te: 'trailers',
        'x-custom': 'kept',
      },
    });

    const headers = seen[0]?.headers ?? {};
    expect(headers['x-custom']).toBe('kept');
    expect(headers['x-drop']).toBeUndefined();
    expect(headers['keep-alive']).toBeUndefined();
    expect(headers['proxy-authorization']).toBeUndefined();
    expect(headers.te).toBeUndefined();
    expect(headers.host).toBe(`127.0.0.1:${backend.port}`);
    expect(headers['x-forwarded-for']).toBe('127.0.0.1');
    expect(headers['x-forwarded-host']).toBe('localhost:8080');
    expect(headers['x-forwarded-proto']).toBe('http');
  });

  it('drops hop-by-hop response headers and keeps gateway headers', async () => {
    const response = await sendRequest(gateway.port, {
      path: '/api/',
      headers: HOST,
    });

    expect(response.headers['x-upstream']).toBe('yes');
    expect(response.headers['proxy-authenticate']).toBeUndefined();
    expect(response.headers['x-internal']).toBeUndefined();
    expect(response.headers.server).toBe('portico');
    expect(response.headers['x-route']).toBe('gateway');
  });

  it('forwards request bodies', async () => {
    seen = [];
    const response = await sendRequest(gateway.port, {
      method: 'POST',
      path: '/api/items',
      headers: { ...HOST, 'content-type': 'text/plain' },
      body: 'hello',
    });

    expect(response.text).toBe('echo:POST:/base/items');
    expect(seen[0]?.body).toBe('hello');
    expect(seen[0]?.headers['content-length']).toBe('5');
  });

  it('answers Expect: 100-continue itself and forwards the body', async () => {
    seen = [];
    const response = await sendRequest(gateway.port, {
      method: 'POST',
      path: '/api/upload',
      headers: { ...HOST, expect: '100-continue', 'content-length': '7' },
      body: 'payload',
    });

    expect(response.status).toBe(200);
    expect(response.text).toBe('echo:POST:/base/upload');
    expect(seen[0]?.body).toBe('payload');
    expect(seen[0]?.headers.expect).toBeUndefined();
  });

  it('refuses a GET that carries a body without calling the backend', async () => {
    seen = [];
    const response = await sendRequest(gateway.port, {
      path: '/api/items',
      headers: { ...HOST, 'content-length': '3' },
      body: 'abc',
    });

    expect(response.status).toBe(400);
    expect(JSON.parse(response.text)).toEqual({
      error: { code: 'BAD_REQUEST', statusCode: 400, message: 'Bad Request' },
    });
    expect(seen).toEqual([]);
  });

  it('rejects bodies above the route limit', async () => {
    seen = [];
    const response = await sendRequest(gateway.port, {
      method: 'POST',
      path: '/small/upload',
      headers: HOST,
      body: 'hello',
    });

    expect(response.status).toBe(413);
    expect(JSON.parse(response.text)).toEqual({
      error: {
        code: 'PAYLOAD_TOO_LARGE',
        statusCode: 413,
        message: 'Payload Too Large',
      },
    });
    expect(seen).toEqual([]);
  });

  it('answers 504 when the backend exceeds the route timeout', async () => {
    const response = await sendRequest(gateway.port, {
      path: '/slow/',
      headers: HOST,
    });
    expect(response.status).toBe(504);
    expect(JSON.parse(response.text)).toEqual({
      error: {
        code: 'UPSTREAM_TIMEOUT',
        statusCode: 504,
        message: 'Gateway Timeout',
      },
    });
  });

  it('answers 502 when the backend is unreachable', async () => {
    const response = await sendRequest(gateway.port, {
      path: '/down/',
      headers: HOST,
    });
    expect(response.status).toBe(502);
    expect(JSON.parse(response.text)).toEqual({
      error: {
        code: 'UPSTREAM_FAILED',
        statusCode: 502,
        message: 'Bad Gateway',
      },
    });
  });

  it('spreads requests over an upstream group', async () => {
    const bodies: string[] = [];
    for (let index = 0; index < 3; index += 1) {
      const response = await sendRequest(gateway.port, {
        path: '/pool/',
        headers: HOST,
      });
      bodies.push(response.text);
    }
    expect(bodies).toEqual(['blue', 'green', 'blue']);
  });
});

describe('handleReverseProxy on a route without a proxy target', () => {
  let pagesDir: string;

  beforeAll(async () => {
    pagesDir = await mkdtemp(path.join(os.tmpdir(), 'portico-fallback-'));
    await writeFile(path.join(pagesDir, 'oops.html'), 'something broke');
  });

  afterAll(async () => {
    await rm(pagesDir, { recursive: true, force: true });
  });

  async function serveThroughProxy(yaml: string) {
    const context = new AppContext();
    context.applySettings(settingsFrom(yaml));
    const app = express();
    app.use(async (req, res) => {
      const dispatch = dispatchRequest(context.hosts.snapshot(), {
        scheme: 'http',
        host: req.headers.host,
        path: req.path,
      });
      await handleReverseProxy(context, dispatch, req, res);
    });
    app.use(errorHandler);

    const server = createServer(app);
    const port = await listen(server);
    try {
      return await sendRequest(port, { path: '/x', headers: { host: 'a:80' } });
    } finally {
      await closeServer(server);
    }
  }

  it('serves the error page of the route', async () => {
    const response = await serveThroughProxy(`
host:
  - port: 80
    route:
      - location: /
        root: ${pagesDir}
        error_page: { status: 502, page: oops.html }
`);
    expect(response.status).toBe(502);
    expect(response.text).toBe('something broke');
  });

  it('reports not found without a page', async () => {
    const response = await serveThroughProxy(`
host:
  - port: 80
    route:
      - location: /
        root: ${pagesDir}
`);
    expect(response.status).toBe(404);
    expect(JSON.parse(response.text)).toEqual({
      error: { code: 'ROUTE_NOT_FOUND', statusCode: 404, message: 'Not Found' },
    });
  });
});
