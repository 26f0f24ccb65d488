import { pipeline } from 'node:stream/promises';

import type { Request, Response } from 'express';

import type { RouteConfig } from '../config/types.js';

import { BadRequestError, RouteNotFoundError } from '../errors/app-error.js';

import type { AppContext } from './app-context.js';
import { readRequestBody } from './fetcher/body.js';
import {
  type HeaderRecord,
  stripHopByHop,
  withForwardedHeaders,
} from './fetcher/headers.js';
import type {
  UpstreamRequest,
  UpstreamResponse,
} from './fetcher/upstream-client.js';
import { serveCustomPage } from './static-files.js';

export function clientAddress(req: Request): string | undefined {
  return req.socket.remoteAddress;
}

export function requestSearch(req: Request): string {
  const queryIndex = req.originalUrl.indexOf('?');
  return queryIndex === -1 ? '' : req.originalUrl.slice(queryIndex);
}

const BODYLESS_METHODS: ReadonlySet<string> = new Set(['GET', 'HEAD']);

// The inbound server has already answered `Expect` and the body is buffered
// by the time the upstream call starts.
const INBOUND_ONLY_HEADERS: readonly string[] = ['expect'];

function withoutInboundOnly(headers: HeaderRecord): HeaderRecord {
  const result: HeaderRecord = { ...headers };
  for (const name of INBOUND_ONLY_HEADERS) delete result[name];
  return result;
}

/**
 * Builds the outgoing request: filtered headers plus the buffered body.
 * A GET or HEAD carrying a body is refused before any upstream call.
 */
export async function buildUpstreamRequest(
  context: AppContext,
  route: RouteConfig,
  req: Request,
  timeoutSec: number
): Promise<UpstreamRequest> {
  const limit = route.maxBodySize ?? context.limits.maxBodySize;
  const body = await readRequestBody(req, limit);
  if (body && BODYLESS_METHODS.has(req.method)) {
    throw new BadRequestError(`${req.method} request must not carry a body`, {
      length: body.length,
    });
  }

  const headers = withForwardedHeaders(
    withoutInboundOnly(stripHopByHop(req.headers)),
    {
      clientIp: clientAddress(req),
      host: req.headers.host,
      proto: req.protocol,
    }
  );

  return { method: req.method, headers, body, timeoutMs: timeoutSec * 1000 };
}

/**
 * Copies the upstream status and headers, then streams the body. Headers the
 * gateway already set on `res` are kept.
 */
export async function relayResponse(
  upstream: UpstreamResponse,
  res: Response
): Promise<void> {
  res.status(upstream.statusCode);
  for (const [name, value] of Object.entries(stripHopByHop(upstream.headers))) {
    if (res.hasHeader(name)) continue;
    res.setHeader(name, value);
  }
  await pipeline(upstream.body, res);
}

/** Custom page for a route that reached a proxy engine without a proxy behavior. */
export async function serveFallbackPage(
  context: AppContext,
  route: RouteConfig,
  req: Request,
  res: Response
): Promise<void> {
  const page = route.errorPage ?? route.notFoundPage;
  if (!page) {
    throw new RouteNotFoundError(req.path);
  }
  await serveCustomPage(context, route, page, req, res);
}
