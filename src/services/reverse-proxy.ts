import type { Request, Response } from 'express';

import type { ProxyTarget } from '../config/types.js';

import { UpstreamError } from '../errors/app-error.js';

import type { AppContext } from './app-context.js';
import type { Lease } from './balancer.js';
import type { Dispatch } from './dispatcher.js';
import {
  sendUpstream,
  type SendUpstream,
} from './fetcher/upstream-client.js';
import { logDebug } from './logger.js';
import {
  buildUpstreamRequest,
  clientAddress,
  relayResponse,
  requestSearch,
  serveFallbackPage,
} from './proxy-exchange.js';

interface ResolvedBase {
  readonly base: string;
  readonly lease?: Lease;
}

/** Joins base, capture and query with exactly one `/` between base and capture. */
export function buildTargetUrl(
  base: string,
  capture: string | undefined,
  search: string
): string {
  const trimmedBase = base.replace(/\/+$/, '');
  const trimmedCapture = (capture ?? '').replace(/^\/+/, '');
  return `${trimmedBase}/${trimmedCapture}${search}`;
}

function resolveBase(
  context: AppContext,
  target: ProxyTarget,
  req: Request
): ResolvedBase {
  if (target.kind === 'url') {
    return { base: target.url };
  }

  const pool = context.upstreams.get(target.name);
  if (!pool) {
    throw new UpstreamError(`Unknown upstream ${target.name}`, target.name, false);
  }
  const lease = pool.acquire({ clientIp: clientAddress(req) });
  return { base: `http://${lease.server.address}`, lease };
}

export async function handleReverseProxy(
  context: AppContext,
  dispatch: Dispatch,
  req: Request,
  res: Response,
  send: SendUpstream = sendUpstream
): Promise<void> {
  const { route, capture } = dispatch;
  if (route.behavior.kind !== 'reverse-proxy') {
    await serveFallbackPage(context, route, req, res);
    return;
  }

  const { timeoutSec, target } = route.behavior;
  const { base, lease } = resolveBase(context, target, req);
  try {
    const url = buildTargetUrl(base, capture, requestSearch(req));
    const init = await buildUpstreamRequest(context, route, req, timeoutSec);
    logDebug('Proxying request', { method: init.method, url });

    const upstream = await send(url, init);
    await relayResponse(upstream, res);
  } finally {
    lease?.release();
  }
}
