import type { Request, Response } from 'express';

import { config } from '../config/index.js';

import { BadRequestError } from '../errors/app-error.js';

import type { AppContext } from './app-context.js';
import type { Dispatch } from './dispatcher.js';
import { requestWithRedirects } from './fetcher/redirects.js';
import {
  sendUpstream,
  type SendUpstream,
} from './fetcher/upstream-client.js';
import { logDebug } from './logger.js';
import {
  buildUpstreamRequest,
  relayResponse,
  serveFallbackPage,
} from './proxy-exchange.js';

const ABSOLUTE_HTTP_URL = /^https?:\/\//i;

/** Absolute target from the raw request target; bare targets get `http://`. */
export function resolveForwardTarget(rawTarget: string): string {
  const target = ABSOLUTE_HTTP_URL.test(rawTarget)
    ? rawTarget
    : `http://${rawTarget.replace(/^\/+/, '')}`;

  if (!URL.canParse(target)) {
    throw new BadRequestError('Invalid forward proxy target', {
      target: rawTarget,
    });
  }
  const { hostname } = new URL(target);
  if (!hostname) {
    throw new BadRequestError('Invalid forward proxy target', {
      target: rawTarget,
    });
  }
  return target;
}

export async function handleForwardProxy(
  context: AppContext,
  dispatch: Dispatch,
  req: Request,
  res: Response,
  send: SendUpstream = sendUpstream
): Promise<void> {
  const { route } = dispatch;
  if (route.behavior.kind !== 'forward-proxy') {
    await serveFallbackPage(context, route, req, res);
    return;
  }

  const target = resolveForwardTarget(req.originalUrl);
  const init = await buildUpstreamRequest(
    context,
    route,
    req,
    route.behavior.timeoutSec
  );
  logDebug('Forwarding request', { method: init.method, url: target });

  const { response } = await requestWithRedirects(
    target,
    init,
    config.proxy.maxRedirects,
    send
  );
  await relayResponse(response, res);
}
