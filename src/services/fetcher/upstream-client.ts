import type { Readable } from 'node:stream';

import { type Dispatcher, request } from 'undici';

import {
  MethodNotAllowedError,
  UpstreamError,
} from '../../errors/app-error.js';

import { getErrorMessage } from '../../utils/error-utils.js';

import { logWarn } from '../logger.js';
import { dispatcher } from './agents.js';
import type { HeaderRecord, HeaderValue } from './headers.js';

export interface UpstreamRequest {
  readonly method: string;
  readonly headers: HeaderRecord;
  readonly body?: Buffer | undefined;
  /** Covers the whole exchange, body included. */
  readonly timeoutMs: number;
}

export interface UpstreamResponse {
  readonly statusCode: number;
  readonly headers: Readonly<Record<string, HeaderValue | undefined>>;
  readonly body: Readable;
}

export type SendUpstream = (
  url: string,
  init: UpstreamRequest
) => Promise<UpstreamResponse>;

const FORWARDABLE_METHODS: ReadonlySet<string> = new Set([
  'GET',
  'HEAD',
  'POST',
  'PUT',
  'DELETE',
  'OPTIONS',
  'TRACE',
  'PATCH',
]);

function isForwardableMethod(method: string): method is Dispatcher.HttpMethod {
  return FORWARDABLE_METHODS.has(method);
}

export const sendUpstream: SendUpstream = async (url, init) => {
  if (!isForwardableMethod(init.method)) {
    throw new MethodNotAllowedError(init.method);
  }

  const signal = AbortSignal.timeout(init.timeoutMs);
  try {
    const response = await request(url, {
      method: init.method,
      headers: Object.entries(init.headers),
      body: init.body ?? null,
      dispatcher,
      signal,
    });
    return {
      statusCode: response.statusCode,
      headers: response.headers,
      body: response.body,
    };
  } catch (error: unknown) {
    const timedOut = signal.aborted;
    logWarn('Upstream request failed', {
      url,
      timedOut,
      error: getErrorMessage(error),
    });
    throw new UpstreamError(
      timedOut ? 'Upstream request timed out' : 'Upstream request failed',
      url,
      timedOut
    );
  }
};
