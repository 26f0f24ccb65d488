import { UpstreamError } from '../../errors/app-error.js';

import {
  sendUpstream,
  type SendUpstream,
  type UpstreamRequest,
  type UpstreamResponse,
} from './upstream-client.js';

const FOLLOWED_STATUSES: ReadonlySet<number> = new Set([301, 302]);

export const DEFAULT_MAX_REDIRECTS = 10;

function headerValue(
  value: string | string[] | undefined
): string | undefined {
  return Array.isArray(value) ? value[0] : value;
}

function resolveRedirectTarget(baseUrl: string, location: string): string {
  if (!URL.canParse(location, baseUrl)) {
    throw new UpstreamError('Invalid redirect target', baseUrl, false, {
      location,
    });
  }
  return new URL(location, baseUrl).href;
}

function discardBody(response: UpstreamResponse): void {
  response.body.destroy();
}

/**
 * Issues `init` against `url`, re-issuing it against `Location` on 301 and
 * 302 responses. Fails once `maxRedirects` redirects have been followed and
 * another arrives, or when a redirect carries no `Location`.
 */
export async function requestWithRedirects(
  url: string,
  init: UpstreamRequest,
  maxRedirects: number = DEFAULT_MAX_REDIRECTS,
  send: SendUpstream = sendUpstream
): Promise<{ response: UpstreamResponse; url: string }> {
  let currentUrl = url;
  const redirectLimit = Math.max(0, maxRedirects);

  for (
    let redirectCount = 0;
    redirectCount <= redirectLimit;
    redirectCount += 1
  ) {
    const response = await send(currentUrl, init);
    if (!FOLLOWED_STATUSES.has(response.statusCode)) {
      return { response, url: currentUrl };
    }

    discardBody(response);
    if (redirectCount >= redirectLimit) break;

    const location = headerValue(response.headers['location']);
    if (!location) {
      throw new UpstreamError(
        'Redirect response missing Location header',
        currentUrl,
        false
      );
    }
    currentUrl = resolveRedirectTarget(currentUrl, location);
  }

  throw new UpstreamError('Too many redirects', currentUrl, false, {
    maxRedirects: redirectLimit,
  });
}
