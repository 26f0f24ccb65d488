import type { HostConfig, RouteConfig } from '../config/types.js';

import { BadRequestError, RouteNotFoundError } from '../errors/app-error.js';

import type { HostTable } from './registry.js';

export type Scheme = 'http' | 'https';

export interface DispatchInput {
  readonly scheme: Scheme;
  /** Raw `Host` header value. */
  readonly host: string | undefined;
  /** Request pathname, without the query string. */
  readonly path: string;
}

export interface Dispatch {
  readonly host: HostConfig;
  readonly route: RouteConfig;
  readonly parentPath: string;
  /** Path remainder after the matched location; absent when empty. */
  readonly capture: string | undefined;
}

export interface HostAddress {
  readonly domain: string;
  readonly port: number;
}

export interface LocationMatch {
  readonly location: string;
  readonly capture: string | undefined;
}

function defaultPort(scheme: Scheme): number {
  return scheme === 'https' ? 443 : 80;
}

function parsePort(value: string | undefined, scheme: Scheme): number {
  if (value === undefined || !/^\d{1,5}$/.test(value)) {
    return defaultPort(scheme);
  }
  const port = Number(value);
  return port <= 65535 ? port : defaultPort(scheme);
}

/** Splits a `Host` header at the first `:`; bracketed IPv6 literals stay whole. */
export function parseHostHeader(
  value: string | undefined,
  scheme: Scheme
): HostAddress {
  const header = value?.trim() ?? '';

  if (header.startsWith('[')) {
    const end = header.indexOf(']');
    if (end !== -1) {
      const rest = header.slice(end + 1);
      return {
        domain: header.slice(0, end + 1),
        port: parsePort(rest.startsWith(':') ? rest.slice(1) : undefined, scheme),
      };
    }
  }

  const separator = header.indexOf(':');
  if (separator === -1) {
    return { domain: header, port: defaultPort(scheme) };
  }
  return {
    domain: header.slice(0, separator),
    port: parsePort(header.slice(separator + 1), scheme),
  };
}

export function resolveHostConfig(
  table: HostTable,
  address: HostAddress
): HostConfig {
  const domains = table.get(address.port);
  if (!domains) {
    throw new BadRequestError(`No host listening on port ${address.port}`, {
      port: address.port,
    });
  }

  const domain = address.domain.toLowerCase();
  const exact = domains.get(domain);
  if (exact) return exact;

  for (const [name, host] of domains) {
    if (name !== null && name.toLowerCase() === domain) return host;
  }

  const fallback = domains.get(null);
  if (fallback) return fallback;

  throw new BadRequestError(`No host matches ${address.domain}`, {
    domain: address.domain,
    port: address.port,
  });
}

/** Longest location that prefixes `path`, or that equals `path` plus `/`. */
export function matchLocation(
  locations: readonly string[],
  path: string
): LocationMatch | undefined {
  for (const location of locations) {
    if (path.startsWith(location)) {
      const capture = path.slice(location.length);
      return { location, capture: capture || undefined };
    }
    if (`${path}/` === location) {
      return { location, capture: undefined };
    }
  }
  return undefined;
}

export function resolveParentPath(
  path: string,
  capture: string | undefined
): string {
  if (capture) {
    return path.slice(0, path.length - capture.length);
  }
  return path.endsWith('/') ? path : `${path}/`;
}

export function dispatchRequest(
  table: HostTable,
  input: DispatchInput
): Dispatch {
  const host = resolveHostConfig(table, parseHostHeader(input.host, input.scheme));
  const match = matchLocation(host.locations, input.path);
  const capture = match?.capture;
  const parentPath = resolveParentPath(input.path, capture);

  const route = host.routeMap.get(parentPath);
  if (!route) {
    throw new RouteNotFoundError(input.path);
  }
  return { host, route, parentPath, capture };
}
