import { readFile } from 'node:fs/promises';
import path from 'node:path';

import { parse as parseYaml } from 'yaml';
import { z } from 'zod';

import { ConfigError } from '../errors/app-error.js';

import { getErrorMessage } from '../utils/error-utils.js';

import {
  type GatewayFile,
  gatewayFileSchema,
  type HostFile,
  type RouteFile,
  type UpstreamFile,
} from './schema.js';
import type {
  GatewaySettings,
  HostConfig,
  RouteBehavior,
  RouteConfig,
  UpstreamGroup,
  UpstreamServer,
} from './types.js';

const DEFAULT_PROXY_TIMEOUT_SEC = 30;
const DEFAULT_REDIRECT_CODE = 301;

interface BuildContext {
  /** Directory relative file paths resolve against. */
  readonly baseDir: string;
  readonly upstreamNames: ReadonlySet<string>;
}

export function normalizeLocation(location: string): string {
  const trimmed = location.trim();
  const leading = trimmed.startsWith('/') ? trimmed : `/${trimmed}`;
  return leading.endsWith('/') ? leading : `${leading}/`;
}

/** Splits `host:port`, rejecting addresses without a usable port. */
export function parseServerAddress(address: string): {
  host: string;
  port: number;
} {
  const separator = address.lastIndexOf(':');
  const closingBracket = address.lastIndexOf(']');
  if (separator === -1 || separator < closingBracket) {
    throw new ConfigError(`missing port in upstream server "${address}"`);
  }

  const host = address.slice(0, separator);
  const portText = address.slice(separator + 1);
  const port = Number(portText);
  if (!host || !/^\d+$/.test(portText) || port < 1 || port > 65535) {
    throw new ConfigError(`missing port in upstream server "${address}"`);
  }
  return { host, port };
}

function buildUpstream(raw: UpstreamFile): UpstreamGroup {
  if (raw.server.length === 0) {
    throw new ConfigError(`upstream "${raw.name}" has no servers`, {
      upstream: raw.name,
    });
  }

  const servers: UpstreamServer[] = raw.server.map((entry) => {
    parseServerAddress(entry.server);
    return { address: entry.server, weight: entry.weight };
  });

  return { name: raw.name, method: raw.method, servers };
}

function buildUpstreams(raw: readonly UpstreamFile[]): UpstreamGroup[] {
  const seen = new Set<string>();
  return raw.map((entry) => {
    if (seen.has(entry.name)) {
      throw new ConfigError(`duplicate upstream "${entry.name}"`);
    }
    seen.add(entry.name);
    return buildUpstream(entry);
  });
}

function selectedBehaviors(raw: RouteFile): string[] {
  const selected: string[] = [];
  if (raw.proxy_pass !== undefined) selected.push('proxy_pass');
  if (raw.upstream !== undefined) selected.push('upstream');
  if (raw.forward_proxy === true) selected.push('forward_proxy');
  if (raw.redirect_to !== undefined) selected.push('redirect_to');
  if (raw.script !== undefined || raw.lua_script !== undefined) {
    selected.push('script');
  }
  return selected;
}

function assertHttpUrl(value: string, location: string): void {
  if (!URL.canParse(value)) {
    throw new ConfigError(`invalid proxy_pass "${value}" in ${location}`);
  }
  const { protocol } = new URL(value);
  if (protocol !== 'http:' && protocol !== 'https:') {
    throw new ConfigError(`invalid proxy_pass "${value}" in ${location}`);
  }
}

function ambiguous(location: string, fields: readonly string[]): ConfigError {
  return new ConfigError(
    `ambiguous route ${location}: ${fields.join(', ')} cannot be combined`,
    { location, fields }
  );
}

function assertNoStrayFields(
  raw: RouteFile,
  location: string,
  behavior: RouteBehavior
): void {
  const stray: string[] = [];
  if (behavior.kind !== 'static') {
    if (raw.index !== undefined) stray.push('index');
    if (raw.auto_index !== undefined) stray.push('auto_index');
  }
  if (behavior.kind !== 'redirect' && raw.redirect_code !== undefined) {
    stray.push('redirect_code');
  }
  if (
    behavior.kind !== 'reverse-proxy' &&
    behavior.kind !== 'forward-proxy' &&
    raw.proxy_timeout !== undefined
  ) {
    stray.push('proxy_timeout');
  }
  if (stray.length > 0) {
    throw ambiguous(location, [behavior.kind, ...stray]);
  }
}

function buildBehavior(
  raw: RouteFile,
  location: string,
  context: BuildContext
): RouteBehavior {
  const selected = selectedBehaviors(raw);
  if (selected.length > 1) {
    throw ambiguous(location, selected);
  }

  const timeoutSec = raw.proxy_timeout ?? DEFAULT_PROXY_TIMEOUT_SEC;

  if (raw.proxy_pass !== undefined) {
    assertHttpUrl(raw.proxy_pass, location);
    return {
      kind: 'reverse-proxy',
      target: { kind: 'url', url: raw.proxy_pass },
      timeoutSec,
    };
  }
  if (raw.upstream !== undefined) {
    if (!context.upstreamNames.has(raw.upstream)) {
      throw new ConfigError(`unknown upstream "${raw.upstream}" in ${location}`, {
        upstream: raw.upstream,
        location,
      });
    }
    return {
      kind: 'reverse-proxy',
      target: { kind: 'upstream', name: raw.upstream },
      timeoutSec,
    };
  }
  if (raw.forward_proxy === true) {
    return { kind: 'forward-proxy', timeoutSec };
  }
  if (raw.redirect_to !== undefined) {
    return {
      kind: 'redirect',
      to: raw.redirect_to,
      code: raw.redirect_code ?? DEFAULT_REDIRECT_CODE,
    };
  }
  const script = raw.script ?? raw.lua_script;
  if (script !== undefined) {
    return { kind: 'script', path: path.resolve(context.baseDir, script) };
  }
  if (raw.root === undefined) {
    throw new ConfigError(`route ${location} has no root and no behavior`, {
      location,
    });
  }
  return {
    kind: 'static',
    root: path.resolve(context.baseDir, raw.root),
    index: raw.index ?? [],
    autoIndex: raw.auto_index ?? false,
  };
}

function buildRoute(raw: RouteFile, context: BuildContext): RouteConfig {
  const location = normalizeLocation(raw.location);
  const behavior = buildBehavior(raw, location, context);
  assertNoStrayFields(raw, location, behavior);

  return {
    location,
    behavior,
    ...(raw.root !== undefined && {
      pagesRoot: path.resolve(context.baseDir, raw.root),
    }),
    ...(raw.not_found_page && { notFoundPage: raw.not_found_page }),
    ...(raw.error_page && { errorPage: raw.error_page }),
    headers: raw.headers ?? {},
    ...(raw.max_body_size !== undefined && { maxBodySize: raw.max_body_size }),
  };
}

function describeHost(raw: HostFile): string {
  return `${raw.server_name ?? 'default host'} on port ${raw.port}`;
}

function buildRouteMap(
  routes: readonly RouteConfig[],
  label: string
): Map<string, RouteConfig> {
  const routeMap = new Map<string, RouteConfig>();
  for (const route of routes) {
    if (routeMap.has(route.location)) {
      throw new ConfigError(
        `duplicate location ${route.location} for ${label}`
      );
    }
    routeMap.set(route.location, route);
  }
  return routeMap;
}

function buildHost(raw: HostFile, context: BuildContext): HostConfig {
  const label = describeHost(raw);
  const routes = raw.route.map((route) => buildRoute(route, context));
  const routeMap = buildRouteMap(routes, label);
  const locations = [...routeMap.keys()].sort((a, b) => b.length - a.length);

  let tls: HostConfig['tls'] = undefined;
  if (raw.ssl) {
    if (!raw.certificate || !raw.certificate_key) {
      throw new ConfigError(
        `ssl is enabled for ${label} but certificate or certificate_key is missing`
      );
    }
    tls = {
      certificate: path.resolve(context.baseDir, raw.certificate),
      certificateKey: path.resolve(context.baseDir, raw.certificate_key),
    };
  }

  return {
    ip: raw.ip,
    port: raw.port,
    ...(tls && { tls }),
    serverName: raw.server_name ?? null,
    timeoutSec: raw.timeout,
    keepaliveSec: raw.keepalive_timeout,
    headers: raw.headers ?? {},
    routes,
    routeMap,
    locations,
  };
}

function assertUniqueHosts(hosts: readonly HostConfig[]): void {
  const seen = new Map<number, Set<string | null>>();
  for (const host of hosts) {
    const domains = seen.get(host.port) ?? new Set<string | null>();
    if (domains.has(host.serverName)) {
      throw new ConfigError(
        host.serverName === null
          ? `more than one default host on port ${host.port}`
          : `duplicate host ${host.serverName} on port ${host.port}`
      );
    }
    domains.add(host.serverName);
    seen.set(host.port, domains);
  }
}

export function buildSettings(
  file: GatewayFile,
  baseDir: string = process.cwd()
): GatewaySettings {
  const upstreams = buildUpstreams(file.upstream);
  const context: BuildContext = {
    baseDir,
    upstreamNames: new Set(upstreams.map((group) => group.name)),
  };
  const hosts = file.host.map((host) => buildHost(host, context));
  assertUniqueHosts(hosts);

  return {
    ...(file.log_level && { logLevel: file.log_level }),
    defaultType: file.default_type,
    types: file.types,
    hosts,
    upstreams,
  };
}

function parseDocument(content: string, source: string): unknown {
  try {
    return parseYaml(content);
  } catch (error: unknown) {
    throw new ConfigError(`${source}: ${getErrorMessage(error)}`);
  }
}

export function parseSettings(
  content: string,
  source: string,
  baseDir: string = process.cwd()
): GatewaySettings {
  const result = gatewayFileSchema.safeParse(parseDocument(content, source) ?? {});
  if (!result.success) {
    throw new ConfigError(
      `Invalid configuration ${source}:\n${z.prettifyError(result.error)}`
    );
  }
  return buildSettings(result.data, baseDir);
}

export async function loadSettings(filePath: string): Promise<GatewaySettings> {
  let content: string;
  try {
    content = await readFile(filePath, 'utf8');
  } catch (error: unknown) {
    throw new ConfigError(
      `Cannot read configuration ${filePath}: ${getErrorMessage(error)}`
    );
  }
  return parseSettings(content, filePath, path.dirname(filePath));
}
