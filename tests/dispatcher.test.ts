import { describe, expect, it } from 'vitest';

import { parseSettings } from '../src/config/loader.js';
import { BadRequestError, RouteNotFoundError } from '../src/errors/app-error.js';
import {
  dispatchRequest,
  matchLocation,
  parseHostHeader,
  resolveHostConfig,
  resolveParentPath,
} from '../src/services/dispatcher.js';
import { buildHostTable, HostRegistry } from '../src/services/registry.js';

function hostsFrom(yaml: string) {
  return parseSettings(yaml, 'test.yaml', '/srv').hosts;
}

const twoHosts = hostsFrom(`
host:
  - port: 80
    server_name: a.com
    route:
      - location: /
        redirect_to: https://a.example/
  - port: 80
    route:
      - location: /
        redirect_to: https://default.example/
      - location: /docs
        root: /srv/docs
`);

describe('parseHostHeader', () => {
  it('uses the scheme default when the port is absent', () => {
    expect(parseHostHeader('example.com', 'http')).toEqual({
      domain: 'example.com',
      port: 80,
    });
    expect(parseHostHeader('example.com', 'https')).toEqual({
      domain: 'example.com',
      port: 443,
    });
  });

  it('reads an explicit port', () => {
    expect(parseHostHeader('example.com:8080', 'http')).toEqual({
      domain: 'example.com',
      port: 8080,
    });
  });

  it('falls back to the default port when the port is unusable', () => {
    expect(parseHostHeader('example.com:abc', 'http').port).toBe(80);
    expect(parseHostHeader('example.com:70000', 'https').port).toBe(443);
  });

  it('keeps bracketed IPv6 literals whole', () => {
    expect(parseHostHeader('[::1]:8443', 'http')).toEqual({
      domain: '[::1]',
      port: 8443,
    });
    expect(parseHostHeader('[::1]', 'https')).toEqual({
      domain: '[::1]',
      port: 443,
    });
  });

  it('treats a missing header as an empty domain', () => {
    expect(parseHostHeader(undefined, 'http')).toEqual({ domain: '', port: 80 });
  });
});

describe('resolveHostConfig', () => {
  const table = buildHostTable(twoHosts);

  it('prefers the exact domain, ignoring case', () => {
    const host = resolveHostConfig(table, { domain: 'A.COM', port: 80 });
    expect(host.serverName).toBe('a.com');
  });

  it('falls back to the default host of the port', () => {
    const host = resolveHostConfig(table, { domain: 'b.com', port: 80 });
    expect(host.serverName).toBeNull();
  });

  it('matches server names written in mixed case', () => {
    const mixed = buildHostTable(
      hostsFrom(`
host:
  - port: 80
    server_name: Mixed.Example
`)
    );
    const host = resolveHostConfig(mixed, {
      domain: 'mixed.example',
      port: 80,
    });
    expect(host.serverName).toBe('Mixed.Example');
  });

  it('rejects ports without hosts', () => {
    expect(() => resolveHostConfig(table, { domain: 'a.com', port: 81 })).toThrow(
      'No host listening on port 81'
    );
  });

  it('rejects unknown domains when the port has no default host', () => {
    const named = buildHostTable(
      hostsFrom(`
host:
  - port: 80
    server_name: a.com
`)
    );
    expect(() => resolveHostConfig(named, { domain: 'b.com', port: 80 })).toThrow(
      BadRequestError
    );
  });
});

describe('matchLocation', () => {
  const locations = ['/docs/', '/'];

  it('takes the longest matching prefix', () => {
    expect(matchLocation(locations, '/docs/intro.html')).toEqual({
      location: '/docs/',
      capture: 'intro.html',
    });
    expect(matchLocation(locations, '/other')).toEqual({
      location: '/',
      capture: 'other',
    });
  });

  it('matches a location written without its trailing slash', () => {
    expect(matchLocation(locations, '/docs')).toEqual({
      location: '/docs/',
      capture: undefined,
    });
  });

  it('returns undefined when nothing matches', () => {
    expect(matchLocation(['/docs/'], '/api')).toBeUndefined();
    expect(matchLocation([], '/')).toBeUndefined();
  });
});

describe('resolveParentPath', () => {
  it('strips the capture from the path', () => {
    expect(resolveParentPath('/docs/intro.html', 'intro.html')).toBe('/docs/');
  });

  it('appends a slash when there is no capture', () => {
    expect(resolveParentPath('/docs', undefined)).toBe('/docs/');
    expect(resolveParentPath('/', undefined)).toBe('/');
  });
});

describe('dispatchRequest', () => {
  const table = buildHostTable(twoHosts);

  it('selects host and route from the Host header and path', () => {
    const dispatch = dispatchRequest(table, {
      scheme: 'http',
      host: 'A.COM',
      path: '/x',
    });
    expect(dispatch.host.serverName).toBe('a.com');
    expect(dispatch.route.behavior).toEqual({
      kind: 'redirect',
      to: 'https://a.example/',
      code: 301,
    });
    expect(dispatch.parentPath).toBe('/');
    expect(dispatch.capture).toBe('x');
  });

  it('routes other domains to the default host', () => {
    const dispatch = dispatchRequest(table, {
      scheme: 'http',
      host: 'b.com',
      path: '/docs/guide/setup.html',
    });
    expect(dispatch.host.serverName).toBeNull();
    expect(dispatch.route.location).toBe('/docs/');
    expect(dispatch.capture).toBe('guide/setup.html');
  });

  it('rejects requests for a port nobody listens on', () => {
    expect(() =>
      dispatchRequest(table, { scheme: 'http', host: 'a.com:81', path: '/' })
    ).toThrow(BadRequestError);
  });

  it('reports a missing route as not found', () => {
    const docsOnly = buildHostTable(
      hostsFrom(`
host:
  - port: 80
    route:
      - location: /docs
        root: /srv/docs
`)
    );
    expect(() =>
      dispatchRequest(docsOnly, { scheme: 'http', host: 'x', path: '/api/users' })
    ).toThrow(RouteNotFoundError);
  });
});

describe('HostRegistry', () => {
  const replacement = hostsFrom(`
host:
  - port: 80
    server_name: new.com
    route:
      - location: /
        redirect_to: https://new.example/
`);

  it('keeps a taken snapshot intact across a swap', () => {
    const registry = new HostRegistry();
    registry.replaceAll(twoHosts);
    const before = registry.snapshot();

    registry.replaceAll(replacement);

    const old = dispatchRequest(before, {
      scheme: 'http',
      host: 'a.com',
      path: '/',
    });
    expect(old.route.behavior).toEqual({
      kind: 'redirect',
      to: 'https://a.example/',
      code: 301,
    });

    const current = dispatchRequest(registry.snapshot(), {
      scheme: 'http',
      host: 'new.com',
      path: '/',
    });
    expect(current.route.behavior).toEqual({
      kind: 'redirect',
      to: 'https://new.example/',
      code: 301,
    });
    expect(() =>
      dispatchRequest(registry.snapshot(), {
        scheme: 'http',
        host: 'a.com',
        path: '/',
      })
    ).toThrow('No host matches a.com');
  });

  it('keeps the previous table when a replacement is rejected', () => {
    const registry = new HostRegistry();
    registry.replaceAll(twoHosts);
    const duplicate = [...replacement, ...replacement];

    expect(() => registry.replaceAll(duplicate)).toThrow(
      'Host new.com already registered on port 80'
    );
    expect(registry.size).toBe(2);
    expect(registry.hostsForPort(80).map((host) => host.serverName)).toEqual([
      'a.com',
      null,
    ]);
  });

  it('lists ports and empties on clear', () => {
    const registry = new HostRegistry();
    registry.replaceAll(twoHosts);
    expect(registry.ports()).toEqual([80]);

    registry.clear();
    expect(registry.size).toBe(0);
    expect(registry.ports()).toEqual([]);
  });
});
