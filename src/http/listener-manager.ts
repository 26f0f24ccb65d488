import { readFile } from 'node:fs/promises';
import http from 'node:http';
import https from 'node:https';
import type { AddressInfo } from 'node:net';
import tls from 'node:tls';

import type { HostConfig, TlsConfig } from '../config/types.js';

import { logError, logInfo, logWarn } from '../services/logger.js';
import type { HostRegistry } from '../services/registry.js';

import { getErrorMessage, toError } from '../utils/error-utils.js';

import { applyHostTuning } from './server-tuning.js';

export interface ListenerBinding {
  readonly ip: string;
  readonly port: number;
  readonly hosts: readonly HostConfig[];
}

export interface ListenerAddress {
  /** Port from the configuration; `address.port` is the bound one. */
  readonly port: number;
  readonly secure: boolean;
  readonly address: AddressInfo;
}

export interface TlsMaterial {
  readonly cert: Buffer;
  readonly key: Buffer;
}

export type TlsLoader = (config: TlsConfig) => Promise<TlsMaterial>;

interface RunningListener {
  readonly binding: ListenerBinding;
  readonly server: http.Server;
  readonly secure: boolean;
}

export const loadTlsMaterial: TlsLoader = async (config) => {
  const [cert, key] = await Promise.all([
    readFile(config.certificate),
    readFile(config.certificateKey),
  ]);
  return { cert, key };
};

/** One binding per port; the bind address comes from the port's first host. */
export function planListeners(registry: HostRegistry): ListenerBinding[] {
  return registry.ports().flatMap((port) => {
    const hosts = registry.hostsForPort(port);
    const first = hosts[0];
    if (!first) return [];

    const otherIps = hosts.filter((host) => host.ip !== first.ip);
    if (otherIps.length > 0) {
      logWarn('Hosts on one port disagree on the bind address', {
        port,
        using: first.ip,
        ignored: otherIps.map((host) => host.ip),
      });
    }
    return [{ ip: first.ip, port, hosts }];
  });
}

function formatHost(ip: string): string {
  return ip.includes(':') ? `[${ip}]` : ip;
}

async function createSecureServer(
  binding: ListenerBinding,
  handler: http.RequestListener,
  loadTls: TlsLoader
): Promise<https.Server> {
  const secureHosts = binding.hosts.filter(
    (host): host is HostConfig & { tls: TlsConfig } => host.tls !== undefined
  );
  const contexts = new Map<string | null, tls.SecureContext>();
  for (const host of secureHosts) {
    const material = await loadTls(host.tls);
    contexts.set(
      host.serverName?.toLowerCase() ?? null,
      tls.createSecureContext(material)
    );
  }

  const fallbackHost =
    secureHosts.find((host) => host.serverName === null) ?? secureHosts[0];
  if (!fallbackHost) {
    throw new Error(`No TLS host on port ${binding.port}`);
  }
  const fallback = await loadTls(fallbackHost.tls);

  if (secureHosts.length < binding.hosts.length) {
    logWarn('Plain hosts share a TLS port and will be served over TLS', {
      port: binding.port,
    });
  }

  return https.createServer(
    {
      ...fallback,
      SNICallback: (servername, callback) => {
        const context =
          contexts.get(servername.toLowerCase()) ?? contexts.get(null);
        callback(null, context);
      },
    },
    handler
  );
}

function listen(server: http.Server, binding: ListenerBinding): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    server.once('error', reject);
    server.listen({ host: binding.ip, port: binding.port }, () => {
      server.off('error', reject);
      resolve();
    });
  });
}

/** Owns the running listeners and retires them with a grace period. */
export class ListenerManager {
  private listeners: RunningListener[] = [];

  constructor(
    private readonly handler: http.RequestListener,
    private readonly loadTls: TlsLoader = loadTlsMaterial
  ) {}

  get size(): number {
    return this.listeners.length;
  }

  addresses(): ListenerAddress[] {
    return this.listeners.flatMap(({ binding, server, secure }) => {
      const address = server.address();
      if (!address || typeof address === 'string') return [];
      return [{ port: binding.port, secure, address }];
    });
  }

  /** Starts one listener per binding. A failed bind does not stop the rest. */
  async startAll(bindings: readonly ListenerBinding[]): Promise<void> {
    for (const binding of bindings) {
      try {
        this.listeners.push(await this.start(binding));
      } catch (error: unknown) {
        logError(
          `Failed to start listener on ${formatHost(binding.ip)}:${binding.port}`,
          toError(error)
        );
      }
    }
  }

  /**
   * Stops accepting on every listener, then waits up to `graceMs` for
   * in-flight requests before closing the remaining connections.
   */
  async retireAll(graceMs: number): Promise<void> {
    const retiring = this.listeners;
    this.listeners = [];
    await Promise.all(retiring.map((listener) => this.retire(listener, graceMs)));
  }

  /** Retires the current listeners while the new ones start. */
  async restart(
    bindings: readonly ListenerBinding[],
    graceMs: number
  ): Promise<void> {
    const draining = this.retireAll(graceMs);
    await this.startAll(bindings);
    await draining;
  }

  private async start(binding: ListenerBinding): Promise<RunningListener> {
    const secure = binding.hosts.some((host) => host.tls !== undefined);
    const server = secure
      ? await createSecureServer(binding, this.handler, this.loadTls)
      : http.createServer(this.handler);

    applyHostTuning(server, binding.hosts);
    server.on('clientError', (error, socket) => {
      logWarn('Client connection error', { error: error.message });
      if (socket.writable) {
        socket.end('HTTP/1.1 400 Bad Request\r\nConnection: close\r\n\r\n');
      } else {
        socket.destroy();
      }
    });

    await listen(server, binding);
    logInfo(
      `Listening on ${secure ? 'https' : 'http'}://${formatHost(binding.ip)}:${binding.port}`,
      {
        hosts: binding.hosts.map((host) => host.serverName ?? '(default)'),
      }
    );
    return { binding, server, secure };
  }

  private async retire(listener: RunningListener, graceMs: number): Promise<void> {
    const { server, binding } = listener;
    const closed = new Promise<void>((resolve) => {
      server.close((error) => {
        if (error) {
          logWarn('Listener close reported an error', {
            port: binding.port,
            error: getErrorMessage(error),
          });
        }
        resolve();
      });
    });
    server.closeIdleConnections();

    const forceTimer = setTimeout(() => {
      logWarn('Grace period elapsed, closing remaining connections', {
        port: binding.port,
        graceMs,
      });
      server.closeAllConnections();
    }, graceMs);

    try {
      await closed;
    } finally {
      clearTimeout(forceTimer);
    }
    logInfo('Listener retired', { port: binding.port });
  }
}
