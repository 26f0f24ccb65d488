import type { Server } from 'node:http';

import type { HostConfig } from '../config/types.js';

import { logDebug } from '../services/logger.js';

type TunableServer = Pick<
  Server,
  'headersTimeout' | 'requestTimeout' | 'keepAliveTimeout'
>;

/**
 * Request and keep-alive timeouts for a listener shared by `hosts`. The most
 * permissive host setting wins.
 */
export function applyHostTuning(
  server: TunableServer,
  hosts: readonly HostConfig[]
): void {
  if (hosts.length === 0) return;

  const requestTimeoutMs =
    Math.max(...hosts.map((host) => host.timeoutSec)) * 1000;
  const keepAliveTimeoutMs =
    Math.max(...hosts.map((host) => host.keepaliveSec)) * 1000;

  server.requestTimeout = requestTimeoutMs;
  server.headersTimeout = Math.min(server.headersTimeout, requestTimeoutMs);
  server.keepAliveTimeout = keepAliveTimeoutMs;

  logDebug('Applied listener tuning', { requestTimeoutMs, keepAliveTimeoutMs });
}
