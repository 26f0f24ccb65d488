import type { Gateway } from '../application.js';
import { config } from '../config/index.js';

import { destroyAgents } from '../services/fetcher/agents.js';
import { logError, logInfo, logWarn } from '../services/logger.js';

import { getErrorMessage, toError } from '../utils/error-utils.js';

const FORCED_EXIT_MARGIN_MS = 5000;

export function createShutdownHandler(
  gateway: Gateway
): (signal: string) => Promise<void> {
  let shuttingDown = false;

  return async (signal: string): Promise<void> => {
    if (shuttingDown) return;
    shuttingDown = true;

    logInfo(`${signal} received, shutting down gracefully...`);
    scheduleForcedShutdown(config.server.shutdownGraceMs + FORCED_EXIT_MARGIN_MS);

    try {
      await gateway.shutdown();
      await destroyAgents();
      logInfo('Gateway stopped');
      process.exit(0);
    } catch (error: unknown) {
      logError('Shutdown failed', toError(error));
      process.exit(1);
    }
  };
}

function scheduleForcedShutdown(timeoutMs: number): void {
  setTimeout(() => {
    logError('Forced shutdown after timeout');
    process.exit(1);
  }, timeoutMs).unref();
}

export function registerSignalHandlers(
  shutdown: (signal: string) => Promise<void>,
  reload: () => Promise<void>
): void {
  process.on('SIGINT', () => {
    void shutdown('SIGINT');
  });
  process.on('SIGTERM', () => {
    void shutdown('SIGTERM');
  });
  process.on('SIGHUP', () => {
    logInfo('SIGHUP received, reloading configuration');
    reload().catch((error: unknown) => {
      logWarn('Reload on SIGHUP failed', { error: getErrorMessage(error) });
    });
  });
}
