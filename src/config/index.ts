import { createRequire } from 'node:module';
import path from 'node:path';

import {
  parseInteger,
  parseLogFormat,
  parseLogLevel,
} from './env-parsers.js';

const require = createRequire(import.meta.url);

function readPackageVersion(): string {
  const packageJson: unknown = require('../../package.json');
  if (
    typeof packageJson === 'object' &&
    packageJson !== null &&
    'version' in packageJson &&
    typeof packageJson.version === 'string'
  ) {
    return packageJson.version;
  }
  return '0.0.0';
}

const MIB = 1024 * 1024;

export const config = {
  server: {
    name: 'portico',
    version: readPackageVersion(),
    configPath: path.resolve(process.env.PORTICO_CONFIG ?? 'config.yaml'),
    shutdownGraceMs: parseInteger(
      process.env.SHUTDOWN_GRACE_MS,
      30_000,
      0,
      10 * 60_000
    ),
  },
  proxy: {
    maxBodySize: parseInteger(process.env.MAX_BODY_SIZE, 10 * MIB, 1, 1024 * MIB),
    maxRedirects: 10,
  },
  reload: {
    debounceMs: parseInteger(process.env.RELOAD_DEBOUNCE_MS, 500, 0, 60_000),
    rewatchDelayMs: parseInteger(
      process.env.RELOAD_REWATCH_DELAY_MS,
      800,
      0,
      60_000
    ),
    maxRetries: parseInteger(process.env.RELOAD_MAX_RETRIES, 5, 1, 100),
    retryDelayMs: parseInteger(
      process.env.RELOAD_RETRY_DELAY_MS,
      100,
      0,
      60_000
    ),
  },
  logging: {
    level: parseLogLevel(process.env.LOG_LEVEL),
    format: parseLogFormat(process.env.LOG_FORMAT),
  },
};
