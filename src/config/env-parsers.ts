import type { LogFormat, LogLevel } from './types.js';

const ALLOWED_LOG_LEVELS: ReadonlySet<string> = new Set([
  'debug',
  'info',
  'warn',
  'error',
]);

export function isLogLevel(value: string): value is LogLevel {
  return ALLOWED_LOG_LEVELS.has(value);
}

function isBelowMin(value: number, min: number | undefined): boolean {
  if (min === undefined) return false;
  return value < min;
}

function isAboveMax(value: number, max: number | undefined): boolean {
  if (max === undefined) return false;
  return value > max;
}

export function parseInteger(
  envValue: string | undefined,
  defaultValue: number,
  min?: number,
  max?: number
): number {
  if (!envValue) return defaultValue;
  const parsed = parseInt(envValue, 10);
  if (Number.isNaN(parsed)) return defaultValue;
  if (isBelowMin(parsed, min)) return defaultValue;
  if (isAboveMax(parsed, max)) return defaultValue;
  return parsed;
}

export function parseLogLevel(envValue: string | undefined): LogLevel {
  const level = envValue?.toLowerCase();
  if (!level) return 'info';
  return isLogLevel(level) ? level : 'info';
}

export function parseLogFormat(envValue: string | undefined): LogFormat {
  return envValue?.toLowerCase() === 'json' ? 'json' : 'text';
}
