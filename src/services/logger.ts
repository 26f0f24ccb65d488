import { config } from '../config/index.js';
import type { LogLevel, LogMetadata } from '../config/types.js';

import { getRequestId } from './context.js';

const LEVEL_RANK: Readonly<Record<LogLevel, number>> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

let activeLevel: LogLevel = config.logging.level;

export function setLogLevel(level: LogLevel): void {
  activeLevel = level;
}

export function getLogLevel(): LogLevel {
  return activeLevel;
}

function withContext(meta?: LogMetadata): LogMetadata {
  const requestId = getRequestId();
  return requestId ? { requestId, ...meta } : { ...meta };
}

function createTimestamp(): string {
  return new Date().toISOString();
}

function formatTextEntry(
  level: LogLevel,
  message: string,
  meta: LogMetadata
): string {
  const suffix = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : '';
  return `[${createTimestamp()}] ${level.toUpperCase()}: ${message}${suffix}`;
}

function formatJsonEntry(
  level: LogLevel,
  message: string,
  meta: LogMetadata
): string {
  return JSON.stringify({ time: createTimestamp(), level, message, ...meta });
}

function shouldLog(level: LogLevel): boolean {
  return LEVEL_RANK[level] >= LEVEL_RANK[activeLevel];
}

function write(level: LogLevel, message: string, meta?: LogMetadata): void {
  if (!shouldLog(level)) return;
  const merged = withContext(meta);
  const line =
    config.logging.format === 'json'
      ? formatJsonEntry(level, message, merged)
      : formatTextEntry(level, message, merged);
  process.stderr.write(`${line}\n`);
}

export function logInfo(message: string, meta?: LogMetadata): void {
  write('info', message, meta);
}

export function logDebug(message: string, meta?: LogMetadata): void {
  write('debug', message, meta);
}

export function logWarn(message: string, meta?: LogMetadata): void {
  write('warn', message, meta);
}

export function logError(message: string, error?: Error | LogMetadata): void {
  const errorMeta: LogMetadata =
    error instanceof Error
      ? { error: error.message, stack: error.stack }
      : (error ?? {});
  write('error', message, errorMeta);
}
