import { STATUS_CODES } from 'node:http';

import type { NextFunction, Request, Response } from 'express';

import type { ErrorResponse } from '../config/types.js';

import { AppError } from '../errors/app-error.js';

import { logError, logWarn } from '../services/logger.js';

function describeRequest(req: Request): string {
  return `${req.method} ${req.headers.host ?? ''}${req.path}`;
}

/**
 * Maps errors to a status and a body naming only the status. Details stay
 * in the log.
 */
export function errorHandler(
  err: Error,
  req: Request,
  res: Response,
  _next: NextFunction
): void {
  const isAppError = err instanceof AppError;
  const statusCode = isAppError ? err.statusCode : 500;
  const code = isAppError ? err.code : 'INTERNAL_ERROR';

  if (statusCode >= 500) {
    logError(`HTTP ${statusCode}: ${err.message} - ${describeRequest(req)}`, err);
  } else {
    logWarn(`HTTP ${statusCode}: ${err.message} - ${describeRequest(req)}`, {
      code,
      ...(isAppError && err.details),
    });
  }

  if (res.headersSent) {
    res.destroy();
    return;
  }

  const response: ErrorResponse = {
    error: {
      code,
      statusCode,
      message: STATUS_CODES[statusCode] ?? 'Error',
    },
  };
  res.status(statusCode).json(response);
}
