import { randomUUID } from 'node:crypto';
import { performance } from 'node:perf_hooks';

import type { Express, NextFunction, Request, Response } from 'express';

import { config } from '../config/index.js';

import { runWithRequestContext } from '../services/context.js';
import { logInfo, logWarn } from '../services/logger.js';

export const VERSION_HEADER = 'Portico-Version';

export function createContextMiddleware(): (
  req: Request,
  res: Response,
  next: NextFunction
) => void {
  return (_req: Request, _res: Response, next: NextFunction): void => {
    runWithRequestContext({ requestId: randomUUID() }, () => {
      next();
    });
  };
}

/** Server identity and version headers on every response. */
export function createIdentityMiddleware(): (
  req: Request,
  res: Response,
  next: NextFunction
) => void {
  return (_req: Request, res: Response, next: NextFunction): void => {
    res.setHeader('Server', config.server.name);
    res.setHeader(VERSION_HEADER, config.server.version);
    next();
  };
}

export function createAccessLogMiddleware(): (
  req: Request,
  res: Response,
  next: NextFunction
) => void {
  return (req: Request, res: Response, next: NextFunction): void => {
    const startedAt = performance.now();
    const describe = (): Record<string, unknown> => ({
      method: req.method,
      host: req.headers.host,
      path: req.path,
      status: res.statusCode,
      durationMs: Math.round(performance.now() - startedAt),
    });

    res.once('finish', () => {
      logInfo('Request completed', describe());
    });
    res.once('close', () => {
      if (!res.writableFinished) logWarn('Request aborted', describe());
    });
    next();
  };
}

export function attachBaseMiddleware(app: Express): void {
  app.use(createContextMiddleware());
  app.use(createIdentityMiddleware());
  app.use(createAccessLogMiddleware());
}
