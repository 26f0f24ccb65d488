import type { Response } from 'express';

import type { RouteConfig } from '../config/types.js';

import { InternalError } from '../errors/app-error.js';

export function sendRedirect(route: RouteConfig, res: Response): void {
  if (route.behavior.kind !== 'redirect') {
    throw new InternalError('Route has no redirect target', {
      location: route.location,
    });
  }
  res.status(route.behavior.code);
  res.setHeader('Location', route.behavior.to);
  res.end();
}
