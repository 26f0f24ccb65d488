import type { Request, Response } from 'express';

import { InternalError } from '../errors/app-error.js';

import type { AppContext } from './app-context.js';
import type { Dispatch } from './dispatcher.js';

export async function handleScript(
  context: AppContext,
  dispatch: Dispatch,
  req: Request,
  res: Response
): Promise<void> {
  const { route, capture } = dispatch;
  if (route.behavior.kind !== 'script') {
    throw new InternalError('Script handler invoked on a non-script route', {
      location: route.location,
    });
  }

  const engine = context.scriptEngine;
  if (!engine) {
    throw new InternalError('No script engine registered', {
      script: route.behavior.path,
    });
  }

  await engine.handle({
    route,
    scriptPath: route.behavior.path,
    capture,
    request: req,
    response: res,
  });
}
