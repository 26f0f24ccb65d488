import express, {
  type Express,
  type Request,
  type RequestHandler,
  type Response,
} from 'express';

import { errorHandler } from '../middleware/error-handler.js';

import type { AppContext } from '../services/app-context.js';
import { type Dispatch, dispatchRequest } from '../services/dispatcher.js';
import { handleForwardProxy } from '../services/forward-proxy.js';
import { sendRedirect } from '../services/redirect.js';
import { handleReverseProxy } from '../services/reverse-proxy.js';
import { handleScript } from '../services/script-handler.js';
import { serveStatic } from '../services/static-files.js';

import { attachBaseMiddleware } from './server-middleware.js';

function applyHeaders(
  res: Response,
  headers: Readonly<Record<string, string>>
): void {
  for (const [name, value] of Object.entries(headers)) {
    res.setHeader(name, value);
  }
}

async function respond(
  context: AppContext,
  dispatch: Dispatch,
  req: Request,
  res: Response
): Promise<void> {
  switch (dispatch.route.behavior.kind) {
    case 'static':
      await serveStatic(context, dispatch, req, res);
      return;
    case 'reverse-proxy':
      await handleReverseProxy(context, dispatch, req, res);
      return;
    case 'forward-proxy':
      await handleForwardProxy(context, dispatch, req, res);
      return;
    case 'redirect':
      sendRedirect(dispatch.route, res);
      return;
    case 'script':
      await handleScript(context, dispatch, req, res);
      return;
  }
}

function createGatewayHandler(context: AppContext): RequestHandler {
  return async (req: Request, res: Response): Promise<void> => {
    const dispatch = dispatchRequest(context.hosts.snapshot(), {
      scheme: req.protocol === 'https' ? 'https' : 'http',
      host: req.headers.host,
      path: req.path,
    });

    applyHeaders(res, dispatch.host.headers);
    applyHeaders(res, dispatch.route.headers);
    await respond(context, dispatch, req, res);
  };
}

export function createGatewayApp(context: AppContext): Express {
  const app = express();
  app.disable('x-powered-by');
  app.disable('etag');

  attachBaseMiddleware(app);
  app.use(createGatewayHandler(context));
  app.use(errorHandler);
  return app;
}
