import type { Request, Response } from 'express';

import type { RouteConfig } from '../config/types.js';

export interface ScriptInvocation {
  readonly route: RouteConfig;
  readonly scriptPath: string;
  /** Wildcard capture after the route location, if any. */
  readonly capture: string | undefined;
  readonly request: Request;
  readonly response: Response;
}

/**
 * Runs user-supplied route scripts. The gateway ships no engine; embedders
 * register one on the application context.
 */
export interface ScriptEngine {
  readonly name: string;
  handle(invocation: ScriptInvocation): Promise<void>;
}
