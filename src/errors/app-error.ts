export class AppError extends Error {
  readonly statusCode: number;
  readonly code: string;
  readonly details: Record<string, unknown>;

  constructor(
    message: string,
    statusCode = 500,
    code = 'INTERNAL_ERROR',
    details: Record<string, unknown> = {}
  ) {
    super(message);
    this.statusCode = statusCode;
    this.code = code;
    this.details = details;
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }
}

/** Client-side failure: unresolvable host, malformed target, failed backend. */
export class BadRequestError extends AppError {
  constructor(
    message: string,
    details?: Record<string, unknown>,
    statusCode = 400,
    code = 'BAD_REQUEST'
  ) {
    super(message, statusCode, code, details);
  }
}

export class UpstreamError extends BadRequestError {
  constructor(
    message: string,
    url: string,
    timedOut: boolean,
    details?: Record<string, unknown>
  ) {
    super(
      message,
      { url, ...details },
      timedOut ? 504 : 502,
      timedOut ? 'UPSTREAM_TIMEOUT' : 'UPSTREAM_FAILED'
    );
  }
}

export class PayloadTooLargeError extends BadRequestError {
  constructor(limit: number) {
    super('Request body too large', { limit }, 413, 'PAYLOAD_TOO_LARGE');
  }
}

export class MethodNotAllowedError extends BadRequestError {
  constructor(method: string) {
    super(`Method ${method} not allowed`, { method }, 405, 'METHOD_NOT_ALLOWED');
  }
}

export class RouteNotFoundError extends AppError {
  constructor(path: string) {
    super(`No route for ${path}`, 404, 'ROUTE_NOT_FOUND', { path });
  }
}

export class InternalError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 500, 'INTERNAL_ERROR', details);
  }
}

export class ConfigError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 500, 'CONFIG_ERROR', details);
  }
}
