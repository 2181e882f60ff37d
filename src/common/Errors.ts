/**
 * Error types raised outside the request path.
 *
 * Request handling never throws for expected failures: validation and routing
 * problems come back as outcomes. These classes cover startup and transport.
 */

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Shape of the errors the body reader hands to express error middleware
 * (size limit exceeded, length mismatch, aborted upload).
 */
export interface ClientHttpError extends Error {
  status: number;
  expose: boolean;
}

export function isClientHttpError(err: unknown): err is ClientHttpError {
  if (!(err instanceof Error) || !('status' in err) || !('expose' in err)) {
    return false;
  }
  return typeof err.status === 'number' && err.status >= 400 && err.status < 500 && err.expose === true;
}
