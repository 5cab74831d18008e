/**
 * Error types shared by services and the API error handler.
 */

export type ExternalSource = 'candles' | 'session' | 'store';

export class HttpError extends Error {
  readonly statusCode: number;

  constructor(statusCode: number, message: string) {
    super(message);
    this.name = 'HttpError';
    this.statusCode = statusCode;
  }
}

/** A call to the broker API or the signal store failed. Not retried. */
export class ExternalCallError extends HttpError {
  readonly source: ExternalSource;

  constructor(source: ExternalSource, message: string, options?: { cause?: unknown }) {
    super(502, message);
    this.name = 'ExternalCallError';
    this.source = source;
    if (options?.cause !== undefined) this.cause = options.cause;
  }
}

export class UnauthorizedError extends HttpError {
  constructor(message = 'Not logged in') {
    super(401, message);
    this.name = 'UnauthorizedError';
  }
}

export function asError(e: unknown): Error {
  return e instanceof Error ? e : new Error(typeof e === 'string' ? e : JSON.stringify(e));
}

export function errMsg(e: unknown): string {
  return asError(e).message;
}
