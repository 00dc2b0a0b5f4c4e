import type { ErrorRequestHandler, RequestHandler } from 'express';
import { ZodError } from 'zod';
import { ApiError, RateLimitError, errorMessage } from './errors';
import type { Logger } from './logger';
import { AbortedError } from './timeout';

export type ErrorBody = { error: string; kind?: string; retryAfter?: number; issues?: string[] };

function clientErrorStatus(error: unknown): number | undefined {
  if (typeof error !== 'object' || error === null || !('status' in error)) return undefined;
  const { status } = error;
  return typeof status === 'number' && status >= 400 && status < 500 ? status : undefined;
}

/** Maps an error onto the status and body a client sees. Unknown errors become a bare 500. */
export function toHttpError(error: unknown): { status: number; body: ErrorBody } {
  if (error instanceof RateLimitError) {
    return { status: error.status, body: { error: error.category, kind: error.kind, retryAfter: error.retryAfterSeconds } };
  }
  if (error instanceof ApiError) {
    return { status: error.status, body: { error: error.category, kind: error.kind } };
  }
  if (error instanceof ZodError) {
    return {
      status: 400,
      body: { error: 'invalid_request', kind: 'Validation', issues: error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`) },
    };
  }
  // body-parser failures carry their own 4xx status
  const status = clientErrorStatus(error);
  if (status !== undefined) return { status, body: { error: 'invalid_request', kind: 'BadRequest' } };
  if (error instanceof AbortedError) {
    return { status: 503, body: { error: 'aborted' } };
  }
  return { status: 500, body: { error: 'internal_error' } };
}

export function errorHandler(logger: Logger): ErrorRequestHandler {
  return function errorMiddleware(err: unknown, req, res, next) {
    if (res.headersSent) return next(err);

    const { status, body } = toHttpError(err);
    const context = { method: req.method, path: req.path, status, err: errorMessage(err) };
    if (err instanceof AbortedError) logger.debug(context, 'client went away');
    else if (status >= 500) logger.error({ ...context, stack: err instanceof Error ? err.stack : undefined }, 'request failed');
    else logger.info(context, 'request rejected');

    if (err instanceof RateLimitError) res.setHeader('Retry-After', String(err.retryAfterSeconds));
    res.status(status).json(body);
  };
}

export const notFoundHandler: RequestHandler = (req, res) => {
  res.status(404).json({ error: 'not_found', kind: 'NoRoute' });
};
