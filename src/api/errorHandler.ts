import type { Request, Response, NextFunction } from 'express';
import { PayloadError, StoreError, isAppError } from '../domain/errors.js';
import { logger, redactSecrets } from '../infra/logger.js';
import type { Env } from '../infra/env.js';

const RETRY_AFTER_SECONDS = '5';

/**
 * Map a body-parser failure (it tags errors with `type` and a 4xx `status`) to a PayloadError.
 * Anything else yields null.
 */
export function toPayloadError(err: unknown): PayloadError | null {
  if (!(err instanceof Error) || !('type' in err) || !('status' in err)) return null;
  const { type, status } = err;
  if (typeof type !== 'string' || typeof status !== 'number' || status < 400 || status >= 500) {
    return null;
  }

  switch (type) {
    case 'entity.parse.failed':
      return new PayloadError('Invalid JSON in request body', 'INVALID_JSON', 400);
    case 'entity.too.large':
      return new PayloadError('Request body exceeds the size limit', 'PAYLOAD_TOO_LARGE', 413);
    default:
      return new PayloadError(`Request body could not be read: ${err.message}`, 'UNREADABLE_BODY', status);
  }
}

/**
 * Global error handler middleware
 * Maps domain errors to HTTP status codes, redacts secrets, logs with context
 */
export function createErrorHandler(env: Pick<Env, 'NODE_ENV'>) {
  return (caught: Error, req: Request, res: Response, _next: NextFunction): void => {
    const err = toPayloadError(caught) ?? caught;
    const context = {
      method: req.method,
      path: req.path,
      ip: req.ip,
      userAgent: req.get('user-agent'),
    };

    if (isAppError(err)) {
      // Client-correctable errors are expected traffic, not operational faults
      const level = err.statusCode >= 500 ? 'error' : 'warn';
      logger.log(level, 'Application error', {
        code: err.code,
        message: err.message,
        details: err.details,
        stack: env.NODE_ENV === 'development' && err.statusCode >= 500 ? err.stack : undefined,
        ...context,
      });

      if (err instanceof StoreError && err.retryable) {
        res.setHeader('Retry-After', RETRY_AFTER_SECONDS);
      }

      res.status(err.statusCode).json({
        error: err.code,
        message: err.message,
        ...(err.details !== undefined ? { details: redactSecrets(err.details) } : {}),
      });
    } else {
      logger.error('Unexpected error', {
        message: err.message,
        name: err.name,
        stack: err.stack,
        ...context,
      });

      res.status(500).json({
        error: 'INTERNAL_SERVER_ERROR',
        message: env.NODE_ENV === 'development' ? err.message : 'An unexpected error occurred',
      });
    }
  };
}

/**
 * 404 Not Found handler
 */
export function notFoundHandler(_req: Request, res: Response): void {
  res.status(404).json({
    error: 'NOT_FOUND',
    message: 'The requested resource was not found',
  });
}
