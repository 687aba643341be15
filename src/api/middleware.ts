/**
 * API Middleware: request logging and error handling.
 */

import { Request, Response, NextFunction } from 'express';
import { ErrorKind, apiError, createTypedError, isRegistryError } from '../domain/errors';
import { logger } from '../logger';

const log = logger.child({ component: 'http' });

const HTTP_STATUS: Record<ErrorKind, number> = {
  NotFound: 404,
  Conflict: 409,
  IntegrityError: 422,
  InvalidState: 409,
  TransientStorageError: 503,
  Validation: 400,
  // Client closed the request; the status is only seen in logs.
  Aborted: 499,
};

export function httpStatusFor(kind: ErrorKind): number {
  return HTTP_STATUS[kind];
}

/** One debug line per completed request. */
export function requestLogger() {
  return (req: Request, res: Response, next: NextFunction) => {
    const started = Date.now();
    res.on('finish', () => {
      log.debug('Request completed', {
        method: req.method,
        path: req.originalUrl,
        status: res.statusCode,
        durationMs: Date.now() - started,
      });
    });
    next();
  };
}

/** Global error handling middleware. */
export function errorHandler(err: unknown, req: Request, res: Response, _next: NextFunction) {
  if (isRegistryError(err)) {
    const status = httpStatusFor(err.kind);
    if (status >= 500) {
      log.error('Request failed', { code: err.typedError.code, status, path: req.originalUrl, error: err.message });
    } else {
      log.warn('Request error', { code: err.typedError.code, status, path: req.originalUrl });
    }
    if (res.headersSent) {
      res.destroy(err);
      return;
    }
    if (err.kind === 'TransientStorageError') res.setHeader('retry-after', '1');
    res.status(status).json(apiError(err.typedError));
    return;
  }

  // Malformed JSON bodies from express.json()
  if (err instanceof SyntaxError && 'body' in err) {
    res.status(400).json(
      apiError(createTypedError({ code: 'VALIDATION.SCHEMA', message: 'Malformed JSON body', retryable: false })),
    );
    return;
  }

  const message = err instanceof Error ? err.message : 'Internal server error';
  log.error('Unhandled request error', {
    message,
    stack: err instanceof Error ? err.stack : undefined,
  });

  if (res.headersSent) {
    res.destroy();
    return;
  }
  res.status(500).json(
    apiError(createTypedError({ code: 'SYSTEM.INTERNAL', message, retryable: false })),
  );
}
