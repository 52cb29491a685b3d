/**
 * API Middleware — request logging and error handling.
 */

import { Request, Response, NextFunction } from 'express';
import { OrchestratorError, TypedError, apiError, createTypedError, describeError } from '../domain/errors';
import { logger } from '../logger';

const log = logger.child({ module: 'http' });

/** Map a typed error to an HTTP status. */
export function getHttpStatus(error: TypedError): number {
  if (error.code.includes('NOT_FOUND')) return 404;
  if (error.code === 'RUN.ALREADY_RUNNING') return 409;
  if (error.code.startsWith('VALIDATION.')) return 422;
  if (error.code.startsWith('INVALID_COMBINATION.')) return 422;
  return 500;
}

/** Send a typed error with its mapped status. */
export function sendError(res: Response, error: TypedError): void {
  res.status(getHttpStatus(error)).json(apiError(error));
}

/** Send whatever a route caught: typed errors keep their code, anything else is SYSTEM.INTERNAL. */
export function sendCaught(res: Response, err: unknown, fallbackMessage: string): void {
  if (err instanceof OrchestratorError) {
    sendError(res, err.typedError);
    return;
  }
  log.error('Unhandled route error', { error: describeError(err) });
  sendError(
    res,
    createTypedError({
      code: 'SYSTEM.INTERNAL',
      message: err instanceof Error ? err.message : fallbackMessage,
    }),
  );
}

/** Log one line per completed request. */
export function requestLogger(req: Request, res: Response, next: NextFunction): void {
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
}

/** Global error handling middleware. Also catches malformed JSON bodies. */
export function errorHandler(err: unknown, _req: Request, res: Response, _next: NextFunction): void {
  if (err instanceof OrchestratorError) {
    log.warn('Request error', { code: err.typedError.code });
    sendError(res, err.typedError);
    return;
  }

  if (err instanceof SyntaxError) {
    sendError(res, createTypedError({ code: 'VALIDATION.MALFORMED_BODY', message: err.message }));
    return;
  }

  log.error('Unhandled request error', {
    message: describeError(err),
    stack: err instanceof Error ? err.stack : undefined,
  });
  sendError(
    res,
    createTypedError({
      code: 'SYSTEM.INTERNAL',
      message: err instanceof Error ? err.message : 'Internal server error',
    }),
  );
}
