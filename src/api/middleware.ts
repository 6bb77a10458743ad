/**
 * API middleware: error handling.
 */

import { Request, Response, NextFunction } from 'express';
import { apiError, TypedError, createTypedError, SyncError } from '../domain/errors';
import { logger } from '../logger';

/** Global error handling middleware. */
export function errorHandler(err: unknown, _req: Request, res: Response, _next: NextFunction) {
  if (err instanceof SyncError) {
    const status = getHttpStatus(err.typedError);
    logger.warn('Request error', { code: err.typedError.code, status });
    res.status(status).json(apiError(err.typedError));
    return;
  }

  const message = err instanceof Error ? err.message : 'Internal server error';
  logger.error('Unhandled request error', {
    message,
    stack: err instanceof Error ? err.stack : undefined,
  });

  const typedError = createTypedError({
    code: 'SYSTEM.INTERNAL',
    message,
    retryable: false,
  });

  res.status(500).json(apiError(typedError));
}

/** HTTP status for a typed error. */
export function getHttpStatus(error: TypedError): number {
  if (error.code.includes('NOT_FOUND')) return 404;
  if (error.code.startsWith('VALIDATION.')) return 400;
  if (error.code.startsWith('CONFIG.')) return 400;
  if (error.code.startsWith('RATE_LIMIT.')) return 429;
  if (error.code.startsWith('REMOTE.')) return 502;
  if (error.code === 'DECISION_SOURCE.UNAVAILABLE') return 503;
  if (error.code.startsWith('CAPACITY.')) return 507;
  if (error.code.startsWith('DECISION.')) return 422;
  return 500;
}
