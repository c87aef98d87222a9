/**
 * Global Error Handler Middleware
 * Layer: Interfaces (HTTP)
 *
 * The last piece of the middleware chain. Express 5 forwards rejected
 * promises from async handlers here, so controllers never need try/catch.
 *
 *   - AppError (operational): logged at "warn", answered with its own status
 *     code and message. SqlExecutionError also returns the SQL that failed so
 *     the caller can see what the database rejected.
 *   - Malformed JSON bodies (body-parser SyntaxError): 400.
 *   - Anything else is a bug: logged at "error", answered with a generic 500
 *     that leaks no internals.
 *
 * Express recognises an error handler by its four parameters.
 */
import type { NextFunction, Request, Response } from 'express';

import { logger } from '@core/logger';
import { AppError, SqlExecutionError } from '@shared/errors/AppError';

export function errorHandler(err: Error, _req: Request, res: Response, _next: NextFunction): void {
  if (err instanceof AppError) {
    logger.warn({ statusCode: err.statusCode, message: err.message }, 'Operational error');
    res.status(err.statusCode).json({
      status: 'error',
      message: err.message,
      ...(err instanceof SqlExecutionError && { sql: err.sql }),
    });
    return;
  }

  if (err instanceof SyntaxError && 'body' in err) {
    logger.warn({ message: err.message }, 'Malformed JSON body');
    res.status(400).json({ status: 'error', message: 'Malformed JSON body' });
    return;
  }

  logger.error({ err }, 'Unhandled error');
  res.status(500).json({
    status: 'error',
    message: 'Internal server error',
  });
}
