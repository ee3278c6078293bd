/**
 * Global Error Handler Middleware
 * Layer: Interfaces (HTTP)
 *
 * Last in the chain. Express 5 forwards rejected promises from async handlers
 * here, so routes never wrap their bodies in try/catch.
 *
 *   - AppError (operational): logged at "warn", answered with its own status,
 *     message and headers (the bearer challenge, for instance).
 *   - AppError (non-operational) or anything else: logged at "error" with the
 *     stack, answered with a generic 500.
 *   - Errors raised by Express's own body parser carry a 4xx `status`; those
 *     are passed through with their status and a short message.
 *
 * Express recognises an error handler by its four parameters.
 */
import { logger } from '@core/logger';
import { AppError } from '@shared/errors/AppError';
import type { ErrorResponse } from '@shared/types';
import type { NextFunction, Request, Response } from 'express';

function clientErrorStatus(err: Error): number | null {
  const status: unknown = 'status' in err ? err.status : undefined;
  return typeof status === 'number' && status >= 400 && status < 500 ? status : null;
}

function send(res: Response, statusCode: number, message: string): void {
  const body: ErrorResponse = { status: 'error', message };
  res.status(statusCode).json(body);
}

export function errorHandler(err: Error, _req: Request, res: Response, next: NextFunction): void {
  if (res.headersSent) {
    next(err);
    return;
  }

  if (err instanceof AppError && err.isOperational) {
    logger.warn({ statusCode: err.statusCode, message: err.message }, 'Operational error');
    res.set(err.headers);
    send(res, err.statusCode, err.message);
    return;
  }

  const parserStatus = clientErrorStatus(err);
  if (parserStatus !== null) {
    logger.warn({ statusCode: parserStatus, message: err.message }, 'Rejected request');
    send(res, parserStatus, parserStatus === 400 ? 'Malformed request body' : err.message);
    return;
  }

  logger.error({ err }, 'Unhandled error');
  send(res, 500, 'Internal server error');
}
