/**
 * Request Body Validation Middleware Factory
 * Layer: Interfaces (HTTP)
 *
 * `validateBody(schema)` returns a middleware that checks `req.body` against a
 * Zod schema before the controller runs:
 *
 *   router.post('/auth/login', validateBody(loginSchema), controller.login);
 *
 * On success `req.body` is replaced with the parsed value, so the controller
 * sees trimmed, typed data. On failure a ValidationError (400) goes to the
 * global error handler and the controller is never reached.
 *
 * Only the body is handled: in Express 5 `req.query` is a read-only getter,
 * and this service has no query or path parameters to check.
 */
import { ValidationError } from '@shared/errors/AppError';
import type { NextFunction, Request, Response } from 'express';
import type { z } from 'zod/v4';

export function validateBody<T extends z.ZodType>(schema: T) {
  return (req: Request, _res: Response, next: NextFunction): void => {
    const result = schema.safeParse(req.body ?? {});

    if (!result.success) {
      const messages = result.error.issues
        .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
        .join('; ');
      throw new ValidationError(messages);
    }

    req.body = result.data;
    next();
  };
}
