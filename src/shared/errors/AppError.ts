/**
 * Custom Error Hierarchy
 * Layer: Shared
 *
 * Two kinds of failure reach the global error handler:
 *
 *   1. Operational errors — expected outcomes such as a wrong password, a
 *      missing bearer header or a deliberately injected 404. They carry their
 *      own status code, message and (optionally) response headers.
 *
 *   2. Programmer errors — anything else. The handler answers those with a
 *      generic 500 and logs the stack.
 *
 * `Object.setPrototypeOf(this, new.target.prototype)` keeps `instanceof`
 * working for subclasses regardless of the compilation target.
 */
export class AppError extends Error {
  public readonly statusCode: number;
  public readonly isOperational: boolean;
  public readonly headers: Readonly<Record<string, string>>;

  constructor(
    message: string,
    statusCode = 500,
    isOperational = true,
    headers: Record<string, string> = {},
  ) {
    super(message);
    this.statusCode = statusCode;
    this.isOperational = isOperational;
    this.headers = headers;
    Object.setPrototypeOf(this, new.target.prototype);
    Error.captureStackTrace(this, this.constructor);
  }
}

export class NotFoundError extends AppError {
  constructor(resource: string, identifier: string) {
    super(`${resource} not found: ${identifier}`, 404);
  }
}

export class ValidationError extends AppError {
  constructor(message: string) {
    super(message, 400);
  }
}

/** Bearer challenge; every token-verification failure collapses into this one. */
export class UnauthorizedError extends AppError {
  constructor(message = 'Could not validate credentials') {
    super(message, 401, true, { 'WWW-Authenticate': 'Bearer' });
  }
}

export class InvalidCredentialsError extends UnauthorizedError {
  constructor() {
    super('Incorrect username or password');
  }
}

/** Raised by the credential-extraction stage, before any token is looked at. */
export class ForbiddenError extends AppError {
  constructor(message = 'Not authenticated') {
    super(message, 403);
  }
}
