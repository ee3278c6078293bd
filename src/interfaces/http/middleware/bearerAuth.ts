/**
 * Bearer Authentication Guard
 * Layer: Interfaces (HTTP)
 *
 * Two stages, applied in order to every protected route:
 *
 *   1. extractBearerToken — reads the `Authorization` header. A missing
 *      header, a non-Bearer scheme or empty credentials end the request with
 *      403 before any token is looked at.
 *   2. verifyBearerToken  — hands the token to TokenService. Any failure
 *      (bad signature, expired, no subject, unknown subject) is a 401 with a
 *      `WWW-Authenticate: Bearer` challenge.
 *
 * Clients and the platform tests assert on the exact code, so the two stages
 * stay separate.
 *
 *   router.get('/auth/protected', ...requireAuth, controller.protectedResource);
 */
import type { TokenService } from '@application/services/TokenService';
import { container } from '@core/container';
import { TOKENS } from '@core/types';
import { toPublicUser } from '@domain/entities/User';
import { ForbiddenError } from '@shared/errors/AppError';
import type { NextFunction, Request, RequestHandler, Response } from 'express';

export function extractBearerToken(req: Request, _res: Response, next: NextFunction): void {
  const header = req.get('authorization');
  if (!header) {
    throw new ForbiddenError('Not authenticated');
  }

  const separator = header.indexOf(' ');
  const scheme = separator === -1 ? header : header.slice(0, separator);
  const credentials = separator === -1 ? '' : header.slice(separator + 1).trim();

  if (!scheme || !credentials) {
    throw new ForbiddenError('Not authenticated');
  }
  if (scheme.toLowerCase() !== 'bearer') {
    throw new ForbiddenError('Invalid authentication credentials');
  }

  req.bearerToken = credentials;
  next();
}

export function createTokenVerifier(tokens: TokenService): RequestHandler {
  return (req: Request, _res: Response, next: NextFunction): void => {
    if (req.bearerToken === undefined) {
      throw new ForbiddenError('Not authenticated');
    }
    req.user = toPublicUser(tokens.verifyToken(req.bearerToken));
    next();
  };
}

export function requireAuth(): RequestHandler[] {
  const tokens = container.resolve<TokenService>(TOKENS.TokenService);
  return [extractBearerToken, createTokenVerifier(tokens)];
}
