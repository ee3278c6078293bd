/**
 * Token Service — Issues and Verifies Bearer Tokens
 * Layer: Application
 *
 * Tokens are compact HMAC-signed JWTs carrying exactly two claims:
 *
 *   sub — the username
 *   exp — absolute expiry, in seconds since the epoch
 *
 * Nothing is stored server-side. A token is accepted only when its signature
 * verifies under the configured secret and algorithm, it has not expired, and
 * its subject resolves to a user in the directory. The four ways a check can
 * fail are logged at debug level with their reason but always surface as the
 * same UnauthorizedError; callers cannot tell them apart.
 *
 * There is no revocation: a token stays valid until `exp`.
 */
import { TOKENS } from '@core/types';
import type { AuthConfig } from '@core/config';
import type { Logger } from '@core/logger';
import type { UserRecord } from '@domain/entities/User';
import type { IUserRepository } from '@domain/interfaces/IUserRepository';
import { DEFAULT_TOKEN_TTL_MINUTES } from '@shared/constants';
import { UnauthorizedError } from '@shared/errors/AppError';
import type { TokenRejectionReason } from '@shared/types';
import jwt, { JsonWebTokenError, type JwtPayload, TokenExpiredError } from 'jsonwebtoken';
import { inject, injectable } from 'tsyringe';

export interface AccessTokenClaims {
  sub: string;
  exp: number;
}

type TokenSettings = Pick<AuthConfig, 'secret' | 'algorithm'>;

@injectable()
export class TokenService {
  constructor(
    @inject(TOKENS.AuthConfig) private readonly settings: TokenSettings,
    @inject(TOKENS.UserRepository) private readonly users: IUserRepository,
    @inject(TOKENS.Logger) private readonly logger: Logger,
  ) {}

  /**
   * Signs `{ sub: username, exp: now + ttl }`. The login route passes the
   * configured TTL; other callers get the short default.
   */
  issueToken(username: string, ttlMinutes: number = DEFAULT_TOKEN_TTL_MINUTES): string {
    const claims: AccessTokenClaims = {
      sub: username,
      exp: Math.floor(Date.now() / 1000) + Math.round(ttlMinutes * 60),
    };
    return jwt.sign(claims, this.settings.secret, {
      algorithm: this.settings.algorithm,
      noTimestamp: true,
    });
  }

  /** Resolves a bearer token to its user, or throws UnauthorizedError. */
  verifyToken(token: string): UserRecord {
    const subject = this.decodeSubject(token);
    const user = this.users.findByUsername(subject);
    if (!user) throw this.reject('unknown_subject');
    return user;
  }

  private decodeSubject(token: string): string {
    let payload: string | JwtPayload;
    try {
      payload = jwt.verify(token, this.settings.secret, {
        algorithms: [this.settings.algorithm],
      });
    } catch (err) {
      if (err instanceof TokenExpiredError) throw this.reject('expired');
      if (err instanceof JsonWebTokenError) throw this.reject('invalid_signature');
      throw err;
    }

    if (typeof payload === 'string') throw this.reject('missing_subject');
    const subject: unknown = payload.sub;
    if (typeof subject !== 'string' || subject.length === 0) {
      throw this.reject('missing_subject');
    }
    return subject;
  }

  private reject(reason: TokenRejectionReason): UnauthorizedError {
    this.logger.debug({ reason }, 'Bearer token rejected');
    return new UnauthorizedError();
  }
}
