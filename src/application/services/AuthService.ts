/**
 * Auth Service — Password Login
 * Layer: Application
 *
 * Checks a username/password pair against the directory and, on success,
 * asks TokenService for a bearer token at the configured login TTL.
 *
 * An unknown username and a wrong password raise the same
 * InvalidCredentialsError so the response never reveals which one it was.
 */
import { TOKENS } from '@core/types';
import type { AuthConfig } from '@core/config';
import type { Logger } from '@core/logger';
import type { UserRecord } from '@domain/entities/User';
import type { IPasswordHasher } from '@domain/interfaces/IPasswordHasher';
import type { IUserRepository } from '@domain/interfaces/IUserRepository';
import { TOKEN_TYPE } from '@shared/constants';
import { InvalidCredentialsError } from '@shared/errors/AppError';
import type { TokenResponse } from '@shared/types';
import { inject, injectable } from 'tsyringe';

import { TokenService } from './TokenService';

@injectable()
export class AuthService {
  constructor(
    @inject(TOKENS.UserRepository) private readonly users: IUserRepository,
    @inject(TOKENS.PasswordHasher) private readonly hasher: IPasswordHasher,
    @inject(TOKENS.TokenService) private readonly tokens: TokenService,
    @inject(TOKENS.AuthConfig) private readonly settings: Pick<AuthConfig, 'accessTokenTtlMinutes'>,
    @inject(TOKENS.Logger) private readonly logger: Logger,
  ) {}

  async authenticate(username: string, password: string): Promise<UserRecord> {
    const user = this.users.findByUsername(username);
    if (!user) throw new InvalidCredentialsError();

    const matches = await this.hasher.verify(password, user.passwordHash);
    if (!matches) throw new InvalidCredentialsError();

    return user;
  }

  async login(username: string, password: string): Promise<TokenResponse> {
    const user = await this.authenticate(username, password);
    const accessToken = this.tokens.issueToken(user.username, this.settings.accessTokenTtlMinutes);

    this.logger.info({ username: user.username }, 'User logged in');
    return { access_token: accessToken, token_type: TOKEN_TYPE };
  }
}
