/**
 * bcrypt Password Hasher
 * Layer: Infrastructure
 *
 * Wraps bcryptjs so the rest of the app depends on IPasswordHasher only. Each
 * hash gets a fresh random salt at the configured cost; `verify` goes through
 * bcrypt's own comparator, which runs in constant time for a given hash.
 */
import { TOKENS } from '@core/types';
import type { AuthConfig } from '@core/config';
import type { IPasswordHasher } from '@domain/interfaces/IPasswordHasher';
import bcrypt from 'bcryptjs';
import { inject, injectable } from 'tsyringe';

@injectable()
export class BcryptPasswordHasher implements IPasswordHasher {
  private readonly rounds: number;

  constructor(@inject(TOKENS.AuthConfig) authConfig: Pick<AuthConfig, 'bcryptRounds'>) {
    this.rounds = authConfig.bcryptRounds;
  }

  async hash(password: string): Promise<string> {
    const salt = await bcrypt.genSalt(this.rounds);
    return bcrypt.hash(password, salt);
  }

  hashSync(password: string): string {
    return bcrypt.hashSync(password, bcrypt.genSaltSync(this.rounds));
  }

  verify(password: string, passwordHash: string): Promise<boolean> {
    return bcrypt.compare(password, passwordHash);
  }
}
