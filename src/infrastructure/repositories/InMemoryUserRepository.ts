/**
 * In-Memory User Directory
 * Layer: Infrastructure
 *
 * Built once from the seed list at boot: every plaintext password is hashed
 * with the injected hasher, then the map is frozen. Lookups after that are
 * plain reads, so concurrent requests need no coordination.
 */
import type { UserRecord, UserSeed } from '@domain/entities/User';
import type { IPasswordHasher } from '@domain/interfaces/IPasswordHasher';
import type { IUserRepository } from '@domain/interfaces/IUserRepository';

export class InMemoryUserRepository implements IUserRepository {
  private readonly users: ReadonlyMap<string, UserRecord>;

  constructor(records: Iterable<UserRecord>) {
    const users = new Map<string, UserRecord>();
    for (const record of records) {
      if (users.has(record.username)) {
        throw new Error(`Duplicate username in user directory: ${record.username}`);
      }
      users.set(record.username, Object.freeze({ ...record }));
    }
    this.users = users;
  }

  static fromSeeds(seeds: readonly UserSeed[], hasher: IPasswordHasher): InMemoryUserRepository {
    return new InMemoryUserRepository(
      seeds.map((seed) => ({
        username: seed.username,
        email: seed.email ?? null,
        passwordHash: hasher.hashSync(seed.password),
      })),
    );
  }

  findByUsername(username: string): UserRecord | null {
    return this.users.get(username) ?? null;
  }
}
