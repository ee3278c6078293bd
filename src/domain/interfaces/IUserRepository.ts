/**
 * User Repository Interface — The Directory Contract
 * Layer: Domain
 * Pattern: Repository Pattern
 *
 * The service only ever reads the directory: there is no registration or
 * deletion endpoint, so the contract is lookup-only. The in-memory
 * implementation is seeded at startup and never mutated afterwards.
 */
import type { UserRecord } from '@domain/entities/User';

export interface IUserRepository {
  /** Exact, case-sensitive lookup. Returns null when the username is unknown. */
  findByUsername(username: string): UserRecord | null;
}
