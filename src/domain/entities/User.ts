/**
 * User Entity
 * Layer: Domain
 *
 * Two shapes for the same identity:
 *
 *   UserRecord  — what the directory stores, including the bcrypt hash.
 *   PublicUser  — what handlers are allowed to echo back to a client.
 *
 * The hash never leaves the application layer; `toPublicUser()` is the only
 * place a record is narrowed for output.
 */
export interface UserRecord {
  readonly username: string;
  readonly email: string | null;
  readonly passwordHash: string;
}

export interface PublicUser {
  username: string;
  email: string | null;
}

/** Plaintext seed entry; hashed once when the directory is built. */
export interface UserSeed {
  username: string;
  email?: string;
  password: string;
}

export function toPublicUser(user: UserRecord): PublicUser {
  return { username: user.username, email: user.email };
}
