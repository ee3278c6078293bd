/**
 * Password hashing contract. Implementations must salt every hash and compare
 * in constant time; a raw string comparison is never acceptable.
 */
export interface IPasswordHasher {
  hash(password: string): Promise<string>;

  /** Synchronous variant, used only while seeding the directory at boot. */
  hashSync(password: string): string;

  verify(password: string, passwordHash: string): Promise<boolean>;
}
