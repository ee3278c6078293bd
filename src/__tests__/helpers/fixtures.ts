/**
 * Test Fixtures — Reusable Sample Data
 * Layer: Test Helpers
 *
 * Credentials match the seeded directory (SEED_USERS); the secrets are
 * placeholders that only make sense inside this suite.
 */
import type { UserRecord } from '@domain/entities/User';

export const TEST_SECRET = 'test-secret';
export const OTHER_SECRET = 'some-other-secret';

export const validCredentials = { username: 'testuser', password: 'testpassword' };

/** A record whose hash is never checked; for tests that stub the hasher. */
export const sampleUser: UserRecord = {
  username: 'testuser',
  email: 'test@example.com',
  passwordHash: '$2a$04$placeholderplaceholderplaceholderplaceholderplacehold',
};

export const secondUser: UserRecord = {
  username: 'ops',
  email: null,
  passwordHash: '$2a$04$anotherplaceholderanotherplaceholderanotherplaceholde',
};
