/**
 * Unit Tests — AuthService
 *
 * The directory, the hasher and the token service are all mocked, so these
 * tests pin down the orchestration: which lookups happen, which failures
 * collapse into InvalidCredentialsError, and what login hands back.
 */
import { AuthService } from '@application/services/AuthService';
import type { TokenService } from '@application/services/TokenService';
import { InvalidCredentialsError } from '@shared/errors/AppError';

import { sampleUser } from '../helpers/fixtures';
import {
  createMockPasswordHasher,
  createMockUserRepository,
  createSilentLogger,
  MockPasswordHasher,
  MockUserRepository,
} from '../helpers/mocks';

describe('AuthService', () => {
  let service: AuthService;
  let repo: MockUserRepository;
  let hasher: MockPasswordHasher;
  let tokens: jest.Mocked<TokenService>;

  beforeEach(() => {
    repo = createMockUserRepository();
    repo.findByUsername.mockImplementation((username) =>
      username === sampleUser.username ? sampleUser : null,
    );
    hasher = createMockPasswordHasher();
    tokens = {
      issueToken: jest.fn().mockReturnValue('signed-token'),
      verifyToken: jest.fn(),
    } as unknown as jest.Mocked<TokenService>;

    service = new AuthService(repo, hasher, tokens, { accessTokenTtlMinutes: 30 }, createSilentLogger());
  });

  describe('authenticate()', () => {
    it('should return the record when the password matches', async () => {
      hasher.verify.mockResolvedValue(true);

      await expect(service.authenticate('testuser', 'testpassword')).resolves.toEqual(sampleUser);
      expect(hasher.verify).toHaveBeenCalledWith('testpassword', sampleUser.passwordHash);
    });

    it('should throw InvalidCredentialsError when the password does not match', async () => {
      hasher.verify.mockResolvedValue(false);

      await expect(service.authenticate('testuser', 'wrongpassword')).rejects.toThrow(
        InvalidCredentialsError,
      );
    });

    it('should throw InvalidCredentialsError for an unknown username without hashing', async () => {
      await expect(service.authenticate('nobody', 'testpassword')).rejects.toThrow(
        InvalidCredentialsError,
      );
      expect(hasher.verify).not.toHaveBeenCalled();
    });
  });

  describe('login()', () => {
    it('should issue a token with the configured TTL', async () => {
      hasher.verify.mockResolvedValue(true);

      const result = await service.login('testuser', 'testpassword');

      expect(tokens.issueToken).toHaveBeenCalledWith('testuser', 30);
      expect(result).toEqual({ access_token: 'signed-token', token_type: 'bearer' });
    });

    it('should not issue a token when authentication fails', async () => {
      hasher.verify.mockResolvedValue(false);

      await expect(service.login('testuser', 'nope')).rejects.toThrow(InvalidCredentialsError);
      expect(tokens.issueToken).not.toHaveBeenCalled();
    });
  });
});
