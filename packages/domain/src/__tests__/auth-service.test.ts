import { describe, it, expect, beforeEach, vi } from 'vitest';
import { AuthService, AuthError, type AuthServiceDeps } from '../auth-service';
import { TX, runInTx, makeUser, createUserRepoMock } from './fixtures';

function createMockDeps(overrides: Partial<AuthServiceDeps<unknown>> = {}): AuthServiceDeps<unknown> {
  return {
    userRepo: createUserRepoMock(),
    passwordHasher: {
      hash: vi.fn(async (p: string) => `hashed:${p}`),
      verify: vi.fn(async (p: string, h: string) => h === `hashed:${p}`),
    },
    tokenService: {
      signAccessToken: vi.fn(async (userId: number) => `token-for-${userId}`),
      verifyAccessToken: vi.fn(async () => ({ userId: 1 })),
    },
    withTransaction: runInTx,
    ...overrides,
  };
}

describe('AuthService', () => {
  let deps: AuthServiceDeps<unknown>;
  let service: AuthService<unknown>;

  beforeEach(() => {
    deps = createMockDeps();
    service = new AuthService(deps);
  });

  describe('signup', () => {
    it('stores a hash and returns the user without it', async () => {
      const user = await service.signup({ username: 'alice', email: 'alice@x.com', password: 'secret1' });

      expect(user).toEqual({ id: 7, username: 'alice', email: 'alice@x.com' });
      expect(user).not.toHaveProperty('passwordHash');
      expect(deps.userRepo.create).toHaveBeenCalledWith(TX, {
        username: 'alice',
        email: 'alice@x.com',
        passwordHash: 'hashed:secret1',
      });
    });

    it('checks username and email together', async () => {
      await service.signup({ username: 'alice', email: 'alice@x.com', password: 'secret1' });
      expect(deps.userRepo.findByUsernameOrEmail).toHaveBeenCalledWith(TX, 'alice', 'alice@x.com');
    });

    it('rejects a taken username or email', async () => {
      vi.mocked(deps.userRepo.findByUsernameOrEmail).mockResolvedValueOnce(makeUser());

      await expect(
        service.signup({ username: 'alice', email: 'other@x.com', password: 'secret1' }),
      ).rejects.toMatchObject({ kind: 'CONFLICT', message: 'Username or Email already exists.' });
      expect(deps.userRepo.create).not.toHaveBeenCalled();
    });

    it('reports a conflict when the insert loses a race for the name', async () => {
      vi.mocked(deps.userRepo.create).mockResolvedValueOnce(null);

      await expect(
        service.signup({ username: 'alice', email: 'alice@x.com', password: 'secret1' }),
      ).rejects.toMatchObject({ kind: 'CONFLICT', message: 'Username or Email already exists.' });
    });

    it('hashes the password before opening the transaction', async () => {
      const calls: string[] = [];
      deps = createMockDeps({
        passwordHasher: {
          hash: vi.fn(async (p: string) => {
            calls.push('hash');
            return `hashed:${p}`;
          }),
          verify: vi.fn(async () => true),
        },
        withTransaction: async <T>(fn: (tx: unknown) => Promise<T>): Promise<T> => {
          calls.push('begin');
          const result = await fn(TX);
          calls.push('commit');
          return result;
        },
      });

      await new AuthService(deps).signup({ username: 'alice', email: 'alice@x.com', password: 'secret1' });

      expect(calls).toEqual(['hash', 'begin', 'commit']);
    });
  });

  describe('login', () => {
    it('returns a token for valid credentials', async () => {
      vi.mocked(deps.userRepo.findByUsername).mockResolvedValueOnce(makeUser());

      const result = await service.login({ username: 'alice', password: 'secret1' });

      expect(result.accessToken).toBe('token-for-1');
      expect(result.user).toEqual({ id: 1, username: 'alice', email: 'alice@x.com' });
      expect(deps.tokenService.signAccessToken).toHaveBeenCalledWith(1);
    });

    it('rejects unknown user', async () => {
      await expect(
        service.login({ username: 'nobody', password: 'secret1' }),
      ).rejects.toMatchObject({ kind: 'UNAUTHORIZED' });
    });

    it('rejects wrong password', async () => {
      vi.mocked(deps.userRepo.findByUsername).mockResolvedValueOnce(makeUser());

      await expect(
        service.login({ username: 'alice', password: 'wrong-password' }),
      ).rejects.toMatchObject({ kind: 'UNAUTHORIZED', message: 'Incorrect username or password' });
      expect(deps.tokenService.signAccessToken).not.toHaveBeenCalled();
    });

    it('verifies the password after the lookup transaction has closed', async () => {
      const calls: string[] = [];
      deps = createMockDeps({
        passwordHasher: {
          hash: vi.fn(async (p: string) => `hashed:${p}`),
          verify: vi.fn(async (p: string, h: string) => {
            calls.push('verify');
            return h === `hashed:${p}`;
          }),
        },
        withTransaction: async <T>(fn: (tx: unknown) => Promise<T>): Promise<T> => {
          calls.push('begin');
          const result = await fn(TX);
          calls.push('commit');
          return result;
        },
      });
      vi.mocked(deps.userRepo.findByUsername).mockResolvedValueOnce(makeUser());

      await new AuthService(deps).login({ username: 'alice', password: 'secret1' });

      expect(calls).toEqual(['begin', 'commit', 'verify']);
    });
  });

  describe('authenticate', () => {
    it('resolves the user named by the token', async () => {
      vi.mocked(deps.userRepo.findById).mockResolvedValueOnce(makeUser());

      const user = await service.authenticate('good-token');

      expect(user.id).toBe(1);
      expect(deps.tokenService.verifyAccessToken).toHaveBeenCalledWith('good-token');
      expect(deps.userRepo.findById).toHaveBeenCalledWith(TX, 1);
    });

    it('rejects an invalid token', async () => {
      vi.mocked(deps.tokenService.verifyAccessToken).mockRejectedValueOnce(new Error('signature verification failed'));

      await expect(service.authenticate('bad-token')).rejects.toThrow(AuthError);
      expect(deps.userRepo.findById).not.toHaveBeenCalled();
    });

    it('rejects a token whose user no longer exists', async () => {
      await expect(service.authenticate('orphan-token')).rejects.toMatchObject({
        kind: 'UNAUTHORIZED',
        message: 'Could not validate credentials',
      });
    });
  });
});
