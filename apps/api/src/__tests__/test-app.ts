import { type FastifyInstance } from 'fastify';
import { AuthService, RefreshTokenLedger, type Role } from '@voltgate/domain';
import {
  InMemoryRefreshTokenRepository,
  InMemoryUserRepository,
  InMemoryEvOwnerRepository,
  createFakePasswordHasher,
  makeUser,
  makeEvOwner,
  createClock,
} from '../../../../packages/domain/src/__tests__/in-memory-stores';
import { FixedWindowRateLimiter, JoseTokenService } from '@voltgate/shared';
import { buildServer } from '../server';
import { type RateLimits } from '../plugins/rate-limit';

export const TEST_NOW = '2026-03-01T00:00:20.000Z';

export interface TestApp {
  app: FastifyInstance;
  tokenService: JoseTokenService;
  userRepo: InMemoryUserRepository;
  evOwnerRepo: InMemoryEvOwnerRepository;
  refreshTokenRepo: InMemoryRefreshTokenRepository;
  rateLimiter: FixedWindowRateLimiter;
  bearer(userId: string, role: Role): Promise<string>;
}

export function createTokenService(): JoseTokenService {
  return new JoseTokenService({
    activeKid: 'test-key',
    keys: [{ kid: 'test-key', secret: 'test-secret-test-secret-test-secret' }],
    accessTokenTtlMinutes: 30,
  });
}

/**
 * Alice (user-1) and Bob (user-2) are EV owners with linked profiles, Root
 * (admin-1) is an admin. Every password is `test-password`.
 */
export function createTestApp(limits: Partial<RateLimits> = {}): TestApp {
  const clock = createClock(TEST_NOW);
  let idCounter = 0;

  const userRepo = new InMemoryUserRepository();
  userRepo.users.set('user-1', makeUser({ passwordHash: 'hashed:test-password' }));
  userRepo.users.set(
    'user-2',
    makeUser({
      id: 'user-2',
      username: 'bob',
      email: 'bob@example.com',
      passwordHash: 'hashed:test-password',
    }),
  );
  userRepo.users.set(
    'admin-1',
    makeUser({
      id: 'admin-1',
      username: 'root',
      email: 'root@example.com',
      passwordHash: 'hashed:test-password',
      role: 'Admin',
    }),
  );

  const evOwnerRepo = new InMemoryEvOwnerRepository();
  evOwnerRepo.profiles.set('199012345678', makeEvOwner());
  evOwnerRepo.profiles.set('200098765432', makeEvOwner({ nic: '200098765432', userId: 'user-2' }));

  const refreshTokenRepo = new InMemoryRefreshTokenRepository();
  const tokenService = createTokenService();

  const ledger = new RefreshTokenLedger({
    refreshTokenRepo,
    tokenService,
    generateId: () => `id-${++idCounter}`,
    now: clock.now,
    refreshTokenTtlDays: 7,
    maxActiveSessionsPerUser: 5,
  });

  const authService = new AuthService({
    userRepo,
    evOwnerRepo,
    passwordHasher: createFakePasswordHasher(),
    tokenService,
    ledger,
    now: clock.now,
    revokedTokenRetentionDays: 30,
  });

  const rateLimiter = new FixedWindowRateLimiter({ now: () => clock.now().getTime() });

  const app = buildServer(
    { rateLimits: { auth: 10, mutation: 30, read: 100, ...limits } },
    { authService, tokenService, evOwnerRepo, rateLimiter },
  );

  return {
    app,
    tokenService,
    userRepo,
    evOwnerRepo,
    refreshTokenRepo,
    rateLimiter,
    bearer: async (userId, role) =>
      `Bearer ${await tokenService.signAccessToken({ userId, role })}`,
  };
}
