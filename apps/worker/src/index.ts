import { randomUUID } from 'node:crypto';
import {
  loadConfig,
  WorkerConfigSchema,
  createLogger,
  JoseTokenService,
  Argon2PasswordHasher,
  TokenCleanupWorker,
} from '@voltgate/shared';
import { AuthService, RefreshTokenLedger } from '@voltgate/domain';
import {
  initPool,
  closePool,
  PgUserRepository,
  PgEvOwnerRepository,
  PgRefreshTokenRepository,
} from '@voltgate/db';

const logger = createLogger({ name: 'worker' });

const HOUR_MS = 60 * 60 * 1000;

async function main() {
  const config = loadConfig(WorkerConfigSchema);

  const pool = initPool({
    connectionString: config.DATABASE_URL,
    max: config.DB_POOL_MAX,
    queryTimeoutMs: config.DB_QUERY_TIMEOUT_MS,
    connectTimeoutMs: config.DB_CONNECT_TIMEOUT_MS,
  });

  const tokenService = new JoseTokenService({
    activeKid: config.JWT_ACTIVE_KID,
    keys: config.JWT_KEYS,
    accessTokenTtlMinutes: config.ACCESS_TOKEN_TTL_MINUTES,
    issuer: config.JWT_ISSUER,
    audience: config.JWT_AUDIENCE,
  });
  const now = () => new Date();

  const authService = new AuthService({
    userRepo: new PgUserRepository(pool),
    evOwnerRepo: new PgEvOwnerRepository(pool),
    passwordHasher: new Argon2PasswordHasher(),
    tokenService,
    ledger: new RefreshTokenLedger({
      refreshTokenRepo: new PgRefreshTokenRepository(pool),
      tokenService,
      generateId: randomUUID,
      now,
      refreshTokenTtlDays: config.REFRESH_TOKEN_TTL_DAYS,
      maxActiveSessionsPerUser: config.MAX_ACTIVE_SESSIONS_PER_USER,
    }),
    now,
    revokedTokenRetentionDays: config.REVOKED_TOKEN_RETENTION_DAYS,
  });

  const cleanupWorker = new TokenCleanupWorker({
    cleanup: () => authService.cleanupExpiredTokens(),
    intervalMs: config.TOKEN_CLEANUP_INTERVAL_HOURS * HOUR_MS,
    logger: createLogger({ name: 'token-cleanup' }),
  });

  cleanupWorker.start();
  await cleanupWorker.runOnce();

  logger.info({}, 'Worker started');

  const shutdown = async () => {
    logger.info({}, 'Shutting down worker');
    await cleanupWorker.stop();
    await closePool();
    process.exit(0);
  };

  process.on('SIGTERM', () => void shutdown());
  process.on('SIGINT', () => void shutdown());
}

main().catch((err) => {
  logger.fatal({ err }, 'Failed to start worker');
  process.exit(1);
});
