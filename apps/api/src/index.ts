import { randomUUID } from 'node:crypto';
import {
  loadConfig,
  ApiConfigSchema,
  createLogger,
  JoseTokenService,
  Argon2PasswordHasher,
  FixedWindowRateLimiter,
} from '@voltgate/shared';
import { AuthService, RefreshTokenLedger } from '@voltgate/domain';
import {
  initPool,
  closePool,
  PgUserRepository,
  PgEvOwnerRepository,
  PgRefreshTokenRepository,
} from '@voltgate/db';
import { buildServer } from './server';

const logger = createLogger({ name: 'api' });

async function main() {
  const config = loadConfig(ApiConfigSchema);

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
  const evOwnerRepo = new PgEvOwnerRepository(pool);
  const now = () => new Date();

  const ledger = new RefreshTokenLedger({
    refreshTokenRepo: new PgRefreshTokenRepository(pool),
    tokenService,
    generateId: randomUUID,
    now,
    refreshTokenTtlDays: config.REFRESH_TOKEN_TTL_DAYS,
    maxActiveSessionsPerUser: config.MAX_ACTIVE_SESSIONS_PER_USER,
  });

  const authService = new AuthService({
    userRepo: new PgUserRepository(pool),
    evOwnerRepo,
    passwordHasher: new Argon2PasswordHasher(),
    tokenService,
    ledger,
    now,
    revokedTokenRetentionDays: config.REVOKED_TOKEN_RETENTION_DAYS,
  });

  const rateLimitLogger = logger.child({ component: 'rate-limiter' });
  const rateLimiter = new FixedWindowRateLimiter({
    retentionMs: config.RATE_LIMIT_RETENTION_MINUTES * 60_000,
    sweepThreshold: config.RATE_LIMIT_SWEEP_THRESHOLD,
    onSweep: (removed) => {
      rateLimitLogger.debug({ removed }, 'Rate limiter sweep finished');
    },
    onSweepError: (err) => {
      rateLimitLogger.error({ err }, 'Rate limiter sweep failed');
    },
  });

  const app = buildServer(
    {
      rateLimits: {
        auth: config.RATE_LIMIT_AUTH_PER_MINUTE,
        mutation: config.RATE_LIMIT_MUTATION_PER_MINUTE,
        read: config.RATE_LIMIT_READ_PER_MINUTE,
      },
    },
    { authService, tokenService, evOwnerRepo, rateLimiter },
  );

  await app.listen({ host: config.API_HOST, port: config.API_PORT });
  logger.info({ port: config.API_PORT }, 'API server started');

  const shutdown = async () => {
    logger.info({}, 'Shutting down API server');
    await app.close();
    await closePool();
    process.exit(0);
  };

  process.on('SIGTERM', () => void shutdown());
  process.on('SIGINT', () => void shutdown());
}

main().catch((err) => {
  logger.fatal({ err }, 'Failed to start API');
  process.exit(1);
});
