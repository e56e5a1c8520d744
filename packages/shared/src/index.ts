export { createLogger, sanitize, type SafeLogger } from './logger';
export { AppError, ErrorCode, isAppError, type AppErrorBody } from './errors';
export {
  loadConfig,
  type BaseConfig,
  type AuthConfig,
  type ApiConfig,
  type WorkerConfig,
  BaseConfigSchema,
  DatabaseConfigSchema,
  AuthConfigSchema,
  RateLimitConfigSchema,
  ApiConfigSchema,
  WorkerConfigSchema,
} from './config';
export { Argon2PasswordHasher, LOCKED_PASSWORD_HASH } from './auth/password-hasher';
export { JoseTokenService, type TokenServiceConfig } from './auth/token-service';
export {
  FixedWindowRateLimiter,
  type RateLimiter,
  type RateLimitDecision,
  type LimiterClass,
  type FixedWindowRateLimiterOptions,
} from './rate-limiter';
export {
  TokenCleanupWorker,
  type TokenCleanupWorkerOptions,
  type TokenCleanupWorkerState,
  MAX_CLEANUP_INTERVAL_MS,
} from './token-cleanup-worker';
