import { z } from 'zod';

export const BaseConfigSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  LOG_LEVEL: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal']).default('info'),
});

export type BaseConfig = z.infer<typeof BaseConfigSchema>;

export const DatabaseConfigSchema = z.object({
  DATABASE_URL: z.string().min(1),
  DB_POOL_MAX: z.coerce.number().int().min(1).default(10),
  DB_QUERY_TIMEOUT_MS: z.coerce.number().int().min(100).default(5000),
  DB_CONNECT_TIMEOUT_MS: z.coerce.number().int().min(100).default(5000),
});

const JwtKeySchema = z.object({
  kid: z.string().min(1),
  secret: z.string().min(32, 'JWT secret must be at least 32 characters'),
});

const JwtKeysSchema = z
  .string()
  .transform((raw, ctx) => {
    try {
      const parsed: unknown = JSON.parse(raw);
      return parsed;
    } catch {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'JWT_KEYS must be valid JSON' });
      return z.NEVER;
    }
  })
  .pipe(z.array(JwtKeySchema).min(1, 'JWT_KEYS must contain at least one key'));

export const AuthConfigSchema = z
  .object({
    JWT_ACTIVE_KID: z.string().min(1),
    JWT_KEYS: JwtKeysSchema,
    JWT_ISSUER: z.string().default('voltgate'),
    JWT_AUDIENCE: z.string().default('voltgate-clients'),
    ACCESS_TOKEN_TTL_MINUTES: z.coerce.number().int().min(1).max(60).default(30),
    REFRESH_TOKEN_TTL_DAYS: z.coerce.number().int().min(1).default(7),
    MAX_ACTIVE_SESSIONS_PER_USER: z.coerce.number().int().min(1).default(5),
    REVOKED_TOKEN_RETENTION_DAYS: z.coerce.number().int().min(0).default(30),
  })
  // JWT_KEYS is not an array here when its own parse already failed.
  .refine((c) => Array.isArray(c.JWT_KEYS) && c.JWT_KEYS.some((k) => k.kid === c.JWT_ACTIVE_KID), {
    message: 'JWT_ACTIVE_KID must name one of JWT_KEYS',
    path: ['JWT_ACTIVE_KID'],
  });

export type AuthConfig = z.infer<typeof AuthConfigSchema>;

export const RateLimitConfigSchema = z.object({
  RATE_LIMIT_AUTH_PER_MINUTE: z.coerce.number().int().min(1).default(10),
  RATE_LIMIT_MUTATION_PER_MINUTE: z.coerce.number().int().min(1).default(30),
  RATE_LIMIT_READ_PER_MINUTE: z.coerce.number().int().min(1).default(100),
  RATE_LIMIT_RETENTION_MINUTES: z.coerce.number().int().min(1).default(5),
  RATE_LIMIT_SWEEP_THRESHOLD: z.coerce.number().int().min(1).default(10_000),
});

export const ApiConfigSchema = BaseConfigSchema.merge(DatabaseConfigSchema)
  .merge(RateLimitConfigSchema)
  .extend({
    API_HOST: z.string().default('0.0.0.0'),
    API_PORT: z.coerce.number().default(3000),
  })
  .and(AuthConfigSchema);

export type ApiConfig = z.infer<typeof ApiConfigSchema>;

export const WorkerConfigSchema = BaseConfigSchema.merge(DatabaseConfigSchema)
  .extend({
    // 24 days keeps the interval inside a Node timer's range.
    TOKEN_CLEANUP_INTERVAL_HOURS: z.coerce
      .number()
      .positive()
      .max(24 * 24, 'TOKEN_CLEANUP_INTERVAL_HOURS must be at most 576')
      .default(6),
  })
  .and(AuthConfigSchema);

export type WorkerConfig = z.infer<typeof WorkerConfigSchema>;

export function loadConfig<T extends z.ZodType>(
  schema: T,
  env: Record<string, string | undefined> = process.env,
): z.infer<T> {
  const result = schema.safeParse(env);
  if (!result.success) {
    const formatted = result.error.issues
      .map((issue) => `  ${issue.path.join('.')}: ${issue.message}`)
      .join('\n');
    throw new Error(`Config validation failed:\n${formatted}`);
  }
  return result.data;
}
