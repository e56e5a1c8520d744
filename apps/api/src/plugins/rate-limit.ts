import { type FastifyRequest, type FastifyReply } from 'fastify';
import { z } from 'zod';
import { AppError, ErrorCode, createLogger, type LimiterClass, type RateLimiter } from '@voltgate/shared';
import { type TokenService } from '@voltgate/domain';
import { readBearerToken } from './auth';

const logger = createLogger({ name: 'api:rate-limit' });

export type RateLimits = Record<LimiterClass, number>;

const IpAddressSchema = z.string().ip();

/** First entry of a forwarding header, if it is an IP address at all. */
function firstHeaderValue(value: string | string[] | undefined): string | undefined {
  const raw = Array.isArray(value) ? value[0] : value;
  if (!raw) return undefined;
  const first = IpAddressSchema.safeParse(raw.split(',')[0]?.trim());
  return first.success ? first.data : undefined;
}

export function resolveClientIp(request: FastifyRequest): string {
  return (
    firstHeaderValue(request.headers['x-forwarded-for']) ??
    firstHeaderValue(request.headers['x-real-ip']) ??
    (request.socket.remoteAddress || undefined) ??
    'unknown'
  );
}

/**
 * `user:<id>` when the bearer token carries a valid signature, even if it has
 * expired; otherwise `ip:<address>`.
 */
export async function resolveClientId(
  request: FastifyRequest,
  tokenService: TokenService,
): Promise<string> {
  const token = readBearerToken(request);
  if (token) {
    const claims = await tokenService.identifyAccessToken(token);
    if (claims) return `user:${claims.userId}`;
  }
  return `ip:${resolveClientIp(request)}`;
}

export function createRateLimitGuard(deps: {
  rateLimiter: RateLimiter;
  tokenService: TokenService;
  limits: RateLimits;
}) {
  return function rateLimit(limiterClass: LimiterClass) {
    const limit = deps.limits[limiterClass];

    return async function rateLimitGate(request: FastifyRequest, reply: FastifyReply): Promise<void> {
      const clientId = await resolveClientId(request, deps.tokenService);
      const decision = deps.rateLimiter.check(clientId, limiterClass, limit);

      reply.header('X-RateLimit-Limit', String(decision.limit));
      reply.header('X-RateLimit-Remaining', String(decision.remaining));
      reply.header('X-RateLimit-Reset', decision.resetAt.toISOString());

      if (!decision.allowed) {
        reply.header('Retry-After', String(decision.retryAfterSeconds));
        logger.warn({ requestId: request.id, type: limiterClass, limit }, 'Rate limit exceeded');
        throw new AppError(ErrorCode.RATE_LIMITED, 'Rate limit exceeded', {
          limit,
          type: limiterClass,
        });
      }
    };
  };
}

export type RateLimit = ReturnType<typeof createRateLimitGuard>;
