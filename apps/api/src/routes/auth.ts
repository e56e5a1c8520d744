import { type FastifyInstance, type FastifyRequest } from 'fastify';
import { type z } from 'zod';
import { AppError, ErrorCode, createLogger } from '@voltgate/shared';
import {
  ROLES,
  authenticationFailure,
  tokenRefreshFailure,
  type AuthService,
  type AuthenticationOutcome,
  type ClientContext,
  type SessionSummary,
  type TokenRefreshOutcome,
} from '@voltgate/domain';
import {
  LoginRequestSchema,
  RefreshRequestSchema,
  LogoutRequestSchema,
  UserIdParamsSchema,
  SessionParamsSchema,
  type Session,
} from '@voltgate/proto';
import { requireAuth, type Authorize } from '../plugins/auth';
import { type RequireOwnership } from '../plugins/ownership';
import { resolveClientIp, type RateLimit } from '../plugins/rate-limit';

const logger = createLogger({ name: 'api:auth' });

interface AuthRouteDeps {
  authService: AuthService;
  rateLimit: RateLimit;
  authorize: Authorize;
  requireOwnership: RequireOwnership;
}

const LOGIN_STATUS: Record<Exclude<AuthenticationOutcome['status'], 'success'>, number> = {
  invalid_credentials: 401,
  user_not_found: 401,
  user_inactive: 403,
  ev_owner_deactivated: 403,
  failed: 500,
};

const REFRESH_STATUS: Record<Exclude<TokenRefreshOutcome['status'], 'success'>, number> = {
  invalid_refresh_token: 401,
  user_not_found: 401,
  user_inactive: 403,
  failed: 500,
};

function clientContext(request: FastifyRequest): ClientContext {
  return {
    userAgent: request.headers['user-agent'] ?? null,
    ipAddress: resolveClientIp(request),
  };
}

function parseInput<T extends z.ZodTypeAny>(schema: T, input: unknown, message: string): z.infer<T> {
  const parsed = schema.safeParse(input);
  if (!parsed.success) {
    throw new AppError(ErrorCode.VALIDATION, message, {
      issues: parsed.error.issues.map((i) => ({ path: i.path.join('.'), message: i.message })),
    });
  }
  return parsed.data;
}

function toSession(summary: SessionSummary): Session {
  return {
    tokenId: summary.tokenId,
    familyId: summary.familyId,
    deviceInfo: summary.deviceInfo,
    ipAddress: summary.ipAddress,
    createdAt: summary.createdAt.toISOString(),
    lastUsedAt: summary.lastUsedAt ? summary.lastUsedAt.toISOString() : null,
    expiresAt: summary.expiresAt.toISOString(),
  };
}

function logOperationError(request: FastifyRequest, operation: string, err: unknown): void {
  logger.error({ err, requestId: request.id, operation }, 'Authentication operation failed');
}

export function registerAuthRoutes(app: FastifyInstance, deps: AuthRouteDeps): void {
  const { authService, rateLimit, authorize, requireOwnership } = deps;

  app.post('/auth/login', { preHandler: [rateLimit('auth')] }, async (request, reply) => {
    const body = parseInput(LoginRequestSchema, request.body, 'Invalid login data');

    let outcome: AuthenticationOutcome;
    try {
      outcome = await authService.login(body.username, body.password, clientContext(request));
    } catch (err) {
      logOperationError(request, 'login', err);
      outcome = authenticationFailure('failed');
    }

    if (outcome.status === 'success') {
      return reply.status(200).send({
        accessToken: outcome.accessToken,
        refreshToken: outcome.refreshToken,
        user: outcome.user,
      });
    }

    // Unknown users and wrong passwords look the same from outside.
    const visible =
      outcome.status === 'user_not_found' ? authenticationFailure('invalid_credentials') : outcome;
    return reply.status(LOGIN_STATUS[outcome.status]).send(visible);
  });

  app.post('/auth/refresh', { preHandler: [rateLimit('auth')] }, async (request, reply) => {
    const body = parseInput(RefreshRequestSchema, request.body, 'Invalid refresh request');

    let outcome: TokenRefreshOutcome;
    try {
      outcome = await authService.refresh(body.tokenId, body.secret, clientContext(request));
    } catch (err) {
      logOperationError(request, 'refresh', err);
      outcome = tokenRefreshFailure('failed');
    }

    if (outcome.status === 'success') {
      return reply.status(200).send({
        accessToken: outcome.accessToken,
        refreshToken: outcome.refreshToken,
      });
    }
    return reply.status(REFRESH_STATUS[outcome.status]).send(outcome);
  });

  app.post('/auth/logout', { preHandler: [rateLimit('auth')] }, async (request, reply) => {
    const body = parseInput(LogoutRequestSchema, request.body, 'Invalid logout request');
    await authService.logout(body.tokenId, body.secret);
    return reply.status(204).send();
  });

  app.post(
    '/auth/logout-all',
    { preHandler: [rateLimit('mutation'), authorize()] },
    async (request, reply) => {
      const { userId } = requireAuth(request);
      const revoked = await authService.logoutAll(userId);
      logger.info({ userId, revoked }, 'Logged out of all sessions');
      return reply.status(204).send();
    },
  );

  app.get('/auth/me', { preHandler: [rateLimit('read'), authorize()] }, async (request, reply) => {
    const { userId } = requireAuth(request);
    const user = await authService.getUserInfo(userId);
    if (!user) {
      throw new AppError(ErrorCode.NOT_FOUND, 'User not found');
    }
    return reply.status(200).send(user);
  });

  app.get(
    '/auth/sessions/:userId',
    {
      preHandler: [
        rateLimit('read'),
        authorize(ROLES),
        requireOwnership({ kind: 'userId', param: 'userId' }),
      ],
    },
    async (request, reply) => {
      const { userId } = parseInput(UserIdParamsSchema, request.params, 'Invalid user id');
      const sessions = await authService.listSessions(userId);
      return reply.status(200).send({ sessions: sessions.map(toSession) });
    },
  );

  app.delete(
    '/auth/sessions/:userId/:tokenId',
    {
      preHandler: [
        rateLimit('mutation'),
        authorize(ROLES),
        requireOwnership({ kind: 'userId', param: 'userId' }),
      ],
    },
    async (request, reply) => {
      const { userId, tokenId } = parseInput(SessionParamsSchema, request.params, 'Invalid session');
      const revoked = await authService.revokeSession(userId, tokenId);
      if (!revoked) {
        throw new AppError(ErrorCode.NOT_FOUND, 'Session not found');
      }
      return reply.status(204).send();
    },
  );
}
