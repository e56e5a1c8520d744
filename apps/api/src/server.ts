import Fastify, { type FastifyInstance } from 'fastify';
import { createLogger, type RateLimiter } from '@voltgate/shared';
import { type AuthService, type EvOwnerRepository, type TokenService } from '@voltgate/domain';
import { registerErrorHandler } from './plugins/error-handler';
import { createAuthorizer } from './plugins/auth';
import { createOwnershipGuard } from './plugins/ownership';
import { createRateLimitGuard, type RateLimits } from './plugins/rate-limit';
import { registerAuthRoutes } from './routes/auth';
import { registerEvOwnerRoutes } from './routes/ev-owners';

const logger = createLogger({ name: 'api' });

export interface ServerConfig {
  rateLimits: RateLimits;
}

export interface ServerDeps {
  authService: AuthService;
  tokenService: TokenService;
  evOwnerRepo: EvOwnerRepository;
  rateLimiter: RateLimiter;
}

/**
 * Every route declares its gates as an ordered preHandler list:
 * rate limit, then role, then ownership.
 */
export function buildServer(config: ServerConfig, deps: ServerDeps): FastifyInstance {
  const app = Fastify({
    logger: false,
    bodyLimit: 65_536,
  });

  registerErrorHandler(app);

  const rateLimit = createRateLimitGuard({
    rateLimiter: deps.rateLimiter,
    tokenService: deps.tokenService,
    limits: config.rateLimits,
  });
  const authorize = createAuthorizer(deps.tokenService);
  const requireOwnership = createOwnershipGuard(deps.evOwnerRepo);

  app.addHook('onRequest', (request, _reply, done) => {
    logger.info(
      { method: request.method, url: request.url, requestId: request.id },
      'Incoming request',
    );
    done();
  });

  app.addHook('onResponse', (request, reply, done) => {
    logger.info(
      { method: request.method, url: request.url, statusCode: reply.statusCode, requestId: request.id },
      'Request completed',
    );
    done();
  });

  app.get('/health', async () => {
    return { status: 'ok', timestamp: new Date().toISOString() };
  });

  registerAuthRoutes(app, {
    authService: deps.authService,
    rateLimit,
    authorize,
    requireOwnership,
  });
  registerEvOwnerRoutes(app, {
    evOwnerRepo: deps.evOwnerRepo,
    rateLimit,
    authorize,
    requireOwnership,
  });

  return app;
}
