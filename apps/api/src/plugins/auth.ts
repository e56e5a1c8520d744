import { type FastifyRequest } from 'fastify';
import { AppError, ErrorCode } from '@voltgate/shared';
import { hasAnyRole, type AccessTokenClaims, type Role, type TokenService } from '@voltgate/domain';

declare module 'fastify' {
  interface FastifyRequest {
    auth?: AccessTokenClaims;
  }
}

const BEARER_PREFIX = 'Bearer ';

export function readBearerToken(request: FastifyRequest): string | null {
  const header = request.headers.authorization;
  if (!header || !header.startsWith(BEARER_PREFIX)) return null;
  const token = header.slice(BEARER_PREFIX.length).trim();
  return token === '' ? null : token;
}

/** The caller attached by `authorize`. Throws when the route has no role gate. */
export function requireAuth(request: FastifyRequest): AccessTokenClaims {
  if (!request.auth) {
    throw new AppError(ErrorCode.UNAUTHORIZED, 'Invalid or missing bearer token');
  }
  return request.auth;
}

/**
 * Role gate. An empty role list admits any authenticated caller.
 */
export function createAuthorizer(tokenService: TokenService) {
  return function authorize(roles: readonly Role[] = []) {
    return async function roleGate(request: FastifyRequest): Promise<void> {
      const token = readBearerToken(request);
      if (!token) {
        throw new AppError(ErrorCode.UNAUTHORIZED, 'Invalid or missing bearer token');
      }

      let claims: AccessTokenClaims;
      try {
        claims = await tokenService.verifyAccessToken(token);
      } catch {
        throw new AppError(ErrorCode.UNAUTHORIZED, 'Invalid or missing bearer token');
      }

      if (!hasAnyRole(claims.role, roles)) {
        throw new AppError(ErrorCode.FORBIDDEN, 'You are not authorized to access this resource');
      }
      request.auth = claims;
    };
  };
}

export type Authorize = ReturnType<typeof createAuthorizer>;
