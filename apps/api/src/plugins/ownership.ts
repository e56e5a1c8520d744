import { type FastifyRequest } from 'fastify';
import { AppError, ErrorCode, createLogger } from '@voltgate/shared';
import { checkOwnership, type EvOwnerRepository, type OwnershipRule } from '@voltgate/domain';
import { requireAuth } from './auth';

const logger = createLogger({ name: 'api:ownership' });

function readField(source: unknown, name: string): string | undefined {
  if (typeof source !== 'object' || source === null) return undefined;
  const value: unknown = Reflect.get(source, name);
  if (typeof value === 'string') return value;
  if (typeof value === 'number') return String(value);
  return undefined;
}

/** Path params win over body fields of the same name. */
export function readOwnershipValue(request: FastifyRequest, name: string): string | undefined {
  return readField(request.params, name) ?? readField(request.body, name);
}

/**
 * Ownership gate. Must run after the role gate, which attaches the caller.
 */
export function createOwnershipGuard(evOwnerRepo: EvOwnerRepository) {
  return function requireOwnership(rule: OwnershipRule) {
    return async function ownershipGate(request: FastifyRequest): Promise<void> {
      const caller = requireAuth(request);
      const value = readOwnershipValue(request, rule.param);

      let decision: Awaited<ReturnType<typeof checkOwnership>>;
      try {
        decision = await checkOwnership(evOwnerRepo, caller, rule, value);
      } catch (err) {
        logger.error({ err, requestId: request.id, rule: rule.kind }, 'Ownership lookup failed');
        throw new AppError(ErrorCode.INTERNAL, 'Error validating account ownership');
      }

      if (decision === 'forbidden') {
        throw new AppError(ErrorCode.FORBIDDEN, 'You can only access your own account');
      }
    };
  };
}

export type RequireOwnership = ReturnType<typeof createOwnershipGuard>;
