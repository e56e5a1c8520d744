import { type FastifyInstance } from 'fastify';
import { AppError, ErrorCode } from '@voltgate/shared';
import { ROLES, type EvOwnerRepository } from '@voltgate/domain';
import { NicParamsSchema } from '@voltgate/proto';
import { type Authorize } from '../plugins/auth';
import { type RequireOwnership } from '../plugins/ownership';
import { type RateLimit } from '../plugins/rate-limit';

interface EvOwnerRouteDeps {
  evOwnerRepo: EvOwnerRepository;
  rateLimit: RateLimit;
  authorize: Authorize;
  requireOwnership: RequireOwnership;
}

export function registerEvOwnerRoutes(app: FastifyInstance, deps: EvOwnerRouteDeps): void {
  const { evOwnerRepo, rateLimit, authorize, requireOwnership } = deps;

  app.get(
    '/ev-owners/:nic',
    {
      preHandler: [
        rateLimit('read'),
        authorize(ROLES),
        requireOwnership({ kind: 'nic', param: 'nic' }),
      ],
    },
    async (request, reply) => {
      const parsed = NicParamsSchema.safeParse(request.params);
      if (!parsed.success) {
        throw new AppError(ErrorCode.VALIDATION, 'Invalid NIC');
      }

      const profile = await evOwnerRepo.findByNic(parsed.data.nic);
      if (!profile) {
        throw new AppError(ErrorCode.NOT_FOUND, 'EV owner not found');
      }

      return reply.status(200).send({
        nic: profile.nic,
        userId: profile.userId,
        phone: profile.phone,
        createdAt: profile.createdAt.toISOString(),
      });
    },
  );
}
