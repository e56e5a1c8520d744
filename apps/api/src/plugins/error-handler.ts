import { type FastifyInstance } from 'fastify';
import { ErrorCode, createLogger, isAppError } from '@voltgate/shared';

const logger = createLogger({ name: 'api:error' });

export function registerErrorHandler(app: FastifyInstance): void {
  app.setErrorHandler((error, request, reply) => {
    if (isAppError(error)) {
      const meta = { code: error.code, requestId: request.id, ...error.safeMeta };
      if (error.isServerError) {
        logger.error(meta, error.message);
      } else {
        logger.warn(meta, error.message);
      }
      return reply.status(error.httpStatus).send(error.toJSON());
    }

    // Malformed JSON, oversized bodies and the like carry their own 4xx status.
    if (error.statusCode !== undefined && error.statusCode >= 400 && error.statusCode < 500) {
      logger.warn({ requestId: request.id, statusCode: error.statusCode }, error.message);
      return reply.status(error.statusCode).send({
        code: ErrorCode.BAD_REQUEST,
        message: error.message,
      });
    }

    logger.error({ err: error, requestId: request.id }, 'Unhandled error');

    return reply.status(500).send({
      code: ErrorCode.INTERNAL,
      message: 'Internal server error',
    });
  });
}
