import { type FastifyInstance } from 'fastify';
import { AppError, ErrorCode, createLogger } from '@soiree/shared';
import { isUniqueViolation } from '@soiree/db';

const logger = createLogger({ name: 'api:error' });

export function registerErrorHandler(app: FastifyInstance): void {
  app.setErrorHandler((error, request, reply) => {
    if (error instanceof AppError) {
      logger.warn(
        { code: error.code, requestId: request.id, ...error.safeMeta },
        error.message,
      );
      if (error.code === ErrorCode.UNAUTHORIZED) {
        reply.header('WWW-Authenticate', 'Bearer');
      }
      return reply.status(error.httpStatus).send(error.toJSON());
    }

    // a concurrent insert lost the race against a unique index
    if (isUniqueViolation(error)) {
      logger.warn({ requestId: request.id }, 'Unique constraint violated');
      return reply.status(409).send({
        code: ErrorCode.CONFLICT,
        message: 'Resource already exists',
      });
    }

    // body parsing and content-type errors raised by Fastify itself
    if (error.statusCode !== undefined && error.statusCode >= 400 && error.statusCode < 500) {
      logger.warn({ requestId: request.id, statusCode: error.statusCode }, error.message);
      return reply.status(error.statusCode).send({
        code: ErrorCode.BAD_REQUEST,
        message: error.message,
      });
    }

    logger.error({ err: error.message, requestId: request.id }, 'Unhandled error');

    return reply.status(500).send({
      code: ErrorCode.INTERNAL,
      message: 'Internal server error',
    });
  });
}
