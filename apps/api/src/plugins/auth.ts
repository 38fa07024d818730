import { type FastifyRequest } from 'fastify';
import { AppError, ErrorCode } from '@soiree/shared';
import { AuthError, type AuthService, type User } from '@soiree/domain';

declare module 'fastify' {
  interface FastifyRequest {
    user?: User;
  }
}

const BEARER_PREFIX = 'bearer ';

export function createAuthMiddleware<Tx>(authService: AuthService<Tx>) {
  return async function authenticate(request: FastifyRequest) {
    const header = request.headers.authorization;
    if (!header || !header.toLowerCase().startsWith(BEARER_PREFIX)) {
      throw new AppError(ErrorCode.UNAUTHORIZED, 'Not authenticated');
    }

    const token = header.slice(BEARER_PREFIX.length).trim();
    try {
      request.user = await authService.authenticate(token);
    } catch (err) {
      if (err instanceof AuthError) {
        throw new AppError(ErrorCode.UNAUTHORIZED, err.message);
      }
      throw err;
    }
  };
}

/** The caller set by the authenticate preHandler. */
export function requireUser(request: FastifyRequest): User {
  if (!request.user) {
    throw new AppError(ErrorCode.UNAUTHORIZED, 'Not authenticated');
  }
  return request.user;
}
