import { type FastifyInstance } from 'fastify';
import { AppError, ErrorCode } from '@soiree/shared';
import { AuthError, type AuthService } from '@soiree/domain';
import { SignupRequestSchema, LoginRequestSchema, type TokenResponse } from '@soiree/proto';
import { type createAuthMiddleware, requireUser } from '../plugins/auth';
import { type RateLimiter } from '../plugins/rate-limit';
import { parseRequest } from '../validation';
import { serializeUser } from '../serializers';

interface AuthRouteDeps<Tx> {
  authService: AuthService<Tx>;
  authenticate: ReturnType<typeof createAuthMiddleware>;
  authRateLimit: RateLimiter;
}

function mapAuthError(err: unknown): never {
  if (err instanceof AuthError) {
    const codeMap: Record<AuthError['kind'], ErrorCode> = {
      UNAUTHORIZED: ErrorCode.UNAUTHORIZED,
      // taken username or email is a client error on this API, not a 409
      CONFLICT: ErrorCode.BAD_REQUEST,
    };
    throw new AppError(codeMap[err.kind], err.message);
  }
  throw err;
}

export function registerAuthRoutes<Tx>(app: FastifyInstance, deps: AuthRouteDeps<Tx>): void {
  const { authService, authenticate, authRateLimit } = deps;

  app.post('/auth/signup', { preHandler: [authRateLimit.check] }, async (request, reply) => {
    const input = parseRequest(SignupRequestSchema, request.body, 'Invalid signup data');

    try {
      const user = await authService.signup(input);
      return reply.status(200).send(serializeUser(user));
    } catch (err) {
      return mapAuthError(err);
    }
  });

  // OAuth2 password flow: form-encoded by default, JSON also accepted
  app.post('/auth/login', { preHandler: [authRateLimit.check] }, async (request, reply) => {
    const input = parseRequest(LoginRequestSchema, request.body, 'Invalid login data');

    try {
      const { accessToken } = await authService.login(input);
      const body: TokenResponse = { access_token: accessToken, token_type: 'bearer' };
      return reply.status(200).send(body);
    } catch (err) {
      return mapAuthError(err);
    }
  });

  app.get('/auth/me', { preHandler: [authenticate] }, async (request, reply) => {
    const user = requireUser(request);
    return reply.status(200).send(serializeUser(user));
  });
}
