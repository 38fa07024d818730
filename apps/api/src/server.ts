import Fastify from 'fastify';
import cors from '@fastify/cors';
import formbody from '@fastify/formbody';
import {
  createLogger,
  JoseTokenService,
  Argon2PasswordHasher,
  DEFAULT_PASSWORD_HASHING,
  type PasswordHashingOptions,
} from '@soiree/shared';
import {
  AuthService,
  EventService,
  GuestService,
  RsvpService,
  type WithTransaction,
  type UserRepository,
  type EventRepository,
  type GuestRepository,
  type RsvpRepository,
  type PasswordHasher,
} from '@soiree/domain';
import { type HealthResponse } from '@soiree/proto';
import { registerErrorHandler } from './plugins/error-handler';
import { createAuthMiddleware } from './plugins/auth';
import { createRateLimiter } from './plugins/rate-limit';
import { registerAuthRoutes } from './routes/auth';
import { registerEventRoutes } from './routes/events';
import { registerGuestRoutes } from './routes/guests';
import { registerRsvpRoutes } from './routes/rsvps';

const logger = createLogger({ name: 'api' });

export interface ServerConfig {
  jwtSecret: string;
  /** Seconds; tokens never expire when unset. */
  jwtAccessTokenTtl?: number;
  corsOrigin: string;
  authRateLimitMax: number;
  passwordHashing?: PasswordHashingOptions;
}

export interface ServerDeps<Tx> {
  withTransaction: WithTransaction<Tx>;
  userRepo: UserRepository<Tx>;
  eventRepo: EventRepository<Tx>;
  guestRepo: GuestRepository<Tx>;
  rsvpRepo: RsvpRepository<Tx>;
  passwordHasher?: PasswordHasher;
}

function corsOrigin(value: string): boolean | string[] {
  // reflect the caller's origin so credentials still work under a wildcard
  if (value === '*') return true;
  return value.split(',').map((origin) => origin.trim()).filter(Boolean);
}

export async function buildServer<Tx>(config: ServerConfig, deps: ServerDeps<Tx>) {
  const app = Fastify({
    logger: false,
    bodyLimit: 1_048_576,
    ignoreTrailingSlash: true,
  });

  registerErrorHandler(app);

  await app.register(cors, { origin: corsOrigin(config.corsOrigin), credentials: true });
  await app.register(formbody);

  const { withTransaction, userRepo, eventRepo, guestRepo, rsvpRepo } = deps;

  const tokenService = new JoseTokenService({
    secret: config.jwtSecret,
    accessTokenTtl: config.jwtAccessTokenTtl,
  });
  const passwordHasher =
    deps.passwordHasher ?? new Argon2PasswordHasher(config.passwordHashing ?? DEFAULT_PASSWORD_HASHING);

  const authService = new AuthService({ userRepo, passwordHasher, tokenService, withTransaction });
  const eventService = new EventService({ eventRepo, guestRepo, rsvpRepo, withTransaction });
  const guestService = new GuestService({ eventRepo, guestRepo, withTransaction });
  const rsvpService = new RsvpService({ eventRepo, guestRepo, rsvpRepo, withTransaction });

  const authenticate = createAuthMiddleware(authService);
  const authRateLimit = createRateLimiter({ windowMs: 60_000, maxRequests: config.authRateLimitMax });
  app.addHook('onClose', async () => {
    authRateLimit.close();
  });

  app.get('/', async () => {
    const body: HealthResponse = { message: 'Healthy' };
    return body;
  });

  registerAuthRoutes(app, { authService, authenticate, authRateLimit });
  registerEventRoutes(app, { eventService, authenticate });
  registerGuestRoutes(app, { guestService, authenticate });
  registerRsvpRoutes(app, { rsvpService, authenticate });

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

  return app;
}
