import { buildServer } from './server';
import { loadConfig, ApiConfigSchema, createLogger, DEFAULT_JWT_SECRET } from '@soiree/shared';
import {
  createDatabase,
  PgUserRepository,
  PgEventRepository,
  PgGuestRepository,
  PgRsvpRepository,
} from '@soiree/db';

const logger = createLogger({ name: 'api' });

async function main() {
  const config = loadConfig(ApiConfigSchema);

  if (config.JWT_SECRET_KEY === DEFAULT_JWT_SECRET) {
    logger.warn({}, 'JWT_SECRET_KEY is not set; signing tokens with the built-in development secret');
  }

  const db = createDatabase({ connectionString: config.DATABASE_URL });

  const app = await buildServer(
    {
      jwtSecret: config.JWT_SECRET_KEY,
      jwtAccessTokenTtl: config.JWT_ACCESS_TOKEN_TTL,
      corsOrigin: config.CORS_ORIGIN,
      authRateLimitMax: config.AUTH_RATE_LIMIT_MAX,
      passwordHashing: {
        memoryCost: config.ARGON2_MEMORY_COST,
        timeCost: config.ARGON2_TIME_COST,
      },
    },
    {
      withTransaction: db.withTransaction,
      userRepo: new PgUserRepository(),
      eventRepo: new PgEventRepository(),
      guestRepo: new PgGuestRepository(),
      rsvpRepo: new PgRsvpRepository(),
    },
  );

  await app.listen({ host: config.API_HOST, port: config.API_PORT });
  logger.info({ host: config.API_HOST, port: config.API_PORT }, 'API server started');

  const shutdown = async () => {
    logger.info({}, 'Shutting down API server');
    await app.close();
    await db.close();
    process.exit(0);
  };

  for (const signal of ['SIGTERM', 'SIGINT'] as const) {
    process.on(signal, () => {
      shutdown().catch((err) => {
        logger.error({ err: err instanceof Error ? err.message : String(err) }, 'Shutdown failed');
        process.exit(1);
      });
    });
  }
}

main().catch((err) => {
  logger.fatal({ err: err instanceof Error ? err.message : String(err) }, 'Failed to start API');
  process.exit(1);
});
