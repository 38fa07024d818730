import { loadConfig, InitDbConfigSchema, createLogger } from '@soiree/shared';
import { createDatabase } from './client';
import { createSchema, SCHEMA_PATH } from './schema';

const logger = createLogger({ name: 'db:init' });

async function initDb() {
  const config = loadConfig(InitDbConfigSchema);
  const db = createDatabase({ connectionString: config.DATABASE_URL });

  try {
    await createSchema(db.pool);
    logger.info({ schema: SCHEMA_PATH }, 'Database tables created successfully');
  } finally {
    await db.close();
  }
}

initDb().catch((err) => {
  logger.fatal({ err: err instanceof Error ? err.message : String(err) }, 'Schema creation failed');
  process.exit(1);
});
