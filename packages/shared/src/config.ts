import { z } from 'zod';

export const DEFAULT_JWT_SECRET = 'temporary_secret';

export const BaseConfigSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  LOG_LEVEL: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).default('info'),
});

export type BaseConfig = z.infer<typeof BaseConfigSchema>;

export const DatabaseConfigSchema = z.object({
  DATABASE_URL: z.string().min(1),
});

export const JwtConfigSchema = z.object({
  JWT_SECRET_KEY: z.string().min(1).default(DEFAULT_JWT_SECRET),
  // unset: tokens carry no exp claim
  JWT_ACCESS_TOKEN_TTL: z.coerce.number().int().positive().optional(),
});

export const ApiConfigSchema = BaseConfigSchema.merge(DatabaseConfigSchema)
  .merge(JwtConfigSchema)
  .extend({
    API_HOST: z.string().default('0.0.0.0'),
    API_PORT: z.coerce.number().int().min(0).max(65535).default(3000),
    CORS_ORIGIN: z.string().default('*'),
    AUTH_RATE_LIMIT_MAX: z.coerce.number().int().positive().default(20),
    // argon2 rejects less than 8 KiB per lane
    ARGON2_MEMORY_COST: z.coerce.number().int().min(8).default(19456),
    ARGON2_TIME_COST: z.coerce.number().int().positive().default(2),
  });

export type ApiConfig = z.infer<typeof ApiConfigSchema>;

export const InitDbConfigSchema = BaseConfigSchema.merge(DatabaseConfigSchema);

export function loadConfig<T extends z.ZodTypeAny>(
  schema: T,
  env: Record<string, string | undefined> = process.env,
): z.infer<T> {
  const result = schema.safeParse(env);
  if (!result.success) {
    const formatted = result.error.issues
      .map((issue) => `  ${issue.path.join('.')}: ${issue.message}`)
      .join('\n');
    throw new Error(`Config validation failed:\n${formatted}`);
  }
  return result.data;
}
