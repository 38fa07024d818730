import pino from 'pino';

const PII_PATTERNS = new Set([
  'password',
  'passwordhash',
  'token',
  'accesstoken',
  'access_token',
  'secret',
  'email',
  'guestemails',
  'guest_emails',
  'ip',
  'remoteaddress',
  'authorization',
  'cookie',
  'body',
]);

function isPiiKey(key: string): boolean {
  return PII_PATTERNS.has(key.toLowerCase());
}

export function sanitize(obj: Record<string, unknown>): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(obj)) {
    if (isPiiKey(key)) {
      result[key] = '[REDACTED]';
    } else if (Array.isArray(value)) {
      result[key] = value.map((item) => (isRecord(item) ? sanitize(item) : item));
    } else if (isRecord(value)) {
      result[key] = sanitize(value);
    } else {
      result[key] = value;
    }
  }
  return result;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value) && !(value instanceof Date);
}

export interface SafeLogger {
  info(meta: Record<string, unknown>, msg: string): void;
  warn(meta: Record<string, unknown>, msg: string): void;
  error(meta: Record<string, unknown>, msg: string): void;
  debug(meta: Record<string, unknown>, msg: string): void;
  fatal(meta: Record<string, unknown>, msg: string): void;
  child(bindings: Record<string, unknown>): SafeLogger;
}

function wrapPino(logger: pino.Logger): SafeLogger {
  return {
    info(meta: Record<string, unknown>, msg: string) {
      logger.info(sanitize(meta), msg);
    },
    warn(meta: Record<string, unknown>, msg: string) {
      logger.warn(sanitize(meta), msg);
    },
    error(meta: Record<string, unknown>, msg: string) {
      logger.error(sanitize(meta), msg);
    },
    debug(meta: Record<string, unknown>, msg: string) {
      logger.debug(sanitize(meta), msg);
    },
    fatal(meta: Record<string, unknown>, msg: string) {
      logger.fatal(sanitize(meta), msg);
    },
    child(bindings: Record<string, unknown>): SafeLogger {
      return wrapPino(logger.child(sanitize(bindings)));
    },
  };
}

/**
 * Loggers are created at module load, before config is parsed, so the level
 * falls back to LOG_LEVEL from the environment.
 */
export function createLogger(opts: { name: string; level?: string }): SafeLogger {
  const pinoInstance = pino({
    name: opts.name,
    level: opts.level ?? process.env.LOG_LEVEL ?? 'info',
    timestamp: pino.stdTimeFunctions.isoTime,
  });
  return wrapPino(pinoInstance);
}
