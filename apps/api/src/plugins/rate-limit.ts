import { type FastifyRequest } from 'fastify';
import { AppError, ErrorCode, createLogger } from '@soiree/shared';

const logger = createLogger({ name: 'api:rate-limit' });

interface RateLimitBucket {
  count: number;
  resetAt: number;
}

export interface RateLimiter {
  check(request: FastifyRequest): Promise<void>;
  close(): void;
}

/**
 * Fixed-window limiter keyed by client IP. Buckets live in process memory,
 * so each API instance counts on its own.
 */
export function createRateLimiter(opts: { windowMs: number; maxRequests: number }): RateLimiter {
  const buckets = new Map<string, RateLimitBucket>();

  const sweep = setInterval(() => {
    const now = Date.now();
    for (const [key, bucket] of buckets) {
      if (bucket.resetAt <= now) {
        buckets.delete(key);
      }
    }
  }, opts.windowMs);
  sweep.unref();

  return {
    async check(request) {
      const key = request.ip || 'unknown';
      const now = Date.now();

      let bucket = buckets.get(key);
      if (!bucket || bucket.resetAt <= now) {
        bucket = { count: 0, resetAt: now + opts.windowMs };
        buckets.set(key, bucket);
      }

      bucket.count++;
      if (bucket.count > opts.maxRequests) {
        const retryAfter = Math.ceil((bucket.resetAt - now) / 1000);
        logger.warn({ requestId: request.id, url: request.url }, 'Rate limit exceeded');
        throw new AppError(ErrorCode.RATE_LIMITED, 'Too many requests, please try again later', {
          retry_after: retryAfter,
        });
      }
    },
    close() {
      clearInterval(sweep);
      buckets.clear();
    },
  };
}
