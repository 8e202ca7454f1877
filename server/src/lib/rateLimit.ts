import type { NextFunction, Request, RequestHandler, Response } from 'express';
import { ENV } from './env';

type Bucket = { count: number; resetAt: number };

export type RateLimitOptions = {
  windowMs: number;
  max: number;
  now?: () => number;
};

/**
 * Fixed-window limiter keyed by client IP. Buckets live in process memory,
 * so each Lambda container or server instance counts on its own.
 */
export function createRateLimiter(options: RateLimitOptions): RequestHandler {
  const buckets = new Map<string, Bucket>();
  const now = options.now ?? Date.now;

  const currentBucket = (key: string, at: number): Bucket => {
    const existing = buckets.get(key);
    if (existing && existing.resetAt > at) return existing;

    // expired windows are dropped whenever a new one opens
    for (const [other, bucket] of buckets) {
      if (bucket.resetAt <= at) buckets.delete(other);
    }
    const bucket = { count: 0, resetAt: at + options.windowMs };
    buckets.set(key, bucket);
    return bucket;
  };

  return (req: Request, res: Response, next: NextFunction) => {
    if (options.max <= 0) {
      next();
      return;
    }

    const at = now();
    const bucket = currentBucket(req.ip || 'global', at);
    bucket.count += 1;

    if (bucket.count > options.max) {
      res.setHeader('Retry-After', Math.ceil(Math.max(0, bucket.resetAt - at) / 1000));
      res.status(429).json({ error: 'rate_limited', message: 'Too many requests. Try again later.' });
      return;
    }

    next();
  };
}

export const rateLimiter = createRateLimiter({ windowMs: ENV.RATE_LIMIT_WINDOW_MS, max: ENV.RATE_LIMIT_MAX });
