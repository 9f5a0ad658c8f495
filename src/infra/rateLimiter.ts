import type { Request, Response, NextFunction } from 'express';
import { RateLimitError } from '../domain/errors.js';

type RateLimitOptions = {
  windowMs: number;
  max: number;
  now?: () => number;
};

type RateLimitState = {
  count: number;
  resetAt: number;
};

/**
 * Fixed-window limiter keyed by client IP; a non-positive window or max disables it
 * Rejections go through the error handler as RateLimitError.
 */
export function createRateLimiter({ windowMs, max, now = Date.now }: RateLimitOptions) {
  if (windowMs <= 0 || max <= 0) {
    return (_req: Request, _res: Response, next: NextFunction) => next();
  }

  const hits = new Map<string, RateLimitState>();
  let nextSweepAt = now() + windowMs;

  return (req: Request, res: Response, next: NextFunction) => {
    const current = now();
    if (current >= nextSweepAt) {
      for (const [key, state] of hits) {
        if (current >= state.resetAt) hits.delete(key);
      }
      nextSweepAt = current + windowMs;
    }

    const key = req.ip ?? 'unknown';
    let state = hits.get(key);
    if (!state || current >= state.resetAt) {
      state = { count: 0, resetAt: current + windowMs };
      hits.set(key, state);
    }
    state.count += 1;

    res.setHeader('X-RateLimit-Limit', String(max));
    res.setHeader('X-RateLimit-Remaining', String(Math.max(0, max - state.count)));
    res.setHeader('X-RateLimit-Reset', String(state.resetAt));

    if (state.count > max) {
      const retryAfterSeconds = Math.ceil((state.resetAt - current) / 1000);
      res.setHeader('Retry-After', String(retryAfterSeconds));
      return next(new RateLimitError(retryAfterSeconds));
    }

    next();
  };
}
