import { RateLimiterMemory, RateLimiterRes } from 'rate-limiter-flexible';
import { Request, Response, NextFunction } from 'express';
import { createLogger } from '../utils/logger';

const logger = createLogger('rate-limit');

const API_LIMIT = parseInt(process.env.API_RATE_LIMIT_MAX_REQUESTS || '100');
const API_WINDOW_MS = parseInt(process.env.API_RATE_LIMIT_WINDOW_MS || '900000');

// Reconciliation runs rebuild the whole mart
const RUN_LIMIT = parseInt(process.env.API_RUN_RATE_LIMIT || '5');
const RUN_WINDOW_SECONDS = 3600;

// Create rate limiter instances
const rateLimiter = new RateLimiterMemory({
  points: API_LIMIT, // Number of requests
  duration: API_WINDOW_MS / 1000, // Per 15 minutes (in seconds)
});

// Stricter rate limiter for expensive operations
const strictRateLimiter = new RateLimiterMemory({
  points: RUN_LIMIT,
  duration: RUN_WINDOW_SECONDS,
});

function clientKey(req: Request): string {
  return req.ip || 'anonymous';
}

function retryAfterSeconds(rejection: RateLimiterRes): number {
  return Math.round(rejection.msBeforeNext / 1000) || 1;
}

export async function rateLimiterMiddleware(
  req: Request,
  res: Response,
  next: NextFunction
): Promise<void> {
  const key = clientKey(req);
  try {
    // Apply rate limiting
    const result = await rateLimiter.consume(key);

    // Add rate limit headers
    res.set({
      'X-RateLimit-Limit': String(API_LIMIT),
      'X-RateLimit-Remaining': String(result.remainingPoints),
      'X-RateLimit-Reset': new Date(Date.now() + result.msBeforeNext).toISOString(),
    });
  } catch (rejection) {
    if (!(rejection instanceof RateLimiterRes)) {
      next(rejection);
      return;
    }

    logger.warn('Rate limit exceeded', {
      key,
      userAgent: req.get('User-Agent'),
      path: req.path,
      method: req.method
    });

    const secs = retryAfterSeconds(rejection);
    res.set('Retry-After', String(secs));

    res.status(429).json({
      success: false,
      error: {
        code: 'RATE_LIMIT_EXCEEDED',
        message: `Too many requests. Try again in ${secs} seconds.`,
        timestamp: new Date().toISOString(),
        details: {
          retryAfter: secs,
          limit: API_LIMIT,
          windowMs: API_WINDOW_MS
        }
      }
    });
    return;
  }
  next();
}

// Strict rate limiter for reconciliation runs
export async function strictRateLimiterMiddleware(
  req: Request,
  res: Response,
  next: NextFunction
): Promise<void> {
  const key = clientKey(req);
  try {
    const result = await strictRateLimiter.consume(key);

    res.set({
      'X-RateLimit-Limit-Strict': String(RUN_LIMIT),
      'X-RateLimit-Remaining-Strict': String(result.remainingPoints),
      'X-RateLimit-Reset-Strict': new Date(Date.now() + result.msBeforeNext).toISOString(),
    });
  } catch (rejection) {
    if (!(rejection instanceof RateLimiterRes)) {
      next(rejection);
      return;
    }

    logger.warn('Strict rate limit exceeded', {
      key,
      path: req.path,
      method: req.method
    });

    const secs = retryAfterSeconds(rejection);
    res.set('Retry-After', String(secs));

    res.status(429).json({
      success: false,
      error: {
        code: 'STRICT_RATE_LIMIT_EXCEEDED',
        message: `Too many reconciliation runs. Try again in ${secs} seconds.`,
        timestamp: new Date().toISOString(),
        details: {
          retryAfter: secs,
          limit: RUN_LIMIT,
          windowMs: RUN_WINDOW_SECONDS * 1000,
          type: 'strict'
        }
      }
    });
    return;
  }
  next();
}

export { rateLimiterMiddleware as rateLimiter };
