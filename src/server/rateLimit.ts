/**
 * Rate limiting middleware for API endpoints.
 * Uses express-rate-limit for simple in-memory rate limiting.
 */

import rateLimit, { type Options, type RateLimitRequestHandler } from 'express-rate-limit';
import type { Request } from 'express';
import type { Config } from '../lib/config';
import { USER_ID_HEADER } from './auth/identity';

export interface RateLimits {
  general: RateLimitRequestHandler;
  submission: RateLimitRequestHandler;
  upload: RateLimitRequestHandler;
  admin: RateLimitRequestHandler;
}

/** Identified callers are limited per account, anonymous ones per IP. */
function callerKey(req: Request): string {
  const header = req.headers[USER_ID_HEADER];
  const id = Array.isArray(header) ? header[0] : header;
  return id ? `user:${id}` : `ip:${req.ip ?? 'unknown'}`;
}

function limiter(windowMs: number, max: number, error: string): RateLimitRequestHandler {
  const options: Partial<Options> = {
    windowMs,
    limit: max,
    message: { success: false, error, code: 'RATE_LIMITED' },
    standardHeaders: true,
    legacyHeaders: false,
    keyGenerator: callerKey,
  };
  return rateLimit(options);
}

export function createRateLimits(config: Pick<Config, 'isDev'>): RateLimits {
  // More lenient in development
  const multiplier = config.isDev ? 10 : 1;

  return {
    /** General API rate limit - 100 requests per minute in production. */
    general: limiter(60 * 1000, 100 * multiplier, 'Too many requests. Please try again later.'),

    /** Dialog steps - 30 per minute; a full submission takes five. */
    submission: limiter(60 * 1000, 30 * multiplier, 'Too many submission steps. Please wait a moment.'),

    /** File uploads - 10 per minute. */
    upload: limiter(60 * 1000, 10 * multiplier, 'Too many upload requests. Please wait a moment.'),

    /** Billing and admin routes - 60 per minute. */
    admin: limiter(60 * 1000, 60 * multiplier, 'Too many requests. Please try again later.'),
  };
}
