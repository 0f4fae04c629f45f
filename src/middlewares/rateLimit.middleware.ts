import type { Response, NextFunction } from 'express';
import type { AuthRequest } from '../types/request.types';
import { logger } from '../utils/logging';
import { ResponseHandler } from '../utils/response';

/**
 * Fixed-window counters, in memory, one store per limiter
 */
interface RateLimitEntry {
  count: number;
  resetTime: number;
}

export type ClientKey = (req: AuthRequest) => string;

export interface RateLimitOptions {
  windowMs: number;
  maxRequests: number;
  message?: string;
  now?: () => number;
  /** Who a request counts against; defaults to `userOrAddress` */
  keyBy?: ClientKey;
}

export const remoteAddress: ClientKey = (req) => `ip:${req.ip || 'unknown'}`;

/**
 * Prefer the authenticated user, fall back to the client address
 */
export const userOrAddress: ClientKey = (req) => (req.user ? `user:${req.user.id}` : remoteAddress(req));

/**
 * Rate Limiting Middleware
 */
export const rateLimit = ({
  windowMs,
  maxRequests,
  message,
  now = Date.now,
  keyBy = userOrAddress,
}: RateLimitOptions) => {
  const store = new Map<string, RateLimitEntry>();

  // Clear expired entries; never keeps the process alive
  const sweeper = setInterval(() => {
    const current = now();
    for (const [key, entry] of store) {
      if (entry.resetTime < current) {
        store.delete(key);
      }
    }
  }, windowMs);
  sweeper.unref();

  return (req: AuthRequest, res: Response, next: NextFunction) => {
    const clientId = keyBy(req);
    const current = now();
    const key = `${req.baseUrl}${req.path}:${clientId}`;

    let entry = store.get(key);

    if (!entry || entry.resetTime <= current) {
      entry = {
        count: 0,
        resetTime: current + windowMs,
      };
      store.set(key, entry);
    }

    entry.count++;

    res.setHeader('X-RateLimit-Limit', maxRequests.toString());
    res.setHeader('X-RateLimit-Remaining', Math.max(0, maxRequests - entry.count).toString());
    res.setHeader('X-RateLimit-Reset', new Date(entry.resetTime).toISOString());

    if (entry.count > maxRequests) {
      const retryAfter = Math.ceil((entry.resetTime - current) / 1000);

      logger.warn('[Rate Limit Exceeded]', {
        clientId,
        path: req.originalUrl,
        count: entry.count,
        limit: maxRequests,
      });

      ResponseHandler.tooManyRequests(
        res,
        message || `Too many requests. Try again in ${retryAfter} seconds.`,
        retryAfter
      );
      return;
    }

    next();
  };
};

/**
 * Limit for GET /users/me: 10 requests per minute per remote address.
 * Runs before authentication, so requests with bad tokens count too.
 */
export const createProfileLimiter = () =>
  rateLimit({ windowMs: 60 * 1000, maxRequests: 10, keyBy: remoteAddress });
