import rateLimit, { type Options } from 'express-rate-limit';
import type { Request, Response } from 'express';
import { logger } from '../core/logger';

const WINDOW_MS = 60 * 1000;

// Clients that identify themselves are limited per id; anonymous callers per address.
const getClientKey = (req: Request): string => {
  const clientId = req.get('x-client-id')?.trim();
  if (clientId) {
    return `client:${clientId}`;
  }
  return req.ip || 'unknown';
};

function createLimiter(label: string, max: number, message: string, overrides: Partial<Options> = {}) {
  return rateLimit({
    windowMs: WINDOW_MS,
    max,
    standardHeaders: true,
    legacyHeaders: false,
    keyGenerator: getClientKey,
    validate: false,
    handler: (req: Request, res: Response) => {
      logger.warn(`[RateLimit] ${label} limit exceeded for ${getClientKey(req)} on ${req.path}`, {
        requestId: req.requestId,
      });
      res.status(429).json({ error: message, code: 'RATE_LIMITED', requestId: req.requestId });
    },
    ...overrides,
  });
}

export const globalRateLimiter = createLimiter('Global', 600, 'Too many requests. Please slow down.', {
  skip: (req) => req.path === '/api/health' || !req.path.startsWith('/api'),
});

/** Applied to booking creation only; availability reads fall under the global limit. */
export const bookingRateLimiter = createLimiter('Booking', 20, 'Too many booking attempts. Please wait a minute.');
