import type { Request } from 'express';
import rateLimit from 'express-rate-limit';
import { ServiceUnavailableError } from '../errors.js';
import { BUSY_MESSAGE } from '../services/modelErrors.js';
import { errorBody } from './errorHandler.js';

// Limits are per user id where one is sent, since several members of a
// household often share an IP.
export function createAiRateLimiter(limitPerMinute: number) {
  return rateLimit({
    windowMs: 60 * 1000,
    limit: limitPerMinute,
    standardHeaders: true,
    legacyHeaders: false,
    keyGenerator: (req: Request) => {
      const userId = req.get('x-user-id');
      return userId ? `user:${userId}` : req.ip || 'unknown';
    },
    handler: (_req, res) => {
      res.status(429).json(errorBody(new ServiceUnavailableError(BUSY_MESSAGE, true)));
    },
  });
}
