import rateLimit from 'express-rate-limit';
import { logger } from '../utils/logger';

export function createSearchRateLimiter(maxPerMinute: number) {
  return rateLimit({
    windowMs: 60 * 1000,
    limit: maxPerMinute,
    standardHeaders: true,
    legacyHeaders: false,
    handler: (req, res) => {
      logger.warn({ ip: req.ip }, 'Search rate limit exceeded');
      res.status(429).json({
        error: {
          message: 'Too many search requests, please try again later',
          status: 429,
          code: 'RATE_LIMITED',
        },
      });
    },
  });
}
