import rateLimit from 'express-rate-limit';

const TOO_MANY_REQUESTS = {
  code: 'RATE_LIMITED',
  message: 'Too many requests, please try again later.',
};

/**
 * General API rate limiter (60 requests per minute per client).
 * Uses in-memory store (resets on server restart).
 */
export function createApiRateLimiter() {
  return rateLimit({
    windowMs: 60 * 1000,
    limit: 60,
    message: TOO_MANY_REQUESTS,
    standardHeaders: true,
    legacyHeaders: false,
  });
}

/**
 * Stricter limiter for credential endpoints (10 requests per minute per IP).
 */
export function createLoginRateLimiter() {
  return rateLimit({
    windowMs: 60 * 1000,
    limit: 10,
    message: {
      code: 'RATE_LIMITED',
      message: 'Too many login attempts, please try again later.',
    },
    standardHeaders: true,
    legacyHeaders: false,
    keyGenerator: (req) => req.ip ?? req.socket.remoteAddress ?? 'unknown',
  });
}
