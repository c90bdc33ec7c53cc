import rateLimit from 'express-rate-limit';

export function rpcRateLimiter(limitPerMinute: number) {
  return rateLimit({
    windowMs: 60 * 1000,
    limit: limitPerMinute,
    standardHeaders: true,
    legacyHeaders: false,
    message: { success: false, error: { message: 'Too many requests', type: 'RATE_LIMIT' } }
  });
}
