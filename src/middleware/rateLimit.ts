import rateLimit from 'express-rate-limit';
import { config } from '../config';

/** Per-IP limiter with the shared envelope; disabled when `config.rateLimit.enabled` is false. */
export function createLimiter(windowMs: number, max: number, error: string) {
  return rateLimit({
    windowMs,
    max,
    standardHeaders: true,
    legacyHeaders: false,
    skip: () => !config.rateLimit.enabled,
    message: { success: false, error, kind: 'rate_limited' },
  });
}

export const apiLimiter = createLimiter(
  15 * 60 * 1000,
  300,
  'Too many requests, please try again later.'
);
