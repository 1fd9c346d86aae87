import rateLimit from 'express-rate-limit';
import { Request, Response, NextFunction } from 'express';
import { config } from '../config/config';
import { PayloadTooLargeError } from './error.middleware';

/**
 * Global rate limiter middleware (per-IP)
 */
export const globalRateLimiter = rateLimit({
  windowMs: config.rateLimit.windowMs,
  max: config.rateLimit.max,
  standardHeaders: true,
  legacyHeaders: false,
  message: {
    error: 'Too many requests',
    message: 'Rate limit exceeded. Please try again later.',
  },
});

/**
 * Targeted rate limiter for credential checks
 */
export const loginRateLimiter = rateLimit({
  windowMs: config.rateLimit.windowMs,
  max: config.rateLimit.loginMax,
  standardHeaders: true,
  legacyHeaders: false,
  message: {
    error: 'Too many login attempts',
    message: 'Login rate limit exceeded. Please slow down.',
  },
});

/**
 * Payload size guard.
 * Rejects requests whose Content-Length exceeds configured max bytes.
 */
export function enforceBodySize(req: Request, res: Response, next: NextFunction): void {
  const contentLength = req.headers['content-length'];
  if (contentLength) {
    const len = parseInt(contentLength, 10);
    if (!Number.isNaN(len) && len > config.http.maxBodyBytes) {
      next(
        new PayloadTooLargeError(`Request body exceeds limit of ${config.http.maxBodyBytes} bytes`)
      );
      return;
    }
  }
  next();
}
