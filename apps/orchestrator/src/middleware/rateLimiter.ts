import rateLimit from 'express-rate-limit';
import { logger } from '../utils/logger';

/**
 * General API rate limiter
 * Allows 100 requests per 15 minutes per IP
 */
export const apiLimiter = rateLimit({
  windowMs: 15 * 60 * 1000,
  limit: 100,
  standardHeaders: true,
  legacyHeaders: false,
  handler: (req, res) => {
    logger.warn(`Rate limit exceeded for IP: ${req.ip} on path: ${req.path}`);
    res.status(429).json({
      error: 'Too many requests from this IP, please try again later.',
      retryAfter: '15 minutes',
    });
  },
});

/**
 * Provisioning runs touch every console in the fleet; 5 per minute per IP.
 */
export const provisionLimiter = rateLimit({
  windowMs: 60 * 1000,
  limit: 5,
  standardHeaders: true,
  legacyHeaders: false,
  handler: (req, res) => {
    logger.warn(`Provision rate limit exceeded for IP: ${req.ip}`);
    res.status(429).json({
      error: 'Too many provisioning runs. Each run drives every node console.',
      retryAfter: '1 minute',
      hint: 'Use GET /nodes to read the current addresses instead',
    });
  },
});

/**
 * Script push and run: 20 requests per minute per IP
 */
export const scriptLimiter = rateLimit({
  windowMs: 60 * 1000,
  limit: 20,
  standardHeaders: true,
  legacyHeaders: false,
  handler: (req, res) => {
    logger.warn(`Script rate limit exceeded for IP: ${req.ip}`);
    res.status(429).json({
      error: 'Too many script requests. Please wait before trying again.',
      retryAfter: '1 minute',
    });
  },
});
