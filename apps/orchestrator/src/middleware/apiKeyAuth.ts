import { Request, Response, NextFunction } from 'express';
import crypto from 'crypto';
import { config } from '../config';
import { AppError } from './errorHandler';
import { logger } from '../utils/logger';

/**
 * API Key Authentication Middleware
 *
 * Enforced only when API_KEY is set.
 * Expected header format: Authorization: Bearer <api-key>
 */
export const apiKeyAuth = (req: Request, _res: Response, next: NextFunction) => {
  const expectedKey = config.auth.apiKey;
  if (!expectedKey) {
    return next();
  }

  const context = { path: req.path, method: req.method, ip: req.ip };
  const authHeader = req.headers.authorization;

  if (!authHeader) {
    logger.warn('API authentication failed: Missing Authorization header', context);
    throw new AppError('Missing Authorization header', 401, 'UNAUTHORIZED');
  }

  const parts = authHeader.trim().split(/\s+/);
  if (parts.length !== 2 || parts[0] !== 'Bearer') {
    logger.warn('API authentication failed: Invalid Authorization header format', context);
    throw new AppError(
      'Invalid Authorization header format. Expected: Bearer <api-key>',
      401,
      'UNAUTHORIZED'
    );
  }

  // Constant-time comparison; lengths must match first
  const expectedBuffer = Buffer.from(expectedKey, 'utf8');
  const providedBuffer = Buffer.from(parts[1], 'utf8');
  if (
    expectedBuffer.length !== providedBuffer.length ||
    !crypto.timingSafeEqual(expectedBuffer, providedBuffer)
  ) {
    logger.warn('API authentication failed: Invalid API key', context);
    throw new AppError('Invalid API key', 401, 'UNAUTHORIZED');
  }

  logger.debug('API authentication successful', { path: req.path, method: req.method });
  next();
};
