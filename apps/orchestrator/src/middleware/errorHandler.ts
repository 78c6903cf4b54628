import { Request, Response, NextFunction } from 'express';
import type { ErrorResponse, FleetErrorKind } from '@labfleet/protocol';
import { config } from '../config';
import { logger } from '../utils/logger';
import { FleetError } from '../services/errors';

export class AppError extends Error {
  constructor(
    message: string,
    public statusCode: number = 500,
    public code: string = 'INTERNAL_ERROR',
    public isOperational: boolean = true
  ) {
    super(message);
    Object.setPrototypeOf(this, AppError.prototype);
    Error.captureStackTrace(this, this.constructor);
  }
}

const FLEET_ERROR_STATUS: Partial<Record<FleetErrorKind, { statusCode: number; code: string }>> = {
  'node-not-found': { statusCode: 404, code: 'NODE_NOT_FOUND' },
  'script-path': { statusCode: 400, code: 'SCRIPT_PATH_ERROR' },
  validation: { statusCode: 400, code: 'VALIDATION_ERROR' },
  parse: { statusCode: 422, code: 'CONFIG_PARSE_ERROR' },
  'not-found': { statusCode: 500, code: 'CONFIG_NOT_FOUND' },
  persistence: { statusCode: 500, code: 'PERSISTENCE_ERROR' },
  firewall: { statusCode: 500, code: 'FIREWALL_RULE_ERROR' },
};

/**
 * Maps run-level domain failures onto HTTP errors. Anything unmapped is a 500.
 */
export function toAppError(err: unknown): AppError {
  if (err instanceof AppError) {
    return err;
  }

  if (err instanceof FleetError) {
    const mapped = FLEET_ERROR_STATUS[err.kind] ?? { statusCode: 500, code: 'INTERNAL_ERROR' };
    const appError = new AppError(err.message, mapped.statusCode, mapped.code);
    appError.stack = err.stack;
    return appError;
  }

  const appError = new AppError(err instanceof Error ? err.message : 'Internal server error');
  if (err instanceof Error) {
    appError.stack = err.stack;
  }
  return appError;
}

function errorBody(req: Request, statusCode: number, code: string, message: string): ErrorResponse {
  return {
    error: {
      code,
      message,
      statusCode,
      timestamp: new Date().toISOString(),
      path: req.path,
    },
  };
}

export const errorHandler = (err: unknown, req: Request, res: Response, _next: NextFunction) => {
  const appError = toAppError(err);
  const message = appError.message || 'Internal server error';
  const isDevelopment = config.server.env === 'development';

  logger.error('Error occurred', {
    statusCode: appError.statusCode,
    errorCode: appError.code,
    message,
    path: req.path,
    method: req.method,
    ip: req.ip,
    stack: isDevelopment ? appError.stack : undefined,
  });

  res.status(appError.statusCode).json({
    ...errorBody(req, appError.statusCode, appError.code, message),
    ...(isDevelopment && { stack: appError.stack }),
  });
};

export const notFoundHandler = (req: Request, res: Response) => {
  logger.warn(`Route not found: ${req.method} ${req.path}`);
  res.status(404).json(errorBody(req, 404, 'NOT_FOUND', 'Route not found'));
};
