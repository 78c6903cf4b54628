import { Request, Response, NextFunction } from 'express';
import { z, ZodError } from 'zod';
import { AppError } from './errorHandler';
import { formatZodIssues } from '../utils/formatIssues';

/**
 * Validation target - where to find the data to validate.
 * `req.query` is a getter under Express 5 and cannot be replaced.
 */
export type ValidationTarget = 'body' | 'params';

/**
 * Creates a middleware that validates request data against a Zod schema.
 * The parsed value (defaults applied) replaces the original; a request
 * without a body is validated as `{}`.
 */
export const validateRequest = (schema: z.ZodTypeAny, target: ValidationTarget = 'body') => {
  return (req: Request, _res: Response, next: NextFunction) => {
    try {
      req[target] = schema.parse(req[target] ?? {});
      next();
    } catch (error) {
      if (error instanceof ZodError) {
        throw new AppError(formatZodIssues(error).join(', '), 400, 'VALIDATION_ERROR');
      }
      throw error;
    }
  };
};
