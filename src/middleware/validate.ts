import { Request, Response, NextFunction } from 'express';
import { ZodSchema, ZodError } from 'zod';
import { AppError, ErrorCode } from '../utils/appError.js';

/**
 * Validate the request body or query with a Zod schema.
 * The parsed body replaces `req.body`; Express 5 makes `req.query` read-only.
 */
export const validate = (schema: ZodSchema, source: 'body' | 'query' = 'body') => {
  return (req: Request, _res: Response, next: NextFunction): void => {
    try {
      const data = schema.parse(req[source] ?? {});
      if (source === 'body') {
        req.body = data;
      }
      next();
    } catch (error) {
      if (error instanceof ZodError) {
        const details = error.issues.map((e) => ({
          path: e.path.join('.'),
          message: e.message,
        }));
        // The first message is what a form shows next to the field
        next(
          AppError.badRequest(details[0]?.message ?? 'Validation failed', ErrorCode.VALIDATION_ERROR, {
            errors: details,
          }),
        );
        return;
      }
      next(error);
    }
  };
};
