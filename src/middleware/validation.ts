import { Request, Response, NextFunction } from 'express';
import { ZodSchema } from 'zod';
import logger from '@/config/logger.js';
import { formatValidationErrors } from '@/utils/validation-helpers.js';

type RequestPart = 'body' | 'query' | 'params';

export const validateRequest =
  <T extends ZodSchema>(schema: T, part: RequestPart = 'body') =>
  (req: Request, res: Response, next: NextFunction): void => {
    const result = schema.safeParse(req[part]);

    if (!result.success) {
      const details = formatValidationErrors(result.error.errors);

      logger.warn('Request validation failed:', { details, url: req.url });
      res.status(400).json({
        success: false,
        error: { kind: 'ValidationError', message: 'Validation failed' },
        details,
      });
      return;
    }

    // Parsed data with defaults applied
    req.validatedData = result.data;
    next();
  };

declare global {
  namespace Express {
    interface Request {
      validatedData?: unknown;
    }
  }
}
