import { Request, Response, NextFunction } from 'express';
import logger from '@/config/logger.js';
import { env } from '@/config/environment.js';

export type ErrorKind =
  | 'ValidationError'
  | 'NotFoundError'
  | 'QueryError'
  | 'TimeoutError'
  | 'InternalError';

export const STATUS_BY_KIND: Record<ErrorKind, number> = {
  ValidationError: 400,
  NotFoundError: 404,
  QueryError: 422,
  TimeoutError: 504,
  InternalError: 500,
};

export class AppError extends Error {
  public readonly statusCode: number;
  public readonly isOperational: boolean;
  public readonly kind: ErrorKind;

  constructor(
    message: string,
    statusCode: number = 500,
    isOperational: boolean = true,
    kind: ErrorKind = 'InternalError'
  ) {
    super(message);
    this.name = kind;
    this.statusCode = statusCode;
    this.isOperational = isOperational;
    this.kind = kind;

    Error.captureStackTrace(this, this.constructor);
  }
}

/** Bad or unknown parameter, disallowed SQL, unknown dimension or field */
export class ValidationError extends AppError {
  public readonly details: Array<{ field: string; message: string }>;

  constructor(message: string, details: Array<{ field: string; message: string }> = []) {
    super(message, STATUS_BY_KIND.ValidationError, true, 'ValidationError');
    this.details = details;
  }
}

export class NotFoundError extends AppError {
  constructor(message: string) {
    super(message, STATUS_BY_KIND.NotFoundError, true, 'NotFoundError');
  }
}

/** The store rejected a well-formed request */
export class QueryError extends AppError {
  constructor(message: string, cause?: unknown) {
    super(message, STATUS_BY_KIND.QueryError, true, 'QueryError');
    this.cause = cause;
  }
}

export class TimeoutError extends AppError {
  public readonly timeoutMs: number;

  constructor(timeoutMs: number) {
    super(
      `Statement exceeded the ${timeoutMs}ms timeout`,
      STATUS_BY_KIND.TimeoutError,
      true,
      'TimeoutError'
    );
    this.timeoutMs = timeoutMs;
  }
}

export const errorHandler = (
  error: Error,
  req: Request,
  res: Response,
  // Express only treats four-argument middleware as an error handler
  _next: NextFunction
): void => {
  let statusCode = 500;
  let message = 'Internal server error';
  let kind: ErrorKind = 'InternalError';

  if (error instanceof AppError) {
    ({ statusCode, message, kind } = error);
  }

  logger.error('Error occurred:', {
    message: error.message,
    statusCode,
    stack: error.stack,
    url: req.url,
    method: req.method,
    ip: req.ip,
    userAgent: req.get('User-Agent'),
  });

  const response: { success: false; error: { kind: ErrorKind; message: string }; stack?: string } =
    {
      success: false,
      error: { kind, message },
    };

  if (env.NODE_ENV === 'development') {
    response.stack = error.stack;
  }

  res.status(statusCode).json(response);
};

export const notFoundHandler = (req: Request, res: Response): void => {
  const message = `Route ${req.originalUrl} not found`;
  logger.warn(message, { method: req.method, ip: req.ip });

  res.status(404).json({
    success: false,
    error: { kind: 'NotFoundError', message },
  });
};
