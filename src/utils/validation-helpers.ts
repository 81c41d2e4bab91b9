/**
 * Validation Utilities
 *
 * Shared zod error formatting and response helpers so that tools and routes
 * report invalid input the same way.
 */

import { z } from 'zod';
import { ValidationError } from '@/middleware/error.js';

/** The part of an Express response the helpers write through */
export interface JsonResponder {
  status(code: number): { json(body: unknown): unknown };
}

export interface FieldIssue {
  field: string;
  message: string;
}

/**
 * Formats Zod validation errors into a more readable structure
 */
export function formatValidationErrors(errors: z.ZodIssue[]): FieldIssue[] {
  return errors.map((err) => ({
    field: err.path.join('.') || '(root)',
    message: err.message,
  }));
}

/**
 * Converts a zod failure into a ValidationError whose message names every
 * offending field
 *
 * @param error - The ZodError from a failed parse
 * @param context - Prefix for the message, e.g. the tool name
 */
export function toValidationError(error: z.ZodError, context: string): ValidationError {
  const details = formatValidationErrors(error.errors);
  const summary = details.map((issue) => `${issue.field}: ${issue.message}`).join('; ');
  return new ValidationError(`Invalid arguments for ${context}: ${summary}`, details);
}

/**
 * Parses input against a schema, throwing ValidationError on failure
 */
export function parseOrThrow<T extends z.ZodTypeAny>(
  schema: T,
  input: unknown,
  context: string
): z.infer<T> {
  const result = schema.safeParse(input);
  if (!result.success) {
    throw toValidationError(result.error, context);
  }
  return result.data;
}

/**
 * Sends a standardized success response
 */
export function sendSuccessResponse<T>(res: JsonResponder, result: T, statusCode = 200): void {
  res.status(statusCode).json({
    success: true,
    result,
  });
}

/**
 * Sends a standardized error response
 *
 * @param details - Optional payload echoed back, such as the failed tool result
 */
export function sendErrorResponse(
  res: JsonResponder,
  statusCode: number,
  error: { kind: string; message: string },
  details?: Record<string, unknown>
): void {
  res.status(statusCode).json({
    success: false,
    error,
    ...details,
  });
}
