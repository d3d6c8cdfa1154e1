/**
 * Validation helper utilities
 *
 * Consistent validation and error handling for caller-supplied input
 */

import { z } from 'zod';
import { ValidationError } from '../types';

/**
 * Validates data against a Zod schema
 *
 * @param context - Name of the validated value, used in the error message
 * @returns Validated and typed data (defaults applied)
 * @throws ValidationError if validation fails
 */
export function validate<T extends z.ZodTypeAny>(
  schema: T,
  data: unknown,
  context?: string
): z.output<T> {
  const result = schema.safeParse(data);
  if (result.success) {
    return result.data;
  }

  const message = context
    ? `Validation failed for ${context}: ${formatZodError(result.error)}`
    : `Validation failed: ${formatZodError(result.error)}`;

  throw new ValidationError(message, result.error.errors, {
    validationErrors: result.error.errors,
    receivedData: data,
  });
}

/**
 * Validates data against a Zod schema, returning null on failure instead of throwing
 */
export function validateSafe<T extends z.ZodTypeAny>(schema: T, data: unknown): z.output<T> | null {
  const result = schema.safeParse(data);
  return result.success ? result.data : null;
}

function formatZodError(error: z.ZodError): string {
  return error.errors
    .map((err) => {
      const path = err.path.join('.');
      return path ? `${path}: ${err.message}` : err.message;
    })
    .join('; ');
}

/**
 * Clamp a number into [min, max]
 */
export function clamp(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, value));
}

/**
 * Type guard to check if an error is a ValidationError
 */
export function isValidationError(error: unknown): error is ValidationError {
  return error instanceof ValidationError;
}
