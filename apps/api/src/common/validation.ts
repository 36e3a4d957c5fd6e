import { ZodError, ZodType, ZodTypeDef } from 'zod';
import { ValidationError, ValidationIssue } from './errors';

export function toValidationIssues(error: ZodError): ValidationIssue[] {
  return error.issues.map((issue) => ({
    path: issue.path,
    message: issue.message,
  }));
}

/**
 * Parses `input` with a zod schema, raising the domain ValidationError
 * instead of a ZodError so callers outside HTTP see one error type.
 */
export function parseInput<Output, Input = Output>(
  schema: ZodType<Output, ZodTypeDef, Input>,
  input: unknown,
  message = 'Invalid request',
): Output {
  const result = schema.safeParse(input);
  if (!result.success) {
    throw new ValidationError(message, toValidationIssues(result.error));
  }
  return result.data;
}
