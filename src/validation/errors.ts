import { ZodError, ZodIssue } from 'zod';
import { ValidationError } from '../errors/validation-error';

function formatField(issue: ZodIssue): string {
  if (!issue.path || issue.path.length === 0) {
    return 'value';
  }
  return issue.path
    .map((segment) => (typeof segment === 'number' ? `[${segment}]` : String(segment)))
    .join('.');
}

export function formatZodIssue(issue: ZodIssue): string {
  const field = formatField(issue);
  switch (issue.code) {
    case 'invalid_type':
      if (issue.received === 'undefined') {
        return `Field "${field}" is required`;
      }
      return `Field "${field}" must be of type ${issue.expected}`;
    case 'invalid_enum_value':
      return `Invalid ${field}: must be one of ${issue.options.join(', ')}`;
    case 'invalid_literal':
      return `Invalid ${field}: expected ${JSON.stringify(issue.expected)}`;
    case 'unrecognized_keys':
      return `Unrecognized keys in ${field}: ${issue.keys.join(', ')}`;
    case 'too_small': {
      const comparator = issue.inclusive ? 'at least' : 'greater than';
      if (issue.type === 'string') {
        return `${field} must be ${comparator} ${issue.minimum} characters`;
      }
      if (issue.type === 'array') {
        return `${field} must contain ${comparator} ${issue.minimum} items`;
      }
      return `${field} must be ${comparator} ${issue.minimum}`;
    }
    case 'custom':
      return issue.message ? `${field}: ${issue.message}` : `Invalid ${field}`;
    default:
      return issue.message || `Invalid ${field}`;
  }
}

/**
 * Turn a zod failure (or anything else thrown while parsing) into a
 * ValidationError whose message lists every issue.
 */
export function normalizeValidationError(
  error: unknown,
  fallbackMessage = 'Input validation failed'
): ValidationError {
  if (error instanceof ValidationError) {
    return error;
  }

  if (error instanceof ZodError) {
    const formattedIssues = error.issues.map((issue) => formatZodIssue(issue));
    const message =
      formattedIssues.length === 0
        ? fallbackMessage
        : formattedIssues.length === 1
        ? formattedIssues[0]
        : formattedIssues.join('; ');
    return new ValidationError(message, {
      code: 'VALIDATION_SCHEMA_MISMATCH',
      cause: error,
      context: { data: { messages: formattedIssues } },
    });
  }

  if (error instanceof Error) {
    return new ValidationError(error.message, { cause: error });
  }

  return new ValidationError(fallbackMessage);
}
