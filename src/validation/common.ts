import { z } from 'zod';
import { ValidationError } from '../errors/validation-error';

const DEFAULT_MAX_IDENTIFIER_LENGTH = 128;

/**
 * Agent and session ids double as directory names and table keys, so they
 * are restricted to a single safe path segment.
 */
export const IdentifierSchema = z
  .string({
    required_error: 'Identifier is required',
    invalid_type_error: 'Identifier must be a string',
  })
  .min(1, 'Identifier cannot be empty')
  .max(DEFAULT_MAX_IDENTIFIER_LENGTH, 'Identifier is too long')
  .regex(
    /^[A-Za-z0-9][A-Za-z0-9._-]*$/,
    'Identifier must start with a letter or digit and contain only letters, digits, ".", "_" or "-"'
  )
  .refine((value) => !value.includes('..'), { message: 'Identifier cannot contain ".."' });

export const SessionKeySchema = z
  .object({
    agentId: IdentifierSchema,
    sessionId: IdentifierSchema,
  })
  .strict();

export type SessionKey = z.infer<typeof SessionKeySchema>;

export function ensurePositiveInteger(value: number, label: string): number {
  if (!Number.isInteger(value) || value < 1) {
    throw new ValidationError(`${label} must be a positive integer`, {
      context: { data: { label, value } },
    });
  }
  return value;
}
