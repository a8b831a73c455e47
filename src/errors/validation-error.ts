import { EngineError } from './engine-error';
import { ErrorContext, ErrorCode } from './types';

export type ValidationErrorCode = Extract<
  ErrorCode,
  | 'VALIDATION_INVALID_INPUT'
  | 'VALIDATION_SCHEMA_MISMATCH'
  | 'EMISSION_UNDECLARED_KEY'
  | 'EMISSION_MISSING_KEY'
  | 'EMISSION_INVALID_VALUE'
  | 'FACT_KEY_CLASH'
>;

export interface ValidationErrorOptions {
  code?: ValidationErrorCode;
  context?: ErrorContext;
  cause?: unknown;
}

/**
 * A value handed to the engine (a fact, an emission, a key) is malformed.
 */
export class ValidationError extends EngineError {
  constructor(message: string, options: ValidationErrorOptions = {}) {
    super({
      message,
      code: options.code ?? 'VALIDATION_INVALID_INPUT',
      category: 'validation',
      context: options.context,
      cause: options.cause,
    });
  }
}
