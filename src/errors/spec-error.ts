import { EngineError } from './engine-error';
import { ErrorCode, ErrorContext } from './types';

export type SpecErrorCode = Extract<
  ErrorCode,
  | 'SPEC_INVALID'
  | 'SPEC_INVALID_PHASE_NAME'
  | 'SPEC_DANGLING_PHASE'
  | 'SPEC_RULE_OVERLAP'
  | 'SPEC_FACT_SCOPE'
>;

export interface SpecErrorOptions {
  code?: SpecErrorCode;
  context?: ErrorContext;
  cause?: unknown;
}

/**
 * Construction-time failure of an agent specification. Always fatal:
 * the specification itself has to be fixed.
 */
export class SpecError extends EngineError {
  constructor(message: string, options: SpecErrorOptions = {}) {
    super({
      message,
      code: options.code ?? 'SPEC_INVALID',
      category: 'spec',
      severity: 'fatal',
      context: options.context,
      cause: options.cause,
      retryable: false,
    });
  }
}
