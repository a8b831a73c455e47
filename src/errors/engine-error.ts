import {
  ErrorCategory,
  ErrorCode,
  ErrorContext,
  ErrorSeverity,
  EngineErrorOptions,
  SerializedError,
} from './types';
import { errorMessage } from './utils';

/**
 * Base of every error the engine raises. Instances are immutable: code
 * that needs to add context or change retryability wraps the error in a
 * new one and keeps the original as `cause`.
 */
export class EngineError extends Error {
  readonly code: ErrorCode;
  readonly category: ErrorCategory;
  readonly severity: ErrorSeverity;
  readonly retryable: boolean;
  readonly context: Readonly<ErrorContext>;

  constructor(options: EngineErrorOptions) {
    super(options.message, { cause: options.cause });
    this.name = new.target.name;
    this.code = options.code;
    this.category = options.category;
    this.severity = options.severity ?? 'error';
    this.retryable = options.retryable ?? false;
    this.context = Object.freeze({ ...options.context });

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }

  /**
   * JSON-safe form used by the error logger. Engine causes nest; anything
   * else degrades to its message.
   */
  toJSON(): SerializedError {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      category: this.category,
      severity: this.severity,
      retryable: this.retryable,
      context: { ...this.context },
      cause: describeCause(this.cause),
    };
  }
}

function describeCause(cause: unknown): SerializedError | string | undefined {
  if (cause === undefined || cause === null) {
    return undefined;
  }
  if (cause instanceof EngineError) {
    return cause.toJSON();
  }
  if (cause instanceof Error) {
    return `${cause.name}: ${cause.message}`;
  }
  return errorMessage(cause);
}
