import { EngineError } from './engine-error';
import { ErrorCode, ErrorContext } from './types';

export type StorageErrorCode = Extract<
  ErrorCode,
  'STORAGE_FAILURE' | 'STORAGE_CORRUPT' | 'STORAGE_INVALID_KEY'
>;

export interface StorageErrorOptions {
  code?: StorageErrorCode;
  context?: ErrorContext;
  cause?: unknown;
}

/**
 * Raised by state store backends. The controller never retries these.
 */
export class StorageError extends EngineError {
  constructor(message: string, options: StorageErrorOptions = {}) {
    super({
      message,
      code: options.code ?? 'STORAGE_FAILURE',
      category: 'storage',
      severity: 'error',
      context: options.context,
      cause: options.cause,
      retryable: false,
    });
  }
}
