import { EngineError } from './engine-error';
import { ErrorCode, ErrorContext } from './types';

export interface ExecutionErrorOptions {
  code?: Extract<ErrorCode, 'ACTION_FAILED' | 'CONTROLLER_MAX_ITERATIONS'>;
  context?: ErrorContext;
  cause?: unknown;
  retryable?: boolean;
}

export class ExecutionError extends EngineError {
  constructor(message: string, options: ExecutionErrorOptions = {}) {
    super({
      message,
      code: options.code ?? 'ACTION_FAILED',
      category: 'execution',
      severity: 'error',
      context: options.context,
      cause: options.cause,
      retryable: options.retryable ?? false,
    });
  }
}
