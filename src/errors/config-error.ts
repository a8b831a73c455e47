import { EngineError } from './engine-error';
import { ErrorCode } from './types';

export interface ConfigErrorOptions {
  code?: Extract<ErrorCode, 'CONFIG_MISSING' | 'CONFIG_INVALID'>;
  /** File path, or a label such as `bootstrap config`, the problem was found in. */
  source?: string;
  issues?: readonly string[];
  cause?: unknown;
}

/**
 * Bootstrap configuration that cannot be used as written. Never retryable:
 * the configuration has to change first.
 */
export class ConfigError extends EngineError {
  readonly source?: string;
  readonly issues: readonly string[];

  constructor(message: string, options: ConfigErrorOptions = {}) {
    const issues = Object.freeze([...(options.issues ?? [])]);
    super({
      message,
      code: options.code ?? 'CONFIG_INVALID',
      category: 'config',
      context: { module: 'config', data: { source: options.source ?? null, issues: [...issues] } },
      cause: options.cause,
    });
    this.source = options.source;
    this.issues = issues;
  }
}
