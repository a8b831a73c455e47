import { randomUUID } from 'crypto';
import { EngineError } from './engine-error';
import { ErrorCategory, ErrorCode, ErrorContext, JsonValue, SerializedError } from './types';

export interface LogSink {
  warn(message: string): void;
  error(message: string): void;
}

/**
 * One line of engine log output. Session fields sit at the top level so a
 * log search can filter on them without digging into a context blob.
 */
export interface LogEntry {
  level: 'warn' | 'error';
  timestamp: string;
  correlationId: string;
  message: string;
  agentId?: string;
  sessionId?: string;
  iteration?: number;
  phase?: string;
  action?: string;
  module?: string;
  operation?: string;
  code?: ErrorCode;
  category?: ErrorCategory;
  retryable?: boolean;
  data?: Record<string, JsonValue>;
  cause?: SerializedError | string;
}

/**
 * Writes engine errors and warnings as JSON lines. The logger never changes
 * the error it is given; extra context is merged into the entry only.
 */
export class ErrorLogger {
  constructor(
    private readonly sink: LogSink = console,
    private readonly clock: () => Date = () => new Date()
  ) {}

  logError(error: EngineError, context: ErrorContext = {}): LogEntry {
    const entry: LogEntry = {
      ...this.base(error.severity === 'warning' ? 'warn' : 'error', error.message, {
        ...error.context,
        ...context,
      }),
      code: error.code,
      category: error.category,
      retryable: error.retryable,
    };
    const cause = error.toJSON().cause;
    if (cause !== undefined) {
      entry.cause = cause;
    }
    this.write(entry);
    return entry;
  }

  logWarning(message: string, context: ErrorContext = {}): LogEntry {
    const entry = this.base('warn', message, context);
    this.write(entry);
    return entry;
  }

  private base(level: LogEntry['level'], message: string, context: ErrorContext): LogEntry {
    const { correlationId, ...fields } = context;
    return {
      level,
      timestamp: this.clock().toISOString(),
      correlationId: correlationId ?? randomUUID(),
      message,
      ...fields,
    };
  }

  private write(entry: LogEntry): void {
    const line = JSON.stringify(entry);
    if (entry.level === 'warn') {
      this.sink.warn(line);
    } else {
      this.sink.error(line);
    }
  }
}
