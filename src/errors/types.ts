export type ErrorCategory = 'validation' | 'spec' | 'io' | 'config' | 'storage' | 'execution';

/**
 * `fatal` is reserved for problems in the agent definition itself.
 */
export type ErrorSeverity = 'fatal' | 'error' | 'warning';

/**
 * Codes follow `<AREA>_<IDENTIFIER>`.
 */
export type ErrorCode =
  | 'VALIDATION_INVALID_INPUT'
  | 'VALIDATION_SCHEMA_MISMATCH'
  | 'EMISSION_UNDECLARED_KEY'
  | 'EMISSION_MISSING_KEY'
  | 'EMISSION_INVALID_VALUE'
  | 'FACT_KEY_CLASH'
  | 'SPEC_INVALID'
  | 'SPEC_INVALID_PHASE_NAME'
  | 'SPEC_DANGLING_PHASE'
  | 'SPEC_RULE_OVERLAP'
  | 'SPEC_FACT_SCOPE'
  | 'IO_NOT_FOUND'
  | 'IO_PERMISSION_DENIED'
  | 'CONFIG_MISSING'
  | 'CONFIG_INVALID'
  | 'STORAGE_FAILURE'
  | 'STORAGE_CORRUPT'
  | 'STORAGE_INVALID_KEY'
  | 'ACTION_FAILED'
  | 'CONTROLLER_MAX_ITERATIONS';

export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

/**
 * Where an error happened. The session fields are set whenever the error
 * belongs to one agent session, and are logged as top-level fields.
 */
export interface ErrorContext {
  agentId?: string;
  sessionId?: string;
  iteration?: number;
  phase?: string;
  action?: string;
  module?: string;
  operation?: string;
  correlationId?: string;
  data?: Record<string, JsonValue>;
}

export interface EngineErrorOptions {
  message: string;
  code: ErrorCode;
  category: ErrorCategory;
  severity?: ErrorSeverity;
  context?: ErrorContext;
  cause?: unknown;
  retryable?: boolean;
}

export interface SerializedError {
  name: string;
  message: string;
  code: ErrorCode;
  category: ErrorCategory;
  severity: ErrorSeverity;
  retryable: boolean;
  context: ErrorContext;
  cause?: SerializedError | string;
}
