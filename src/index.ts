export {
  BootstrapConfigSchema,
  loadBootstrapConfig,
  parseBootstrapConfig,
  seedFacts,
} from './config/bootstrap-config';
export type { BootstrapConfig, BootstrapConfigInput, StateConfig } from './config/bootstrap-config';

export { AgentController } from './controller/agent-controller';
export type { AgentControllerOptions, RunOptions } from './controller/agent-controller';
export { durableHash } from './controller/durable-hash';
export { describeOutcome } from './controller/outcomes';
export type {
  ActionFailedOutcome,
  AdvancedOutcome,
  CompletedOutcome,
  FailureKeysOutcome,
  IterationOutcome,
  IterationStatus,
  PausedOutcome,
  PauseReason,
  StalledOutcome,
} from './controller/outcomes';

export { EngineError } from './errors/engine-error';
export { ValidationError } from './errors/validation-error';
export { SpecError } from './errors/spec-error';
export { ConfigError } from './errors/config-error';
export { IOError } from './errors/io-error';
export { StorageError } from './errors/storage-error';
export { ExecutionError } from './errors/execution-error';
export { ErrorLogger } from './errors/logger';
export type { LogEntry, LogSink } from './errors/logger';
export { errorMessage } from './errors/utils';
export type {
  ErrorCategory,
  ErrorCode,
  ErrorContext,
  ErrorSeverity,
  JsonValue,
  SerializedError,
} from './errors/types';

export { createFact, deserializeFact, serializeFact } from './facts/fact';
export { Facts } from './facts/facts';
export type { FactsEntry } from './facts/facts';
export { Emission, EmissionSpec, checkEmissionDrift, emission } from './facts/emission';
export type { EmissionDrift, EmissionOptions, EmissionShape } from './facts/emission';
export { FACT_KEY_SEPARATOR, FACT_KINDS, FACT_SCOPES, isFactValue } from './facts/types';
export type { DurableScope, Fact, FactKind, FactScope, FactValue, SerializedFact } from './facts/types';

export {
  Phase,
  PhaseEnum,
  PhaseFactory,
  PhaseNameError,
  RESERVED_PHASE_NAMES,
  phaseName,
  samePhase,
} from './phases/phase-factory';
export type { PhaseRef } from './phases/phase-factory';
export { PhaseRule } from './phases/phase-rule';
export type { PhaseRuleInit } from './phases/phase-rule';

export { ControlPolicy } from './policies/control-policy';
export type { ControlDecision, ControlPolicyInit } from './policies/control-policy';
export { TransitionPolicy } from './policies/transition-policy';
export type { TransitionPolicyInit } from './policies/transition-policy';

export { defineAction, fail, succeed } from './procedures/action';
export type { Action, ActionContext, ActionResult } from './procedures/action';
export { ProcedureTemplate } from './procedures/procedure-template';
export type { ProcedureTemplateInit } from './procedures/procedure-template';

export { AgentSpec, validateAgentSpec } from './spec/agent-spec';
export type { AgentSpecInit } from './spec/agent-spec';
export { SpecValidationError } from './spec/spec-issue';
export type { SpecIssue } from './spec/spec-issue';
export { validateFactScopes } from './spec/fact-scope-validator';
export type { FactScopeIssue } from './spec/fact-scope-validator';
export { findRuleOverlaps, isSatisfiable, subsumes } from './spec/rule-overlap';

export { IterationState } from './state/iteration-state';
export type { FactSnapshot } from './state/iteration-state';
export { createIterationFacts } from './state/iteration-facts';
export type { IterationFacts } from './state/iteration-facts';
export { deserializeIterationFacts, serializeIterationFacts } from './state/serialization';
export type { SerializedIterationFacts } from './state/serialization';
export type { SessionKey, StateStore } from './state/state-store';
export { InMemoryStateStore } from './state/in-memory-state-store';
export { FileSystemStateStore } from './state/file-system-state-store';
export type { FileSystemStateStoreOptions } from './state/file-system-state-store';
export { SqliteStateStore } from './state/sqlite-state-store';
export type { SqliteStateStoreOptions } from './state/sqlite-state-store';
export { createStateStore } from './state/create-state-store';

export {
  TELEMETRY_EVENT_LEVELS,
  emitTelemetry,
  getTelemetryLevel,
  registerTelemetryHandler,
  setTelemetryLevel,
} from './telemetry/telemetry';
export type {
  TelemetryEvent,
  TelemetryEventLevel,
  TelemetryEventType,
  TelemetryHandler,
} from './telemetry/telemetry';
