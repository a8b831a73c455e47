import { BootstrapConfig, seedFacts } from '../config/bootstrap-config';
import { ExecutionError } from '../errors/execution-error';
import { ErrorLogger } from '../errors/logger';
import { ErrorContext } from '../errors/types';
import { errorMessage } from '../errors/utils';
import { checkEmissionDrift } from '../facts/emission';
import { Facts } from '../facts/facts';
import { Phase, samePhase } from '../phases/phase-factory';
import { Action, ActionContext, ActionResult } from '../procedures/action';
import { AgentSpec } from '../spec/agent-spec';
import { IterationFacts, createIterationFacts, isTerminalRecord } from '../state/iteration-facts';
import { IterationState } from '../state/iteration-state';
import { SessionKey, StateStore, assertSessionKey } from '../state/state-store';
import { emitTelemetry } from '../telemetry/telemetry';
import { ensurePositiveInteger } from '../validation/common';
import { durableHash } from './durable-hash';
import { IterationOutcome } from './outcomes';

const DEFAULT_MAX_ITERATIONS = 100;

export interface AgentControllerOptions<N extends string = string> {
  spec: AgentSpec<N>;
  store: StateStore;
  clock?: () => Date;
  logger?: ErrorLogger;
  /** Handed to every action as `context.config`. */
  config?: BootstrapConfig;
  /** Default cap for {@link AgentController.run}. */
  maxIterations?: number;
}

export interface RunOptions {
  maxIterations?: number;
}

type ActionStep =
  | { ok: true; facts: Facts }
  | { ok: false; error: ExecutionError };

/**
 * Drives an agent one iteration at a time. Holds no per-session state:
 * everything is loaded from the store on each call, so a session can be
 * resumed by any controller built from the same spec.
 */
export class AgentController<N extends string = string> {
  private readonly spec: AgentSpec<N>;
  private readonly store: StateStore;
  private readonly clock: () => Date;
  private readonly logger: ErrorLogger;
  private readonly config: Readonly<BootstrapConfig>;
  private readonly maxIterations: number;

  constructor(options: AgentControllerOptions<N>) {
    this.spec = options.spec;
    this.store = options.store;
    this.clock = options.clock ?? (() => new Date());
    this.logger = options.logger ?? new ErrorLogger();
    const config: BootstrapConfig = options.config ?? {};
    this.config = Object.freeze({ ...config });
    this.maxIterations = ensurePositiveInteger(
      options.maxIterations ?? DEFAULT_MAX_ITERATIONS,
      'maxIterations'
    );
  }

  /**
   * Seed a fresh session from a bootstrap config. Does nothing for a
   * session that already has state.
   */
  async bootstrap(key: SessionKey, config: BootstrapConfig = this.config): Promise<void> {
    await this.store.bootstrap(assertSessionKey(key), seedFacts(config));
  }

  async currentPhase(key: SessionKey): Promise<Phase<N>> {
    const facts = await this.store.load(assertSessionKey(key));
    return this.spec.derivePhase(facts.durable().keys());
  }

  async runIteration(rawKey: SessionKey): Promise<IterationOutcome<N>> {
    const key = assertSessionKey(rawKey);
    const loaded = (await this.store.load(key)).durable();
    const keys = loaded.keys();
    const phase = this.spec.derivePhase(keys);
    const decision = this.spec.controlPolicy.evaluate(keys);
    const session = { agentId: key.agentId, sessionId: key.sessionId, phase: phase.name };

    switch (decision.kind) {
      case 'failure':
        await this.recordTerminal(key, phase, loaded);
        emitTelemetry({ type: 'session_failed', ...session, keys: decision.keys });
        return { status: 'failed', phase, reason: 'failure_keys', keys: decision.keys, retryable: false };
      case 'needs_context':
        emitTelemetry({
          type: 'session_paused',
          ...session,
          reason: 'required_state',
          missingKeys: decision.missing,
        });
        return { status: 'paused', phase, reason: 'required_state', missingKeys: decision.missing };
      case 'needs_input':
        emitTelemetry({
          type: 'session_paused',
          ...session,
          reason: 'user_input',
          missingKeys: decision.missing,
        });
        return { status: 'paused', phase, reason: 'user_input', missingKeys: decision.missing };
      case 'completion':
        await this.recordTerminal(key, phase, loaded);
        emitTelemetry({ type: 'session_completed', ...session, keys: decision.keys });
        return { status: 'completed', phase, keys: decision.keys };
      case 'proceed':
        return this.runProcedure(key, phase, loaded);
    }
  }

  /**
   * Call {@link runIteration} until it returns anything other than
   * `advanced`.
   *
   * @throws ExecutionError `CONTROLLER_MAX_ITERATIONS` when the cap is hit
   */
  async run(key: SessionKey, options: RunOptions = {}): Promise<IterationOutcome<N>> {
    const limit = ensurePositiveInteger(options.maxIterations ?? this.maxIterations, 'maxIterations');
    for (let count = 0; count < limit; count += 1) {
      const outcome = await this.runIteration(key);
      if (outcome.status !== 'advanced') {
        return outcome;
      }
    }
    throw new ExecutionError(`Agent '${this.spec.name}' did not settle within ${limit} iterations`, {
      code: 'CONTROLLER_MAX_ITERATIONS',
      context: {
        agentId: key.agentId,
        sessionId: key.sessionId,
        module: 'controller',
        operation: 'run',
        data: { maxIterations: limit },
      },
    });
  }

  private async runProcedure(
    key: SessionKey,
    phase: Phase<N>,
    loaded: Facts
  ): Promise<IterationOutcome<N>> {
    const iteration = await this.nextIteration(key);
    const session = { agentId: key.agentId, sessionId: key.sessionId, phase: phase.name, iteration };
    const procedure = this.spec.procedureFor(phase);
    if (!procedure) {
      emitTelemetry({ type: 'procedure_missing', ...session });
    }

    const state = new IterationState(loaded);
    state.beginIteration();
    const startHash = durableHash(loaded);
    const context: ActionContext = Object.freeze({
      agentId: key.agentId,
      sessionId: key.sessionId,
      iteration,
      phase,
      startedAt: this.clock(),
      config: this.config,
    });

    emitTelemetry({ type: 'iteration_started', ...session });

    const byAction: Array<[string, Facts]> = [];
    for (const action of procedure?.actions ?? []) {
      const step = await this.runAction(action, state, context);
      if (!step.ok) {
        emitTelemetry({ type: 'action_failed', ...session, action: action.name, code: step.error.code });
        return {
          status: 'failed',
          phase,
          reason: 'action_failed',
          action: action.name,
          error: step.error,
          retryable: true,
        };
      }
      byAction.push([action.name, step.facts]);
    }

    const durable = state.durable();
    const endHash = durableHash(durable);
    const nextPhase = this.spec.derivePhase(durable.keys());

    if (endHash === startHash && samePhase(nextPhase, phase)) {
      this.logger.logWarning(
        `Agent '${this.spec.name}' stalled in ${phase.name}: durable state unchanged after iteration ${iteration}`,
        { ...session, module: 'controller', operation: 'runIteration', data: { durableHash: endHash } }
      );
      emitTelemetry({ type: 'iteration_stalled', ...session, durableHash: endHash });
      return { status: 'stalled', phase, iteration, durableHash: endHash };
    }

    const record = createIterationFacts({
      iteration,
      phase,
      timestamp: this.clock(),
      byAction,
    });
    await this.store.save(key, record, durable);

    emitTelemetry({ type: 'iteration_advanced', ...session, nextPhase: nextPhase.name });
    return { status: 'advanced', iteration, phase, nextPhase, record };
  }

  /**
   * Run one action and fold its facts into `state`. Every way an action can
   * go wrong ends as a new retryable `ExecutionError`; whatever the action
   * threw is kept as its `cause` and left untouched.
   */
  private async runAction(
    action: Action,
    state: IterationState,
    context: ActionContext
  ): Promise<ActionStep> {
    const errorContext: ErrorContext = {
      agentId: context.agentId,
      sessionId: context.sessionId,
      iteration: context.iteration,
      phase: context.phase.name,
      action: action.name,
      module: 'controller',
      operation: 'runAction',
    };
    const failed = (message: string, cause?: unknown): ActionStep => {
      const error = new ExecutionError(`Action '${action.name}' ${message}`, {
        cause,
        context: errorContext,
        retryable: true,
      });
      this.logger.logError(error);
      return { ok: false, error };
    };

    let result: ActionResult;
    try {
      result = await action.execute(state, context);
    } catch (error) {
      return failed(`threw: ${errorMessage(error)}`, error);
    }

    if (!result.ok) {
      const cause = result.error;
      return typeof cause === 'string'
        ? failed(`failed: ${cause}`)
        : failed(`failed: ${cause.message}`, cause);
    }

    if (!(result.facts instanceof Facts)) {
      return failed('returned a result without Facts');
    }

    if (action.emits) {
      const drift = checkEmissionDrift(action.emits, result.facts);
      for (const warning of drift.filter((entry) => entry.severity === 'warning')) {
        this.logger.logWarning(`${action.name}: ${warning.message}`, {
          ...errorContext,
          operation: 'checkEmissionDrift',
          data: { key: warning.key },
        });
      }
      const errors = drift.filter((entry) => entry.severity === 'error');
      if (errors.length > 0) {
        return failed(`emission drift: ${errors.map((entry) => entry.message).join('; ')}`);
      }
    }

    try {
      state.apply(result.facts);
    } catch (error) {
      return failed(`emitted facts that clash with the current state: ${errorMessage(error)}`, error);
    }

    return { ok: true, facts: result.facts };
  }

  private async nextIteration(key: SessionKey): Promise<number> {
    const last = await this.lastRecord(key);
    return last ? last.iteration + 1 : 1;
  }

  private async lastRecord(key: SessionKey): Promise<IterationFacts | undefined> {
    const history = await this.store.history(key);
    return history.length > 0 ? history[history.length - 1] : undefined;
  }

  /**
   * Audit a terminal decision once. Repeated calls in the same terminal
   * phase do not add records.
   */
  private async recordTerminal(key: SessionKey, phase: Phase<N>, durable: Facts): Promise<void> {
    const last = await this.lastRecord(key);
    if (last && isTerminalRecord(last) && samePhase(last.phase, phase)) {
      return;
    }
    const record = createIterationFacts({
      iteration: last ? last.iteration + 1 : 1,
      phase,
      timestamp: this.clock(),
    });
    await this.store.save(key, record, durable);
  }
}
