import { BootstrapConfig } from '../config/bootstrap-config';
import { ValidationError } from '../errors/validation-error';
import { EmissionSpec } from '../facts/emission';
import { Facts } from '../facts/facts';
import { Phase } from '../phases/phase-factory';
import { FactSnapshot } from '../state/iteration-state';

/**
 * Iteration metadata handed to every action next to the fact snapshot.
 */
export interface ActionContext {
  readonly agentId: string;
  readonly sessionId: string;
  readonly iteration: number;
  readonly phase: Phase;
  readonly startedAt: Date;
  readonly config: Readonly<BootstrapConfig>;
}

export type ActionResult = { ok: true; facts: Facts } | { ok: false; error: string | Error };

/**
 * Unit of work run by a procedure. Facts should be produced through
 * `emits.build(...)`; what comes back is checked against `emits` before it
 * is applied.
 */
export interface Action {
  readonly name: string;
  readonly emits?: EmissionSpec;
  execute(snapshot: FactSnapshot, context: ActionContext): ActionResult | Promise<ActionResult>;
}

export function succeed(facts: Facts = Facts.empty()): ActionResult {
  return { ok: true, facts };
}

export function fail(error: string | Error): ActionResult {
  return { ok: false, error };
}

export function defineAction(definition: Action): Action {
  if (typeof definition.name !== 'string' || definition.name.trim().length === 0) {
    throw new ValidationError('Action name must be a non-empty string');
  }
  if (typeof definition.execute !== 'function') {
    throw new ValidationError(`Action '${definition.name}' must provide an execute function`, {
      context: { data: { action: definition.name } },
    });
  }
  return Object.freeze({ ...definition });
}
