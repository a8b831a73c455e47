import { Facts } from '../facts/facts';
import { PhaseRef } from '../phases/phase-factory';

/**
 * Audit record of one iteration: which action emitted which facts. `phase`
 * is the live phase in memory and only its name once read back from a
 * store.
 */
export interface IterationFacts {
  readonly iteration: number;
  readonly phase: PhaseRef;
  readonly timestamp: Date;
  readonly byAction: ReadonlyMap<string, Facts>;
}

export interface IterationFactsInit {
  iteration: number;
  phase: PhaseRef;
  timestamp: Date;
  byAction?: Iterable<[string, Facts]> | Record<string, Facts>;
}

function isEntryIterable(
  value: Iterable<[string, Facts]> | Record<string, Facts>
): value is Iterable<[string, Facts]> {
  return Symbol.iterator in value;
}

function toEntries(
  byAction: Iterable<[string, Facts]> | Record<string, Facts>
): Array<[string, Facts]> {
  return isEntryIterable(byAction) ? Array.from(byAction) : Object.entries(byAction);
}

export function createIterationFacts(init: IterationFactsInit): IterationFacts {
  return Object.freeze({
    iteration: init.iteration,
    phase: init.phase,
    timestamp: init.timestamp,
    byAction: new Map(init.byAction ? toEntries(init.byAction) : []),
  });
}

/**
 * A terminal audit record carries no action output.
 */
export function isTerminalRecord(record: IterationFacts): boolean {
  return record.byAction.size === 0;
}
