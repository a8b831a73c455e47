import { ExecutionError } from '../errors/execution-error';
import { Phase } from '../phases/phase-factory';
import { IterationFacts } from '../state/iteration-facts';

export type PauseReason = 'required_state' | 'user_input';

export interface AdvancedOutcome<N extends string = string> {
  status: 'advanced';
  iteration: number;
  phase: Phase<N>;
  nextPhase: Phase<N>;
  record: IterationFacts;
}

export interface PausedOutcome<N extends string = string> {
  status: 'paused';
  phase: Phase<N>;
  reason: PauseReason;
  missingKeys: string[];
}

export interface CompletedOutcome<N extends string = string> {
  status: 'completed';
  phase: Phase<N>;
  keys: string[];
}

export interface FailureKeysOutcome<N extends string = string> {
  status: 'failed';
  phase: Phase<N>;
  reason: 'failure_keys';
  keys: string[];
  retryable: false;
}

/**
 * Durable state did not advance, so re-running the iteration is safe.
 */
export interface ActionFailedOutcome<N extends string = string> {
  status: 'failed';
  phase: Phase<N>;
  reason: 'action_failed';
  action: string;
  error: ExecutionError;
  retryable: true;
}

export interface StalledOutcome<N extends string = string> {
  status: 'stalled';
  phase: Phase<N>;
  iteration: number;
  durableHash: string;
}

export type IterationOutcome<N extends string = string> =
  | AdvancedOutcome<N>
  | PausedOutcome<N>
  | CompletedOutcome<N>
  | FailureKeysOutcome<N>
  | ActionFailedOutcome<N>
  | StalledOutcome<N>;

export type IterationStatus = IterationOutcome['status'];

export function describeOutcome(outcome: IterationOutcome): string {
  switch (outcome.status) {
    case 'advanced':
      return `advanced ${outcome.phase.name} -> ${outcome.nextPhase.name} (iteration ${outcome.iteration})`;
    case 'paused':
      return `paused in ${outcome.phase.name}: ${outcome.reason} missing ${outcome.missingKeys.join(', ')}`;
    case 'completed':
      return `completed in ${outcome.phase.name} (${outcome.keys.join(', ')})`;
    case 'failed':
      return outcome.reason === 'failure_keys'
        ? `failed in ${outcome.phase.name}: failure keys ${outcome.keys.join(', ')}`
        : `failed in ${outcome.phase.name}: action ${outcome.action}: ${outcome.error.message}`;
    case 'stalled':
      return `stalled in ${outcome.phase.name} (iteration ${outcome.iteration})`;
  }
}
