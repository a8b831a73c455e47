import { ValidationError } from '../errors/validation-error';

export interface ControlPolicyInit {
  requiredStateKeys?: Iterable<string>;
  userRequiredKeys?: Iterable<string>;
  completionKeys?: Iterable<string>;
  failureKeys?: Iterable<string>;
}

export type ControlKeySet =
  | 'requiredStateKeys'
  | 'userRequiredKeys'
  | 'completionKeys'
  | 'failureKeys';

export type ControlDecision =
  | { kind: 'failure'; keys: string[] }
  | { kind: 'needs_context'; missing: string[] }
  | { kind: 'needs_input'; missing: string[] }
  | { kind: 'completion'; keys: string[] }
  | { kind: 'proceed' };

/**
 * Phase-independent preemption rules checked before any procedure runs.
 */
export class ControlPolicy {
  readonly requiredStateKeys: ReadonlySet<string>;
  readonly userRequiredKeys: ReadonlySet<string>;
  readonly completionKeys: ReadonlySet<string>;
  readonly failureKeys: ReadonlySet<string>;

  constructor(init: ControlPolicyInit = {}) {
    this.requiredStateKeys = new Set(init.requiredStateKeys ?? []);
    this.userRequiredKeys = new Set(init.userRequiredKeys ?? []);
    this.completionKeys = new Set(init.completionKeys ?? []);
    this.failureKeys = new Set(init.failureKeys ?? []);

    for (const [name, keys] of this.keySets()) {
      for (const key of keys) {
        if (typeof key !== 'string' || key.length === 0) {
          throw new ValidationError(`ControlPolicy.${name} contains an empty key`);
        }
      }
    }
    Object.freeze(this);
  }

  /**
   * Checked in order: failure, required state, user input, completion.
   * The first one that fires wins.
   */
  evaluate(keys: Iterable<string>): ControlDecision {
    const present = new Set(keys);

    const failed = sorted(this.failureKeys).filter((key) => present.has(key));
    if (failed.length > 0) {
      return { kind: 'failure', keys: failed };
    }

    const missingState = sorted(this.requiredStateKeys).filter((key) => !present.has(key));
    if (missingState.length > 0) {
      return { kind: 'needs_context', missing: missingState };
    }

    const missingInput = sorted(this.userRequiredKeys).filter((key) => !present.has(key));
    if (missingInput.length > 0) {
      return { kind: 'needs_input', missing: missingInput };
    }

    const completed = sorted(this.completionKeys).filter((key) => present.has(key));
    if (completed.length > 0) {
      return { kind: 'completion', keys: completed };
    }

    return { kind: 'proceed' };
  }

  keySets(): Array<[ControlKeySet, ReadonlySet<string>]> {
    return [
      ['completionKeys', this.completionKeys],
      ['failureKeys', this.failureKeys],
      ['requiredStateKeys', this.requiredStateKeys],
      ['userRequiredKeys', this.userRequiredKeys],
    ];
  }
}

function sorted(keys: ReadonlySet<string>): string[] {
  return Array.from(keys).sort();
}
