import { Phase } from '../phases/phase-factory';
import { PhaseRule } from '../phases/phase-rule';

export interface TransitionPolicyInit<N extends string = string> {
  rules: readonly PhaseRule<N>[];
  default: Phase<N>;
}

/**
 * Ordered phase rules plus the phase used when none of them match.
 */
export class TransitionPolicy<N extends string = string> {
  readonly rules: readonly PhaseRule<N>[];
  readonly default: Phase<N>;

  constructor(init: TransitionPolicyInit<N>) {
    this.rules = Object.freeze([...init.rules]);
    this.default = init.default;
    Object.freeze(this);
  }

  /**
   * Phase selected by the first matching rule in declared order, or the
   * default. Depends only on the set of keys.
   */
  derivePhase(keys: Iterable<string>): Phase<N> {
    const present = new Set(keys);
    const rule = this.rules.find((candidate) => candidate.matches(present));
    return rule ? rule.enter : this.default;
  }

  /**
   * Every phase this policy can select.
   */
  phases(): Phase<N>[] {
    return [...this.rules.map((rule) => rule.enter), this.default];
  }
}
