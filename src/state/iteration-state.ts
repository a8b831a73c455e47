import { Facts } from '../facts/facts';
import { ValidationError } from '../errors/validation-error';
import { Fact, FactValue, isDurableScope, isNestedUnder } from '../facts/types';

/**
 * Read-only view of the facts visible to an action.
 */
export interface FactSnapshot {
  get(key: string): Fact | undefined;
  has(key: string): boolean;
  value(key: string): FactValue | undefined;
  keys(): string[];
  toFacts(): Facts;
}

/**
 * Working memory of one in-flight iteration. Starts from the durable facts
 * loaded for the session and eagerly absorbs whatever each action emits.
 * Iteration-scoped facts shadow durable facts with the same key and vanish
 * when the iteration ends.
 */
export class IterationState implements FactSnapshot {
  private readonly durableFacts = new Map<string, Fact>();
  private readonly iterationFacts = new Map<string, Fact>();

  constructor(base: Facts = Facts.empty()) {
    for (const [key, fact] of base.entries()) {
      if (isDurableScope(fact.scope)) {
        this.durableFacts.set(key, fact);
      }
    }
  }

  /**
   * Drop every iteration-scoped fact.
   */
  beginIteration(): void {
    this.iterationFacts.clear();
  }

  /**
   * Absorb emitted facts. Nothing is applied when any of them would turn an
   * existing fact into a group, or an existing group into a fact.
   *
   * @throws ValidationError `FACT_KEY_CLASH`
   */
  apply(facts: Facts): void {
    const existing = this.keys();
    for (const key of facts.keys()) {
      const clash = existing.find((other) => isNestedUnder(key, other) || isNestedUnder(other, key));
      if (clash !== undefined) {
        throw new ValidationError(
          `Fact '${key}' clashes with '${clash}': a key cannot be both a fact and a group`,
          { code: 'FACT_KEY_CLASH', context: { data: { key, clash } } }
        );
      }
    }

    for (const [key, fact] of facts.entries()) {
      if (isDurableScope(fact.scope)) {
        this.iterationFacts.delete(key);
        this.durableFacts.set(key, fact);
      } else {
        this.iterationFacts.set(key, fact);
      }
    }
  }

  get(key: string): Fact | undefined {
    return this.iterationFacts.get(key) ?? this.durableFacts.get(key);
  }

  has(key: string): boolean {
    return this.iterationFacts.has(key) || this.durableFacts.has(key);
  }

  value(key: string): FactValue | undefined {
    return this.get(key)?.value;
  }

  keys(): string[] {
    return Array.from(new Set([...this.durableFacts.keys(), ...this.iterationFacts.keys()]));
  }

  toFacts(): Facts {
    const merged = new Map(this.durableFacts);
    for (const [key, fact] of this.iterationFacts) {
      merged.set(key, fact);
    }
    return Facts.unflatten(merged);
  }

  /**
   * Facts eligible for persistence at the end of the iteration.
   */
  durable(): Facts {
    return Facts.unflatten(this.durableFacts);
  }
}
