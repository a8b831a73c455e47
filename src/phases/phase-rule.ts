import { Phase } from './phase-factory';

export interface PhaseRuleInit<N extends string = string> {
  enter: Phase<N>;
  whenAll?: Iterable<string>;
  whenAny?: Iterable<string>;
  whenNone?: Iterable<string>;
}

function keySet(keys: Iterable<string> | undefined): ReadonlySet<string> {
  return new Set(keys ?? []);
}

function toKeySet(keys: Iterable<string>): ReadonlySet<string> {
  return keys instanceof Set ? keys : new Set(keys);
}

/**
 * Declarative condition for entering a phase, evaluated against the set of
 * durable fact keys. Key order never matters.
 */
export class PhaseRule<N extends string = string> {
  readonly enter: Phase<N>;
  readonly whenAll: ReadonlySet<string>;
  readonly whenAny: ReadonlySet<string>;
  readonly whenNone: ReadonlySet<string>;

  constructor(init: PhaseRuleInit<N>) {
    this.enter = init.enter;
    this.whenAll = keySet(init.whenAll);
    this.whenAny = keySet(init.whenAny);
    this.whenNone = keySet(init.whenNone);
    Object.freeze(this);
  }

  matches(keys: Iterable<string>): boolean {
    const present = toKeySet(keys);

    for (const key of this.whenAll) {
      if (!present.has(key)) {
        return false;
      }
    }

    if (this.whenAny.size > 0 && !Array.from(this.whenAny).some((key) => present.has(key))) {
      return false;
    }

    for (const key of this.whenNone) {
      if (present.has(key)) {
        return false;
      }
    }

    return true;
  }

  /**
   * Every key the rule looks at, with the clause that references it.
   */
  references(): Array<{ key: string; clause: 'whenAll' | 'whenAny' | 'whenNone' }> {
    return [
      ...Array.from(this.whenAll, (key) => ({ key, clause: 'whenAll' as const })),
      ...Array.from(this.whenAny, (key) => ({ key, clause: 'whenAny' as const })),
      ...Array.from(this.whenNone, (key) => ({ key, clause: 'whenNone' as const })),
    ];
  }

  /**
   * Human readable condition, e.g. `all(a, b) & none(c)`.
   */
  describeCondition(): string {
    const parts: string[] = [];
    if (this.whenAll.size > 0) {
      parts.push(`all(${Array.from(this.whenAll).join(', ')})`);
    }
    if (this.whenAny.size > 0) {
      parts.push(`any(${Array.from(this.whenAny).join(', ')})`);
    }
    if (this.whenNone.size > 0) {
      parts.push(`none(${Array.from(this.whenNone).join(', ')})`);
    }
    return parts.length > 0 ? parts.join(' & ') : 'always';
  }

  toString(): string {
    return `PhaseRule(enter=${this.enter.name})`;
  }
}
