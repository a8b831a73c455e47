import { SpecError } from '../errors/spec-error';

const PHASE_NAME_PATTERN = /^[A-Z][A-Z0-9_]*$/;

export const RESERVED_PHASE_NAMES: ReadonlySet<string> = new Set([
  'NONE',
  'ANY',
  'ALL',
  'DEFAULT',
  'UNKNOWN',
  'TRUE',
  'FALSE',
  'NULL',
]);

/**
 * Raised when a phase set cannot be built. `problems` holds one line per
 * offending name.
 */
export class PhaseNameError extends SpecError {
  readonly problems: readonly string[];

  constructor(problems: string[]) {
    super(`Invalid phase names:\n  - ${problems.join('\n  - ')}`, {
      code: 'SPEC_INVALID_PHASE_NAME',
      context: { data: { problems } },
    });
    this.problems = problems;
  }
}

/**
 * One member of a {@link PhaseEnum}. Within a process phases compare by
 * identity; after a storage round trip only `name` survives.
 */
export class Phase<N extends string = string> {
  constructor(
    readonly name: N,
    readonly ordinal: number,
    readonly family: PhaseEnum<N>
  ) {
    Object.freeze(this);
  }

  toString(): string {
    return this.name;
  }

  toJSON(): string {
    return this.name;
  }
}

/**
 * Closed, ordered set of phases owned by one agent specification.
 */
export class PhaseEnum<N extends string = string> implements Iterable<Phase<N>> {
  readonly members: readonly Phase<N>[];
  private readonly byName: ReadonlyMap<string, Phase<N>>;

  /** Use {@link PhaseFactory}; names are assumed valid here. */
  constructor(
    readonly enumName: string,
    names: readonly N[]
  ) {
    this.members = Object.freeze(names.map((name, index) => new Phase(name, index + 1, this)));
    this.byName = new Map(this.members.map((phase) => [phase.name, phase]));
    Object.freeze(this);
  }

  get names(): N[] {
    return this.members.map((phase) => phase.name);
  }

  of(name: N): Phase<N> {
    const phase = this.byName.get(name);
    if (!phase) {
      throw new SpecError(`Unknown phase '${name}' in ${this.enumName}`, {
        code: 'SPEC_DANGLING_PHASE',
        context: { data: { phase: name, enumName: this.enumName } },
      });
    }
    return phase;
  }

  lookup(name: string): Phase<N> | undefined {
    return this.byName.get(name);
  }

  has(phase: unknown): phase is Phase<N> {
    return phase instanceof Phase && this.byName.get(phase.name) === phase;
  }

  [Symbol.iterator](): Iterator<Phase<N>> {
    return this.members[Symbol.iterator]();
  }
}

/**
 * Accepts both a live phase and the bare name read back from storage.
 */
export type PhaseRef = Phase | string;

export function phaseName(phase: PhaseRef): string {
  return typeof phase === 'string' ? phase : phase.name;
}

export function samePhase(a: PhaseRef, b: PhaseRef): boolean {
  return phaseName(a) === phaseName(b);
}

function collectProblems(names: readonly unknown[]): string[] {
  if (names.length === 0) {
    return ['At least one phase name is required'];
  }

  const problems: string[] = [];
  const seen = new Set<string>();
  for (const name of names) {
    if (typeof name !== 'string') {
      problems.push(`Phase name must be a string, got ${typeof name}: ${String(name)}`);
      continue;
    }
    if (!PHASE_NAME_PATTERN.test(name)) {
      problems.push(
        `Invalid phase name: '${name}' (must be UPPER_SNAKE_CASE, e.g. 'READY_TO_CONTINUE')`
      );
      continue;
    }
    if (RESERVED_PHASE_NAMES.has(name)) {
      problems.push(
        `Reserved phase name: '${name}' (cannot use: ${Array.from(RESERVED_PHASE_NAMES).sort().join(', ')})`
      );
      continue;
    }
    if (seen.has(name)) {
      problems.push(`Duplicate phase name: '${name}'`);
      continue;
    }
    seen.add(name);
  }
  return problems;
}

export class PhaseFactory {
  /**
   * Build a phase set in the given order.
   *
   * @throws PhaseNameError listing every invalid, reserved or duplicated name
   */
  static create<N extends string>(...names: N[]): PhaseEnum<N> {
    return PhaseFactory.fromList(names);
  }

  static fromList<N extends string>(names: readonly N[], enumName = 'Phase'): PhaseEnum<N> {
    const problems = collectProblems(names);
    if (problems.length > 0) {
      throw new PhaseNameError(problems);
    }
    return new PhaseEnum(enumName, names);
  }

  /**
   * Build a phase set from unordered names. Members are sorted first so the
   * resulting order does not depend on iteration order of the input.
   */
  static fromSet<N extends string>(names: Iterable<N>, enumName = 'Phase'): PhaseEnum<N> {
    const sorted = Array.from(names).sort();
    return PhaseFactory.fromList(sorted, enumName);
  }

  static validate(names: readonly unknown[]): boolean {
    return collectProblems(names).length === 0;
  }
}
