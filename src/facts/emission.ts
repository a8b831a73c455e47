import { ValidationError } from '../errors/validation-error';
import { createFact } from './fact';
import { Facts, FactsEntry } from './facts';
import {
  FACT_KEY_SEPARATOR,
  FactKind,
  FactScope,
  isFactKind,
  isFactScope,
  isFactValue,
  isPlainRecord,
} from './types';

export interface EmissionOptions {
  required?: boolean;
}

/**
 * Declared contract for one emitted fact.
 */
export class Emission {
  readonly required: boolean;

  constructor(
    readonly scope: FactScope,
    readonly kind: FactKind = 'knowledge',
    options: EmissionOptions = {}
  ) {
    if (!isFactScope(scope)) {
      throw new ValidationError(`Emission scope '${String(scope)}' is not a fact scope`);
    }
    if (!isFactKind(kind)) {
      throw new ValidationError(`Emission kind '${String(kind)}' is not a fact kind`);
    }
    this.required = options.required ?? true;
    Object.freeze(this);
  }

  toString(): string {
    return `${this.kind}@${this.scope}${this.required ? '' : '?'}`;
  }
}

export function emission(
  scope: FactScope,
  kind: FactKind = 'knowledge',
  options: EmissionOptions = {}
): Emission {
  return new Emission(scope, kind, options);
}

export type EmissionShape = Record<string, Emission | EmissionSpec>;

/**
 * Raw values accepted by {@link EmissionSpec.build}; a nested spec takes a
 * nested record.
 */
export type EmissionValues = Record<string, unknown>;

/**
 * Schema of everything an action may emit. `build` is the only way raw
 * values become facts, so the scope and kind of every produced fact come
 * from the declaration.
 */
export class EmissionSpec {
  private readonly shape: ReadonlyMap<string, Emission | EmissionSpec>;

  constructor(shape: EmissionShape) {
    const entries = new Map<string, Emission | EmissionSpec>();
    for (const [key, declaration] of Object.entries(shape)) {
      if (key.length === 0 || key.includes(FACT_KEY_SEPARATOR)) {
        throw new ValidationError(
          `Emission key '${key}' must be non-empty and must not contain '${FACT_KEY_SEPARATOR}'`,
          { context: { data: { key } } }
        );
      }
      if (!(declaration instanceof Emission) && !(declaration instanceof EmissionSpec)) {
        throw new ValidationError(`Emission '${key}' must be an Emission or a nested EmissionSpec`, {
          context: { data: { key } },
        });
      }
      entries.set(key, declaration);
    }
    this.shape = entries;
    Object.freeze(this);
  }

  build(values: EmissionValues, prefix = ''): Facts {
    for (const key of Object.keys(values)) {
      if (!this.shape.has(key)) {
        const qualified = qualify(prefix, key);
        throw new ValidationError(
          `Undeclared emission '${qualified}' (declared: ${this.declaredList(prefix)})`,
          { code: 'EMISSION_UNDECLARED_KEY', context: { data: { key: qualified } } }
        );
      }
    }

    const entries: Array<[string, FactsEntry]> = [];
    for (const [key, declaration] of this.shape) {
      const qualified = qualify(prefix, key);
      const raw = values[key];

      if (raw === undefined) {
        if (declaration instanceof Emission && !declaration.required) {
          continue;
        }
        throw new ValidationError(`Missing required emission '${qualified}'`, {
          code: 'EMISSION_MISSING_KEY',
          context: { data: { key: qualified } },
        });
      }

      if (declaration instanceof EmissionSpec) {
        if (!isPlainRecord(raw)) {
          throw new ValidationError(`Emission group '${qualified}' expects a record of values`, {
            code: 'EMISSION_INVALID_VALUE',
            context: { data: { key: qualified } },
          });
        }
        entries.push([key, declaration.build(raw, qualified)]);
        continue;
      }

      if (!isFactValue(raw)) {
        throw new ValidationError(
          `Emission '${qualified}' has a value that is not a string, finite number, boolean, record or single-kind list`,
          { code: 'EMISSION_INVALID_VALUE', context: { data: { key: qualified } } }
        );
      }
      entries.push([key, createFact(key, raw, declaration.scope, declaration.kind)]);
    }

    return Facts.fromEntries(entries);
  }

  /**
   * Flattened view: fully qualified key to its declaration.
   */
  toDict(): Record<string, Emission> {
    const result: Record<string, Emission> = {};
    this.collect('', result);
    return result;
  }

  keys(): string[] {
    return Object.keys(this.toDict());
  }

  private collect(prefix: string, into: Record<string, Emission>): void {
    for (const [key, declaration] of this.shape) {
      const qualified = qualify(prefix, key);
      if (declaration instanceof EmissionSpec) {
        declaration.collect(qualified, into);
      } else {
        into[qualified] = declaration;
      }
    }
  }

  private declaredList(prefix: string): string {
    const keys = Array.from(this.shape.keys()).map((key) => qualify(prefix, key));
    return keys.length > 0 ? keys.join(', ') : 'none';
  }
}

function qualify(prefix: string, key: string): string {
  return prefix ? `${prefix}${FACT_KEY_SEPARATOR}${key}` : key;
}

export type EmissionDriftProblem =
  | 'undeclared'
  | 'scope_mismatch'
  | 'kind_mismatch'
  | 'missing';

export interface EmissionDrift {
  key: string;
  problem: EmissionDriftProblem;
  /** `missing` is a warning; every other problem fails the action. */
  severity: 'error' | 'warning';
  message: string;
}

/**
 * Compare what an action produced against what it declared.
 */
export function checkEmissionDrift(spec: EmissionSpec, facts: Facts): EmissionDrift[] {
  const declared = spec.toDict();
  const drift: EmissionDrift[] = [];

  for (const [key, fact] of facts.entries()) {
    const declaration = declared[key];
    if (!declaration) {
      drift.push({
        key,
        problem: 'undeclared',
        severity: 'error',
        message: `Emitted '${key}' without declaring it`,
      });
      continue;
    }
    if (declaration.scope !== fact.scope) {
      drift.push({
        key,
        problem: 'scope_mismatch',
        severity: 'error',
        message: `Declared '${key}' with scope '${declaration.scope}' but emitted scope '${fact.scope}'`,
      });
    }
    if (declaration.kind !== fact.kind) {
      drift.push({
        key,
        problem: 'kind_mismatch',
        severity: 'error',
        message: `Declared '${key}' with kind '${declaration.kind}' but emitted kind '${fact.kind}'`,
      });
    }
  }

  for (const [key, declaration] of Object.entries(declared)) {
    if (declaration.required && !facts.has(key)) {
      drift.push({
        key,
        problem: 'missing',
        severity: 'warning',
        message: `Declared '${key}' but did not emit it`,
      });
    }
  }

  return drift;
}
