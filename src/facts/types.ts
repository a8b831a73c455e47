/**
 * Lifetime of a fact.
 *
 * - `iteration`: visible until the current iteration ends, never persisted.
 * - `session`: persisted for the lifetime of one (agent, session) pair.
 * - `persistent`: persisted across sessions of the same agent.
 */
export type FactScope = 'iteration' | 'session' | 'persistent';

export const FACT_SCOPES: readonly FactScope[] = ['iteration', 'session', 'persistent'];

/**
 * Scopes that survive the end of an iteration.
 */
export type DurableScope = Exclude<FactScope, 'iteration'>;

/**
 * Representation kind of a fact. Purely descriptive; the engine never
 * branches on it.
 */
export type FactKind = 'progress' | 'authorization' | 'knowledge' | 'artifact' | 'diagnostic';

export const FACT_KINDS: readonly FactKind[] = [
  'progress',
  'authorization',
  'knowledge',
  'artifact',
  'diagnostic',
];

/**
 * Payload carried by a fact. Lists hold elements of a single kind.
 */
export type FactValue = string | number | boolean | FactValue[] | { [key: string]: FactValue };

export interface Fact {
  readonly key: string;
  readonly value: FactValue;
  readonly scope: FactScope;
  readonly kind: FactKind;
}

/**
 * Wire form of a single fact.
 */
export interface SerializedFact {
  key: string;
  value: FactValue;
  scope: FactScope;
  kind: FactKind;
}

/**
 * Separator joining a group name and a nested key (`repo.file_count`).
 */
export const FACT_KEY_SEPARATOR = '.';

/**
 * True when `key` addresses a fact inside the group `group`, at any depth.
 */
export function isNestedUnder(key: string, group: string): boolean {
  return key.startsWith(`${group}${FACT_KEY_SEPARATOR}`);
}

export function isFactScope(value: unknown): value is FactScope {
  return value === 'iteration' || value === 'session' || value === 'persistent';
}

export function isDurableScope(scope: FactScope): scope is DurableScope {
  return scope !== 'iteration';
}

export function isFactKind(value: unknown): value is FactKind {
  return typeof value === 'string' && FACT_KINDS.some((kind) => kind === value);
}

export function isPlainRecord(value: unknown): value is Record<string, unknown> {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    return false;
  }
  const proto = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

type ValueShape = 'string' | 'number' | 'boolean' | 'list' | 'record';

function shapeOf(value: unknown): ValueShape | undefined {
  if (typeof value === 'string') {
    return 'string';
  }
  if (typeof value === 'number') {
    return Number.isFinite(value) ? 'number' : undefined;
  }
  if (typeof value === 'boolean') {
    return 'boolean';
  }
  if (Array.isArray(value)) {
    return 'list';
  }
  if (isPlainRecord(value)) {
    return 'record';
  }
  return undefined;
}

/**
 * Structural check for {@link FactValue}: rejects `null`, `undefined`,
 * non-finite numbers, class instances and mixed-kind lists.
 */
export function isFactValue(value: unknown): value is FactValue {
  const shape = shapeOf(value);
  if (!shape) {
    return false;
  }
  if (Array.isArray(value)) {
    let first: ValueShape | undefined;
    for (const item of value) {
      const itemShape = shapeOf(item);
      if (!itemShape || !isFactValue(item)) {
        return false;
      }
      first = first ?? itemShape;
      if (itemShape !== first) {
        return false;
      }
    }
    return true;
  }
  if (isPlainRecord(value)) {
    return Object.values(value).every((item) => isFactValue(item));
  }
  return true;
}
