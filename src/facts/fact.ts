import { ValidationError } from '../errors/validation-error';
import { normalizeValidationError } from '../validation/errors';
import { serializedFactSchema } from './schemas';
import {
  FACT_KEY_SEPARATOR,
  Fact,
  FactKind,
  FactScope,
  FactValue,
  SerializedFact,
  isFactKind,
  isFactScope,
  isFactValue,
} from './types';

/**
 * Create an immutable fact. The scope is mandatory: there is no default
 * lifetime for knowledge.
 */
export function createFact(
  key: string,
  value: FactValue,
  scope: FactScope,
  kind: FactKind = 'knowledge'
): Fact {
  if (typeof key !== 'string' || key.trim().length === 0) {
    throw new ValidationError('Fact key must be a non-empty string', {
      context: { data: { key: String(key) } },
    });
  }
  if (key.includes(FACT_KEY_SEPARATOR)) {
    throw new ValidationError(
      `Fact key '${key}' must not contain '${FACT_KEY_SEPARATOR}'; group related facts with a nested EmissionSpec`,
      { context: { data: { key } } }
    );
  }
  if (!isFactScope(scope)) {
    throw new ValidationError(
      `Fact '${key}' has invalid scope '${String(scope)}' (expected iteration, session or persistent)`,
      { context: { data: { key } } }
    );
  }
  if (!isFactKind(kind)) {
    throw new ValidationError(`Fact '${key}' has invalid kind '${String(kind)}'`, {
      context: { data: { key } },
    });
  }
  if (!isFactValue(value)) {
    throw new ValidationError(
      `Fact '${key}' has a value that is not a string, finite number, boolean, record or single-kind list`,
      { code: 'EMISSION_INVALID_VALUE', context: { data: { key } } }
    );
  }

  return Object.freeze({ key, value: freezeValue(value), scope, kind });
}

function freezeValue(value: FactValue): FactValue {
  if (Array.isArray(value)) {
    const items = value.map(freezeValue);
    Object.freeze(items);
    return items;
  }
  if (typeof value === 'object') {
    const copy: { [key: string]: FactValue } = {};
    for (const [key, item] of Object.entries(value)) {
      copy[key] = freezeValue(item);
    }
    Object.freeze(copy);
    return copy;
  }
  return value;
}

export function serializeFact(fact: Fact): SerializedFact {
  return {
    key: fact.key,
    value: fact.value,
    scope: fact.scope,
    kind: fact.kind,
  };
}

export function deserializeFact(data: unknown): Fact {
  const parsed = serializedFactSchema.safeParse(data);
  if (!parsed.success) {
    throw normalizeValidationError(parsed.error, 'Invalid serialized fact');
  }
  return createFact(parsed.data.key, parsed.data.value, parsed.data.scope, parsed.data.kind);
}
