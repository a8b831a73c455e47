import { z } from 'zod';
import { StorageError } from '../errors/storage-error';
import { Facts } from '../facts/facts';
import { serializedFactsSchema } from '../facts/schemas';
import { SerializedFact } from '../facts/types';
import { phaseName } from '../phases/phase-factory';
import { formatZodIssue } from '../validation/errors';
import { IterationFacts, createIterationFacts } from './iteration-facts';

export const STATE_FORMAT_VERSION = 1;

export const serializedIterationFactsSchema = z
  .object({
    iteration: z.number().int().nonnegative(),
    phase: z.string().min(1),
    timestamp: z.string().datetime({ offset: true }),
    by_action: z.record(z.string().min(1), serializedFactsSchema).default({}),
  })
  .strict();

export type SerializedIterationFacts = {
  iteration: number;
  phase: string;
  timestamp: string;
  by_action: Record<string, Record<string, SerializedFact>>;
};

/**
 * Durable fact snapshot as written by the file-system backend.
 */
export const persistedFactsSchema = z
  .object({
    version: z.literal(STATE_FORMAT_VERSION),
    updatedAt: z.string().datetime({ offset: true }),
    facts: serializedFactsSchema,
  })
  .strict();

export type PersistedFacts = {
  version: typeof STATE_FORMAT_VERSION;
  updatedAt: string;
  facts: Record<string, SerializedFact>;
};

export function serializeIterationFacts(record: IterationFacts): SerializedIterationFacts {
  const byAction: Record<string, Record<string, SerializedFact>> = {};
  for (const [action, facts] of record.byAction) {
    byAction[action] = facts.serialize();
  }
  return {
    iteration: record.iteration,
    phase: phaseName(record.phase),
    timestamp: record.timestamp.toISOString(),
    by_action: byAction,
  };
}

function corrupt(source: string, error: z.ZodError): StorageError {
  const messages = error.issues.map((issue) => formatZodIssue(issue));
  return new StorageError(`Corrupt state in ${source}: ${messages.join('; ')}`, {
    code: 'STORAGE_CORRUPT',
    cause: error,
    context: { data: { source, messages } },
  });
}

/**
 * Inverse of {@link serializeIterationFacts}. The phase comes back as its
 * bare name.
 */
export function deserializeIterationFacts(data: unknown, source = 'history'): IterationFacts {
  const parsed = serializedIterationFactsSchema.safeParse(data);
  if (!parsed.success) {
    throw corrupt(source, parsed.error);
  }
  return createIterationFacts({
    iteration: parsed.data.iteration,
    phase: parsed.data.phase,
    timestamp: new Date(parsed.data.timestamp),
    byAction: Object.entries(parsed.data.by_action).map(([action, facts]): [string, Facts] => [
      action,
      Facts.deserialize(facts),
    ]),
  });
}

export function serializePersistedFacts(facts: Facts, updatedAt: Date): PersistedFacts {
  return {
    version: STATE_FORMAT_VERSION,
    updatedAt: updatedAt.toISOString(),
    facts: facts.serialize(),
  };
}

export function deserializePersistedFacts(data: unknown, source: string): Facts {
  const parsed = persistedFactsSchema.safeParse(data);
  if (!parsed.success) {
    throw corrupt(source, parsed.error);
  }
  return Facts.deserialize(parsed.data.facts);
}

/**
 * `JSON.parse` that reports malformed content as corrupt storage.
 */
export function parseStoredJson(raw: string, source: string): unknown {
  try {
    return JSON.parse(raw);
  } catch (error) {
    throw new StorageError(`Malformed JSON in ${source}`, {
      code: 'STORAGE_CORRUPT',
      cause: error,
      context: { data: { source } },
    });
  }
}
