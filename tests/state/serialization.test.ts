import { describe, expect, test } from '@jest/globals';
import { StorageError } from '../../src/errors/storage-error';
import { createFact } from '../../src/facts/fact';
import { Facts } from '../../src/facts/facts';
import { PhaseFactory } from '../../src/phases/phase-factory';
import {
  createIterationFacts,
  isTerminalRecord,
} from '../../src/state/iteration-facts';
import {
  deserializeIterationFacts,
  deserializePersistedFacts,
  parseStoredJson,
  serializeIterationFacts,
  serializePersistedFacts,
} from '../../src/state/serialization';

const phases = PhaseFactory.create('START', 'DONE');
const timestamp = new Date('2026-01-02T03:04:05.000Z');

const record = () =>
  createIterationFacts({
    iteration: 3,
    phase: phases.of('START'),
    timestamp,
    byAction: {
      scan: Facts.fromEntries([
        ['repo', Facts.of(createFact('file_count', 12, 'session', 'progress'))],
      ]),
      note: Facts.of(createFact('hint', ['a', 'b'], 'iteration', 'diagnostic')),
    },
  });

function storageError(run: () => unknown): StorageError | undefined {
  try {
    run();
  } catch (error) {
    if (error instanceof StorageError) {
      return error;
    }
    throw error;
  }
  return undefined;
}

describe('IterationFacts serialization', () => {
  test('writes the wire format', () => {
    expect(serializeIterationFacts(record())).toEqual({
      iteration: 3,
      phase: 'START',
      timestamp: '2026-01-02T03:04:05.000Z',
      by_action: {
        scan: {
          'repo.file_count': { key: 'file_count', value: 12, scope: 'session', kind: 'progress' },
        },
        note: {
          hint: { key: 'hint', value: ['a', 'b'], scope: 'iteration', kind: 'diagnostic' },
        },
      },
    });
  });

  test('round trip keeps facts and degrades the phase to its name', () => {
    const wire = JSON.parse(JSON.stringify(serializeIterationFacts(record())));
    const restored = deserializeIterationFacts(wire);

    expect(restored.phase).toBe('START');
    expect(restored.iteration).toBe(3);
    expect(restored.timestamp).toEqual(timestamp);
    expect(Array.from(restored.byAction.keys())).toEqual(['scan', 'note']);
    expect(serializeIterationFacts(restored)).toEqual(wire);
  });

  test('corrupt records are storage errors', () => {
    const error = storageError(() =>
      deserializeIterationFacts({ iteration: 1, phase: 'START', by_action: {} })
    );
    expect(error?.code).toBe('STORAGE_CORRUPT');
    expect(error?.message).toBe('Corrupt state in history: Field "timestamp" is required');
  });
});

describe('IterationFacts helpers', () => {
  test('a record without actions is terminal', () => {
    expect(isTerminalRecord(record())).toBe(false);
    expect(isTerminalRecord(createIterationFacts({ iteration: 4, phase: 'DONE', timestamp }))).toBe(true);
  });
});

describe('persisted facts', () => {
  test('round trip through the versioned envelope', () => {
    const facts = Facts.of(createFact('goal', 'ship it', 'session'), createFact('runs', 2, 'persistent'));
    const envelope = serializePersistedFacts(facts, timestamp);
    expect(envelope.version).toBe(1);
    expect(envelope.updatedAt).toBe('2026-01-02T03:04:05.000Z');
    expect(deserializePersistedFacts(envelope, 'state.json').serialize()).toEqual(facts.serialize());
  });

  test('an unknown version is corrupt', () => {
    const error = storageError(() =>
      deserializePersistedFacts({ version: 2, updatedAt: timestamp.toISOString(), facts: {} }, 'state.json')
    );
    expect(error?.code).toBe('STORAGE_CORRUPT');
    expect(error?.message).toBe('Corrupt state in state.json: Invalid version: expected 1');
  });

  test('malformed JSON is corrupt', () => {
    const error = storageError(() => parseStoredJson('{"facts":', 'state.json'));
    expect(error?.code).toBe('STORAGE_CORRUPT');
    expect(error?.message).toBe('Malformed JSON in state.json');
  });
});
