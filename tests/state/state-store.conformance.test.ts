import path from 'path';
import { afterEach, beforeEach, describe, expect, test } from '@jest/globals';
import { StorageError } from '../../src/errors/storage-error';
import { ValidationError } from '../../src/errors/validation-error';
import { createFact } from '../../src/facts/fact';
import { Facts } from '../../src/facts/facts';
import { PhaseFactory } from '../../src/phases/phase-factory';
import { FileSystemStateStore } from '../../src/state/file-system-state-store';
import { InMemoryStateStore } from '../../src/state/in-memory-state-store';
import { IterationFacts, createIterationFacts } from '../../src/state/iteration-facts';
import { SqliteStateStore } from '../../src/state/sqlite-state-store';
import { StateStore } from '../../src/state/state-store';
import { valuesOf } from '../utils/agents';
import { createTempDir } from '../utils/temp-dir';

interface Backend {
  store: StateStore;
  cleanup: () => Promise<void>;
}

const clock = () => new Date('2026-03-01T12:00:00.000Z');

const backends: Array<[string, () => Promise<Backend>]> = [
  ['memory', async () => ({ store: new InMemoryStateStore(), cleanup: async () => undefined })],
  [
    'filesystem',
    async () => {
      const temp = await createTempDir('state-store-fs');
      return { store: new FileSystemStateStore({ rootDir: temp.dir, clock }), cleanup: temp.cleanup };
    },
  ],
  [
    'sqlite',
    async () => {
      const temp = await createTempDir('state-store-sqlite');
      const store = new SqliteStateStore({ databasePath: path.join(temp.dir, 'state.db'), clock });
      return {
        store,
        cleanup: async () => {
          store.dispose();
          await temp.cleanup();
        },
      };
    },
  ],
];

const phases = PhaseFactory.create('START', 'DONE');
const key = { agentId: 'hello-agent', sessionId: 'session-1' };
const otherSession = { agentId: 'hello-agent', sessionId: 'session-2' };
const otherAgent = { agentId: 'other-agent', sessionId: 'session-1' };

function record(iteration: number, byAction: Record<string, Facts> = {}): IterationFacts {
  return createIterationFacts({
    iteration,
    phase: phases.of('START'),
    timestamp: new Date(`2026-03-01T12:00:0${iteration}.000Z`),
    byAction,
  });
}

describe.each(backends)('%s state store', (_name, createBackend) => {
  let backend: Backend;
  let store: StateStore;

  beforeEach(async () => {
    backend = await createBackend();
    store = backend.store;
  });

  afterEach(async () => {
    await backend.cleanup();
  });

  test('an unknown session loads empty with no history', async () => {
    expect((await store.load(key)).isEmpty()).toBe(true);
    expect(await store.history(key)).toEqual([]);
  });

  test('save then load returns persistent and session facts merged', async () => {
    const durable = Facts.fromEntries([
      ['said_hello', createFact('said_hello', true, 'session', 'progress')],
      ['runs', createFact('runs', 1, 'persistent')],
      ['repo', Facts.of(createFact('root', '/work/app', 'session'))],
    ]);
    await store.save(key, record(1), durable);

    const loaded = await store.load(key);
    expect(valuesOf(loaded)).toEqual({ runs: 1, said_hello: true, 'repo.root': '/work/app' });
    expect(loaded.serialize()).toEqual(durable.serialize());
  });

  test('history comes back in append order through deserialization', async () => {
    const emitted = Facts.of(createFact('said_hello', true, 'session', 'progress'));
    await store.save(key, record(1, { say_hello: emitted }), emitted);
    await store.save(key, record(2), emitted);

    const history = await store.history(key);
    expect(history.map((entry) => entry.iteration)).toEqual([1, 2]);
    expect(history[0].phase).toBe('START');
    expect(history[0].timestamp).toEqual(new Date('2026-03-01T12:00:01.000Z'));
    expect(history[0].byAction.get('say_hello')?.serialize()).toEqual(emitted.serialize());
    expect(history[1].byAction.size).toBe(0);
  });

  test('save replaces the durable state', async () => {
    await store.save(key, record(1), Facts.of(createFact('a', 1, 'session'), createFact('b', 2, 'session')));
    await store.save(key, record(2), Facts.of(createFact('b', 3, 'session')));
    expect(valuesOf(await store.load(key))).toEqual({ b: 3 });
  });

  test('persistent facts are shared by sessions of one agent only', async () => {
    await store.save(
      key,
      record(1),
      Facts.of(createFact('runs', 5, 'persistent'), createFact('local', 'x', 'session'))
    );

    expect(valuesOf(await store.load(otherSession))).toEqual({ runs: 5 });
    expect((await store.load(otherAgent)).isEmpty()).toBe(true);
    expect(await store.history(otherSession)).toEqual([]);
  });

  test('a session named after the persistent file keeps its own state', async () => {
    const named = { agentId: 'hello-agent', sessionId: 'persistent.json' };
    await store.save(
      named,
      record(1),
      Facts.of(createFact('runs', 5, 'persistent'), createFact('local', 'x', 'session'))
    );
    await store.save(
      key,
      record(1),
      Facts.of(createFact('runs', 6, 'persistent'), createFact('mine', 'y', 'session'))
    );

    expect(valuesOf(await store.load(named))).toEqual({ runs: 6, local: 'x' });
    expect(valuesOf(await store.load(key))).toEqual({ runs: 6, mine: 'y' });
    expect((await store.history(named)).map((entry) => entry.iteration)).toEqual([1]);
  });

  test('iteration-scoped facts are refused', async () => {
    await expect(
      store.save(key, record(1), Facts.of(createFact('scratch', 'x', 'iteration')))
    ).rejects.toThrow(ValidationError);
    expect(await store.history(key)).toEqual([]);
  });

  test('bootstrap seeds a fresh session once', async () => {
    await store.bootstrap(key, Facts.of(createFact('goal', 'greet', 'session')));
    await store.bootstrap(key, Facts.of(createFact('goal', 'other', 'session')));
    expect(valuesOf(await store.load(key))).toEqual({ goal: 'greet' });
  });

  test('bootstrap does nothing for a session with saved state', async () => {
    await store.save(key, record(1), Facts.of(createFact('done', true, 'session')));
    await store.bootstrap(key, Facts.of(createFact('goal', 'greet', 'session')));
    expect(valuesOf(await store.load(key))).toEqual({ done: true });
  });

  test('bootstrap keeps persistent facts the agent already has', async () => {
    await store.bootstrap(key, Facts.of(createFact('owner', 'first', 'persistent')));
    await store.bootstrap(
      otherSession,
      Facts.of(createFact('owner', 'second', 'persistent'), createFact('budget', 3, 'persistent'))
    );
    expect(valuesOf(await store.load(otherSession))).toEqual({ owner: 'first', budget: 3 });
  });

  test('bootstrap refuses iteration-scoped seeds', async () => {
    await expect(
      store.bootstrap(key, Facts.of(createFact('scratch', 'x', 'iteration')))
    ).rejects.toThrow(ValidationError);
  });

  test('clearPersistent drops agent facts and keeps session facts', async () => {
    await store.save(
      key,
      record(1),
      Facts.of(createFact('runs', 5, 'persistent'), createFact('local', 'x', 'session'))
    );
    await store.clearPersistent(key.agentId);

    expect(valuesOf(await store.load(key))).toEqual({ local: 'x' });
    expect(await store.history(key)).toHaveLength(1);
  });

  test('unsafe ids are rejected', async () => {
    await expect(store.load({ agentId: '../escape', sessionId: 's' })).rejects.toThrow(StorageError);
    await expect(store.load({ agentId: 'agent', sessionId: '' })).rejects.toMatchObject({
      code: 'STORAGE_INVALID_KEY',
    });
    await expect(store.clearPersistent('a/b')).rejects.toMatchObject({ code: 'STORAGE_INVALID_KEY' });
  });
});
