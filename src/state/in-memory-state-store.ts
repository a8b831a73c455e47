import { Facts } from '../facts/facts';
import { IterationFacts } from './iteration-facts';
import {
  deserializeIterationFacts,
  parseStoredJson,
  serializeIterationFacts,
} from './serialization';
import { SessionKey, StateStore, assertAgentId, assertSessionKey, partitionDurable } from './state-store';

interface SessionEntry {
  facts: string;
  history: string[];
}

function sessionId(key: SessionKey): string {
  return `${key.agentId}/${key.sessionId}`;
}

/**
 * Process-local store. Everything is kept in serialized form so callers
 * never share objects with the store and reads go through the same
 * deserialization as the durable backends.
 */
export class InMemoryStateStore implements StateStore {
  private readonly persistent = new Map<string, string>();
  private readonly sessions = new Map<string, SessionEntry>();

  async bootstrap(key: SessionKey, seed: Facts): Promise<void> {
    const valid = assertSessionKey(key);
    const { persistent, session } = partitionDurable(seed);
    if (this.sessions.has(sessionId(valid))) {
      return;
    }

    const agentFacts = persistent.merge(this.loadPersistent(valid.agentId));
    this.persistent.set(valid.agentId, JSON.stringify(agentFacts.serialize()));
    this.sessions.set(sessionId(valid), {
      facts: JSON.stringify(session.serialize()),
      history: [],
    });
  }

  async load(key: SessionKey): Promise<Facts> {
    const valid = assertSessionKey(key);
    const entry = this.sessions.get(sessionId(valid));
    const session = entry ? Facts.deserialize(parseStoredJson(entry.facts, 'memory')) : Facts.empty();
    return this.loadPersistent(valid.agentId).merge(session);
  }

  async save(key: SessionKey, record: IterationFacts, durable: Facts): Promise<void> {
    const valid = assertSessionKey(key);
    const { persistent, session } = partitionDurable(durable);
    const serializedRecord = JSON.stringify(serializeIterationFacts(record));

    const entry = this.sessions.get(sessionId(valid)) ?? { facts: '{}', history: [] };
    this.persistent.set(valid.agentId, JSON.stringify(persistent.serialize()));
    this.sessions.set(sessionId(valid), {
      facts: JSON.stringify(session.serialize()),
      history: [...entry.history, serializedRecord],
    });
  }

  async history(key: SessionKey): Promise<IterationFacts[]> {
    const valid = assertSessionKey(key);
    const entry = this.sessions.get(sessionId(valid));
    return (entry?.history ?? []).map((raw) =>
      deserializeIterationFacts(parseStoredJson(raw, 'memory'), 'memory')
    );
  }

  async clearPersistent(agentId: string): Promise<void> {
    this.persistent.delete(assertAgentId(agentId));
  }

  private loadPersistent(agentId: string): Facts {
    const raw = this.persistent.get(agentId);
    return raw ? Facts.deserialize(parseStoredJson(raw, 'memory')) : Facts.empty();
  }
}
