import fs from 'fs';
import path from 'path';
import Database from 'better-sqlite3';
import { z } from 'zod';
import { StorageError } from '../errors/storage-error';
import { Facts } from '../facts/facts';
import { IterationFacts } from './iteration-facts';
import { deserializeIterationFacts, parseStoredJson, serializeIterationFacts } from './serialization';
import { SessionKey, StateStore, assertAgentId, assertSessionKey, partitionDurable } from './state-store';

export interface SqliteStateStoreOptions {
  /** File path, or `:memory:` for a private in-process database. */
  databasePath: string;
  timeoutMs?: number;
  clock?: () => Date;
}

const SCHEMA = `
CREATE TABLE IF NOT EXISTS persistent_facts (
  agent_id TEXT PRIMARY KEY,
  facts TEXT NOT NULL,
  updated_at TEXT NOT NULL
);
CREATE TABLE IF NOT EXISTS session_facts (
  agent_id TEXT NOT NULL,
  session_id TEXT NOT NULL,
  facts TEXT NOT NULL,
  updated_at TEXT NOT NULL,
  PRIMARY KEY (agent_id, session_id)
);
CREATE TABLE IF NOT EXISTS iteration_history (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  agent_id TEXT NOT NULL,
  session_id TEXT NOT NULL,
  iteration INTEGER NOT NULL,
  record TEXT NOT NULL
);
CREATE INDEX IF NOT EXISTS idx_iteration_history_session
  ON iteration_history (agent_id, session_id, id);
`;

const factsRowSchema = z.object({ facts: z.string() });
const historyRowSchema = z.object({ record: z.string() });

/**
 * better-sqlite3 backed store. Each save runs in one transaction.
 */
export class SqliteStateStore implements StateStore {
  private readonly db: Database.Database;
  private readonly databasePath: string;
  private readonly clock: () => Date;
  private disposed = false;

  constructor(options: SqliteStateStoreOptions) {
    const databasePath = options.databasePath?.trim();
    if (!databasePath) {
      throw new StorageError('A database path is required to open SqliteStateStore.', {
        code: 'STORAGE_FAILURE',
      });
    }
    this.databasePath = databasePath === ':memory:' ? databasePath : path.resolve(databasePath);
    this.clock = options.clock ?? (() => new Date());

    try {
      if (this.databasePath !== ':memory:') {
        fs.mkdirSync(path.dirname(this.databasePath), { recursive: true });
      }
      this.db = new Database(this.databasePath, { timeout: options.timeoutMs ?? 1_000 });
      this.db.pragma('journal_mode = WAL');
      this.db.exec(SCHEMA);
    } catch (error) {
      throw this.wrapSqliteError('Failed to open state database.', error);
    }
  }

  async bootstrap(key: SessionKey, seed: Facts): Promise<void> {
    const valid = assertSessionKey(key);
    const { persistent, session } = partitionDurable(seed);
    this.withTransaction(() => {
      if (this.readSessionRow(valid) !== undefined || this.historyCount(valid) > 0) {
        return;
      }
      const agentFacts = persistent.merge(this.readPersistent(valid.agentId));
      this.writePersistent(valid.agentId, agentFacts);
      this.writeSession(valid, session);
    });
  }

  async load(key: SessionKey): Promise<Facts> {
    const valid = assertSessionKey(key);
    this.ensureActive();
    const row = this.readSessionRow(valid);
    const session = row === undefined ? Facts.empty() : this.parseFacts(row, 'session_facts');
    return this.readPersistent(valid.agentId).merge(session);
  }

  async save(key: SessionKey, record: IterationFacts, durable: Facts): Promise<void> {
    const valid = assertSessionKey(key);
    const { persistent, session } = partitionDurable(durable);
    const serialized = JSON.stringify(serializeIterationFacts(record));

    this.withTransaction(() => {
      this.writePersistent(valid.agentId, persistent);
      this.writeSession(valid, session);
      this.run(
        'INSERT INTO iteration_history (agent_id, session_id, iteration, record) VALUES (:agent_id, :session_id, :iteration, :record)',
        {
          agent_id: valid.agentId,
          session_id: valid.sessionId,
          iteration: record.iteration,
          record: serialized,
        }
      );
    });
  }

  async history(key: SessionKey): Promise<IterationFacts[]> {
    const valid = assertSessionKey(key);
    this.ensureActive();
    const rows = this.prepare(
      'SELECT record FROM iteration_history WHERE agent_id = :agent_id AND session_id = :session_id ORDER BY id'
    ).all({ agent_id: valid.agentId, session_id: valid.sessionId });

    return rows.map((row) => {
      const parsed = historyRowSchema.safeParse(row);
      if (!parsed.success) {
        throw new StorageError('Unexpected row shape in iteration_history', {
          code: 'STORAGE_CORRUPT',
          cause: parsed.error,
        });
      }
      return deserializeIterationFacts(
        parseStoredJson(parsed.data.record, 'iteration_history'),
        'iteration_history'
      );
    });
  }

  async clearPersistent(agentId: string): Promise<void> {
    const valid = assertAgentId(agentId);
    this.ensureActive();
    this.run('DELETE FROM persistent_facts WHERE agent_id = :agent_id', { agent_id: valid });
  }

  dispose(): void {
    if (this.disposed) {
      return;
    }
    this.disposed = true;
    this.db.close();
  }

  private readPersistent(agentId: string): Facts {
    const row = this.prepare('SELECT facts FROM persistent_facts WHERE agent_id = :agent_id').get({
      agent_id: agentId,
    });
    return row === undefined ? Facts.empty() : this.parseFacts(row, 'persistent_facts');
  }

  private readSessionRow(key: SessionKey): unknown {
    return this.prepare(
      'SELECT facts FROM session_facts WHERE agent_id = :agent_id AND session_id = :session_id'
    ).get({ agent_id: key.agentId, session_id: key.sessionId });
  }

  private historyCount(key: SessionKey): number {
    const row = this.prepare(
      'SELECT COUNT(*) AS count FROM iteration_history WHERE agent_id = :agent_id AND session_id = :session_id'
    ).get({ agent_id: key.agentId, session_id: key.sessionId });
    const parsed = z.object({ count: z.number() }).safeParse(row);
    return parsed.success ? parsed.data.count : 0;
  }

  private writePersistent(agentId: string, facts: Facts): void {
    this.run(
      `INSERT INTO persistent_facts (agent_id, facts, updated_at) VALUES (:agent_id, :facts, :updated_at)
       ON CONFLICT(agent_id) DO UPDATE SET facts = excluded.facts, updated_at = excluded.updated_at`,
      {
        agent_id: agentId,
        facts: JSON.stringify(facts.serialize()),
        updated_at: this.clock().toISOString(),
      }
    );
  }

  private writeSession(key: SessionKey, facts: Facts): void {
    this.run(
      `INSERT INTO session_facts (agent_id, session_id, facts, updated_at)
       VALUES (:agent_id, :session_id, :facts, :updated_at)
       ON CONFLICT(agent_id, session_id) DO UPDATE SET facts = excluded.facts, updated_at = excluded.updated_at`,
      {
        agent_id: key.agentId,
        session_id: key.sessionId,
        facts: JSON.stringify(facts.serialize()),
        updated_at: this.clock().toISOString(),
      }
    );
  }

  private parseFacts(row: unknown, table: string): Facts {
    const parsed = factsRowSchema.safeParse(row);
    if (!parsed.success) {
      throw new StorageError(`Unexpected row shape in ${table}`, {
        code: 'STORAGE_CORRUPT',
        cause: parsed.error,
      });
    }
    return Facts.deserialize(parseStoredJson(parsed.data.facts, table));
  }

  private run(sql: string, params: Record<string, string | number>): void {
    try {
      this.prepare(sql).run(params);
    } catch (error) {
      throw this.wrapSqliteError('Failed to write state.', error);
    }
  }

  private withTransaction<T>(handler: () => T): T {
    this.ensureActive();
    const run = this.db.transaction(handler);
    try {
      return run();
    } catch (error) {
      throw this.wrapSqliteError('Transaction failed.', error);
    }
  }

  private prepare(sql: string): Database.Statement {
    this.ensureActive();
    try {
      return this.db.prepare(sql);
    } catch (error) {
      throw this.wrapSqliteError(`Failed to prepare statement: ${sql}`, error);
    }
  }

  private ensureActive(): void {
    if (this.disposed) {
      throw new StorageError('SqliteStateStore was disposed and can no longer be used.', {
        code: 'STORAGE_FAILURE',
        context: { data: { databasePath: this.databasePath } },
      });
    }
  }

  private wrapSqliteError(message: string, error: unknown): StorageError {
    if (error instanceof StorageError) {
      return error;
    }
    return new StorageError(message, {
      code: 'STORAGE_FAILURE',
      cause: error,
      context: { data: { databasePath: this.databasePath } },
    });
  }
}
