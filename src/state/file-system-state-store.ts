import path from 'path';
import { StorageError } from '../errors/storage-error';
import { Facts } from '../facts/facts';
import { appendLine, pathExists, readTextIfExists, writeFileAtomic } from '../utils/fs';
import { IterationFacts } from './iteration-facts';
import {
  deserializeIterationFacts,
  deserializePersistedFacts,
  parseStoredJson,
  serializeIterationFacts,
  serializePersistedFacts,
} from './serialization';
import { SessionKey, StateStore, assertAgentId, assertSessionKey, partitionDurable } from './state-store';

export interface FileSystemStateStoreOptions {
  rootDir: string;
  clock?: () => Date;
}

const PERSISTENT_FILE = 'persistent.json';
const STATE_FILE = 'state.json';
const HISTORY_FILE = 'history.jsonl';
const SESSIONS_DIR = 'sessions';

/**
 * Directory-per-agent store:
 *
 * ```
 * <root>/<agentId>/persistent.json
 * <root>/<agentId>/sessions/<sessionId>/state.json
 * <root>/<agentId>/sessions/<sessionId>/history.jsonl
 * ```
 *
 * Sessions live under their own directory, so no session id can name the
 * agent's `persistent.json`. A save replaces the session state, then the
 * persistent facts (each atomically, temp file + rename), and appends the
 * history line last.
 */
export class FileSystemStateStore implements StateStore {
  private readonly rootDir: string;
  private readonly clock: () => Date;

  constructor(options: FileSystemStateStoreOptions) {
    if (!options.rootDir || options.rootDir.trim().length === 0) {
      throw new StorageError('FileSystemStateStore requires a rootDir', { code: 'STORAGE_FAILURE' });
    }
    this.rootDir = path.resolve(options.rootDir);
    this.clock = options.clock ?? (() => new Date());
  }

  async bootstrap(key: SessionKey, seed: Facts): Promise<void> {
    const valid = assertSessionKey(key);
    const { persistent, session } = partitionDurable(seed);

    await this.guard('bootstrap', valid, async () => {
      const exists =
        (await pathExists(this.sessionFile(valid, STATE_FILE))) ||
        (await pathExists(this.sessionFile(valid, HISTORY_FILE)));
      if (exists) {
        return;
      }
      // The session file marks the session as bootstrapped, so it goes last.
      const agentFacts = persistent.merge(await this.readFacts(this.persistentFile(valid.agentId)));
      await this.writeFacts(this.persistentFile(valid.agentId), agentFacts);
      await this.writeFacts(this.sessionFile(valid, STATE_FILE), session);
    });
  }

  async load(key: SessionKey): Promise<Facts> {
    const valid = assertSessionKey(key);
    return this.guard('load', valid, async () => {
      const persistent = await this.readFacts(this.persistentFile(valid.agentId));
      const session = await this.readFacts(this.sessionFile(valid, STATE_FILE));
      return persistent.merge(session);
    });
  }

  async save(key: SessionKey, record: IterationFacts, durable: Facts): Promise<void> {
    const valid = assertSessionKey(key);
    const { persistent, session } = partitionDurable(durable);
    const line = JSON.stringify(serializeIterationFacts(record));

    await this.guard('save', valid, async () => {
      await this.writeFacts(this.sessionFile(valid, STATE_FILE), session);
      await this.writeFacts(this.persistentFile(valid.agentId), persistent);
      await appendLine(this.sessionFile(valid, HISTORY_FILE), line);
    });
  }

  async history(key: SessionKey): Promise<IterationFacts[]> {
    const valid = assertSessionKey(key);
    return this.guard('history', valid, async () => {
      const historyPath = this.sessionFile(valid, HISTORY_FILE);
      const raw = await readTextIfExists(historyPath);
      if (raw === undefined) {
        return [];
      }
      return raw
        .split('\n')
        .map((line, index) => ({ line: line.trim(), source: `${historyPath}:${index + 1}` }))
        .filter(({ line }) => line.length > 0)
        .map(({ line, source }) => deserializeIterationFacts(parseStoredJson(line, source), source));
    });
  }

  async clearPersistent(agentId: string): Promise<void> {
    const valid = assertAgentId(agentId);
    await this.guard('clearPersistent', { agentId: valid }, async () => {
      if (await pathExists(this.persistentFile(valid))) {
        await this.writeFacts(this.persistentFile(valid), Facts.empty());
      }
    });
  }

  private persistentFile(agentId: string): string {
    return path.join(this.rootDir, agentId, PERSISTENT_FILE);
  }

  private sessionFile(key: SessionKey, file: string): string {
    return path.join(this.rootDir, key.agentId, SESSIONS_DIR, key.sessionId, file);
  }

  private async readFacts(filePath: string): Promise<Facts> {
    const raw = await readTextIfExists(filePath);
    if (raw === undefined) {
      return Facts.empty();
    }
    return deserializePersistedFacts(parseStoredJson(raw, filePath), filePath);
  }

  private async writeFacts(filePath: string, facts: Facts): Promise<void> {
    const payload = serializePersistedFacts(facts, this.clock());
    await writeFileAtomic(filePath, `${JSON.stringify(payload, null, 2)}\n`, { encoding: 'utf-8' });
  }

  private async guard<T>(
    operation: string,
    key: Partial<SessionKey>,
    task: () => Promise<T>
  ): Promise<T> {
    try {
      return await task();
    } catch (error) {
      if (error instanceof StorageError) {
        throw error;
      }
      throw new StorageError(`File-system state store failed to ${operation}`, {
        code: 'STORAGE_FAILURE',
        cause: error,
        context: {
          module: 'state',
          operation,
          agentId: key.agentId,
          sessionId: key.sessionId,
          data: { rootDir: this.rootDir },
        },
      });
    }
  }
}
