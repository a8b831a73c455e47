import { StorageError } from '../errors/storage-error';
import { ValidationError } from '../errors/validation-error';
import { Facts } from '../facts/facts';
import { IdentifierSchema, SessionKey, SessionKeySchema } from '../validation/common';
import { formatZodIssue } from '../validation/errors';
import { IterationFacts } from './iteration-facts';

export type { SessionKey } from '../validation/common';

/**
 * Durable storage for agent sessions. Persistent facts belong to the agent
 * and are shared by all of its sessions; session facts and history belong
 * to one (agentId, sessionId) pair. Backends must be indistinguishable
 * through this interface.
 */
export interface StateStore {
  /**
   * Seed durable state for a fresh session. Does nothing when the session
   * already has state or history.
   */
  bootstrap(key: SessionKey, seed: Facts): Promise<void>;

  /**
   * Persistent facts of the agent merged with the session's facts.
   */
  load(key: SessionKey): Promise<Facts>;

  /**
   * Replace the durable state with `durable` and append `record` to the
   * history, atomically per key.
   */
  save(key: SessionKey, record: IterationFacts, durable: Facts): Promise<void>;

  /**
   * History in append order, phases as names.
   */
  history(key: SessionKey): Promise<IterationFacts[]>;

  /**
   * Drop every persistent fact of an agent. Session state is untouched.
   */
  clearPersistent(agentId: string): Promise<void>;
}

/**
 * Split a durable snapshot by scope. Iteration-scoped facts are refused.
 */
export function partitionDurable(facts: Facts): { persistent: Facts; session: Facts } {
  const transient = facts.filterScope('iteration');
  if (!transient.isEmpty()) {
    throw new ValidationError(
      `Iteration-scoped facts cannot be stored: ${transient.keys().join(', ')}`,
      { context: { data: { keys: transient.keys() } } }
    );
  }
  return {
    persistent: facts.filterScope('persistent'),
    session: facts.filterScope('session'),
  };
}

/**
 * Validate both ids of a session key; they double as path segments and
 * table keys.
 */
export function assertSessionKey(key: SessionKey): SessionKey {
  const parsed = SessionKeySchema.safeParse(key);
  if (!parsed.success) {
    throw new StorageError(
      `Invalid session key: ${parsed.error.issues.map((issue) => formatZodIssue(issue)).join('; ')}`,
      { code: 'STORAGE_INVALID_KEY', cause: parsed.error }
    );
  }
  return parsed.data;
}

export function assertAgentId(agentId: string): string {
  const parsed = IdentifierSchema.safeParse(agentId);
  if (!parsed.success) {
    throw new StorageError(
      `Invalid agent id: ${parsed.error.issues.map((issue) => formatZodIssue(issue)).join('; ')}`,
      { code: 'STORAGE_INVALID_KEY', cause: parsed.error }
    );
  }
  return parsed.data;
}
