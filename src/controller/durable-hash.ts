import { createHash } from 'crypto';
import { Facts } from '../facts/facts';
import { stableStringify } from '../utils/stable-stringify';

/**
 * Identity of a durable fact set: sha256 over keys, values, scopes and
 * kinds, independent of insertion order.
 */
export function durableHash(facts: Facts): string {
  return createHash('sha256').update(stableStringify(facts.durable().serialize())).digest('hex');
}
