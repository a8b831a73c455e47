import { ValidationError } from '../errors/validation-error';
import { normalizeValidationError } from '../validation/errors';
import { createFact, serializeFact } from './fact';
import { serializedFactsSchema } from './schemas';
import {
  FACT_KEY_SEPARATOR,
  Fact,
  FactScope,
  FactValue,
  SerializedFact,
  isDurableScope,
} from './types';

export type FactsEntry = Fact | Facts;

function isGroup(entry: FactsEntry): entry is Facts {
  return entry instanceof Facts;
}

function isPairIterable(
  value: Iterable<[string, Fact]> | Record<string, Fact>
): value is Iterable<[string, Fact]> {
  return Symbol.iterator in value;
}

function qualify(prefix: string, key: string): string {
  return prefix ? `${prefix}${FACT_KEY_SEPARATOR}${key}` : key;
}

function assertEntryKey(key: string): void {
  if (key.length === 0 || key.includes(FACT_KEY_SEPARATOR)) {
    throw new ValidationError(
      `Facts key '${key}' must be non-empty and must not contain '${FACT_KEY_SEPARATOR}'`,
      { context: { data: { key } } }
    );
  }
}

/**
 * Immutable, key-unique bundle of facts. Groups nest another bundle under
 * a name; a leaf is addressed by its fully qualified key
 * (`repo.file_count`).
 */
export class Facts implements Iterable<[string, Fact]> {
  private static readonly EMPTY = new Facts(new Map());

  private readonly items: ReadonlyMap<string, FactsEntry>;

  private constructor(items: Map<string, FactsEntry>) {
    this.items = items;
  }

  static empty(): Facts {
    return Facts.EMPTY;
  }

  /**
   * Bundle leaf facts by their own keys.
   */
  static of(...facts: Fact[]): Facts {
    const items = new Map<string, FactsEntry>();
    for (const fact of facts) {
      if (items.has(fact.key)) {
        throw new ValidationError(`Duplicate fact key '${fact.key}'`, {
          context: { data: { key: fact.key } },
        });
      }
      assertEntryKey(fact.key);
      items.set(fact.key, fact);
    }
    return new Facts(items);
  }

  /**
   * Bundle a mix of leaf facts and nested groups. A leaf must be stored
   * under its own key.
   */
  static fromEntries(entries: Iterable<[string, FactsEntry]>): Facts {
    const items = new Map<string, FactsEntry>();
    for (const [key, entry] of entries) {
      assertEntryKey(key);
      if (items.has(key)) {
        throw new ValidationError(`Duplicate fact key '${key}'`, { context: { data: { key } } });
      }
      if (!isGroup(entry) && entry.key !== key) {
        throw new ValidationError(
          `Fact key mismatch: entry '${key}' holds fact '${entry.key}'`,
          { context: { data: { key, factKey: entry.key } } }
        );
      }
      items.set(key, entry);
    }
    return new Facts(items);
  }

  /**
   * Rebuild the nested structure from fully qualified keys. Each fact must
   * carry the last segment of its qualified key as its own key.
   */
  static unflatten(flat: Iterable<[string, Fact]> | Record<string, Fact>): Facts {
    const pairs = isPairIterable(flat) ? Array.from(flat) : Object.entries(flat);
    const tree = new Map<string, TreeNode>();

    for (const [qualifiedKey, fact] of pairs) {
      const segments = qualifiedKey.split(FACT_KEY_SEPARATOR);
      const leafKey = segments[segments.length - 1];
      let level = tree;
      segments.slice(0, -1).forEach((segment, index) => {
        const existing = level.get(segment);
        if (existing && existing.kind === 'leaf') {
          throw new ValidationError(
            `Fact '${segments.slice(0, index + 1).join(FACT_KEY_SEPARATOR)}' is both a fact and a group`,
            { context: { data: { key: qualifiedKey } } }
          );
        }
        if (existing) {
          level = existing.children;
        } else {
          const node: TreeNode = { kind: 'group', children: new Map() };
          level.set(segment, node);
          level = node.children;
        }
      });
      if (level.has(leafKey)) {
        throw new ValidationError(`Duplicate fact key '${qualifiedKey}'`, {
          context: { data: { key: qualifiedKey } },
        });
      }
      level.set(leafKey, { kind: 'leaf', fact });
    }

    return Facts.fromTree(tree);
  }

  private static fromTree(tree: Map<string, TreeNode>): Facts {
    const entries: Array<[string, FactsEntry]> = [];
    for (const [key, node] of tree) {
      entries.push([key, node.kind === 'leaf' ? node.fact : Facts.fromTree(node.children)]);
    }
    return Facts.fromEntries(entries);
  }

  /**
   * Parse the wire form produced by {@link Facts.serialize}.
   */
  static deserialize(data: unknown): Facts {
    const parsed = serializedFactsSchema.safeParse(data);
    if (!parsed.success) {
      throw normalizeValidationError(parsed.error, 'Invalid serialized facts');
    }
    const flat: Array<[string, Fact]> = Object.entries(parsed.data).map(([key, item]) => [
      key,
      createFact(item.key, item.value, item.scope, item.kind),
    ]);
    return Facts.unflatten(flat);
  }

  get size(): number {
    let count = 0;
    for (const entry of this.items.values()) {
      count += isGroup(entry) ? entry.size : 1;
    }
    return count;
  }

  isEmpty(): boolean {
    return this.size === 0;
  }

  get(key: string): Fact | undefined {
    const entry = this.resolve(key);
    return entry && !isGroup(entry) ? entry : undefined;
  }

  group(key: string): Facts | undefined {
    const entry = this.resolve(key);
    return entry && isGroup(entry) ? entry : undefined;
  }

  has(key: string): boolean {
    return this.get(key) !== undefined;
  }

  value(key: string): FactValue | undefined {
    return this.get(key)?.value;
  }

  keys(): string[] {
    return this.entries().map(([key]) => key);
  }

  entries(): Array<[string, Fact]> {
    const result: Array<[string, Fact]> = [];
    this.collect('', result);
    return result;
  }

  [Symbol.iterator](): Iterator<[string, Fact]> {
    return this.entries()[Symbol.iterator]();
  }

  flatten(): Map<string, Fact> {
    return new Map(this.entries());
  }

  filterScope(...scopes: FactScope[]): Facts {
    return Facts.unflatten(this.entries().filter(([, fact]) => scopes.includes(fact.scope)));
  }

  /**
   * Session and persistent facts; everything that survives the iteration.
   */
  durable(): Facts {
    return Facts.unflatten(this.entries().filter(([, fact]) => isDurableScope(fact.scope)));
  }

  /**
   * Combine two bundles. Facts of `other` replace facts with the same
   * qualified key.
   */
  merge(other: Facts): Facts {
    const flat = this.flatten();
    for (const [key, fact] of other.entries()) {
      flat.set(key, fact);
    }
    return Facts.unflatten(flat);
  }

  serialize(): Record<string, SerializedFact> {
    const result: Record<string, SerializedFact> = {};
    for (const [key, fact] of this.entries()) {
      result[key] = serializeFact(fact);
    }
    return result;
  }

  private resolve(key: string): FactsEntry | undefined {
    const segments = key.split(FACT_KEY_SEPARATOR);
    let current: FactsEntry | undefined = this;
    for (const segment of segments) {
      if (!current || !isGroup(current)) {
        return undefined;
      }
      current = current.items.get(segment);
    }
    return current;
  }

  private collect(prefix: string, into: Array<[string, Fact]>): void {
    for (const [key, entry] of this.items) {
      const qualified = qualify(prefix, key);
      if (isGroup(entry)) {
        entry.collect(qualified, into);
      } else {
        into.push([qualified, entry]);
      }
    }
  }
}

type TreeNode =
  | { kind: 'leaf'; fact: Fact }
  | { kind: 'group'; children: Map<string, TreeNode> };
