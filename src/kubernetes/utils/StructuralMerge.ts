import { DuplicateKeyError, EmptyAggregationError } from '../ErrorHandling.js';

export type Leaf = number | string | boolean | null;

/**
 * A nested record whose leaves are of type `L`. Views such as resource
 * summaries are declared as object types and are assignable to `Tree<L>`.
 */
export type Tree<L extends Leaf> = { [key: string]: L | Tree<L> };

export type BinaryOperator<L> = (left: L, right: L) => L;

export const add: BinaryOperator<number> = (left, right) => left + right;

export function isTree<L extends Leaf>(value: L | Tree<L> | undefined): value is Tree<L> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function foldInto<L extends Leaf>(target: Tree<L>, incoming: Tree<L>, op: BinaryOperator<L>): void {
  for (const key of Object.keys(target)) {
    const current = target[key];
    const other = Object.prototype.hasOwnProperty.call(incoming, key) ? incoming[key] : undefined;

    if (isTree(current)) {
      foldInto(current, isTree(other) ? other : {}, op);
    } else if (other !== undefined && !isTree(other)) {
      target[key] = op(current, other);
    }
  }
}

/**
 * Left-biased structural merge. The result always has the shape of `initial`:
 * leaves present in both are combined with `op`, leaves only in `initial` pass
 * through, and keys only in `incoming` are dropped.
 */
export function structuralFold<L extends Leaf, T extends Tree<L>>(
  initial: T,
  incoming: Tree<L>,
  op: BinaryOperator<L>,
): T {
  const result = structuredClone(initial);
  foldInto<L>(result, incoming, op);
  return result;
}

/**
 * Fold records pairwise from the left into a new record. Without a seed the
 * first record is the seed, and an empty list cannot be folded.
 */
export function foldAll<L extends Leaf, T extends Tree<L>>(
  records: readonly T[],
  op: BinaryOperator<L>,
  seed?: T,
  what?: string,
): T {
  if (seed === undefined) {
    if (records.length === 0) {
      throw new EmptyAggregationError(what);
    }
    const [first, ...rest] = records;
    return rest.reduce<T>((acc, record) => structuralFold(acc, record, op), structuredClone(first));
  }
  return records.reduce<T>((acc, record) => structuralFold(acc, record, op), structuredClone(seed));
}

export type JsonValue = Leaf | JsonValue[] | JsonObject;
export type JsonObject = { [key: string]: JsonValue };

/**
 * Members keyed by entity name. A Map keeps names such as `2024` in insertion
 * order, where an object would list integer-like keys first.
 */
export type JsonEntries = JsonObject | ReadonlyMap<string, JsonValue>;

export function isJsonObject(value: JsonValue | undefined): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isEntryMap(data: JsonEntries): data is ReadonlyMap<string, JsonValue> {
  return data instanceof Map;
}

export function entriesOf(data: JsonEntries): Iterable<[string, JsonValue]> {
  return isEntryMap(data) ? data.entries() : Object.entries(data);
}

/**
 * One-level merge of `incoming` into `content`. New keys are added; when both
 * sides hold an object under the same key the inner keys are overlaid without
 * recursing further. Any other collision is a duplicate key.
 */
export function shallowMerge(content: Map<string, JsonValue>, incoming: JsonEntries): void {
  for (const [key, value] of entriesOf(incoming)) {
    const existing = content.get(key);
    if (existing === undefined) {
      content.set(key, value);
    } else if (isJsonObject(existing) && isJsonObject(value)) {
      content.set(key, { ...existing, ...value });
    } else {
      throw new DuplicateKeyError(key);
    }
  }
}
