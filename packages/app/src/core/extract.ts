import type { Json } from "./json.js"
import { isJsonObject } from "./json.js"

// CHANGE: resolve dotted key paths against parsed metadata trees
// WHY: flatten nested workflow fields into a single-level record
// QUOTE(TZ): "null is the uniform absent signal"
// REF: req-extract-1
// SOURCE: n/a
// FORMAT THEOREM: ∀t,K: keys(extract(t, K)) = dedupe(K) ∧ ∀k ∈ K: extract(t, K)(k) = resolve(t, k)
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: a segment applied to a non-object resolves to null, never throws
// COMPLEXITY: O(Σ|k|) over requested keys

export type FlatRecord = ReadonlyMap<string, Json>

const PATH_SEPARATOR = "."

/**
 * Resolve a single dotted key path.
 *
 * @param tree - Parsed JSON value to walk.
 * @param key - Dot-separated segments, e.g. `params.input`.
 * @returns The value at the path, or null when any segment is absent.
 *
 * @pure true
 * @invariant only JSON objects are descended into
 * @complexity O(|key|)
 */
export const resolvePath = (tree: Json, key: string): Json => {
  let current: Json = tree
  for (const segment of key.split(PATH_SEPARATOR)) {
    if (!isJsonObject(current) || !Object.hasOwn(current, segment)) {
      return null
    }
    current = current[segment] ?? null
  }
  return current
}

/**
 * Extract a flat record of dotted key paths from a JSON tree.
 *
 * @param tree - Parsed JSON value.
 * @param keys - Dotted key paths in output order.
 * @returns Record keyed by the original key strings.
 *
 * @pure true
 * @invariant result preserves the order of first appearance in keys
 * @complexity O(n) where n = total segments
 */
export const extractPaths = (tree: Json, keys: ReadonlyArray<string>): FlatRecord => {
  const result = new Map<string, Json>()
  for (const key of keys) {
    result.set(key, resolvePath(tree, key))
  }
  return result
}

/**
 * Merge two flat records; the second wins on shared keys.
 *
 * @pure true
 * @invariant a shared key keeps its position from the first record
 * @complexity O(n + m)
 */
export const mergeRecords = (first: FlatRecord, second: FlatRecord): FlatRecord =>
  new Map<string, Json>([...first, ...second])
