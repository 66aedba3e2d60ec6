// CHANGE: introduce a JSON domain type for metadata trees read from the run archive
// WHY: traverse parsed members without duck-typed property access
// QUOTE(TZ): "arbitrary nested mapping/array/scalar structure"
// REF: req-json-1
// SOURCE: n/a
// FORMAT THEOREM: ∀x ∈ Json: isJsonObject(x) ↔ x ≠ null ∧ typeof x = object ∧ ¬isArray(x)
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: Json is closed under array/object nesting with primitive leaves
// COMPLEXITY: O(1)/O(1)

export type Json =
  | null
  | boolean
  | number
  | string
  | ReadonlyArray<Json>
  | { readonly [key: string]: Json }

export type JsonObject = { readonly [key: string]: Json }

export const isJsonObject = (value: Json): value is JsonObject =>
  typeof value === "object" && value !== null && !Array.isArray(value)
