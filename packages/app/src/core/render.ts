import type { FlatRecord } from "./extract.js"

// CHANGE: render the merged metadata record as an indented JSON document
// WHY: keep serialization pure and preserve record order for every key shape
// QUOTE(TZ): "pretty-printed JSON (4-space indent equivalent)"
// REF: req-render-1
// SOURCE: n/a
// FORMAT THEOREM: ∀r: JSON.parse(render(r)) has the entries of r in order
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: output ends with a single newline
// COMPLEXITY: O(n)

const INDENT = "    "

const indentNested = (text: string): string => text.split("\n").join(`\n${INDENT}`)

/**
 * Render a flat record as JSON with 4-space indentation.
 *
 * @pure true
 * @invariant empty record renders as "{}"
 * @complexity O(n)
 */
export const renderMetadataJson = (record: FlatRecord): string => {
  if (record.size === 0) {
    return "{}\n"
  }
  const lines = [...record].map(([key, value]) =>
    `${INDENT}${JSON.stringify(key)}: ${indentNested(JSON.stringify(value, null, INDENT.length))}`
  )
  return `{\n${lines.join(",\n")}\n}\n`
}
