import type { FlatRecord } from "./extract.js"
import { extractPaths, mergeRecords } from "./extract.js"
import type { Json } from "./json.js"

// CHANGE: pin the archive members and metadata fields exported for a run
// WHY: downstream consumers depend on the exact key set and naming
// QUOTE(TZ): "Fixed key lists (must be reproduced verbatim for compatibility)"
// REF: req-metadata-1
// SOURCE: n/a
// FORMAT THEOREM: keys(build(load, wf)) = loadKeys ∪ workflowKeys
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: descriptor values win over load metrics on shared keys
// COMPLEXITY: O(n)

export const WORKFLOW_LOAD_FILE = "workflow-load.json"
export const WORKFLOW_FILE = "workflow.json"

export const WORKFLOW_LOAD_KEYS: ReadonlyArray<string> = [
  "cpuEfficiency",
  "memoryEfficiency",
  "cost",
  "readBytes",
  "writeBytes",
  "peakCpus",
  "peakMemory",
  "dateCreated",
  "lastUpdated"
]

export const WORKFLOW_KEYS: ReadonlyArray<string> = [
  "status",
  "repository",
  "id",
  "submit",
  "start",
  "complete",
  "dateCreated",
  "lastUpdated",
  "runName",
  "projectName",
  "commitId",
  "sessionId",
  "userName",
  "commandLine",
  "params",
  "configFiles",
  "configText",
  "duration",
  "params.input",
  "params.outdir"
]

export interface MetadataKeys {
  readonly load: ReadonlyArray<string>
  readonly workflow: ReadonlyArray<string>
}

export const defaultMetadataKeys: MetadataKeys = {
  load: WORKFLOW_LOAD_KEYS,
  workflow: WORKFLOW_KEYS
}

/**
 * Flatten both run documents and merge them into one record.
 *
 * @param load - Parsed workflow-load.json.
 * @param workflow - Parsed workflow.json.
 * @param keys - Key lists per document; defaults to the published field set.
 * @returns Merged record with workflow.json values taking precedence.
 *
 * @pure true
 * @invariant load keys come first, then workflow keys not already present
 * @complexity O(n)
 */
export const buildWorkflowMetadata = (
  load: Json,
  workflow: Json,
  keys: MetadataKeys = defaultMetadataKeys
): FlatRecord => mergeRecords(extractPaths(load, keys.load), extractPaths(workflow, keys.workflow))
