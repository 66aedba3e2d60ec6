import * as S from "@effect/schema/Schema"
import * as TreeFormatter from "@effect/schema/TreeFormatter"
import * as Effect from "effect/Effect"
import { pipe } from "effect/Function"
import * as tar from "tar"
import type { ReadEntry } from "tar"

import type { AppError } from "../core/errors.js"
import { archiveError, parseFileError } from "../core/errors.js"
import type { Json } from "../core/json.js"

// CHANGE: select named JSON members from the gzip-compressed run archive
// WHY: only two documents of the dump are needed and the archive is read once
// QUOTE(TZ): "Requested names not found among members are simply absent from the result mapping"
// REF: req-archive-1
// SOURCE: n/a
// FORMAT THEOREM: ∀a,N: keys(select(a, N)) = N ∩ members(a)
// PURITY: SHELL
// EFFECT: Effect<ReadonlyMap<string, Json>, AppError, never>
// INVARIANT: the archive stream is closed before members are parsed
// COMPLEXITY: O(n) where n = archive size

const JsonSchema: S.Schema<Json> = S.suspend(() =>
  S.Union(
    S.Null,
    S.Boolean,
    S.Number,
    S.String,
    S.Array(JsonSchema),
    S.Record({ key: S.String, value: JsonSchema })
  )
)

const JsonParseSchema = S.parseJson(JsonSchema)

const regularFileTypes: ReadonlySet<string> = new Set(["File", "OldFile", "ContiguousFile"])

const parseMember = (name: string, raw: string): Effect.Effect<Json, AppError> =>
  pipe(
    S.decodeUnknown(JsonParseSchema)(raw),
    Effect.mapError((error) => parseFileError(name, TreeFormatter.formatErrorSync(error)))
  )

const collectMembers = (
  archivePath: string,
  memberNames: ReadonlySet<string>
): Effect.Effect<ReadonlyMap<string, ReadonlyArray<Buffer>>, AppError> =>
  Effect.tryPromise({
    try: async () => {
      const chunks = new Map<string, Array<Buffer>>()
      await tar.list({
        file: archivePath,
        strict: true,
        onReadEntry: (entry: ReadEntry) => {
          if (!regularFileTypes.has(entry.type) || !memberNames.has(entry.path)) {
            return
          }
          const buffers: Array<Buffer> = []
          chunks.set(entry.path, buffers)
          entry.on("data", (chunk: Buffer) => {
            buffers.push(chunk)
          })
        }
      })
      return chunks
    },
    catch: (error) => archiveError(archivePath, error instanceof Error ? error.message : String(error))
  })

/**
 * Read the requested members of a gzip-compressed tar archive as JSON.
 *
 * @param archivePath - Path to the `.tar.gz` file.
 * @param memberNames - Exact member paths to select.
 * @returns Parsed JSON per member found; absent members have no entry.
 *
 * @pure false
 * @effect FileSystem (via tar)
 * @invariant unmatched members are ignored
 * @complexity O(n)
 */
export const selectArchiveMembers = (
  archivePath: string,
  memberNames: ReadonlySet<string>
): Effect.Effect<ReadonlyMap<string, Json>, AppError> =>
  Effect.gen(function*(_) {
    const collected = yield* _(collectMembers(archivePath, memberNames))
    const result = new Map<string, Json>()
    for (const [name, buffers] of collected) {
      const parsed = yield* _(parseMember(name, Buffer.concat(buffers).toString("utf8")))
      result.set(name, parsed)
    }
    return result
  })
