import type { FileSystem as FileSystemService } from "@effect/platform/FileSystem"
import { FileSystem } from "@effect/platform/FileSystem"
import * as Effect from "effect/Effect"

import type { AppError } from "../core/errors.js"
import { fileError } from "../core/errors.js"
import type { FlatRecord } from "../core/extract.js"
import { renderMetadataJson } from "../core/render.js"

// CHANGE: write the merged metadata record to disk
// WHY: isolate filesystem IO from rendering
// QUOTE(TZ): "serialize the merged mapping to the output path"
// REF: req-metadata-io-1
// SOURCE: n/a
// FORMAT THEOREM: write(p, r); read(p) = render(r)
// PURITY: SHELL
// EFFECT: Effect<void, AppError, FileSystem>
// INVARIANT: an existing file is overwritten
// COMPLEXITY: O(n)

export const writeMetadataFile = (
  path: string,
  metadata: FlatRecord
): Effect.Effect<void, AppError, FileSystemService> =>
  Effect.gen(function*(_) {
    const fs = yield* _(FileSystem)
    yield* _(
      fs.writeFileString(path, renderMetadataJson(metadata)).pipe(
        Effect.mapError((error) => fileError(String(error)))
      )
    )
  })
