import type { FileSystem as FileSystemService } from "@effect/platform/FileSystem"
import { FileSystem } from "@effect/platform/FileSystem"
import * as S from "@effect/schema/Schema"
import * as TreeFormatter from "@effect/schema/TreeFormatter"
import * as Effect from "effect/Effect"
import * as Either from "effect/Either"
import { pipe } from "effect/Function"

import type { FileConfig } from "../core/config.js"
import type { AppError } from "../core/errors.js"
import { configError, fileError } from "../core/errors.js"
import { parseLogLevelName } from "../core/log-level.js"

// CHANGE: decode .seqera-metadata.json with schema validation
// WHY: keep boundary data typed and reject invalid config early
// QUOTE(TZ): "an absent default config file is ignored, an absent explicit one is a FileError"
// REF: req-config-file-1
// SOURCE: n/a
// FORMAT THEOREM: ∀c: decode(c) = Right(cfg) → cfg fields have correct types
// PURITY: SHELL
// EFFECT: Effect<FileConfig | undefined, AppError, FileSystem>
// INVARIANT: missing config yields undefined
// COMPLEXITY: O(n)

const RawConfigSchema = S.partial(
  S.Struct({
    cli: S.String,
    logLevel: S.String
  })
)

const ConfigSchema = S.parseJson(RawConfigSchema)

const decodeLogLevel = (raw: string | undefined): Effect.Effect<FileConfig, AppError> => {
  if (raw === undefined) {
    return Effect.succeed({})
  }
  const parsed = parseLogLevelName(raw)
  return Either.isLeft(parsed)
    ? Effect.fail(configError(parsed.left))
    : Effect.succeed({ logLevel: parsed.right })
}

const decodeConfig = (raw: string): Effect.Effect<FileConfig, AppError> =>
  pipe(
    S.decodeUnknown(ConfigSchema)(raw),
    Effect.mapError((error) => configError(TreeFormatter.formatErrorSync(error))),
    Effect.flatMap((config) =>
      Effect.map(decodeLogLevel(config.logLevel), (level) => ({
        ...(config.cli === undefined ? {} : { cli: config.cli }),
        ...level
      }))
    )
  )

export const loadConfigFile = (
  path: string,
  explicit: boolean
): Effect.Effect<FileConfig | undefined, AppError, FileSystemService> =>
  Effect.gen(function*(_) {
    const fs = yield* _(FileSystem)
    const exists = yield* _(
      fs.exists(path).pipe(Effect.mapError((error) => fileError(String(error))))
    )
    if (!exists) {
      if (explicit) {
        return yield* _(Effect.fail(fileError(`Config file not found: ${path}`)))
      }
      return
    }
    const contents = yield* _(
      fs.readFileString(path).pipe(Effect.mapError((error) => fileError(String(error))))
    )
    yield* _(Effect.logDebug(`Loaded config from ${path}`))
    return yield* _(decodeConfig(contents))
  })
