#!/usr/bin/env node
import { NodeContext, NodeRuntime } from "@effect/platform-node"
import { Effect, Layer } from "effect"

import { renderAppError } from "../core/errors.js"
import { RunsDumpLive } from "../shell/runs-dump.js"
import { runCli } from "./program.js"

// CHANGE: wire CLI program into Node runtime with proper teardown
// WHY: execute effects with platform services and typed error handling
// QUOTE(TZ): "non-zero/uncaught-error termination on any failure"
// REF: req-main-1
// SOURCE: n/a
// FORMAT THEOREM: runMain(program) terminates with exitCode from ProgramResult
// PURITY: SHELL
// EFFECT: Effect<void, never, NodeContext | RunsDump>
// INVARIANT: every AppError is logged once and yields exit code 1
// COMPLEXITY: O(1)

const main = Effect.gen(function*(_) {
  const cwd = yield* _(Effect.sync(() => process.cwd()))
  const result = yield* _(runCli(process.argv, cwd))
  if (result.exitCode !== 0) {
    yield* _(
      Effect.sync(() => {
        process.exitCode = result.exitCode
      })
    )
  }
}).pipe(
  Effect.catchAll((error) =>
    Effect.logError(renderAppError(error)).pipe(
      Effect.zipRight(
        Effect.sync(() => {
          process.exitCode = 1
        })
      )
    )
  )
)

const MainLayer = RunsDumpLive.pipe(Layer.provideMerge(NodeContext.layer))

NodeRuntime.runMain(Effect.provide(main, MainLayer))
