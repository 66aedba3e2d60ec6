import * as Command from "@effect/platform/Command"
import { CommandExecutor } from "@effect/platform/CommandExecutor"
import * as Context from "effect/Context"
import * as Effect from "effect/Effect"
import { pipe } from "effect/Function"
import * as Layer from "effect/Layer"

import type { AppError } from "../core/errors.js"
import { commandFailed } from "../core/errors.js"

// CHANGE: wrap `tw runs dump` behind a single narrow service
// WHY: keep orchestration testable without spawning the platform client
// QUOTE(TZ): "produce archive for (workspace, workflow_id) at path"
// REF: req-runs-dump-1
// SOURCE: n/a
// FORMAT THEOREM: dump(r) succeeds → exists(r.archivePath)
// PURITY: SHELL
// EFFECT: Effect<void, AppError, CommandExecutor>
// INVARIANT: stdout/stderr are inherited
// COMPLEXITY: O(1) beyond the external process

export interface DumpRequest {
  readonly executable: string
  readonly workspace: string
  readonly workflowId: string
  readonly archivePath: string
  readonly cwd: string
}

export interface RunsDumpService {
  readonly dump: (request: DumpRequest) => Effect.Effect<void, AppError>
}

export class RunsDump extends Context.Tag("RunsDump")<RunsDump, RunsDumpService>() {}

export const dumpArgs = (request: DumpRequest): ReadonlyArray<string> => [
  "runs",
  "dump",
  "-id",
  request.workflowId,
  "-o",
  request.archivePath,
  "-w",
  request.workspace
]

const describeCommand = (request: DumpRequest): string => [request.executable, ...dumpArgs(request)].join(" ")

const runDump = (executor: CommandExecutor) => (request: DumpRequest): Effect.Effect<void, AppError> =>
  Effect.gen(function*(_) {
    const commandLine = describeCommand(request)
    yield* _(Effect.logDebug(`Running ${commandLine}`))
    const command = pipe(
      Command.make(request.executable, ...dumpArgs(request)),
      Command.stdin("inherit"),
      Command.stdout("inherit"),
      Command.stderr("inherit"),
      Command.workingDirectory(request.cwd)
    )
    const exitCode = yield* _(
      Command.exitCode(command).pipe(
        Effect.provideService(CommandExecutor, executor),
        Effect.mapError((error) => commandFailed(commandLine, -1, String(error)))
      )
    )
    if (Number(exitCode) !== 0) {
      return yield* _(Effect.fail(commandFailed(commandLine, Number(exitCode))))
    }
  })

export const RunsDumpLive: Layer.Layer<RunsDump, never, CommandExecutor> = Layer.effect(
  RunsDump,
  Effect.map(CommandExecutor, (executor) => ({ dump: runDump(executor) }))
)
