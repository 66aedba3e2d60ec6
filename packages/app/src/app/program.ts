import type { FileSystem as FileSystemService } from "@effect/platform/FileSystem"
import { Path } from "@effect/platform/Path"
import type { Path as PathService } from "@effect/platform/Path"
import { Effect, Logger } from "effect"
import type * as Either from "effect/Either"

import type { CliArgs } from "../core/cli.js"
import { parseCliArgs } from "../core/cli.js"
import type { ResolvedConfig } from "../core/config.js"
import { resolveConfig } from "../core/config.js"
import { type AppError, missingWorkflowFiles } from "../core/errors.js"
import type { FlatRecord } from "../core/extract.js"
import type { Json } from "../core/json.js"
import { toLogLevel } from "../core/log-level.js"
import { buildWorkflowMetadata, WORKFLOW_FILE, WORKFLOW_LOAD_FILE } from "../core/metadata.js"
import { selectArchiveMembers } from "../shell/archive.js"
import { loadConfigFile } from "../shell/config-file.js"
import { writeMetadataFile } from "../shell/metadata-file.js"
import { RunsDump } from "../shell/runs-dump.js"

// CHANGE: orchestrate dump → select → flatten → write with functional core + imperative shell
// WHY: enforce single entrypoint with typed errors and deterministic outputs
// QUOTE(TZ): "run end-to-end extraction for one workflow"
// REF: req-program-1
// SOURCE: n/a
// FORMAT THEOREM: ∀argv: run(argv) = Right(r) → read(r.outputPath) = render(r.metadata)
// PURITY: SHELL
// EFFECT: Effect<ProgramResult, AppError, FileSystem | Path | RunsDump>
// INVARIANT: output is written only after both workflow documents were found
// COMPLEXITY: O(n)

export interface ProgramResult {
  readonly outputPath: string
  readonly metadata: FlatRecord
  readonly exitCode: number
}

type ProgramEnv = FileSystemService | PathService | RunsDump

interface WorkflowDocuments {
  readonly load: Json
  readonly workflow: Json
}

const fromEither = <A, E>(either: Either.Either<A, E>): Effect.Effect<A, E> =>
  either._tag === "Left" ? Effect.fail(either.left) : Effect.succeed(either.right)

export const archiveFileName = (workflowId: string): string => `${workflowId}.tar.gz`

const loadConfig = (
  cli: CliArgs,
  cwd: string
): Effect.Effect<ResolvedConfig, AppError, FileSystemService | PathService> =>
  Effect.gen(function*(_) {
    const path = yield* _(Path)
    const configFile = yield* _(loadConfigFile(path.resolve(cwd, cli.configPath), cli.configPathExplicit))
    return resolveConfig(cli, configFile)
  })

const readWorkflowDocuments = (
  archivePath: string
): Effect.Effect<WorkflowDocuments, AppError> =>
  Effect.gen(function*(_) {
    const members = yield* _(selectArchiveMembers(archivePath, new Set([WORKFLOW_LOAD_FILE, WORKFLOW_FILE])))
    yield* _(Effect.logDebug(`Archive members found: ${[...members.keys()].join(", ") || "(none)"}`))
    const load = members.get(WORKFLOW_LOAD_FILE)
    const workflow = members.get(WORKFLOW_FILE)
    if (load === undefined || workflow === undefined) {
      const missing = [WORKFLOW_LOAD_FILE, WORKFLOW_FILE].filter((name) => !members.has(name))
      return yield* _(Effect.fail(missingWorkflowFiles(archivePath, missing)))
    }
    return { load, workflow }
  })

const extractMetadata = (
  cli: CliArgs,
  config: ResolvedConfig,
  cwd: string
): Effect.Effect<ProgramResult, AppError, ProgramEnv> =>
  Effect.gen(function*(_) {
    const path = yield* _(Path)
    const runsDump = yield* _(RunsDump)
    const archivePath = path.join(cwd, archiveFileName(cli.workflowId))
    const outputPath = path.resolve(cwd, cli.output)

    yield* _(Effect.logInfo("Getting workflow run data..."))
    yield* _(runsDump.dump({
      executable: config.executable,
      workspace: cli.workspace,
      workflowId: cli.workflowId,
      archivePath,
      cwd
    }))

    yield* _(Effect.logInfo("Extracting workflow metadata..."))
    yield* _(Effect.logDebug(`Reading archive ${archivePath}`))
    const documents = yield* _(readWorkflowDocuments(archivePath))

    yield* _(Effect.logInfo("Parsing workflow metadata..."))
    const metadata = buildWorkflowMetadata(documents.load, documents.workflow)

    yield* _(Effect.logInfo("Writing workflow metadata to JSON file..."))
    yield* _(writeMetadataFile(outputPath, metadata))

    yield* _(Effect.logInfo(`Workflow metadata written to ${cli.output}.`))
    return { outputPath, metadata, exitCode: 0 }
  })

/**
 * Run CLI program with the provided argv.
 *
 * @param argv - process.argv array.
 * @param cwd - Directory the archive is dumped into and relative paths resolve against.
 * @returns ProgramResult with the written metadata and exit code.
 *
 * @pure false
 * @effect FileSystem, Path, RunsDump, Logger
 * @invariant no output file is written when a workflow document is missing
 * @complexity O(n)
 */
export const runCli = (
  argv: ReadonlyArray<string>,
  cwd: string
): Effect.Effect<ProgramResult, AppError, ProgramEnv> =>
  Effect.gen(function*(_) {
    const cli = yield* _(fromEither(parseCliArgs(argv)))
    const config = yield* _(loadConfig(cli, cwd))
    return yield* _(
      extractMetadata(cli, config, cwd).pipe(Logger.withMinimumLogLevel(toLogLevel(config.logLevel)))
    )
  })
