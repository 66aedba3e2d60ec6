import * as Either from "effect/Either"

import type { LogLevelName } from "./log-level.js"
import { parseLogLevelName } from "./log-level.js"

// CHANGE: implement deterministic CLI parsing for seqera-run-metadata
// WHY: keep CLI decoding pure and testable at the boundary
// QUOTE(TZ): "-w/--workspace, -id/--workflow_id, -o/--output, -l/--log_level"
// REF: req-cli-parse-1
// SOURCE: n/a
// FORMAT THEOREM: ∀argv: parse(argv) = Right(args) → args.workspace ≠ "" ∧ args.workflowId ≠ "" ∧ args.output ≠ ""
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: unknown flags and positional arguments are rejected
// COMPLEXITY: O(n) where n = argv length

export interface CliArgs {
  readonly workspace: string
  readonly workflowId: string
  readonly output: string
  readonly logLevel: LogLevelName | undefined
  readonly configPath: string
  readonly configPathExplicit: boolean
}

export type CliError = { readonly _tag: "CliError"; readonly message: string }

const cliError = (message: string): CliError => ({ _tag: "CliError", message })

export const defaultConfigPath = "./.seqera-metadata.json"

interface DraftArgs {
  readonly workspace: string | undefined
  readonly workflowId: string | undefined
  readonly output: string | undefined
  readonly logLevel: LogLevelName | undefined
  readonly configPath: string
  readonly configPathExplicit: boolean
}

const emptyDraft: DraftArgs = {
  workspace: undefined,
  workflowId: undefined,
  output: undefined,
  logLevel: undefined,
  configPath: defaultConfigPath,
  configPathExplicit: false
}

type FlagName = "workspace" | "workflow_id" | "output" | "log_level" | "config"

const flagAliases: Readonly<Record<string, FlagName>> = {
  "-w": "workspace",
  "--workspace": "workspace",
  "-id": "workflow_id",
  "--workflow_id": "workflow_id",
  "-o": "output",
  "--output": "output",
  "-l": "log_level",
  "--log_level": "log_level",
  "--config": "config"
}

type FlagUpdate = (args: DraftArgs, value: string) => Either.Either<DraftArgs, CliError>

const flagUpdates: Record<FlagName, FlagUpdate> = {
  workspace: (args, value) => Either.right({ ...args, workspace: value }),
  workflow_id: (args, value) => Either.right({ ...args, workflowId: value }),
  output: (args, value) => Either.right({ ...args, output: value }),
  log_level: (args, value) =>
    Either.map(
      Either.mapLeft(parseLogLevelName(value), cliError),
      (logLevel) => ({ ...args, logLevel })
    ),
  config: (args, value) => Either.right({ ...args, configPath: value, configPathExplicit: true })
}

const isFlag = (value: string): boolean => value.startsWith("-")

interface SplitFlag {
  readonly raw: string
  readonly inlineValue: string | undefined
}

const splitInline = (raw: string): SplitFlag => {
  if (!raw.startsWith("--")) {
    return { raw, inlineValue: undefined }
  }
  const separator = raw.indexOf("=")
  return separator === -1
    ? { raw, inlineValue: undefined }
    : { raw: raw.slice(0, separator), inlineValue: raw.slice(separator + 1) }
}

const readFlagValue = (
  flag: string,
  inlineValue: string | undefined,
  nextValue: string | undefined
): Either.Either<string, CliError> => {
  if (inlineValue !== undefined) {
    return Either.right(inlineValue)
  }
  if (nextValue === undefined || isFlag(nextValue)) {
    return Either.left(cliError(`Missing value for ${flag}`))
  }
  return Either.right(nextValue)
}

const parseFlag = (
  current: string,
  nextValue: string | undefined,
  args: DraftArgs
): Either.Either<{ readonly next: DraftArgs; readonly consumed: number }, CliError> => {
  const { inlineValue, raw } = splitInline(current)
  const name = flagAliases[raw]
  if (name === undefined) {
    return Either.left(cliError(`Unknown flag: ${raw}`))
  }
  const value = readFlagValue(raw, inlineValue, nextValue)
  if (Either.isLeft(value)) {
    return Either.left(value.left)
  }
  return Either.map(flagUpdates[name](args, value.right), (next) => ({
    next,
    consumed: inlineValue === undefined ? 2 : 1
  }))
}

const parseFlags = (rawArgs: ReadonlyArray<string>): Either.Either<DraftArgs, CliError> => {
  let args = emptyDraft
  let index = 0
  while (index < rawArgs.length) {
    const current = rawArgs[index]
    if (current === undefined) {
      return Either.left(cliError("Unexpected end of arguments"))
    }
    if (!isFlag(current)) {
      return Either.left(cliError(`Unexpected positional argument: ${current}`))
    }
    const parsed = parseFlag(current, rawArgs[index + 1], args)
    if (Either.isLeft(parsed)) {
      return Either.left(parsed.left)
    }
    args = parsed.right.next
    index += parsed.right.consumed
  }
  return Either.right(args)
}

const requireValue = (
  value: string | undefined,
  flag: string
): Either.Either<string, CliError> =>
  value === undefined || value.length === 0
    ? Either.left(cliError(`Missing required flag: ${flag}`))
    : Either.right(value)

const finalizeArgs = (draft: DraftArgs): Either.Either<CliArgs, CliError> =>
  Either.all({
    workspace: requireValue(draft.workspace, "-w/--workspace"),
    workflowId: requireValue(draft.workflowId, "-id/--workflow_id"),
    output: requireValue(draft.output, "-o/--output")
  }).pipe(
    Either.map((required) => ({
      ...required,
      logLevel: draft.logLevel,
      configPath: draft.configPath,
      configPathExplicit: draft.configPathExplicit
    }))
  )

/**
 * Parse CLI arguments into a typed configuration.
 *
 * @param argv - Raw process.argv array.
 * @returns Either with parsed CliArgs or CliError.
 *
 * @pure true
 * @invariant the last occurrence of a repeated flag wins
 * @complexity O(n)
 */
export const parseCliArgs = (
  argv: ReadonlyArray<string>
): Either.Either<CliArgs, CliError> => Either.flatMap(parseFlags(argv.slice(2)), finalizeArgs)
