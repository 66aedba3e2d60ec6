import { Match } from "effect"

import type { CliError } from "./cli.js"

// CHANGE: unify error algebra for the metadata extraction tool
// WHY: provide typed failures for program flow and a single user-facing rendering
// QUOTE(TZ): "All failures abort the run with a non-zero exit"
// REF: req-errors-1
// SOURCE: n/a
// FORMAT THEOREM: ∀e ∈ AppError: e._tag is stable and exhaustively matchable
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: error tags are unique
// COMPLEXITY: O(1)/O(1)

export type ConfigError = { readonly _tag: "ConfigError"; readonly message: string }
export type FileError = { readonly _tag: "FileError"; readonly message: string }
export type ArchiveError = { readonly _tag: "ArchiveError"; readonly path: string; readonly error: string }
export type ParseFileError = { readonly _tag: "ParseError"; readonly file: string; readonly error: string }
export type CommandFailed = {
  readonly _tag: "CommandFailed"
  readonly command: string
  readonly exitCode: number
  readonly error: string | undefined
}
export type MissingWorkflowFiles = {
  readonly _tag: "MissingWorkflowFiles"
  readonly archive: string
  readonly files: ReadonlyArray<string>
  readonly message: string
}

export type AppError =
  | CliError
  | ConfigError
  | FileError
  | ArchiveError
  | ParseFileError
  | CommandFailed
  | MissingWorkflowFiles

export const configError = (message: string): ConfigError => ({
  _tag: "ConfigError",
  message
})

export const fileError = (message: string): FileError => ({
  _tag: "FileError",
  message
})

export const archiveError = (path: string, error: string): ArchiveError => ({
  _tag: "ArchiveError",
  path,
  error
})

export const parseFileError = (file: string, error: string): ParseFileError => ({
  _tag: "ParseError",
  file,
  error
})

export const commandFailed = (
  command: string,
  exitCode: number,
  error?: string
): CommandFailed => ({
  _tag: "CommandFailed",
  command,
  exitCode,
  error
})

export const missingWorkflowFiles = (
  archive: string,
  files: ReadonlyArray<string>
): MissingWorkflowFiles => ({
  _tag: "MissingWorkflowFiles",
  archive,
  files,
  message: `Required workflow files not found in the tar archive: ${files.join(", ")}`
})

/**
 * Render an AppError as a single human-readable line.
 *
 * @pure true
 * @invariant every tag has a rendering
 * @complexity O(n) in the size of the error payload
 */
export const renderAppError = (error: AppError): string =>
  Match.value(error).pipe(
    Match.tag("CliError", (value) => value.message),
    Match.tag("ConfigError", (value) => `Invalid config: ${value.message}`),
    Match.tag("FileError", (value) => value.message),
    Match.tag("ArchiveError", (value) => `Cannot read archive ${value.path}: ${value.error}`),
    Match.tag("ParseError", (value) => `Invalid JSON in ${value.file}: ${value.error}`),
    Match.tag("CommandFailed", (value) =>
      value.error === undefined
        ? `Command failed with exit code ${value.exitCode}: ${value.command}`
        : `Command failed: ${value.command}: ${value.error}`),
    Match.tag("MissingWorkflowFiles", (value) => `${value.message} (${value.archive})`),
    Match.exhaustive
  )
