import type { CliArgs } from "./cli.js"
import type { LogLevelName } from "./log-level.js"
import { defaultLogLevel } from "./log-level.js"

// CHANGE: define config merging rules and defaults
// WHY: ensure CLI flags override config file and defaults deterministically
// QUOTE(TZ): "Priority: CLI flags > config file > defaults."
// REF: req-config-merge-1
// SOURCE: n/a
// FORMAT THEOREM: ∀k: resolve(cli, cfg).k = cli.k ?? cfg.k ?? default(k)
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: resolved executable is non-empty
// COMPLEXITY: O(1)/O(1)

export interface FileConfig {
  readonly cli?: string
  readonly logLevel?: LogLevelName
}

export interface ResolvedConfig {
  readonly executable: string
  readonly logLevel: LogLevelName
}

export const defaultExecutable = "tw"

const resolveExecutable = (fileConfig: FileConfig | undefined): string => {
  const configured = fileConfig?.cli?.trim()
  return configured === undefined || configured.length === 0 ? defaultExecutable : configured
}

/**
 * Resolve the effective config from CLI flags, file config, and defaults.
 *
 * @param cli - Parsed CLI arguments.
 * @param fileConfig - Optional config loaded from .seqera-metadata.json.
 * @returns Resolved configuration.
 *
 * @pure true
 * @invariant logLevel falls back to INFO
 * @complexity O(1)
 */
export const resolveConfig = (
  cli: CliArgs,
  fileConfig: FileConfig | undefined
): ResolvedConfig => ({
  executable: resolveExecutable(fileConfig),
  logLevel: cli.logLevel ?? fileConfig?.logLevel ?? defaultLogLevel
})
