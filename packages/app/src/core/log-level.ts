import { Match } from "effect"
import * as Either from "effect/Either"
import * as LogLevel from "effect/LogLevel"

// CHANGE: map verbosity names accepted on the command line onto Effect log levels
// WHY: configure the logger once at startup from a single argument
// QUOTE(TZ): "one of CRITICAL/ERROR/WARNING/INFO/DEBUG, default INFO, case-insensitive"
// REF: req-log-level-1
// SOURCE: n/a
// FORMAT THEOREM: ∀s: parse(s) = Right(n) → n = upper(s)
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: every name maps to exactly one LogLevel
// COMPLEXITY: O(1)

export type LogLevelName = "CRITICAL" | "ERROR" | "WARNING" | "INFO" | "DEBUG"

export const logLevelNames: ReadonlyArray<LogLevelName> = ["CRITICAL", "ERROR", "WARNING", "INFO", "DEBUG"]

export const defaultLogLevel: LogLevelName = "INFO"

const isLogLevelName = (value: string): value is LogLevelName =>
  logLevelNames.some((name) => name === value)

export const parseLogLevelName = (value: string): Either.Either<LogLevelName, string> => {
  const upper = value.toUpperCase()
  return isLogLevelName(upper)
    ? Either.right(upper)
    : Either.left(`Invalid log level: ${value} (expected one of ${logLevelNames.join(", ")})`)
}

export const toLogLevel = (name: LogLevelName): LogLevel.LogLevel =>
  Match.value(name).pipe(
    Match.when("CRITICAL", () => LogLevel.Fatal),
    Match.when("ERROR", () => LogLevel.Error),
    Match.when("WARNING", () => LogLevel.Warning),
    Match.when("INFO", () => LogLevel.Info),
    Match.when("DEBUG", () => LogLevel.Debug),
    Match.exhaustive
  )
