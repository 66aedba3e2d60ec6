import { describe, expect, it } from "@effect/vitest"
import { Effect } from "effect"
import * as Either from "effect/Either"
import * as LogLevel from "effect/LogLevel"

import { logLevelNames, parseLogLevelName, toLogLevel } from "../../src/core/log-level.js"

describe("toLogLevel", () => {
  it.effect("maps every verbosity name onto an Effect log level", () =>
    Effect.sync(() => {
      expect(logLevelNames.map((name) => toLogLevel(name))).toEqual([
        LogLevel.Fatal,
        LogLevel.Error,
        LogLevel.Warning,
        LogLevel.Info,
        LogLevel.Debug
      ])
    }))
})

describe("parseLogLevelName", () => {
  it.effect("upper-cases accepted names", () =>
    Effect.sync(() => {
      expect(parseLogLevelName("critical")).toEqual(Either.right("CRITICAL"))
      expect(parseLogLevelName("Info")).toEqual(Either.right("INFO"))
    }))

  it.effect("rejects names outside the accepted set", () =>
    Effect.sync(() => {
      expect(parseLogLevelName("FATAL")).toEqual(
        Either.left("Invalid log level: FATAL (expected one of CRITICAL, ERROR, WARNING, INFO, DEBUG)")
      )
    }))
})
