import { describe, expect, it } from "@effect/vitest"
import { Effect } from "effect"

import {
  archiveError,
  commandFailed,
  configError,
  missingWorkflowFiles,
  parseFileError,
  renderAppError
} from "../../src/core/errors.js"

describe("renderAppError", () => {
  it.effect("names the missing workflow documents", () =>
    Effect.sync(() => {
      expect(renderAppError(missingWorkflowFiles("abc.tar.gz", ["workflow-load.json", "workflow.json"]))).toBe(
        "Required workflow files not found in the tar archive: workflow-load.json, workflow.json (abc.tar.gz)"
      )
    }))

  it.effect("reports the exit code of a failed client run", () =>
    Effect.sync(() => {
      expect(renderAppError(commandFailed("tw runs dump -id abc", 1))).toBe(
        "Command failed with exit code 1: tw runs dump -id abc"
      )
      expect(renderAppError(commandFailed("tw runs dump -id abc", -1, "spawn tw ENOENT"))).toBe(
        "Command failed: tw runs dump -id abc: spawn tw ENOENT"
      )
    }))

  it.effect("prefixes archive, parse and config failures", () =>
    Effect.sync(() => {
      expect(renderAppError(archiveError("abc.tar.gz", "TAR_BAD_ARCHIVE"))).toBe(
        "Cannot read archive abc.tar.gz: TAR_BAD_ARCHIVE"
      )
      expect(renderAppError(parseFileError("workflow.json", "Unexpected end of JSON input"))).toBe(
        "Invalid JSON in workflow.json: Unexpected end of JSON input"
      )
      expect(renderAppError(configError("logLevel is invalid"))).toBe("Invalid config: logLevel is invalid")
    }))

  it.effect("passes CLI messages through", () =>
    Effect.sync(() => {
      expect(renderAppError({ _tag: "CliError", message: "Unknown flag: --verbose" })).toBe("Unknown flag: --verbose")
    }))
})
