import { describe, expect, it } from "@effect/vitest"
import { Effect } from "effect"

import { extractPaths, mergeRecords, resolvePath } from "../../src/core/extract.js"
import type { Json } from "../../src/core/json.js"

const asObject = (record: ReadonlyMap<string, Json>): Record<string, Json> => Object.fromEntries(record)

describe("resolvePath", () => {
  it.effect("descends into nested objects", () =>
    Effect.sync(() => {
      expect(resolvePath({ a: { b: 5 } }, "a.b")).toBe(5)
    }))

  it.effect("returns null for a missing top-level key", () =>
    Effect.sync(() => {
      expect(resolvePath({}, "x")).toBeNull()
    }))

  it.effect("returns null for a missing nested key", () =>
    Effect.sync(() => {
      expect(resolvePath({ a: { c: 1 } }, "a.b")).toBeNull()
    }))

  it.effect("returns null when an intermediate segment is a scalar", () =>
    Effect.sync(() => {
      expect(resolvePath({ a: 5 }, "a.b")).toBeNull()
      expect(resolvePath({ a: "text" }, "a.length")).toBeNull()
      expect(resolvePath({ a: null }, "a.b")).toBeNull()
    }))

  it.effect("does not index into arrays", () =>
    Effect.sync(() => {
      expect(resolvePath({ a: [10, 20] }, "a.0")).toBeNull()
    }))

  it.effect("ignores inherited object properties", () =>
    Effect.sync(() => {
      expect(resolvePath({ a: {} }, "a.constructor")).toBeNull()
      expect(resolvePath({}, "toString")).toBeNull()
    }))

  it.effect("returns non-scalar values as they are", () =>
    Effect.sync(() => {
      const tree: Json = { params: { input: "s3://x", tags: ["a", "b"] } }
      expect(resolvePath(tree, "params")).toEqual({ input: "s3://x", tags: ["a", "b"] })
      expect(resolvePath(tree, "params.tags")).toEqual(["a", "b"])
    }))

  it.effect("treats a non-object root as absent", () =>
    Effect.sync(() => {
      expect(resolvePath([{ a: 1 }], "a")).toBeNull()
      expect(resolvePath(null, "a")).toBeNull()
    }))
})

describe("extractPaths", () => {
  it.effect("maps each dotted key to its value", () =>
    Effect.sync(() => {
      expect(asObject(extractPaths({ a: { b: 5 } }, ["a.b"]))).toEqual({ "a.b": 5 })
    }))

  it.effect("yields null for non-object mid-path", () =>
    Effect.sync(() => {
      expect(asObject(extractPaths({ a: 5 }, ["a.b"]))).toEqual({ "a.b": null })
    }))

  it.effect("yields null for missing keys", () =>
    Effect.sync(() => {
      expect(asObject(extractPaths({}, ["x"]))).toEqual({ x: null })
    }))

  it.effect("keeps explicit null values as null", () =>
    Effect.sync(() => {
      expect(asObject(extractPaths({ a: null }, ["a"]))).toEqual({ a: null })
    }))

  it.effect("preserves key-list order", () =>
    Effect.sync(() => {
      const tree: Json = { z: 1, a: { b: 2 }, m: 3 }
      const result = extractPaths(tree, ["m", "missing", "a.b", "z", "a"])
      expect([...result.keys()]).toEqual(["m", "missing", "a.b", "z", "a"])
      expect([...result.values()]).toEqual([3, null, 2, 1, { b: 2 }])
    }))

  it.effect("keeps integer-like keys in key-list order", () =>
    Effect.sync(() => {
      const result = extractPaths({ b: 1, "2": 2 }, ["b", "2"])
      expect([...result.keys()]).toEqual(["b", "2"])
    }))

  it.effect("collapses duplicate keys into one entry", () =>
    Effect.sync(() => {
      const result = extractPaths({ a: 1, b: 2 }, ["a", "b", "a"])
      expect([...result.entries()]).toEqual([["a", 1], ["b", 2]])
    }))

  it.effect("returns the whole object and its members as separate keys", () =>
    Effect.sync(() => {
      const tree: Json = { params: { input: "in.csv", outdir: "results" } }
      const result = extractPaths(tree, ["params", "params.input", "params.outdir"])
      expect(asObject(result)).toEqual({
        params: { input: "in.csv", outdir: "results" },
        "params.input": "in.csv",
        "params.outdir": "results"
      })
    }))
})

describe("mergeRecords", () => {
  it.effect("unions records with disjoint keys", () =>
    Effect.sync(() => {
      const merged = mergeRecords(extractPaths({ a: 1 }, ["a"]), extractPaths({ b: 2 }, ["b"]))
      expect([...merged.entries()]).toEqual([["a", 1], ["b", 2]])
    }))

  it.effect("lets the second record win on shared keys", () =>
    Effect.sync(() => {
      const first = extractPaths({ a: 1, shared: "first" }, ["shared", "a"])
      const second = extractPaths({ shared: "second", b: 2 }, ["b", "shared"])
      const merged = mergeRecords(first, second)
      expect([...merged.entries()]).toEqual([["shared", "second"], ["a", 1], ["b", 2]])
    }))

  it.effect("overwrites with null when the second record lacks the value", () =>
    Effect.sync(() => {
      const merged = mergeRecords(extractPaths({ shared: 1 }, ["shared"]), extractPaths({}, ["shared"]))
      expect(merged.get("shared")).toBeNull()
    }))
})
