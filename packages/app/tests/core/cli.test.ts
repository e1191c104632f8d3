import { describe, expect, it } from "@effect/vitest"
import { Effect } from "effect"
import * as Either from "effect/Either"

import type { CliArgs } from "../../src/core/cli.js"
import { parseCliArgs } from "../../src/core/cli.js"
import { resolveConfig } from "../../src/core/config.js"

const argv = (...args: ReadonlyArray<string>): ReadonlyArray<string> => ["node", "json-descent", ...args]

const parseOk = (...args: ReadonlyArray<string>): CliArgs => {
  const result = parseCliArgs(argv(...args))
  if (Either.isLeft(result)) {
    throw new Error(result.left.message)
  }
  return result.right
}

const parseError = (...args: ReadonlyArray<string>): string => {
  const result = parseCliArgs(argv(...args))
  if (Either.isRight(result)) {
    throw new Error("expected CLI parsing to fail")
  }
  return result.left.message
}

describe("parseCliArgs", () => {
  it.effect("collects positional files in order", () =>
    Effect.sync(() => {
      const cli = parseOk("a.json", "b.json")
      expect(cli.files).toEqual(["a.json", "b.json"])
      expect(cli.mode).toBeUndefined()
      expect(cli.banner).toBeUndefined()
      expect(cli.silent).toBe(false)
    }))

  it.effect("reads separator mode flags", () =>
    Effect.sync(() => {
      expect(parseOk("--strict", "a.json").mode).toBe("strict")
      expect(parseOk("a.json", "--lenient").mode).toBe("lenient")
      expect(parseOk("--mode=strict", "a.json").mode).toBe("strict")
      expect(parseOk("--mode", "lenient", "a.json").mode).toBe("lenient")
    }))

  it.effect("reads an explicit config path", () =>
    Effect.sync(() => {
      const cli = parseOk("--config", "cfg.json", "a.json")
      expect(cli.configPath).toBe("cfg.json")
      expect(cli.configPathExplicit).toBe(true)
      expect(cli.files).toEqual(["a.json"])
    }))

  it.effect("treats --banner as an optional boolean", () =>
    Effect.sync(() => {
      const off = parseOk("--banner", "false", "x.json")
      expect(off.banner).toBe(false)
      expect(off.files).toEqual(["x.json"])

      const on = parseOk("--banner", "x.json")
      expect(on.banner).toBe(true)
      expect(on.files).toEqual(["x.json"])

      expect(parseOk("--no-banner", "x.json").banner).toBe(false)
    }))

  it.effect("rejects bad input", () =>
    Effect.sync(() => {
      expect(parseError()).toBe("No input files")
      expect(parseError("--wat", "a.json")).toBe("Unknown flag: --wat")
      expect(parseError("-x", "a.json")).toBe("Unknown flag: -x")
      expect(parseError("a.json", "--config")).toBe("Missing value for --config")
      expect(parseError("--mode", "loose", "a.json")).toBe("Unknown mode: loose")
      expect(parseError("--banner=maybe", "a.json")).toBe("Invalid boolean value: maybe")
    }))

  it.effect("treats built-in object property names as unknown flags", () =>
    Effect.sync(() => {
      expect(parseCliArgs(argv("--toString", "a.json"))).toEqual(
        Either.left({ _tag: "CliError", message: "Unknown flag: --toString" })
      )
      expect(parseError("--constructor", "a.json")).toBe("Unknown flag: --constructor")
      expect(parseError("--__proto__", "a.json")).toBe("Unknown flag: --__proto__")
    }))
})

describe("resolveConfig", () => {
  it.effect("falls back to defaults", () =>
    Effect.sync(() => {
      expect(resolveConfig(parseOk("a.json"), undefined)).toEqual({
        mode: "lenient",
        banner: true,
        silent: false,
        verbose: false
      })
    }))

  it.effect("prefers CLI flags over the config file", () =>
    Effect.sync(() => {
      const fileConfig = { mode: "strict", banner: false } as const
      expect(resolveConfig(parseOk("a.json"), fileConfig).mode).toBe("strict")
      expect(resolveConfig(parseOk("a.json"), fileConfig).banner).toBe(false)
      expect(resolveConfig(parseOk("--lenient", "--banner", "a.json"), fileConfig)).toEqual({
        mode: "lenient",
        banner: true,
        silent: false,
        verbose: false
      })
    }))
})
