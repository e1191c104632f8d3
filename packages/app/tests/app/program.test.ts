import { describe, expect, it } from "@effect/vitest"
import { Effect } from "effect"
import * as Either from "effect/Either"

import { formatBlock, runCli, runCliToExitCode } from "../../src/app/program.js"
import { renderAppError } from "../../src/core/errors.js"
import { arrayDocument, jsonInteger } from "../../src/core/value.js"
import { provideNodeContext, withTempDir, writeFixture } from "./test-helpers.js"

const argv = (...args: ReadonlyArray<string>): ReadonlyArray<string> => ["node", "json-descent", ...args]

describe("formatBlock", () => {
  it.effect("frames a rendered document with its variant label", () =>
    Effect.sync(() => {
      const document = arrayDocument([jsonInteger(1n)])
      expect(formatBlock(document, "[\n  1,\n]\n")).toBe(
        "======== BEGIN ARRAY ========\n\n[\n  1,\n]\n\n======== END ARRAY ========\n"
      )
    }))
})

describe("runCli", () => {
  it.effect("renders each file between banners, in order", () =>
    withTempDir((context) =>
      Effect.gen(function*(_) {
        const objectFile = yield* _(writeFixture(context, "object.json", `{"name": "ok", "count": 3}`))
        const arrayFile = yield* _(writeFixture(context, "array.json", "[1.5, true]"))

        const result = yield* _(runCli(argv(objectFile, arrayFile, "--silent")))

        expect(result.exitCode).toBe(0)
        expect(result.reports.map((report) => report.file)).toEqual([objectFile, arrayFile])
        expect(result.reports[0]?.output).toBe(
          "======== BEGIN OBJECT ========\n\n{\n  \"name\": \"ok\",\n  \"count\": 3,\n}\n\n" +
            "======== END OBJECT ========\n"
        )
        expect(result.reports[1]?.output).toBe(
          "======== BEGIN ARRAY ========\n\n[\n  1.5,\n  true,\n]\n\n======== END ARRAY ========\n"
        )
      })
    ).pipe(provideNodeContext))

  it.effect("prints the bare rendering without banners", () =>
    withTempDir((context) =>
      Effect.gen(function*(_) {
        const file = yield* _(writeFixture(context, "array.json", "[1,2,]"))
        const result = yield* _(runCli(argv("--no-banner", "--silent", file)))
        expect(result.reports[0]?.output).toBe("[\n  1,\n  2,\n]\n")
      })
    ).pipe(provideNodeContext))

  it.effect("fails with the file and line in strict mode", () =>
    withTempDir((context) =>
      Effect.gen(function*(_) {
        const file = yield* _(writeFixture(context, "array.json", "[\n1,\n2,\n]"))
        const result = yield* _(Effect.either(runCli(argv("--strict", "--silent", file))))
        expect(Either.isLeft(result)).toBe(true)
        if (Either.isLeft(result)) {
          expect(result.left).toEqual({
            _tag: "SourceParseError",
            file,
            error: { _tag: "FatalParseError", line: 4, message: "Trailing comma before ']'" }
          })
          expect(renderAppError(result.left)).toBe(`${file}: [Error at line 4]: Trailing comma before ']'`)
        }
      })
    ).pipe(provideNodeContext))

  it.effect("takes separator mode and banner from a config file", () =>
    withTempDir((context) =>
      Effect.gen(function*(_) {
        const config = yield* _(writeFixture(context, "config.json", `{"mode": "strict", "banner": false}`))
        const good = yield* _(writeFixture(context, "good.json", "[1]"))
        const bad = yield* _(writeFixture(context, "bad.json", "[1 2]"))

        const result = yield* _(runCli(argv("--config", config, "--silent", good)))
        expect(result.reports[0]?.output).toBe("[\n  1,\n]\n")

        const failed = yield* _(Effect.either(runCli(argv("--config", config, "--silent", bad))))
        expect(Either.isLeft(failed)).toBe(true)
        if (Either.isLeft(failed) && failed.left._tag === "SourceParseError") {
          expect(failed.left.error.message).toBe("Expected ',' or ']', found '2'")
        }
      })
    ).pipe(provideNodeContext))

  it.effect("rejects an invalid config file", () =>
    withTempDir((context) =>
      Effect.gen(function*(_) {
        const config = yield* _(writeFixture(context, "config.json", `{"mode": "loose"}`))
        const file = yield* _(writeFixture(context, "good.json", "[1]"))
        const result = yield* _(Effect.either(runCli(argv("--config", config, "--silent", file))))
        expect(Either.isLeft(result)).toBe(true)
        if (Either.isLeft(result)) {
          expect(result.left._tag).toBe("ConfigError")
        }
      })
    ).pipe(provideNodeContext))

  it.effect("reports a missing input file", () =>
    withTempDir(({ path, tempDir }) =>
      Effect.gen(function*(_) {
        const missing = path.join(tempDir, "missing.json")
        const result = yield* _(Effect.either(runCli(argv("--silent", missing))))
        expect(Either.isLeft(result)).toBe(true)
        if (Either.isLeft(result)) {
          expect(result.left._tag).toBe("FileError")
        }
      })
    ).pipe(provideNodeContext))
})

describe("runCliToExitCode", () => {
  it.effect("maps success to 0 and failure to 1", () =>
    withTempDir((context) =>
      Effect.gen(function*(_) {
        const good = yield* _(writeFixture(context, "good.json", `{"a": 1}`))
        const bad = yield* _(writeFixture(context, "bad.json", `{"a" 1}`))
        expect(yield* _(runCliToExitCode(argv("--silent", good)))).toBe(0)
        expect(yield* _(runCliToExitCode(argv("--silent", good, bad)))).toBe(1)
        expect(yield* _(runCliToExitCode(argv()))).toBe(1)
      })
    ).pipe(provideNodeContext))
})
