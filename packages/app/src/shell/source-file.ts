import type { PlatformError } from "@effect/platform/Error"
import type { FileSystem as FileSystemService } from "@effect/platform/FileSystem"
import { FileSystem } from "@effect/platform/FileSystem"
import * as Effect from "effect/Effect"

import type { AppError } from "../core/errors.js"
import { fileError, sourceParseError } from "../core/errors.js"
import type { ParseOptions } from "../core/parser.js"
import { defaultParseOptions, parseDocument } from "../core/parser.js"
import type { JsonDocument } from "../core/value.js"

// CHANGE: read a whole source file and hand it to the parser
// WHY: isolate file IO from the pure parsing core
// REF: req-source-file-1
// SOURCE: n/a
// FORMAT THEOREM: ∀p: parseFromFile(p) = Right(d) ↔ parseDocument(read(p)) = Right(d)
// PURITY: SHELL
// EFFECT: Effect<JsonDocument, AppError, FileSystem>
// INVARIANT: parse failures are reported with the file path
// COMPLEXITY: O(n)

const mapFsError = (error: PlatformError): AppError => fileError(String(error))

export const readSource = (
  path: string
): Effect.Effect<string, AppError, FileSystemService> =>
  Effect.gen(function*(_) {
    const fs = yield* _(FileSystem)
    return yield* _(fs.readFileString(path).pipe(Effect.mapError(mapFsError)))
  })

export const parseFromFile = (
  path: string,
  options: ParseOptions = defaultParseOptions
): Effect.Effect<JsonDocument, AppError, FileSystemService> =>
  Effect.gen(function*(_) {
    const source = yield* _(readSource(path))
    yield* _(Effect.logDebug(`parsing ${path} (${source.length} chars, ${options.mode})`))
    const parsed = parseDocument(source, options)
    if (parsed._tag === "Left") {
      return yield* _(Effect.fail(sourceParseError(path, parsed.left)))
    }
    return parsed.right
  })
