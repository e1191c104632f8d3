import type { FileSystem as FileSystemService } from "@effect/platform/FileSystem"
import { Effect, Logger, LogLevel, Match } from "effect"
import type * as Either from "effect/Either"

import { parseCliArgs } from "../core/cli.js"
import type { ResolvedConfig } from "../core/config.js"
import { DEFAULT_CONFIG_PATH, resolveConfig } from "../core/config.js"
import { type AppError, renderAppError } from "../core/errors.js"
import { renderDocument } from "../core/render.js"
import type { JsonDocument } from "../core/value.js"
import { loadConfigFile } from "../shell/config-file.js"
import { parseFromFile } from "../shell/source-file.js"

// CHANGE: orchestrate the CLI with functional core + imperative shell
// WHY: parse each input file and print its rendered tree
// REF: req-program-1
// SOURCE: n/a
// FORMAT THEOREM: ∀argv: run(argv) prints one block per file until the first failure
// PURITY: SHELL
// EFFECT: Effect<ProgramResult, AppError, FileSystem>
// INVARIANT: files are processed in argv order
// COMPLEXITY: O(n) where n = total source size

export interface FileReport {
  readonly file: string
  readonly document: JsonDocument
  readonly output: string
}

export interface ProgramResult {
  readonly reports: ReadonlyArray<FileReport>
  readonly exitCode: number
}

const writeStdout = (payload: string): Effect.Effect<void> =>
  Effect.sync(() => {
    process.stdout.write(payload)
  })

const writeStderr = (payload: string): Effect.Effect<void> =>
  Effect.sync(() => {
    process.stderr.write(payload.endsWith("\n") ? payload : `${payload}\n`)
  })

const fromEither = <A, E>(either: Either.Either<A, E>): Effect.Effect<A, E> =>
  either._tag === "Left" ? Effect.fail(either.left) : Effect.succeed(either.right)

const documentLabel = (document: JsonDocument): string =>
  Match.value(document).pipe(
    Match.when({ _tag: "ObjectDocument" }, () => "OBJECT"),
    Match.when({ _tag: "ArrayDocument" }, () => "ARRAY"),
    Match.exhaustive
  )

/**
 * Frame a rendered document between BEGIN/END banners.
 *
 * @pure true
 * @invariant output ends with exactly one newline
 */
export const formatBlock = (document: JsonDocument, rendered: string): string => {
  const label = documentLabel(document)
  const body = rendered.endsWith("\n") ? rendered.slice(0, -1) : rendered
  return `======== BEGIN ${label} ========\n\n${body}\n\n======== END ${label} ========\n`
}

const processFile = (
  file: string,
  config: ResolvedConfig
): Effect.Effect<FileReport, AppError, FileSystemService> =>
  Effect.gen(function*(_) {
    const document = yield* _(parseFromFile(file, { mode: config.mode }))
    const rendered = renderDocument(document)
    const output = config.banner ? formatBlock(document, rendered) : rendered
    if (!config.silent) {
      yield* _(writeStdout(output))
    }
    return { file, document, output }
  })

/**
 * Run CLI program with the provided argv.
 *
 * @param argv - process.argv array.
 * @returns ProgramResult with one report per input file.
 *
 * @pure false
 * @effect FileSystem, Console
 * @invariant stops at the first file that fails to parse
 * @complexity O(n)
 */
export const runCli = (
  argv: ReadonlyArray<string>
): Effect.Effect<ProgramResult, AppError, FileSystemService> =>
  Effect.gen(function*(_) {
    const cli = yield* _(fromEither(parseCliArgs(argv)))
    const minimumLevel = cli.verbose ? LogLevel.Debug : LogLevel.Info
    return yield* _(
      Effect.gen(function*(_) {
        const fileConfig = yield* _(
          loadConfigFile(cli.configPath ?? DEFAULT_CONFIG_PATH, cli.configPathExplicit)
        )
        const config = resolveConfig(cli, fileConfig)
        yield* _(Effect.logDebug(`mode=${config.mode} banner=${String(config.banner)}`))
        const reports = yield* _(
          Effect.forEach(cli.files, (file) => processFile(file, config), { concurrency: 1 })
        )
        return { reports, exitCode: 0 }
      }).pipe(Logger.withMinimumLogLevel(minimumLevel))
    )
  })

/**
 * Run the CLI and turn failures into a stderr diagnostic and exit code 1.
 *
 * @pure false
 * @effect FileSystem, Console
 * @invariant result ∈ {0, 1}
 */
export const runCliToExitCode = (
  argv: ReadonlyArray<string>
): Effect.Effect<number, never, FileSystemService> =>
  runCli(argv).pipe(
    Effect.map((result) => result.exitCode),
    Effect.catchAll((error) => writeStderr(renderAppError(error)).pipe(Effect.as(1)))
  )
