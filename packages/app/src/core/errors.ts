import { Match } from "effect"

import type { CliError } from "./cli.js"

// CHANGE: unify error algebra for parsing and the CLI tool
// WHY: separate recoverable value failures from fatal, line-located parse failures
// REF: req-errors-1
// SOURCE: n/a
// FORMAT THEOREM: ∀e ∈ AppError: e._tag is stable and exhaustively matchable
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: every FatalParseError carries a 1-based line
// COMPLEXITY: O(1)/O(1)

export type ValueError = { readonly _tag: "ValueError"; readonly message: string }
export type FatalParseError = {
  readonly _tag: "FatalParseError"
  readonly line: number
  readonly message: string
}
export type ConfigError = { readonly _tag: "ConfigError"; readonly message: string }
export type FileError = { readonly _tag: "FileError"; readonly message: string }
export type SourceParseError = {
  readonly _tag: "SourceParseError"
  readonly file: string
  readonly error: FatalParseError
}

export type AppError =
  | CliError
  | ConfigError
  | FileError
  | SourceParseError

export const valueError = (message: string): ValueError => ({
  _tag: "ValueError",
  message
})

export const fatalParseError = (line: number, message: string): FatalParseError => ({
  _tag: "FatalParseError",
  line,
  message
})

export const configError = (message: string): ConfigError => ({
  _tag: "ConfigError",
  message
})

export const fileError = (message: string): FileError => ({
  _tag: "FileError",
  message
})

export const sourceParseError = (file: string, error: FatalParseError): SourceParseError => ({
  _tag: "SourceParseError",
  file,
  error
})

/**
 * Promote a value-level failure to a fatal one at the given line.
 * Fatal errors pass through with their original line.
 *
 * @pure true
 * @complexity O(1)
 */
export const escalate = (line: number, error: ValueError | FatalParseError): FatalParseError =>
  error._tag === "ValueError" ? fatalParseError(line, error.message) : error

export const formatFatalParseError = (error: FatalParseError): string =>
  `[Error at line ${error.line}]: ${error.message}`

/**
 * Render any application error as a diagnostic for stderr.
 *
 * @param error - Error from the CLI program.
 * @returns Diagnostic text.
 *
 * @pure true
 * @invariant parse failures are prefixed with their source file
 * @complexity O(1)
 */
export const renderAppError = (error: AppError): string =>
  Match.value(error).pipe(
    Match.when({ _tag: "CliError" }, (value) => `CLI error: ${value.message}`),
    Match.when({ _tag: "ConfigError" }, (value) => `Config error: ${value.message}`),
    Match.when({ _tag: "FileError" }, (value) => `File error: ${value.message}`),
    Match.when(
      { _tag: "SourceParseError" },
      (value) => `${value.file}: ${formatFatalParseError(value.error)}`
    ),
    Match.exhaustive
  )
