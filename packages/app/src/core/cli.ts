import { Match } from "effect"
import * as Either from "effect/Either"

import type { SeparatorMode } from "./parser.js"

// CHANGE: implement deterministic CLI parsing for json-descent
// WHY: keep CLI decoding pure and testable at the boundary
// REF: req-cli-parse-1
// SOURCE: n/a
// FORMAT THEOREM: ∀argv: parse(argv) = Right(args) → |args.files| ≥ 1
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: unknown flags are rejected
// COMPLEXITY: O(n) where n = argv length

export interface CliArgs {
  readonly files: ReadonlyArray<string>
  readonly mode: SeparatorMode | undefined
  readonly banner: boolean | undefined
  readonly configPath: string | undefined
  readonly configPathExplicit: boolean
  readonly silent: boolean
  readonly verbose: boolean
}

export type CliError = { readonly _tag: "CliError"; readonly message: string }

const cliError = (message: string): CliError => ({ _tag: "CliError", message })

const isFlag = (value: string): boolean => value.startsWith("-")

const parseBoolean = (value: string): Either.Either<boolean, CliError> => {
  if (value === "true" || value === "1") {
    return Either.right(true)
  }
  if (value === "false" || value === "0") {
    return Either.right(false)
  }
  return Either.left(cliError(`Invalid boolean value: ${value}`))
}

const parseMode = (value: string): Either.Either<SeparatorMode, CliError> =>
  Match.value(value).pipe(
    Match.when("strict", () => Either.right<SeparatorMode>("strict")),
    Match.when("lenient", () => Either.right<SeparatorMode>("lenient")),
    Match.orElse(() => Either.left(cliError(`Unknown mode: ${value}`)))
  )

const defaultArgs: CliArgs = {
  files: [],
  mode: undefined,
  banner: undefined,
  configPath: undefined,
  configPathExplicit: false,
  silent: false,
  verbose: false
}

type FlagStep = Either.Either<{ readonly next: CliArgs; readonly consumed: number }, CliError>

const readFlagValue = (
  flagName: string,
  inlineValue: string | undefined,
  nextValue: string | undefined
): Either.Either<string, CliError> => {
  if (inlineValue !== undefined) {
    return Either.right(inlineValue)
  }
  if (nextValue === undefined || isFlag(nextValue)) {
    return Either.left(cliError(`Missing value for --${flagName}`))
  }
  return Either.right(nextValue)
}

const setParsedFlag = (next: CliArgs, consumed: number): FlagStep => Either.right({ next, consumed })

const parseValueFlag = (
  flagName: string,
  current: CliArgs,
  inlineValue: string | undefined,
  nextValue: string | undefined,
  update: (args: CliArgs, value: string) => Either.Either<CliArgs, CliError>
): FlagStep =>
  Either.flatMap(readFlagValue(flagName, inlineValue, nextValue), (value) =>
    Either.map(update(current, value), (next) => ({
      next,
      consumed: inlineValue === undefined ? 2 : 1
    })))

const parseOptionalBooleanFlag = (
  current: CliArgs,
  inlineValue: string | undefined,
  nextValue: string | undefined,
  update: (args: CliArgs, value: boolean) => CliArgs
): FlagStep => {
  const useNext = inlineValue === undefined && nextValue !== undefined && (nextValue === "true" ||
    nextValue === "false" || nextValue === "1" || nextValue === "0")
  const nextValueResolved = inlineValue ?? (useNext && nextValue !== undefined ? nextValue : "true")
  return Either.map(parseBoolean(nextValueResolved), (value) => ({
    next: update(current, value),
    consumed: useNext ? 2 : 1
  }))
}

type FlagParser = (
  current: CliArgs,
  inlineValue: string | undefined,
  nextValue: string | undefined
) => FlagStep

const flagParsers: ReadonlyMap<string, FlagParser> = new Map<string, FlagParser>([
  ["strict", (current) => setParsedFlag({ ...current, mode: "strict" }, 1)],
  ["lenient", (current) => setParsedFlag({ ...current, mode: "lenient" }, 1)],
  ["silent", (current) => setParsedFlag({ ...current, silent: true }, 1)],
  ["verbose", (current) => setParsedFlag({ ...current, verbose: true }, 1)],
  ["mode", (current, inlineValue, nextValue) =>
    parseValueFlag("mode", current, inlineValue, nextValue, (args, value) =>
      Either.map(parseMode(value), (mode) => ({ ...args, mode })))],
  ["config", (current, inlineValue, nextValue) =>
    parseValueFlag("config", current, inlineValue, nextValue, (args, value) =>
      Either.right({
        ...args,
        configPath: value,
        configPathExplicit: true
      }))],
  ["banner", (current, inlineValue, nextValue) =>
    parseOptionalBooleanFlag(current, inlineValue, nextValue, (args, value) => ({
      ...args,
      banner: value
    }))],
  ["no-banner", (current) => setParsedFlag({ ...current, banner: false }, 1)]
])

const parseFlag = (
  raw: string,
  nextValue: string | undefined,
  current: CliArgs
): FlagStep => {
  if (!raw.startsWith("--")) {
    return Either.left(cliError(`Unknown flag: ${raw}`))
  }
  const [name = "", inlineValue] = raw.slice(2).split("=", 2)
  const parser = flagParsers.get(name)
  if (parser === undefined) {
    return Either.left(cliError(`Unknown flag: --${name}`))
  }
  return parser(current, inlineValue, nextValue)
}

const parseArguments = (
  rawArgs: ReadonlyArray<string>,
  initial: CliArgs
): Either.Either<CliArgs, CliError> => {
  let args = initial
  let index = 0
  while (index < rawArgs.length) {
    const current = rawArgs[index]
    if (current === undefined) {
      return Either.left(cliError("Unexpected end of arguments"))
    }
    if (!isFlag(current)) {
      args = { ...args, files: [...args.files, current] }
      index += 1
      continue
    }
    const parsed = parseFlag(current, rawArgs[index + 1], args)
    if (Either.isLeft(parsed)) {
      return Either.left(parsed.left)
    }
    args = parsed.right.next
    index += parsed.right.consumed
  }
  return Either.right(args)
}

/**
 * Parse CLI arguments into a typed configuration.
 *
 * @param argv - Raw process.argv array.
 * @returns Either with parsed CliArgs or CliError.
 *
 * @pure true
 * @invariant positional arguments are input files, in order
 * @complexity O(n)
 */
export const parseCliArgs = (
  argv: ReadonlyArray<string>
): Either.Either<CliArgs, CliError> => {
  const parsed = parseArguments(argv.slice(2), defaultArgs)
  if (Either.isLeft(parsed)) {
    return parsed
  }
  if (parsed.right.files.length === 0) {
    return Either.left(cliError("No input files"))
  }
  return parsed
}
