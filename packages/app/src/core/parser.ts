import { Match } from "effect"
import * as Either from "effect/Either"

import type { FatalParseError, ValueError } from "./errors.js"
import { escalate, fatalParseError, valueError } from "./errors.js"
import type { Cursor } from "./scanner.js"
import {
  advance,
  advanceWhile,
  isAtEnd,
  isDigit,
  lexeme,
  makeCursor,
  makeToken,
  markStart,
  matchChar,
  matchCloser,
  peek,
  skipWhitespace
} from "./scanner.js"
import type { JsonDocument, JsonObject, JsonValue } from "./value.js"
import { jsonBoolean, jsonFloat, jsonInteger, jsonString, MAX_INTEGER, MIN_INTEGER } from "./value.js"

// CHANGE: recursive-descent parser from source text to a JsonDocument
// WHY: lex and build the tree in one pass, without a separate token stream
// REF: req-parse-1
// SOURCE: n/a
// FORMAT THEOREM: ∀s: parse(s) = Right(d) → root(d) is a container
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: value-level failures never leave this module without a line
// COMPLEXITY: O(n) where n = number of code points in source

/**
 * How separators inside containers are checked.
 *
 * - `lenient`: a trailing comma before a closer is accepted, commas between
 *   elements are optional and stray characters between object pairs are skipped.
 * - `strict`: exactly one comma between elements, none before the closer,
 *   nothing but whitespace after the root container.
 */
export type SeparatorMode = "lenient" | "strict"

export interface ParseOptions {
  readonly mode: SeparatorMode
}

export const defaultParseOptions: ParseOptions = { mode: "lenient" }

/** Deepest container nesting accepted; the root container is depth 1. */
export const MAX_NESTING_DEPTH = 256

interface ParserState {
  readonly cursor: Cursor
  readonly mode: SeparatorMode
  readonly depth: number
}

type Parsed<A> = Either.Either<A, FatalParseError>
type ValueParsed = Either.Either<JsonValue, ValueError | FatalParseError>

const INTEGER_LEXEME = /^-?\d+$/
const FLOAT_LEXEME = /^-?(?:\d+\.\d*|\.\d+)$/

const fail = (cursor: Cursor, message: string): Parsed<never> =>
  Either.left(fatalParseError(cursor.line, message))

const describeFound = (cursor: Cursor): string =>
  isAtEnd(cursor) ? "end of input" : `'${peek(cursor)}'`

// opening quote already consumed
const parseString = (cursor: Cursor): Parsed<string> => {
  markStart(cursor, cursor.current)
  advanceWhile(cursor, (c) => c !== "\"")
  const token = makeToken(cursor)
  const closing = advance(cursor)
  if (Either.isLeft(closing)) {
    return Either.left(closing.left)
  }
  return Either.right(lexeme(cursor, token))
}

const toInteger = (text: string): Either.Either<JsonValue, ValueError> => {
  if (!INTEGER_LEXEME.test(text)) {
    return Either.left(valueError(`Invalid integer literal '${text}'`))
  }
  const value = BigInt(text)
  if (value < MIN_INTEGER || value > MAX_INTEGER) {
    return Either.left(valueError(`Integer literal out of range '${text}'`))
  }
  return Either.right(jsonInteger(value))
}

const toFloat = (text: string): Either.Either<JsonValue, ValueError> => {
  if (!FLOAT_LEXEME.test(text)) {
    return Either.left(valueError(`Invalid float literal '${text}'`))
  }
  const value = Number(text)
  if (!Number.isFinite(value)) {
    return Either.left(valueError(`Float literal out of range '${text}'`))
  }
  return Either.right(jsonFloat(value))
}

// lead character (digit or '-') already consumed
const parseNumber = (cursor: Cursor): Either.Either<JsonValue, ValueError> => {
  markStart(cursor, cursor.current - 1)
  advanceWhile(cursor, (c) => isDigit(c) || c === ".")
  const text = lexeme(cursor, makeToken(cursor))
  return text.includes(".") ? toFloat(text) : toInteger(text)
}

const parseKeyword = (cursor: Cursor, rest: string): Parsed<void> => {
  for (const expected of rest) {
    const c = advance(cursor)
    if (Either.isLeft(c)) {
      return Either.left(c.left)
    }
    if (c.right !== expected) {
      return fail(cursor, "Unexpected value")
    }
  }
  return Either.right(undefined)
}

const parseValue = (state: ParserState): ValueParsed => {
  const lead = advance(state.cursor)
  if (Either.isLeft(lead)) {
    return Either.left(lead.left)
  }
  return Match.value(lead.right).pipe(
    Match.when("\"", (): ValueParsed => Either.map(parseString(state.cursor), jsonString)),
    Match.when("{", (): ValueParsed =>
      Either.map(parseObject(state), (entries): JsonValue => ({ _tag: "Object", entries }))),
    Match.when("[", (): ValueParsed =>
      Either.map(parseArray(state), (items): JsonValue => ({ _tag: "Array", items }))),
    Match.when("t", (): ValueParsed => Either.map(parseKeyword(state.cursor, "rue"), () => jsonBoolean(true))),
    Match.when("f", (): ValueParsed => Either.map(parseKeyword(state.cursor, "alse"), () => jsonBoolean(false))),
    Match.orElse((c): ValueParsed =>
      isDigit(c) || c === "-"
        ? parseNumber(state.cursor)
        : Either.left(valueError("Unexpected value"))
    )
  )
}

const parseElement = (state: ParserState): Parsed<JsonValue> => {
  const value = parseValue(state)
  if (Either.isLeft(value)) {
    return Either.left(escalate(state.cursor.line, value.left))
  }
  return Either.right(value.right)
}

// opening quote of the key already consumed
const parsePair = (state: ParserState, properties: Map<string, JsonValue>): Parsed<void> => {
  const { cursor } = state
  const key = parseString(cursor)
  if (Either.isLeft(key)) {
    return Either.left(key.left)
  }
  skipWhitespace(cursor)
  if (!matchChar(cursor, ":")) {
    return fail(cursor, `Expect colon after key: '${key.right}'`)
  }
  skipWhitespace(cursor)
  const value = parseElement(state)
  if (Either.isLeft(value)) {
    return Either.left(value.left)
  }
  properties.set(key.right, value.right)
  return Either.right(undefined)
}

// nesting is capped before the call stack is
const enterContainer = (state: ParserState): Parsed<ParserState> =>
  state.depth >= MAX_NESTING_DEPTH
    ? fail(state.cursor, "Maximum nesting depth exceeded")
    : Either.right({ ...state, depth: state.depth + 1 })

const parseStrictElements = (
  cursor: Cursor,
  closer: string,
  parseOne: () => Parsed<void>
): Parsed<void> => {
  skipWhitespace(cursor)
  if (matchChar(cursor, closer)) {
    return Either.right(undefined)
  }
  while (true) {
    const element = parseOne()
    if (Either.isLeft(element)) {
      return element
    }
    skipWhitespace(cursor)
    if (matchChar(cursor, closer)) {
      return Either.right(undefined)
    }
    if (!matchChar(cursor, ",")) {
      return fail(cursor, `Expected ',' or '${closer}', found ${describeFound(cursor)}`)
    }
    skipWhitespace(cursor)
    if (peek(cursor) === closer) {
      return fail(cursor, `Trailing comma before '${closer}'`)
    }
  }
}

const parseObjectLenient = (state: ParserState, properties: Map<string, JsonValue>): Parsed<void> => {
  const { cursor } = state
  skipWhitespace(cursor)
  while (!matchCloser(cursor, "}")) {
    const c = advance(cursor)
    if (Either.isLeft(c)) {
      return Either.left(c.left)
    }
    if (c.right === "\"") {
      const pair = parsePair(state, properties)
      if (Either.isLeft(pair)) {
        return pair
      }
    }
    skipWhitespace(cursor)
  }
  return Either.right(undefined)
}

const parseObjectStrict = (state: ParserState, properties: Map<string, JsonValue>): Parsed<void> =>
  parseStrictElements(state.cursor, "}", () => {
    if (!matchChar(state.cursor, "\"")) {
      return fail(state.cursor, `Expected string key, found ${describeFound(state.cursor)}`)
    }
    return parsePair(state, properties)
  })

// opening brace already consumed
const parseObject = (outer: ParserState): Parsed<JsonObject> => {
  const entered = enterContainer(outer)
  if (Either.isLeft(entered)) {
    return Either.left(entered.left)
  }
  const state = entered.right
  const properties = new Map<string, JsonValue>()
  const body = state.mode === "strict"
    ? parseObjectStrict(state, properties)
    : parseObjectLenient(state, properties)
  return Either.map(body, () => properties)
}

const parseArrayLenient = (state: ParserState, items: Array<JsonValue>): Parsed<void> => {
  const { cursor } = state
  skipWhitespace(cursor)
  while (!matchCloser(cursor, "]")) {
    const value = parseElement(state)
    if (Either.isLeft(value)) {
      return Either.left(value.left)
    }
    items.push(value.right)
    skipWhitespace(cursor)
    matchChar(cursor, ",")
    skipWhitespace(cursor)
  }
  return Either.right(undefined)
}

const parseArrayStrict = (state: ParserState, items: Array<JsonValue>): Parsed<void> =>
  parseStrictElements(state.cursor, "]", () =>
    Either.map(parseElement(state), (value) => {
      items.push(value)
    }))

// opening bracket already consumed
const parseArray = (outer: ParserState): Parsed<ReadonlyArray<JsonValue>> => {
  const entered = enterContainer(outer)
  if (Either.isLeft(entered)) {
    return Either.left(entered.left)
  }
  const state = entered.right
  const items: Array<JsonValue> = []
  const body = state.mode === "strict"
    ? parseArrayStrict(state, items)
    : parseArrayLenient(state, items)
  return Either.map(body, () => items)
}

const ensureFullyConsumed = (cursor: Cursor, document: JsonDocument): Parsed<JsonDocument> => {
  skipWhitespace(cursor)
  if (!isAtEnd(cursor)) {
    return fail(cursor, `Unexpected trailing content ${describeFound(cursor)}`)
  }
  return Either.right(document)
}

/**
 * Parse a complete source text into a document rooted at an object or array.
 *
 * @param source - Entire document text.
 * @param options - Separator handling, lenient by default.
 * @returns Either with the document or the first fatal error and its line.
 *
 * @pure true
 * @invariant no partial tree is returned on failure
 * @complexity O(n)
 */
export const parseDocument = (
  source: string,
  options: ParseOptions = defaultParseOptions
): Either.Either<JsonDocument, FatalParseError> => {
  const state: ParserState = { cursor: makeCursor(source), mode: options.mode, depth: 0 }
  skipWhitespace(state.cursor)
  const lead = advance(state.cursor)
  if (Either.isLeft(lead)) {
    return Either.left(lead.left)
  }
  const document = Match.value(lead.right).pipe(
    Match.when("{", (): Parsed<JsonDocument> =>
      Either.map(parseObject(state), (entries): JsonDocument => ({ _tag: "ObjectDocument", entries }))),
    Match.when("[", (): Parsed<JsonDocument> =>
      Either.map(parseArray(state), (items): JsonDocument => ({ _tag: "ArrayDocument", items }))),
    Match.orElse((): Parsed<JsonDocument> =>
      fail(state.cursor, "Can't parse non-object or non-array at top level"))
  )
  if (Either.isLeft(document) || state.mode === "lenient") {
    return document
  }
  return ensureFullyConsumed(state.cursor, document.right)
}
