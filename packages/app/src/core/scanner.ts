import * as Either from "effect/Either"

import type { FatalParseError } from "./errors.js"
import { fatalParseError } from "./errors.js"

// CHANGE: character-level cursor shared by every parsing routine
// WHY: decode the source once so positional access is constant time
// REF: req-scanner-1
// SOURCE: n/a
// FORMAT THEOREM: ∀c: 0 ≤ c.start ≤ c.current ≤ |c.chars|
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: line = 1 + number of consumed "\n"
// COMPLEXITY: O(1) per primitive, O(n) for makeCursor

/** Returned by {@link peek} at end of input. */
export const END = "\0"

export interface Span {
  readonly start: number
  readonly length: number
}

export interface Cursor {
  readonly chars: ReadonlyArray<string>
  current: number
  start: number
  line: number
}

export const makeCursor = (source: string): Cursor => ({
  chars: Array.from(source),
  current: 0,
  start: 0,
  line: 1
})

export const isDigit = (c: string): boolean => c >= "0" && c <= "9"

const isWhitespace = (c: string): boolean => c === " " || c === "\t" || c === "\r" || c === "\n"

export const isAtEnd = (cursor: Cursor): boolean => cursor.current >= cursor.chars.length

const consume = (cursor: Cursor, c: string): void => {
  cursor.current += 1
  if (c === "\n") {
    cursor.line += 1
  }
}

/**
 * Consume and return the current character.
 *
 * @returns The character, or a fatal error when the cursor is past the end.
 *
 * @pure false
 * @complexity O(1)
 */
export const advance = (cursor: Cursor): Either.Either<string, FatalParseError> => {
  const c = cursor.chars[cursor.current]
  if (c === undefined) {
    return Either.left(fatalParseError(cursor.line, "Unexpected end of input"))
  }
  consume(cursor, c)
  return Either.right(c)
}

export const peek = (cursor: Cursor): string => cursor.chars[cursor.current] ?? END

export const matchChar = (cursor: Cursor, expected: string): boolean => {
  if (isAtEnd(cursor) || peek(cursor) !== expected) {
    return false
  }
  consume(cursor, expected)
  return true
}

/**
 * Consume a container closer together with one comma right after it.
 *
 * @returns true when `closer` was consumed.
 *
 * @pure false
 * @invariant cursor is unchanged when the result is false
 */
export const matchCloser = (cursor: Cursor, closer: string): boolean => {
  if (!matchChar(cursor, closer)) {
    return false
  }
  matchChar(cursor, ",")
  return true
}

export const advanceWhile = (cursor: Cursor, predicate: (c: string) => boolean): void => {
  while (!isAtEnd(cursor) && predicate(peek(cursor))) {
    consume(cursor, peek(cursor))
  }
}

export const skipWhitespace = (cursor: Cursor): void => advanceWhile(cursor, isWhitespace)

export const markStart = (cursor: Cursor, offset: number): void => {
  cursor.start = offset
}

export const makeToken = (cursor: Cursor): Span => ({
  start: cursor.start,
  length: cursor.current - cursor.start
})

export const lexeme = (cursor: Cursor, span: Span): string =>
  cursor.chars.slice(span.start, span.start + span.length).join("")
