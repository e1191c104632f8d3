import { Match } from "effect"

import type { JsonDocument, JsonValue } from "./value.js"

// CHANGE: render parsed trees back to indented text
// WHY: provide a deterministic structural dump for display consumers
// REF: req-render-1
// SOURCE: n/a
// FORMAT THEOREM: ∀v: parse(render(v)) has the same variant at every position as v
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: every child line ends with "," including the last one
// COMPLEXITY: O(n) where n = number of nodes

const INDENT = "  "

const indent = (depth: number): string => INDENT.repeat(Math.max(depth, 0))

// "1.5e-7" -> "0.00000015"
const expandExponent = (text: string): string => {
  const [mantissa = "", exponentText = "0"] = text.split("e")
  const negative = mantissa.startsWith("-")
  const unsigned = negative ? mantissa.slice(1) : mantissa
  const [whole = "", fraction = ""] = unsigned.split(".")
  const digits = whole + fraction
  const point = whole.length + Number(exponentText)
  const body = point <= 0
    ? `0.${"0".repeat(-point)}${digits}`
    : point >= digits.length
    ? `${digits}${"0".repeat(point - digits.length)}.0`
    : `${digits.slice(0, point)}.${digits.slice(point)}`
  return negative ? `-${body}` : body
}

/**
 * Format a float in plain decimal notation with a fractional part.
 *
 * @param value - Finite double.
 * @returns Text the parser reads back as the same Float.
 *
 * @pure true
 * @invariant output of a finite value contains "." and no exponent
 * @complexity O(d) where d = number of digits
 */
export const formatFloat = (value: number): string => {
  if (!Number.isFinite(value)) {
    return String(value)
  }
  if (Object.is(value, -0)) {
    return "-0.0"
  }
  if (Number.isInteger(value)) {
    return `${BigInt(value)}.0`
  }
  const text = String(value)
  return text.includes("e") ? expandExponent(text) : text
}

const renderChildren = (
  open: string,
  close: string,
  lines: ReadonlyArray<string>,
  closeDepth: number
): string => `${open}\n${lines.map((line) => `${line},\n`).join("")}${indent(closeDepth)}${close}`

/**
 * Render a nested value.
 *
 * @param value - Value to render.
 * @param depth - Indent level of the value's children; the closer sits one level lower.
 * @returns Text without a trailing newline.
 *
 * @pure true
 * @complexity O(n)
 */
export const renderValue = (value: JsonValue, depth = 1): string =>
  Match.value(value).pipe(
    Match.when({ _tag: "String" }, (node) => `"${node.value}"`),
    Match.when({ _tag: "Integer" }, (node) => node.value.toString()),
    Match.when({ _tag: "Float" }, (node) => formatFloat(node.value)),
    Match.when({ _tag: "Boolean" }, (node) => (node.value ? "true" : "false")),
    Match.when({ _tag: "Array" }, (node) =>
      renderChildren(
        "[",
        "]",
        node.items.map((item) => `${indent(depth)}${renderValue(item, depth + 1)}`),
        depth - 1
      )),
    Match.when({ _tag: "Object" }, (node) =>
      renderChildren(
        "{",
        "}",
        [...node.entries].map(([key, item]) => `${indent(depth)}"${key}": ${renderValue(item, depth + 1)}`),
        depth - 1
      )),
    Match.exhaustive
  )

/**
 * Render a document; the root's children sit at one indent level.
 *
 * @pure true
 * @invariant output ends with a newline
 * @complexity O(n)
 */
export const renderDocument = (document: JsonDocument): string =>
  Match.value(document).pipe(
    Match.when({ _tag: "ObjectDocument" }, (root) =>
      renderChildren(
        "{",
        "}",
        [...root.entries].map(([key, item]) => `${INDENT}"${key}": ${renderValue(item, 2)}`),
        0
      )),
    Match.when({ _tag: "ArrayDocument" }, (root) =>
      renderChildren(
        "[",
        "]",
        root.items.map((item) => `${INDENT}${renderValue(item, 2)}`),
        0
      )),
    Match.exhaustive
  ) + "\n"
