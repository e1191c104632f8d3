// CHANGE: introduce the parsed value tree as tagged unions
// WHY: give every scalar and container a stable, exhaustively matchable tag
// REF: req-value-model-1
// SOURCE: n/a
// FORMAT THEOREM: ∀d ∈ JsonDocument: d._tag ∈ {"ObjectDocument","ArrayDocument"}
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: Integer values lie in the signed 64-bit range, Float values are finite
// COMPLEXITY: O(1)/O(1)

export type JsonObject = ReadonlyMap<string, JsonValue>
export type JsonArray = ReadonlyArray<JsonValue>

export interface JsonString {
  readonly _tag: "String"
  readonly value: string
}

export interface JsonInteger {
  readonly _tag: "Integer"
  readonly value: bigint
}

export interface JsonFloat {
  readonly _tag: "Float"
  readonly value: number
}

export interface JsonBoolean {
  readonly _tag: "Boolean"
  readonly value: boolean
}

export interface JsonObjectValue {
  readonly _tag: "Object"
  readonly entries: JsonObject
}

export interface JsonArrayValue {
  readonly _tag: "Array"
  readonly items: JsonArray
}

export type JsonValue =
  | JsonString
  | JsonInteger
  | JsonFloat
  | JsonBoolean
  | JsonObjectValue
  | JsonArrayValue

export interface ObjectDocument {
  readonly _tag: "ObjectDocument"
  readonly entries: JsonObject
}

export interface ArrayDocument {
  readonly _tag: "ArrayDocument"
  readonly items: JsonArray
}

export type JsonDocument = ObjectDocument | ArrayDocument

export const MIN_INTEGER = -(2n ** 63n)
export const MAX_INTEGER = 2n ** 63n - 1n

type EntriesInput = Iterable<readonly [string, JsonValue]>

const toMap = (entries: EntriesInput): JsonObject => new Map(entries)

export const jsonString = (value: string): JsonString => ({ _tag: "String", value })

export const jsonInteger = (value: bigint): JsonInteger => ({ _tag: "Integer", value })

export const jsonFloat = (value: number): JsonFloat => ({ _tag: "Float", value })

export const jsonBoolean = (value: boolean): JsonBoolean => ({ _tag: "Boolean", value })

export const jsonObject = (entries: EntriesInput): JsonObjectValue => ({
  _tag: "Object",
  entries: toMap(entries)
})

export const jsonArray = (items: JsonArray): JsonArrayValue => ({ _tag: "Array", items })

export const objectDocument = (entries: EntriesInput): ObjectDocument => ({
  _tag: "ObjectDocument",
  entries: toMap(entries)
})

export const arrayDocument = (items: JsonArray): ArrayDocument => ({ _tag: "ArrayDocument", items })
