export { defaultParseOptions, MAX_NESTING_DEPTH, parseDocument } from "./core/parser.js"
export type { ParseOptions, SeparatorMode } from "./core/parser.js"
export { formatFloat, renderDocument, renderValue } from "./core/render.js"
export {
  arrayDocument,
  jsonArray,
  jsonBoolean,
  jsonFloat,
  jsonInteger,
  jsonObject,
  jsonString,
  MAX_INTEGER,
  MIN_INTEGER,
  objectDocument
} from "./core/value.js"
export type {
  ArrayDocument,
  JsonArray,
  JsonArrayValue,
  JsonBoolean,
  JsonDocument,
  JsonFloat,
  JsonInteger,
  JsonObject,
  JsonObjectValue,
  JsonString,
  JsonValue,
  ObjectDocument
} from "./core/value.js"
export { formatFatalParseError, renderAppError } from "./core/errors.js"
export type { AppError, FatalParseError, SourceParseError, ValueError } from "./core/errors.js"
export { parseFromFile, readSource } from "./shell/source-file.js"
