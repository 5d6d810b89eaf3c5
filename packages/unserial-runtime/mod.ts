// packages/unserial-runtime/mod.ts
// Public surface of the decoder.

export { Result } from "./result.ts";
export type { Consumed } from "./result.ts";

export type { DecodedValue, PlainValue, ValueKind } from "./values.ts";
export { toPlain } from "./values.ts";

export type { DecodeContext, DecodeOptions } from "./context.ts";
export { createContext, DEFAULT_MAX_DEPTH } from "./context.ts";

export type { DecodeError, DecodeErrorType } from "./errors.ts";
export { DecodeFailure, formatDecodeError } from "./errors.ts";

export { stripVisibility, upperCaseFirstLetter } from "./keys.ts";

// Consumers: (bytes, offset[, destination], ctx?) -> new offset
export { findNextDelimiter, readCountField } from "./scanner.ts";
export {
  consumeBool,
  consumeFloat,
  consumeInt,
  consumeNull,
} from "./scalars.ts";
export { consumeLengthPrefixed, consumeText } from "./text.ts";
export { consumeNext } from "./dispatch.ts";
export { consumeObject } from "./object.ts";

// Destinations
export type {
  Destination,
  OpaqueSlot,
  RecordSlot,
  ScalarKind,
  ScalarSlot,
  Slot,
  SlotKind,
} from "./destination.ts";
export { discard } from "./destination.ts";

export type { Infer, InferShape, Shape } from "./builders.ts";
export { f, Field, OpaqueField, RecordField, ScalarField } from "./builders.ts";

export type { Input } from "./api.ts";
export {
  decodeInto,
  decodeIntoSafe,
  toBytes,
  unserialize,
  unserializeSafe,
} from "./api.ts";
