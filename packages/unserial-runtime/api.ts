// packages/unserial-runtime/api.ts
// Whole-buffer entry points: the node must span the entire input.

import type { InferShape, RecordField, Shape } from "./builders.ts";
import { createContext, type DecodeContext, type DecodeOptions } from "./context.ts";
import { consumeNext } from "./dispatch.ts";
import { type DecodeError, DecodeFailure, fail } from "./errors.ts";
import { consumeObject } from "./object.ts";
import { Result } from "./result.ts";
import { type PlainValue, toPlain } from "./values.ts";

const encoder = new TextEncoder();

export type Input = Uint8Array | string;

/** Strings are encoded as UTF-8 before decoding. */
export function toBytes(input: Input): Uint8Array {
  return typeof input === "string" ? encoder.encode(input) : input;
}

// createContext throws on an unknown encoding label; the Safe entry
// points report it as a value instead.
function contextFor(
  options: DecodeOptions | undefined,
): Result<DecodeContext, DecodeError> {
  try {
    return Result.ok(createContext(options));
  } catch (error) {
    if (!(error instanceof RangeError)) throw error;
    return Result.err({
      type: "UnsupportedEncoding",
      offset: 0,
      path: "",
      encoding: options?.encoding ?? "",
    });
  }
}

function ensureConsumed<T>(
  bytes: Uint8Array,
  offset: number,
  value: T,
  ctx: DecodeContext,
): Result<T, DecodeError> {
  if (offset !== bytes.length) {
    return fail(ctx, {
      type: "TrailingData",
      offset,
      remaining: bytes.length - offset,
    });
  }
  return Result.ok(value);
}

/**
 * Decode a single scalar node (N, b, i, d or s) spanning all of `input`.
 * Integers come back as bigint.
 */
export function unserializeSafe(
  input: Input,
  options?: DecodeOptions,
): Result<PlainValue, DecodeError> {
  const bytes = toBytes(input);
  return Result.andThen(contextFor(options), (ctx) =>
    Result.andThen(
      consumeNext(bytes, 0, ctx),
      (c) => ensureConsumed(bytes, c.offset, toPlain(c.value), ctx),
    ));
}

/**
 * Like unserializeSafe, but throws.
 * @throws DecodeFailure
 */
export function unserialize(input: Input, options?: DecodeOptions): PlainValue {
  const result = unserializeSafe(input, options);
  if (!result.ok) throw new DecodeFailure(result.error);
  return result.value;
}

/**
 * Decode an object node spanning all of `input` into a new record built
 * from `schema`.
 */
export function decodeIntoSafe<S extends Shape>(
  input: Input,
  schema: RecordField<S>,
  options?: DecodeOptions,
): Result<InferShape<S>, DecodeError> {
  const bytes = toBytes(input);
  return Result.andThen(contextFor(options), (ctx) => {
    const record = schema.create();
    return Result.andThen(
      consumeObject(bytes, 0, schema.bind(record), ctx),
      (offset) => ensureConsumed(bytes, offset, record, ctx),
    );
  });
}

/**
 * Like decodeIntoSafe, but throws.
 * @throws DecodeFailure
 */
export function decodeInto<S extends Shape>(
  input: Input,
  schema: RecordField<S>,
  options?: DecodeOptions,
): InferShape<S> {
  const result = decodeIntoSafe(input, schema, options);
  if (!result.ok) throw new DecodeFailure(result.error);
  return result.value;
}
