// packages/unserial-runtime/scanner.ts
// Cursor primitives shared by every consumer.

import { Delim, tagName } from "../unserial-spec/src/mod.ts";
import { DEFAULT_CONTEXT, type DecodeContext } from "./context.ts";
import { decodeError, type DecodeError } from "./errors.ts";
import { type Consumed, Result } from "./result.ts";

const DIGITS = /^\d+$/;

/**
 * Offset of the first `byte` at or after `fromOffset`, or -1 when the
 * buffer holds no such byte. Not finding one is a normal outcome.
 */
export function findNextDelimiter(
  bytes: Uint8Array,
  byte: number,
  fromOffset: number,
): number {
  if (fromOffset < 0) return -1;
  return bytes.indexOf(byte, fromOffset);
}

/** Bytes `[start, end)` read one char per byte; for literals and diagnostics only. */
export function asciiSlice(bytes: Uint8Array, start: number, end: number): string {
  let out = "";
  const stop = Math.min(end, bytes.length);
  for (let i = Math.max(start, 0); i < stop; i++) {
    out += String.fromCharCode(bytes[i]);
  }
  return out;
}

/**
 * Parse the decimal count in front of the next `:` and return it with the
 * offset just past that `:`.
 */
export function readCountField(
  bytes: Uint8Array,
  fromOffset: number,
  ctx: DecodeContext = DEFAULT_CONTEXT,
): Result<Consumed<number>, DecodeError> {
  return scanCount(
    bytes,
    fromOffset,
    (raw) => decodeError(ctx, { type: "MalformedCount", offset: fromOffset, raw }),
  );
}

// Shared by readCountField and the length prefix of strings, which
// reports its own error kind.
export function scanCount(
  bytes: Uint8Array,
  fromOffset: number,
  malformed: (raw: string) => DecodeError,
): Result<Consumed<number>, DecodeError> {
  const end = findNextDelimiter(bytes, Delim.COLON, fromOffset);
  if (end < 0) {
    return Result.err(malformed(asciiSlice(bytes, fromOffset, bytes.length)));
  }

  const raw = asciiSlice(bytes, fromOffset, end);
  const value = Number(raw);
  if (!DIGITS.test(raw) || !Number.isSafeInteger(value)) {
    return Result.err(malformed(raw));
  }

  // The +1 skips the ':'
  return Result.ok({ value, offset: end + 1 });
}

/**
 * Check that `bytes[offset]` is `tag` and is followed by `separator`.
 * Returns null when both match.
 */
export function checkTag(
  bytes: Uint8Array,
  offset: number,
  tag: number,
  separator: number,
  ctx: DecodeContext,
): DecodeError | null {
  if (offset < 0 || offset + 1 >= bytes.length) {
    return decodeError(ctx, {
      type: "CorruptStream",
      offset: Math.max(offset, bytes.length),
    });
  }
  if (bytes[offset] !== tag || bytes[offset + 1] !== separator) {
    return decodeError(ctx, {
      type: "UnexpectedTag",
      offset,
      expected: `'${tagName(tag)}${tagName(separator)}'`,
      found: `'${tagName(bytes[offset])}${tagName(bytes[offset + 1])}'`,
    });
  }
  return null;
}

/** Check a single framing byte (quote, brace, terminator) at `offset`. */
export function expectByte(
  bytes: Uint8Array,
  offset: number,
  byte: number,
  ctx: DecodeContext,
): DecodeError | null {
  if (offset >= bytes.length) {
    return decodeError(ctx, { type: "CorruptStream", offset });
  }
  if (bytes[offset] !== byte) {
    return decodeError(ctx, {
      type: "UnexpectedByte",
      offset,
      expected: tagName(byte),
      found: tagName(bytes[offset]),
    });
  }
  return null;
}
