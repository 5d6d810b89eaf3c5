// packages/unserial-runtime/text.ts
// String nodes and the <length>:"<bytes>" framing they share with class names.

import { Delim, Tag } from "../unserial-spec/src/mod.ts";
import { DEFAULT_CONTEXT, type DecodeContext } from "./context.ts";
import { decodeError, type DecodeError } from "./errors.ts";
import { type Consumed, Result } from "./result.ts";
import { asciiSlice, checkTag, expectByte, scanCount } from "./scanner.ts";

/**
 * Read `<L>:"<L bytes>"<terminator>` starting at the length digits.
 *
 * `L` counts bytes, so exactly `L` bytes are handed to the context's text
 * decoder; the decoded string may be shorter than `L` characters.
 */
export function consumeLengthPrefixed(
  bytes: Uint8Array,
  offset: number,
  terminator: number,
  ctx: DecodeContext = DEFAULT_CONTEXT,
): Result<Consumed<string>, DecodeError> {
  const length = scanCount(
    bytes,
    offset,
    (raw) => decodeError(ctx, { type: "MalformedString", offset, raw }),
  );
  if (!length.ok) return length;

  const open = length.value.offset;
  const start = open + 1;
  const end = start + length.value.value;

  const err = expectByte(bytes, open, Delim.QUOTE, ctx) ??
    expectByte(bytes, end, Delim.QUOTE, ctx) ??
    expectByte(bytes, end + 1, terminator, ctx);
  if (err) return Result.err(err);

  let value: string;
  try {
    value = ctx.decoder.decode(bytes.subarray(start, end));
  } catch (error) {
    if (!(error instanceof TypeError)) throw error;
    // Payload bytes are not valid in the context's encoding
    return Result.err(decodeError(ctx, {
      type: "MalformedString",
      offset: start,
      raw: asciiSlice(bytes, start, end),
    }));
  }
  // The +2 skips the closing '"' and the terminator
  return Result.ok({ value, offset: end + 2 });
}

export function consumeText(
  bytes: Uint8Array,
  offset: number,
  ctx: DecodeContext = DEFAULT_CONTEXT,
): Result<Consumed<string>, DecodeError> {
  const err = checkTag(bytes, offset, Tag.STRING, Delim.COLON, ctx);
  if (err) return Result.err(err);
  return consumeLengthPrefixed(bytes, offset + 2, Delim.SEMICOLON, ctx);
}
