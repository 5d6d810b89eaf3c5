// packages/unserial-runtime/dispatch.ts
import { match as patternMatch } from "ts-pattern";
import { Tag, tagName } from "../unserial-spec/src/mod.ts";
import { DEFAULT_CONTEXT, type DecodeContext } from "./context.ts";
import { type DecodeError, fail } from "./errors.ts";
import { type Consumed, Result } from "./result.ts";
import {
  consumeBool,
  consumeFloat,
  consumeInt,
  consumeNull,
} from "./scalars.ts";
import { asciiSlice } from "./scanner.ts";
import { consumeText } from "./text.ts";
import type { DecodedValue } from "./values.ts";

type Next = Result<Consumed<DecodedValue>, DecodeError>;

/**
 * Decode the scalar node at `offset`, whatever its tag.
 *
 * New scalar tags are added here and nowhere else. Objects are read by
 * consumeObject, and arrays are not decoded at all.
 */
export function consumeNext(
  bytes: Uint8Array,
  offset: number,
  ctx: DecodeContext = DEFAULT_CONTEXT,
): Next {
  if (offset < 0 || offset >= bytes.length) {
    return fail(ctx, { type: "CorruptStream", offset });
  }

  return patternMatch<number, Next>(bytes[offset])
    .with(Tag.NULL, () =>
      Result.map(consumeNull(bytes, offset, ctx), (c) => ({
        value: { type: "null" } as const,
        offset: c.offset,
      })))
    .with(Tag.BOOL, () =>
      Result.map(consumeBool(bytes, offset, ctx), (c) => ({
        value: { type: "bool", value: c.value } as const,
        offset: c.offset,
      })))
    .with(Tag.INT, () =>
      Result.map(consumeInt(bytes, offset, ctx), (c) => ({
        value: { type: "int", value: c.value } as const,
        offset: c.offset,
      })))
    .with(Tag.FLOAT, () =>
      Result.map(consumeFloat(bytes, offset, ctx), (c) => ({
        value: { type: "float", value: c.value } as const,
        offset: c.offset,
      })))
    .with(Tag.STRING, () =>
      Result.map(consumeText(bytes, offset, ctx), (c) => ({
        value: { type: "text", value: c.value } as const,
        offset: c.offset,
      })))
    .otherwise((tag) =>
      fail(ctx, {
        type: "UnsupportedTag",
        offset,
        tag: tagName(tag),
        tail: asciiSlice(bytes, offset, bytes.length),
      })
    );
}
