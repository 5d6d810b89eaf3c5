// packages/unserial-runtime/object.ts
// Object nodes: O:<len>:"<class>":<count>:{<key><value>...}

import { Delim, Tag, tagName } from "../unserial-spec/src/mod.ts";
import { DEFAULT_CONTEXT, type DecodeContext, descend } from "./context.ts";
import {
  assign,
  type Destination,
  discard,
  type Slot,
} from "./destination.ts";
import { consumeNext } from "./dispatch.ts";
import { type DecodeError, fail } from "./errors.ts";
import { Result } from "./result.ts";
import { checkTag, expectByte, readCountField } from "./scanner.ts";
import { consumeLengthPrefixed, consumeText } from "./text.ts";

/**
 * Decode the object node at `offset` into `destination` and return the
 * offset just past its closing `}`.
 *
 * Each key is normalized (see DecodeOptions.normalizeKey) and looked up on
 * the destination. Keys with no matching field are decoded into the
 * discard sink, so the cursor still advances. The class name is consumed
 * but plays no part in choosing the destination.
 *
 * On failure the destination may already hold some of the fields.
 */
export function consumeObject(
  bytes: Uint8Array,
  offset: number,
  destination: Destination,
  ctx: DecodeContext = DEFAULT_CONTEXT,
): Result<number, DecodeError> {
  if (ctx.depth >= ctx.maxDepth) {
    return fail(ctx, { type: "DepthExceeded", offset, maxDepth: ctx.maxDepth });
  }

  const tagErr = checkTag(bytes, offset, Tag.OBJECT, Delim.COLON, ctx);
  if (tagErr) return Result.err(tagErr);

  const className = consumeLengthPrefixed(bytes, offset + 2, Delim.COLON, ctx);
  if (!className.ok) return className;

  const count = readCountField(bytes, className.value.offset, ctx);
  if (!count.ok) return count;

  let cursor = count.value.offset;
  const openErr = expectByte(bytes, cursor, Delim.OPEN_BRACE, ctx);
  if (openErr) return Result.err(openErr);
  cursor++;

  for (let i = 0; i < count.value.value; i++) {
    const next = consumeMember(bytes, cursor, destination, ctx);
    if (!next.ok) return next;
    cursor = next.value;
  }

  const closeErr = expectByte(bytes, cursor, Delim.CLOSE_BRACE, ctx);
  if (closeErr) return Result.err(closeErr);
  return Result.ok(cursor + 1);
}

// One key/value pair; returns the offset after the value.
function consumeMember(
  bytes: Uint8Array,
  offset: number,
  destination: Destination,
  ctx: DecodeContext,
): Result<number, DecodeError> {
  if (offset >= bytes.length) {
    return fail(ctx, { type: "CorruptStream", offset });
  }
  if (bytes[offset] !== Tag.STRING) {
    return fail(ctx, {
      type: "InvalidKey",
      offset,
      found: tagName(bytes[offset]),
    });
  }

  const key = consumeText(bytes, offset, ctx);
  if (!key.ok) return key;

  const field = ctx.normalizeKey(key.value.value);
  const slot = destination.lookup(field);
  const child = descend(ctx, field);
  const at = key.value.offset;

  if (at >= bytes.length) {
    return fail(child, { type: "CorruptStream", offset: at });
  }

  if (bytes[at] === Tag.OBJECT) {
    const target = nestedDestination(slot);
    if (target === undefined && slot !== undefined) {
      return fail(child, {
        type: "FieldTypeMismatch",
        offset: at,
        field,
        expected: slot.kind,
        actual: "object",
      });
    }
    return consumeObject(bytes, at, target ?? discard, child);
  }

  const value = consumeNext(bytes, at, child);
  if (!value.ok) return value;

  if (slot !== undefined) {
    const stored = slot.kind !== "record" && assign(slot, value.value.value);
    if (!stored) {
      return fail(child, {
        type: "FieldTypeMismatch",
        offset: at,
        field,
        expected: slot.kind,
        actual: value.value.value.type,
      });
    }
  }
  return Result.ok(value.value.offset);
}

function nestedDestination(slot: Slot | undefined): Destination | undefined {
  return slot?.kind === "record" ? slot.destination : undefined;
}
