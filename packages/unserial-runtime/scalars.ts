// packages/unserial-runtime/scalars.ts
// Consumers for the fixed-shape scalar tags: N, b, i, d.

import { Delim, Tag } from "../unserial-spec/src/mod.ts";
import { DEFAULT_CONTEXT, type DecodeContext } from "./context.ts";
import { type DecodeError, fail } from "./errors.ts";
import { type Consumed, Result } from "./result.ts";
import {
  asciiSlice,
  checkTag,
  expectByte,
  findNextDelimiter,
} from "./scanner.ts";

const INT_LITERAL = /^[+-]?\d+$/;
const FLOAT_LITERAL = /^[+-]?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?$/;
const FLOAT_INFINITY = /^([+-]?)inf(inity)?$/i;
const FLOAT_NAN = /^[+-]?nan$/i;

const INT64_MIN = -(2n ** 63n);
const INT64_MAX = 2n ** 63n - 1n;

export function consumeNull(
  bytes: Uint8Array,
  offset: number,
  ctx: DecodeContext = DEFAULT_CONTEXT,
): Result<Consumed<null>, DecodeError> {
  const err = checkTag(bytes, offset, Tag.NULL, Delim.SEMICOLON, ctx);
  if (err) return Result.err(err);
  return Result.ok({ value: null, offset: offset + 2 });
}

export function consumeBool(
  bytes: Uint8Array,
  offset: number,
  ctx: DecodeContext = DEFAULT_CONTEXT,
): Result<Consumed<boolean>, DecodeError> {
  const err = checkTag(bytes, offset, Tag.BOOL, Delim.COLON, ctx) ??
    expectByte(bytes, offset + 3, Delim.SEMICOLON, ctx);
  if (err) return Result.err(err);
  // b:1; is the only spelling of true
  return Result.ok({ value: bytes[offset + 2] === 0x31, offset: offset + 4 });
}

// Literal between the "x:" prefix and the next ';', plus the offset past the ';'
function literalRegion(
  bytes: Uint8Array,
  offset: number,
  kind: "int" | "float",
  ctx: DecodeContext,
): Result<Consumed<string>, DecodeError> {
  const start = offset + 2;
  const end = findNextDelimiter(bytes, Delim.SEMICOLON, start);
  if (end < 0) {
    return fail(ctx, {
      type: "NumericParseError",
      offset: start,
      kind,
      literal: asciiSlice(bytes, start, bytes.length),
    });
  }
  return Result.ok({ value: asciiSlice(bytes, start, end), offset: end + 1 });
}

export function consumeInt(
  bytes: Uint8Array,
  offset: number,
  ctx: DecodeContext = DEFAULT_CONTEXT,
): Result<Consumed<bigint>, DecodeError> {
  const err = checkTag(bytes, offset, Tag.INT, Delim.COLON, ctx);
  if (err) return Result.err(err);

  return Result.andThen<Consumed<string>, Consumed<bigint>, DecodeError>(
    literalRegion(bytes, offset, "int", ctx),
    ({ value: literal, offset: next }) => {
      const value = INT_LITERAL.test(literal) ? BigInt(literal) : undefined;
      if (value === undefined || value < INT64_MIN || value > INT64_MAX) {
        return fail(ctx, {
          type: "NumericParseError",
          offset: offset + 2,
          kind: "int",
          literal,
        });
      }
      return Result.ok({ value, offset: next });
    },
  );
}

function parseFloatLiteral(literal: string): number | undefined {
  if (FLOAT_LITERAL.test(literal)) return Number(literal);
  const inf = FLOAT_INFINITY.exec(literal);
  if (inf) return inf[1] === "-" ? -Infinity : Infinity;
  if (FLOAT_NAN.test(literal)) return NaN;
  return undefined;
}

export function consumeFloat(
  bytes: Uint8Array,
  offset: number,
  ctx: DecodeContext = DEFAULT_CONTEXT,
): Result<Consumed<number>, DecodeError> {
  const err = checkTag(bytes, offset, Tag.FLOAT, Delim.COLON, ctx);
  if (err) return Result.err(err);

  return Result.andThen<Consumed<string>, Consumed<number>, DecodeError>(
    literalRegion(bytes, offset, "float", ctx),
    ({ value: literal, offset: next }) => {
      const value = parseFloatLiteral(literal);
      if (value === undefined) {
        return fail(ctx, {
          type: "NumericParseError",
          offset: offset + 2,
          kind: "float",
          literal,
        });
      }
      return Result.ok({ value, offset: next });
    },
  );
}
