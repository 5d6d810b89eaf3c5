// packages/unserial-runtime/errors.ts
import { match as patternMatch } from "ts-pattern";
import { buildPath, type DecodeContext } from "./context.ts";
import type { SlotKind } from "./destination.ts";
import { Result } from "./result.ts";
import type { ValueKind } from "./values.ts";

// Every error records the byte offset it was raised at and the dotted
// field path (empty at the top level) of the node being decoded.
export type DecodeError =
  | {
    readonly type: "UnexpectedTag";
    readonly offset: number;
    readonly path: string;
    readonly expected: string;
    readonly found: string;
  }
  | {
    readonly type: "UnexpectedByte";
    readonly offset: number;
    readonly path: string;
    readonly expected: string;
    readonly found: string;
  }
  | {
    readonly type: "MalformedCount";
    readonly offset: number;
    readonly path: string;
    readonly raw: string;
  }
  | {
    readonly type: "MalformedString";
    readonly offset: number;
    readonly path: string;
    readonly raw: string;
  }
  | {
    readonly type: "NumericParseError";
    readonly offset: number;
    readonly path: string;
    readonly kind: "int" | "float";
    readonly literal: string;
  }
  | {
    readonly type: "InvalidKey";
    readonly offset: number;
    readonly path: string;
    readonly found: string;
  }
  | {
    readonly type: "FieldTypeMismatch";
    readonly offset: number;
    readonly path: string;
    readonly field: string;
    readonly expected: SlotKind;
    readonly actual: ValueKind | "object";
  }
  | {
    readonly type: "CorruptStream";
    readonly offset: number;
    readonly path: string;
  }
  | {
    readonly type: "UnsupportedTag";
    readonly offset: number;
    readonly path: string;
    readonly tag: string;
    readonly tail: string;
  }
  | {
    readonly type: "DepthExceeded";
    readonly offset: number;
    readonly path: string;
    readonly maxDepth: number;
  }
  | {
    readonly type: "UnsupportedEncoding";
    readonly offset: number;
    readonly path: string;
    readonly encoding: string;
  }
  | {
    readonly type: "TrailingData";
    readonly offset: number;
    readonly path: string;
    readonly remaining: number;
  };

export type DecodeErrorType = DecodeError["type"];

type WithoutPath<E> = E extends unknown ? Omit<E, "path"> : never;

export type DecodeErrorDetail = WithoutPath<DecodeError>;

// Factory function for creating decode errors
export function decodeError(
  ctx: DecodeContext,
  detail: DecodeErrorDetail,
): DecodeError {
  return { ...detail, path: buildPath(ctx.path) };
}

export function fail<T>(
  ctx: DecodeContext,
  detail: DecodeErrorDetail,
): Result<T, DecodeError> {
  return Result.err(decodeError(ctx, detail));
}

const MAX_TAIL = 32;

function clip(text: string): string {
  return text.length > MAX_TAIL ? `${text.slice(0, MAX_TAIL)}...` : text;
}

export function formatDecodeError(error: DecodeError): string {
  const message = patternMatch<DecodeError, string>(error)
    .with(
      { type: "UnexpectedTag" },
      (e) => `expected ${e.expected}, found ${e.found}`,
    )
    .with(
      { type: "UnexpectedByte" },
      (e) => `expected '${e.expected}', found '${e.found}'`,
    )
    .with(
      { type: "MalformedCount" },
      (e) => `malformed count field ${JSON.stringify(clip(e.raw))}`,
    )
    .with(
      { type: "MalformedString" },
      (e) => `malformed string ${JSON.stringify(clip(e.raw))}`,
    )
    .with(
      { type: "NumericParseError" },
      (e) => `invalid ${e.kind} literal ${JSON.stringify(clip(e.literal))}`,
    )
    .with(
      { type: "InvalidKey" },
      (e) => `object key must be a string, found tag '${e.found}'`,
    )
    .with(
      { type: "FieldTypeMismatch" },
      (e) => `cannot store ${e.actual} in ${e.expected} field ${e.field}`,
    )
    .with({ type: "CorruptStream" }, () => `unexpected end of input`)
    .with(
      { type: "UnsupportedTag" },
      (e) => `can not consume type '${e.tag}': ${JSON.stringify(clip(e.tail))}`,
    )
    .with(
      { type: "DepthExceeded" },
      (e) => `maximum nesting depth (${e.maxDepth}) exceeded`,
    )
    .with(
      { type: "UnsupportedEncoding" },
      (e) => `unsupported text encoding ${JSON.stringify(e.encoding)}`,
    )
    .with(
      { type: "TrailingData" },
      (e) => `${e.remaining} unread byte(s) after value`,
    )
    .exhaustive();
  const where = error.path ? `${error.path}: ` : "";
  return `${where}${message} at offset ${error.offset}`;
}

/** Thrown by the non-Safe entry points; carries the DecodeError value. */
export class DecodeFailure extends Error {
  readonly error: DecodeError;

  constructor(error: DecodeError) {
    super(formatDecodeError(error));
    this.name = "DecodeFailure";
    this.error = error;
  }
}
