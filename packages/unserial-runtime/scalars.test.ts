// packages/unserial-runtime/scalars.test.ts
import { expect, test } from "vitest";
import {
  consumeBool,
  consumeFloat,
  consumeInt,
  consumeNull,
} from "./scalars.ts";

const bytes = (s: string) => new TextEncoder().encode(s);

// ============================================================================
// consumeNull Tests
// ============================================================================

test("consumeNull - decodes N;", () => {
  expect(consumeNull(bytes("N;"), 0)).toEqual({
    ok: true,
    value: { value: null, offset: 2 },
  });
});

test("consumeNull - wrong tag", () => {
  expect(consumeNull(bytes("i:1;"), 0)).toEqual({
    ok: false,
    error: {
      type: "UnexpectedTag",
      offset: 0,
      path: "",
      expected: "'N;'",
      found: "'i:'",
    },
  });
});

test("consumeNull - truncated tag", () => {
  expect(consumeNull(bytes("N"), 0)).toEqual({
    ok: false,
    error: { type: "CorruptStream", offset: 1, path: "" },
  });
});

// ============================================================================
// consumeBool Tests
// ============================================================================

test("consumeBool - true and false", () => {
  expect(consumeBool(bytes("b:1;"), 0)).toEqual({
    ok: true,
    value: { value: true, offset: 4 },
  });
  expect(consumeBool(bytes("b:0;"), 0)).toEqual({
    ok: true,
    value: { value: false, offset: 4 },
  });
});

test("consumeBool - missing terminator", () => {
  expect(consumeBool(bytes("b:1"), 0)).toEqual({
    ok: false,
    error: { type: "CorruptStream", offset: 3, path: "" },
  });
  expect(consumeBool(bytes("b:1}"), 0)).toEqual({
    ok: false,
    error: {
      type: "UnexpectedByte",
      offset: 3,
      path: "",
      expected: ";",
      found: "}",
    },
  });
});

// ============================================================================
// consumeInt Tests
// ============================================================================

test("consumeInt - positive, negative and signed literals", () => {
  expect(consumeInt(bytes("i:42;"), 0)).toEqual({
    ok: true,
    value: { value: 42n, offset: 5 },
  });
  expect(consumeInt(bytes("i:-7;"), 0)).toEqual({
    ok: true,
    value: { value: -7n, offset: 5 },
  });
  expect(consumeInt(bytes("i:+3;"), 0)).toEqual({
    ok: true,
    value: { value: 3n, offset: 5 },
  });
});

test("consumeInt - starts at the given offset", () => {
  expect(consumeInt(bytes("N;i:5;"), 2)).toEqual({
    ok: true,
    value: { value: 5n, offset: 6 },
  });
});

test("consumeInt - signed 64-bit bounds", () => {
  const max = consumeInt(bytes("i:9223372036854775807;"), 0);
  expect(max.ok && max.value.value).toBe(9223372036854775807n);

  const min = consumeInt(bytes("i:-9223372036854775808;"), 0);
  expect(min.ok && min.value.value).toBe(-9223372036854775808n);

  expect(consumeInt(bytes("i:9223372036854775808;"), 0)).toEqual({
    ok: false,
    error: {
      type: "NumericParseError",
      offset: 2,
      path: "",
      kind: "int",
      literal: "9223372036854775808",
    },
  });
});

test("consumeInt - invalid literal", () => {
  expect(consumeInt(bytes("i:4x;"), 0)).toEqual({
    ok: false,
    error: {
      type: "NumericParseError",
      offset: 2,
      path: "",
      kind: "int",
      literal: "4x",
    },
  });
  expect(consumeInt(bytes("i:1.5;"), 0)).toEqual({
    ok: false,
    error: {
      type: "NumericParseError",
      offset: 2,
      path: "",
      kind: "int",
      literal: "1.5",
    },
  });
});

test("consumeInt - unterminated literal", () => {
  expect(consumeInt(bytes("i:42"), 0)).toEqual({
    ok: false,
    error: {
      type: "NumericParseError",
      offset: 2,
      path: "",
      kind: "int",
      literal: "42",
    },
  });
});

// ============================================================================
// consumeFloat Tests
// ============================================================================

test("consumeFloat - decimal and exponent literals", () => {
  expect(consumeFloat(bytes("d:3.5;"), 0)).toEqual({
    ok: true,
    value: { value: 3.5, offset: 6 },
  });
  expect(consumeFloat(bytes("d:-1.25E+2;"), 0)).toEqual({
    ok: true,
    value: { value: -125, offset: 11 },
  });
  expect(consumeFloat(bytes("d:5;"), 0)).toEqual({
    ok: true,
    value: { value: 5, offset: 4 },
  });
  expect(consumeFloat(bytes("d:.5;"), 0)).toEqual({
    ok: true,
    value: { value: 0.5, offset: 5 },
  });
});

test("consumeFloat - INF and NAN as written by serialize()", () => {
  const inf = consumeFloat(bytes("d:INF;"), 0);
  expect(inf.ok && inf.value.value).toBe(Infinity);

  const negInf = consumeFloat(bytes("d:-INF;"), 0);
  expect(negInf.ok && negInf.value.value).toBe(-Infinity);

  const nan = consumeFloat(bytes("d:NAN;"), 0);
  expect(nan.ok).toBe(true);
  if (nan.ok) {
    expect(nan.value.value).toBeNaN();
    expect(nan.value.offset).toBe(6);
  }
});

test("consumeFloat - invalid literals", () => {
  for (const literal of ["1.2.3", "", "0x10", " 1"]) {
    expect(consumeFloat(bytes(`d:${literal};`), 0)).toEqual({
      ok: false,
      error: {
        type: "NumericParseError",
        offset: 2,
        path: "",
        kind: "float",
        literal,
      },
    });
  }
});

test("consumeFloat - wrong tag", () => {
  expect(consumeFloat(bytes("i:1;"), 0)).toEqual({
    ok: false,
    error: {
      type: "UnexpectedTag",
      offset: 0,
      path: "",
      expected: "'d:'",
      found: "'i:'",
    },
  });
});
