// packages/unserial-runtime/api.test.ts
import { expect, test } from "vitest";
import {
  decodeInto,
  decodeIntoSafe,
  toBytes,
  unserialize,
  unserializeSafe,
} from "./api.ts";
import { f } from "./builders.ts";
import { DecodeFailure } from "./errors.ts";

const Person$ = f.record({
  Name: f.text(),
  Age: f.int(),
});

const PERSON = 'O:6:"Person":2:{s:4:"Name";s:3:"Bob";s:3:"Age";i:30;}';

// ============================================================================
// unserialize Tests
// ============================================================================

test("unserialize - scalar literals", () => {
  expect(unserialize("i:42;")).toBe(42n);
  expect(unserialize("d:3.5;")).toBe(3.5);
  expect(unserialize("b:1;")).toBe(true);
  expect(unserialize("N;")).toBeNull();
  expect(unserialize('s:5:"hello";')).toBe("hello");
});

test("unserialize - accepts bytes", () => {
  expect(unserialize(toBytes('s:2:"ok";'))).toBe("ok");
});

test("unserializeSafe - trailing bytes", () => {
  expect(unserializeSafe("i:1;i:2;")).toEqual({
    ok: false,
    error: { type: "TrailingData", offset: 4, path: "", remaining: 4 },
  });
});

test("unserializeSafe - arrays are unsupported at the top level", () => {
  const result = unserializeSafe('a:1:{i:0;s:1:"x";}');
  expect(result.ok ? undefined : result.error.type).toBe("UnsupportedTag");
});

test("unserialize - throws DecodeFailure with the error value", () => {
  let caught: unknown;
  try {
    unserialize("i:4x;");
  } catch (err) {
    caught = err;
  }
  expect(caught).toBeInstanceOf(DecodeFailure);
  if (caught instanceof DecodeFailure) {
    expect(caught.error.type).toBe("NumericParseError");
    expect(caught.message).toBe('invalid int literal "4x" at offset 2');
  }
});

test("unserialize - latin1 option", () => {
  const data = new Uint8Array([0x73, 0x3a, 0x31, 0x3a, 0x22, 0xfc, 0x22, 0x3b]);
  expect(unserialize(data, { encoding: "latin1" })).toBe("ü");
});

// ============================================================================
// decodeInto Tests
// ============================================================================

test("decodeInto - builds the record from its schema", () => {
  expect(decodeInto(PERSON, Person$)).toEqual({ Name: "Bob", Age: 30 });
});

test("decodeIntoSafe - trailing bytes after the object", () => {
  expect(decodeIntoSafe(`${PERSON}N;`, Person$)).toEqual({
    ok: false,
    error: { type: "TrailingData", offset: 53, path: "", remaining: 2 },
  });
});

test("decodeInto - throws on a scalar payload", () => {
  expect(() => decodeInto("i:1;", Person$)).toThrow(DecodeFailure);
  expect(() => decodeInto("i:1;", Person$)).toThrow(
    "expected 'O:', found 'i:' at offset 0",
  );
});

test("decodeInto - options reach the object consumer", () => {
  const data = 'O:1:"P":1:{s:4:"name";s:3:"Bob";}';
  expect(decodeInto(data, Person$)).toEqual({ Name: "Bob", Age: 0 });
  expect(decodeInto(data, Person$, { normalizeKey: (key) => key })).toEqual({
    Name: "",
    Age: 0,
  });
});

test("unserializeSafe - unknown encoding label", () => {
  expect(unserializeSafe("N;", { encoding: "no-such-charset" })).toEqual({
    ok: false,
    error: {
      type: "UnsupportedEncoding",
      offset: 0,
      path: "",
      encoding: "no-such-charset",
    },
  });
});

test("decodeIntoSafe - unknown encoding label", () => {
  const result = decodeIntoSafe(PERSON, Person$, { encoding: "no-such-charset" });
  expect(result.ok ? undefined : result.error.type).toBe("UnsupportedEncoding");
  expect(() => decodeInto(PERSON, Person$, { encoding: "no-such-charset" }))
    .toThrow('unsupported text encoding "no-such-charset" at offset 0');
});
