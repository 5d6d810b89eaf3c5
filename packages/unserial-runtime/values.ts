// packages/unserial-runtime/values.ts
// Decoded scalar nodes. The dispatcher in dispatch.ts is the only producer.

export type DecodedValue =
  | { readonly type: "null" }
  | { readonly type: "bool"; readonly value: boolean }
  | { readonly type: "int"; readonly value: bigint }
  | { readonly type: "float"; readonly value: number }
  | { readonly type: "text"; readonly value: string };

export type ValueKind = DecodedValue["type"];

/** Plain JavaScript form of a decoded scalar. */
export type PlainValue = null | boolean | bigint | number | string;

export function toPlain(value: DecodedValue): PlainValue {
  return value.type === "null" ? null : value.value;
}
