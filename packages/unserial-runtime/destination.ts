// packages/unserial-runtime/destination.ts
// Settable slots: how an object node writes into a caller-owned record.

import type { DecodedValue } from "./values.ts";

export type ScalarSlot =
  | {
    readonly kind: "int";
    readonly nullable: boolean;
    set(value: number | null): void;
  }
  | {
    readonly kind: "uint";
    readonly nullable: boolean;
    set(value: number | null): void;
  }
  | {
    readonly kind: "bigint";
    readonly nullable: boolean;
    set(value: bigint | null): void;
  }
  | {
    readonly kind: "float";
    readonly nullable: boolean;
    set(value: number | null): void;
  }
  | {
    readonly kind: "text";
    readonly nullable: boolean;
    set(value: string | null): void;
  }
  | {
    readonly kind: "bool";
    readonly nullable: boolean;
    set(value: boolean | null): void;
  };

/** Accepts any decoded scalar unchanged, null included. */
export type OpaqueSlot = {
  readonly kind: "opaque";
  set(value: DecodedValue): void;
};

/** A field holding a nested record; nested object nodes decode into it. */
export type RecordSlot = {
  readonly kind: "record";
  readonly destination: Destination;
};

export type Slot = ScalarSlot | OpaqueSlot | RecordSlot;

export type SlotKind = Slot["kind"];

export type ScalarKind = ScalarSlot["kind"];

/**
 * Capability a decode target exposes: resolve a (normalized) field name to
 * a settable slot, or `undefined` when the record has no such field.
 */
export interface Destination {
  lookup(name: string): Slot | undefined;
}

/** Destination with no fields. Everything routed here is consumed and dropped. */
export const discard: Destination = Object.freeze({
  lookup: (_name: string): Slot | undefined => undefined,
});

/**
 * Write a decoded scalar into a slot, widening numeric kinds.
 * Returns false when the value kind cannot be stored in the slot.
 */
export function assign(
  slot: ScalarSlot | OpaqueSlot,
  value: DecodedValue,
): boolean {
  if (slot.kind === "opaque") {
    slot.set(value);
    return true;
  }

  if (value.type === "null") {
    if (!slot.nullable) return false;
    slot.set(null);
    return true;
  }

  switch (slot.kind) {
    case "int": {
      if (value.type !== "int") return false;
      const n = Number(value.value);
      if (!Number.isSafeInteger(n)) return false;
      slot.set(n);
      return true;
    }
    case "uint": {
      if (value.type !== "int" || value.value < 0n) return false;
      const n = Number(value.value);
      if (!Number.isSafeInteger(n)) return false;
      slot.set(n);
      return true;
    }
    case "bigint":
      if (value.type !== "int") return false;
      slot.set(value.value);
      return true;
    case "float":
      if (value.type === "float") {
        slot.set(value.value);
        return true;
      }
      if (value.type === "int") {
        slot.set(Number(value.value));
        return true;
      }
      return false;
    case "text":
      if (value.type !== "text") return false;
      slot.set(value.value);
      return true;
    case "bool":
      if (value.type !== "bool") return false;
      slot.set(value.value);
      return true;
  }
}
