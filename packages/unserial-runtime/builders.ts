// packages/unserial-runtime/builders.ts
// Programmatic record schemas: typed destinations without runtime reflection.

import type { Destination, ScalarKind, Slot } from "./destination.ts";
import type { DecodedValue } from "./values.ts";

type Target = Record<string, unknown>;

/**
 * Abstract base class for field types.
 * A field knows its zero value and how to expose `target[name]` as a slot.
 */
export abstract class Field<T = unknown> {
  /** Schema kind discriminator */
  abstract readonly kind: Slot["kind"];

  /** Value a freshly created record holds before decoding. */
  abstract zero(): T;

  abstract slot(target: Target, name: string): Slot;
}

export class ScalarField<T> extends Field<T> {
  readonly kind: ScalarKind;
  readonly isNullable: boolean;
  private readonly zeroValue: T;

  constructor(kind: ScalarKind, zeroValue: T, isNullable = false) {
    super();
    this.kind = kind;
    this.zeroValue = zeroValue;
    this.isNullable = isNullable;
  }

  zero(): T {
    return this.zeroValue;
  }

  /** Same field, also accepting N; and starting out as null. */
  nullable(): ScalarField<T | null> {
    return new ScalarField<T | null>(this.kind, null, true);
  }

  slot(target: Target, name: string): Slot {
    return {
      kind: this.kind,
      nullable: this.isNullable,
      set: (value: unknown) => {
        target[name] = value;
      },
    };
  }
}

/** Keeps the decoded node as-is, tag included. */
export class OpaqueField extends Field<DecodedValue> {
  readonly kind = "opaque";

  zero(): DecodedValue {
    return { type: "null" };
  }

  slot(target: Target, name: string): Slot {
    return {
      kind: "opaque",
      set: (value: DecodedValue) => {
        target[name] = value;
      },
    };
  }
}

export type Shape = Record<string, Field>;

export type Infer<F> = F extends RecordField<infer S> ? InferShape<S>
  : F extends Field<infer T> ? T
  : never;

export type InferShape<S extends Shape> = {
  [K in keyof S]: Infer<S[K]>;
};

function isTarget(value: unknown): value is Target {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export class RecordField<S extends Shape> extends Field<InferShape<S>> {
  readonly kind = "record";
  readonly fields: S;

  constructor(fields: S) {
    super();
    this.fields = fields;
  }

  /** Record with every field at its zero value, nested records included. */
  create(): InferShape<S> {
    const record: Target = {};
    for (const [name, field] of Object.entries(this.fields)) {
      record[name] = field.zero();
    }
    // Shape and values come from this.fields
    return record as InferShape<S>;
  }

  zero(): InferShape<S> {
    return this.create();
  }

  /** Destination writing straight into `target`. */
  bind(target: InferShape<S>): Destination {
    return this.destination(target);
  }

  slot(target: Target, name: string): Slot {
    const existing = target[name];
    const nested: Target = isTarget(existing) ? existing : this.create();
    target[name] = nested;
    return { kind: "record", destination: this.destination(nested) };
  }

  private destination(target: Target): Destination {
    return {
      lookup: (name) =>
        Object.hasOwn(this.fields, name)
          ? this.fields[name].slot(target, name)
          : undefined,
    };
  }
}

/**
 * Fluent API for building record schemas.
 *
 * @example
 * ```ts
 * import { f, decodeInto } from "unserial-runtime";
 *
 * const Person$ = f.record({
 *   Name: f.text(),
 *   Age: f.int(),
 *   Email: f.text().nullable(),
 *   Address: f.record({ City: f.text() }),
 * });
 *
 * const person = decodeInto(bytes, Person$);
 * ```
 */
export const f = {
  /** Integer that fits a JS number. */
  int(): ScalarField<number> {
    return new ScalarField("int", 0);
  },

  /** Non-negative integer that fits a JS number. */
  uint(): ScalarField<number> {
    return new ScalarField("uint", 0);
  },

  /** Full signed 64-bit integer. */
  bigint(): ScalarField<bigint> {
    return new ScalarField("bigint", 0n);
  },

  /** Floating point; integers are widened. */
  float(): ScalarField<number> {
    return new ScalarField("float", 0);
  },

  text(): ScalarField<string> {
    return new ScalarField("text", "");
  },

  bool(): ScalarField<boolean> {
    return new ScalarField("bool", false);
  },

  opaque(): OpaqueField {
    return new OpaqueField();
  },

  record<S extends Shape>(fields: S): RecordField<S> {
    return new RecordField(fields);
  },
};
