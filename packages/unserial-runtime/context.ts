// packages/unserial-runtime/context.ts
// Per-call decode settings plus the position (field path, nesting depth) of the node being read.

import { upperCaseFirstLetter } from "./keys.ts";

export interface DecodeOptions {
  /**
   * Text decoder label for string payloads (default: "utf-8"). Payload bytes
   * that are invalid in this encoding fail with MalformedString.
   */
  readonly encoding?: string;
  /** Maps a wire key to the destination field name (default: upperCaseFirstLetter). */
  readonly normalizeKey?: (key: string) => string;
  /** Deepest object nesting accepted (default: 512). */
  readonly maxDepth?: number;
}

// Path segment list, linked towards the root so descending never copies
type PathNode = {
  readonly parent: PathNode | undefined;
  readonly segment: string;
};

export interface DecodeContext {
  readonly decoder: InstanceType<typeof TextDecoder>;
  readonly normalizeKey: (key: string) => string;
  readonly maxDepth: number;
  readonly depth: number;
  readonly path: PathNode | undefined;
}

export const DEFAULT_MAX_DEPTH = 512;

/**
 * @throws RangeError when `options.encoding` is not a known decoder label
 */
export function createContext(options: DecodeOptions = {}): DecodeContext {
  return {
    decoder: new TextDecoder(options.encoding ?? "utf-8", { fatal: true }),
    normalizeKey: options.normalizeKey ?? upperCaseFirstLetter,
    maxDepth: options.maxDepth ?? DEFAULT_MAX_DEPTH,
    depth: 0,
    path: undefined,
  };
}

export const DEFAULT_CONTEXT: DecodeContext = Object.freeze(createContext());

/** Context for the value stored under `field`, one object level deeper. */
export function descend(ctx: DecodeContext, field: string): DecodeContext {
  return {
    ...ctx,
    depth: ctx.depth + 1,
    path: { parent: ctx.path, segment: field },
  };
}

// Build path string from segments (only called on error)
export function buildPath(node: PathNode | undefined): string {
  const segments: string[] = [];
  for (let n = node; n !== undefined; n = n.parent) {
    segments.push(n.segment);
  }
  return segments.reverse().join(".");
}
