// packages/unserial-spec/src/mod.ts
// Wire vocabulary of the serialize() text-binary format: one tag byte per node.
export enum Tag {
  // scalars
  NULL = 0x4e, // N
  BOOL = 0x62, // b
  INT = 0x69, // i
  FLOAT = 0x64, // d
  STRING = 0x73, // s
  // composites
  OBJECT = 0x4f, // O
  ARRAY = 0x61, // a (recognized, never decoded)
}

// Framing bytes shared by every node kind.
export enum Delim {
  COLON = 0x3a, // :
  SEMICOLON = 0x3b, // ;
  QUOTE = 0x22, // "
  OPEN_BRACE = 0x7b, // {
  CLOSE_BRACE = 0x7d, // }
}

/**
 * Printable form of a byte for error messages: the character itself for
 * printable ASCII, `\xNN` otherwise.
 */
export function tagName(byte: number | undefined): string {
  if (byte === undefined) return "<end of input>";
  if (byte >= 0x20 && byte < 0x7f) return String.fromCharCode(byte);
  return `\\x${byte.toString(16).padStart(2, "0")}`;
}
