// packages/unserial-runtime/keys.ts
// Key-name normalization applied before a destination lookup.

/**
 * Default normalization: the first character upper-cased, the rest kept.
 * `"name"` looks up the field `Name`.
 */
export function upperCaseFirstLetter(key: string): string {
  if (key.length === 0) return key;
  return key.slice(0, 1).toUpperCase() + key.slice(1);
}

/**
 * Strip the prefix serialize() puts on non-public property names:
 * `"\0Class\0prop"` (private) and `"\0*\0prop"` (protected) become `"prop"`.
 *
 * @example
 * ```ts
 * decodeInto(bytes, User$, {
 *   normalizeKey: (key) => upperCaseFirstLetter(stripVisibility(key)),
 * });
 * ```
 */
export function stripVisibility(key: string): string {
  if (!key.startsWith("\0")) return key;
  const end = key.indexOf("\0", 1);
  return end < 0 ? key : key.slice(end + 1);
}
