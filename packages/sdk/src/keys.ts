/**
 * Storage key composition
 *
 * Keys are `namespace + delimiter + segment[0] + delimiter + segment[1] ...`.
 * Segments must not contain the delimiter themselves; two different
 * identifiers can otherwise compose to the same key. This is not checked.
 */

/**
 * ASCII unit separator (recommended)
 */
export const DELIM_UNIT = "\x1f";

/**
 * ASCII pipe. Readable in `redis-cli`; collides with segments containing a pipe.
 */
export const DELIM_PIPE = "|";

/** Suffix of the sorted set holding last-modified scores */
export const INDEX_SUFFIX = "lmIdx";

/**
 * Identifier of a record: a single segment or an ordered list of segments
 */
export type Id = string | readonly string[];

/**
 * Normalize an identifier into its list of segments
 */
export function segmentsOf(id: Id): readonly string[] {
  return typeof id === "string" ? [id] : id;
}

/**
 * Compose a storage key from a namespace and identifier segments
 *
 * @example
 * ```typescript
 * composeKey("orders", DELIM_PIPE, ["eu", "42"]); // "orders|eu|42"
 * ```
 */
export function composeKey(namespace: string, delimiter: string, id: Id): string {
  return namespace + delimiter + segmentsOf(id).join(delimiter);
}

/**
 * Key of the ordering index for a namespace
 */
export function indexKey(namespace: string, delimiter: string): string {
  return composeKey(namespace, delimiter, INDEX_SUFFIX);
}
