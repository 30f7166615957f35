/**
 * Lookups on string-keyed records that ignore inherited members
 *
 * Element and cell type ids come from user data, so an id such as
 * "constructor" or "toString" must read as absent rather than as an
 * `Object.prototype` member.
 *
 * @module records
 */

/**
 * Own property value of a record, or `undefined`
 *
 * @example
 * ```typescript
 * ownValue({ Heart: 12 }, 'Heart');       // 12
 * ownValue({ Heart: 12 }, 'constructor'); // undefined
 * ```
 */
export function ownValue<T>(
  record: Readonly<Record<string, T>> | undefined,
  key: string
): T | undefined {
  if (record === undefined || !Object.hasOwn(record, key)) {
    return undefined;
  }
  return record[key];
}

/**
 * Build a record from entries, keeping every key as an own property
 *
 * Plain assignment would treat a "__proto__" key as a prototype change.
 */
export function recordFromEntries<T>(entries: Iterable<readonly [string, T]>): Record<string, T> {
  return Object.fromEntries(entries);
}
