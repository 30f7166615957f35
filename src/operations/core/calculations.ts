/**
 * Sequence composition calculations
 *
 * @module calculations
 */

/**
 * Calculate GC content percentage of a sequence
 *
 * Only A, C, G, T and U count toward the denominator; other characters are
 * ignored. Returns 0 when no countable base is present.
 *
 * @example
 * ```typescript
 * gcContent('AUCG'); // 50
 * gcContent('ggcc'); // 100
 * ```
 *
 * @returns GC content as percentage (0-100)
 */
export function gcContent(sequence: string): number {
  const upper = sequence.toUpperCase();
  let gcCount = 0;
  let totalBases = 0;

  for (const base of upper) {
    if (base === "G" || base === "C") {
      gcCount++;
      totalBases++;
    } else if (base === "A" || base === "T" || base === "U") {
      totalBases++;
    }
  }

  return totalBases > 0 ? (gcCount / totalBases) * 100 : 0;
}

/**
 * Arithmetic mean, 0 for an empty list
 */
export function mean(values: readonly number[]): number {
  if (values.length === 0) {
    return 0;
  }
  let sum = 0;
  for (const value of values) {
    sum += value;
  }
  return sum / values.length;
}
