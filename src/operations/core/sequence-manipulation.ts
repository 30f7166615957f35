/**
 * Core sequence manipulation operations
 *
 * RNA-alphabet complement, reversal, and normalisation, plus the pairing and
 * deliberate-mismatch rules binding-site synthesis and folding share.
 *
 * @module sequence-manipulation
 */

// =============================================================================
// CONSTANTS
// =============================================================================

/**
 * RNA complement mapping (legacy DNA "T" complements to "A")
 */
const RNA_COMPLEMENT_MAP: Readonly<Record<string, string>> = {
  A: "U",
  U: "A",
  C: "G",
  G: "C",
  T: "A",
};

/**
 * Fixed non-complementary substitution used to open a bulge
 *
 * Each replacement pairs neither Watson-Crick nor wobble with the base the
 * original would have paired with.
 */
const MISMATCH_MAP: Readonly<Record<string, string>> = {
  A: "C",
  U: "G",
  G: "U",
  C: "A",
};

/**
 * Watson-Crick (AU, GC) and wobble (GU) pairs, both orientations
 */
const PAIRING_BASES: ReadonlySet<string> = new Set(["AU", "UA", "GC", "CG", "GU", "UG"]);

// =============================================================================
// EXPORTED FUNCTIONS
// =============================================================================

/**
 * Generate the RNA complement of a sequence, preserving case
 *
 * Characters outside the A/C/G/U/T alphabet are kept as-is.
 *
 * @example
 * ```typescript
 * complement('ACGU'); // 'UGCA'
 * complement('acgt'); // 'ugca'
 * ```
 */
export function complement(sequence: string): string {
  let result = "";

  for (const char of sequence) {
    const comp = RNA_COMPLEMENT_MAP[char.toUpperCase()];
    if (comp === undefined) {
      result += char;
    } else {
      result += char === char.toLowerCase() ? comp.toLowerCase() : comp;
    }
  }

  return result;
}

/**
 * Reverse a sequence (simple string reversal)
 */
export function reverse(sequence: string): string {
  return sequence.split("").reverse().join("");
}

/**
 * Generate reverse complement of an RNA sequence
 *
 * @example
 * ```typescript
 * reverseComplement('ACGUU'); // 'AACGU'
 * ```
 */
export function reverseComplement(sequence: string): string {
  return reverse(complement(sequence));
}

/**
 * Convert DNA letters to RNA (T -> U), preserving case
 */
export function toRNA(sequence: string): string {
  return sequence.replace(/[Tt]/g, (match) => (match === "T" ? "U" : "u"));
}

/**
 * Upper-case a sequence and map legacy "T" to "U"
 */
export function normalizeRNA(sequence: string): string {
  return toRNA(sequence.toUpperCase());
}

/**
 * Whether two bases can pair (Watson-Crick or G-U wobble), case-insensitive
 */
export function canPair(a: string, b: string): boolean {
  return PAIRING_BASES.has(normalizeRNA(a + b));
}

/**
 * Substitute a base with its fixed non-complementary partner
 *
 * Bases outside A/C/G/U are returned unchanged.
 */
export function mismatchBase(base: string): string {
  return MISMATCH_MAP[base] ?? base;
}

/**
 * Apply {@link mismatchBase} to every base of a region
 *
 * @example
 * ```typescript
 * createMismatch('ACGU'); // 'CAUG'
 * ```
 */
export function createMismatch(region: string): string {
  return region.split("").map(mismatchBase).join("");
}

/**
 * Whether every character is one of A, C, G, U (upper case)
 */
export function isStrictRNA(sequence: string): boolean {
  return /^[ACGU]*$/.test(sequence);
}

// =============================================================================
// GROUPED EXPORT
// =============================================================================

export const SequenceManipulation = {
  complement,
  reverse,
  reverseComplement,
  toRNA,
  normalizeRNA,
  canPair,
  mismatchBase,
  createMismatch,
  isStrictRNA,
} as const;
