/**
 * Bulged binding-site synthesis
 *
 * A sponge site is the reverse complement of the mature miRNA with four
 * positions opposite nt 9-12 deliberately mismatched. The bulge lets the
 * site bind stably without triggering slicer-style cleavage.
 *
 * @module operations/synthesize
 */

import { SequenceError } from "../errors";
import type { BindingSite, ElementId } from "../types";
import {
  createMismatch,
  isStrictRNA,
  normalizeRNA,
  reverseComplement,
} from "./core/sequence-manipulation";

/** Length of the perfectly complementary seed match at the site's 3' end */
export const SEED_MATCH_LENGTH = 8;

/** Length of the mismatched bulge just 5' of the seed match */
export const BULGE_LENGTH = 4;

/** Shortest element that still leaves a 3' match after seed and bulge */
export const MIN_ELEMENT_LENGTH = SEED_MATCH_LENGTH + BULGE_LENGTH + 1;

/**
 * Turn a mature element sequence into a bulged binding site
 *
 * @example
 * ```typescript
 * const site = synthesizeSite('miR-demo', 'ACGUACGUACGUA');
 * site.seedMatch;       // 'ACGUACGU'
 * site.bulgeMismatch;   // 'CAUG'
 * site.threePrimeMatch; // 'U'
 * site.siteSeq;         // 'UCAUGACGUACGU'
 * ```
 *
 * @throws {SequenceError} When the sequence is shorter than
 * {@link MIN_ELEMENT_LENGTH} or contains bases other than A/C/G/U/T
 */
export function synthesizeSite(elementId: ElementId, matureSeq: string): BindingSite {
  const elementSeq = normalizeRNA(matureSeq);

  if (elementSeq.length < MIN_ELEMENT_LENGTH) {
    throw new SequenceError(
      `Element '${elementId}' is too short (${elementSeq.length} nt); at least ${MIN_ELEMENT_LENGTH} nt are needed to form seed, bulge and 3' match regions`,
      elementId,
      elementSeq.length,
      elementSeq
    );
  }
  if (!isStrictRNA(elementSeq)) {
    throw new SequenceError(
      `Element '${elementId}' contains bases outside A/C/G/U`,
      elementId,
      elementSeq.length,
      elementSeq
    );
  }

  const rc = reverseComplement(elementSeq);
  const seedStart = rc.length - SEED_MATCH_LENGTH;
  const bulgeStart = seedStart - BULGE_LENGTH;

  const seedMatch = rc.slice(seedStart);
  const bulgeMismatch = createMismatch(rc.slice(bulgeStart, seedStart));
  const threePrimeMatch = rc.slice(0, bulgeStart);

  return {
    elementId,
    elementSeq,
    siteSeq: threePrimeMatch + bulgeMismatch + seedMatch,
    seedMatch,
    bulgeMismatch,
    threePrimeMatch,
  };
}

/**
 * Synthesize a site for each element, keeping input order
 */
export function synthesizeSites(
  elements: readonly { readonly elementId: ElementId; readonly matureSeq: string }[]
): BindingSite[] {
  return elements.map(({ elementId, matureSeq }) => synthesizeSite(elementId, matureSeq));
}
