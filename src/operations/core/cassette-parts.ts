/**
 * Fixed building blocks of the sponge 3'UTR
 *
 * These literals are part of the construct design and are not tunable.
 * Upper case marks functional sequence, lower case marks linkers and spacers.
 *
 * @module cassette-parts
 */

/** Stop codon closing the upstream coding region */
export const STOP_CODON = "UAA";

/** Linker between the stop codon and the first binding site */
export const LEAD_IN = "gcauac";

/** Linker between the last binding site and the poly-A signal */
export const LEAD_OUT = "gauc";

/**
 * Spacers placed between consecutive binding sites, used cyclically
 */
export const SPACERS: readonly string[] = Object.freeze([
  "aauu",
  "ucga",
  "caag",
  "auac",
  "gaau",
  "cuua",
  "uuca",
  "agcu",
  "uacg",
  "gaua",
  "cuac",
  "acuc",
  "uguu",
  "caua",
  "ucuu",
  "agau",
]);

/**
 * Synthetic poly-A signal with upstream stabilising elements
 */
export const POLY_A_SIGNAL =
  "CUCAGGUGCAGGCUGCCUAUCAGAAGGUGGUGGCUGGUGUGGCCAAUGCCCUGGCUCACAAAUACCACUGAGAUC" +
  "UUUUUCCCUCUGCCAAAAAUUAUGGGGACAUCAUGAAGCCCCUUGAGCAUCUGACUUCUGGCUAAUAAAGGAAAU" +
  "UUAUUUUCAUUGCAAUAGUGUGUUGGAAUUUUUUGUGUCUCUCACUCGGAAGGACAUAUGGGAGGGCAAAUCAUU" +
  "UAAAACAUCAGAAUGAGUAUUUGGUUUAGAGUUUGGCA";

export const CassetteParts = Object.freeze({
  STOP_CODON,
  LEAD_IN,
  LEAD_OUT,
  SPACERS,
  POLY_A_SIGNAL,
});
