/**
 * Core sequence primitives shared by synthesis, assembly and folding
 */

export { gcContent, mean } from "./calculations";
export { CassetteParts, LEAD_IN, LEAD_OUT, POLY_A_SIGNAL, SPACERS, STOP_CODON } from "./cassette-parts";
export { ownValue, recordFromEntries } from "./records";
export {
  canPair,
  complement,
  createMismatch,
  isStrictRNA,
  mismatchBase,
  normalizeRNA,
  reverse,
  reverseComplement,
  SequenceManipulation,
  toRNA,
} from "./sequence-manipulation";
