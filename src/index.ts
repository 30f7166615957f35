/**
 * mirsponge - design microRNA sponge 3'UTRs
 *
 * Select a miRNA panel that is silent where expression must be kept and
 * active where it must be suppressed, turn it into bulged binding sites,
 * assemble the cassette, and preview its secondary structure.
 */

// Error types
export { FileError, ParseError, SequenceError, SpongeError, ValidationError } from "./errors";
// Expression dataset format
export {
  deserializeExpressionDocument,
  type ExpressionDocument,
  ExpressionDocumentSchema,
  ExpressionDatasetParser,
  loadExpressionDataset,
  parseExpressionDataset,
} from "./formats/json";
// File I/O
export { exists, FileReader, getSize, readToString } from "./io/file-reader";
// Sequence primitives
export {
  CassetteParts,
  canPair,
  complement,
  createMismatch,
  gcContent,
  isStrictRNA,
  mismatchBase,
  normalizeRNA,
  ownValue,
  reverse,
  reverseComplement,
  SequenceManipulation,
  toRNA,
} from "./operations/core";
// Design operations
export * from "./operations";
// Core types
export type {
  AssemblyOptions,
  AssemblyResult,
  BasePair,
  BindingSite,
  CellTypeId,
  ContextRegionType,
  ElementCatalog,
  ElementId,
  ExpressionDataset,
  ExpressionMatrix,
  FileReaderOptions,
  FixedRegion,
  FoldResult,
  LeadingContext,
  Region,
  RegionType,
  SelectionParams,
  SelectionResult,
  SelectionStep,
  SiteRegion,
  SpecificElement,
  SpecificityOptions,
} from "./types";
export { AssemblyOptionsSchema, SelectionParamsSchema, SpecificityOptionsSchema } from "./types";
