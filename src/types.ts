/**
 * Core type definitions for sponge design
 *
 * Every result type is a plain, JSON-serialisable value object: sets are
 * carried as duplicate-free arrays and no result embeds behaviour, so a
 * presentation layer can render or transmit them directly.
 */

import { type } from "arktype";

// =============================================================================
// EXPRESSION DATA
// =============================================================================

/** miRNA identifier (e.g. a miRBase ID) */
export type ElementId = string;

/** Cell type label as it appears in the expression dataset */
export type CellTypeId = string;

/**
 * Mean expression per element per cell type
 *
 * Sparse: an absent element or cell type entry reads as 0.
 */
export type ExpressionMatrix = Readonly<Record<ElementId, Readonly<Record<CellTypeId, number>>>>;

/**
 * Element sequences, keyed by element id
 *
 * `elements` fixes the catalog-native order that candidate scanning and
 * greedy tie-breaking follow.
 */
export interface ElementCatalog {
  readonly elements: readonly ElementId[];
  readonly seeds: Readonly<Record<ElementId, string>>;
  /** Mature sequences, RNA alphabet; legacy "T" is accepted and read as "U" */
  readonly matureSeqs: Readonly<Record<ElementId, string>>;
}

/**
 * A loaded expression dataset: the cell types it covers, its matrix and catalog
 */
export interface ExpressionDataset {
  readonly cellTypes: readonly CellTypeId[];
  readonly matrix: ExpressionMatrix;
  readonly catalog: ElementCatalog;
}

// =============================================================================
// SELECTION
// =============================================================================

export interface SelectionParams {
  /** Cell types to protect: candidates must be silent in every one of them */
  readonly targets: readonly CellTypeId[];
  /** Cell types to suppress: the panel must cover each of them */
  readonly offTargets: readonly CellTypeId[];
  /** Exclusive upper bound for "silent" */
  readonly targetThreshold: number;
  /** Inclusive lower bound for "covers" */
  readonly coverThreshold: number;
  /** Hard cap on panel size, independent of coverage outcome */
  readonly maxElements: number;
}

export interface SelectionStep {
  readonly elementId: ElementId;
  readonly seed: string;
  readonly matureSeq: string;
  /** Arithmetic mean of the element's expression across all targets */
  readonly meanTargetValue: number;
  /** Off-targets first covered by this step, in off-target order */
  readonly newlyCovered: readonly CellTypeId[];
}

export interface SelectionResult {
  /** True exactly when `uncovered` is empty */
  readonly success: boolean;
  /** Element ids in selection order */
  readonly selected: readonly ElementId[];
  readonly steps: readonly SelectionStep[];
  readonly uncovered: readonly CellTypeId[];
  readonly allOffTargets: readonly CellTypeId[];
}

// =============================================================================
// BINDING SITES AND ASSEMBLY
// =============================================================================

/**
 * A bulged sponge site for one element
 *
 * `siteSeq === threePrimeMatch + bulgeMismatch + seedMatch`, 5'→3' on the
 * site strand, antiparallel to the element.
 */
export interface BindingSite {
  readonly elementId: ElementId;
  /** Normalised (upper-case RNA) element sequence */
  readonly elementSeq: string;
  readonly siteSeq: string;
  /** 8 nt, perfectly complementary to the element's seed-adjacent window */
  readonly seedMatch: string;
  /** 4 nt, never complementary to the element at any position */
  readonly bulgeMismatch: string;
  readonly threePrimeMatch: string;
}

export type RegionType =
  | "utr5"
  | "cds"
  | "terminator"
  | "lead-in"
  | "site"
  | "spacer"
  | "lead-out"
  | "poly-a-signal";

/** Region types whose sequence is caller-supplied pass-through context */
export type ContextRegionType = Extract<RegionType, "utr5" | "cds">;

interface RegionSpan {
  /** Inclusive start offset into the assembled sequence */
  readonly start: number;
  /** Exclusive end offset */
  readonly end: number;
  readonly seq: string;
}

export interface SiteRegion extends RegionSpan {
  readonly type: "site";
  readonly elementId: ElementId;
  /** Index into the distinct site list: position in cassette mod site count */
  readonly elementIndex: number;
}

export interface FixedRegion extends RegionSpan {
  readonly type: Exclude<RegionType, "site">;
}

export type Region = SiteRegion | FixedRegion;

/**
 * Optional upstream context placed before the terminator
 */
export interface LeadingContext {
  readonly utr5?: string;
  readonly cds?: string;
}

export interface AssemblyResult {
  /** Every region's sequence, in emission order */
  readonly fullSequence: string;
  /** The sequence from the terminator onward (no leading context) */
  readonly threePrimeUtr: string;
  /** Only the repeating site + spacer block */
  readonly cassette: string;
  readonly sites: readonly BindingSite[];
  /** Ordered, gap-free partition of `fullSequence` */
  readonly regions: readonly Region[];
  readonly numSites: number;
}

// =============================================================================
// STRUCTURE
// =============================================================================

/** Base pair (i, j) with i < j, zero-based */
export type BasePair = readonly [number, number];

export interface FoldResult {
  /** Non-crossing pairs sorted by opening index; no index used twice */
  readonly pairs: readonly BasePair[];
  /** "(" at each opening index, ")" at each closing index, "." elsewhere */
  readonly dotBracket: string;
}

// =============================================================================
// SPECIFICITY
// =============================================================================

/**
 * An element expressed in a chosen cell type, with how concentrated its
 * expression is across all cell types
 */
export interface SpecificElement {
  readonly elementId: ElementId;
  /** Empty when the catalog has no sequence for the element */
  readonly matureSeq: string;
  /** Mean expression in the chosen cell type */
  readonly meanExpr: number;
  /** Shannon entropy (bits) of the expression profile; 0 is perfectly specific */
  readonly entropy: number;
}

// =============================================================================
// VALIDATION SCHEMAS
// =============================================================================

export const SelectionParamsSchema = type({
  targets: "string[]",
  offTargets: "string[]",
  targetThreshold: "number>=0",
  coverThreshold: "number>=0",
  maxElements: "number>=1",
}).narrow((params, ctx) => {
  if (!Number.isFinite(params.targetThreshold) || !Number.isFinite(params.coverThreshold)) {
    return ctx.reject({
      expected: "finite thresholds",
      actual: `targetThreshold=${params.targetThreshold}, coverThreshold=${params.coverThreshold}`,
    });
  }
  if (!Number.isInteger(params.maxElements)) {
    return ctx.reject({
      expected: "an integer maxElements",
      actual: String(params.maxElements),
    });
  }
  return true;
});

export const AssemblyOptionsSchema = type({
  numSites: "number>=1",
  "leadingContext?": {
    "utr5?": "string | undefined",
    "cds?": "string | undefined",
  },
}).narrow((options, ctx) => {
  if (!Number.isInteger(options.numSites)) {
    return ctx.reject({
      expected: "an integer numSites",
      actual: String(options.numSites),
    });
  }
  return true;
});

export const SpecificityOptionsSchema = type({
  threshold: "number",
  topN: "number>=0",
}).narrow((options, ctx) => {
  if (!Number.isFinite(options.threshold)) {
    return ctx.reject({
      expected: "a finite threshold",
      actual: String(options.threshold),
    });
  }
  if (!Number.isInteger(options.topN)) {
    return ctx.reject({
      expected: "an integer topN",
      actual: String(options.topN),
    });
  }
  return true;
});

export const FilePathSchema = type("string>0").pipe((path: string) => {
  if (path.includes("\0")) {
    throw new Error("File path must not contain null bytes");
  }
  return path;
});

export const FileReaderOptionsSchema = type({
  "maxFileSize?": "number>0",
  "encoding?": "'utf8'|'utf-8'",
});

/**
 * Options accepted by the dataset and file readers
 */
export interface FileReaderOptions {
  /** Refuse files larger than this many bytes (default 100 MB) */
  readonly maxFileSize?: number;
  readonly encoding?: "utf8" | "utf-8";
}

/**
 * Options accepted by the cassette assembler and the design pipeline
 */
export interface AssemblyOptions {
  readonly numSites?: number;
  readonly leadingContext?: LeadingContext;
}

/**
 * Options accepted by the cell-type specificity ranking
 */
export interface SpecificityOptions {
  /** Minimum mean expression in the chosen cell type (default 0, inclusive) */
  readonly threshold?: number;
  /** How many of the most specific elements to return (default 10) */
  readonly topN?: number;
}
