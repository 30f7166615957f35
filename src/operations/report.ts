/**
 * Plain-text summaries of selections and assembled cassettes
 *
 * @module operations/report
 */

import type {
  AssemblyResult,
  CellTypeId,
  ElementId,
  Region,
  RegionType,
  SelectionParams,
  SelectionResult,
  SpecificElement,
} from "../types";

export interface SelectionSummaryRow {
  /** 1-based selection order */
  readonly step: number;
  readonly elementId: ElementId;
  readonly seed: string;
  readonly meanTargetValue: number;
  readonly coveredCount: number;
  readonly newlyCovered: readonly CellTypeId[];
  readonly matureSeq: string;
}

export interface SelectionSummary {
  readonly rows: readonly SelectionSummaryRow[];
  readonly coveredCount: number;
  readonly offTargetCount: number;
  /** Covered off-targets over all off-targets (0-1); 0 with no off-targets */
  readonly coveredFraction: number;
}

/**
 * Tabulate a selection, one row per step
 */
export function summarizeSelection(result: SelectionResult): SelectionSummary {
  const rows = result.steps.map((step, index) => ({
    step: index + 1,
    elementId: step.elementId,
    seed: step.seed,
    meanTargetValue: step.meanTargetValue,
    coveredCount: step.newlyCovered.length,
    newlyCovered: step.newlyCovered,
    matureSeq: step.matureSeq,
  }));

  const offTargetCount = result.allOffTargets.length;
  const coveredCount = offTargetCount - result.uncovered.length;

  return {
    rows,
    coveredCount,
    offTargetCount,
    coveredFraction: offTargetCount > 0 ? coveredCount / offTargetCount : 0,
  };
}

/**
 * Render a selection as a multi-line report
 *
 * @example
 * ```typescript
 * console.log(formatSelectionReport(result, params));
 * // Targets         : Liver
 * // Silent thresh   : < 10
 * // Cover thresh    : >= 1000
 * // Success         : true
 * // Elements        : 1
 * // Covered         : 2/2 (100.00%)
 * // Step 1          : miR-a (seed GGAAUGU, target mean 2.00) covers Heart, Kidney
 * ```
 */
export function formatSelectionReport(result: SelectionResult, params: SelectionParams): string {
  const summary = summarizeSelection(result);
  const percent = (summary.coveredFraction * 100).toFixed(2);

  const lines = [
    `Targets         : ${params.targets.join(", ")}`,
    `Silent thresh   : < ${params.targetThreshold}`,
    `Cover thresh    : >= ${params.coverThreshold}`,
    `Success         : ${result.success}`,
    `Elements        : ${result.selected.length}`,
    `Covered         : ${summary.coveredCount}/${summary.offTargetCount} (${percent}%)`,
  ];

  if (result.uncovered.length > 0) {
    lines.push(`Uncovered       : ${result.uncovered.join(", ")}`);
  }

  for (const row of summary.rows) {
    const seed = row.seed === "" ? "?" : row.seed;
    lines.push(
      `${`Step ${row.step}`.padEnd(16)}: ${row.elementId} (seed ${seed}, target mean ${row.meanTargetValue.toFixed(2)}) covers ${row.newlyCovered.join(", ")}`
    );
  }

  return lines.join("\n");
}

/**
 * Render a specificity ranking as a fixed-width table
 *
 * @example
 * ```typescript
 * console.log(formatSpecificityReport(ranked, 'Liver', 500));
 * // Cell type : Liver
 * // Threshold : 500
 * // Top 3 lowest-entropy elements:
 * // ...
 * ```
 */
export function formatSpecificityReport(
  ranked: readonly SpecificElement[],
  cellType: CellTypeId,
  threshold: number
): string {
  if (ranked.length === 0) {
    return `No elements found for cell type '${cellType}' with mean expression >= ${threshold}.`;
  }

  const lines = [
    `Cell type : ${cellType}`,
    `Threshold : ${threshold}`,
    `Top ${ranked.length} lowest-entropy elements:`,
    "",
    `${"Element".padEnd(22)} ${"Mature sequence".padEnd(28)} ${"Mean expr".padStart(12)} ${"Entropy (H)".padStart(12)}`,
    "-".repeat(76),
  ];

  for (const row of ranked) {
    lines.push(
      `${row.elementId.padEnd(22)} ${row.matureSeq.padEnd(28)} ${row.meanExpr.toFixed(2).padStart(12)} ${row.entropy.toFixed(4).padStart(12)}`
    );
  }

  return lines.join("\n");
}

/**
 * Human-readable name of a region type
 */
export function regionLabel(regionType: RegionType): string {
  switch (regionType) {
    case "utr5":
      return "5' UTR";
    case "cds":
      return "CDS";
    case "terminator":
      return "Stop codon";
    case "lead-in":
      return "Lead-in";
    case "site":
      return "Binding site";
    case "spacer":
      return "Spacer";
    case "lead-out":
      return "Lead-out";
    case "poly-a-signal":
      return "Poly-A signal";
    default: {
      const unhandled: never = regionType;
      throw new Error(`Unhandled region type: ${String(unhandled)}`);
    }
  }
}

function describeRegion(region: Region): string {
  const label = regionLabel(region.type);
  return region.type === "site" ? `${label} #${region.elementIndex} ${region.elementId}` : label;
}

/**
 * Linear map of an assembly, one tab-separated `start end label` line per region
 *
 * @example
 * ```typescript
 * formatRegionMap(assembly).split('\n')[0]; // '0\t3\tStop codon'
 * ```
 */
export function formatRegionMap(assembly: AssemblyResult): string {
  return assembly.regions
    .map((region) => `${region.start}\t${region.end}\t${describeRegion(region)}`)
    .join("\n");
}
