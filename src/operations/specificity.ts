/**
 * Cell-type specificity ranking
 *
 * Lists the elements expressed in one cell type, most specific first, where
 * specificity is the Shannon entropy of an element's mean expression across
 * all cell types of the dataset.
 *
 * @module operations/specificity
 */

import { type } from "arktype";
import { ValidationError } from "../errors";
import type {
  CellTypeId,
  ExpressionDataset,
  SpecificElement,
  SpecificityOptions,
} from "../types";
import { SpecificityOptionsSchema } from "../types";
import { ownValue } from "./core/records";
import { expressionOf } from "./select";

export const DEFAULT_SPECIFICITY_OPTIONS: Readonly<Required<SpecificityOptions>> = Object.freeze({
  threshold: 0,
  topN: 10,
});

/**
 * Shannon entropy in bits of a non-negative profile, normalised to sum 1
 *
 * Zero entries contribute nothing; an all-zero profile has entropy 0.
 *
 * @example
 * ```typescript
 * shannonEntropy([5, 0, 0]); // 0
 * shannonEntropy([1, 1]);    // 1
 * ```
 */
export function shannonEntropy(values: readonly number[]): number {
  let total = 0;
  for (const value of values) {
    total += value;
  }
  if (total <= 0) return 0;

  let entropy = 0;
  for (const value of values) {
    if (value <= 0) continue;
    const p = value / total;
    entropy -= p * Math.log2(p);
  }
  return entropy;
}

/**
 * Cell types of a dataset in sorted order
 */
export function listCellTypes(dataset: ExpressionDataset): CellTypeId[] {
  return [...new Set(dataset.cellTypes)].sort();
}

/**
 * Rank the elements expressed in `cellType` by specificity
 *
 * Keeps elements whose mean expression in `cellType` is at least
 * `threshold`, orders them by entropy ascending (catalog order on ties) and
 * returns the first `topN`. Elements with no expression anywhere are never
 * reported.
 *
 * @example
 * ```typescript
 * const ranked = rankSpecificElements(dataset, 'Hepatocyte', { threshold: 500, topN: 5 });
 * ranked[0]?.entropy; // lowest entropy among the kept elements
 * ```
 *
 * @throws {ValidationError} When `cellType` is not in the dataset or the
 * options are invalid
 */
export function rankSpecificElements(
  dataset: ExpressionDataset,
  cellType: CellTypeId,
  options: SpecificityOptions = {}
): SpecificElement[] {
  const merged = { ...DEFAULT_SPECIFICITY_OPTIONS, ...options };
  const validation = SpecificityOptionsSchema(merged);
  if (validation instanceof type.errors) {
    throw new ValidationError(`Invalid specificity options: ${validation.summary}`);
  }

  const cellTypes = listCellTypes(dataset);
  if (!cellTypes.includes(cellType)) {
    throw new ValidationError(
      `Cell type '${cellType}' not found. Available cell types: ${cellTypes.join(", ")}`
    );
  }

  const ranked: SpecificElement[] = [];
  for (const elementId of new Set(dataset.catalog.elements)) {
    const profile = cellTypes.map((column) => expressionOf(dataset.matrix, elementId, column));
    if (profile.every((value) => value === 0)) continue;

    const meanExpr = expressionOf(dataset.matrix, elementId, cellType);
    if (meanExpr < merged.threshold) continue;

    ranked.push({
      elementId,
      matureSeq: ownValue(dataset.catalog.matureSeqs, elementId) ?? "",
      meanExpr,
      entropy: shannonEntropy(profile),
    });
  }

  return ranked.sort((a, b) => a.entropy - b.entropy).slice(0, merged.topN);
}
