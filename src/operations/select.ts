/**
 * Greedy miRNA panel selection
 *
 * Picks a small panel of elements that are silent in every protected cell
 * type yet, taken together, expressed in every suppressed cell type. This is
 * the classical greedy approximation for maximum coverage: each round takes
 * the candidate covering the most still-uncovered off-targets.
 *
 * @module operations/select
 */

import { type } from "arktype";
import { ValidationError } from "../errors";
import type {
  CellTypeId,
  ElementCatalog,
  ElementId,
  ExpressionMatrix,
  SelectionParams,
  SelectionResult,
  SelectionStep,
} from "../types";
import { SelectionParamsSchema } from "../types";
import { mean } from "./core/calculations";
import { ownValue } from "./core/records";

/**
 * Defaults used by the original command-line workflow
 */
export const DEFAULT_SELECTION_PARAMS = Object.freeze({
  targetThreshold: 10,
  coverThreshold: 1000,
  maxElements: 20,
} as const);

/**
 * Validate selection parameters against the schema
 *
 * @throws {ValidationError} When a threshold is negative or not finite, or
 * `maxElements` is not an integer >= 1
 */
export function validateSelectionParams(params: SelectionParams): SelectionParams {
  const result = SelectionParamsSchema(params);

  if (result instanceof type.errors) {
    throw new ValidationError(`Invalid selection parameters: ${result.summary}`);
  }

  return params;
}

/**
 * Read one matrix cell, treating absent entries as 0
 */
export function expressionOf(
  matrix: ExpressionMatrix,
  elementId: ElementId,
  cellType: CellTypeId
): number {
  return ownValue(ownValue(matrix, elementId), cellType) ?? 0;
}

/**
 * Every cell type in `cellTypes` that is not a target, in dataset order
 *
 * @example
 * ```typescript
 * offTargetsFor(['Heart', 'Kidney', 'Liver'], ['Liver']); // ['Heart', 'Kidney']
 * ```
 */
export function offTargetsFor(
  cellTypes: readonly CellTypeId[],
  targets: readonly CellTypeId[]
): CellTypeId[] {
  const protectedTypes = new Set(targets);
  return uniqueInOrder(cellTypes).filter((cellType) => !protectedTypes.has(cellType));
}

/**
 * Select a panel of elements covering the off-targets
 *
 * Candidates are scanned in catalog order and ties go to the first one
 * found, so identical inputs always give identical panels. The loop stops
 * when every off-target is covered, when `maxElements` is reached, or when
 * no remaining candidate covers anything new. Callers must read `success`
 * and `uncovered` to know whether the design goal was met.
 *
 * @example
 * ```typescript
 * const result = selectElements(matrix, catalog, {
 *   targets: ['Liver'],
 *   offTargets: ['Heart', 'Kidney'],
 *   targetThreshold: 10,
 *   coverThreshold: 1000,
 *   maxElements: 5,
 * });
 * if (!result.success) console.log(`Still uncovered: ${result.uncovered.join(', ')}`);
 * ```
 *
 * @throws {ValidationError} When `params` fail schema validation
 */
export function selectElements(
  matrix: ExpressionMatrix,
  catalog: ElementCatalog,
  params: SelectionParams
): SelectionResult {
  validateSelectionParams(params);

  const targets = uniqueInOrder(params.targets);
  const offTargets = uniqueInOrder(params.offTargets);

  if (targets.length === 0 || offTargets.length === 0) {
    return {
      success: false,
      selected: [],
      steps: [],
      uncovered: [...offTargets],
      allOffTargets: [...offTargets],
    };
  }

  const candidates = uniqueInOrder(catalog.elements).filter((elementId) =>
    targets.every((target) => expressionOf(matrix, elementId, target) < params.targetThreshold)
  );

  const coverage = new Map<ElementId, readonly CellTypeId[]>();
  for (const elementId of candidates) {
    coverage.set(
      elementId,
      offTargets.filter(
        (offTarget) => expressionOf(matrix, elementId, offTarget) >= params.coverThreshold
      )
    );
  }

  const uncovered = new Set(offTargets);
  const selected: ElementId[] = [];
  const chosen = new Set<ElementId>();
  const steps: SelectionStep[] = [];

  while (uncovered.size > 0 && selected.length < params.maxElements) {
    let best: ElementId | undefined;
    let bestNewCover: CellTypeId[] = [];

    for (const elementId of candidates) {
      if (chosen.has(elementId)) continue;

      const newCover = (coverage.get(elementId) ?? []).filter((cellType) =>
        uncovered.has(cellType)
      );
      // Strictly greater: the first candidate wins a tie
      if (newCover.length > bestNewCover.length) {
        best = elementId;
        bestNewCover = newCover;
      }
    }

    if (best === undefined || bestNewCover.length === 0) break;

    const elementId = best;
    steps.push({
      elementId,
      seed: ownValue(catalog.seeds, elementId) ?? "",
      matureSeq: ownValue(catalog.matureSeqs, elementId) ?? "",
      meanTargetValue: mean(targets.map((target) => expressionOf(matrix, elementId, target))),
      newlyCovered: bestNewCover,
    });
    selected.push(elementId);
    chosen.add(elementId);
    for (const cellType of bestNewCover) {
      uncovered.delete(cellType);
    }
  }

  const remaining = offTargets.filter((cellType) => uncovered.has(cellType));

  return {
    success: remaining.length === 0,
    selected,
    steps,
    uncovered: remaining,
    allOffTargets: [...offTargets],
  };
}

function uniqueInOrder<T>(values: readonly T[]): T[] {
  return [...new Set(values)];
}
