/**
 * End-to-end sponge design: select a panel, synthesize its sites, assemble
 *
 * @module operations/design
 */

import type {
  AssemblyOptions,
  AssemblyResult,
  ExpressionDataset,
  SelectionParams,
  SelectionResult,
} from "../types";
import { assembleCassette, resolveAssemblyOptions } from "./assemble";
import { selectElements } from "./select";
import { synthesizeSites } from "./synthesize";

export interface SpongeDesign {
  readonly selection: SelectionResult;
  /** Empty assembly when nothing was selected */
  readonly assembly: AssemblyResult;
}

/**
 * Run selection on a dataset and build the sponge from the selected panel
 *
 * A partial panel (`selection.success === false`) is still assembled so the
 * caller can inspect what was achievable.
 *
 * @example
 * ```typescript
 * const dataset = await loadExpressionDataset('mirna_data.json');
 * const { selection, assembly } = designSponge(dataset, {
 *   targets: ['Hepatocyte'],
 *   offTargets: offTargetsFor(dataset.cellTypes, ['Hepatocyte']),
 *   targetThreshold: 10,
 *   coverThreshold: 1000,
 *   maxElements: 5,
 * }, { numSites: 12 });
 * ```
 *
 * @throws {ValidationError} When selection or assembly options are invalid
 * @throws {SequenceError} When a selected element's mature sequence is unusable
 */
export function designSponge(
  dataset: ExpressionDataset,
  params: SelectionParams,
  options: AssemblyOptions = {}
): SpongeDesign {
  const { numSites, leadingContext } = resolveAssemblyOptions(options);
  const selection = selectElements(dataset.matrix, dataset.catalog, params);

  const sites = synthesizeSites(
    selection.steps.map((step) => ({ elementId: step.elementId, matureSeq: step.matureSeq }))
  );

  return {
    selection,
    assembly: assembleCassette(sites, numSites, leadingContext),
  };
}
