/**
 * Designing a sponge end to end
 *
 * Parses a small expression dataset, picks a panel that is silent in the
 * cell type to protect, builds the sponge and previews its structure.
 */

import {
  designSponge,
  foldRegions,
  formatRegionMap,
  formatSelectionReport,
  formatSpecificityReport,
  offTargetsFor,
  parseExpressionDataset,
  rankSpecificElements,
  structureStats,
} from "../src";
import type { SelectionParams } from "../src/types";

// ============================================================================
// Example 1: Selecting a panel
// ============================================================================

const dataset = parseExpressionDataset(
  JSON.stringify({
    cell_types: ["Hepatocyte", "Cardiomyocyte", "Neuron"],
    mirnas: ["miR-one", "miR-two", "miR-three"],
    mean_matrix: {
      "miR-one": { Hepatocyte: 3, Cardiomyocyte: 2400 },
      "miR-two": { Hepatocyte: 1, Neuron: 1800 },
      "miR-three": { Hepatocyte: 900, Cardiomyocyte: 5000, Neuron: 5000 },
    },
    mir_to_seed: { "miR-one": "GGAAUGU", "miR-two": "AGCUUAG", "miR-three": "CCAUGAC" },
    mature_seqs: {
      "miR-one": "UGGAAUGUAAAGAAGUAUGUAU",
      "miR-two": "UAGCUUAGCAGGCAUCGAAUCA",
      "miR-three": "ACCAUGACGUAGCUAGCAUGCU",
    },
  })
);

const params: SelectionParams = {
  targets: ["Hepatocyte"],
  offTargets: offTargetsFor(dataset.cellTypes, ["Hepatocyte"]),
  targetThreshold: 10,
  coverThreshold: 1000,
  maxElements: 5,
};

const { selection, assembly } = designSponge(dataset, params, { numSites: 8 });

console.log("\n=== Example 1: Panel selection ===\n");
console.log(formatSelectionReport(selection, params));

// ============================================================================
// Example 2: Cassette layout and structure preview
// ============================================================================

console.log("\n=== Example 2: Cassette layout ===\n");
console.log(formatRegionMap(assembly));

const preview = foldRegions(assembly);
const stats = structureStats(preview.fold, preview.sequence);

console.log(`\nCassette (${stats.length} nt, ${stats.gcContent.toFixed(1)}% GC):`);
console.log(preview.sequence);
console.log(preview.fold.dotBracket);
console.log(`${stats.pairCount} pairs, ${(stats.pairedFraction * 100).toFixed(1)}% paired`);

// ============================================================================
// Example 3: Most cell-type-specific miRNAs
// ============================================================================

console.log("\n=== Example 3: Specificity ranking ===\n");
const ranked = rankSpecificElements(dataset, "Cardiomyocyte", { threshold: 1000, topN: 3 });
console.log(formatSpecificityReport(ranked, "Cardiomyocyte", 1000));
