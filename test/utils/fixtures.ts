/**
 * Shared fixture access for tests
 */

import { readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";
import type { ElementCatalog, ExpressionMatrix } from "../../src/types";

export const SMALL_DATASET_PATH = fileURLToPath(
  new URL("../fixtures/expression-small.json", import.meta.url)
);

export function readSmallDataset(): string {
  return readFileSync(SMALL_DATASET_PATH, "utf8");
}

/**
 * Catalog over the given ids with placeholder seeds and sequences
 */
export function catalogOf(elements: string[]): ElementCatalog {
  const seeds: Record<string, string> = {};
  const matureSeqs: Record<string, string> = {};
  for (const id of elements) {
    seeds[id] = "GGAAUGU";
    matureSeqs[id] = "ACGUUAGCAGCUAGGCAUUCGA";
  }
  return { elements, seeds, matureSeqs };
}

/**
 * Deterministic pseudo-random generator (mulberry32) for property-style tests
 */
export function seededRandom(seed: number): () => number {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

/**
 * Random sparse matrix over the given elements and cell types
 */
export function randomMatrix(
  random: () => number,
  elements: string[],
  cellTypes: string[]
): ExpressionMatrix {
  const matrix: Record<string, Record<string, number>> = {};
  for (const element of elements) {
    const row: Record<string, number> = {};
    for (const cellType of cellTypes) {
      const roll = random();
      if (roll < 0.3) continue;
      row[cellType] = Math.floor(random() * 3000);
    }
    matrix[element] = row;
  }
  return matrix;
}
