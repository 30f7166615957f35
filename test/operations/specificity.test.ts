/**
 * Tests for cell-type specificity ranking
 */

import { describe, expect, test } from "vitest";
import { ValidationError } from "../../src/errors";
import { formatSpecificityReport } from "../../src/operations/report";
import {
  listCellTypes,
  rankSpecificElements,
  shannonEntropy,
} from "../../src/operations/specificity";
import type { ExpressionDataset } from "../../src/types";

const dataset: ExpressionDataset = {
  cellTypes: ["Liver", "Heart", "Kidney", "Brain"],
  matrix: {
    "m-four": { Liver: 50, Heart: 50, Kidney: 50, Brain: 50 },
    "m-two": { Liver: 600, Heart: 600 },
    "m-spec": { Liver: 800 },
    "m-low": { Liver: 5, Heart: 5 },
    "m-absent": { Heart: 900 },
    "m-zero": {},
  },
  catalog: {
    elements: ["m-four", "m-two", "m-spec", "m-low", "m-absent", "m-zero"],
    seeds: {},
    matureSeqs: { "m-spec": "UGGAAUGUAAAGAAGUAUGUAU" },
  },
};

describe("shannonEntropy", () => {
  test("is zero for a single expressed cell type", () => {
    expect(shannonEntropy([800, 0, 0, 0])).toBe(0);
  });

  test("is log2 of the count for a flat profile", () => {
    expect(shannonEntropy([600, 600])).toBe(1);
    expect(shannonEntropy([50, 50, 50, 50])).toBe(2);
  });

  test("weights uneven profiles", () => {
    expect(shannonEntropy([1, 3])).toBeCloseTo(0.811278, 6);
  });

  test("is zero for an empty or all-zero profile", () => {
    expect(shannonEntropy([])).toBe(0);
    expect(shannonEntropy([0, 0])).toBe(0);
  });
});

describe("listCellTypes", () => {
  test("sorts the dataset's cell types", () => {
    expect(listCellTypes(dataset)).toEqual(["Brain", "Heart", "Kidney", "Liver"]);
  });
});

describe("rankSpecificElements", () => {
  test("orders by entropy ascending, catalog order on ties", () => {
    const ranked = rankSpecificElements(dataset, "Liver");

    expect(ranked.map((row) => [row.elementId, row.entropy])).toEqual([
      ["m-spec", 0],
      ["m-absent", 0],
      ["m-two", 1],
      ["m-low", 1],
      ["m-four", 2],
    ]);
  });

  test("reports expression in the chosen cell type and the mature sequence", () => {
    const ranked = rankSpecificElements(dataset, "Liver", { threshold: 100 });

    expect(ranked).toEqual([
      { elementId: "m-spec", matureSeq: "UGGAAUGUAAAGAAGUAUGUAU", meanExpr: 800, entropy: 0 },
      { elementId: "m-two", matureSeq: "", meanExpr: 600, entropy: 1 },
    ]);
  });

  test("the threshold is inclusive", () => {
    const ranked = rankSpecificElements(dataset, "Liver", { threshold: 600 });

    expect(ranked.map((row) => row.elementId)).toEqual(["m-spec", "m-two"]);
  });

  test("topN truncates the ranking", () => {
    expect(rankSpecificElements(dataset, "Liver", { topN: 1 }).map((row) => row.elementId)).toEqual(
      ["m-spec"]
    );
    expect(rankSpecificElements(dataset, "Liver", { topN: 0 })).toEqual([]);
  });

  test("nothing above the threshold gives an empty ranking", () => {
    expect(rankSpecificElements(dataset, "Liver", { threshold: 10_000 })).toEqual([]);
  });

  test("elements silent everywhere are never reported", () => {
    const ranked = rankSpecificElements(dataset, "Kidney");

    expect(ranked.map((row) => row.elementId)).not.toContain("m-zero");
  });

  test("rejects an unknown cell type and lists the available ones", () => {
    expect(() => rankSpecificElements(dataset, "Spleen")).toThrow(
      "Cell type 'Spleen' not found. Available cell types: Brain, Heart, Kidney, Liver"
    );
  });

  test("rejects a fractional topN", () => {
    expect(() => rankSpecificElements(dataset, "Liver", { topN: 1.5 })).toThrow(ValidationError);
  });
});

describe("formatSpecificityReport", () => {
  test("renders a fixed-width table", () => {
    const ranked = rankSpecificElements(dataset, "Liver", { threshold: 100 });

    expect(formatSpecificityReport(ranked, "Liver", 100).split("\n")).toEqual([
      "Cell type : Liver",
      "Threshold : 100",
      "Top 2 lowest-entropy elements:",
      "",
      "Element                Mature sequence                 Mean expr  Entropy (H)",
      "-".repeat(76),
      "m-spec                 UGGAAUGUAAAGAAGUAUGUAU             800.00       0.0000",
      "m-two                                                     600.00       1.0000",
    ]);
  });

  test("says so when nothing qualifies", () => {
    expect(formatSpecificityReport([], "Liver", 10_000)).toBe(
      "No elements found for cell type 'Liver' with mean expression >= 10000."
    );
  });
});
