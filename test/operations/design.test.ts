/**
 * Tests for end-to-end sponge design
 */

import { afterEach, beforeEach, describe, expect, test, vi } from "vitest";
import { SequenceError, ValidationError } from "../../src/errors";
import { parseExpressionDataset } from "../../src/formats/json";
import { designSponge } from "../../src/operations/design";
import { offTargetsFor } from "../../src/operations/select";
import type { ExpressionDataset, SelectionParams } from "../../src/types";
import { readSmallDataset } from "../utils/fixtures";

describe("designSponge", () => {
  let dataset: ExpressionDataset;

  beforeEach(() => {
    vi.spyOn(console, "warn").mockImplementation(() => undefined);
    dataset = parseExpressionDataset(readSmallDataset());
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  function paramsFor(targets: string[]): SelectionParams {
    return {
      targets,
      offTargets: offTargetsFor(dataset.cellTypes, targets),
      targetThreshold: 10,
      coverThreshold: 1000,
      maxElements: 5,
    };
  }

  test("builds a sponge from the selected panel", () => {
    const { selection, assembly } = designSponge(dataset, paramsFor(["Liver"]), { numSites: 4 });

    expect(selection.success).toBe(true);
    expect(selection.selected).toEqual(["miR-a", "miR-d"]);
    expect(assembly.sites.map((site) => site.elementId)).toEqual(["miR-a", "miR-d"]);
    expect(assembly.sites[0]?.siteSeq).toBe("UCGAAUGCCUCUAGGCUAACGU");
    expect(
      assembly.regions.flatMap((region) => (region.type === "site" ? [region.elementId] : []))
    ).toEqual(["miR-a", "miR-d", "miR-a", "miR-d"]);
    expect(assembly.fullSequence.length).toBe(9 + 4 * 22 + 3 * 4 + 4 + 263);
  });

  test("uses sixteen repeats by default", () => {
    const { assembly } = designSponge(dataset, paramsFor(["Liver"]));

    expect(assembly.numSites).toBe(16);
  });

  test("passes leading context through", () => {
    const { assembly } = designSponge(dataset, paramsFor(["Liver"]), {
      numSites: 1,
      leadingContext: { cds: "AUGUAG" },
    });

    expect(assembly.regions[0]).toEqual({ type: "cds", start: 0, end: 6, seq: "auguag" });
    expect(assembly.threePrimeUtr.length).toBe(assembly.fullSequence.length - 6);
  });

  test("an empty selection yields an empty assembly", () => {
    const { selection, assembly } = designSponge(dataset, {
      ...paramsFor(["Liver"]),
      coverThreshold: 1_000_000,
    });

    expect(selection.selected).toEqual([]);
    expect(assembly.fullSequence).toBe("");
    expect(assembly.regions).toEqual([]);
  });

  test("a selected element without a mature sequence is an error", () => {
    expect(() => designSponge(dataset, paramsFor(["Kidney"]))).toThrow(SequenceError);
  });

  test("invalid assembly options fail before selection", () => {
    expect(() => designSponge(dataset, paramsFor(["Liver"]), { numSites: 0 })).toThrow(
      ValidationError
    );
  });
});
