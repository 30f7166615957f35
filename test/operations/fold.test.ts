/**
 * Tests for the maximum-pairing structure estimate
 */

import { describe, expect, test } from "vitest";
import { ParseError } from "../../src/errors";
import { assembleCassette } from "../../src/operations/assemble";
import { canPair } from "../../src/operations/core/sequence-manipulation";
import {
  MIN_LOOP_LENGTH,
  foldRegions,
  foldStructure,
  parseDotBracket,
  structureStats,
  toDotBracket,
} from "../../src/operations/fold";
import { synthesizeSite } from "../../src/operations/synthesize";
import { seededRandom } from "../utils/fixtures";

/**
 * Maximum pair count by pairing the first base instead of the last, memoised
 */
function maxPairCount(sequence: string): number {
  const memo = new Map<string, number>();

  const best = (i: number, j: number): number => {
    if (j - i <= MIN_LOOP_LENGTH) return 0;
    const key = `${i}:${j}`;
    const cached = memo.get(key);
    if (cached !== undefined) return cached;

    let result = best(i + 1, j);
    for (let k = i + MIN_LOOP_LENGTH + 1; k <= j; k++) {
      if (canPair(sequence.charAt(i), sequence.charAt(k))) {
        result = Math.max(result, 1 + best(i + 1, k - 1) + best(k + 1, j));
      }
    }
    memo.set(key, result);
    return result;
  };

  return best(0, sequence.length - 1);
}

describe("foldStructure", () => {
  test.each([
    ["GAAAC", "(...)"],
    ["GAAAU", "(...)"],
    ["GGAAACC", "((...))"],
    ["ggaaauu", "((...))"],
    ["GGAAAC", "(....)"],
    ["GAAACC", "(...)."],
    ["GAAACGAAAC", "(...)(...)"],
    ["GGAAACCGGAAACC", "((...))((...))"],
    ["GGGAAACCCAGGGAAACCC", "(((...))).(((...)))"],
  ])("%s folds to %s", (sequence, expected) => {
    expect(foldStructure(sequence).dotBracket).toBe(expected);
  });

  test("hairpins need at least three unpaired bases", () => {
    expect(foldStructure("GAAC")).toEqual({ pairs: [], dotBracket: "...." });
    expect(foldStructure("GAACAA").dotBracket).toBe("......");
  });

  test("a homopolymer stays unpaired", () => {
    const result = foldStructure("A".repeat(20));

    expect(result.pairs).toEqual([]);
    expect(result.dotBracket).toBe(".".repeat(20));
  });

  test("unknown characters never pair", () => {
    expect(foldStructure("NNNNNNN").dotBracket).toBe(".......");
  });

  test("empty input gives an empty structure", () => {
    expect(foldStructure("")).toEqual({ pairs: [], dotBracket: "" });
  });

  test("reports pairs sorted by their 5' partner", () => {
    expect(foldStructure("GGAAACC").pairs).toEqual([
      [0, 6],
      [1, 5],
    ]);
  });

  describe("structural laws on generated sequences", () => {
    const random = seededRandom(2024);
    const bases = "ACGU";
    const sequences = Array.from({ length: 6 }, () =>
      Array.from({ length: 40 }, () => bases.charAt(Math.floor(random() * 4))).join("")
    );

    test.each(sequences)("%s", (sequence) => {
      const { pairs, dotBracket } = foldStructure(sequence);
      const used = new Set<number>();

      for (const [i, j] of pairs) {
        expect(j - i).toBeGreaterThan(MIN_LOOP_LENGTH);
        expect(canPair(sequence.charAt(i), sequence.charAt(j))).toBe(true);
        expect(used.has(i) || used.has(j)).toBe(false);
        used.add(i);
        used.add(j);
      }

      for (const [i, j] of pairs) {
        for (const [k, l] of pairs) {
          expect(i < k && k < j && j < l).toBe(false);
        }
      }

      expect(pairs.length).toBe(maxPairCount(sequence));
      expect(dotBracket.length).toBe(sequence.length);
      expect(parseDotBracket(dotBracket)).toEqual(pairs);
    });
  });
});

describe("toDotBracket", () => {
  test("marks each pair", () => {
    expect(toDotBracket(8, [[1, 6], [2, 5]])).toBe(".((..)).");
  });
});

describe("parseDotBracket", () => {
  test("recovers nested and adjacent pairs", () => {
    expect(parseDotBracket("((..)).()")).toEqual([
      [0, 5],
      [1, 4],
      [7, 8],
    ]);
  });

  test("rejects an unmatched closing bracket", () => {
    expect(() => parseDotBracket(").")).toThrow("Unmatched ')' at position 0");
  });

  test("rejects unclosed brackets", () => {
    expect(() => parseDotBracket("((.)")).toThrow(ParseError);
  });

  test("rejects unexpected characters", () => {
    try {
      parseDotBracket("(.x)");
      expect.unreachable("parseDotBracket should have thrown");
    } catch (error) {
      expect(error).toBeInstanceOf(ParseError);
      if (error instanceof ParseError) {
        expect(error.format).toBe("dot-bracket");
        expect(error.message).toBe("Unexpected character 'x' at position 2");
      }
    }
  });
});

describe("foldRegions", () => {
  const site = synthesizeSite("miR-short", "ACGUACGUACGUA");
  const assembly = assembleCassette([site], 2);

  test("folds the site and spacer window by default", () => {
    const window = foldRegions(assembly);

    expect(window.offset).toBe(9);
    expect(window.sequence).toBe(assembly.cassette);
    expect(window.fold).toEqual(foldStructure(assembly.cassette));
  });

  test("folds any chosen region span", () => {
    const window = foldRegions(assembly, ["lead-out"]);

    expect(window).toEqual({
      offset: 39,
      sequence: "gauc",
      fold: { pairs: [], dotBracket: "...." },
    });
  });

  test("returns an empty window when no region matches", () => {
    expect(foldRegions(assembly, ["utr5"])).toEqual({
      offset: 0,
      sequence: "",
      fold: { pairs: [], dotBracket: "" },
    });
  });
});

describe("structureStats", () => {
  test("summarises pairing and GC content", () => {
    const stats = structureStats(foldStructure("GGAAACC"), "GGAAACC");

    expect(stats.length).toBe(7);
    expect(stats.pairCount).toBe(2);
    expect(stats.pairedFraction).toBeCloseTo(4 / 7);
    expect(stats.gcContent).toBeCloseTo(400 / 7);
  });

  test("an empty sequence has zero fractions", () => {
    expect(structureStats(foldStructure(""), "")).toEqual({
      length: 0,
      pairCount: 0,
      pairedFraction: 0,
      gcContent: 0,
    });
  });
});
