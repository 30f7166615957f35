/**
 * Maximum base-pairing structure estimate
 *
 * A Nussinov-style dynamic program: it maximises the number of non-crossing
 * Watson-Crick and G-U pairs subject to a minimum hairpin loop. It is a
 * preview for cassette-sized windows, not a free-energy model.
 *
 * Time O(n³), space O(n²).
 *
 * @module operations/fold
 */

import { ParseError } from "../errors";
import type { AssemblyResult, BasePair, FoldResult, RegionType } from "../types";
import { gcContent } from "./core/calculations";
import { canPair, normalizeRNA } from "./core/sequence-manipulation";

/** Paired positions must enclose more than this many bases */
export const MIN_LOOP_LENGTH = 3;

/** Shorter sequences are returned fully unpaired */
export const MIN_FOLD_LENGTH = 5;

/**
 * Best pair counts for every sub-range [i, j], stored row-major
 */
class PairingTable {
  private readonly cells: Int32Array;
  private readonly pairable: Uint8Array;

  constructor(private readonly sequence: string) {
    const n = sequence.length;
    this.cells = new Int32Array(n * n);
    this.pairable = new Uint8Array(n * n);

    for (let k = 0; k < n; k++) {
      for (let j = k + MIN_LOOP_LENGTH + 1; j < n; j++) {
        if (canPair(sequence.charAt(k), sequence.charAt(j))) {
          this.pairable[k * n + j] = 1;
        }
      }
    }
  }

  get length(): number {
    return this.sequence.length;
  }

  /** Best count for [i, j]; empty or inverted ranges score 0 */
  score(i: number, j: number): number {
    if (j <= i) return 0;
    return this.cells[i * this.length + j] ?? 0;
  }

  set(i: number, j: number, value: number): void {
    this.cells[i * this.length + j] = value;
  }

  canPair(k: number, j: number): boolean {
    return this.pairable[k * this.length + j] === 1;
  }

  /** Score of pairing k with j inside [i, j] */
  pairedScore(i: number, k: number, j: number): number {
    return this.score(i, k - 1) + 1 + this.score(k + 1, j - 1);
  }
}

function fillTable(sequence: string): PairingTable {
  const table = new PairingTable(sequence);
  const n = sequence.length;

  for (let span = MIN_LOOP_LENGTH + 1; span < n; span++) {
    for (let i = 0; i + span < n; i++) {
      const j = i + span;
      let best = table.score(i, j - 1);

      for (let k = i; k < j - MIN_LOOP_LENGTH; k++) {
        if (!table.canPair(k, j)) continue;
        const candidate = table.pairedScore(i, k, j);
        if (candidate > best) {
          best = candidate;
        }
      }

      table.set(i, j, best);
    }
  }

  return table;
}

/**
 * Recover one optimal pairing, preferring "j unpaired" on ties and then the
 * lowest k. Uses an explicit stack instead of recursion.
 */
function traceback(table: PairingTable): BasePair[] {
  const pairs: BasePair[] = [];
  const ranges: [number, number][] = [[0, table.length - 1]];

  while (ranges.length > 0) {
    const range = ranges.pop();
    if (range === undefined) break;
    const [i, j] = range;

    const total = table.score(i, j);
    if (total === 0) continue;

    if (total === table.score(i, j - 1)) {
      ranges.push([i, j - 1]);
      continue;
    }

    for (let k = i; k < j - MIN_LOOP_LENGTH; k++) {
      if (table.canPair(k, j) && table.pairedScore(i, k, j) === total) {
        pairs.push([k, j]);
        ranges.push([i, k - 1]);
        ranges.push([k + 1, j - 1]);
        break;
      }
    }
  }

  return pairs.sort((a, b) => a[0] - b[0]);
}

/**
 * Render pairs as a dot-bracket string of the given length
 */
export function toDotBracket(length: number, pairs: readonly BasePair[]): string {
  const symbols: string[] = new Array<string>(length).fill(".");
  for (const [i, j] of pairs) {
    symbols[i] = "(";
    symbols[j] = ")";
  }
  return symbols.join("");
}

/**
 * Estimate the maximum-pairing secondary structure of a sequence
 *
 * Case-insensitive; "T" is read as "U". Characters outside A/C/G/U never pair.
 *
 * @example
 * ```typescript
 * foldStructure('GGAAACC').dotBracket; // '((...))'
 * foldStructure('AAAAAAAA').pairs;     // []
 * ```
 */
export function foldStructure(sequence: string): FoldResult {
  const normalized = normalizeRNA(sequence);
  const n = normalized.length;

  if (n < MIN_FOLD_LENGTH) {
    return { pairs: [], dotBracket: ".".repeat(n) };
  }

  const pairs = traceback(fillTable(normalized));
  return { pairs, dotBracket: toDotBracket(n, pairs) };
}

/**
 * Recover base pairs from a dot-bracket string
 *
 * @throws {ParseError} On unbalanced brackets or characters other than "(", ")" and "."
 */
export function parseDotBracket(dotBracket: string): BasePair[] {
  const open: number[] = [];
  const pairs: BasePair[] = [];

  for (let index = 0; index < dotBracket.length; index++) {
    const symbol = dotBracket.charAt(index);
    if (symbol === "(") {
      open.push(index);
    } else if (symbol === ")") {
      const partner = open.pop();
      if (partner === undefined) {
        throw new ParseError(`Unmatched ')' at position ${index}`, "dot-bracket", dotBracket);
      }
      pairs.push([partner, index]);
    } else if (symbol !== ".") {
      throw new ParseError(
        `Unexpected character '${symbol}' at position ${index}`,
        "dot-bracket",
        dotBracket
      );
    }
  }

  if (open.length > 0) {
    throw new ParseError(
      `${open.length} unmatched '(' (first at position ${open[0]})`,
      "dot-bracket",
      dotBracket
    );
  }

  return pairs.sort((a, b) => a[0] - b[0]);
}

export interface RegionFold {
  /** Offset of the folded window within `fullSequence` */
  readonly offset: number;
  readonly sequence: string;
  /** Pair indices are relative to the window */
  readonly fold: FoldResult;
}

/**
 * Fold the window spanning the first through last region of the given types
 *
 * The default window is the site + spacer cassette.
 */
export function foldRegions(
  assembly: AssemblyResult,
  types: readonly RegionType[] = ["site", "spacer"]
): RegionFold {
  const wanted = new Set(types);
  const matching = assembly.regions.filter((region) => wanted.has(region.type));
  const first = matching[0];
  const last = matching[matching.length - 1];

  if (first === undefined || last === undefined) {
    return { offset: 0, sequence: "", fold: { pairs: [], dotBracket: "" } };
  }

  const sequence = assembly.fullSequence.slice(first.start, last.end);
  return { offset: first.start, sequence, fold: foldStructure(sequence) };
}

export interface StructureStats {
  readonly length: number;
  readonly pairCount: number;
  /** Fraction of positions involved in a pair (0-1) */
  readonly pairedFraction: number;
  /** GC content percentage (0-100) */
  readonly gcContent: number;
}

/**
 * Summary figures shown alongside a structure preview
 */
export function structureStats(fold: FoldResult, sequence: string): StructureStats {
  const length = sequence.length;
  const pairCount = fold.pairs.length;

  return {
    length,
    pairCount,
    pairedFraction: length > 0 ? (2 * pairCount) / length : 0,
    gcContent: gcContent(sequence),
  };
}
