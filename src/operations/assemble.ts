/**
 * Sponge cassette assembly
 *
 * Lays out stop codon, lead-in, repeated binding sites with spacers,
 * lead-out and poly-A signal into one sequence, recording every region's
 * half-open offsets as it goes.
 *
 * @module operations/assemble
 */

import { type } from "arktype";
import { ValidationError } from "../errors";
import type {
  AssemblyOptions,
  AssemblyResult,
  BindingSite,
  ContextRegionType,
  FixedRegion,
  LeadingContext,
  Region,
} from "../types";
import { AssemblyOptionsSchema } from "../types";
import { LEAD_IN, LEAD_OUT, POLY_A_SIGNAL, SPACERS, STOP_CODON } from "./core/cassette-parts";
import { toRNA } from "./core/sequence-manipulation";

export const DEFAULT_NUM_SITES = 16;

export const DEFAULT_ASSEMBLY_OPTIONS: Readonly<Required<Omit<AssemblyOptions, "leadingContext">>> =
  Object.freeze({
    numSites: DEFAULT_NUM_SITES,
  });

export interface ResolvedAssemblyOptions {
  readonly numSites: number;
  readonly leadingContext: LeadingContext;
}

function emptyAssembly(): AssemblyResult {
  return {
    fullSequence: "",
    threePrimeUtr: "",
    cassette: "",
    sites: [],
    regions: [],
    numSites: 0,
  };
}

/**
 * Merge user options with defaults and validate the result
 *
 * @throws {ValidationError} When `numSites` is not an integer >= 1
 */
export function resolveAssemblyOptions(options: AssemblyOptions = {}): ResolvedAssemblyOptions {
  const merged = {
    numSites: options.numSites ?? DEFAULT_ASSEMBLY_OPTIONS.numSites,
    leadingContext: options.leadingContext ?? {},
  };

  const result = AssemblyOptionsSchema(merged);
  if (result instanceof type.errors) {
    throw new ValidationError(`Invalid assembly options: ${result.summary}`);
  }

  return merged;
}

/**
 * Accumulates regions behind a running cursor so offsets always tile
 */
class RegionLayout {
  private readonly regions: Region[] = [];
  private cursor = 0;

  add(regionType: FixedRegion["type"], seq: string): void {
    this.regions.push({ type: regionType, start: this.cursor, end: this.cursor + seq.length, seq });
    this.cursor += seq.length;
  }

  addSite(site: BindingSite, elementIndex: number): void {
    const seq = site.siteSeq;
    this.regions.push({
      type: "site",
      start: this.cursor,
      end: this.cursor + seq.length,
      seq,
      elementId: site.elementId,
      elementIndex,
    });
    this.cursor += seq.length;
  }

  toArray(): Region[] {
    return [...this.regions];
  }
}

/**
 * Normalise pass-through context: RNA alphabet, lower case
 *
 * Lower case keeps context visually distinct from the upper-case designed
 * binding sites; it carries no biological meaning.
 */
function normalizeContext(seq: string | undefined): string {
  return toRNA((seq ?? "").toLowerCase());
}

/**
 * Assemble binding sites into a complete sponge 3'UTR
 *
 * Sites are used cyclically when `numSites` exceeds the number of distinct
 * sites, and spacer `i % 16` follows site `i` except after the last one.
 *
 * @example
 * ```typescript
 * const sites = synthesizeSites([{ elementId: 'miR-a', matureSeq: 'UGGAAUGUAAAGAAGUAUGUAU' }]);
 * const assembly = assembleCassette(sites, 3);
 * assembly.regions.filter((r) => r.type === 'site').length; // 3
 * ```
 *
 * @param sites - Distinct sites in cassette order
 * @param numSites - Total site repeats (default 16)
 * @param leadingContext - Optional 5'UTR and CDS placed before the stop codon
 *
 * @throws {ValidationError} When `numSites` is not an integer >= 1
 */
export function assembleCassette(
  sites: readonly BindingSite[],
  numSites: number = DEFAULT_NUM_SITES,
  leadingContext: LeadingContext = {}
): AssemblyResult {
  if (sites.length === 0) {
    return emptyAssembly();
  }

  resolveAssemblyOptions({ numSites, leadingContext });

  const layout = new RegionLayout();
  let contextLength = 0;

  const contextParts: [ContextRegionType, string][] = [
    ["utr5", normalizeContext(leadingContext.utr5)],
    ["cds", normalizeContext(leadingContext.cds)],
  ];
  for (const [regionType, seq] of contextParts) {
    if (seq.length > 0) {
      layout.add(regionType, seq);
      contextLength += seq.length;
    }
  }

  layout.add("terminator", STOP_CODON);
  layout.add("lead-in", LEAD_IN);

  for (let i = 0; i < numSites; i++) {
    const elementIndex = i % sites.length;
    const site = sites[elementIndex];
    if (site === undefined) continue;

    layout.addSite(site, elementIndex);

    if (i < numSites - 1) {
      layout.add("spacer", SPACERS[i % SPACERS.length] ?? "");
    }
  }

  layout.add("lead-out", LEAD_OUT);
  layout.add("poly-a-signal", POLY_A_SIGNAL);

  const regions = layout.toArray();
  const fullSequence = regions.map((region) => region.seq).join("");
  const cassette = regions
    .filter((region) => region.type === "site" || region.type === "spacer")
    .map((region) => region.seq)
    .join("");

  return {
    fullSequence,
    threePrimeUtr: fullSequence.slice(contextLength),
    cassette,
    sites: [...sites],
    regions,
    numSites,
  };
}
