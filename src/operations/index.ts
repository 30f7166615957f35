/**
 * Sponge design operations
 */

export {
  assembleCassette,
  DEFAULT_ASSEMBLY_OPTIONS,
  DEFAULT_NUM_SITES,
  type ResolvedAssemblyOptions,
  resolveAssemblyOptions,
} from "./assemble";
export { designSponge, type SpongeDesign } from "./design";
export {
  foldRegions,
  foldStructure,
  MIN_FOLD_LENGTH,
  MIN_LOOP_LENGTH,
  parseDotBracket,
  type RegionFold,
  type StructureStats,
  structureStats,
  toDotBracket,
} from "./fold";
export {
  formatRegionMap,
  formatSelectionReport,
  formatSpecificityReport,
  regionLabel,
  type SelectionSummary,
  type SelectionSummaryRow,
  summarizeSelection,
} from "./report";
export {
  DEFAULT_SELECTION_PARAMS,
  expressionOf,
  offTargetsFor,
  selectElements,
  validateSelectionParams,
} from "./select";
export {
  DEFAULT_SPECIFICITY_OPTIONS,
  listCellTypes,
  rankSpecificElements,
  shannonEntropy,
} from "./specificity";
export {
  BULGE_LENGTH,
  MIN_ELEMENT_LENGTH,
  SEED_MATCH_LENGTH,
  synthesizeSite,
  synthesizeSites,
} from "./synthesize";
