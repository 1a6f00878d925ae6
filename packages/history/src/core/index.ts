export * from "./model.js";
export {
  DEFAULT_PAIR_COUNT,
  STRUCTURAL_MIN_SYMBOLS,
  pairKey,
  couplingStrength,
  loadStructuralPairs,
  commitCounts,
  temporalCouplingPairs,
  type PairOptions,
} from "./coupling.js";
export {
  DEFAULT_SET_COUNT,
  DEFAULT_MIN_OCCURRENCES,
  MIN_CHANGE_SET_SIZE,
  recurringChangeSets,
  type ChangeSetOptions,
} from "./changeSets.js";
export {
  DEFAULT_TOP_PARTNERS,
  DEFAULT_MIN_COCHANGES,
  DEFAULT_MIN_STRENGTH,
  resolveChangedPaths,
  againstChangeSet,
  type AgainstOptions,
  type ResolvedPaths,
} from "./against.js";
export { CouplingService } from "./CouplingService.js";
