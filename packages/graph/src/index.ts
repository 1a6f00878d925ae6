// Model
export * from "./model.js";

// Graph
export { DirectedGraph, type GraphEdge } from "./DirectedGraph.js";
export {
  buildGraph,
  dedupeEdgesByPriority,
  DEFAULT_KIND_PRIORITY,
  type BuildGraphOptions,
  type SymbolGraph,
} from "./builder.js";

// Analyses
export {
  stronglyConnectedComponents,
  findCycles,
  condensation,
  condense,
  findWeakestEdge,
  describeCycles,
  namePrefix,
} from "./cycles.js";
export { detectLayers, findViolations, deepestChain, summarizeLayers } from "./layers.js";
export {
  blastRadius,
  affectedTests,
  entryPointsReaching,
  shortestPath,
  DEPENDENCY_EDGE_KINDS,
  DEFAULT_MAX_HOPS,
  DEFAULT_ENTRY_POINT_LIMIT,
  ENTRY_POINT_CANDIDATE_POOL,
  type AffectedTestsOptions,
  type EntryPointOptions,
} from "./traversal.js";
export {
  selectEntryPoints,
  resolveGates,
  findCoverageGaps,
  compilePattern,
  GATE_EDGE_KINDS,
  type EntryPointFilter,
  type GateFilter,
  type CoverageOptions,
  type PatternError,
} from "./coverage.js";
export { isTestFile } from "./testFiles.js";
export { resolveSymbol, type ResolutionError, type SymbolCandidate } from "./resolve.js";

// Service
export {
  GraphService,
  type ClusterReport,
  type CycleAnalysis,
  type CoverageQuery,
  type LayerAnalysis,
  type NamedViolation,
  type PathAnalysis,
  type SymbolAnalysis,
} from "./infrastructure/GraphService.js";

// Tools
export { registerAllTools, type Services } from "./tools/index.js";
