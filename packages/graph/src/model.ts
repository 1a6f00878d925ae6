/**
 * Model for the in-memory symbol graph and the analyses run over it.
 */

import type { DirectedGraph } from "./DirectedGraph.js";

/**
 * Node attributes carried by the symbol graph.
 */
export interface SymbolNode {
  id: number;
  name: string;
  qualifiedName: string | null;
  kind: string;
  fileId: number;
  filePath: string;
  isExported: boolean;
  parentId: number | null;
  /** Start line (1-indexed, 0 if unknown) */
  line: number;
}

/**
 * A node of the condensation DAG: one strongly connected component.
 */
export interface CondensedNode {
  id: number;
  /** Member symbol ids, ascending */
  members: number[];
  memberCount: number;
  /** Most common name prefix among members */
  label: string;
}

export interface Condensation {
  dag: DirectedGraph<CondensedNode>;
  /** Condensation node id -> member symbol ids */
  mapping: Map<number, number[]>;
  /** Symbol id -> condensation node id */
  componentOf: Map<number, number>;
}

export interface WeakestEdge {
  source: number;
  target: number;
  reason: string;
}

export interface CycleSymbol {
  id: number;
  name: string;
  kind: string;
  filePath: string;
}

export interface CycleReport {
  symbols: CycleSymbol[];
  /** Distinct files, sorted */
  files: string[];
  size: number;
  weakestEdge: WeakestEdge | null;
}

export interface LayerViolation {
  source: number;
  sourceLayer: number;
  target: number;
  targetLayer: number;
}

export type ArchitectureShape = "flat" | "moderate" | "well-layered";

export interface LayerGroup {
  layer: number;
  symbols: Array<{ id: number; name: string; kind: string }>;
}

export interface LayerSummary {
  totalLayers: number;
  shape: ArchitectureShape;
  /** Share of symbols in layer 0, percent */
  baseLayerPct: number;
  layers: LayerGroup[];
}

export interface DependencyChain {
  /** Representative symbol per condensation node, in path order */
  symbols: number[];
  /** Number of condensation nodes on the path */
  length: number;
}

// ---------------------------------------------------------------------------
// Traversals
// ---------------------------------------------------------------------------

export interface BlastRadius {
  dependentSymbols: number;
  dependentFiles: number;
}

export type TestImpactKind = "DIRECT" | "TRANSITIVE";

export interface AffectedTest {
  file: string;
  symbol: string;
  kind: TestImpactKind;
  hops: number;
  /** Name of the first symbol on the way, for transitive hits */
  via: string | null;
}

export interface EntryPointHit {
  id: number;
  name: string;
  kind: string;
  filePath: string;
  /** Forward hops from the entry point to the target */
  hops: number;
}

export interface PathStep {
  id: number;
  name: string;
  filePath: string;
  /** Kinds of the edge leading into this step; empty for the first */
  edgeKinds: string[];
}

// ---------------------------------------------------------------------------
// Coverage gaps
// ---------------------------------------------------------------------------

export interface CoveredEntry {
  name: string;
  kind: string;
  file: string;
  line: number;
  gate: string;
  depth: number;
  /** Symbol called right before the gate (the entry itself at depth 0 or 1) */
  via: string;
  chain: string[];
}

export interface UncoveredEntry {
  name: string;
  kind: string;
  file: string;
  line: number;
  reason: string;
}

export interface CoverageSummary {
  totalEntries: number;
  covered: number;
  uncovered: number;
  gateSymbols: number;
  /** One decimal place; 0 without entries */
  coveragePct: number;
}

export interface CoverageResult {
  covered: CoveredEntry[];
  uncovered: UncoveredEntry[];
  summary: CoverageSummary;
}
