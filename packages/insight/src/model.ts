/**
 * Insight types - dead exports and codebase health.
 */

/**
 * An exported symbol nothing references.
 */
export interface DeadExport {
  id: number;
  name: string;
  kind: string;
  file: string;
  line: number;
}

/**
 * An unreferenced export found alive through the importers of its file.
 */
export interface RevivedExport extends DeadExport {
  /** File holding a reference to a symbol of the same name */
  evidenceFile: string;
  /** Importer hops from the export's file to the evidence */
  hops: number;
}

export interface DeadExportReport {
  /** The file is imported, yet nothing reaches the symbol */
  high: DeadExport[];
  /** The file has no importers: an entry point, or used by unparsed files */
  low: DeadExport[];
  revived: RevivedExport[];
  /** Files with no extracted symbols; they may hide references */
  unparsedFiles: number;
}

export type DeadGroupBy = "directory" | "kind";

export interface DeadExportGroup {
  key: string;
  count: number;
  symbols: DeadExport[];
}

/**
 * Counts the health score is computed from.
 */
export interface HealthInputs {
  symbols: number;
  cycles: number;
  godComponents: number;
  bottlenecks: number;
  deadExports: number;
  layerViolations: number;
}

export interface HealthMetrics extends HealthInputs {
  files: number;
  edges: number;
  /** Percent of symbols inside a cycle, one decimal */
  tangleRatio: number;
  /** 0-100, higher is healthier */
  healthScore: number;
}

export interface GodComponent {
  name: string;
  kind: string;
  degree: number;
  file: string;
}

export interface Bottleneck {
  name: string;
  kind: string;
  /** One decimal */
  betweenness: number;
  file: string;
}

export interface HealthCycle {
  size: number;
  symbols: string[];
  files: string[];
}

export interface HealthViolation {
  source: string;
  sourceLayer: number;
  target: string;
  targetLayer: number;
}

export interface HealthReport {
  metrics: HealthMetrics;
  cycles: HealthCycle[];
  godComponents: GodComponent[];
  bottlenecks: Bottleneck[];
  /** Null when the graph is empty and no layers exist */
  layerViolations: HealthViolation[] | null;
}

export type FanMode = "symbol" | "file";

/** Which side of a highly connected node is large */
export type FanFlag = "high-risk" | "hub" | "spreader";

export interface SymbolFan {
  name: string;
  kind: string;
  fanIn: number;
  fanOut: number;
  total: number;
  /** One decimal */
  betweenness: number;
  /** Four decimals */
  pagerank: number;
  file: string;
  line: number;
  flag: FanFlag | null;
}

export interface FileFan {
  path: string;
  /** Distinct files importing this one */
  fanIn: number;
  /** Distinct files this one imports */
  fanOut: number;
  total: number;
  flag: FanFlag | null;
}

export type FanReport =
  | { mode: "symbol"; items: SymbolFan[] }
  | { mode: "file"; items: FileFan[] };
