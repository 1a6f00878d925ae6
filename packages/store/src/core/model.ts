/**
 * Records of the relationship index, as the analytics packages see them.
 * Everything here is read-only for the duration of an analysis call.
 */

/**
 * Symbol kinds the indexer emits. Other languages may add their own,
 * so records carry a plain string.
 */
export type KnownSymbolKind =
  | "function"
  | "method"
  | "class"
  | "interface"
  | "struct"
  | "enum"
  | "type"
  | "variable"
  | "constant"
  | "property"
  | "module";

/**
 * Symbol-level relationship kinds. `use` and `uses` both appear in older indexes.
 */
export type KnownEdgeKind =
  | "call"
  | "use"
  | "uses"
  | "inherits"
  | "implements"
  | "import"
  | "template"
  | "reference";

export interface FileRecord {
  id: number;
  /** Forward-slash normalized, unique */
  path: string;
  language: string | null;
  lineCount: number;
}

export interface FileStatsRecord {
  fileId: number;
  commitCount: number;
  totalChurn: number;
  distinctAuthors: number;
}

export interface SymbolRecord {
  id: number;
  name: string;
  qualifiedName: string | null;
  kind: string;
  fileId: number;
  /** Path of the owning file (joined by the adapter) */
  filePath: string;
  parentId: number | null;
  lineStart: number;
  lineEnd: number;
  isExported: boolean;
  signature: string | null;
  docstring: string | null;
}

export interface EdgeRecord {
  sourceId: number;
  targetId: number;
  kind: string;
  line: number | null;
}

/**
 * File-level aggregate of symbol edges: "source file imports target file".
 */
export interface FileEdgeRecord {
  sourceFileId: number;
  targetFileId: number;
  symbolCount: number;
}

/**
 * Unordered pair; adapters store it once with fileIdA < fileIdB.
 */
export interface CochangeRecord {
  fileIdA: number;
  fileIdB: number;
  cochangeCount: number;
}

export interface HyperedgeMemberRecord {
  hyperedgeId: number;
  fileId: number;
  filePath: string;
  ordinal: number;
}

/**
 * Centrality facts computed outside the analytics core.
 */
export interface GraphMetricsRecord {
  symbolId: number;
  pagerank: number;
  betweenness: number;
  inDegree: number;
  outDegree: number;
}

export interface StoreCounts {
  files: number;
  symbols: number;
  edges: number;
}

/**
 * A referenced edge target, keyed by the file that holds the referencing symbol.
 */
export interface ReferencedName {
  fileId: number;
  name: string;
}

export type PathMatchMode = "exact" | "suffix" | "prefix" | "substring";

/**
 * Normalize a path to forward slashes without a leading "./".
 */
export function normalizePath(path: string): string {
  return path.replace(/\\/g, "/").replace(/^\.\//, "");
}

/**
 * Zeroed metrics for symbols that have no precomputed entry.
 */
export function emptyMetrics(symbolId: number): GraphMetricsRecord {
  return { symbolId, pagerank: 0, betweenness: 0, inDegree: 0, outDegree: 0 };
}
