import type {
  CochangeRecord,
  EdgeRecord,
  FileEdgeRecord,
  FileRecord,
  FileStatsRecord,
  GraphMetricsRecord,
  HyperedgeMemberRecord,
  PathMatchMode,
  ReferencedName,
  StoreCounts,
  SymbolRecord,
} from "../model.js";

/**
 * Read-only access to the relationship index.
 *
 * Id-list lookups are chunked by the adapter so no single query exceeds the
 * backend's parameter limit; the concatenated result is always complete.
 * List methods return a deterministic order.
 */
export interface RelationshipStore {
  counts(): StoreCounts;

  listFiles(): FileRecord[];
  getFilesByIds(ids: readonly number[]): FileRecord[];
  findFilesByPath(path: string, mode: PathMatchMode): FileRecord[];
  countFilesWithoutSymbols(): number;

  listSymbols(): SymbolRecord[];
  getSymbolsByIds(ids: readonly number[]): SymbolRecord[];
  findSymbolsByName(name: string): SymbolRecord[];
  findSymbolsByQualifiedName(qualifiedName: string): SymbolRecord[];
  searchSymbols(fragment: string, limit: number): SymbolRecord[];
  /** Exported symbols with zero incoming symbol edges, ordered by path then line */
  listUnreferencedExports(): SymbolRecord[];

  listEdges(): EdgeRecord[];
  /** Incoming edge count per requested id; ids without edges are absent */
  countIncomingEdges(ids: readonly number[]): Map<number, number>;
  /** Names of edge targets whose source symbol lives in one of the given files */
  listReferencedNamesInFiles(fileIds: readonly number[]): ReferencedName[];

  listFileEdges(): FileEdgeRecord[];
  listFileStats(): FileStatsRecord[];

  listCochanges(): CochangeRecord[];
  /** Pairs touching the file, ordered by cochange count descending */
  listCochangePartners(fileId: number, limit: number): CochangeRecord[];
  /** Members of hyperedges with at least `minFileCount` files, ordered by hyperedge, ordinal, file */
  listHyperedgeMembers(minFileCount: number): HyperedgeMemberRecord[];

  listGraphMetrics(): GraphMetricsRecord[];
}
