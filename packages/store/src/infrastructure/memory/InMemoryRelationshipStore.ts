/**
 * In-memory relationship store for tests and embedding.
 * Mirrors the ordering of the SQLite adapter.
 */

import {
  normalizePath,
  type CochangeRecord,
  type EdgeRecord,
  type FileEdgeRecord,
  type FileRecord,
  type FileStatsRecord,
  type GraphMetricsRecord,
  type HyperedgeMemberRecord,
  type PathMatchMode,
  type ReferencedName,
  type StoreCounts,
  type SymbolRecord,
} from "../../core/model.js";
import type { RelationshipStore } from "../../core/ports/RelationshipStore.js";

export interface FileSeed {
  id: number;
  path: string;
  language?: string | null;
  lineCount?: number;
}

export interface SymbolSeed {
  id: number;
  name: string;
  fileId: number;
  kind?: string;
  qualifiedName?: string | null;
  parentId?: number | null;
  lineStart?: number;
  lineEnd?: number;
  isExported?: boolean;
  signature?: string | null;
  docstring?: string | null;
}

export interface EdgeSeed {
  sourceId: number;
  targetId: number;
  kind?: string;
  line?: number | null;
}

export interface FileEdgeSeed {
  sourceFileId: number;
  targetFileId: number;
  symbolCount?: number;
}

/** One commit's change set, as file ids in commit order */
export interface HyperedgeSeed {
  id: number;
  fileIds: number[];
}

export interface MemoryStoreSeed {
  files?: FileSeed[];
  symbols?: SymbolSeed[];
  edges?: EdgeSeed[];
  fileEdges?: FileEdgeSeed[];
  fileStats?: FileStatsRecord[];
  cochanges?: CochangeRecord[];
  hyperedges?: HyperedgeSeed[];
  metrics?: GraphMetricsRecord[];
}

export class InMemoryRelationshipStore implements RelationshipStore {
  private readonly files = new Map<number, FileRecord>();
  private readonly symbols = new Map<number, SymbolRecord>();
  private readonly edges: EdgeRecord[];
  private readonly fileEdges: FileEdgeRecord[];
  private readonly fileStats: FileStatsRecord[];
  private readonly cochanges: CochangeRecord[];
  private readonly hyperedges: HyperedgeSeed[];
  private readonly metrics: GraphMetricsRecord[];

  constructor(seed: MemoryStoreSeed = {}) {
    for (const file of seed.files ?? []) {
      this.files.set(file.id, {
        id: file.id,
        path: normalizePath(file.path),
        language: file.language ?? null,
        lineCount: file.lineCount ?? 0,
      });
    }

    for (const symbol of seed.symbols ?? []) {
      const file = this.files.get(symbol.fileId);
      if (!file) {
        throw new Error(`Symbol ${symbol.id} references unknown file ${symbol.fileId}`);
      }
      this.symbols.set(symbol.id, {
        id: symbol.id,
        name: symbol.name,
        qualifiedName: symbol.qualifiedName ?? null,
        kind: symbol.kind ?? "function",
        fileId: symbol.fileId,
        filePath: file.path,
        parentId: symbol.parentId ?? null,
        lineStart: symbol.lineStart ?? 0,
        lineEnd: symbol.lineEnd ?? symbol.lineStart ?? 0,
        isExported: symbol.isExported ?? false,
        signature: symbol.signature ?? null,
        docstring: symbol.docstring ?? null,
      });
    }

    this.edges = (seed.edges ?? []).map((edge) => ({
      sourceId: edge.sourceId,
      targetId: edge.targetId,
      kind: edge.kind ?? "call",
      line: edge.line ?? null,
    }));

    this.fileEdges = (seed.fileEdges ?? [])
      .map((edge) => ({
        sourceFileId: edge.sourceFileId,
        targetFileId: edge.targetFileId,
        symbolCount: edge.symbolCount ?? 1,
      }))
      .sort((a, b) => a.sourceFileId - b.sourceFileId || a.targetFileId - b.targetFileId);

    this.fileStats = [...(seed.fileStats ?? [])].sort((a, b) => a.fileId - b.fileId);

    // Stored once per unordered pair, smaller id first
    this.cochanges = (seed.cochanges ?? [])
      .map((pair) => ({
        fileIdA: Math.min(pair.fileIdA, pair.fileIdB),
        fileIdB: Math.max(pair.fileIdA, pair.fileIdB),
        cochangeCount: pair.cochangeCount,
      }))
      .sort(byCochange);

    this.hyperedges = [...(seed.hyperedges ?? [])].sort((a, b) => a.id - b.id);
    this.metrics = [...(seed.metrics ?? [])].sort((a, b) => a.symbolId - b.symbolId);
  }

  counts(): StoreCounts {
    return {
      files: this.files.size,
      symbols: this.symbols.size,
      edges: this.edges.length,
    };
  }

  // --- Files ---

  listFiles(): FileRecord[] {
    return [...this.files.values()].sort(byPath);
  }

  getFilesByIds(ids: readonly number[]): FileRecord[] {
    return pick(this.files, ids).sort(byPath);
  }

  findFilesByPath(path: string, mode: PathMatchMode): FileRecord[] {
    const needle = normalizePath(path);
    return this.listFiles().filter((file) => matchesPath(file.path, needle, mode));
  }

  countFilesWithoutSymbols(): number {
    const withSymbols = new Set([...this.symbols.values()].map((s) => s.fileId));
    return [...this.files.keys()].filter((id) => !withSymbols.has(id)).length;
  }

  // --- Symbols ---

  listSymbols(): SymbolRecord[] {
    return [...this.symbols.values()].sort((a, b) => a.id - b.id);
  }

  getSymbolsByIds(ids: readonly number[]): SymbolRecord[] {
    return pick(this.symbols, ids).sort((a, b) => a.id - b.id);
  }

  findSymbolsByName(name: string): SymbolRecord[] {
    return this.listSymbols()
      .filter((s) => s.name === name)
      .sort(byLocation);
  }

  findSymbolsByQualifiedName(qualifiedName: string): SymbolRecord[] {
    return this.listSymbols()
      .filter((s) => s.qualifiedName === qualifiedName)
      .sort(byLocation);
  }

  searchSymbols(fragment: string, limit: number): SymbolRecord[] {
    const needle = fragment.toLowerCase();
    return this.listSymbols()
      .filter(
        (s) =>
          s.name.toLowerCase().includes(needle) ||
          (s.qualifiedName ?? "").toLowerCase().includes(needle)
      )
      .sort((a, b) => compareText(a.name, b.name) || a.id - b.id)
      .slice(0, limit);
  }

  listUnreferencedExports(): SymbolRecord[] {
    const referenced = new Set(this.edges.map((e) => e.targetId));
    return this.listSymbols()
      .filter((s) => s.isExported && !referenced.has(s.id))
      .sort(byLocation);
  }

  // --- Edges ---

  listEdges(): EdgeRecord[] {
    return [...this.edges];
  }

  countIncomingEdges(ids: readonly number[]): Map<number, number> {
    const wanted = new Set(ids);
    const counts = new Map<number, number>();
    for (const edge of this.edges) {
      if (wanted.has(edge.targetId)) {
        counts.set(edge.targetId, (counts.get(edge.targetId) ?? 0) + 1);
      }
    }
    return counts;
  }

  listReferencedNamesInFiles(fileIds: readonly number[]): ReferencedName[] {
    const wanted = new Set(fileIds);
    const seen = new Set<string>();
    const result: ReferencedName[] = [];

    for (const edge of this.edges) {
      const source = this.symbols.get(edge.sourceId);
      const target = this.symbols.get(edge.targetId);
      if (!source || !target || !wanted.has(source.fileId)) continue;

      const key = `${source.fileId}\u0000${target.name}`;
      if (seen.has(key)) continue;
      seen.add(key);
      result.push({ fileId: source.fileId, name: target.name });
    }

    return result.sort((a, b) => a.fileId - b.fileId || compareText(a.name, b.name));
  }

  listFileEdges(): FileEdgeRecord[] {
    return [...this.fileEdges];
  }

  listFileStats(): FileStatsRecord[] {
    return [...this.fileStats];
  }

  // --- Git history ---

  listCochanges(): CochangeRecord[] {
    return [...this.cochanges];
  }

  listCochangePartners(fileId: number, limit: number): CochangeRecord[] {
    return this.cochanges
      .filter((pair) => pair.fileIdA === fileId || pair.fileIdB === fileId)
      .slice(0, limit);
  }

  listHyperedgeMembers(minFileCount: number): HyperedgeMemberRecord[] {
    const members: HyperedgeMemberRecord[] = [];
    for (const hyperedge of this.hyperedges) {
      if (hyperedge.fileIds.length < minFileCount) continue;
      hyperedge.fileIds.forEach((fileId, ordinal) => {
        const file = this.files.get(fileId);
        if (!file) return;
        members.push({ hyperedgeId: hyperedge.id, fileId, filePath: file.path, ordinal });
      });
    }
    return members;
  }

  // --- Precomputed metrics ---

  listGraphMetrics(): GraphMetricsRecord[] {
    return [...this.metrics];
  }
}

function pick<T>(records: Map<number, T>, ids: readonly number[]): T[] {
  const result: T[] = [];
  for (const id of new Set(ids)) {
    const record = records.get(id);
    if (record) result.push(record);
  }
  return result;
}

function matchesPath(path: string, needle: string, mode: PathMatchMode): boolean {
  switch (mode) {
    case "exact":
      return path === needle;
    case "suffix":
      return path === needle || path.endsWith(`/${needle}`);
    case "prefix":
      return path.startsWith(needle);
    case "substring":
      return path.includes(needle);
  }
}

function compareText(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

function byPath(a: FileRecord, b: FileRecord): number {
  return compareText(a.path, b.path);
}

function byLocation(a: SymbolRecord, b: SymbolRecord): number {
  return compareText(a.filePath, b.filePath) || a.lineStart - b.lineStart || a.id - b.id;
}

function byCochange(a: CochangeRecord, b: CochangeRecord): number {
  return b.cochangeCount - a.cochangeCount || a.fileIdA - b.fileIdA || a.fileIdB - b.fileIdB;
}
