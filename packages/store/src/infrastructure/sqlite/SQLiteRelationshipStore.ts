/**
 * SQLite-backed relationship store.
 * Opened read-only; every id-list query goes through `batched` so IN clauses
 * stay under the engine's parameter limit.
 */

import Database from "better-sqlite3";

import { DEFAULT_BATCH_SIZE, batched, placeholders } from "../../core/batch.js";
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

/** Row shapes from SQLite */
interface FileRow {
  id: number;
  path: string;
  language: string | null;
  line_count: number | null;
}

interface SymbolRow {
  id: number;
  name: string;
  qualified_name: string | null;
  kind: string;
  file_id: number;
  file_path: string;
  parent_id: number | null;
  line_start: number | null;
  line_end: number | null;
  is_exported: number;
  signature: string | null;
  docstring: string | null;
}

interface EdgeRow {
  source_id: number;
  target_id: number;
  kind: string;
  line: number | null;
}

interface FileEdgeRow {
  source_file_id: number;
  target_file_id: number;
  symbol_count: number | null;
}

interface FileStatsRow {
  file_id: number;
  commit_count: number | null;
  total_churn: number | null;
  distinct_authors: number | null;
}

interface CochangeRow {
  file_id_a: number;
  file_id_b: number;
  cochange_count: number;
}

interface HyperedgeMemberRow {
  hyperedge_id: number;
  file_id: number;
  path: string;
  ordinal: number;
}

interface MetricsRow {
  symbol_id: number;
  pagerank: number | null;
  betweenness: number | null;
  in_degree: number | null;
  out_degree: number | null;
}

const SYMBOL_COLUMNS = `
  s.id, s.name, s.qualified_name, s.kind, s.file_id, f.path AS file_path,
  s.parent_id, s.line_start, s.line_end, s.is_exported, s.signature, s.docstring
`;

const SYMBOL_FROM = `FROM symbols s JOIN files f ON s.file_id = f.id`;

export interface SQLiteStoreOptions {
  batchSize?: number;
}

export class SQLiteRelationshipStore implements RelationshipStore {
  private readonly batchSize: number;

  /**
   * Wrap an open connection. Use ":memory:" databases for testing,
   * `openRelationshipStore` for an index on disk.
   */
  constructor(
    private readonly db: Database.Database,
    options: SQLiteStoreOptions = {}
  ) {
    this.batchSize = options.batchSize ?? DEFAULT_BATCH_SIZE;
  }

  close(): void {
    this.db.close();
  }

  counts(): StoreCounts {
    const count = (table: string): number =>
      this.db.prepare<[], { c: number }>(`SELECT COUNT(*) AS c FROM ${table}`).get()?.c ?? 0;

    return {
      files: count("files"),
      symbols: count("symbols"),
      edges: count("edges"),
    };
  }

  // --- Files ---

  listFiles(): FileRecord[] {
    return this.db
      .prepare<[], FileRow>(`SELECT id, path, language, line_count FROM files ORDER BY path`)
      .all()
      .map(toFile);
  }

  getFilesByIds(ids: readonly number[]): FileRecord[] {
    return batched(ids, this.batchSize, (batch) =>
      this.db
        .prepare<number[], FileRow>(
          `SELECT id, path, language, line_count FROM files
           WHERE id IN (${placeholders(batch.length)})`
        )
        .all(...batch)
    )
      .map(toFile)
      // Batches are queried separately, so order the merged rows here
      .sort((a, b) => (a.path < b.path ? -1 : a.path > b.path ? 1 : 0));
  }

  findFilesByPath(path: string, mode: PathMatchMode): FileRecord[] {
    const needle = normalizePath(path);
    const columns = `SELECT id, path, language, line_count FROM files`;

    let rows: FileRow[];
    switch (mode) {
      case "exact":
        rows = this.db
          .prepare<[string], FileRow>(`${columns} WHERE path = ? ORDER BY path`)
          .all(needle);
        break;
      case "suffix": {
        const suffix = `/${needle}`;
        rows = this.db
          .prepare<[string, string, string], FileRow>(
            `${columns} WHERE path = ? OR substr(path, -length(?)) = ? ORDER BY path`
          )
          .all(needle, suffix, suffix);
        break;
      }
      case "prefix":
        rows = this.db
          .prepare<[string, string], FileRow>(
            `${columns} WHERE substr(path, 1, length(?)) = ? ORDER BY path`
          )
          .all(needle, needle);
        break;
      case "substring":
        rows = this.db
          .prepare<[string], FileRow>(`${columns} WHERE instr(path, ?) > 0 ORDER BY path`)
          .all(needle);
        break;
    }
    return rows.map(toFile);
  }

  countFilesWithoutSymbols(): number {
    const row = this.db
      .prepare<[], { c: number }>(
        `SELECT COUNT(*) AS c FROM files f
         WHERE NOT EXISTS (SELECT 1 FROM symbols s WHERE s.file_id = f.id)`
      )
      .get();
    return row?.c ?? 0;
  }

  // --- Symbols ---

  listSymbols(): SymbolRecord[] {
    return this.db
      .prepare<[], SymbolRow>(`SELECT ${SYMBOL_COLUMNS} ${SYMBOL_FROM} ORDER BY s.id`)
      .all()
      .map(toSymbol);
  }

  getSymbolsByIds(ids: readonly number[]): SymbolRecord[] {
    return batched(ids, this.batchSize, (batch) =>
      this.db
        .prepare<number[], SymbolRow>(
          `SELECT ${SYMBOL_COLUMNS} ${SYMBOL_FROM}
           WHERE s.id IN (${placeholders(batch.length)})`
        )
        .all(...batch)
    )
      .map(toSymbol)
      .sort((a, b) => a.id - b.id);
  }

  findSymbolsByName(name: string): SymbolRecord[] {
    return this.db
      .prepare<[string], SymbolRow>(
        `SELECT ${SYMBOL_COLUMNS} ${SYMBOL_FROM} WHERE s.name = ? ORDER BY f.path, s.line_start, s.id`
      )
      .all(name)
      .map(toSymbol);
  }

  findSymbolsByQualifiedName(qualifiedName: string): SymbolRecord[] {
    return this.db
      .prepare<[string], SymbolRow>(
        `SELECT ${SYMBOL_COLUMNS} ${SYMBOL_FROM}
         WHERE s.qualified_name = ? ORDER BY f.path, s.line_start, s.id`
      )
      .all(qualifiedName)
      .map(toSymbol);
  }

  searchSymbols(fragment: string, limit: number): SymbolRecord[] {
    return this.db
      .prepare<[string, string, number], SymbolRow>(
        `SELECT ${SYMBOL_COLUMNS} ${SYMBOL_FROM}
         WHERE instr(lower(s.name), lower(?)) > 0
            OR instr(lower(coalesce(s.qualified_name, '')), lower(?)) > 0
         ORDER BY s.name, s.id
         LIMIT ?`
      )
      .all(fragment, fragment, limit)
      .map(toSymbol);
  }

  listUnreferencedExports(): SymbolRecord[] {
    return this.db
      .prepare<[], SymbolRow>(
        `SELECT ${SYMBOL_COLUMNS} ${SYMBOL_FROM}
         WHERE s.is_exported = 1
           AND NOT EXISTS (SELECT 1 FROM edges e WHERE e.target_id = s.id)
         ORDER BY f.path, s.line_start, s.id`
      )
      .all()
      .map(toSymbol);
  }

  // --- Edges ---

  listEdges(): EdgeRecord[] {
    return this.db
      .prepare<[], EdgeRow>(`SELECT source_id, target_id, kind, line FROM edges ORDER BY id`)
      .all()
      .map((row) => ({
        sourceId: row.source_id,
        targetId: row.target_id,
        kind: row.kind,
        line: row.line,
      }));
  }

  countIncomingEdges(ids: readonly number[]): Map<number, number> {
    const rows = batched(ids, this.batchSize, (batch) =>
      this.db
        .prepare<number[], { target_id: number; cnt: number }>(
          `SELECT target_id, COUNT(*) AS cnt FROM edges
           WHERE target_id IN (${placeholders(batch.length)})
           GROUP BY target_id`
        )
        .all(...batch)
    );
    return new Map(rows.map((row) => [row.target_id, row.cnt]));
  }

  listReferencedNamesInFiles(fileIds: readonly number[]): ReferencedName[] {
    return batched(fileIds, this.batchSize, (batch) =>
      this.db
        .prepare<number[], { file_id: number; name: string }>(
          `SELECT DISTINCT src.file_id AS file_id, tgt.name AS name
           FROM edges e
           JOIN symbols src ON e.source_id = src.id
           JOIN symbols tgt ON e.target_id = tgt.id
           WHERE src.file_id IN (${placeholders(batch.length)})
           ORDER BY src.file_id, tgt.name`
        )
        .all(...batch)
    )
      .map((row) => ({ fileId: row.file_id, name: row.name }))
      .sort((a, b) => a.fileId - b.fileId || (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
  }

  listFileEdges(): FileEdgeRecord[] {
    return this.db
      .prepare<[], FileEdgeRow>(
        `SELECT source_file_id, target_file_id, symbol_count FROM file_edges
         ORDER BY source_file_id, target_file_id`
      )
      .all()
      .map((row) => ({
        sourceFileId: row.source_file_id,
        targetFileId: row.target_file_id,
        symbolCount: row.symbol_count ?? 0,
      }));
  }

  listFileStats(): FileStatsRecord[] {
    return this.db
      .prepare<[], FileStatsRow>(
        `SELECT file_id, commit_count, total_churn, distinct_authors FROM file_stats ORDER BY file_id`
      )
      .all()
      .map((row) => ({
        fileId: row.file_id,
        commitCount: row.commit_count ?? 0,
        totalChurn: row.total_churn ?? 0,
        distinctAuthors: row.distinct_authors ?? 0,
      }));
  }

  // --- Git history ---

  listCochanges(): CochangeRecord[] {
    return this.db
      .prepare<[], CochangeRow>(
        `SELECT file_id_a, file_id_b, cochange_count FROM git_cochange
         ORDER BY cochange_count DESC, file_id_a, file_id_b`
      )
      .all()
      .map(toCochange);
  }

  listCochangePartners(fileId: number, limit: number): CochangeRecord[] {
    return this.db
      .prepare<[number, number, number], CochangeRow>(
        `SELECT file_id_a, file_id_b, cochange_count FROM git_cochange
         WHERE file_id_a = ? OR file_id_b = ?
         ORDER BY cochange_count DESC, file_id_a, file_id_b
         LIMIT ?`
      )
      .all(fileId, fileId, limit)
      .map(toCochange);
  }

  listHyperedgeMembers(minFileCount: number): HyperedgeMemberRecord[] {
    return this.db
      .prepare<[number], HyperedgeMemberRow>(
        `SELECT gh.id AS hyperedge_id, gm.file_id, f.path, gm.ordinal
         FROM git_hyperedges gh
         JOIN git_hyperedge_members gm ON gh.id = gm.hyperedge_id
         JOIN files f ON gm.file_id = f.id
         WHERE gh.file_count >= ?
         ORDER BY gh.id, gm.ordinal, gm.file_id`
      )
      .all(minFileCount)
      .map((row) => ({
        hyperedgeId: row.hyperedge_id,
        fileId: row.file_id,
        filePath: normalizePath(row.path),
        ordinal: row.ordinal,
      }));
  }

  // --- Precomputed metrics ---

  listGraphMetrics(): GraphMetricsRecord[] {
    return this.db
      .prepare<[], MetricsRow>(
        `SELECT symbol_id, pagerank, betweenness, in_degree, out_degree
         FROM graph_metrics ORDER BY symbol_id`
      )
      .all()
      .map((row) => ({
        symbolId: row.symbol_id,
        pagerank: row.pagerank ?? 0,
        betweenness: row.betweenness ?? 0,
        inDegree: row.in_degree ?? 0,
        outDegree: row.out_degree ?? 0,
      }));
  }
}

/**
 * Open an index database read-only. The file must already exist.
 */
export function openRelationshipStore(
  dbPath: string,
  options: SQLiteStoreOptions = {}
): SQLiteRelationshipStore {
  const db = new Database(dbPath, { readonly: true, fileMustExist: true });
  return new SQLiteRelationshipStore(db, options);
}

function toFile(row: FileRow): FileRecord {
  return {
    id: row.id,
    path: normalizePath(row.path),
    language: row.language,
    lineCount: row.line_count ?? 0,
  };
}

function toSymbol(row: SymbolRow): SymbolRecord {
  return {
    id: row.id,
    name: row.name,
    qualifiedName: row.qualified_name,
    kind: row.kind,
    fileId: row.file_id,
    filePath: normalizePath(row.file_path),
    parentId: row.parent_id,
    lineStart: row.line_start ?? 0,
    lineEnd: row.line_end ?? 0,
    isExported: row.is_exported === 1,
    signature: row.signature,
    docstring: row.docstring,
  };
}

function toCochange(row: CochangeRow): CochangeRecord {
  return {
    fileIdA: row.file_id_a,
    fileIdB: row.file_id_b,
    cochangeCount: row.cochange_count,
  };
}
