import { readFileSync } from "node:fs";
import Database from "better-sqlite3";

import type { MemoryStoreSeed } from "../src/infrastructure/memory/InMemoryRelationshipStore.js";

const SCHEMA = readFileSync(new URL("../schema/index.sql", import.meta.url), "utf-8");

/**
 * Create an in-memory index database holding the same rows as a memory seed.
 */
export function createSeededDatabase(seed: MemoryStoreSeed): Database.Database {
  const db = new Database(":memory:");
  db.exec(SCHEMA);

  const insertFile = db.prepare(
    "INSERT INTO files (id, path, language, line_count) VALUES (?, ?, ?, ?)"
  );
  const insertSymbol = db.prepare(
    `INSERT INTO symbols (id, file_id, name, qualified_name, kind, line_start, line_end, is_exported, parent_id)
     VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)`
  );
  const insertEdge = db.prepare(
    "INSERT INTO edges (source_id, target_id, kind, line) VALUES (?, ?, ?, ?)"
  );
  const insertFileEdge = db.prepare(
    "INSERT INTO file_edges (source_file_id, target_file_id, symbol_count) VALUES (?, ?, ?)"
  );
  const insertStats = db.prepare(
    "INSERT INTO file_stats (file_id, commit_count, total_churn, distinct_authors) VALUES (?, ?, ?, ?)"
  );
  const insertCochange = db.prepare(
    "INSERT INTO git_cochange (file_id_a, file_id_b, cochange_count) VALUES (?, ?, ?)"
  );
  const insertHyperedge = db.prepare(
    "INSERT INTO git_hyperedges (id, commit_hash, file_count) VALUES (?, ?, ?)"
  );
  const insertMember = db.prepare(
    "INSERT INTO git_hyperedge_members (hyperedge_id, file_id, ordinal) VALUES (?, ?, ?)"
  );
  const insertMetrics = db.prepare(
    `INSERT INTO graph_metrics (symbol_id, pagerank, betweenness, in_degree, out_degree)
     VALUES (?, ?, ?, ?, ?)`
  );

  db.transaction(() => {
    for (const f of seed.files ?? []) {
      insertFile.run(f.id, f.path, f.language ?? null, f.lineCount ?? 0);
    }
    for (const s of seed.symbols ?? []) {
      const lineStart = s.lineStart ?? 0;
      insertSymbol.run(
        s.id,
        s.fileId,
        s.name,
        s.qualifiedName ?? null,
        s.kind ?? "function",
        lineStart,
        s.lineEnd ?? lineStart,
        s.isExported ? 1 : 0,
        s.parentId ?? null
      );
    }
    for (const e of seed.edges ?? []) {
      insertEdge.run(e.sourceId, e.targetId, e.kind ?? "call", e.line ?? null);
    }
    for (const fe of seed.fileEdges ?? []) {
      insertFileEdge.run(fe.sourceFileId, fe.targetFileId, fe.symbolCount ?? 1);
    }
    for (const st of seed.fileStats ?? []) {
      insertStats.run(st.fileId, st.commitCount, st.totalChurn, st.distinctAuthors);
    }
    for (const c of seed.cochanges ?? []) {
      insertCochange.run(
        Math.min(c.fileIdA, c.fileIdB),
        Math.max(c.fileIdA, c.fileIdB),
        c.cochangeCount
      );
    }
    for (const h of seed.hyperedges ?? []) {
      insertHyperedge.run(h.id, `commit-${h.id}`, h.fileIds.length);
      h.fileIds.forEach((fileId, ordinal) => insertMember.run(h.id, fileId, ordinal));
    }
    for (const m of seed.metrics ?? []) {
      insertMetrics.run(m.symbolId, m.pagerank, m.betweenness, m.inDegree, m.outDegree);
    }
  })();

  return db;
}

/** A small index shared by the adapter tests */
export const SAMPLE_SEED: MemoryStoreSeed = {
  files: [
    { id: 1, path: "src/app/main.ts", language: "typescript", lineCount: 40 },
    { id: 2, path: "src/lib/util.ts", language: "typescript", lineCount: 25 },
    { id: 3, path: "lib/util.ts", language: "typescript", lineCount: 10 },
    { id: 4, path: "README.md", language: null, lineCount: 3 },
  ],
  symbols: [
    { id: 10, fileId: 1, name: "main", qualifiedName: "app.main", lineStart: 3, isExported: true },
    { id: 11, fileId: 2, name: "parseArgs", qualifiedName: "lib.parseArgs", lineStart: 1, isExported: true },
    { id: 12, fileId: 2, name: "formatDate", qualifiedName: "lib.formatDate", lineStart: 9, isExported: true },
    { id: 13, fileId: 3, name: "parseArgs", qualifiedName: "legacy.parseArgs", lineStart: 2, isExported: false },
    { id: 14, fileId: 1, name: "Helper", kind: "class", lineStart: 20, isExported: false },
  ],
  edges: [
    { sourceId: 10, targetId: 11, kind: "call", line: 5 },
    { sourceId: 10, targetId: 14, kind: "call", line: 6 },
    { sourceId: 14, targetId: 11, kind: "call", line: 22 },
  ],
  fileEdges: [{ sourceFileId: 1, targetFileId: 2, symbolCount: 2 }],
  fileStats: [
    { fileId: 1, commitCount: 6, totalChurn: 120, distinctAuthors: 2 },
    { fileId: 2, commitCount: 4, totalChurn: 60, distinctAuthors: 1 },
  ],
  cochanges: [
    { fileIdA: 2, fileIdB: 1, cochangeCount: 3 },
    { fileIdA: 1, fileIdB: 3, cochangeCount: 5 },
  ],
  hyperedges: [
    { id: 1, fileIds: [1, 2, 3] },
    { id: 2, fileIds: [1, 2] },
  ],
  metrics: [{ symbolId: 11, pagerank: 0.4, betweenness: 0.1, inDegree: 2, outDegree: 0 }],
};
