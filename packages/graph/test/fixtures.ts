import { InMemoryRelationshipStore, type EdgeRecord, type SymbolRecord } from "@codepulse/store";

import { buildGraph, type SymbolGraph } from "../src/builder.js";

/**
 * A symbol record with test defaults: an exported top-level function in src/mod<id>.ts.
 */
export function sym(id: number, name: string, overrides: Partial<SymbolRecord> = {}): SymbolRecord {
  return {
    id,
    name,
    qualifiedName: null,
    kind: "function",
    fileId: id,
    filePath: `src/mod${id}.ts`,
    parentId: null,
    lineStart: 1,
    lineEnd: 1,
    isExported: true,
    signature: null,
    docstring: null,
    ...overrides,
  };
}

export function edge(sourceId: number, targetId: number, kind: string = "call"): EdgeRecord {
  return { sourceId, targetId, kind, line: null };
}

/**
 * Graph over the given edges; every endpoint gets a default symbol named n<id>.
 */
export function graphOf(pairs: Array<[number, number]>, names: Record<number, string> = {}): SymbolGraph {
  const ids = new Set<number>();
  for (const [a, b] of pairs) {
    ids.add(a);
    ids.add(b);
  }
  const symbols = Array.from(ids, (id) => sym(id, names[id] ?? `n${id}`));
  return buildGraph(
    pairs.map(([a, b]) => edge(a, b)),
    symbols
  );
}

/**
 * Deterministic pseudo-random edge list (Park-Miller generator, seed > 0).
 */
export function randomEdges(nodes: number, count: number, seed: number): Array<[number, number]> {
  let state = seed;
  const next = (): number => {
    state = (state * 48271) % 2147483647;
    return state;
  };

  const pairs: Array<[number, number]> = [];
  for (let i = 0; i < count; i++) {
    pairs.push([(next() % nodes) + 1, (next() % nodes) + 1]);
  }
  return pairs;
}

const metric = (symbolId: number, inDegree: number, outDegree: number) => ({
  symbolId,
  pagerank: 0,
  betweenness: 0,
  inDegree,
  outDegree,
});

/**
 * Small index: a session_open/session_close cycle, a route loader behind
 * require_user, and one test calling the loader.
 */
export const sessionStore = (): InMemoryRelationshipStore =>
  new InMemoryRelationshipStore({
    files: [
      { id: 1, path: "src/auth/session.ts" },
      { id: 2, path: "src/auth/token.ts" },
      { id: 3, path: "src/routes/user.ts" },
      { id: 4, path: "tests/session.test.ts" },
    ],
    symbols: [
      { id: 1, fileId: 1, name: "session_open", lineStart: 1 },
      { id: 2, fileId: 1, name: "session_close", lineStart: 10 },
      { id: 3, fileId: 2, name: "token_verify", lineStart: 1 },
      { id: 4, fileId: 3, name: "loader", lineStart: 5, isExported: true },
      { id: 5, fileId: 1, name: "require_user", lineStart: 20 },
      { id: 6, fileId: 4, name: "test_session", lineStart: 1 },
    ],
    edges: [
      { sourceId: 1, targetId: 2 },
      { sourceId: 2, targetId: 1 },
      { sourceId: 2, targetId: 3 },
      { sourceId: 4, targetId: 5 },
      { sourceId: 5, targetId: 1 },
      { sourceId: 6, targetId: 4 },
    ],
    metrics: [
      metric(1, 2, 1),
      metric(2, 1, 2),
      metric(3, 1, 0),
      metric(4, 1, 1),
      metric(5, 1, 1),
      metric(6, 0, 1),
    ],
  });
