/**
 * Bounded breadth-first traversals over the symbol graph.
 *
 * Every search marks a node visited before enqueueing it, so each node is
 * reached once, at its shortest hop distance, even in cyclic graphs.
 */

import { assertHopCap, assertNonNegativeInteger, assertPositiveInteger } from "@codepulse/core";
import { emptyMetrics, type GraphMetricsRecord } from "@codepulse/store";

import type { SymbolGraph } from "./builder.js";
import { isTestFile } from "./testFiles.js";
import type { AffectedTest, BlastRadius, EntryPointHit, PathStep } from "./model.js";

/** Edge kinds that mean "depends on at run time" */
export const DEPENDENCY_EDGE_KINDS: readonly string[] = ["call", "use", "uses"];

export const DEFAULT_MAX_HOPS = 8;
export const DEFAULT_ENTRY_POINT_LIMIT = 5;
export const ENTRY_POINT_CANDIDATE_POOL = 50;

const ENTRY_POINT_KINDS = new Set(["function", "method", "class"]);

/**
 * Everything that transitively depends on a symbol (callers of callers).
 */
export function blastRadius(graph: SymbolGraph, symbolId: number): BlastRadius {
  if (!graph.hasNode(symbolId)) return { dependentSymbols: 0, dependentFiles: 0 };

  const visited = new Set([symbolId]);
  const queue = [symbolId];
  const files = new Set<number>();

  for (let head = 0; head < queue.length; head++) {
    for (const pred of graph.predecessors(queue[head])) {
      if (visited.has(pred)) continue;
      visited.add(pred);
      queue.push(pred);

      const node = graph.getNode(pred);
      if (node) files.add(node.fileId);
    }
  }

  return { dependentSymbols: visited.size - 1, dependentFiles: files.size };
}

export interface AffectedTestsOptions {
  maxHops?: number;
  edgeKinds?: readonly string[];
}

/**
 * Test symbols that reach `symbolId` through reverse call/use edges.
 *
 * One hop is DIRECT, more is TRANSITIVE with `via` naming the first caller
 * on the way. Results are unique per (file, symbol) and sorted direct first,
 * then by hops, then by file.
 */
export function affectedTests(
  graph: SymbolGraph,
  symbolId: number,
  options: AffectedTestsOptions = {}
): AffectedTest[] {
  const maxHops = options.maxHops ?? DEFAULT_MAX_HOPS;
  assertHopCap("maxHops", maxHops);
  if (!graph.hasNode(symbolId)) return [];

  const kinds = new Set(options.edgeKinds ?? DEPENDENCY_EDGE_KINDS);
  const visited = new Set([symbolId]);
  const queue: Array<{ id: number; hops: number; firstHop: number | null }> = [
    { id: symbolId, hops: 0, firstHop: null },
  ];
  const found: AffectedTest[] = [];
  const seen = new Set<string>();

  for (let head = 0; head < queue.length; head++) {
    const { id, hops, firstHop } = queue[head];
    if (hops >= maxHops) continue;

    for (const pred of graph.predecessors(id, kinds)) {
      if (visited.has(pred)) continue;
      visited.add(pred);

      const depth = hops + 1;
      const origin = firstHop ?? pred;
      queue.push({ id: pred, hops: depth, firstHop: origin });

      const node = graph.getNode(pred);
      if (!node || !isTestFile(node.filePath)) continue;

      const key = `${node.filePath}\u0000${node.name}`;
      if (seen.has(key)) continue;
      seen.add(key);

      found.push({
        file: node.filePath,
        symbol: node.name,
        kind: depth === 1 ? "DIRECT" : "TRANSITIVE",
        hops: depth,
        via: depth > 1 ? graph.getNode(origin)?.name ?? null : null,
      });
    }
  }

  return found.sort(
    (a, b) =>
      rankKind(a) - rankKind(b) ||
      a.hops - b.hops ||
      (a.file < b.file ? -1 : a.file > b.file ? 1 : 0)
  );
}

function rankKind(test: AffectedTest): number {
  return test.kind === "DIRECT" ? 0 : 1;
}

export interface EntryPointOptions {
  limit?: number;
  candidatePool?: number;
}

/**
 * Entry points (no callers, function/method/class) from which `targetId`
 * is reachable. Candidates are ranked by out-degree, capped to a pool, and
 * searched until `limit` hits are found. Missing metrics count as zero.
 */
export function entryPointsReaching(
  graph: SymbolGraph,
  targetId: number,
  metrics: ReadonlyMap<number, GraphMetricsRecord>,
  options: EntryPointOptions = {}
): EntryPointHit[] {
  const limit = options.limit ?? DEFAULT_ENTRY_POINT_LIMIT;
  const pool = options.candidatePool ?? ENTRY_POINT_CANDIDATE_POOL;
  assertNonNegativeInteger("limit", limit);
  assertPositiveInteger("candidatePool", pool);
  if (!graph.hasNode(targetId) || limit === 0) return [];

  const candidates = graph
    .nodeIds()
    .map((id) => ({ id, node: graph.getNode(id), stats: metrics.get(id) ?? emptyMetrics(id) }))
    .filter(
      ({ node, stats }) =>
        node !== undefined && ENTRY_POINT_KINDS.has(node.kind) && stats.inDegree === 0
    )
    .sort((a, b) => b.stats.outDegree - a.stats.outDegree || a.id - b.id)
    .slice(0, pool);

  const hits: EntryPointHit[] = [];
  for (const { id, node } of candidates) {
    if (hits.length >= limit) break;
    if (!node || id === targetId) continue;

    const hops = hopsTo(graph, id, targetId);
    if (hops !== null) {
      hits.push({ id, name: node.name, kind: node.kind, filePath: node.filePath, hops });
    }
  }
  return hits;
}

function hopsTo(graph: SymbolGraph, from: number, to: number): number | null {
  const visited = new Set([from]);
  let frontier = [from];
  let hops = 0;

  while (frontier.length > 0) {
    hops++;
    const next: number[] = [];
    for (const id of frontier) {
      for (const succ of graph.successors(id)) {
        if (succ === to) return hops;
        if (visited.has(succ)) continue;
        visited.add(succ);
        next.push(succ);
      }
    }
    frontier = next;
  }
  return null;
}

/**
 * Shortest forward path between two symbols, each step annotated with the
 * kinds of the edge that led to it. Null if `to` is unreachable.
 */
export function shortestPath(
  graph: SymbolGraph,
  from: number,
  to: number,
  edgeKinds?: readonly string[]
): PathStep[] | null {
  if (!graph.hasNode(from) || !graph.hasNode(to)) return null;

  const kinds = edgeKinds ? new Set(edgeKinds) : undefined;
  const parent = new Map<number, number>();
  const visited = new Set([from]);
  const queue = [from];

  for (let head = 0; head < queue.length && !visited.has(to); head++) {
    const id = queue[head];
    for (const succ of graph.successors(id, kinds)) {
      if (visited.has(succ)) continue;
      visited.add(succ);
      parent.set(succ, id);
      queue.push(succ);
    }
  }
  if (!visited.has(to)) return null;

  const ids: number[] = [];
  for (let cursor: number | undefined = to; cursor !== undefined; cursor = parent.get(cursor)) {
    ids.push(cursor);
  }
  ids.reverse();

  return ids.map((id, index) => {
    const node = graph.getNode(id);
    const prev = index > 0 ? ids[index - 1] : null;
    return {
      id,
      name: node?.name ?? String(id),
      filePath: node?.filePath ?? "",
      edgeKinds: prev === null ? [] : Array.from(graph.edgeKinds(prev, id)).sort(),
    };
  });
}
