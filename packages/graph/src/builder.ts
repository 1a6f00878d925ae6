/**
 * Build the in-memory symbol graph from store records.
 */

import type { EdgeRecord, SymbolRecord } from "@codepulse/store";

import { DirectedGraph } from "./DirectedGraph.js";
import type { SymbolNode } from "./model.js";

export type SymbolGraph = DirectedGraph<SymbolNode>;

export interface BuildGraphOptions {
  /** Also add symbols that take part in no edge (default: false) */
  includeIsolated?: boolean;
  /** Only keep edges of these kinds */
  edgeKinds?: readonly string[];
}

/**
 * Lower wins. Kinds missing from the table rank as 1.
 */
export const DEFAULT_KIND_PRIORITY: Readonly<Record<string, number>> = {
  call: 0,
  template: 0,
  inherits: 1,
  implements: 2,
  import: 3,
};

const UNLISTED_KIND_PRIORITY = 1;

/**
 * Build a directed graph keyed by symbol id.
 *
 * Nodes are the endpoints of the given edges, added in ascending id order.
 * Edges whose endpoints are not among `symbols` are dropped. No edges means
 * an empty graph, unless `includeIsolated` asks for every symbol.
 */
export function buildGraph(
  edges: readonly EdgeRecord[],
  symbols: readonly SymbolRecord[],
  options: BuildGraphOptions = {}
): SymbolGraph {
  const graph = new DirectedGraph<SymbolNode>();
  const byId = new Map<number, SymbolRecord>();
  for (const symbol of symbols) byId.set(symbol.id, symbol);

  const allowed = options.edgeKinds ? new Set(options.edgeKinds) : null;
  const kept = edges.filter(
    (edge) =>
      byId.has(edge.sourceId) &&
      byId.has(edge.targetId) &&
      (allowed === null || allowed.has(edge.kind))
  );

  const nodeIds = new Set<number>();
  if (options.includeIsolated) {
    for (const id of byId.keys()) nodeIds.add(id);
  }
  for (const edge of kept) {
    nodeIds.add(edge.sourceId);
    nodeIds.add(edge.targetId);
  }

  for (const id of Array.from(nodeIds).sort((a, b) => a - b)) {
    const symbol = byId.get(id);
    if (symbol) graph.addNode(id, toNode(symbol));
  }

  for (const edge of kept) {
    graph.addEdge(edge.sourceId, edge.targetId, edge.kind);
  }

  return graph;
}

/**
 * Keep one edge per (source, target) pair: the one whose kind ranks best.
 * Ties keep the first seen. Output follows first appearance of each pair.
 */
export function dedupeEdgesByPriority(
  edges: readonly EdgeRecord[],
  priority: Readonly<Record<string, number>> = DEFAULT_KIND_PRIORITY
): EdgeRecord[] {
  const rank = (kind: string): number => priority[kind] ?? UNLISTED_KIND_PRIORITY;
  const best = new Map<string, EdgeRecord>();

  for (const edge of edges) {
    const key = `${edge.sourceId}:${edge.targetId}`;
    const current = best.get(key);
    if (!current || rank(edge.kind) < rank(current.kind)) {
      best.set(key, edge);
    }
  }

  return Array.from(best.values());
}

function toNode(symbol: SymbolRecord): SymbolNode {
  return {
    id: symbol.id,
    name: symbol.name,
    qualifiedName: symbol.qualifiedName,
    kind: symbol.kind,
    fileId: symbol.fileId,
    filePath: symbol.filePath,
    isExported: symbol.isExported,
    parentId: symbol.parentId,
    line: symbol.lineStart,
  };
}
