/**
 * Fan-in/fan-out: the most connected symbols or files.
 */

import { assertPositiveInteger } from "@codepulse/core";
import type { RelationshipStore } from "@codepulse/store";

import type { FanFlag, FanMode, FanReport, FileFan, SymbolFan } from "./model.js";

export const DEFAULT_FAN_COUNT = 20;

/** Degree above which a symbol counts as a hub or spreader */
export const SYMBOL_FAN_THRESHOLD = 10;

/** Same for files, counted in distinct importing/imported files */
export const FILE_FAN_THRESHOLD = 5;

export interface FanQuery {
  mode?: FanMode;
  count?: number;
}

export function fanFlag(fanIn: number, fanOut: number, threshold: number): FanFlag | null {
  if (fanIn > threshold && fanOut > threshold) return "high-risk";
  if (fanIn > threshold) return "hub";
  if (fanOut > threshold) return "spreader";
  return null;
}

/**
 * Rank by fan-in plus fan-out, largest first. Nodes without any
 * connection are left out.
 */
export function fanReport(store: RelationshipStore, query: FanQuery = {}): FanReport {
  const count = query.count ?? DEFAULT_FAN_COUNT;
  assertPositiveInteger("count", count);

  return query.mode === "file"
    ? { mode: "file", items: fileFan(store, count) }
    : { mode: "symbol", items: symbolFan(store, count) };
}

function symbolFan(store: RelationshipStore, count: number): SymbolFan[] {
  const ranked = store
    .listGraphMetrics()
    .filter((m) => m.inDegree + m.outDegree > 0)
    .sort((a, b) => b.inDegree + b.outDegree - (a.inDegree + a.outDegree) || a.symbolId - b.symbolId)
    .slice(0, count);

  const symbols = new Map(
    store.getSymbolsByIds(ranked.map((m) => m.symbolId)).map((s) => [s.id, s])
  );

  const items: SymbolFan[] = [];
  for (const m of ranked) {
    // metrics for symbols no longer in the index
    const symbol = symbols.get(m.symbolId);
    if (!symbol) continue;

    items.push({
      name: symbol.name,
      kind: symbol.kind,
      fanIn: m.inDegree,
      fanOut: m.outDegree,
      total: m.inDegree + m.outDegree,
      betweenness: Math.round(m.betweenness * 10) / 10,
      pagerank: Math.round(m.pagerank * 10000) / 10000,
      file: symbol.filePath,
      line: symbol.lineStart,
      flag: fanFlag(m.inDegree, m.outDegree, SYMBOL_FAN_THRESHOLD),
    });
  }
  return items;
}

function fileFan(store: RelationshipStore, count: number): FileFan[] {
  const importers = new Map<number, Set<number>>();
  const imports = new Map<number, Set<number>>();
  const add = (index: Map<number, Set<number>>, key: number, value: number): void => {
    let set = index.get(key);
    if (!set) {
      set = new Set();
      index.set(key, set);
    }
    set.add(value);
  };

  for (const edge of store.listFileEdges()) {
    add(importers, edge.targetFileId, edge.sourceFileId);
    add(imports, edge.sourceFileId, edge.targetFileId);
  }

  const items: FileFan[] = [];
  for (const file of store.listFiles()) {
    const fanIn = importers.get(file.id)?.size ?? 0;
    const fanOut = imports.get(file.id)?.size ?? 0;
    if (fanIn + fanOut === 0) continue;

    items.push({
      path: file.path,
      fanIn,
      fanOut,
      total: fanIn + fanOut,
      flag: fanFlag(fanIn, fanOut, FILE_FAN_THRESHOLD),
    });
  }

  return items
    .sort((a, b) => b.total - a.total || compareText(a.path, b.path))
    .slice(0, count);
}

function compareText(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}
