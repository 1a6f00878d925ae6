/**
 * Pairwise temporal coupling from co-change counts and commit statistics.
 */

import { assertNonNegative, assertPositiveInteger } from "@codepulse/core";
import type { FileEdgeRecord, FileStatsRecord, RelationshipStore } from "@codepulse/store";

import type { CouplingPair, PairReport } from "./model.js";

export const DEFAULT_PAIR_COUNT = 20;

/** File edges below this symbol count are not structural evidence */
export const STRUCTURAL_MIN_SYMBOLS = 2;

/**
 * Key of an unordered file pair.
 */
export function pairKey(a: number, b: number): string {
  return a < b ? `${a}:${b}` : `${b}:${a}`;
}

/**
 * Co-changes normalized by the average commit count of both files.
 * Unknown or zero commit counts count as one commit.
 */
export function couplingStrength(
  cochangeCount: number,
  commitsA: number | undefined,
  commitsB: number | undefined
): number {
  assertNonNegative("cochangeCount", cochangeCount);
  const a = commitsA !== undefined && commitsA > 0 ? commitsA : 1;
  const b = commitsB !== undefined && commitsB > 0 ? commitsB : 1;
  return cochangeCount / ((a + b) / 2);
}

/**
 * Unordered file pairs joined by an import edge carrying at least two symbols.
 */
export function loadStructuralPairs(fileEdges: readonly FileEdgeRecord[]): Set<string> {
  const pairs = new Set<string>();
  for (const edge of fileEdges) {
    if (edge.symbolCount >= STRUCTURAL_MIN_SYMBOLS) {
      pairs.add(pairKey(edge.sourceFileId, edge.targetFileId));
    }
  }
  return pairs;
}

export function commitCounts(stats: readonly FileStatsRecord[]): Map<number, number> {
  return new Map(stats.map((s) => [s.fileId, s.commitCount]));
}

export function roundTo(value: number, digits: number): number {
  const factor = 10 ** digits;
  return Math.round(value * factor) / factor;
}

export interface PairOptions {
  count?: number;
}

/**
 * The most frequently co-changed file pairs, flagged when no import edge
 * explains the coupling. Ordered by co-change count, then paths.
 */
export function temporalCouplingPairs(
  store: RelationshipStore,
  options: PairOptions = {}
): PairReport {
  const count = options.count ?? DEFAULT_PAIR_COUNT;
  assertPositiveInteger("count", count);

  const cochanges = store.listCochanges();
  if (cochanges.length === 0) return { pairs: [], hiddenCouplingCount: 0 };

  const paths = new Map(store.listFiles().map((f) => [f.id, f.path]));
  const structural = loadStructuralPairs(store.listFileEdges());
  const commits = commitCounts(store.listFileStats());

  const pairs: CouplingPair[] = [];
  for (const pair of cochanges) {
    const fileA = paths.get(pair.fileIdA);
    const fileB = paths.get(pair.fileIdB);
    if (fileA === undefined || fileB === undefined) continue;

    const strength = couplingStrength(
      pair.cochangeCount,
      commits.get(pair.fileIdA),
      commits.get(pair.fileIdB)
    );
    pairs.push({
      fileA,
      fileB,
      cochangeCount: pair.cochangeCount,
      strength: roundTo(strength, 2),
      hasStructuralEdge: structural.has(pairKey(pair.fileIdA, pair.fileIdB)),
    });
  }

  pairs.sort(
    (a, b) =>
      b.cochangeCount - a.cochangeCount ||
      compareText(a.fileA, b.fileA) ||
      compareText(a.fileB, b.fileB)
  );
  const top = pairs.slice(0, count);

  return {
    pairs: top,
    hiddenCouplingCount: top.filter((p) => !p.hasStructuralEdge).length,
  };
}

export function compareText(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}
