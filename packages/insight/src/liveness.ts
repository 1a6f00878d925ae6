/**
 * Transitive liveness of unreferenced exports.
 *
 * An export nobody references directly may still be consumed through a
 * re-export barrel: some file importing the export's file (possibly via a
 * chain of importers) references a symbol of the same name.
 */

import { assertNonNegativeInteger } from "@codepulse/core";
import type { FileEdgeRecord, RelationshipStore, SymbolRecord } from "@codepulse/store";

import type { DeadExport, DeadExportReport, RevivedExport } from "./model.js";

export const DEFAULT_LIVENESS_HOPS = 3;

export interface LivenessOptions {
  maxHops?: number;
}

interface ReachedFile {
  fileId: number;
  hops: number;
}

/**
 * Files importing `fileId`, directly or through up to `maxHops` importer
 * hops, in hop order. The start file is never part of the result.
 */
export function importersWithin(
  importers: ReadonlyMap<number, readonly number[]>,
  fileId: number,
  maxHops: number
): ReachedFile[] {
  const visited = new Set([fileId]);
  const reached: ReachedFile[] = [];
  let frontier = [fileId];

  for (let hop = 1; hop <= maxHops && frontier.length > 0; hop++) {
    const next: number[] = [];
    for (const id of frontier) {
      for (const importer of importers.get(id) ?? []) {
        if (visited.has(importer)) continue;
        visited.add(importer);
        next.push(importer);
        reached.push({ fileId: importer, hops: hop });
      }
    }
    frontier = next;
  }
  return reached;
}

/**
 * Target file -> importing files, ascending. Self-imports are ignored.
 */
export function importerIndex(fileEdges: readonly FileEdgeRecord[]): Map<number, number[]> {
  const index = new Map<number, number[]>();
  for (const edge of fileEdges) {
    if (edge.sourceFileId === edge.targetFileId) continue;
    let sources = index.get(edge.targetFileId);
    if (!sources) {
      sources = [];
      index.set(edge.targetFileId, sources);
    }
    if (!sources.includes(edge.sourceFileId)) sources.push(edge.sourceFileId);
  }
  for (const sources of index.values()) sources.sort((a, b) => a - b);
  return index;
}

function toDeadExport(symbol: SymbolRecord): DeadExport {
  return {
    id: symbol.id,
    name: symbol.name,
    kind: symbol.kind,
    file: symbol.filePath,
    line: symbol.lineStart,
  };
}

/**
 * Classify unreferenced exports by confidence, then revive high-confidence
 * ones referenced by name within `maxHops` importer hops of their file.
 */
export function resolveDeadExports(
  store: RelationshipStore,
  options: LivenessOptions = {}
): DeadExportReport {
  const maxHops = options.maxHops ?? DEFAULT_LIVENESS_HOPS;
  assertNonNegativeInteger("maxHops", maxHops);

  const unparsedFiles = store.countFilesWithoutSymbols();
  const candidates = store.listUnreferencedExports();
  if (candidates.length === 0) return { high: [], low: [], revived: [], unparsedFiles };

  const importers = importerIndex(store.listFileEdges());
  const high: SymbolRecord[] = [];
  const low: DeadExport[] = [];
  for (const symbol of candidates) {
    if (importers.has(symbol.fileId)) high.push(symbol);
    else low.push(toDeadExport(symbol));
  }

  const reachedByFile = new Map<number, ReachedFile[]>();
  for (const symbol of high) {
    if (!reachedByFile.has(symbol.fileId)) {
      reachedByFile.set(symbol.fileId, importersWithin(importers, symbol.fileId, maxHops));
    }
  }

  const reachedIds = new Set<number>();
  for (const reached of reachedByFile.values()) {
    for (const file of reached) reachedIds.add(file.fileId);
  }

  const namesByFile = new Map<number, Set<string>>();
  for (const ref of store.listReferencedNamesInFiles([...reachedIds])) {
    let names = namesByFile.get(ref.fileId);
    if (!names) {
      names = new Set();
      namesByFile.set(ref.fileId, names);
    }
    names.add(ref.name);
  }
  const paths = new Map(store.getFilesByIds([...reachedIds]).map((f) => [f.id, f.path]));

  const dead: DeadExport[] = [];
  const revived: RevivedExport[] = [];
  for (const symbol of high) {
    const evidence = (reachedByFile.get(symbol.fileId) ?? []).find((file) =>
      namesByFile.get(file.fileId)?.has(symbol.name)
    );
    if (!evidence) {
      dead.push(toDeadExport(symbol));
      continue;
    }
    revived.push({
      ...toDeadExport(symbol),
      evidenceFile: paths.get(evidence.fileId) ?? String(evidence.fileId),
      hops: evidence.hops,
    });
  }

  return { high: dead, low, revived, unparsedFiles };
}
