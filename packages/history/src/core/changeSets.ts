/**
 * Recurring change sets: commits of three or more files whose exact file
 * set shows up again in later commits.
 */

import { assertPositiveInteger } from "@codepulse/core";
import type { RelationshipStore } from "@codepulse/store";

import { compareText, loadStructuralPairs, pairKey, roundTo } from "./coupling.js";
import type { ChangeSet } from "./model.js";

export const DEFAULT_SET_COUNT = 20;
export const DEFAULT_MIN_OCCURRENCES = 2;

/** Commits touching fewer files are not recorded as change sets */
export const MIN_CHANGE_SET_SIZE = 3;

export interface ChangeSetOptions {
  count?: number;
  minOccurrences?: number;
}

interface SetTally {
  fileIds: number[];
  files: string[];
  occurrences: number;
}

/**
 * Count each distinct file set across commits and keep those seen at least
 * `minOccurrences` times. Ordered by occurrences, size and structural share
 * (all descending), then by paths.
 */
export function recurringChangeSets(
  store: RelationshipStore,
  options: ChangeSetOptions = {}
): ChangeSet[] {
  const count = options.count ?? DEFAULT_SET_COUNT;
  const minOccurrences = options.minOccurrences ?? DEFAULT_MIN_OCCURRENCES;
  assertPositiveInteger("count", count);
  assertPositiveInteger("minOccurrences", minOccurrences);

  const members = store.listHyperedgeMembers(MIN_CHANGE_SET_SIZE);
  if (members.length === 0) return [];

  const byCommit = new Map<number, Array<{ fileId: number; path: string }>>();
  for (const member of members) {
    let group = byCommit.get(member.hyperedgeId);
    if (!group) {
      group = [];
      byCommit.set(member.hyperedgeId, group);
    }
    group.push({ fileId: member.fileId, path: member.filePath });
  }

  const tallies = new Map<string, SetTally>();
  for (const group of byCommit.values()) {
    const ordered = [...group].sort((a, b) => a.fileId - b.fileId);
    const fileIds = ordered.map((m) => m.fileId);
    const key = fileIds.join(",");

    const tally = tallies.get(key);
    if (tally) {
      tally.occurrences++;
    } else {
      tallies.set(key, { fileIds, files: ordered.map((m) => m.path), occurrences: 1 });
    }
  }

  const structural = loadStructuralPairs(store.listFileEdges());
  const sets: ChangeSet[] = [];
  for (const tally of tallies.values()) {
    if (tally.occurrences < minOccurrences) continue;
    sets.push({
      files: tally.files,
      size: tally.fileIds.length,
      occurrences: tally.occurrences,
      structuralCouplingPct: structuralShare(tally.fileIds, structural),
    });
  }

  return sets
    .sort(
      (a, b) =>
        b.occurrences - a.occurrences ||
        b.size - a.size ||
        b.structuralCouplingPct - a.structuralCouplingPct ||
        comparePaths(a.files, b.files)
    )
    .slice(0, count);
}

function structuralShare(fileIds: readonly number[], structural: ReadonlySet<string>): number {
  let pairs = 0;
  let joined = 0;
  for (let i = 0; i < fileIds.length; i++) {
    for (let j = i + 1; j < fileIds.length; j++) {
      pairs++;
      if (structural.has(pairKey(fileIds[i], fileIds[j]))) joined++;
    }
  }
  return pairs > 0 ? roundTo((joined * 100) / pairs, 1) : 0;
}

function comparePaths(a: readonly string[], b: readonly string[]): number {
  const shared = Math.min(a.length, b.length);
  for (let i = 0; i < shared; i++) {
    const order = compareText(a[i], b[i]);
    if (order !== 0) return order;
  }
  return a.length - b.length;
}
