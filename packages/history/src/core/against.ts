/**
 * Compare a change against co-change history: which usual partners of the
 * changed files came along, and which were left out.
 */

import { assertNonNegative, assertNonNegativeInteger, assertPositiveInteger } from "@codepulse/core";
import { normalizePath, type FileRecord, type RelationshipStore } from "@codepulse/store";

import { commitCounts, compareText, couplingStrength, roundTo } from "./coupling.js";
import type { AgainstReport, CouplingPartner } from "./model.js";

export const DEFAULT_TOP_PARTNERS = 10;
export const DEFAULT_MIN_COCHANGES = 2;
export const DEFAULT_MIN_STRENGTH = 0.3;

export interface AgainstOptions {
  /** Partners looked up per changed file, by co-change count */
  topN?: number;
  minCochanges?: number;
  minStrength?: number;
}

export interface ResolvedPaths {
  files: FileRecord[];
  unresolved: string[];
}

/**
 * Match input paths to indexed files: exact first, then by path suffix on a
 * "/" boundary. Several suffix matches take the lexicographically first path.
 */
export function resolveChangedPaths(
  store: RelationshipStore,
  paths: readonly string[]
): ResolvedPaths {
  const files: FileRecord[] = [];
  const unresolved: string[] = [];
  const seen = new Set<number>();

  for (const input of paths) {
    const path = normalizePath(input);
    const match =
      store.findFilesByPath(path, "exact")[0] ??
      [...store.findFilesByPath(path, "suffix")].sort((a, b) => compareText(a.path, b.path))[0];

    if (!match) {
      if (!unresolved.includes(input)) unresolved.push(input);
      continue;
    }
    if (seen.has(match.id)) continue;
    seen.add(match.id);
    files.push(match);
  }

  return { files, unresolved };
}

interface PartnerTally {
  fileId: number;
  cochangeCount: number;
  strength: number;
  via: string[];
}

/**
 * Split the strongest co-change partners of the changed files into those
 * included in the change and those missing from it. A partner reached from
 * several changed files keeps its highest count and strength and lists every
 * changed file it was reached from.
 */
export function againstChangeSet(
  store: RelationshipStore,
  paths: readonly string[],
  options: AgainstOptions = {}
): AgainstReport {
  const topN = options.topN ?? DEFAULT_TOP_PARTNERS;
  const minCochanges = options.minCochanges ?? DEFAULT_MIN_COCHANGES;
  const minStrength = options.minStrength ?? DEFAULT_MIN_STRENGTH;
  assertPositiveInteger("topN", topN);
  assertNonNegativeInteger("minCochanges", minCochanges);
  assertNonNegative("minStrength", minStrength);

  const { files, unresolved } = resolveChangedPaths(store, paths);
  const report: AgainstReport = {
    resolved: files.map((f) => f.path),
    unresolved,
    includedPartners: [],
    missingCochanges: [],
  };
  if (files.length === 0) return report;

  const changed = new Set(files.map((f) => f.id));
  const commits = commitCounts(store.listFileStats());
  const included = new Map<number, PartnerTally>();
  const missing = new Map<number, PartnerTally>();

  for (const file of files) {
    for (const pair of store.listCochangePartners(file.id, topN)) {
      const partnerId = pair.fileIdA === file.id ? pair.fileIdB : pair.fileIdA;
      const strength = couplingStrength(
        pair.cochangeCount,
        commits.get(file.id),
        commits.get(partnerId)
      );
      if (pair.cochangeCount < minCochanges || strength < minStrength) continue;

      const bucket = changed.has(partnerId) ? included : missing;
      const tally = bucket.get(partnerId);
      if (!tally) {
        bucket.set(partnerId, {
          fileId: partnerId,
          cochangeCount: pair.cochangeCount,
          strength,
          via: [file.path],
        });
        continue;
      }
      tally.cochangeCount = Math.max(tally.cochangeCount, pair.cochangeCount);
      tally.strength = Math.max(tally.strength, strength);
      if (!tally.via.includes(file.path)) tally.via.push(file.path);
    }
  }

  const partnerIds = [...included.keys(), ...missing.keys()];
  const partnerPaths = new Map(store.getFilesByIds(partnerIds).map((f) => [f.id, f.path]));
  report.includedPartners = toPartners(included, partnerPaths);
  report.missingCochanges = toPartners(missing, partnerPaths);
  return report;
}

function toPartners(
  tallies: ReadonlyMap<number, PartnerTally>,
  paths: ReadonlyMap<number, string>
): CouplingPartner[] {
  const ranked = [...tallies.values()]
    .map((tally) => ({ tally, path: paths.get(tally.fileId) }))
    .filter((entry): entry is { tally: PartnerTally; path: string } => entry.path !== undefined)
    .sort(
      (a, b) =>
        b.tally.strength - a.tally.strength ||
        b.tally.cochangeCount - a.tally.cochangeCount ||
        compareText(a.path, b.path)
    );

  return ranked.map(({ tally, path }) => ({
    path,
    cochangeCount: tally.cochangeCount,
    strength: roundTo(tally.strength, 2),
    via: tally.via,
  }));
}
