/**
 * Gate coverage: which entry points can reach a required gate symbol
 * (an auth check, a validator) through calls.
 */

import { minimatch } from "minimatch";
import { Err, Ok, assertHopCap, type Result } from "@codepulse/core";
import type { SymbolRecord } from "@codepulse/store";

import type { SymbolGraph } from "./builder.js";
import { DEFAULT_MAX_HOPS } from "./traversal.js";
import type { CoverageResult, CoveredEntry, UncoveredEntry } from "./model.js";

/** Gate searches only follow direct calls and uses */
export const GATE_EDGE_KINDS: readonly string[] = ["call", "uses"];

export interface EntryPointFilter {
  /**
   * Glob patterns over file paths (default: every file). `*` stops at "/",
   * so `app/routes/*` skips nested files; use `app/routes/**` for those.
   */
  scope?: readonly string[];
  /** Keep only entry names matching this expression */
  namePattern?: string;
}

export interface GateFilter {
  names?: readonly string[];
  pattern?: string;
}

export interface CoverageOptions {
  maxDepth?: number;
  edgeKinds?: readonly string[];
}

export interface PatternError {
  kind: "invalid_pattern";
  /** Which filter carried the expression */
  field: "entry" | "gate";
  pattern: string;
  message: string;
}

/**
 * Compile a user-supplied name expression. An absent or empty one means no filter.
 */
export function compilePattern(
  field: PatternError["field"],
  pattern: string | undefined
): Result<RegExp | null, PatternError> {
  if (!pattern) return Ok(null);
  try {
    return Ok(new RegExp(pattern));
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    return Err<PatternError>({
      kind: "invalid_pattern",
      field,
      pattern,
      message: `Invalid ${field} pattern: ${reason}`,
    });
  }
}

/**
 * Exported top-level functions in scope, ordered by path then line.
 */
export function selectEntryPoints(
  symbols: readonly SymbolRecord[],
  filter: EntryPointFilter = {}
): SymbolRecord[] {
  const scope = filter.scope && filter.scope.length > 0 ? filter.scope : ["**"];
  const namePattern = filter.namePattern ? new RegExp(filter.namePattern) : null;

  return symbols
    .filter(
      (s) =>
        s.isExported &&
        s.parentId === null &&
        s.kind === "function" &&
        scope.some((pattern) => minimatch(s.filePath, pattern, { dot: true })) &&
        (namePattern === null || namePattern.test(s.name))
    )
    .sort(byLocation);
}

/**
 * Gate symbols matched by exact name or by a name expression.
 */
export function resolveGates(symbols: readonly SymbolRecord[], filter: GateFilter): SymbolRecord[] {
  const names = new Set(filter.names ?? []);
  const pattern = filter.pattern ? new RegExp(filter.pattern) : null;

  return symbols.filter((s) => names.has(s.name) || (pattern !== null && pattern.test(s.name)));
}

/**
 * For each entry, the shortest call chain to any gate within `maxDepth` hops.
 * An entry that is itself a gate is covered at depth 0.
 */
export function findCoverageGaps(
  graph: SymbolGraph,
  entries: readonly SymbolRecord[],
  gates: readonly SymbolRecord[],
  options: CoverageOptions = {}
): CoverageResult {
  const maxDepth = options.maxDepth ?? DEFAULT_MAX_HOPS;
  assertHopCap("maxDepth", maxDepth);

  const kinds = new Set(options.edgeKinds ?? GATE_EDGE_KINDS);
  const gateIds = new Set(gates.map((g) => g.id));
  const names = new Map<number, string>();
  for (const symbol of [...entries, ...gates]) names.set(symbol.id, symbol.name);
  const nameOf = (id: number): string => graph.getNode(id)?.name ?? names.get(id) ?? "?";

  const covered: CoveredEntry[] = [];
  const uncovered: UncoveredEntry[] = [];

  for (const entry of entries) {
    const base = {
      name: entry.name,
      kind: entry.kind,
      file: entry.filePath,
      line: entry.lineStart,
    };
    const path = gateIds.size > 0 ? pathToGate(graph, entry.id, gateIds, maxDepth, kinds) : null;

    if (path) {
      const chain = path.map(nameOf);
      covered.push({
        ...base,
        gate: chain[chain.length - 1],
        depth: path.length - 1,
        via: chain.length > 1 ? chain[chain.length - 2] : chain[0],
        chain,
      });
    } else {
      uncovered.push({
        ...base,
        reason:
          gateIds.size === 0
            ? "no gate symbol found"
            : `no gate reachable within ${maxDepth} hops`,
      });
    }
  }

  covered.sort(byEntryLocation);
  uncovered.sort(byEntryLocation);

  const total = entries.length;
  return {
    covered,
    uncovered,
    summary: {
      totalEntries: total,
      covered: covered.length,
      uncovered: uncovered.length,
      gateSymbols: gateIds.size,
      coveragePct: total > 0 ? Math.round((covered.length * 1000) / total) / 10 : 0,
    },
  };
}

function pathToGate(
  graph: SymbolGraph,
  entryId: number,
  gateIds: ReadonlySet<number>,
  maxDepth: number,
  kinds: ReadonlySet<string>
): number[] | null {
  if (gateIds.has(entryId)) return [entryId];

  const visited = new Set([entryId]);
  const queue: number[][] = [[entryId]];

  for (let head = 0; head < queue.length; head++) {
    const path = queue[head];
    if (path.length - 1 >= maxDepth) continue;

    for (const next of graph.successors(path[path.length - 1], kinds)) {
      if (visited.has(next)) continue;
      visited.add(next);

      const extended = [...path, next];
      if (gateIds.has(next)) return extended;
      queue.push(extended);
    }
  }
  return null;
}

function compareText(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

function byLocation(a: SymbolRecord, b: SymbolRecord): number {
  return compareText(a.filePath, b.filePath) || a.lineStart - b.lineStart || a.id - b.id;
}

function byEntryLocation(
  a: { file: string; line: number; name: string },
  b: { file: string; line: number; name: string }
): number {
  return compareText(a.file, b.file) || a.line - b.line || compareText(a.name, b.name);
}
