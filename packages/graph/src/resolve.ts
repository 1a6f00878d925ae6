/**
 * Symbol lookup from a user-supplied name.
 */

import { Err, Ok, type Result } from "@codepulse/core";
import type { RelationshipStore, SymbolRecord } from "@codepulse/store";

const SEARCH_LIMIT = 10;

export interface SymbolCandidate {
  id: number;
  name: string;
  qualifiedName: string | null;
  kind: string;
  filePath: string;
  line: number;
}

export type ResolutionError =
  | { kind: "not_found"; query: string; message: string }
  | { kind: "ambiguous"; query: string; candidates: SymbolCandidate[]; message: string };

/**
 * Resolve by qualified name, then exact name, then substring search.
 *
 * A single match wins. Several matches resolve to the most referenced one
 * if it has any incoming edge; otherwise the candidates are returned.
 */
export function resolveSymbol(
  store: RelationshipStore,
  query: string
): Result<SymbolRecord, ResolutionError> {
  const lookups: Array<() => SymbolRecord[]> = [
    () => store.findSymbolsByQualifiedName(query),
    () => store.findSymbolsByName(query),
    () => store.searchSymbols(query, SEARCH_LIMIT),
  ];

  for (const lookup of lookups) {
    const matches = lookup();
    if (matches.length === 0) continue;
    if (matches.length === 1) return Ok(matches[0]);

    const best = mostReferenced(store, matches);
    if (best) return Ok(best);

    return Err<ResolutionError>({
      kind: "ambiguous",
      query,
      candidates: matches.map(toCandidate),
      message: `"${query}" matches ${matches.length} symbols; use a qualified name`,
    });
  }

  return Err<ResolutionError>({ kind: "not_found", query, message: `Symbol not found: ${query}` });
}

function mostReferenced(
  store: RelationshipStore,
  matches: readonly SymbolRecord[]
): SymbolRecord | null {
  const counts = store.countIncomingEdges(matches.map((m) => m.id));

  let best = matches[0];
  for (const match of matches) {
    if ((counts.get(match.id) ?? 0) > (counts.get(best.id) ?? 0)) best = match;
  }
  return (counts.get(best.id) ?? 0) > 0 ? best : null;
}

function toCandidate(symbol: SymbolRecord): SymbolCandidate {
  return {
    id: symbol.id,
    name: symbol.name,
    qualifiedName: symbol.qualifiedName,
    kind: symbol.kind,
    filePath: symbol.filePath,
    line: symbol.lineStart,
  };
}
