/**
 * GraphService - runs the graph analyses against a relationship store.
 * Every call builds its own graph from the store; nothing is cached between calls.
 */

import { Ok, andThen, map, type Result } from "@codepulse/core";
import type { GraphMetricsRecord, RelationshipStore, SymbolRecord } from "@codepulse/store";

import { buildGraph, type SymbolGraph } from "../builder.js";
import { describeCycles, findCycles, condense } from "../cycles.js";
import { deepestChain, detectLayers, findViolations, summarizeLayers } from "../layers.js";
import {
  affectedTests,
  blastRadius,
  entryPointsReaching,
  shortestPath,
  type AffectedTestsOptions,
  type EntryPointOptions,
} from "../traversal.js";
import {
  compilePattern,
  findCoverageGaps,
  resolveGates,
  selectEntryPoints,
  type CoverageOptions,
  type EntryPointFilter,
  type GateFilter,
  type PatternError,
} from "../coverage.js";
import { resolveSymbol, type ResolutionError } from "../resolve.js";
import type {
  AffectedTest,
  BlastRadius,
  CoverageResult,
  CycleReport,
  EntryPointHit,
  LayerSummary,
  LayerViolation,
  PathStep,
} from "../model.js";

export interface ClusterReport extends CycleReport {
  /** Most common name prefix among the members */
  label: string;
}

export interface CycleAnalysis {
  totalSymbols: number;
  symbolsInCycles: number;
  cycles: ClusterReport[];
}

export interface NamedViolation extends LayerViolation {
  sourceName: string;
  targetName: string;
}

export interface LayerAnalysis {
  summary: LayerSummary;
  violations: NamedViolation[];
  /** Names along the deepest dependency chain, if there is one */
  deepestChain: string[] | null;
}

export interface SymbolAnalysis<T> {
  symbol: SymbolRecord;
  result: T;
}

export interface PathAnalysis {
  from: SymbolRecord;
  to: SymbolRecord;
  path: PathStep[] | null;
}

export type CoverageQuery = EntryPointFilter & GateFilter & CoverageOptions;

export class GraphService {
  constructor(private readonly store: RelationshipStore) {}

  /**
   * Build a fresh graph over every symbol edge in the store.
   */
  loadGraph(): SymbolGraph {
    return buildGraph(this.store.listEdges(), this.store.listSymbols());
  }

  cycles(minSize: number = 2): CycleAnalysis {
    const graph = this.loadGraph();
    const cycles = findCycles(graph, minSize);
    const { dag, componentOf } = condense(graph, cycles);

    const reports = describeCycles(graph, cycles).map((report, index) => {
      const component = componentOf.get(cycles[index][0]);
      const node = component === undefined ? undefined : dag.getNode(component);
      return { ...report, label: node?.label ?? `scc_${index}` };
    });

    return {
      totalSymbols: graph.order,
      symbolsInCycles: cycles.reduce((sum, cycle) => sum + cycle.length, 0),
      cycles: reports,
    };
  }

  layers(): LayerAnalysis {
    const graph = this.loadGraph();
    const layerMap = detectLayers(graph);
    const nameOf = (id: number): string => graph.getNode(id)?.name ?? "?";

    const chain = deepestChain(graph);
    return {
      summary: summarizeLayers(graph, layerMap),
      violations: findViolations(graph, layerMap).map((v) => ({
        ...v,
        sourceName: nameOf(v.source),
        targetName: nameOf(v.target),
      })),
      deepestChain: chain ? chain.symbols.map(nameOf) : null,
    };
  }

  blastRadius(query: string): Result<SymbolAnalysis<BlastRadius>, ResolutionError> {
    return map(resolveSymbol(this.store, query), (symbol) => ({
      symbol,
      result: blastRadius(this.loadGraph(), symbol.id),
    }));
  }

  affectedTests(
    query: string,
    options: AffectedTestsOptions = {}
  ): Result<SymbolAnalysis<AffectedTest[]>, ResolutionError> {
    return map(resolveSymbol(this.store, query), (symbol) => ({
      symbol,
      result: affectedTests(this.loadGraph(), symbol.id, options),
    }));
  }

  entryPoints(
    query: string,
    options: EntryPointOptions = {}
  ): Result<SymbolAnalysis<EntryPointHit[]>, ResolutionError> {
    return map(resolveSymbol(this.store, query), (symbol) => ({
      symbol,
      result: entryPointsReaching(this.loadGraph(), symbol.id, this.metricsById(), options),
    }));
  }

  coverageGaps(query: CoverageQuery): Result<CoverageResult, PatternError> {
    return andThen(compilePattern("entry", query.namePattern), () =>
      andThen(compilePattern("gate", query.pattern), () => {
        const symbols = this.store.listSymbols();
        const entries = selectEntryPoints(symbols, query);
        const gates = resolveGates(symbols, query);
        return Ok(findCoverageGaps(this.loadGraph(), entries, gates, query));
      })
    );
  }

  trace(fromQuery: string, toQuery: string): Result<PathAnalysis, ResolutionError> {
    return andThen(resolveSymbol(this.store, fromQuery), (from) =>
      andThen(resolveSymbol(this.store, toQuery), (to) =>
        Ok({ from, to, path: shortestPath(this.loadGraph(), from.id, to.id) })
      )
    );
  }

  private metricsById(): Map<number, GraphMetricsRecord> {
    return new Map(this.store.listGraphMetrics().map((m) => [m.symbolId, m]));
  }
}
