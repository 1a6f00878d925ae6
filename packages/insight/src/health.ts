/**
 * Codebase health: a 0-100 score from capped penalties.
 */

import { assertNonNegative } from "@codepulse/core";
import {
  buildGraph,
  detectLayers,
  findCycles,
  findViolations,
  type LayerViolation,
  type SymbolGraph,
} from "@codepulse/graph";
import type { GraphMetricsRecord, RelationshipStore } from "@codepulse/store";

import type { HealthInputs, HealthMetrics } from "./model.js";

/** In + out degree above this makes a god component */
export const GOD_COMPONENT_DEGREE = 20;

/** Betweenness above this makes a bottleneck */
export const BOTTLENECK_BETWEENNESS = 0.5;

const HEALTH_INPUT_FIELDS: ReadonlyArray<keyof HealthInputs> = [
  "symbols",
  "cycles",
  "godComponents",
  "bottlenecks",
  "deadExports",
  "layerViolations",
];

/**
 * Score = 100 - floor(penalty), clamped to 0..100. A codebase without
 * symbols scores 100.
 */
export function computeHealthScore(inputs: HealthInputs): number {
  for (const field of HEALTH_INPUT_FIELDS) {
    assertNonNegative(field, inputs[field]);
  }

  const { symbols, cycles, godComponents, bottlenecks, deadExports, layerViolations } = inputs;
  if (symbols === 0) return 100;

  const issues = cycles + godComponents + bottlenecks + layerViolations;
  const penalty =
    Math.min(20, cycles * 3) +
    Math.min(15, godComponents * 2) +
    Math.min(15, bottlenecks * 2) +
    Math.min(25, (deadExports * 100) / symbols) +
    Math.min(15, layerViolations * 3) +
    Math.min(10, Math.max(0, issues - 5));

  return Math.max(0, Math.min(100, 100 - Math.floor(penalty)));
}

export function isGodComponent(metrics: GraphMetricsRecord): boolean {
  return metrics.inDegree + metrics.outDegree > GOD_COMPONENT_DEGREE;
}

export function isBottleneck(metrics: GraphMetricsRecord): boolean {
  return metrics.betweenness > BOTTLENECK_BETWEENNESS;
}

/**
 * The symbol graph with its cycles and layer violations.
 */
export interface StructureAnalysis {
  graph: SymbolGraph;
  cycles: number[][];
  /** null when no layers were detected */
  violations: LayerViolation[] | null;
}

export function analyzeStructure(store: RelationshipStore): StructureAnalysis {
  const graph = buildGraph(store.listEdges(), store.listSymbols());
  const layerMap = detectLayers(graph);
  return {
    graph,
    cycles: findCycles(graph),
    violations: layerMap.size > 0 ? findViolations(graph, layerMap) : null,
  };
}

/**
 * Gather every health input from the store and score it.
 * Dead exports are counted before any liveness check.
 */
export function collectHealthMetrics(
  store: RelationshipStore,
  structure: StructureAnalysis = analyzeStructure(store)
): HealthMetrics {
  const counts = store.counts();
  const { cycles, violations } = structure;

  const metrics = store.listGraphMetrics();
  const inputs: HealthInputs = {
    symbols: counts.symbols,
    cycles: cycles.length,
    godComponents: metrics.filter(isGodComponent).length,
    bottlenecks: metrics.filter(isBottleneck).length,
    deadExports: store.listUnreferencedExports().length,
    layerViolations: violations?.length ?? 0,
  };

  const inCycles = cycles.reduce((sum, cycle) => sum + cycle.length, 0);
  const tangleRatio =
    counts.symbols > 0 ? Math.round((inCycles * 1000) / counts.symbols) / 10 : 0;

  return {
    files: counts.files,
    edges: counts.edges,
    ...inputs,
    tangleRatio,
    healthScore: computeHealthScore(inputs),
  };
}
