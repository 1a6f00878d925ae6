/**
 * Topological layers over the condensation DAG, and edges that cut across them.
 */

import { condensation } from "./cycles.js";
import type { DirectedGraph } from "./DirectedGraph.js";
import type { SymbolGraph } from "./builder.js";
import type {
  ArchitectureShape,
  DependencyChain,
  LayerGroup,
  LayerSummary,
  LayerViolation,
} from "./model.js";

/**
 * Kahn's algorithm; ready nodes are taken in insertion order.
 */
function topologicalOrder<N>(dag: DirectedGraph<N>): number[] {
  const remaining = new Map<number, number>();
  const queue: number[] = [];
  for (const id of dag.nodeIds()) {
    const degree = dag.inDegree(id);
    remaining.set(id, degree);
    if (degree === 0) queue.push(id);
  }

  const order: number[] = [];
  for (let head = 0; head < queue.length; head++) {
    const id = queue[head];
    order.push(id);
    for (const next of dag.successors(id)) {
      const left = (remaining.get(next) ?? 0) - 1;
      remaining.set(next, left);
      if (left === 0) queue.push(next);
    }
  }
  return order;
}

/**
 * Layer of every symbol: the longest path from any source of the
 * condensation DAG to the symbol's component. Members of one cycle share
 * a layer. An empty graph has no layers.
 */
export function detectLayers(graph: SymbolGraph): Map<number, number> {
  const layers = new Map<number, number>();
  if (graph.isEmpty()) return layers;

  const { dag, mapping } = condensation(graph);
  const componentLayer = new Map<number, number>();

  for (const id of topologicalOrder(dag)) {
    let layer = 0;
    for (const pred of dag.predecessors(id)) {
      layer = Math.max(layer, (componentLayer.get(pred) ?? 0) + 1);
    }
    componentLayer.set(id, layer);
  }

  for (const [component, members] of mapping) {
    const layer = componentLayer.get(component) ?? 0;
    for (const member of members) layers.set(member, layer);
  }
  return layers;
}

/**
 * Edges pointing from a layer to a strictly higher one.
 * Same-layer edges never count. Output follows the graph's edge order.
 */
export function findViolations(
  graph: SymbolGraph,
  layerMap: ReadonlyMap<number, number>
): LayerViolation[] {
  const violations: LayerViolation[] = [];
  for (const edge of graph.edges()) {
    const sourceLayer = layerMap.get(edge.source);
    const targetLayer = layerMap.get(edge.target);
    if (sourceLayer === undefined || targetLayer === undefined) continue;

    if (targetLayer > sourceLayer) {
      violations.push({ source: edge.source, sourceLayer, target: edge.target, targetLayer });
    }
  }
  return violations;
}

/**
 * Longest path through the condensation DAG, one representative symbol per
 * component (highest total degree, lowest id on ties).
 * Null when the path has fewer than two components.
 */
export function deepestChain(graph: SymbolGraph): DependencyChain | null {
  if (graph.isEmpty()) return null;

  const { dag, mapping } = condensation(graph);
  const distance = new Map<number, number>();
  const previous = new Map<number, number>();

  for (const id of topologicalOrder(dag)) {
    let best = 0;
    for (const pred of dag.predecessors(id)) {
      const candidate = (distance.get(pred) ?? 0) + 1;
      if (candidate > best) {
        best = candidate;
        previous.set(id, pred);
      }
    }
    distance.set(id, best);
  }

  let end: number | null = null;
  let longest = -1;
  for (const [id, dist] of distance) {
    if (dist > longest || (dist === longest && end !== null && id < end)) {
      longest = dist;
      end = id;
    }
  }
  if (end === null || longest < 1) return null;

  const path: number[] = [];
  for (let cursor: number | undefined = end; cursor !== undefined; cursor = previous.get(cursor)) {
    path.push(cursor);
  }
  path.reverse();

  const symbols = path.map((component) => representative(graph, mapping.get(component) ?? []));
  return { symbols, length: symbols.length };
}

function representative(graph: SymbolGraph, members: readonly number[]): number {
  let best = members[0];
  for (const member of members) {
    if (graph.degree(member) > graph.degree(best)) best = member;
  }
  return best;
}

/**
 * Group symbols by layer and classify the overall shape.
 * Flat: at most two layers, or more than 80% of symbols in layer 0.
 * Moderate: more than 50% in layer 0.
 */
export function summarizeLayers(
  graph: SymbolGraph,
  layerMap: ReadonlyMap<number, number>
): LayerSummary {
  const groups = new Map<number, LayerGroup>();
  for (const [id, layer] of layerMap) {
    const node = graph.getNode(id);
    if (!node) continue;
    let group = groups.get(layer);
    if (!group) {
      group = { layer, symbols: [] };
      groups.set(layer, group);
    }
    group.symbols.push({ id, name: node.name, kind: node.kind });
  }

  const layers = Array.from(groups.values()).sort((a, b) => a.layer - b.layer);
  for (const group of layers) {
    group.symbols.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : a.id - b.id));
  }

  const total = layers.reduce((sum, group) => sum + group.symbols.length, 0);
  const base = groups.get(0)?.symbols.length ?? 0;
  const baseLayerPct = total > 0 ? Math.round((base * 1000) / total) / 10 : 0;
  const maxLayer = layers.length > 0 ? layers[layers.length - 1].layer : -1;

  return {
    totalLayers: maxLayer + 1,
    shape: classifyShape(maxLayer, baseLayerPct),
    baseLayerPct,
    layers,
  };
}

function classifyShape(maxLayer: number, baseLayerPct: number): ArchitectureShape {
  if (maxLayer <= 1 || baseLayerPct > 80) return "flat";
  if (baseLayerPct > 50) return "moderate";
  return "well-layered";
}
