/**
 * Strongly connected components, condensation and cycle-breaking hints.
 */

import { assertPositiveInteger } from "@codepulse/core";

import { DirectedGraph } from "./DirectedGraph.js";
import type { SymbolGraph } from "./builder.js";
import type {
  Condensation,
  CondensedNode,
  CycleReport,
  CycleSymbol,
  WeakestEdge,
} from "./model.js";

interface TarjanFrame {
  node: number;
  neighbors: number[];
  next: number;
}

/**
 * Tarjan's algorithm with an explicit work stack.
 * Every node lands in exactly one component; members are sorted ascending.
 */
export function stronglyConnectedComponents<N>(graph: DirectedGraph<N>): number[][] {
  const index = new Map<number, number>();
  const lowlink = new Map<number, number>();
  const onStack = new Set<number>();
  const stack: number[] = [];
  const components: number[][] = [];
  let counter = 0;

  const low = (id: number): number => lowlink.get(id) ?? 0;

  for (const root of graph.nodeIds()) {
    if (index.has(root)) continue;

    const work: TarjanFrame[] = [];
    const enter = (node: number): void => {
      index.set(node, counter);
      lowlink.set(node, counter);
      counter++;
      stack.push(node);
      onStack.add(node);
      work.push({ node, neighbors: graph.successors(node), next: 0 });
    };

    enter(root);

    while (work.length > 0) {
      const frame = work[work.length - 1];

      if (frame.next < frame.neighbors.length) {
        const neighbor = frame.neighbors[frame.next++];
        const neighborIndex = index.get(neighbor);
        if (neighborIndex === undefined) {
          enter(neighbor);
        } else if (onStack.has(neighbor)) {
          lowlink.set(frame.node, Math.min(low(frame.node), neighborIndex));
        }
        continue;
      }

      work.pop();
      if (work.length > 0) {
        const parent = work[work.length - 1];
        lowlink.set(parent.node, Math.min(low(parent.node), low(frame.node)));
      }

      if (low(frame.node) === index.get(frame.node)) {
        const component: number[] = [];
        for (;;) {
          const member = stack.pop();
          if (member === undefined) break;
          onStack.delete(member);
          component.push(member);
          if (member === frame.node) break;
        }
        components.push(component.sort((a, b) => a - b));
      }
    }
  }

  return components;
}

/**
 * Components with at least `minSize` members, largest first.
 * Equal sizes are ordered by their smallest member id.
 */
export function findCycles(graph: SymbolGraph, minSize: number = 2): number[][] {
  assertPositiveInteger("minSize", minSize);
  if (graph.isEmpty()) return [];

  return stronglyConnectedComponents(graph)
    .filter((component) => component.length >= minSize)
    .sort((a, b) => b.length - a.length || a[0] - b[0]);
}

/**
 * Collapse every strongly connected component into one node.
 * Component ids follow the ascending order of each component's smallest member.
 */
export function condensation(graph: SymbolGraph): Condensation {
  const components = stronglyConnectedComponents(graph).sort((a, b) => a[0] - b[0]);

  const dag = new DirectedGraph<CondensedNode>();
  const mapping = new Map<number, number[]>();
  const componentOf = new Map<number, number>();

  components.forEach((members, id) => {
    dag.addNode(id, {
      id,
      members,
      memberCount: members.length,
      label: clusterLabel(graph, members, id),
    });
    mapping.set(id, members);
    for (const member of members) componentOf.set(member, id);
  });

  for (const edge of graph.edges()) {
    const from = componentOf.get(edge.source);
    const to = componentOf.get(edge.target);
    if (from === undefined || to === undefined || from === to) continue;
    for (const kind of edge.kinds) dag.addEdge(from, to, kind);
  }

  return { dag, mapping, componentOf };
}

/**
 * Condensation DAG for a graph known to contain cycles.
 * An empty graph or an empty cycle list gives an empty DAG and mapping.
 */
export function condense(graph: SymbolGraph, cycles: readonly number[][]): Condensation {
  if (graph.isEmpty() || cycles.length === 0) {
    return {
      dag: new DirectedGraph<CondensedNode>(),
      mapping: new Map<number, number[]>(),
      componentOf: new Map<number, number>(),
    };
  }
  return condensation(graph);
}

/**
 * Name prefix shared by most members: the name cut at its last "." or,
 * failing that, its last "_" (neither at position 0), else the full name.
 * Ties go to the prefix seen first in member order.
 */
function clusterLabel(graph: SymbolGraph, members: readonly number[], id: number): string {
  const counts = new Map<string, number>();
  for (const member of members) {
    const name = graph.getNode(member)?.name;
    if (!name) continue;
    const prefix = namePrefix(name);
    counts.set(prefix, (counts.get(prefix) ?? 0) + 1);
  }

  let label: string | null = null;
  let best = 0;
  for (const [prefix, count] of counts) {
    if (count > best) {
      best = count;
      label = prefix;
    }
  }
  return label ?? `scc_${id}`;
}

export function namePrefix(name: string): string {
  for (const separator of [".", "_"]) {
    const idx = name.lastIndexOf(separator);
    if (idx > 0) return name.slice(0, idx);
  }
  return name;
}

/**
 * Suggest one edge to remove to break a cycle.
 *
 * Scores each edge inside the component by (source out-degree, target
 * in-degree), both counted over internal edges only, and returns the highest.
 * The first edge wins a tie.
 */
export function findWeakestEdge(
  graph: SymbolGraph,
  members: readonly number[]
): WeakestEdge | null {
  const memberSet = new Set(members);
  if (memberSet.size < 2) return null;

  const internal = graph
    .edges()
    .filter((edge) => memberSet.has(edge.source) && memberSet.has(edge.target));
  if (internal.length === 0) return null;

  const outDegree = new Map<number, number>();
  const inDegree = new Map<number, number>();
  for (const edge of internal) {
    outDegree.set(edge.source, (outDegree.get(edge.source) ?? 0) + 1);
    inDegree.set(edge.target, (inDegree.get(edge.target) ?? 0) + 1);
  }

  let best: { source: number; target: number; out: number; in: number } | null = null;
  for (const edge of internal) {
    const out = outDegree.get(edge.source) ?? 0;
    const inc = inDegree.get(edge.target) ?? 0;
    if (!best || out > best.out || (out === best.out && inc > best.in)) {
      best = { source: edge.source, target: edge.target, out, in: inc };
    }
  }
  if (!best) return null;

  const plural = best.out === 1 ? "" : "s";
  return {
    source: best.source,
    target: best.target,
    reason: `source has ${best.out} outgoing edge${plural} in cycle, target has ${best.in} incoming`,
  };
}

/**
 * Annotate cycles with member names, files and a suggested edge to break.
 */
export function describeCycles(graph: SymbolGraph, cycles: readonly number[][]): CycleReport[] {
  return cycles.map((cycle) => {
    const symbols: CycleSymbol[] = [];
    for (const id of cycle) {
      const node = graph.getNode(id);
      if (node) {
        symbols.push({ id, name: node.name, kind: node.kind, filePath: node.filePath });
      }
    }
    const files = Array.from(new Set(symbols.map((s) => s.filePath))).sort();

    return {
      symbols,
      files,
      size: cycle.length,
      weakestEdge: findWeakestEdge(graph, cycle),
    };
  });
}
