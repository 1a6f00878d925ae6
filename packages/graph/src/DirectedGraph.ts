/**
 * Simple directed graph keyed by integer ids.
 *
 * Parallel edges collapse into one edge that remembers every kind seen.
 * Iteration follows insertion order, so a graph built from ordered input
 * traverses deterministically.
 */

export interface GraphEdge {
  source: number;
  target: number;
  kinds: ReadonlySet<string>;
}

export class DirectedGraph<N> {
  private readonly attrs = new Map<number, N>();
  private readonly outgoing = new Map<number, Map<number, Set<string>>>();
  private readonly incoming = new Map<number, Map<number, Set<string>>>();
  private edgeCount = 0;

  /** Number of nodes */
  get order(): number {
    return this.attrs.size;
  }

  /** Number of distinct (source, target) edges */
  get size(): number {
    return this.edgeCount;
  }

  isEmpty(): boolean {
    return this.attrs.size === 0;
  }

  addNode(id: number, attributes: N): void {
    this.attrs.set(id, attributes);
    if (!this.outgoing.has(id)) this.outgoing.set(id, new Map());
    if (!this.incoming.has(id)) this.incoming.set(id, new Map());
  }

  hasNode(id: number): boolean {
    return this.attrs.has(id);
  }

  getNode(id: number): N | undefined {
    return this.attrs.get(id);
  }

  nodeIds(): number[] {
    return Array.from(this.attrs.keys());
  }

  /**
   * Add an edge between two existing nodes. Returns false if either is missing.
   */
  addEdge(source: number, target: number, kind: string): boolean {
    const out = this.outgoing.get(source);
    const inc = this.incoming.get(target);
    if (!out || !inc) return false;

    let kinds = out.get(target);
    if (!kinds) {
      kinds = new Set();
      out.set(target, kinds);
      inc.set(source, kinds);
      this.edgeCount++;
    }
    kinds.add(kind);
    return true;
  }

  hasEdge(source: number, target: number): boolean {
    return this.outgoing.get(source)?.has(target) ?? false;
  }

  edgeKinds(source: number, target: number): ReadonlySet<string> {
    return this.outgoing.get(source)?.get(target) ?? new Set<string>();
  }

  /**
   * Targets of edges leaving `id`. With `kinds`, only edges carrying at least one of them.
   */
  successors(id: number, kinds?: ReadonlySet<string>): number[] {
    return neighbors(this.outgoing.get(id), kinds);
  }

  /**
   * Sources of edges entering `id`. With `kinds`, only edges carrying at least one of them.
   */
  predecessors(id: number, kinds?: ReadonlySet<string>): number[] {
    return neighbors(this.incoming.get(id), kinds);
  }

  outDegree(id: number): number {
    return this.outgoing.get(id)?.size ?? 0;
  }

  inDegree(id: number): number {
    return this.incoming.get(id)?.size ?? 0;
  }

  degree(id: number): number {
    return this.inDegree(id) + this.outDegree(id);
  }

  edges(): GraphEdge[] {
    const result: GraphEdge[] = [];
    for (const [source, targets] of this.outgoing) {
      for (const [target, kinds] of targets) {
        result.push({ source, target, kinds });
      }
    }
    return result;
  }
}

function neighbors(
  adjacency: Map<number, Set<string>> | undefined,
  kinds: ReadonlySet<string> | undefined
): number[] {
  if (!adjacency) return [];

  const result: number[] = [];
  for (const [id, edgeKinds] of adjacency) {
    if (!kinds || intersects(edgeKinds, kinds)) result.push(id);
  }
  return result;
}

function intersects(a: ReadonlySet<string>, b: ReadonlySet<string>): boolean {
  for (const value of a) {
    if (b.has(value)) return true;
  }
  return false;
}
