import { describe, it, expect } from "vitest";

import { deepestChain, detectLayers, findViolations, summarizeLayers } from "../src/layers.js";
import { DirectedGraph } from "../src/DirectedGraph.js";
import type { SymbolNode } from "../src/model.js";
import { graphOf, randomEdges } from "./fixtures.js";

describe("detectLayers", () => {
  it("returns an empty map for an empty graph", () => {
    expect(detectLayers(new DirectedGraph<SymbolNode>()).size).toBe(0);
  });

  it("uses the longest path from a source", () => {
    const graph = graphOf([
      [1, 2],
      [2, 3],
      [1, 3],
    ]);
    expect(Array.from(detectLayers(graph).entries())).toEqual([
      [1, 0],
      [2, 1],
      [3, 2],
    ]);
  });

  it("puts every member of a cycle on one layer", () => {
    const graph = graphOf([
      [1, 2],
      [2, 3],
      [3, 2],
      [3, 4],
    ]);
    const layers = detectLayers(graph);
    expect(layers.get(1)).toBe(0);
    expect(layers.get(2)).toBe(1);
    expect(layers.get(3)).toBe(1);
    expect(layers.get(4)).toBe(2);
  });
});

describe("findViolations", () => {
  it("reports edges into a higher layer and skips same-layer edges", () => {
    const graph = graphOf([
      [1, 2],
      [2, 3],
      [3, 2],
      [3, 4],
    ]);
    expect(findViolations(graph, detectLayers(graph))).toEqual([
      { source: 1, sourceLayer: 0, target: 2, targetLayer: 1 },
      { source: 3, sourceLayer: 1, target: 4, targetLayer: 2 },
    ]);
  });

  it("ignores edges whose endpoints have no layer", () => {
    const graph = graphOf([[1, 2]]);
    expect(findViolations(graph, new Map([[1, 0]]))).toEqual([]);
  });

  it("partitions the edges together with the downward ones", () => {
    for (const seed of [5, 77, 4096]) {
      const graph = graphOf(randomEdges(30, 60, seed));
      const layers = detectLayers(graph);
      const violations = findViolations(graph, layers);
      const violating = new Set(violations.map((v) => `${v.source}->${v.target}`));

      let downward = 0;
      for (const e of graph.edges()) {
        const key = `${e.source}->${e.target}`;
        const ok = (layers.get(e.source) ?? 0) >= (layers.get(e.target) ?? 0);
        expect(ok).toBe(!violating.has(key));
        if (ok) downward++;
      }
      expect(downward + violations.length).toBe(graph.size);
    }
  });

  it("is stable for a fixed graph", () => {
    const graph = graphOf(randomEdges(20, 40, 11));
    const layers = detectLayers(graph);
    expect(findViolations(graph, layers)).toEqual(findViolations(graph, layers));
  });
});

describe("deepestChain", () => {
  it("follows the longest condensation path with one representative per component", () => {
    const graph = graphOf([
      [1, 2],
      [2, 3],
      [3, 2],
      [3, 4],
    ]);
    expect(deepestChain(graph)).toEqual({ symbols: [1, 2, 4], length: 3 });
  });

  it("is null when there is no chain of two components", () => {
    expect(deepestChain(new DirectedGraph<SymbolNode>())).toBeNull();
    expect(
      deepestChain(
        graphOf([
          [1, 2],
          [2, 1],
        ])
      )
    ).toBeNull();
  });
});

describe("summarizeLayers", () => {
  it("groups symbols per layer and reports the shape", () => {
    const graph = graphOf(
      [
        [1, 4],
        [2, 4],
        [3, 4],
        [4, 5],
      ],
      { 1: "c", 2: "a", 3: "b", 4: "core", 5: "base" }
    );
    const summary = summarizeLayers(graph, detectLayers(graph));

    expect(summary.totalLayers).toBe(3);
    expect(summary.baseLayerPct).toBe(60);
    expect(summary.shape).toBe("moderate");
    expect(summary.layers[0].symbols.map((s) => s.name)).toEqual(["a", "b", "c"]);
  });

  it("calls two layers flat", () => {
    const graph = graphOf([[1, 2]]);
    expect(summarizeLayers(graph, detectLayers(graph)).shape).toBe("flat");
  });

  it("calls an even chain well-layered", () => {
    const graph = graphOf([
      [1, 2],
      [2, 3],
    ]);
    const summary = summarizeLayers(graph, detectLayers(graph));
    expect(summary.baseLayerPct).toBe(33.3);
    expect(summary.shape).toBe("well-layered");
  });

  it("reports no layers for an empty map", () => {
    const summary = summarizeLayers(new DirectedGraph<SymbolNode>(), new Map());
    expect(summary.totalLayers).toBe(0);
    expect(summary.layers).toEqual([]);
  });
});
