/**
 * Tests for InsightService.
 */

import { describe, it, expect } from "vitest";
import { InMemoryRelationshipStore } from "@codepulse/store";

import { InsightService } from "../src/InsightService.js";
import { analyzeStructure, collectHealthMetrics } from "../src/health.js";

const metric = (symbolId: number, inDegree: number, outDegree: number, betweenness: number) => ({
  symbolId,
  pagerank: 0,
  betweenness,
  inDegree,
  outDegree,
});

/**
 * a1 <-> a2 form a cycle, a2 calls b, c is an unused export.
 * a1 has degree 21 and a2 betweenness 0.6.
 */
function healthStore(): InMemoryRelationshipStore {
  return new InMemoryRelationshipStore({
    files: [
      { id: 1, path: "src/a.ts" },
      { id: 2, path: "src/b.ts" },
    ],
    symbols: [
      { id: 1, fileId: 1, name: "a1", lineStart: 1 },
      { id: 2, fileId: 1, name: "a2", lineStart: 10 },
      { id: 3, fileId: 2, name: "b", isExported: true, lineStart: 1 },
      { id: 4, fileId: 2, name: "c", isExported: true, lineStart: 8 },
    ],
    edges: [
      { sourceId: 1, targetId: 2 },
      { sourceId: 2, targetId: 1 },
      { sourceId: 2, targetId: 3 },
    ],
    fileEdges: [{ sourceFileId: 1, targetFileId: 2, symbolCount: 1 }],
    metrics: [metric(1, 15, 6, 0), metric(2, 1, 2, 0.6), metric(3, 1, 0, 0.5)],
  });
}

describe("collectHealthMetrics", () => {
  it("gathers the inputs and scores them", () => {
    expect(collectHealthMetrics(healthStore())).toEqual({
      files: 2,
      edges: 3,
      symbols: 4,
      cycles: 1,
      godComponents: 1,
      bottlenecks: 1,
      deadExports: 1,
      layerViolations: 1,
      tangleRatio: 50,
      // 3 + 2 + 2 + 25 + 3 + 0
      healthScore: 65,
    });
  });

  it("uses an already analyzed structure", () => {
    const store = healthStore();
    const structure = analyzeStructure(store);

    expect(structure.cycles).toEqual([[1, 2]]);
    expect(structure.violations).toHaveLength(1);

    // without the violation: 3 + 2 + 2 + 25 + 0 + 0
    const metrics = collectHealthMetrics(store, { ...structure, violations: null });
    expect(metrics.layerViolations).toBe(0);
    expect(metrics.healthScore).toBe(68);
  });

  it("scores an empty index as 100", () => {
    const metrics = collectHealthMetrics(new InMemoryRelationshipStore());

    expect(metrics.healthScore).toBe(100);
    expect(metrics.tangleRatio).toBe(0);
  });
});

describe("InsightService", () => {
  const service = new InsightService(healthStore());

  describe("health()", () => {
    const report = service.health();

    it("names god components and bottlenecks", () => {
      expect(report.godComponents).toEqual([
        { name: "a1", kind: "function", file: "src/a.ts", degree: 21 },
      ]);
      expect(report.bottlenecks).toEqual([
        { name: "a2", kind: "function", file: "src/a.ts", betweenness: 0.6 },
      ]);
    });

    it("describes cycles and layer violations by name", () => {
      expect(report.cycles).toEqual([{ size: 2, symbols: ["a1", "a2"], files: ["src/a.ts"] }]);
      expect(report.layerViolations).toEqual([
        { source: "a2", sourceLayer: 0, target: "b", targetLayer: 1 },
      ]);
    });
  });

  it("reports no layers for an empty graph", () => {
    const empty = new InsightService(new InMemoryRelationshipStore());
    expect(empty.health().layerViolations).toBeNull();
  });

  describe("deadExports()", () => {
    it("returns high-confidence exports of imported files", () => {
      const analysis = service.deadExports();

      expect(analysis.high.map((d) => d.name)).toEqual(["c"]);
      expect(analysis.groups).toBeNull();
    });

    it("groups results when asked", () => {
      const analysis = service.deadExports({ groupBy: "directory" });

      expect(analysis.groups).toEqual([
        {
          key: "src",
          count: 1,
          symbols: [{ id: 4, name: "c", kind: "function", file: "src/b.ts", line: 8 }],
        },
      ]);
    });
  });
});
