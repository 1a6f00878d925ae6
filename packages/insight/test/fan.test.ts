import { describe, it, expect } from "vitest";
import { ContractViolation } from "@codepulse/core";
import { InMemoryRelationshipStore } from "@codepulse/store";

import { fanFlag, fanReport } from "../src/fan.js";

const metric = (
  symbolId: number,
  inDegree: number,
  outDegree: number,
  betweenness: number = 0,
  pagerank: number = 0
) => ({ symbolId, pagerank, betweenness, inDegree, outDegree });

/**
 * dispatch is heavily connected both ways, render only called, helper only calling.
 * src/core.ts is imported by three files and imports one.
 */
function fanStore(): InMemoryRelationshipStore {
  return new InMemoryRelationshipStore({
    files: [
      { id: 1, path: "src/core.ts" },
      { id: 2, path: "src/a.ts" },
      { id: 3, path: "src/b.ts" },
      { id: 4, path: "src/c.ts" },
      { id: 5, path: "src/lonely.ts" },
    ],
    symbols: [
      { id: 1, fileId: 1, name: "dispatch", lineStart: 4 },
      { id: 2, fileId: 2, name: "render", kind: "method", lineStart: 2 },
      { id: 3, fileId: 3, name: "idle", lineStart: 1 },
      { id: 4, fileId: 3, name: "helper", lineStart: 9 },
    ],
    fileEdges: [
      { sourceFileId: 2, targetFileId: 1 },
      { sourceFileId: 3, targetFileId: 1 },
      { sourceFileId: 4, targetFileId: 1 },
      { sourceFileId: 1, targetFileId: 2 },
    ],
    metrics: [
      metric(1, 12, 11, 3.456, 0.123456),
      metric(2, 11, 0),
      metric(3, 0, 0),
      metric(4, 0, 11),
      // symbol dropped from the index since the metrics were computed
      metric(99, 5, 5),
    ],
  });
}

describe("fanFlag", () => {
  it("marks each side above the threshold", () => {
    expect(fanFlag(11, 11, 10)).toBe("high-risk");
    expect(fanFlag(11, 10, 10)).toBe("hub");
    expect(fanFlag(10, 11, 10)).toBe("spreader");
    expect(fanFlag(10, 10, 10)).toBeNull();
  });
});

describe("fanReport", () => {
  it("ranks connected symbols by total degree, ties by id", () => {
    expect(fanReport(fanStore())).toEqual({
      mode: "symbol",
      items: [
        {
          name: "dispatch",
          kind: "function",
          fanIn: 12,
          fanOut: 11,
          total: 23,
          betweenness: 3.5,
          pagerank: 0.1235,
          file: "src/core.ts",
          line: 4,
          flag: "high-risk",
        },
        {
          name: "render",
          kind: "method",
          fanIn: 11,
          fanOut: 0,
          total: 11,
          betweenness: 0,
          pagerank: 0,
          file: "src/a.ts",
          line: 2,
          flag: "hub",
        },
        {
          name: "helper",
          kind: "function",
          fanIn: 0,
          fanOut: 11,
          total: 11,
          betweenness: 0,
          pagerank: 0,
          file: "src/b.ts",
          line: 9,
          flag: "spreader",
        },
      ],
    });
  });

  it("limits the number of items", () => {
    const report = fanReport(fanStore(), { count: 1 });
    expect(report.items).toHaveLength(1);
    expect(report.items[0]).toMatchObject({ name: "dispatch" });
  });

  it("counts distinct importing and imported files", () => {
    expect(fanReport(fanStore(), { mode: "file" })).toEqual({
      mode: "file",
      items: [
        { path: "src/core.ts", fanIn: 3, fanOut: 1, total: 4, flag: null },
        { path: "src/a.ts", fanIn: 1, fanOut: 1, total: 2, flag: null },
        { path: "src/b.ts", fanIn: 0, fanOut: 1, total: 1, flag: null },
        { path: "src/c.ts", fanIn: 0, fanOut: 1, total: 1, flag: null },
      ],
    });
  });

  it("returns no items for an empty index", () => {
    expect(fanReport(new InMemoryRelationshipStore())).toEqual({ mode: "symbol", items: [] });
    expect(fanReport(new InMemoryRelationshipStore(), { mode: "file" })).toEqual({
      mode: "file",
      items: [],
    });
  });

  it("rejects a non-positive count", () => {
    expect(() => fanReport(fanStore(), { count: 0 })).toThrow(ContractViolation);
  });
});
