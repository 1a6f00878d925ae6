import { describe, it, expect } from "vitest";
import path from "node:path";

import { resolveStoreConfig } from "../src/config.js";

describe("resolveStoreConfig", () => {
  const cwd = path.resolve("/work/project");

  it("defaults to the index under the working directory", () => {
    expect(resolveStoreConfig({}, cwd)).toEqual({
      dbPath: path.join(cwd, ".codepulse", "index.db"),
      batchSize: 500,
    });
  });

  it("resolves a relative database path against the working directory", () => {
    const config = resolveStoreConfig({ CODEPULSE_DB: "data/graph.db" }, cwd);
    expect(config.dbPath).toBe(path.resolve(cwd, "data/graph.db"));
  });

  it("reads the batch size", () => {
    expect(resolveStoreConfig({ CODEPULSE_BATCH_SIZE: "250" }, cwd).batchSize).toBe(250);
  });

  it("rejects batch sizes beyond the parameter limit", () => {
    expect(() => resolveStoreConfig({ CODEPULSE_BATCH_SIZE: "5000" }, cwd)).toThrow();
    expect(() => resolveStoreConfig({ CODEPULSE_BATCH_SIZE: "0" }, cwd)).toThrow();
  });
});
