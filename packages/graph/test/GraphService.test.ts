import { describe, it, expect } from "vitest";
import { GraphService } from "../src/infrastructure/GraphService.js";
import { sessionStore } from "./fixtures.js";

describe("GraphService", () => {
  const service = new GraphService(sessionStore());

  it("finds labelled cycles", () => {
    const analysis = service.cycles();

    expect(analysis.totalSymbols).toBe(6);
    expect(analysis.symbolsInCycles).toBe(2);
    expect(analysis.cycles).toHaveLength(1);
    expect(analysis.cycles[0].label).toBe("session");
    expect(analysis.cycles[0].files).toEqual(["src/auth/session.ts"]);
    expect(analysis.cycles[0].weakestEdge?.source).toBe(1);
  });

  it("assigns layers and names the edges into higher layers", () => {
    const analysis = service.layers();

    expect(analysis.summary.totalLayers).toBe(5);
    expect(analysis.violations.map((v) => `${v.sourceName}->${v.targetName}`)).toEqual([
      "session_close->token_verify",
      "loader->require_user",
      "require_user->session_open",
      "test_session->loader",
    ]);
    expect(analysis.deepestChain).toEqual([
      "test_session",
      "loader",
      "require_user",
      "session_open",
      "token_verify",
    ]);
  });

  it("computes the blast radius of a named symbol", () => {
    const result = service.blastRadius("token_verify");

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.symbol.id).toBe(3);
    expect(result.value.result).toEqual({ dependentSymbols: 5, dependentFiles: 3 });
  });

  it("finds tests that reach a symbol through callers", () => {
    const result = service.affectedTests("session_open");

    expect(result.ok && result.value.result).toEqual([
      {
        file: "tests/session.test.ts",
        symbol: "test_session",
        kind: "TRANSITIVE",
        hops: 3,
        via: "require_user",
      },
    ]);
  });

  it("finds entry points using precomputed degrees", () => {
    const result = service.entryPoints("token_verify");

    expect(result.ok && result.value.result.map((e) => [e.name, e.hops])).toEqual([
      ["test_session", 5],
    ]);
  });

  it("checks gate coverage within a scope", () => {
    const result = service.coverageGaps({ names: ["require_user"], scope: ["src/routes/**"] });

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.summary.coveragePct).toBe(100);
    expect(result.value.covered[0]).toMatchObject({ name: "loader", depth: 1, gate: "require_user" });
  });

  it("reports an invalid name expression instead of throwing", () => {
    const result = service.coverageGaps({ names: ["require_user"], namePattern: "(" });

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error).toMatchObject({ kind: "invalid_pattern", field: "entry", pattern: "(" });
    expect(result.error.message).toMatch(/^Invalid entry pattern: /);
  });

  it("traces the shortest path between two symbols", () => {
    const result = service.trace("loader", "token_verify");

    expect(result.ok && result.value.path?.map((step) => step.name)).toEqual([
      "loader",
      "require_user",
      "session_open",
      "session_close",
      "token_verify",
    ]);
  });

  it("reports unknown symbols as not found", () => {
    const result = service.trace("loader", "missing_symbol");
    expect(!result.ok && result.error.kind).toBe("not_found");
  });
});
