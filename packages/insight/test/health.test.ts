import { describe, it, expect } from "vitest";
import { ContractViolation } from "@codepulse/core";

import { computeHealthScore } from "../src/health.js";
import type { HealthInputs } from "../src/model.js";

const base: HealthInputs = {
  symbols: 50,
  cycles: 1,
  godComponents: 1,
  bottlenecks: 1,
  deadExports: 3,
  layerViolations: 1,
};

describe("computeHealthScore", () => {
  it("scores a codebase without symbols as 100", () => {
    expect(computeHealthScore({ ...base, symbols: 0, cycles: 9, deadExports: 40 })).toBe(100);
  });

  it("subtracts the floored penalty", () => {
    // 6 + 2 + 0 + 10 + 3 + 0
    expect(
      computeHealthScore({
        symbols: 100,
        cycles: 2,
        godComponents: 1,
        bottlenecks: 0,
        deadExports: 10,
        layerViolations: 1,
      })
    ).toBe(79);

    // dead exports 1/7 -> 14.28
    expect(
      computeHealthScore({
        symbols: 7,
        cycles: 0,
        godComponents: 0,
        bottlenecks: 0,
        deadExports: 1,
        layerViolations: 0,
      })
    ).toBe(86);
  });

  it("caps every penalty and bottoms out at 0", () => {
    expect(
      computeHealthScore({
        symbols: 100,
        cycles: 10,
        godComponents: 10,
        bottlenecks: 10,
        deadExports: 100,
        layerViolations: 10,
      })
    ).toBe(0);
  });

  it("adds the issue penalty past five issues", () => {
    // 9 + 2 + 2 + 0 + 3 + (6 - 5)
    expect(
      computeHealthScore({
        symbols: 10,
        cycles: 3,
        godComponents: 1,
        bottlenecks: 1,
        deadExports: 0,
        layerViolations: 1,
      })
    ).toBe(83);
  });

  it("never increases when a penalty input grows", () => {
    const fields = [
      "cycles",
      "godComponents",
      "bottlenecks",
      "deadExports",
      "layerViolations",
    ] as const;

    for (const field of fields) {
      let previous = computeHealthScore(base);
      for (let value = base[field] + 1; value <= base[field] + 40; value++) {
        const score = computeHealthScore({ ...base, [field]: value });
        expect(score).toBeLessThanOrEqual(previous);
        previous = score;
      }
    }
  });

  it("rejects negative inputs", () => {
    expect(() => computeHealthScore({ ...base, cycles: -1 })).toThrow(ContractViolation);
    expect(() => computeHealthScore({ ...base, symbols: -5 })).toThrow(ContractViolation);
  });
});
