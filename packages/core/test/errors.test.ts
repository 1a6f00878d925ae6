import { describe, it, expect } from "vitest";
import {
  ContractViolation,
  assertHopCap,
  assertNonNegative,
  assertNonNegativeInteger,
  assertPositiveInteger,
} from "../src/errors.js";

describe("contract guards", () => {
  it("accepts zero and positive integers as non-negative", () => {
    expect(() => assertNonNegativeInteger("maxHops", 0)).not.toThrow();
    expect(() => assertNonNegativeInteger("maxHops", 8)).not.toThrow();
  });

  it("rejects negative hop caps with a ContractViolation", () => {
    expect(() => assertNonNegativeInteger("maxHops", -1)).toThrow(ContractViolation);
    expect(() => assertNonNegativeInteger("maxHops", -1)).toThrow(
      "maxHops: expected a non-negative integer, got -1"
    );
  });

  it("rejects fractional counts", () => {
    expect(() => assertNonNegativeInteger("cycles", 1.5)).toThrow(ContractViolation);
  });

  it("requires at least one for positive integers", () => {
    expect(() => assertPositiveInteger("batchSize", 0)).toThrow(
      "batchSize: expected a positive integer, got 0"
    );
    expect(() => assertPositiveInteger("batchSize", 500)).not.toThrow();
  });

  it("allows fractional non-negative thresholds", () => {
    expect(() => assertNonNegative("minStrength", 0.3)).not.toThrow();
    expect(() => assertNonNegative("minStrength", -0.1)).toThrow(ContractViolation);
    expect(() => assertNonNegative("minStrength", Number.NaN)).toThrow(ContractViolation);
  });

  it("treats Infinity as an unbounded hop cap", () => {
    expect(() => assertHopCap("maxHops", Number.POSITIVE_INFINITY)).not.toThrow();
    expect(() => assertHopCap("maxHops", -2)).toThrow(ContractViolation);
  });

  it("exposes the offending parameter", () => {
    try {
      assertPositiveInteger("count", -3);
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ContractViolation);
      if (error instanceof ContractViolation) {
        expect(error.parameter).toBe("count");
        expect(error.name).toBe("ContractViolation");
      }
    }
  });
});
