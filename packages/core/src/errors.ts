/**
 * Contract violations: inputs that can only come from a programming error.
 * Absence of data is never a contract violation.
 */

export class ContractViolation extends Error {
  constructor(
    readonly parameter: string,
    message: string
  ) {
    super(`${parameter}: ${message}`);
    this.name = "ContractViolation";
  }
}

export function assertNonNegativeInteger(parameter: string, value: number): void {
  if (!Number.isInteger(value) || value < 0) {
    throw new ContractViolation(parameter, `expected a non-negative integer, got ${value}`);
  }
}

export function assertPositiveInteger(parameter: string, value: number): void {
  if (!Number.isInteger(value) || value < 1) {
    throw new ContractViolation(parameter, `expected a positive integer, got ${value}`);
  }
}

export function assertNonNegative(parameter: string, value: number): void {
  if (!Number.isFinite(value) || value < 0) {
    throw new ContractViolation(parameter, `expected a non-negative number, got ${value}`);
  }
}

/**
 * Hop caps may be unbounded (Infinity) but never negative or fractional.
 */
export function assertHopCap(parameter: string, value: number): void {
  if (value === Number.POSITIVE_INFINITY) return;
  assertNonNegativeInteger(parameter, value);
}
