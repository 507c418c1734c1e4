import assert from "node:assert/strict";
import type { Decimal } from "../lib/math";
import type { Outcome, ValuationAssumptions } from "../lib/valuation";

export const approxEqual = (actual: number, expected: number, tolerance = 1e-6) => {
  assert.ok(
    Math.abs(actual - expected) <= tolerance,
    `Expected ${actual} to be within ${tolerance} of ${expected}`
  );
};

export const toNumbers = (values: readonly Decimal[]) => values.map((value) => value.toNumber());

export function expectOk<T>(outcome: Outcome<T>): T {
  if (!outcome.ok) {
    assert.fail(`Expected success, got ${outcome.error.code}: ${outcome.error.message}`);
  }
  return outcome.value;
}

export function expectFailure<T>(outcome: Outcome<T>) {
  if (outcome.ok) {
    assert.fail("Expected failure, got success");
  }
  return outcome.error;
}

export const BASE_CASE: ValuationAssumptions = {
  currentRevenue: 100,
  growthRates: [0.15, 0.12, 0.1, 0.08, 0.06],
  ebitMargin: 0.2,
  taxRate: 0.25,
  wacc: 0.1,
  terminalGrowth: 0.03,
  fcfConversion: 0.8,
};
