import test from "node:test";
import assert from "node:assert/strict";
import {
  DEFAULT_ASSUMPTIONS,
  MAX_AXIS_POINTS,
  parseAssumptions,
  parseSweepAxes,
  parseUnit,
} from "../lib/valuation/assumptions";
import { DEFAULT_SWEEP_AXES } from "../lib/valuation/sensitivity";
import { Decimal, toDecimal } from "../lib/math";
import { expectFailure, expectOk } from "./helpers";

const numbers = (values: readonly Decimal.Value[]) => values.map((value) => toDecimal(value).toNumber());

test("missing payload falls back to the default assumptions", () => {
  assert.equal(expectOk(parseAssumptions(undefined)), DEFAULT_ASSUMPTIONS);
});

test("missing fields take their defaults", () => {
  const assumptions = expectOk(parseAssumptions({ wacc: 0.12 }));

  assert.equal(toDecimal(assumptions.wacc).toNumber(), 0.12);
  assert.equal(assumptions.currentRevenue, 100);
  assert.equal(assumptions.growthRates, DEFAULT_ASSUMPTIONS.growthRates);
  assert.equal(assumptions.fcfConversion, 0.8);
});

test("percent inputs are converted to fractions, revenue is not", () => {
  const assumptions = expectOk(
    parseAssumptions(
      {
        currentRevenue: 250,
        growthRates: [10, 10, 5, 5, 2.5],
        ebitMargin: 30,
        wacc: 9,
        terminalGrowth: 2.5,
      },
      { unit: "PERCENT" }
    )
  );

  assert.equal(assumptions.currentRevenue, 250);
  assert.deepEqual(numbers(assumptions.growthRates), [0.1, 0.1, 0.05, 0.05, 0.025]);
  assert.equal(toDecimal(assumptions.ebitMargin).toNumber(), 0.3);
  assert.equal(toDecimal(assumptions.wacc).toNumber(), 0.09);
  assert.equal(toDecimal(assumptions.terminalGrowth).toNumber(), 0.025);
});

test("numeric strings are accepted", () => {
  const assumptions = expectOk(parseAssumptions({ wacc: "0.11" }));

  assert.equal(toDecimal(assumptions.wacc).toNumber(), 0.11);
});

test("invalid fields are rejected by name", () => {
  const cases: [unknown, string][] = [
    [[1, 2, 3], "assumptions"],
    [{ currentRevenue: -5 }, "currentRevenue"],
    [{ currentRevenue: 0 }, "currentRevenue"],
    [{ growthRates: [0.1, 0.1, 0.1, 0.1] }, "growthRates"],
    [{ growthRates: [0.1, "abc", 0.1, 0.1, 0.1] }, "growthRates[1]"],
    [{ ebitMargin: null }, "ebitMargin"],
    [{ taxRate: 1 }, "taxRate"],
    [{ taxRate: -0.1 }, "taxRate"],
    [{ wacc: 0.03, terminalGrowth: 0.03 }, "wacc"],
    [{ wacc: 0.02 }, "wacc"],
    [{ fcfConversion: "" }, "fcfConversion"],
  ];

  for (const [raw, field] of cases) {
    const error = expectFailure(parseAssumptions(raw));
    assert.equal(error.code, "INVALID_ASSUMPTION", JSON.stringify(raw));
    assert.equal(error.details.field, field, JSON.stringify(raw));
  }
});

test("parseUnit accepts FRACTION and PERCENT only", () => {
  assert.equal(expectOk(parseUnit(undefined)), "FRACTION");
  assert.equal(expectOk(parseUnit("PERCENT")), "PERCENT");
  assert.equal(expectFailure(parseUnit("BPS")).details.field, "unit");
});

test("missing sweep configuration uses the default axes", () => {
  assert.equal(expectOk(parseSweepAxes(undefined)), DEFAULT_SWEEP_AXES);
});

test("sweep ranges build evenly spaced axes", () => {
  const axes = expectOk(
    parseSweepAxes({ wacc: { start: 8, stop: 12, points: 5 } }, { unit: "PERCENT" })
  );

  assert.deepEqual(numbers(axes.waccValues), [0.08, 0.09, 0.1, 0.11, 0.12]);
  assert.equal(axes.terminalGrowthValues, DEFAULT_SWEEP_AXES.terminalGrowthValues);
});

test("explicit sweep values are used as given", () => {
  const axes = expectOk(parseSweepAxes({ terminalGrowth: [0.01, 0.02] }));

  assert.deepEqual(numbers(axes.terminalGrowthValues), [0.01, 0.02]);
});

test("sweep values accept numeric strings like the assumptions do", () => {
  const listed = expectOk(parseSweepAxes({ wacc: ["0.08", "0.1"] }));
  assert.deepEqual(numbers(listed.waccValues), [0.08, 0.1]);

  const ranged = expectOk(
    parseSweepAxes({ terminalGrowth: { start: "2", stop: "4", points: "3" } }, { unit: "PERCENT" })
  );
  assert.deepEqual(numbers(ranged.terminalGrowthValues), [0.02, 0.03, 0.04]);
});

test("invalid sweep configurations are rejected", () => {
  const cases: [unknown, string][] = [
    ["grid", "sweep"],
    [{ wacc: [] }, "wacc"],
    [{ terminalGrowth: [0.02, "x"] }, "terminalGrowth"],
    [{ wacc: { start: 0.05, stop: 0.1, points: MAX_AXIS_POINTS + 1 } }, "wacc"],
    [{ wacc: { start: 0.05, stop: 0.1, points: 2.5 } }, "wacc"],
    [{ wacc: { start: "low", stop: 0.1, points: 3 } }, "wacc"],
    [{ wacc: 0.1 }, "wacc"],
  ];

  for (const [raw, axis] of cases) {
    const error = expectFailure(parseSweepAxes(raw));
    assert.equal(error.code, "INVALID_SWEEP", JSON.stringify(raw));
    assert.equal(error.details.axis, axis, JSON.stringify(raw));
  }
});
