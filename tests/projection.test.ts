import test from "node:test";
import assert from "node:assert/strict";
import { Decimal } from "../lib/math";
import {
  buildProjection,
  computeEbit,
  computeFcf,
  computeNopat,
  projectRevenue,
} from "../lib/valuation/projection";
import { BASE_CASE, approxEqual, toNumbers } from "./helpers";

test("projectRevenue compounds growth and excludes year 0", () => {
  const revenue = projectRevenue(100, [0.15, 0.12, 0.1, 0.08, 0.06]);

  assert.deepEqual(toNumbers(revenue), [115, 128.8, 141.68, 153.0144, 162.195264]);
});

test("projectRevenue handles declining revenue", () => {
  assert.deepEqual(toNumbers(projectRevenue(100, [-0.1, -0.1])), [90, 81]);
});

test("projectRevenue returns an empty series without growth rates", () => {
  assert.deepEqual(projectRevenue(100, []), []);
});

test("EBIT, NOPAT and FCF apply constant ratios element-wise", () => {
  const revenue = [new Decimal(100), new Decimal(200)];

  const ebit = computeEbit(revenue, 0.2);
  const nopat = computeNopat(ebit, 0.25);
  const fcf = computeFcf(nopat, 0.8);

  assert.deepEqual(toNumbers(ebit), [20, 40]);
  assert.deepEqual(toNumbers(nopat), [15, 30]);
  assert.deepEqual(toNumbers(fcf), [12, 24]);
});

test("buildProjection produces the base-case year-5 figures", () => {
  const projection = buildProjection(BASE_CASE);

  assert.equal(projection.revenue.length, 5);
  approxEqual(projection.revenue[4].toNumber(), 162.195264, 1e-9);
  approxEqual(projection.ebit[4].toNumber(), 32.4390528, 1e-9);
  approxEqual(projection.nopat[4].toNumber(), 24.3292896, 1e-9);
  approxEqual(projection.fcf[4].toNumber(), 19.46343168, 1e-9);
});

test("raising one growth rate lifts that year and every later year", () => {
  const base = buildProjection(BASE_CASE);

  for (let year = 0; year < 5; year++) {
    const growthRates = [...BASE_CASE.growthRates];
    growthRates[year] = new Decimal(growthRates[year]).plus(0.01);
    const bumped = buildProjection({ ...BASE_CASE, growthRates });

    for (const key of ["revenue", "ebit", "nopat", "fcf"] as const) {
      for (let i = 0; i < 5; i++) {
        if (i < year) {
          assert.ok(bumped[key][i].eq(base[key][i]), `${key}[${i}] should be unchanged`);
        } else {
          assert.ok(bumped[key][i].gt(base[key][i]), `${key}[${i}] should increase`);
        }
      }
    }
  }
});
