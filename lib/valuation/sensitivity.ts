// lib/valuation/sensitivity.ts
// WACC × terminal growth sweep and the ±1pp WACC sensitivity scalar

import { Decimal, toDecimal } from '@/lib/math';
import { discountCashFlows, runValuation } from './aggregator';
import { ValuationError, ValuationErrorCode } from './errors';
import { fail, succeed, type Outcome } from './outcome';
import { buildProjection } from './projection';
import type {
  InfeasibleCell,
  SensitivityGrid,
  SweepAxes,
  ValuationAssumptions,
  WaccSensitivity,
} from './types';

export const WACC_SENSITIVITY_STEP = 0.01;

/**
 * Evenly spaced values from start to stop, both inclusive.
 */
export function buildAxis(start: Decimal.Value, stop: Decimal.Value, points: number): Decimal[] {
  if (points < 1) return [];

  const first = toDecimal(start);
  if (points === 1) return [first];

  const step = toDecimal(stop).minus(first).div(points - 1);
  return Array.from({ length: points }, (_, index) => first.plus(step.times(index)));
}

export const DEFAULT_SWEEP_AXES: SweepAxes = {
  waccValues: buildAxis(0.06, 0.14, 9),
  terminalGrowthValues: buildAxis(0.02, 0.05, 7),
};

/**
 * Enterprise value for every (terminal growth row, wacc column) pair, holding the
 * projected FCF series fixed. Infeasible pairs are masked with null and reported in
 * `infeasibleCells`; they never abort the sweep.
 */
export function sensitivityGrid(
  fcf: readonly Decimal[],
  waccValues: readonly Decimal.Value[],
  terminalGrowthValues: readonly Decimal.Value[]
): SensitivityGrid {
  const waccAxis = waccValues.map(toDecimal);
  const growthAxis = terminalGrowthValues.map(toDecimal);
  const infeasibleCells: InfeasibleCell[] = [];

  const matrix = growthAxis.map((terminalGrowth, row) =>
    waccAxis.map((wacc, column) => {
      const cell = discountCashFlows(fcf, wacc, terminalGrowth);
      if (cell.ok) return cell.value.enterpriseValue;

      cell.error.details = { ...cell.error.details, row, column };
      infeasibleCells.push({ row, column, wacc, terminalGrowth, error: cell.error });
      return null;
    })
  );

  return { waccValues: waccAxis, terminalGrowthValues: growthAxis, matrix, infeasibleCells };
}

/**
 * Projects once from the assumptions, then sweeps the given axes.
 */
export function runSensitivityGrid(
  assumptions: ValuationAssumptions,
  axes: SweepAxes = DEFAULT_SWEEP_AXES
): SensitivityGrid {
  const { fcf } = buildProjection(assumptions);
  return sensitivityGrid(fcf, axes.waccValues, axes.terminalGrowthValues);
}

/**
 * Centered difference of enterprise value over a ±step WACC move:
 * (EV(wacc - step) - EV(wacc + step)) / (2 × EV(wacc)).
 */
export function waccSensitivity(
  assumptions: ValuationAssumptions,
  step: Decimal.Value = WACC_SENSITIVITY_STEP
): Outcome<WaccSensitivity> {
  const delta = toDecimal(step);
  const wacc = toDecimal(assumptions.wacc);
  const terminalGrowth = toDecimal(assumptions.terminalGrowth);

  const base = runValuation(assumptions);
  if (!base.ok) return base;

  for (const perturbedWacc of [wacc.plus(delta), wacc.minus(delta)]) {
    if (perturbedWacc.lte(terminalGrowth)) {
      return fail(
        new ValuationError(
          ValuationErrorCode.DEGENERATE_PERTURBATION,
          `WACC perturbed by ${delta.toString()} (${perturbedWacc.toString()}) does not exceed terminal growth (${terminalGrowth.toString()})`,
          {
            wacc: wacc.toString(),
            terminalGrowth: terminalGrowth.toString(),
            perturbedWacc: perturbedWacc.toString(),
            step: delta.toString(),
          }
        )
      );
    }
  }

  const baseEnterpriseValue = base.value.enterpriseValue;
  if (baseEnterpriseValue.isZero()) {
    return fail(
      new ValuationError(
        ValuationErrorCode.ZERO_BASE_VALUE,
        'Base enterprise value is zero; relative WACC sensitivity is undefined',
        { enterpriseValue: baseEnterpriseValue.toString() }
      )
    );
  }

  const plus = runValuation({ ...assumptions, wacc: wacc.plus(delta) });
  if (!plus.ok) return plus;
  const minus = runValuation({ ...assumptions, wacc: wacc.minus(delta) });
  if (!minus.ok) return minus;

  const enterpriseValueAtPlus = plus.value.enterpriseValue;
  const enterpriseValueAtMinus = minus.value.enterpriseValue;

  return succeed({
    sensitivity: enterpriseValueAtMinus.minus(enterpriseValueAtPlus).div(baseEnterpriseValue.times(2)),
    baseEnterpriseValue,
    enterpriseValueAtPlus,
    enterpriseValueAtMinus,
    step: delta,
  });
}
