// lib/valuation/aggregator.ts
// Enterprise value assembly and the single base-case entry point

import { Decimal, FinMath } from '@/lib/math';
import { InvalidAssumptionError } from './errors';
import { discountFactors, presentValues, pvTerminalValue, terminalValue } from './discounting';
import { fail, succeed, type Outcome } from './outcome';
import { buildProjection } from './projection';
import type { DiscountedCashFlows, ValuationAssumptions, ValuationResult } from './types';

export function sumEnterpriseValue(
  pvFcf: readonly Decimal[],
  pvTerminal: Decimal.Value
): { pvForecastPeriod: Decimal; enterpriseValue: Decimal } {
  const pvForecastPeriod = FinMath.sum(pvFcf);
  return { pvForecastPeriod, enterpriseValue: pvForecastPeriod.plus(pvTerminal) };
}

/**
 * Discounts an already projected FCF series at one (wacc, terminal growth) pair.
 * Shared by the base case and every sensitivity cell.
 */
export function discountCashFlows(
  fcf: readonly Decimal[],
  wacc: Decimal.Value,
  terminalGrowth: Decimal.Value
): Outcome<DiscountedCashFlows> {
  if (fcf.length === 0) {
    return fail(new InvalidAssumptionError('growthRates', 'at least one forecast year is required', 0));
  }

  const finalFcf = fcf[fcf.length - 1];
  const tv = terminalValue(finalFcf, terminalGrowth, wacc);
  if (!tv.ok) return tv;

  const factors = discountFactors(wacc, fcf.length);
  const pvFcf = presentValues(fcf, factors);
  const pvTerminal = pvTerminalValue(tv.value, factors[factors.length - 1]);

  return succeed({
    discountFactors: factors,
    pvFcf,
    terminalValue: tv.value,
    pvTerminalValue: pvTerminal,
    ...sumEnterpriseValue(pvFcf, pvTerminal),
  });
}

/**
 * Runs a complete base-case DCF valuation: projection → discounting → aggregation.
 * Fails as a whole when wacc <= terminal growth.
 */
export function runValuation(assumptions: ValuationAssumptions): Outcome<ValuationResult> {
  const projection = buildProjection(assumptions);
  const discounted = discountCashFlows(projection.fcf, assumptions.wacc, assumptions.terminalGrowth);
  if (!discounted.ok) return discounted;

  return succeed({
    assumptions,
    ...projection,
    ...discounted.value,
  });
}
