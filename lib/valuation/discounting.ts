// lib/valuation/discounting.ts
// Discount factors, present values and the perpetuity-growth terminal value

import { Decimal, ONE, toDecimal } from '@/lib/math';
import { InfeasibleTerminalGrowthError, InvalidAssumptionError } from './errors';
import { fail, succeed, type Outcome } from './outcome';
import { FORECAST_YEARS } from './types';

/**
 * factor[y] = 1 / (1 + rate)^y for y = 1..years
 */
export function discountFactors(rate: Decimal.Value, years: number = FORECAST_YEARS): Decimal[] {
  const base = ONE.plus(rate);
  const factors: Decimal[] = [];

  for (let year = 1; year <= years; year++) {
    factors.push(ONE.div(base.pow(year)));
  }

  return factors;
}

export function presentValues(
  cashFlows: readonly Decimal[],
  factors: readonly Decimal[]
): Decimal[] {
  if (cashFlows.length !== factors.length) {
    throw new Error(
      `Cash flow series (${cashFlows.length}) and discount factors (${factors.length}) must have the same length`
    );
  }

  return cashFlows.map((value, index) => value.times(factors[index]));
}

/**
 * Gordon growth: TV = FCF_n × (1 + g) / (rate - g).
 * Fails instead of returning an infinite or sign-reversed value when rate <= g,
 * and on a negative rate.
 */
export function terminalValue(
  finalFcf: Decimal.Value,
  terminalGrowth: Decimal.Value,
  rate: Decimal.Value
): Outcome<Decimal> {
  const growth = toDecimal(terminalGrowth);
  const discountRate = toDecimal(rate);

  if (!discountRate.isFinite()) {
    return fail(new InvalidAssumptionError('wacc', 'must be a finite number', discountRate.toString()));
  }
  if (discountRate.lt(0)) {
    return fail(new InvalidAssumptionError('wacc', 'must be non-negative', discountRate.toString()));
  }
  if (!growth.isFinite()) {
    return fail(
      new InvalidAssumptionError('terminalGrowth', 'must be a finite number', growth.toString())
    );
  }
  if (discountRate.lte(growth)) {
    return fail(new InfeasibleTerminalGrowthError(discountRate.toString(), growth.toString()));
  }

  return succeed(toDecimal(finalFcf).times(ONE.plus(growth)).div(discountRate.minus(growth)));
}

export function pvTerminalValue(tv: Decimal.Value, finalDiscountFactor: Decimal.Value): Decimal {
  return toDecimal(tv).times(finalDiscountFactor);
}
