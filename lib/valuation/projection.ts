// lib/valuation/projection.ts
// Revenue → EBIT → NOPAT → FCF projection

import { Decimal, ONE, toDecimal } from '@/lib/math';
import type { Projection, ValuationAssumptions } from './types';

/**
 * Compound revenue forward from the current (year 0) figure.
 * Revenue[t] = Revenue[t-1] × (1 + growth[t]). Year 0 is not included.
 */
export function projectRevenue(
  currentRevenue: Decimal.Value,
  growthRates: readonly Decimal.Value[]
): Decimal[] {
  const revenue: Decimal[] = [];
  let current = toDecimal(currentRevenue);

  for (const rate of growthRates) {
    current = current.times(ONE.plus(rate));
    revenue.push(current);
  }

  return revenue;
}

export function computeEbit(revenue: readonly Decimal[], margin: Decimal.Value): Decimal[] {
  return revenue.map((value) => value.times(margin));
}

export function computeNopat(ebit: readonly Decimal[], taxRate: Decimal.Value): Decimal[] {
  const retained = ONE.minus(taxRate);
  return ebit.map((value) => value.times(retained));
}

export function computeFcf(nopat: readonly Decimal[], conversion: Decimal.Value): Decimal[] {
  return nopat.map((value) => value.times(conversion));
}

export function buildProjection(assumptions: ValuationAssumptions): Projection {
  const revenue = projectRevenue(assumptions.currentRevenue, assumptions.growthRates);
  const ebit = computeEbit(revenue, assumptions.ebitMargin);
  const nopat = computeNopat(ebit, assumptions.taxRate);
  const fcf = computeFcf(nopat, assumptions.fcfConversion);

  return { revenue, ebit, nopat, fcf };
}
