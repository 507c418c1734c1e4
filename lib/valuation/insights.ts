// lib/valuation/insights.ts
// Summary multiples, value composition and risk warnings for a base-case result

import { Decimal, FinMath, ONE, toDecimal } from '@/lib/math';
import type { ValuationInsights, ValuationResult, ValuationWarning } from './types';

export const HIGH_TERMINAL_VALUE_SHARE = 0.75;
export const MIN_WACC_SPREAD = 0.03;

export function summarizeValuation(result: ValuationResult): ValuationInsights {
  const { assumptions, enterpriseValue, pvTerminalValue, pvForecastPeriod } = result;
  const currentRevenue = toDecimal(assumptions.currentRevenue);
  const finalRevenue = result.revenue[result.revenue.length - 1];
  const finalEbit = result.ebit[result.ebit.length - 1];

  // EBIT grossed up by the tax rate, used as a rough EBITDA proxy
  const grossedUpEbit = finalEbit ? FinMath.ratio(finalEbit, ONE.minus(assumptions.taxRate)) : null;

  const terminalValueShare = FinMath.ratio(pvTerminalValue, enterpriseValue);
  const waccSpread = toDecimal(assumptions.wacc).minus(assumptions.terminalGrowth);

  const warnings: ValuationWarning[] = [];
  if (terminalValueShare && terminalValueShare.gt(HIGH_TERMINAL_VALUE_SHARE)) {
    warnings.push({
      code: 'HIGH_TERMINAL_VALUE_SHARE',
      message: `${terminalValueShare.times(100).toFixed(1)}% of value sits in the terminal period`,
    });
  }
  if (waccSpread.lt(MIN_WACC_SPREAD)) {
    warnings.push({
      code: 'NARROW_WACC_SPREAD',
      message: `WACC - terminal growth spread of ${waccSpread.times(100).toFixed(2)}% is below ${MIN_WACC_SPREAD * 100}%`,
    });
  }

  return {
    revenueMultiple: FinMath.ratio(enterpriseValue, currentRevenue),
    terminalRevenueMultiple: finalRevenue ? FinMath.ratio(enterpriseValue, finalRevenue) : null,
    estimatedEbitdaMultiple: grossedUpEbit ? FinMath.ratio(enterpriseValue, grossedUpEbit) : null,
    terminalValueShare,
    forecastPeriodShare: FinMath.ratio(pvForecastPeriod, enterpriseValue),
    revenueCagr: compoundGrowth(currentRevenue, finalRevenue, result.revenue.length),
    waccSpread,
    warnings,
  };
}

function compoundGrowth(start: Decimal, end: Decimal | undefined, years: number): Decimal | null {
  if (!end || years === 0 || start.isZero()) return null;
  const growth = end.div(start);
  if (growth.isNegative()) return null;
  return growth.pow(ONE.div(years)).minus(ONE);
}
