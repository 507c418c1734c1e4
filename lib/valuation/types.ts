// lib/valuation/types.ts
// DCF Valuation Engine - Type Definitions

import type { Decimal } from '@/lib/math';
import type { ValuationError } from './errors';

export const FORECAST_YEARS = 5;

// ============================================================================
// Inputs
// ============================================================================

export interface ValuationAssumptions {
  readonly currentRevenue: Decimal.Value; // $M, year 0 (not projected)
  readonly growthRates: readonly Decimal.Value[]; // one per forecast year
  readonly ebitMargin: Decimal.Value;
  readonly taxRate: Decimal.Value; // [0, 1)
  readonly wacc: Decimal.Value;
  readonly terminalGrowth: Decimal.Value;
  readonly fcfConversion: Decimal.Value; // share of NOPAT
}

// ============================================================================
// Projection & Result
// ============================================================================

export interface Projection {
  readonly revenue: readonly Decimal[];
  readonly ebit: readonly Decimal[];
  readonly nopat: readonly Decimal[];
  readonly fcf: readonly Decimal[];
}

/** Discounting of a fixed FCF series at one (wacc, terminal growth) pair. */
export interface DiscountedCashFlows {
  readonly discountFactors: readonly Decimal[];
  readonly pvFcf: readonly Decimal[];
  readonly terminalValue: Decimal;
  readonly pvTerminalValue: Decimal;
  readonly pvForecastPeriod: Decimal;
  readonly enterpriseValue: Decimal;
}

export interface ValuationResult extends Projection, DiscountedCashFlows {
  readonly assumptions: ValuationAssumptions;
}

// ============================================================================
// Sensitivity
// ============================================================================

export interface SweepAxes {
  readonly waccValues: readonly Decimal.Value[];
  readonly terminalGrowthValues: readonly Decimal.Value[];
}

export interface InfeasibleCell {
  readonly row: number; // terminal growth index
  readonly column: number; // wacc index
  readonly wacc: Decimal;
  readonly terminalGrowth: Decimal;
  readonly error: ValuationError;
}

export interface SensitivityGrid {
  readonly waccValues: readonly Decimal[];
  readonly terminalGrowthValues: readonly Decimal[];
  // matrix[row][column]; null marks an infeasible (wacc, growth) pair
  readonly matrix: readonly (readonly (Decimal | null)[])[];
  readonly infeasibleCells: readonly InfeasibleCell[];
}

export interface WaccSensitivity {
  readonly sensitivity: Decimal; // fractional EV change per `step` of WACC
  readonly baseEnterpriseValue: Decimal;
  readonly enterpriseValueAtPlus: Decimal;
  readonly enterpriseValueAtMinus: Decimal;
  readonly step: Decimal;
}

// ============================================================================
// Insights
// ============================================================================

export type ValuationWarningCode = 'HIGH_TERMINAL_VALUE_SHARE' | 'NARROW_WACC_SPREAD';

export interface ValuationWarning {
  code: ValuationWarningCode;
  message: string;
}

export interface ValuationInsights {
  revenueMultiple: Decimal | null; // EV / current revenue
  terminalRevenueMultiple: Decimal | null; // EV / final-year revenue
  estimatedEbitdaMultiple: Decimal | null;
  terminalValueShare: Decimal | null;
  forecastPeriodShare: Decimal | null;
  revenueCagr: Decimal | null;
  waccSpread: Decimal;
  warnings: ValuationWarning[];
}
