// lib/valuation/serialize.ts
// Decimal records → plain numbers for JSON consumers (charts, tables, job results)

import { Decimal, toDecimal } from '@/lib/math';
import type { ValuationError } from './errors';
import type {
  SensitivityGrid,
  ValuationInsights,
  ValuationResult,
  ValuationWarning,
  WaccSensitivity,
} from './types';

const num = (value: Decimal.Value) => toDecimal(value).toNumber();
const nullableNum = (value: Decimal | null) => (value === null ? null : value.toNumber());
const series = (values: readonly Decimal.Value[]) => values.map(num);

export type SerializedValuationError = {
  error: string;
  code: string;
  details: Record<string, string | number | null>;
};

export type SerializedValuation = {
  assumptions: {
    currentRevenue: number;
    growthRates: number[];
    ebitMargin: number;
    taxRate: number;
    wacc: number;
    terminalGrowth: number;
    fcfConversion: number;
  };
  revenue: number[];
  ebit: number[];
  nopat: number[];
  fcf: number[];
  discountFactors: number[];
  pvFcf: number[];
  terminalValue: number;
  pvTerminalValue: number;
  pvForecastPeriod: number;
  enterpriseValue: number;
};

export type SerializedInsights = {
  revenueMultiple: number | null;
  terminalRevenueMultiple: number | null;
  estimatedEbitdaMultiple: number | null;
  terminalValueShare: number | null;
  forecastPeriodShare: number | null;
  revenueCagr: number | null;
  waccSpread: number;
  warnings: ValuationWarning[];
};

export type SerializedSensitivityGrid = {
  waccValues: number[];
  terminalGrowthValues: number[];
  matrix: (number | null)[][];
  infeasibleCells: {
    row: number;
    column: number;
    wacc: number;
    terminalGrowth: number;
    error: SerializedValuationError;
  }[];
};

export type SerializedWaccSensitivity = {
  sensitivity: number;
  baseEnterpriseValue: number;
  enterpriseValueAtPlus: number;
  enterpriseValueAtMinus: number;
  step: number;
};

export function serializeValuationError(error: ValuationError): SerializedValuationError {
  return { error: error.message, code: error.code, details: { ...error.details } };
}

export function serializeValuation(result: ValuationResult): SerializedValuation {
  const { assumptions } = result;

  return {
    assumptions: {
      currentRevenue: num(assumptions.currentRevenue),
      growthRates: series(assumptions.growthRates),
      ebitMargin: num(assumptions.ebitMargin),
      taxRate: num(assumptions.taxRate),
      wacc: num(assumptions.wacc),
      terminalGrowth: num(assumptions.terminalGrowth),
      fcfConversion: num(assumptions.fcfConversion),
    },
    revenue: series(result.revenue),
    ebit: series(result.ebit),
    nopat: series(result.nopat),
    fcf: series(result.fcf),
    discountFactors: series(result.discountFactors),
    pvFcf: series(result.pvFcf),
    terminalValue: num(result.terminalValue),
    pvTerminalValue: num(result.pvTerminalValue),
    pvForecastPeriod: num(result.pvForecastPeriod),
    enterpriseValue: num(result.enterpriseValue),
  };
}

export function serializeInsights(insights: ValuationInsights): SerializedInsights {
  return {
    revenueMultiple: nullableNum(insights.revenueMultiple),
    terminalRevenueMultiple: nullableNum(insights.terminalRevenueMultiple),
    estimatedEbitdaMultiple: nullableNum(insights.estimatedEbitdaMultiple),
    terminalValueShare: nullableNum(insights.terminalValueShare),
    forecastPeriodShare: nullableNum(insights.forecastPeriodShare),
    revenueCagr: nullableNum(insights.revenueCagr),
    waccSpread: num(insights.waccSpread),
    warnings: insights.warnings.map((warning) => ({ ...warning })),
  };
}

export function serializeSensitivityGrid(grid: SensitivityGrid): SerializedSensitivityGrid {
  return {
    waccValues: series(grid.waccValues),
    terminalGrowthValues: series(grid.terminalGrowthValues),
    matrix: grid.matrix.map((row) => row.map(nullableNum)),
    infeasibleCells: grid.infeasibleCells.map((cell) => ({
      row: cell.row,
      column: cell.column,
      wacc: num(cell.wacc),
      terminalGrowth: num(cell.terminalGrowth),
      error: serializeValuationError(cell.error),
    })),
  };
}

export function serializeWaccSensitivity(result: WaccSensitivity): SerializedWaccSensitivity {
  return {
    sensitivity: num(result.sensitivity),
    baseEnterpriseValue: num(result.baseEnterpriseValue),
    enterpriseValueAtPlus: num(result.enterpriseValueAtPlus),
    enterpriseValueAtMinus: num(result.enterpriseValueAtMinus),
    step: num(result.step),
  };
}
