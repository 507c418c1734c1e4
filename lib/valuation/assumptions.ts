// lib/valuation/assumptions.ts
// Input boundary: defaults, unit conversion and validation of raw assumption payloads

import { Decimal, toDecimal } from '@/lib/math';
import { InvalidAssumptionError, ValuationError, ValuationErrorCode } from './errors';
import { fail, succeed, type Outcome } from './outcome';
import { buildAxis, DEFAULT_SWEEP_AXES } from './sensitivity';
import { FORECAST_YEARS, type SweepAxes, type ValuationAssumptions } from './types';

export type InputUnit = 'FRACTION' | 'PERCENT';

export interface ParseOptions {
  unit?: InputUnit;
}

export const MAX_AXIS_POINTS = 50;

export const DEFAULT_ASSUMPTIONS: ValuationAssumptions = {
  currentRevenue: 100,
  growthRates: [0.15, 0.12, 0.1, 0.08, 0.06],
  ebitMargin: 0.2,
  taxRate: 0.25,
  wacc: 0.1,
  terminalGrowth: 0.03,
  fcfConversion: 0.8,
};

type RateField = 'ebitMargin' | 'taxRate' | 'wacc' | 'terminalGrowth' | 'fcfConversion';

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const describeValue = (value: unknown): string | number | null => {
  if (typeof value === 'number' || typeof value === 'string') return value;
  if (value === undefined || value === null) return null;
  return JSON.stringify(value);
};

/**
 * Reads a finite number from a JSON value. Numeric strings are accepted.
 */
function readNumber(field: string, value: unknown): Outcome<number> {
  const parsed =
    typeof value === 'number'
      ? value
      : typeof value === 'string' && value.trim() !== ''
        ? Number(value)
        : Number.NaN;

  if (!Number.isFinite(parsed)) {
    return fail(new InvalidAssumptionError(field, 'must be a finite number', describeValue(value)));
  }
  return succeed(parsed);
}

function scale(value: number, unit: InputUnit): Decimal {
  const decimal = toDecimal(value);
  return unit === 'PERCENT' ? decimal.div(100) : decimal;
}

/**
 * Builds validated assumptions from a raw JSON payload. Missing fields take
 * DEFAULT_ASSUMPTIONS; with unit PERCENT every rate is divided by 100.
 */
export function parseAssumptions(
  raw: unknown,
  options: ParseOptions = {}
): Outcome<ValuationAssumptions> {
  const unit = options.unit ?? 'FRACTION';

  if (raw === undefined || raw === null) {
    return succeed(DEFAULT_ASSUMPTIONS);
  }
  if (!isRecord(raw)) {
    return fail(new InvalidAssumptionError('assumptions', 'must be an object', describeValue(raw)));
  }

  // Current revenue (never unit-scaled)
  let currentRevenue: Decimal.Value = DEFAULT_ASSUMPTIONS.currentRevenue;
  if (raw.currentRevenue !== undefined) {
    const revenue = readNumber('currentRevenue', raw.currentRevenue);
    if (!revenue.ok) return revenue;
    if (revenue.value <= 0) {
      return fail(new InvalidAssumptionError('currentRevenue', 'must be positive', revenue.value));
    }
    currentRevenue = revenue.value;
  }

  // Growth rates
  let growthRates: readonly Decimal.Value[] = DEFAULT_ASSUMPTIONS.growthRates;
  if (raw.growthRates !== undefined) {
    if (!Array.isArray(raw.growthRates) || raw.growthRates.length !== FORECAST_YEARS) {
      return fail(
        new InvalidAssumptionError(
          'growthRates',
          `must be an array of ${FORECAST_YEARS} rates`,
          describeValue(raw.growthRates)
        )
      );
    }

    const rates: Decimal[] = [];
    for (const [index, item] of raw.growthRates.entries()) {
      const rate = readNumber(`growthRates[${index}]`, item);
      if (!rate.ok) return rate;
      rates.push(scale(rate.value, unit));
    }
    growthRates = rates;
  }

  // Ratio fields
  const body = raw;
  const readRate = (field: RateField): Outcome<Decimal.Value> => {
    if (body[field] === undefined) return succeed(DEFAULT_ASSUMPTIONS[field]);
    const rate = readNumber(field, body[field]);
    return rate.ok ? succeed(scale(rate.value, unit)) : rate;
  };

  const ebitMargin = readRate('ebitMargin');
  if (!ebitMargin.ok) return ebitMargin;
  const taxRateValue = readRate('taxRate');
  if (!taxRateValue.ok) return taxRateValue;
  const waccValue = readRate('wacc');
  if (!waccValue.ok) return waccValue;
  const terminalGrowthValue = readRate('terminalGrowth');
  if (!terminalGrowthValue.ok) return terminalGrowthValue;
  const fcfConversion = readRate('fcfConversion');
  if (!fcfConversion.ok) return fcfConversion;

  const taxRate = toDecimal(taxRateValue.value);
  if (taxRate.isNegative() || taxRate.gte(1)) {
    return fail(new InvalidAssumptionError('taxRate', 'must be within [0, 1)', taxRate.toNumber()));
  }

  const wacc = toDecimal(waccValue.value);
  const terminalGrowth = toDecimal(terminalGrowthValue.value);
  if (wacc.lte(terminalGrowth)) {
    return fail(
      new InvalidAssumptionError(
        'wacc',
        `must be greater than terminal growth (${terminalGrowth.toString()})`,
        wacc.toNumber()
      )
    );
  }

  return succeed({
    currentRevenue,
    growthRates,
    ebitMargin: ebitMargin.value,
    taxRate: taxRateValue.value,
    wacc: waccValue.value,
    terminalGrowth: terminalGrowthValue.value,
    fcfConversion: fcfConversion.value,
  });
}

function invalidSweep(axis: string, message: string, value: unknown): ValuationError {
  return new ValuationError(ValuationErrorCode.INVALID_SWEEP, `Invalid ${axis} axis: ${message}`, {
    axis,
    value: describeValue(value),
  });
}

// Same number rules as the assumptions, reported as a sweep error
function readAxisNumber(axis: string, label: string, value: unknown): Outcome<number> {
  const parsed = readNumber(axis, value);
  if (parsed.ok) return parsed;
  return fail(invalidSweep(axis, `${label} must be a finite number`, value));
}

function parseAxis(
  axis: string,
  raw: unknown,
  fallback: readonly Decimal.Value[],
  unit: InputUnit
): Outcome<readonly Decimal.Value[]> {
  if (raw === undefined || raw === null) return succeed(fallback);

  // Explicit list of values
  if (Array.isArray(raw)) {
    if (raw.length === 0) return fail(invalidSweep(axis, 'must not be empty', raw));
    if (raw.length > MAX_AXIS_POINTS) {
      return fail(invalidSweep(axis, `must not exceed ${MAX_AXIS_POINTS} points`, raw.length));
    }

    const values: Decimal[] = [];
    for (const item of raw) {
      const value = readAxisNumber(axis, 'values', item);
      if (!value.ok) return value;
      values.push(scale(value.value, unit));
    }
    return succeed(values);
  }

  // { start, stop, points } range
  if (isRecord(raw)) {
    const start = readAxisNumber(axis, 'start', raw.start);
    if (!start.ok) return start;
    const stop = readAxisNumber(axis, 'stop', raw.stop);
    if (!stop.ok) return stop;

    const points = readNumber(axis, raw.points);
    if (!points.ok || !Number.isInteger(points.value) || points.value < 1) {
      return fail(invalidSweep(axis, 'points must be a positive integer', raw.points));
    }
    if (points.value > MAX_AXIS_POINTS) {
      return fail(invalidSweep(axis, `must not exceed ${MAX_AXIS_POINTS} points`, points.value));
    }
    return succeed(buildAxis(scale(start.value, unit), scale(stop.value, unit), points.value));
  }

  return fail(invalidSweep(axis, 'must be an array or { start, stop, points }', raw));
}

/**
 * Builds sweep axes from `{ wacc, terminalGrowth }`; a missing axis takes its default.
 */
export function parseSweepAxes(raw: unknown, options: ParseOptions = {}): Outcome<SweepAxes> {
  const unit = options.unit ?? 'FRACTION';

  if (raw === undefined || raw === null) return succeed(DEFAULT_SWEEP_AXES);
  if (!isRecord(raw)) return fail(invalidSweep('sweep', 'must be an object', raw));

  const waccValues = parseAxis('wacc', raw.wacc, DEFAULT_SWEEP_AXES.waccValues, unit);
  if (!waccValues.ok) return waccValues;

  const terminalGrowthValues = parseAxis(
    'terminalGrowth',
    raw.terminalGrowth,
    DEFAULT_SWEEP_AXES.terminalGrowthValues,
    unit
  );
  if (!terminalGrowthValues.ok) return terminalGrowthValues;

  return succeed({ waccValues: waccValues.value, terminalGrowthValues: terminalGrowthValues.value });
}

/**
 * Reads the `unit` field of a request body.
 */
export function parseUnit(raw: unknown): Outcome<InputUnit> {
  if (raw === undefined || raw === null) return succeed('FRACTION');
  if (raw === 'FRACTION' || raw === 'PERCENT') return succeed(raw);
  return fail(new InvalidAssumptionError('unit', "must be 'FRACTION' or 'PERCENT'", describeValue(raw)));
}
