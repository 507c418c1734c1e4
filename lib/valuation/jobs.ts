// lib/valuation/jobs.ts
// Queue job payloads and the pure processor the worker delegates to

import { parseAssumptions, parseSweepAxes, parseUnit } from './assumptions';
import { runValuation } from './aggregator';
import { summarizeValuation } from './insights';
import { unwrap } from './outcome';
import {
  serializeInsights,
  serializeSensitivityGrid,
  serializeValuation,
  serializeWaccSensitivity,
  type SerializedInsights,
  type SerializedSensitivityGrid,
  type SerializedValuation,
  type SerializedWaccSensitivity,
} from './serialize';
import { runSensitivityGrid, waccSensitivity } from './sensitivity';

export const VALUATION_JOB_NAMES = ['DcfValuationJob', 'SensitivityGridJob', 'WaccSensitivityJob'] as const;

export type ValuationJobName = (typeof VALUATION_JOB_NAMES)[number];

export type ValuationJobData = {
  assumptions?: unknown;
  axes?: unknown;
  unit?: unknown;
};

export type ValuationJobResult =
  | { job: 'DcfValuationJob'; valuation: SerializedValuation; insights: SerializedInsights }
  | { job: 'SensitivityGridJob'; grid: SerializedSensitivityGrid }
  | { job: 'WaccSensitivityJob'; waccSensitivity: SerializedWaccSensitivity }
  | { status: 'UNKNOWN_JOB_TYPE'; name: string };

export function isValuationJobName(name: unknown): name is ValuationJobName {
  return VALUATION_JOB_NAMES.some((jobName) => jobName === name);
}

/**
 * Runs one queued valuation. Invalid input or an infeasible valuation throws the
 * ValuationError so the queue records the job as failed.
 */
export function processValuationJob(name: string, data: ValuationJobData): ValuationJobResult {
  const unit = unwrap(parseUnit(data.unit));
  const assumptions = unwrap(parseAssumptions(data.assumptions, { unit }));

  switch (name) {
    case 'DcfValuationJob': {
      const result = unwrap(runValuation(assumptions));
      return {
        job: 'DcfValuationJob',
        valuation: serializeValuation(result),
        insights: serializeInsights(summarizeValuation(result)),
      };
    }

    case 'SensitivityGridJob': {
      const axes = unwrap(parseSweepAxes(data.axes, { unit }));
      return { job: 'SensitivityGridJob', grid: serializeSensitivityGrid(runSensitivityGrid(assumptions, axes)) };
    }

    case 'WaccSensitivityJob':
      return {
        job: 'WaccSensitivityJob',
        waccSensitivity: serializeWaccSensitivity(unwrap(waccSensitivity(assumptions))),
      };

    default:
      return { status: 'UNKNOWN_JOB_TYPE', name };
  }
}
