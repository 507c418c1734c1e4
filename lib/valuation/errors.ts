// lib/valuation/errors.ts
// Valuation error taxonomy. Every failure is input-driven and recoverable.

export const ValuationErrorCode = {
  INFEASIBLE_TERMINAL_GROWTH: 'INFEASIBLE_TERMINAL_GROWTH',
  DEGENERATE_PERTURBATION: 'DEGENERATE_PERTURBATION',
  ZERO_BASE_VALUE: 'ZERO_BASE_VALUE',
  INVALID_ASSUMPTION: 'INVALID_ASSUMPTION',
  INVALID_SWEEP: 'INVALID_SWEEP',
} as const;

export type ValuationErrorCode = (typeof ValuationErrorCode)[keyof typeof ValuationErrorCode];

export type ValuationErrorDetails = Record<string, string | number | null>;

export class ValuationError extends Error {
  constructor(
    public code: ValuationErrorCode,
    message: string,
    public details: ValuationErrorDetails = {}
  ) {
    super(message);
    this.name = 'ValuationError';
  }
}

export class InfeasibleTerminalGrowthError extends ValuationError {
  constructor(wacc: string, terminalGrowth: string, extra: ValuationErrorDetails = {}) {
    super(
      ValuationErrorCode.INFEASIBLE_TERMINAL_GROWTH,
      `WACC (${wacc}) must be greater than terminal growth (${terminalGrowth})`,
      { wacc, terminalGrowth, ...extra }
    );
    this.name = 'InfeasibleTerminalGrowthError';
  }
}

export class InvalidAssumptionError extends ValuationError {
  constructor(field: string, message: string, value: string | number | null = null) {
    super(ValuationErrorCode.INVALID_ASSUMPTION, `Invalid ${field}: ${message}`, { field, value });
    this.name = 'InvalidAssumptionError';
  }
}

export function isValuationError(error: unknown): error is ValuationError {
  return error instanceof ValuationError;
}
