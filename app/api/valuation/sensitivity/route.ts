import { NextResponse } from 'next/server';
import { errorResponse, readJsonBody } from '@/lib/http';
import {
  parseAssumptions,
  parseSweepAxes,
  parseUnit,
  runSensitivityGrid,
  runValuation,
  serializeSensitivityGrid,
  serializeValuationError,
  serializeWaccSensitivity,
  unwrap,
  waccSensitivity,
} from '@/lib/valuation';

export const dynamic = 'force-dynamic';

/**
 * WACC × terminal growth sweep plus the ±1pp WACC sensitivity scalar.
 * Body: { assumptions?, axes?: { wacc?, terminalGrowth? }, unit? }
 */
export async function POST(request: Request) {
  try {
    const body = await readJsonBody(request);
    const unit = unwrap(parseUnit(body.unit));
    const assumptions = unwrap(parseAssumptions(body.assumptions, { unit }));
    const axes = unwrap(parseSweepAxes(body.axes, { unit }));

    const base = unwrap(runValuation(assumptions));
    const grid = runSensitivityGrid(assumptions, axes);
    if (grid.infeasibleCells.length > 0) {
      console.warn(`[API/Sensitivity] Masked ${grid.infeasibleCells.length} infeasible cells`);
    }

    // WACC 민감도 실패는 그리드와 별개로 보고
    const sensitivity = waccSensitivity(assumptions);

    return NextResponse.json({
      status: 'success',
      enterpriseValue: base.enterpriseValue.toNumber(),
      grid: serializeSensitivityGrid(grid),
      waccSensitivity: sensitivity.ok ? serializeWaccSensitivity(sensitivity.value) : null,
      waccSensitivityError: sensitivity.ok ? null : serializeValuationError(sensitivity.error),
    });
  } catch (error) {
    return errorResponse('API/Sensitivity', error);
  }
}
