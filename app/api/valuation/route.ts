import { NextResponse } from 'next/server';
import { errorResponse, readJsonBody } from '@/lib/http';
import {
  parseAssumptions,
  parseUnit,
  runValuation,
  serializeInsights,
  serializeValuation,
  summarizeValuation,
  unwrap,
} from '@/lib/valuation';

export const dynamic = 'force-dynamic';

/**
 * Base-case DCF valuation.
 * Body: { assumptions?, unit?: 'FRACTION' | 'PERCENT' }
 */
export async function POST(request: Request) {
  try {
    const body = await readJsonBody(request);

    // 1. 입력 검증 (defaults, unit conversion)
    const unit = unwrap(parseUnit(body.unit));
    const assumptions = unwrap(parseAssumptions(body.assumptions, { unit }));

    // 2. 밸류에이션 실행
    const result = unwrap(runValuation(assumptions));

    return NextResponse.json({
      status: 'success',
      valuation: serializeValuation(result),
      insights: serializeInsights(summarizeValuation(result)),
    });
  } catch (error) {
    return errorResponse('API/Valuation', error);
  }
}
