import { NextResponse } from 'next/server';
import { BadRequestError, errorResponse, readJsonBody } from '@/lib/http';
import { getValuationQueue } from '@/lib/queue';
import {
  isValuationJobName,
  parseAssumptions,
  parseSweepAxes,
  parseUnit,
  unwrap,
  VALUATION_JOB_NAMES,
} from '@/lib/valuation';

export const dynamic = 'force-dynamic';

/**
 * Enqueues a valuation job for the worker.
 * Body: { type, assumptions?, axes?, unit? }
 */
export async function POST(request: Request) {
  try {
    const body = await readJsonBody(request);
    const { type } = body;

    if (!isValuationJobName(type)) {
      throw new BadRequestError(`type must be one of: ${VALUATION_JOB_NAMES.join(', ')}`);
    }

    // 큐에 넣기 전에 입력 검증 (잘못된 입력은 422로 즉시 반환)
    const unit = unwrap(parseUnit(body.unit));
    unwrap(parseAssumptions(body.assumptions, { unit }));
    if (type === 'SensitivityGridJob') {
      unwrap(parseSweepAxes(body.axes, { unit }));
    }

    const job = await getValuationQueue().add(type, {
      assumptions: body.assumptions,
      axes: body.axes,
      unit: body.unit,
    });

    console.log(`[API/ValuationJobs] Queued ${type} (ID: ${job.id})`);

    return NextResponse.json({ jobId: job.id, type, status: 'QUEUED' });
  } catch (error) {
    return errorResponse('API/ValuationJobs', error);
  }
}

/**
 * Job status polling: ?id=<jobId>
 */
export async function GET(request: Request) {
  const { searchParams } = new URL(request.url);
  const id = searchParams.get('id')?.trim();

  if (!id) {
    return NextResponse.json({ error: 'Missing required query parameter: id' }, { status: 400 });
  }

  try {
    const job = await getValuationQueue().getJob(id);
    if (!job) {
      return NextResponse.json({ error: `Job not found: ${id}` }, { status: 404 });
    }

    const state = await job.getState();

    return NextResponse.json({
      jobId: job.id,
      type: job.name,
      state,
      result: state === 'completed' ? job.returnvalue : null,
      failedReason: state === 'failed' ? job.failedReason : null,
    });
  } catch (error) {
    return errorResponse('API/ValuationJobs', error);
  }
}
