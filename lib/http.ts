import { NextResponse } from 'next/server';
import { isValuationError, serializeValuationError } from '@/lib/valuation';

export class BadRequestError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'BadRequestError';
  }
}

/**
 * Reads a JSON object body. An empty body reads as {}.
 */
export async function readJsonBody(request: Request): Promise<Record<string, unknown>> {
  const text = await request.text();
  if (text.trim() === '') return {};

  let body: unknown;
  try {
    body = JSON.parse(text);
  } catch {
    throw new BadRequestError('Request body must be valid JSON');
  }

  if (typeof body !== 'object' || body === null || Array.isArray(body)) {
    throw new BadRequestError('Request body must be a JSON object');
  }
  return { ...body };
}

/**
 * Maps a thrown error to a JSON response: 400 for malformed requests,
 * 422 for valuation errors, 500 otherwise.
 */
export function errorResponse(tag: string, error: unknown) {
  if (error instanceof BadRequestError) {
    return NextResponse.json({ error: error.message }, { status: 400 });
  }
  if (isValuationError(error)) {
    console.warn(`[${tag}] Rejected: ${error.code} ${error.message}`);
    return NextResponse.json(serializeValuationError(error), { status: 422 });
  }

  console.error(`[${tag}] Error:`, error);
  const message = error instanceof Error ? error.message : 'Internal Server Error';
  return NextResponse.json({ error: message || 'Internal Server Error' }, { status: 500 });
}
