import { NextResponse } from 'next/server';
import { ZodError } from 'zod';
import { DATABASE_ERROR_MESSAGE, isDatabaseConnectionError } from './db-error';
import { SubmissionError } from './process-submission';

/**
 * Map a thrown error to the JSON response every route returns on failure.
 */
export function errorResponse(e: unknown, context: string, fallback: string) {
  if (e instanceof SubmissionError) {
    return NextResponse.json({ error: e.message }, { status: e.status });
  }
  if (e instanceof ZodError) {
    return NextResponse.json(
      { error: e.issues[0]?.message ?? 'Invalid request' },
      { status: 400 },
    );
  }
  console.error(`${context}:`, e);
  if (isDatabaseConnectionError(e)) {
    return NextResponse.json({ error: DATABASE_ERROR_MESSAGE }, { status: 503 });
  }
  return NextResponse.json({ error: e instanceof Error ? e.message : fallback }, { status: 500 });
}
