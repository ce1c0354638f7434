import { NextResponse } from 'next/server';
import { getDb, listRecentCareerPlans } from '@careernav/db';
import { errorResponse } from '@/lib/route-errors';

/** Recent plans, newest first. */
export async function GET(req: Request) {
  try {
    const { searchParams } = new URL(req.url);
    const limit = Math.min(Math.max(Number(searchParams.get('limit')) || 20, 1), 100);
    const plans = await listRecentCareerPlans(getDb(), limit);
    return NextResponse.json({ plans });
  } catch (e) {
    return errorResponse(e, 'plans', 'Failed to list plans');
  }
}
