import { NextResponse } from 'next/server';
import { processSubmission } from '@/lib/process-submission';
import { setSessionPlanId } from '@/lib/plan-session';
import { errorResponse } from '@/lib/route-errors';

// the navigator makes several sequential model calls
export const maxDuration = 600;

export async function POST(request: Request) {
  try {
    const form = await request.formData();
    const plan = await processSubmission(form);
    await setSessionPlanId(plan.id);
    return NextResponse.json({ planId: plan.id, plan: plan.finalPlan });
  } catch (e) {
    return errorResponse(e, 'process', 'Failed to build career plan');
  }
}
