import { NextResponse } from 'next/server';
import { runCareerChat } from '@careernav/agents';
import {
  appendChatMessages,
  clearChatHistory,
  getCareerPlanById,
  getChatHistory,
  getDb,
} from '@careernav/db';
import { chatRequestSchema, isPlanId } from '@careernav/schemas';
import { bufferAgentLogSink } from '@/lib/agent-logs';
import { getSessionPlanId } from '@/lib/plan-session';
import { errorResponse } from '@/lib/route-errors';

const LOST_CONTEXT_RESPONSE =
  "I'm sorry, I've lost the context of your plan. Please start over.";

/** An explicit id wins over the session; a malformed one names no plan. */
async function resolvePlanId(explicit: string | null | undefined): Promise<string | null> {
  const id = explicit || (await getSessionPlanId());
  return isPlanId(id) ? id : null;
}

export async function POST(request: Request) {
  try {
    let body: unknown;
    try {
      body = await request.json();
    } catch {
      return NextResponse.json({ error: 'Invalid JSON body' }, { status: 400 });
    }
    const { message, history, planId } = chatRequestSchema.parse(body);

    const db = getDb();
    const id = await resolvePlanId(planId);
    const plan = id ? await getCareerPlanById(db, id) : null;
    if (!plan) {
      return NextResponse.json({ response: LOST_CONTEXT_RESPONSE });
    }

    // stored turns win over what the browser sent
    const stored = await getChatHistory(db, plan.id);
    const response = await runCareerChat(
      message,
      stored.length > 0 ? stored : history,
      plan.finalPlan,
      { runId: plan.id, logSink: bufferAgentLogSink },
    );

    await appendChatMessages(db, plan.id, [
      { role: 'user', content: message },
      { role: 'assistant', content: response },
    ]);
    return NextResponse.json({ response });
  } catch (e) {
    return errorResponse(e, 'chat', 'Failed to answer');
  }
}

export async function GET(req: Request) {
  try {
    const { searchParams } = new URL(req.url);
    const id = await resolvePlanId(searchParams.get('planId'));
    if (!id) {
      return NextResponse.json({ messages: [] });
    }
    const messages = await getChatHistory(getDb(), id);
    return NextResponse.json({ messages });
  } catch (e) {
    return errorResponse(e, 'chat GET', 'Failed to load chat history');
  }
}

export async function DELETE(req: Request) {
  try {
    const { searchParams } = new URL(req.url);
    const id = await resolvePlanId(searchParams.get('planId'));
    if (!id) {
      return NextResponse.json({ error: 'No plan selected' }, { status: 400 });
    }
    await clearChatHistory(getDb(), id);
    return new NextResponse(null, { status: 204 });
  } catch (e) {
    return errorResponse(e, 'chat DELETE', 'Failed to clear chat history');
  }
}
