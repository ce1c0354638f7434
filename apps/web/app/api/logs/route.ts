import { NextResponse } from 'next/server';
import { getAgentLogs } from '@/lib/agent-logs';

/** Recent agent logs (polled by the progress terminal). */
export async function GET(req: Request) {
  try {
    const { searchParams } = new URL(req.url);
    const afterId = searchParams.get('after') ?? undefined;
    const logs = getAgentLogs(afterId);
    return NextResponse.json({ logs });
  } catch (e) {
    console.error('logs:', e);
    return NextResponse.json({ error: 'Failed to get logs' }, { status: 500 });
  }
}
