import { describe, it, expect, vi, beforeEach } from 'vitest';

vi.mock('@careernav/agents', async (importOriginal) => ({
  ...(await importOriginal<typeof import('@careernav/agents')>()),
  runCareerChat: vi.fn(),
}));

vi.mock('@careernav/db', async (importOriginal) => ({
  ...(await importOriginal<typeof import('@careernav/db')>()),
  getDb: vi.fn(),
  getCareerPlanById: vi.fn(),
  getChatHistory: vi.fn(),
  appendChatMessages: vi.fn(),
  clearChatHistory: vi.fn(),
}));

vi.mock('@/lib/plan-session', () => ({
  getSessionPlanId: vi.fn(),
}));

import { runCareerChat } from '@careernav/agents';
import {
  appendChatMessages,
  clearChatHistory,
  getCareerPlanById,
  getChatHistory,
} from '@careernav/db';
import { bufferAgentLogSink } from '@/lib/agent-logs';
import { getSessionPlanId } from '@/lib/plan-session';
import { DELETE, GET, POST } from '@/app/api/chat/route';
import { PLAN_ID, planRow } from './fixtures';

const mockedChat = vi.mocked(runCareerChat);
const mockedPlan = vi.mocked(getCareerPlanById);
const mockedHistory = vi.mocked(getChatHistory);
const mockedAppend = vi.mocked(appendChatMessages);
const mockedClear = vi.mocked(clearChatHistory);
const mockedSession = vi.mocked(getSessionPlanId);

function chatRequest(body: unknown): Request {
  return new Request('http://localhost/api/chat', {
    method: 'POST',
    headers: { 'Content-Type': 'application/json' },
    body: typeof body === 'string' ? body : JSON.stringify(body),
  });
}

beforeEach(() => {
  vi.clearAllMocks();
  mockedSession.mockResolvedValue(PLAN_ID);
  mockedPlan.mockResolvedValue(planRow);
  mockedHistory.mockResolvedValue([]);
  mockedAppend.mockResolvedValue(undefined);
  mockedClear.mockResolvedValue(undefined);
  mockedChat.mockResolvedValue('Start with SQL.');
});

describe('POST /api/chat', () => {
  it('rejects a body that is not JSON', async () => {
    const res = await POST(chatRequest('{not json'));
    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ error: 'Invalid JSON body' });
  });

  it('rejects a blank message', async () => {
    const res = await POST(chatRequest({ message: '   ' }));
    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ error: 'Message is required' });
  });

  it('answers with a start-over notice when no plan is in session', async () => {
    mockedSession.mockResolvedValue(null);

    const res = await POST(chatRequest({ message: 'What next?' }));

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({
      response: "I'm sorry, I've lost the context of your plan. Please start over.",
    });
    expect(mockedChat).not.toHaveBeenCalled();
  });

  it('prefers stored history and records both turns', async () => {
    const stored = [
      { role: 'user' as const, content: 'Hi' },
      { role: 'assistant' as const, content: 'Hello!' },
    ];
    mockedHistory.mockResolvedValue(stored);

    const res = await POST(
      chatRequest({
        message: '  What should I learn first? ',
        history: [{ role: 'user', content: 'from the browser' }],
      }),
    );

    expect(await res.json()).toEqual({ response: 'Start with SQL.' });
    expect(mockedPlan).toHaveBeenCalledWith(undefined, PLAN_ID);
    expect(mockedChat).toHaveBeenCalledWith(
      'What should I learn first?',
      stored,
      planRow.finalPlan,
      { runId: PLAN_ID, logSink: bufferAgentLogSink },
    );
    expect(mockedAppend).toHaveBeenCalledWith(undefined, PLAN_ID, [
      { role: 'user', content: 'What should I learn first?' },
      { role: 'assistant', content: 'Start with SQL.' },
    ]);
  });

  it('uses the browser history when nothing is stored', async () => {
    const history = [{ role: 'user' as const, content: 'from the browser' }];

    await POST(chatRequest({ message: 'Next?', history, planId: PLAN_ID }));

    expect(mockedSession).not.toHaveBeenCalled();
    expect(mockedChat).toHaveBeenCalledWith('Next?', history, planRow.finalPlan, expect.any(Object));
  });

  it('reports model failures as server errors', async () => {
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    mockedChat.mockRejectedValue(new Error('Ollama chat failed: 500 - boom'));

    const res = await POST(chatRequest({ message: 'Next?' }));

    expect(res.status).toBe(500);
    expect(await res.json()).toEqual({ error: 'Ollama chat failed: 500 - boom' });
    expect(mockedAppend).not.toHaveBeenCalled();
    errorSpy.mockRestore();
  });
});

describe('GET /api/chat', () => {
  it('returns the stored history for the session plan', async () => {
    mockedHistory.mockResolvedValue([{ role: 'user', content: 'Hi' }]);

    const res = await GET(new Request('http://localhost/api/chat'));

    expect(await res.json()).toEqual({ messages: [{ role: 'user', content: 'Hi' }] });
    expect(mockedHistory).toHaveBeenCalledWith(undefined, PLAN_ID);
  });

  it('returns no messages for a malformed plan id', async () => {
    const res = await GET(new Request('http://localhost/api/chat?planId=abc'));

    expect(await res.json()).toEqual({ messages: [] });
    expect(mockedHistory).not.toHaveBeenCalled();
  });

  it('returns no messages without a plan', async () => {
    mockedSession.mockResolvedValue(null);

    const res = await GET(new Request('http://localhost/api/chat'));

    expect(await res.json()).toEqual({ messages: [] });
    expect(mockedHistory).not.toHaveBeenCalled();
  });
});

describe('DELETE /api/chat', () => {
  it('clears the history of the requested plan', async () => {
    const res = await DELETE(
      new Request(`http://localhost/api/chat?planId=${PLAN_ID}`, { method: 'DELETE' }),
    );

    expect(res.status).toBe(204);
    expect(mockedClear).toHaveBeenCalledWith(undefined, PLAN_ID);
    expect(mockedSession).not.toHaveBeenCalled();
  });

  it('refuses a malformed plan id', async () => {
    const res = await DELETE(
      new Request('http://localhost/api/chat?planId=abc', { method: 'DELETE' }),
    );

    expect(res.status).toBe(400);
    expect(mockedClear).not.toHaveBeenCalled();
  });

  it('needs a plan to clear', async () => {
    mockedSession.mockResolvedValue(null);

    const res = await DELETE(new Request('http://localhost/api/chat', { method: 'DELETE' }));

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ error: 'No plan selected' });
  });
});
