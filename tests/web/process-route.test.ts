import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';

vi.mock('@/lib/process-submission', async (importOriginal) => ({
  ...(await importOriginal<typeof import('@/lib/process-submission')>()),
  processSubmission: vi.fn(),
}));

vi.mock('next/headers', async () => {
  const { cookieStore } = await import('./cookie-store');
  return { cookies: async () => cookieStore };
});

import { DATABASE_ERROR_MESSAGE } from '@/lib/db-error';
import {
  MISSING_RESUME_MESSAGE,
  processSubmission,
  SubmissionError,
} from '@/lib/process-submission';
import { SESSION_COOKIE_NAME, verifySessionToken } from '@/lib/session';
import { POST } from '@/app/api/process/route';
import { cookieStore } from './cookie-store';
import { PLAN_ID, planRow } from './fixtures';

const mockedProcess = vi.mocked(processSubmission);

const submit = () =>
  POST(new Request('http://localhost/api/process', { method: 'POST', body: new FormData() }));

beforeEach(() => {
  vi.clearAllMocks();
  cookieStore.jar.clear();
  process.env.SESSION_SECRET = 'test-secret-test-secret';
  mockedProcess.mockResolvedValue(planRow);
});

afterEach(() => {
  delete process.env.SESSION_SECRET;
});

describe('POST /api/process', () => {
  it('returns the plan and remembers it in the session cookie', async () => {
    const res = await submit();

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ planId: PLAN_ID, plan: planRow.finalPlan });
    expect(cookieStore.set).toHaveBeenCalledWith(
      SESSION_COOKIE_NAME,
      expect.any(String),
      expect.objectContaining({ httpOnly: true, sameSite: 'lax', path: '/', maxAge: 604800 }),
    );
    const token = cookieStore.jar.get(SESSION_COOKIE_NAME) ?? '';
    expect(verifySessionToken(token)).toBe(PLAN_ID);
  });

  it('answers 400 for submission problems without touching the session', async () => {
    mockedProcess.mockRejectedValue(new SubmissionError(MISSING_RESUME_MESSAGE));

    const res = await submit();

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ error: MISSING_RESUME_MESSAGE });
    expect(cookieStore.set).not.toHaveBeenCalled();
  });

  it('answers 503 when the database is unreachable', async () => {
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    mockedProcess.mockRejectedValue(
      Object.assign(new Error('connect ECONNREFUSED 127.0.0.1:5432'), { code: 'ECONNREFUSED' }),
    );

    const res = await submit();

    expect(res.status).toBe(503);
    expect(await res.json()).toEqual({ error: DATABASE_ERROR_MESSAGE });
    errorSpy.mockRestore();
  });
});
