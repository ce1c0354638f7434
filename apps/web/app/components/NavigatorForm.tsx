'use client';

import { useState, type FormEvent } from 'react';
import { useRouter } from 'next/navigation';
import { z } from 'zod';
import { CUSTOM_ROLE_CHOICE } from '@careernav/schemas';
import { AgentLogTerminal, fetchLatestLogId } from './AgentLogTerminal';

const processResponseSchema = z.union([
  z.object({ planId: z.string() }),
  z.object({ error: z.string() }),
]);

interface NavigatorFormProps {
  presets: string[];
}

export function NavigatorForm({ presets }: NavigatorFormProps) {
  const router = useRouter();
  const [careerChoice, setCareerChoice] = useState('resume_based');
  const [running, setRunning] = useState(false);
  const [error, setError] = useState<string | null>(null);
  const [logStart, setLogStart] = useState<string | undefined>(undefined);

  async function handleSubmit(event: FormEvent<HTMLFormElement>) {
    event.preventDefault();
    setError(null);
    const body = new FormData(event.currentTarget);
    setLogStart(await fetchLatestLogId());
    setRunning(true);
    try {
      const res = await fetch('/api/process', { method: 'POST', body });
      const parsed = processResponseSchema.safeParse(await res.json());
      if (!parsed.success) {
        setError(`Unexpected response (${res.status})`);
      } else if ('error' in parsed.data) {
        setError(parsed.data.error);
      } else {
        router.push(`/plans/${parsed.data.planId}`);
        return;
      }
    } catch (err) {
      setError(err instanceof Error ? err.message : 'Request failed');
    }
    setRunning(false);
  }

  return (
    <form className="card" onSubmit={handleSubmit}>
      <div className="field">
        <label className="label" htmlFor="resume">
          Resume (PDF)
        </label>
        <input className="input" id="resume" name="resume" type="file" accept=".pdf" required />
      </div>

      <div className="field">
        <label className="label" htmlFor="photo">
          Photo (optional)
        </label>
        <input className="input" id="photo" name="photo" type="file" accept=".png,.jpg,.jpeg" />
        <div className="hint">Shown in the header of your tailored resume.</div>
      </div>

      <div className="field">
        <label className="label" htmlFor="linkedin_url">
          LinkedIn profile URL (optional)
        </label>
        <input
          className="input"
          id="linkedin_url"
          name="linkedin_url"
          type="url"
          placeholder="https://www.linkedin.com/in/your-name"
        />
      </div>

      <div className="field">
        <label className="label" htmlFor="career_choice">
          Career direction
        </label>
        <select
          className="select"
          id="career_choice"
          name="career_choice"
          value={careerChoice}
          onChange={(e) => setCareerChoice(e.target.value)}
        >
          <option value="resume_based">Suggest a role from my resume</option>
          <option value="market_demand">Suggest an in-demand role I can reach</option>
          {presets.map((role) => (
            <option key={role} value={role}>
              {role}
            </option>
          ))}
          <option value={CUSTOM_ROLE_CHOICE}>Other…</option>
        </select>
      </div>

      {careerChoice === CUSTOM_ROLE_CHOICE && (
        <div className="field">
          <label className="label" htmlFor="custom_role">
            Your target role
          </label>
          <input className="input" id="custom_role" name="custom_role" maxLength={120} required />
        </div>
      )}

      {error && (
        <p className="error-text" role="alert">
          {error}
        </p>
      )}

      <button className="btn btn-primary" type="submit" disabled={running}>
        {running ? 'Building your plan…' : 'Build my career plan'}
      </button>

      <div style={{ marginTop: '1rem' }}>
        <AgentLogTerminal isActive={running} afterId={logStart} />
      </div>
    </form>
  );
}
