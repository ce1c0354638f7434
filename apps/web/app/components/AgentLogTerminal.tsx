'use client';

import { useEffect, useRef, useState } from 'react';
import { z } from 'zod';

const logEntrySchema = z.object({
  id: z.string(),
  ts: z.number(),
  agent: z.string(),
  level: z.enum(['info', 'warn', 'error', 'success']),
  message: z.string(),
  detail: z.string().optional(),
});
type LogEntry = z.infer<typeof logEntrySchema>;

const logsResponseSchema = z.object({ logs: z.array(logEntrySchema) });

const POLL_INTERVAL_MS = 700;

const LEVEL_COLORS: Record<LogEntry['level'], string> = {
  info: 'var(--text-secondary)',
  warn: 'var(--warning)',
  error: 'var(--error)',
  success: 'var(--success)',
};

interface AgentLogTerminalProps {
  /** Poll while true; keeps the lines after it turns false */
  isActive: boolean;
  /** Show only entries after this id */
  afterId?: string;
}

/** Id of the newest buffered entry, so a new run can skip older lines. */
export async function fetchLatestLogId(): Promise<string | undefined> {
  try {
    const res = await fetch('/api/logs', { cache: 'no-store' });
    if (!res.ok) return undefined;
    const parsed = logsResponseSchema.safeParse(await res.json());
    if (!parsed.success) return undefined;
    return parsed.data.logs[parsed.data.logs.length - 1]?.id;
  } catch (err) {
    console.warn('[AgentLogTerminal] could not read log buffer', err);
    return undefined;
  }
}

/** Polls /api/logs and prints agent progress lines while a run is in flight. */
export function AgentLogTerminal({ isActive, afterId }: AgentLogTerminalProps) {
  const [logs, setLogs] = useState<LogEntry[]>([]);
  const terminalRef = useRef<HTMLDivElement>(null);

  useEffect(() => {
    if (!isActive) return;
    setLogs([]);

    let stopped = false;
    let lastId = afterId;
    let timer: ReturnType<typeof setTimeout> | undefined;

    async function poll() {
      try {
        const qs = lastId ? `?after=${encodeURIComponent(lastId)}` : '';
        const res = await fetch(`/api/logs${qs}`, { cache: 'no-store' });
        if (res.ok) {
          const parsed = logsResponseSchema.safeParse(await res.json());
          if (parsed.success) {
            const fresh = parsed.data.logs;
            lastId = fresh[fresh.length - 1]?.id ?? lastId;
            if (!stopped && fresh.length > 0) setLogs((prev) => [...prev, ...fresh]);
          }
        }
      } catch (err) {
        console.warn('[AgentLogTerminal] poll failed', err);
      }
      if (!stopped) timer = setTimeout(poll, POLL_INTERVAL_MS);
    }
    void poll();

    return () => {
      stopped = true;
      if (timer) clearTimeout(timer);
    };
  }, [isActive, afterId]);

  useEffect(() => {
    terminalRef.current?.scrollTo({ top: terminalRef.current.scrollHeight });
  }, [logs]);

  if (logs.length === 0 && !isActive) return null;

  return (
    <div className="terminal" ref={terminalRef}>
      {logs.length === 0 && <div style={{ color: 'var(--muted)' }}>Waiting for agents…</div>}
      {logs.map((log) => (
        <div key={log.id} style={{ color: LEVEL_COLORS[log.level] }}>
          <span style={{ color: 'var(--muted)' }}>
            {new Date(log.ts).toLocaleTimeString()} [{log.agent}]
          </span>{' '}
          {log.message}
          {log.detail && <span style={{ color: 'var(--muted)' }}> ({log.detail})</span>}
        </div>
      ))}
    </div>
  );
}
