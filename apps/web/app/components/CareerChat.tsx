'use client';

import { useState, type FormEvent } from 'react';
import { z } from 'zod';
import type { ChatMessage } from '@careernav/schemas';

const chatResponseSchema = z.union([
  z.object({ response: z.string() }),
  z.object({ error: z.string() }),
]);

interface CareerChatProps {
  planId: string;
  initialMessages: ChatMessage[];
}

export function CareerChat({ planId, initialMessages }: CareerChatProps) {
  const [messages, setMessages] = useState<ChatMessage[]>(initialMessages);
  const [draft, setDraft] = useState('');
  const [sending, setSending] = useState(false);
  const [error, setError] = useState<string | null>(null);

  async function send(event: FormEvent<HTMLFormElement>) {
    event.preventDefault();
    const message = draft.trim();
    if (!message || sending) return;

    const history = messages;
    setMessages([...history, { role: 'user', content: message }]);
    setDraft('');
    setError(null);
    setSending(true);
    try {
      const res = await fetch('/api/chat', {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({ message, history, planId }),
      });
      const parsed = chatResponseSchema.safeParse(await res.json());
      if (!parsed.success) {
        setError(`Unexpected response (${res.status})`);
      } else if ('error' in parsed.data) {
        setError(parsed.data.error);
      } else {
        const reply = parsed.data.response;
        setMessages((prev) => [...prev, { role: 'assistant', content: reply }]);
      }
    } catch (err) {
      setError(err instanceof Error ? err.message : 'Request failed');
    } finally {
      setSending(false);
    }
  }

  async function clearHistory() {
    const res = await fetch(`/api/chat?planId=${encodeURIComponent(planId)}`, {
      method: 'DELETE',
    });
    if (res.ok) setMessages([]);
  }

  return (
    <section className="card">
      <h2 className="section-title">Ask about your plan</h2>
      <div className="chat-log">
        {messages.length === 0 && (
          <p className="hint" style={{ margin: 0 }}>
            Ask anything about your roadmap, skills or resume.
          </p>
        )}
        {messages.map((m, i) => (
          <div key={i} className={`chat-bubble ${m.role}`}>
            {m.content}
          </div>
        ))}
        {sending && <div className="chat-bubble assistant hint">Thinking…</div>}
      </div>
      {error && <p className="error-text">{error}</p>}
      <form onSubmit={send} style={{ display: 'flex', gap: '0.5rem' }}>
        <input
          className="input"
          value={draft}
          onChange={(e) => setDraft(e.target.value)}
          placeholder="What should I learn first?"
          disabled={sending}
        />
        <button className="btn btn-primary" type="submit" disabled={sending || !draft.trim()}>
          Send
        </button>
        <button
          className="btn btn-secondary"
          type="button"
          onClick={() => void clearHistory()}
          disabled={sending || messages.length === 0}
        >
          Clear
        </button>
      </form>
    </section>
  );
}
