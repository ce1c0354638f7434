import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { z } from 'zod';
import {
  chatComplete,
  completeStructured,
  OllamaClient,
  OllamaModels,
  StructuredOutputError,
} from '@careernav/llm';

const fetchMock = vi.fn<typeof fetch>();

function ollamaReply(content: string, status = 200): Response {
  return new Response(
    JSON.stringify({
      model: 'test-model',
      created_at: '2026-01-01T00:00:00Z',
      message: { role: 'assistant', content },
      done: true,
    }),
    { status },
  );
}

function sentBody(call = 0): unknown {
  const init = fetchMock.mock.calls[call]?.[1];
  return JSON.parse(String(init?.body));
}

beforeEach(() => {
  fetchMock.mockReset();
  vi.stubGlobal('fetch', fetchMock);
});

afterEach(() => {
  vi.unstubAllGlobals();
});

describe('OllamaClient.chat', () => {
  it('posts a non-streaming request to /api/chat', async () => {
    fetchMock.mockResolvedValueOnce(ollamaReply('hello'));
    const client = new OllamaClient('http://ollama.test/');

    const res = await client.chat({
      model: 'm',
      messages: [{ role: 'user', content: 'hi' }],
    });

    expect(res.message.content).toBe('hello');
    expect(fetchMock.mock.calls[0]?.[0]).toBe('http://ollama.test/api/chat');
    expect(sentBody()).toEqual({
      model: 'm',
      messages: [{ role: 'user', content: 'hi' }],
      stream: false,
    });
  });

  it('throws with status and body on HTTP errors', async () => {
    fetchMock.mockResolvedValueOnce(new Response('model not found', { status: 404 }));
    const client = new OllamaClient('http://ollama.test');

    await expect(
      client.chat({ model: 'missing', messages: [{ role: 'user', content: 'hi' }] }),
    ).rejects.toThrow('Ollama chat failed: 404 - model not found');
  });
});

describe('OllamaClient.isAvailable', () => {
  it('checks the model list', async () => {
    fetchMock.mockImplementation(async () =>
      Response.json({ models: [{ name: 'llama3.1:8b-instruct-q4_K_M' }] }),
    );
    const client = new OllamaClient('http://ollama.test');

    expect(await client.isAvailable('llama3.1')).toBe(true);
    expect(await client.isAvailable('qwen2.5')).toBe(false);
  });

  it('is false when the server is down', async () => {
    fetchMock.mockRejectedValueOnce(new Error('connect ECONNREFUSED'));
    expect(await new OllamaClient('http://ollama.test').isAvailable()).toBe(false);
  });
});

describe('chatComplete', () => {
  it('puts the system prompt first and uses the fast model', async () => {
    fetchMock.mockResolvedValueOnce(ollamaReply('answer'));

    const text = await chatComplete([{ role: 'user', content: 'question' }], 'FAST', {
      system: 'be brief',
    });

    expect(text).toBe('answer');
    expect(sentBody()).toMatchObject({
      model: OllamaModels.FAST,
      messages: [
        { role: 'system', content: 'be brief' },
        { role: 'user', content: 'question' },
      ],
      options: { temperature: 0.4, num_predict: 1024 },
    });
  });
});

describe('completeStructured', () => {
  const schema = z.object({ chosen_career: z.string() });

  it('requests JSON mode and decodes the reply', async () => {
    fetchMock.mockResolvedValueOnce(ollamaReply('```json\n{"chosen_career": "Data Analyst"}\n```'));

    await expect(completeStructured('pick one', schema)).resolves.toEqual({
      chosen_career: 'Data Analyst',
    });
    expect(sentBody()).toMatchObject({ model: OllamaModels.GENERAL, format: 'json' });
  });

  it('throws StructuredOutputError with the raw reply', async () => {
    fetchMock.mockResolvedValueOnce(ollamaReply('{"career": 1}'));

    const error = await completeStructured('pick one', schema).catch((e: unknown) => e);
    expect(error).toBeInstanceOf(StructuredOutputError);
    expect(error).toMatchObject({ rawResponse: '{"career": 1}' });
  });
});
