/**
 * Ollama HTTP client for local LLM inference.
 */

import { z, type ZodType, type ZodTypeDef } from 'zod';
import {
  OLLAMA_BASE_URL,
  type ModelConfig,
  defaultModelConfigs,
  type OllamaModelType,
} from './models';
import { defaultFixers, parseWithRetry } from './parse';

export interface OllamaChatMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

export interface OllamaChatRequest {
  model: string;
  messages: OllamaChatMessage[];
  stream?: boolean;
  format?: 'json';
  options?: {
    temperature?: number;
    top_p?: number;
    num_predict?: number;
    stop?: string[];
  };
}

export interface OllamaChatResponse {
  model: string;
  created_at: string;
  message: OllamaChatMessage;
  done: boolean;
  total_duration?: number;
  prompt_eval_count?: number;
  eval_count?: number;
}

const chatResponseSchema = z.object({
  model: z.string(),
  created_at: z.string(),
  message: z.object({
    role: z.enum(['system', 'user', 'assistant']),
    content: z.string(),
  }),
  done: z.boolean(),
  total_duration: z.number().optional(),
  prompt_eval_count: z.number().optional(),
  eval_count: z.number().optional(),
});

const tagsResponseSchema = z.object({
  models: z.array(z.object({ name: z.string() })),
});

export type CompletionOptions = Partial<ModelConfig> & { system?: string; format?: 'json' };

/** Model output that could not be decoded into the requested shape. */
export class StructuredOutputError extends Error {
  constructor(
    message: string,
    readonly rawResponse: string,
  ) {
    super(message);
    this.name = 'StructuredOutputError';
  }
}

export class OllamaClient {
  private baseUrl: string;
  private defaultTimeout: number;

  constructor(baseUrl: string = OLLAMA_BASE_URL, defaultTimeout: number = 180000) {
    this.baseUrl = baseUrl.replace(/\/$/, '');
    this.defaultTimeout = defaultTimeout;
  }

  /**
   * Chat completion using the /api/chat endpoint.
   */
  async chat(request: OllamaChatRequest, timeout?: number): Promise<OllamaChatResponse> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), timeout ?? this.defaultTimeout);

    try {
      const response = await fetch(`${this.baseUrl}/api/chat`, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({ ...request, stream: false }),
        signal: controller.signal,
      });

      if (!response.ok) {
        const error = await response.text();
        throw new Error(`Ollama chat failed: ${response.status} - ${error}`);
      }

      const parsed = chatResponseSchema.safeParse(await response.json());
      if (!parsed.success) {
        throw new Error(`Ollama chat returned an unexpected body: ${parsed.error.message}`);
      }
      return parsed.data;
    } finally {
      clearTimeout(timeoutId);
    }
  }

  /**
   * Check if Ollama is running and a model is available.
   */
  async isAvailable(model?: string): Promise<boolean> {
    try {
      const response = await fetch(`${this.baseUrl}/api/tags`);
      if (!response.ok) return false;

      if (model) {
        const data = tagsResponseSchema.parse(await response.json());
        return data.models.some((m) => m.name === model || m.name.startsWith(model));
      }

      return true;
    } catch {
      return false;
    }
  }
}

/**
 * Multi-turn completion. A system prompt in options is placed before the given messages.
 */
export async function chatComplete(
  messages: OllamaChatMessage[],
  modelType: OllamaModelType = 'GENERAL',
  options?: CompletionOptions,
): Promise<string> {
  const client = new OllamaClient();
  const config = { ...defaultModelConfigs[modelType], ...options };

  const all: OllamaChatMessage[] = options?.system
    ? [{ role: 'system', content: options.system }, ...messages]
    : messages;

  const response = await client.chat(
    {
      model: config.model,
      messages: all,
      format: options?.format,
      options: {
        temperature: config.temperature,
        top_p: config.topP,
        num_predict: config.maxTokens,
      },
    },
    config.timeout,
  );

  return response.message.content;
}

/**
 * Single prompt completion with model type selection.
 */
export async function complete(
  prompt: string,
  modelType: OllamaModelType = 'GENERAL',
  options?: CompletionOptions,
): Promise<string> {
  return chatComplete([{ role: 'user', content: prompt }], modelType, options);
}

/**
 * JSON-mode completion decoded against a zod schema.
 * Throws StructuredOutputError when the output does not validate after the default fixers.
 */
export async function completeStructured<T>(
  prompt: string,
  schema: ZodType<T, ZodTypeDef, unknown>,
  modelType: OllamaModelType = 'GENERAL',
  options?: Omit<CompletionOptions, 'format'>,
): Promise<T> {
  const response = await complete(prompt, modelType, { ...options, format: 'json' });
  const result = parseWithRetry(response, schema, defaultFixers);
  if (!result.success || result.data === undefined) {
    throw new StructuredOutputError(
      result.error ?? 'Model returned no structured output',
      response,
    );
  }
  return result.data;
}

export const defaultClient = new OllamaClient();
