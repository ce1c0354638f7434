/**
 * Ollama model configuration loaded from environment variables.
 */

export const OllamaModels = {
  /** Structured navigator prompts (role suggestion, skills, feedback, resume, plan) */
  GENERAL: process.env.OLLAMA_MODEL_GENERAL ?? 'qwen2.5:14b-instruct-q4_K_M',

  /** Conversational follow-up on a finished plan */
  FAST: process.env.OLLAMA_MODEL_FAST ?? 'llama3.1:8b-instruct-q4_K_M',
} as const;

export type OllamaModelType = keyof typeof OllamaModels;

export const OLLAMA_BASE_URL = process.env.OLLAMA_BASE_URL ?? 'http://localhost:11434';

export interface ModelConfig {
  model: string;
  temperature?: number;
  topP?: number;
  maxTokens?: number;
  timeout?: number;
}

export const defaultModelConfigs: Record<OllamaModelType, ModelConfig> = {
  GENERAL: {
    model: OllamaModels.GENERAL,
    temperature: 0.2,
    maxTokens: 4096,
    timeout: 180000, // resume tailoring is the slowest node
  },
  FAST: {
    model: OllamaModels.FAST,
    temperature: 0.4,
    maxTokens: 1024,
    timeout: 60000,
  },
};
