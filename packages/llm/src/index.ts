/**
 * @careernav/llm - Ollama client wrapper for local LLM inference
 */

export {
  OllamaModels,
  OLLAMA_BASE_URL,
  type OllamaModelType,
  type ModelConfig,
  defaultModelConfigs,
} from './models';

export {
  OllamaClient,
  StructuredOutputError,
  chatComplete,
  complete,
  completeStructured,
  defaultClient,
  type CompletionOptions,
  type OllamaChatMessage,
  type OllamaChatRequest,
  type OllamaChatResponse,
} from './client';

export {
  buildPrompt,
  createPromptTemplate,
  executeTemplate,
  formatForPrompt,
  jsonShapeInstruction,
  type PromptTemplate,
} from './prompts';

export {
  extractJson,
  parseJsonResponse,
  parseWithRetry,
  jsonFixers,
  defaultFixers,
  type ParseResult,
} from './parse';
