/**
 * JSON response parsing utilities with Zod validation.
 */

import { z, type ZodType, type ZodTypeDef } from 'zod';

export interface ParseResult<T> {
  success: boolean;
  data?: T;
  error?: string;
  rawResponse?: string;
}

/**
 * Extract JSON from a response that may contain markdown code blocks or reasoning tags.
 */
export function extractJson(response: string): string {
  const trimmed = jsonFixers.stripThinking(response).trim();

  const jsonBlockMatch = trimmed.match(/```(?:json)?\s*([\s\S]*?)```/);
  if (jsonBlockMatch) {
    return jsonBlockMatch[1].trim();
  }

  const jsonMatch = trimmed.match(/(\{[\s\S]*\}|\[[\s\S]*\])/);
  if (jsonMatch) {
    return jsonMatch[1];
  }

  return trimmed;
}

/**
 * Parse and validate JSON response against a Zod schema.
 */
export function parseJsonResponse<T>(
  response: string,
  schema: ZodType<T, ZodTypeDef, unknown>,
): ParseResult<T> {
  const rawResponse = response;

  try {
    const parsed: unknown = JSON.parse(extractJson(response));
    return {
      success: true,
      data: schema.parse(parsed),
      rawResponse,
    };
  } catch (error) {
    if (error instanceof SyntaxError) {
      return {
        success: false,
        error: `Invalid JSON: ${error.message}`,
        rawResponse,
      };
    }

    if (error instanceof z.ZodError) {
      const issues = error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
      return {
        success: false,
        error: `Validation failed: ${issues}`,
        rawResponse,
      };
    }

    return {
      success: false,
      error: String(error),
      rawResponse,
    };
  }
}

/**
 * Parse a response, applying fixers one after another (cumulatively) until it validates.
 * The error of the last attempt is returned when nothing works.
 */
export function parseWithRetry<T>(
  response: string,
  schema: ZodType<T, ZodTypeDef, unknown>,
  fixers?: Array<(input: string) => string>,
): ParseResult<T> {
  let result = parseJsonResponse(response, schema);
  if (result.success || !fixers) return result;

  let fixed = response;
  for (const fixer of fixers) {
    fixed = fixer(fixed);
    result = parseJsonResponse(fixed, schema);
    if (result.success) return { ...result, rawResponse: response };
  }

  return { ...result, rawResponse: response };
}

/**
 * Common JSON fixers for LLM output issues.
 */
export const jsonFixers = {
  /** Drop <think>...</think> blocks emitted by reasoning models */
  stripThinking: (input: string): string => {
    return input.replace(/<think>[\s\S]*?<\/think>/gi, '');
  },

  /** Remove trailing commas in arrays/objects */
  removeTrailingCommas: (input: string): string => {
    return input.replace(/,\s*([}\]])/g, '$1');
  },

  /** Quote bare object keys */
  quoteKeys: (input: string): string => {
    return input.replace(/([{,]\s*)([a-zA-Z_][a-zA-Z0-9_]*)\s*:/g, '$1"$2":');
  },

  /** Turn smart quotes into plain double quotes */
  fixSmartQuotes: (input: string): string => {
    return input.replace(/[“”]/g, '"');
  },
};

export const defaultFixers = [
  jsonFixers.removeTrailingCommas,
  jsonFixers.quoteKeys,
  jsonFixers.fixSmartQuotes,
];
