/**
 * Career Chat Agent - answers follow-up questions about a finished career plan.
 * The plan is the only grounding; the model is told to stay within it.
 */

import { z } from 'zod';
import { chatComplete, formatForPrompt, type OllamaChatMessage } from '@careernav/llm';
import {
  careerActionPlanSchema,
  chatMessageSchema,
  type CareerActionPlan,
  type ChatMessage,
} from '@careernav/schemas';
import { BaseAgent } from '../shared/base-agent.js';
import type { AgentConfig, AgentContext } from '../shared/types.js';

export const CHAT_HISTORY_TURNS = 10;

const CareerChatInputSchema = z.object({
  message: z.string().trim().min(1, 'Message is required'),
  history: z.array(chatMessageSchema).default([]),
  plan: careerActionPlanSchema,
});
export type CareerChatInput = z.infer<typeof CareerChatInputSchema>;

const CareerChatOutputSchema = z.string().trim().min(1);

export function buildChatSystemPrompt(plan: CareerActionPlan): string {
  return `You are a friendly career assistant helping a university student follow their personal career plan for the role "${plan.chosen_career}".
Answer questions using the plan below. Be specific and practical, keep answers short (under 200 words), and say so when something is outside the plan.

Career plan:
${formatForPrompt(plan)}`;
}

export class CareerChatAgent extends BaseAgent<CareerChatInput, string> {
  config: AgentConfig = {
    name: 'CareerChatAgent',
    description: 'Answers questions about a generated career plan',
    version: '1.0.0',
  };

  inputSchema = CareerChatInputSchema;
  outputSchema = CareerChatOutputSchema;

  protected async run(input: CareerChatInput, _context: AgentContext): Promise<string> {
    const recent = input.history.slice(-CHAT_HISTORY_TURNS);
    this.info('Answering chat message', { historyTurns: recent.length });

    const messages: OllamaChatMessage[] = [
      ...recent.map((m) => ({ role: m.role, content: m.content })),
      { role: 'user', content: input.message },
    ];
    const reply = await chatComplete(messages, 'FAST', {
      system: buildChatSystemPrompt(input.plan),
    });
    return reply.trim();
  }
}

/**
 * One chat turn. Throws when the agent fails so the route can answer with 500.
 */
export async function runCareerChat(
  message: string,
  history: ChatMessage[],
  plan: CareerActionPlan,
  context: Partial<AgentContext> = {},
): Promise<string> {
  const result = await new CareerChatAgent().execute({ message, history, plan }, context);
  if (!result.success || result.data === undefined) {
    throw new Error(result.error ?? 'Chat agent returned no reply');
  }
  return result.data;
}
