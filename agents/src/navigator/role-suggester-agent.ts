/**
 * Role Suggester Agent - picks a career when the student asked the navigator to choose,
 * either from what the resume shows (resume_based) or from what the market wants
 * and the student can realistically reach (market_demand).
 */

import { z } from 'zod';
import {
  completeStructured,
  createPromptTemplate,
  executeTemplate,
  jsonShapeInstruction,
} from '@careernav/llm';
import { roleStrategyEnum, roleSuggestionSchema, type RoleSuggestion } from '@careernav/schemas';
import { BaseAgent } from '../shared/base-agent.js';
import type { AgentConfig, AgentContext } from '../shared/types.js';

const RoleSuggesterInputSchema = z.object({
  student_profile: z.string().min(1),
  strategy: roleStrategyEnum,
});
export type RoleSuggesterInput = z.infer<typeof RoleSuggesterInputSchema>;

const STRATEGY_INSTRUCTIONS: Record<RoleSuggesterInput['strategy'], string> = {
  resume_based:
    'Choose the single career that best fits the experience, education and skills already shown in the profile.',
  market_demand:
    'Choose a career that is in strong hiring demand right now and that this student can realistically reach within a year, building on what the profile already shows.',
};

const template = createPromptTemplate(
  `{instruction}
Name one specific job title (for example "Data Analyst", not "Technology") and explain the choice in 2-3 sentences.

Student profile (resume and LinkedIn):
{profile}

${jsonShapeInstruction('{ "chosen_career": "<job title>", "rationale": "<2-3 sentences>" }')}`,
  { system: 'You are a career counsellor who places university students into their first roles.' },
);

export class RoleSuggesterAgent extends BaseAgent<RoleSuggesterInput, RoleSuggestion> {
  config: AgentConfig = {
    name: 'RoleSuggesterAgent',
    description: 'Suggests a target career from the resume or from market demand',
    version: '1.0.0',
  };

  inputSchema = RoleSuggesterInputSchema;
  outputSchema = roleSuggestionSchema;

  protected async run(
    input: RoleSuggesterInput,
    _context: AgentContext,
  ): Promise<RoleSuggestion> {
    this.info('Suggesting a career', { strategy: input.strategy });
    const { prompt, system } = executeTemplate(template, {
      instruction: STRATEGY_INSTRUCTIONS[input.strategy],
      profile: input.student_profile,
    });
    const suggestion = await completeStructured(prompt, roleSuggestionSchema, 'GENERAL', {
      system,
    });
    this.info(`Suggested: ${suggestion.chosen_career}`);
    return { ...suggestion, chosen_career: suggestion.chosen_career.trim() };
  }
}
