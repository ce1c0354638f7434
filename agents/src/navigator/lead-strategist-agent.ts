/**
 * Lead Strategist Agent - synthesises the run into the final Career Action Plan:
 * career overview, 8-week learning roadmap and portfolio projects.
 */

import { z } from 'zod';
import {
  completeStructured,
  createPromptTemplate,
  executeTemplate,
  formatForPrompt,
  jsonShapeInstruction,
} from '@careernav/llm';
import {
  careerActionPlanSchema,
  profileFeedbackSchema,
  skillAnalysisSchema,
  type CareerActionPlan,
} from '@careernav/schemas';
import { BaseAgent } from '../shared/base-agent.js';
import type { AgentConfig, AgentContext } from '../shared/types.js';

const LeadStrategistInputSchema = z.object({
  career: z.string().min(1),
  skill_analysis: skillAnalysisSchema,
  profile_feedback: profileFeedbackSchema,
});
export type LeadStrategistInput = z.infer<typeof LeadStrategistInputSchema>;

// skills and feedback come from the upstream nodes; the model writes the narrative parts only
const planNarrativeSchema = careerActionPlanSchema.pick({
  career_overview: true,
  learning_roadmap: true,
  portfolio_plan: true,
});

const PLAN_SHAPE = `{
  "career_overview": "what the role involves, where it leads, what employers expect",
  "learning_roadmap": "Week 1: ...\\nWeek 2: ...\\n... Week 8: ...",
  "portfolio_plan": "Project 1: ...\\nProject 2: ...\\nProject 3: ..."
}`;

const template = createPromptTemplate(
  `You are the lead career strategist. Combine everything below into one Career Action Plan.
Write a detailed 8-week learning roadmap (one line per week, closing the gaps first) and suggest 3 portfolio projects that prove the required skills.

Chosen career: {career}
Required skills: {skills}
Profile feedback: {feedback}

${jsonShapeInstruction(PLAN_SHAPE)}`,
);

export class LeadStrategistAgent extends BaseAgent<LeadStrategistInput, CareerActionPlan> {
  config: AgentConfig = {
    name: 'LeadStrategistAgent',
    description: 'Synthesises skills and feedback into a Career Action Plan',
    version: '1.0.0',
  };

  inputSchema = LeadStrategistInputSchema;
  outputSchema = careerActionPlanSchema;

  protected async run(
    input: LeadStrategistInput,
    _context: AgentContext,
  ): Promise<CareerActionPlan> {
    const { prompt } = executeTemplate(template, {
      career: input.career,
      skills: formatForPrompt(input.skill_analysis),
      feedback: formatForPrompt(input.profile_feedback),
    });
    const narrative = await completeStructured(prompt, planNarrativeSchema);

    return {
      ...narrative,
      chosen_career: input.career,
      skill_analysis: input.skill_analysis,
      profile_feedback: input.profile_feedback,
    };
  }
}
