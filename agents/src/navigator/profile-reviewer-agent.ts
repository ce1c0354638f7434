/**
 * Profile Reviewer Agent - compares the student's profile with the required skills
 * and suggests LinkedIn improvements.
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
  profileFeedbackSchema,
  skillAnalysisSchema,
  type ProfileFeedback,
} from '@careernav/schemas';
import { BaseAgent } from '../shared/base-agent.js';
import type { AgentConfig, AgentContext } from '../shared/types.js';

const MAX_LINKEDIN_SUGGESTIONS = 5;

const ProfileReviewerInputSchema = z.object({
  student_profile: z.string().min(1),
  skill_analysis: skillAnalysisSchema,
});
export type ProfileReviewerInput = z.infer<typeof ProfileReviewerInputSchema>;

const template = createPromptTemplate(
  `User profile:
{profile}

Required skills:
{skills}

${jsonShapeInstruction(
  '{ "resume_strengths": ["..."], "resume_gaps": ["..."], "linkedin_suggestions": ["..."] }',
)}`,
  {
    system: `Review a student's professional profile.
1. Compare it with the required skills: list concrete strengths and the gaps that matter most.
2. Give 3-${MAX_LINKEDIN_SUGGESTIONS} specific, actionable suggestions to improve their LinkedIn profile (headline, about section, featured work, skills, recommendations).`,
  },
);

export class ProfileReviewerAgent extends BaseAgent<ProfileReviewerInput, ProfileFeedback> {
  config: AgentConfig = {
    name: 'ProfileReviewerAgent',
    description: 'Finds resume strengths and gaps and suggests LinkedIn improvements',
    version: '1.0.0',
  };

  inputSchema = ProfileReviewerInputSchema;
  outputSchema = profileFeedbackSchema;

  protected async run(
    input: ProfileReviewerInput,
    _context: AgentContext,
  ): Promise<ProfileFeedback> {
    const { prompt, system } = executeTemplate(template, {
      profile: input.student_profile,
      skills: formatForPrompt(input.skill_analysis),
    });
    const feedback = await completeStructured(prompt, profileFeedbackSchema, 'GENERAL', { system });
    if (feedback.linkedin_suggestions.length < 3) {
      this.warn('Fewer LinkedIn suggestions than asked for', {
        count: feedback.linkedin_suggestions.length,
      });
    }
    return {
      ...feedback,
      linkedin_suggestions: feedback.linkedin_suggestions.slice(0, MAX_LINKEDIN_SUGGESTIONS),
    };
  }
}
