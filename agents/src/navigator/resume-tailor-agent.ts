/**
 * Resume Tailor Agent - rewrites the student's raw profile into an
 * achievement-oriented, ATS-friendly resume aimed at the target role.
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
  skillAnalysisSchema,
  tailoredResumeContentSchema,
  type TailoredResumeContent,
} from '@careernav/schemas';
import { fillContactGaps } from '../profile/contact-info.js';
import { BaseAgent } from '../shared/base-agent.js';
import type { AgentConfig, AgentContext } from '../shared/types.js';

const ResumeTailorInputSchema = z.object({
  career: z.string().min(1),
  skill_analysis: skillAnalysisSchema,
  student_profile: z.string().min(1),
});
export type ResumeTailorInput = z.infer<typeof ResumeTailorInputSchema>;

const RESUME_SHAPE = `{
  "full_name": "string",
  "email": "string",
  "phone": "string",
  "summary": "3-4 line professional summary",
  "experiences": [
    { "title": "string", "company": "string", "dates": "string", "description": ["bullet", "..."] }
  ],
  "education": "degree, institution, dates",
  "skills": ["..."]
}`;

const template = createPromptTemplate(
  `Target role: {career}

Required market skills:
{skills}

User's raw profile (from resume and LinkedIn):
{profile}

${jsonShapeInstruction(RESUME_SHAPE)}`,
  {
    system: `You are an executive resume writer. Turn a student's raw profile into a concise, achievement-oriented resume that parses cleanly in applicant tracking systems.
- Copy name, email and phone from the profile; leave a field empty when it is not there.
- Write a 3-4 line professional summary aimed at the target role.
- Rewrite every experience bullet in STAR form: open with a strong action verb and state the result, quantified where the profile supports it.
- Put the required skills the student actually has first in the skills list.
- Never invent employers, dates, degrees or numbers. Rephrase what is there to show achievements.`,
  },
);

export class ResumeTailorAgent extends BaseAgent<ResumeTailorInput, TailoredResumeContent> {
  config: AgentConfig = {
    name: 'ResumeTailorAgent',
    description: 'Writes a tailored STAR-method resume for the target role',
    version: '1.0.0',
  };

  inputSchema = ResumeTailorInputSchema;
  outputSchema = tailoredResumeContentSchema;

  protected async run(
    input: ResumeTailorInput,
    _context: AgentContext,
  ): Promise<TailoredResumeContent> {
    const { prompt, system } = executeTemplate(template, {
      career: input.career,
      skills: formatForPrompt(input.skill_analysis),
      profile: input.student_profile,
    });
    const content = await completeStructured(prompt, tailoredResumeContentSchema, 'GENERAL', {
      system,
    });
    this.debug('Resume drafted', { experiences: content.experiences.length });

    return fillContactGaps(
      {
        ...content,
        experiences: content.experiences.map((job) => ({
          ...job,
          description: job.description
            .map((bullet) => bullet.replace(/^[-•*]\s*/, '').trim())
            .filter(Boolean),
        })),
        skills: content.skills.map((s) => s.trim()).filter(Boolean),
      },
      input.student_profile,
    );
  }
}
