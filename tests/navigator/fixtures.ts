import type { ZodType, ZodTypeDef } from 'zod';
import type { ProfileFeedback, SkillAnalysis, TailoredResumeContent } from '@careernav/schemas';

export const STUDENT_PROFILE = `--- RESUME ---
Test Student
test.student@example.com | 555-010-0142
BSc Statistics, Example University

--- LINKEDIN PROFILE ---
`;

export const roleSuggestion = {
  chosen_career: '  Data Analyst ',
  rationale: 'Statistics coursework and SQL projects point to analytics.',
};

export const skills: SkillAnalysis = {
  technical_skills: ['SQL', 'Python', 'Excel', 'Tableau', 'Statistics'],
  soft_skills: ['Communication', 'Curiosity', 'Attention to detail'],
};

export const feedback: ProfileFeedback = {
  resume_strengths: ['Solid statistics background'],
  resume_gaps: ['No dashboarding experience'],
  linkedin_suggestions: ['Add a headline', 'Feature a project', 'List SQL under skills'],
};

export const resume: TailoredResumeContent = {
  full_name: '',
  email: '',
  phone: '',
  summary: 'Statistics graduate ready to turn data into decisions.',
  experiences: [
    {
      title: 'Research Assistant',
      company: 'Example University',
      dates: '2025',
      description: ['- Cleaned survey data for 3 studies', '• ', '*Automated weekly reports'],
    },
  ],
  education: 'BSc Statistics, Example University',
  skills: [' SQL ', '', 'Python'],
};

export const narrative = {
  career_overview: 'Analysts turn data into business answers.',
  learning_roadmap: 'Week 1: SQL joins\nWeek 2: Dashboards',
  portfolio_plan: 'Project 1: Sales dashboard',
};

const FIXTURES: unknown[] = [roleSuggestion, skills, feedback, resume, narrative];

/** Stand-in for the model: the first fixture the requested schema accepts. */
export async function structuredReply<T>(schema: ZodType<T, ZodTypeDef, unknown>): Promise<T> {
  for (const fixture of FIXTURES) {
    const parsed = schema.safeParse(fixture);
    if (parsed.success) return parsed.data;
  }
  throw new Error('No fixture matches the requested schema');
}
