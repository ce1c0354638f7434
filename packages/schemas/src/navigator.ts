import { z } from 'zod';
import { stepStatusEnum } from './enums';

export const skillAnalysisSchema = z.object({
  technical_skills: z.array(z.string()),
  soft_skills: z.array(z.string()),
});

export const profileFeedbackSchema = z.object({
  resume_strengths: z.array(z.string()),
  resume_gaps: z.array(z.string()),
  linkedin_suggestions: z.array(z.string()),
});

export const jobExperienceSchema = z.object({
  title: z.string(),
  company: z.string(),
  dates: z.string(),
  description: z.array(z.string()),
});

export const tailoredResumeContentSchema = z.object({
  full_name: z.string(),
  email: z.string(),
  phone: z.string(),
  summary: z.string(),
  experiences: z.array(jobExperienceSchema),
  education: z.string(),
  skills: z.array(z.string()),
});

export const careerActionPlanSchema = z.object({
  chosen_career: z.string(),
  career_overview: z.string(),
  skill_analysis: skillAnalysisSchema,
  profile_feedback: profileFeedbackSchema,
  learning_roadmap: z.string(),
  portfolio_plan: z.string(),
});

export const roleSuggestionSchema = z.object({
  chosen_career: z.string().min(1),
  rationale: z.string(),
});

export type SkillAnalysis = z.infer<typeof skillAnalysisSchema>;
export type ProfileFeedback = z.infer<typeof profileFeedbackSchema>;
export type JobExperience = z.infer<typeof jobExperienceSchema>;
export type TailoredResumeContent = z.infer<typeof tailoredResumeContentSchema>;
export type CareerActionPlan = z.infer<typeof careerActionPlanSchema>;
export type RoleSuggestion = z.infer<typeof roleSuggestionSchema>;

export const navigatorStepNameEnum = z.enum([
  'route',
  'suggest_role',
  'analyze_market',
  'review_profile',
  'tailor_resume',
  'create_final_plan',
]);
export type NavigatorStepName = z.infer<typeof navigatorStepNameEnum>;

export const navigatorStepTraceSchema = z.object({
  name: navigatorStepNameEnum,
  status: stepStatusEnum,
  startedAt: z.string().optional(),
  completedAt: z.string().optional(),
  error: z.string().optional(),
});
export type NavigatorStepTrace = z.infer<typeof navigatorStepTraceSchema>;

export const navigatorTraceSchema = z.object({
  status: z.enum(['running', 'completed', 'failed']),
  steps: z.array(navigatorStepTraceSchema),
  startedAt: z.string(),
  completedAt: z.string().optional(),
});
export type NavigatorTrace = z.infer<typeof navigatorTraceSchema>;
