import { z } from 'zod';

/** Strategies where the navigator picks the career instead of the student. */
export const roleStrategyEnum = z.enum(['resume_based', 'market_demand']);
export type RoleStrategy = z.infer<typeof roleStrategyEnum>;

export const CUSTOM_ROLE_CHOICE = 'Other';

export const CAREER_PRESETS = [
  'Software Engineer',
  'Data Scientist',
  'Data Analyst',
  'Machine Learning Engineer',
  'Product Manager',
  'UX Designer',
  'Cloud Engineer',
  'Cybersecurity Analyst',
  'DevOps Engineer',
  'Business Analyst',
] as const;

export const chatRoleEnum = z.enum(['user', 'assistant']);
export type ChatRole = z.infer<typeof chatRoleEnum>;

export const stepStatusEnum = z.enum(['pending', 'running', 'completed', 'failed', 'skipped']);
export type StepStatus = z.infer<typeof stepStatusEnum>;
