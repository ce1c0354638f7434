import type { NavigatorRunResult } from '@careernav/agents';
import type { CareerPlanRow } from '@careernav/db';
import type { CareerActionPlan, TailoredResumeContent } from '@careernav/schemas';

export const finalPlan: CareerActionPlan = {
  chosen_career: 'Data Analyst',
  career_overview: 'Analysts turn data into answers.',
  skill_analysis: { technical_skills: ['SQL', 'Python'], soft_skills: ['Communication'] },
  profile_feedback: {
    resume_strengths: ['Statistics'],
    resume_gaps: ['Dashboards'],
    linkedin_suggestions: ['Add a headline'],
  },
  learning_roadmap: 'Week 1: SQL',
  portfolio_plan: 'Project 1: Dashboard',
};

export const tailoredResume: TailoredResumeContent = {
  full_name: 'Test Student',
  email: 'test.student@example.com',
  phone: '555-010-0142',
  summary: 'Statistics graduate.',
  experiences: [],
  education: 'BSc Statistics',
  skills: ['SQL'],
};

export const runResult: NavigatorRunResult = {
  state: {
    student_profile: 'profile',
    role_choice: 'Data Analyst',
    chosen_career: 'Data Analyst',
    market_analysis: finalPlan.skill_analysis,
    profile_analysis: finalPlan.profile_feedback,
    tailored_resume: tailoredResume,
    final_plan: finalPlan,
  },
  trace: {
    status: 'completed',
    startedAt: '2026-01-01T00:00:00.000Z',
    completedAt: '2026-01-01T00:01:00.000Z',
    steps: [],
  },
};

export const PLAN_ID = '6f1c2f7e-3a3b-4c55-9d1e-2b7f0c9a1d11';

export const planRow: CareerPlanRow = {
  id: PLAN_ID,
  roleChoice: 'Data Analyst',
  chosenCareer: 'Data Analyst',
  studentProfile: 'profile',
  linkedinUrl: null,
  resumeFilename: 'resume.pdf',
  photoPath: null,
  marketAnalysis: finalPlan.skill_analysis,
  profileAnalysis: finalPlan.profile_feedback,
  tailoredResume,
  finalPlan,
  trace: runResult.trace,
  createdAt: new Date('2026-01-01T00:01:00.000Z'),
};
