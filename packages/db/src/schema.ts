import { pgTable, uuid, text, varchar, timestamp, jsonb, pgEnum, index } from 'drizzle-orm/pg-core';
import type {
  CareerActionPlan,
  NavigatorTrace,
  ProfileFeedback,
  SkillAnalysis,
  TailoredResumeContent,
} from '@careernav/schemas';

export const chatRoleEnum = pgEnum('chat_role', ['user', 'assistant']);

// One row per completed navigator run
export const careerPlans = pgTable(
  'career_plans',
  {
    id: uuid('id').primaryKey().defaultRandom(),
    roleChoice: varchar('role_choice', { length: 255 }).notNull(),
    chosenCareer: varchar('chosen_career', { length: 255 }).notNull(),
    studentProfile: text('student_profile').notNull(),
    linkedinUrl: varchar('linkedin_url', { length: 512 }),
    resumeFilename: varchar('resume_filename', { length: 255 }),
    photoPath: varchar('photo_path', { length: 1024 }),
    marketAnalysis: jsonb('market_analysis').$type<SkillAnalysis>().notNull(),
    profileAnalysis: jsonb('profile_analysis').$type<ProfileFeedback>().notNull(),
    tailoredResume: jsonb('tailored_resume').$type<TailoredResumeContent>().notNull(),
    finalPlan: jsonb('final_plan').$type<CareerActionPlan>().notNull(),
    trace: jsonb('trace').$type<NavigatorTrace>(),
    createdAt: timestamp('created_at').defaultNow().notNull(),
  },
  (table) => ({
    createdAtIdx: index('career_plans_created_at_idx').on(table.createdAt),
  }),
);

export const planChatMessages = pgTable(
  'plan_chat_messages',
  {
    id: uuid('id').primaryKey().defaultRandom(),
    planId: uuid('plan_id')
      .notNull()
      .references(() => careerPlans.id, { onDelete: 'cascade' }),
    role: chatRoleEnum('role').notNull(),
    content: text('content').notNull(),
    createdAt: timestamp('created_at').defaultNow().notNull(),
  },
  (table) => ({
    planIdx: index('plan_chat_messages_plan_id_idx').on(table.planId, table.createdAt),
  }),
);
