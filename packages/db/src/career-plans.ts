import { desc, eq } from 'drizzle-orm';
import type {
  CareerActionPlan,
  ChatMessage,
  NavigatorTrace,
  ProfileFeedback,
  SkillAnalysis,
  TailoredResumeContent,
} from '@careernav/schemas';
import type { Db } from './client';
import { careerPlans as careerPlansTable, planChatMessages as chatTable } from './schema';

export interface CareerPlanRow {
  id: string;
  roleChoice: string;
  chosenCareer: string;
  studentProfile: string;
  linkedinUrl: string | null;
  resumeFilename: string | null;
  photoPath: string | null;
  marketAnalysis: SkillAnalysis;
  profileAnalysis: ProfileFeedback;
  tailoredResume: TailoredResumeContent;
  finalPlan: CareerActionPlan;
  trace: NavigatorTrace | null;
  createdAt: Date;
}

export interface CreateCareerPlanInput {
  roleChoice: string;
  studentProfile: string;
  linkedinUrl?: string | null;
  resumeFilename?: string | null;
  photoPath?: string | null;
  marketAnalysis: SkillAnalysis;
  profileAnalysis: ProfileFeedback;
  tailoredResume: TailoredResumeContent;
  finalPlan: CareerActionPlan;
  trace?: NavigatorTrace | null;
}

export async function createCareerPlan(
  db: Db,
  input: CreateCareerPlanInput,
): Promise<CareerPlanRow> {
  const [row] = await db
    .insert(careerPlansTable)
    .values({
      roleChoice: input.roleChoice,
      chosenCareer: input.finalPlan.chosen_career,
      studentProfile: input.studentProfile,
      linkedinUrl: input.linkedinUrl ?? null,
      resumeFilename: input.resumeFilename ?? null,
      photoPath: input.photoPath ?? null,
      marketAnalysis: input.marketAnalysis,
      profileAnalysis: input.profileAnalysis,
      tailoredResume: input.tailoredResume,
      finalPlan: input.finalPlan,
      trace: input.trace ?? null,
    })
    .returning();
  return row;
}

export async function getCareerPlanById(db: Db, id: string): Promise<CareerPlanRow | null> {
  const [row] = await db
    .select()
    .from(careerPlansTable)
    .where(eq(careerPlansTable.id, id))
    .limit(1);
  return row ?? null;
}

export async function listRecentCareerPlans(db: Db, limit = 20) {
  return db
    .select({
      id: careerPlansTable.id,
      chosenCareer: careerPlansTable.chosenCareer,
      roleChoice: careerPlansTable.roleChoice,
      createdAt: careerPlansTable.createdAt,
    })
    .from(careerPlansTable)
    .orderBy(desc(careerPlansTable.createdAt))
    .limit(limit);
}

/** Returns true when a row was deleted. Chat messages go with it (cascade). */
export async function deleteCareerPlan(db: Db, id: string): Promise<boolean> {
  const deleted = await db
    .delete(careerPlansTable)
    .where(eq(careerPlansTable.id, id))
    .returning({ id: careerPlansTable.id });
  return deleted.length > 0;
}

export async function appendChatMessages(
  db: Db,
  planId: string,
  messages: ChatMessage[],
): Promise<void> {
  if (messages.length === 0) return;
  const base = Date.now();
  await db.insert(chatTable).values(
    // distinct timestamps keep insertion order when read back
    messages.map((m, i) => ({
      planId,
      role: m.role,
      content: m.content,
      createdAt: new Date(base + i),
    })),
  );
}

/** Oldest-first history, limited to the most recent `limit` turns. */
export async function getChatHistory(db: Db, planId: string, limit = 50): Promise<ChatMessage[]> {
  const rows = await db
    .select({ role: chatTable.role, content: chatTable.content })
    .from(chatTable)
    .where(eq(chatTable.planId, planId))
    .orderBy(desc(chatTable.createdAt))
    .limit(limit);
  return rows.reverse();
}

export async function clearChatHistory(db: Db, planId: string): Promise<void> {
  await db.delete(chatTable).where(eq(chatTable.planId, planId));
}
