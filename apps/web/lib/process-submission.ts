/**
 * POST /api/process pipeline: form fields -> resume text -> LinkedIn text -> navigator -> stored plan.
 * Route handlers stay thin; this module holds the steps so they can be tested without Next.
 */

import { randomUUID } from 'crypto';
import path from 'path';
import {
  buildStudentProfile,
  extractLinkedIn,
  extractTextFromPdfBuffer,
  isScrapeError,
  LINKEDIN_UNAVAILABLE_MESSAGE,
  runNavigator,
  scrapeWebContent,
} from '@careernav/agents';
import { detectImageType } from '@careernav/core';
import { createCareerPlan, getDb, type CareerPlanRow } from '@careernav/db';
import {
  navigatorSubmissionSchema,
  resolveRoleChoice,
  type NavigatorSubmission,
} from '@careernav/schemas';
import { agentLog, bufferAgentLogSink } from './agent-logs';
import { getSubmissionDir, MAX_UPLOAD_SIZE, PHOTO_EXTENSIONS, saveUpload } from './uploads';

export const MISSING_RESUME_MESSAGE = 'Please upload a resume to begin.';

/** A problem with what the student sent; the route answers with `status`. */
export class SubmissionError extends Error {
  constructor(
    message: string,
    readonly status = 400,
  ) {
    super(message);
    this.name = 'SubmissionError';
  }
}

function textField(form: FormData, name: string): string | undefined {
  const value = form.get(name);
  if (typeof value !== 'string') return undefined;
  const trimmed = value.trim();
  return trimmed ? trimmed : undefined;
}

function fileField(form: FormData, name: string): File | null {
  const value = form.get(name);
  if (value instanceof File && value.size > 0) return value;
  return null;
}

/** Validate the text fields. Empty inputs count as absent. */
export function readSubmissionFields(form: FormData): NavigatorSubmission {
  const parsed = navigatorSubmissionSchema.safeParse({
    careerChoice: textField(form, 'career_choice'),
    customRole: textField(form, 'custom_role'),
    linkedinUrl: textField(form, 'linkedin_url'),
  });
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new SubmissionError(issue?.message ?? 'Invalid submission');
  }
  return parsed.data;
}

async function readResumeText(resume: File): Promise<string> {
  if (resume.size > MAX_UPLOAD_SIZE) {
    throw new SubmissionError('File too large. Maximum size: 10MB');
  }
  try {
    const { text } = await extractTextFromPdfBuffer(Buffer.from(await resume.arrayBuffer()));
    return text.trim();
  } catch (err) {
    throw new SubmissionError(
      `Error reading PDF: ${err instanceof Error ? err.message : String(err)}`,
    );
  }
}

async function readPhoto(photo: File | null): Promise<{ name: string; bytes: Uint8Array } | null> {
  if (!photo) return null;
  const ext = path.extname(photo.name).toLowerCase();
  if (!PHOTO_EXTENSIONS.includes(ext) || photo.size > MAX_UPLOAD_SIZE) {
    throw new SubmissionError(`Invalid photo. Allowed: ${PHOTO_EXTENSIONS.join(', ')} up to 10MB`);
  }
  const bytes = new Uint8Array(await photo.arrayBuffer());
  if (!detectImageType(bytes)) {
    throw new SubmissionError('Photo must be a PNG or JPEG image');
  }
  return { name: `photo${ext}`, bytes };
}

/**
 * LinkedIn text for the student profile. Scrape failures never fail the run.
 */
export async function readLinkedInText(url: string | null): Promise<string> {
  if (!url) return '';
  agentLog('LinkedIn', `Fetching ${url}`);
  const text = await scrapeWebContent(url);
  if (isScrapeError(text)) {
    agentLog('LinkedIn', LINKEDIN_UNAVAILABLE_MESSAGE, { level: 'warn', detail: text });
    return LINKEDIN_UNAVAILABLE_MESSAGE;
  }
  agentLog('LinkedIn', `Read ${text.length} characters`, { level: 'success' });
  return text;
}

export async function processSubmission(form: FormData): Promise<CareerPlanRow> {
  const fields = readSubmissionFields(form);
  const resume = fileField(form, 'resume');
  if (!resume) {
    throw new SubmissionError(MISSING_RESUME_MESSAGE);
  }

  const resumeText = await readResumeText(resume);
  if (!resumeText) {
    throw new SubmissionError(MISSING_RESUME_MESSAGE);
  }
  const photo = await readPhoto(fileField(form, 'photo'));

  const submissionId = randomUUID();
  const dir = await getSubmissionDir(submissionId);
  await saveUpload(dir, resume.name, new Uint8Array(await resume.arrayBuffer()));
  const photoPath = photo ? await saveUpload(dir, photo.name, photo.bytes) : null;

  const linkedinUrl = fields.linkedinUrl ?? extractLinkedIn(resumeText);
  const linkedinText = await readLinkedInText(linkedinUrl);

  const roleChoice = resolveRoleChoice(fields.careerChoice, fields.customRole);
  agentLog('Navigator', `Starting run for "${roleChoice}"`);

  const studentProfile = buildStudentProfile(resumeText, linkedinText);
  const { state, trace } = await runNavigator(studentProfile, roleChoice, {
    runId: submissionId,
    logSink: bufferAgentLogSink,
    onStepUpdate: (step) => {
      if (step.status === 'running' || step.status === 'pending') return;
      agentLog('Navigator', `${step.name}: ${step.status}`, {
        level: step.status === 'failed' ? 'error' : step.status === 'completed' ? 'success' : 'info',
        detail: step.error,
      });
    },
  });

  const plan = await createCareerPlan(getDb(), {
    roleChoice,
    studentProfile,
    linkedinUrl,
    resumeFilename: resume.name,
    photoPath,
    marketAnalysis: state.market_analysis,
    profileAnalysis: state.profile_analysis,
    tailoredResume: state.tailored_resume,
    finalPlan: state.final_plan,
    trace,
  });
  agentLog('Navigator', `Plan ready: ${plan.chosenCareer}`, { level: 'success' });
  return plan;
}
