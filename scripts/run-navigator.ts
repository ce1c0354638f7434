/**
 * Run the career navigator on a local resume without the web app.
 *
 * Writes plan.json (final plan, analyses, trace) and resume.pdf to the output directory.
 *
 * Run (from repo root):
 *   npx tsx scripts/run-navigator.ts <resume.pdf|resume.txt> [career choice]
 *     [--linkedin <url>] [--photo <png|jpg>] [--out <dir>] [--save]
 *
 * Career choice defaults to resume_based. --save also stores the plan in the database.
 */
import './load-env';

import * as fs from 'fs/promises';
import * as path from 'path';
import {
  buildStudentProfile,
  extractLinkedIn,
  extractText,
  isScrapeError,
  LINKEDIN_UNAVAILABLE_MESSAGE,
  NavigatorStepError,
  runNavigator,
  scrapeWebContent,
} from '@careernav/agents';
import { renderResumePdf } from '@careernav/core';
import { closeDb, createCareerPlan, getDb } from '@careernav/db';
import { defaultClient, OllamaModels } from '@careernav/llm';

interface CliArgs {
  resumePath: string;
  roleChoice: string;
  linkedinUrl: string | null;
  photoPath: string | null;
  outDir: string;
  save: boolean;
}

function parseArgs(argv: string[]): CliArgs | null {
  const positional: string[] = [];
  const flags = new Map<string, string>();
  let save = false;
  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === '--save') {
      save = true;
    } else if (arg.startsWith('--')) {
      const value = argv[i + 1];
      if (value === undefined) return null;
      flags.set(arg.slice(2), value);
      i++;
    } else {
      positional.push(arg);
    }
  }
  const [resumePath, roleChoice = 'resume_based'] = positional;
  if (!resumePath) return null;
  return {
    resumePath,
    roleChoice,
    linkedinUrl: flags.get('linkedin') ?? null,
    photoPath: flags.get('photo') ?? null,
    outDir: flags.get('out') ?? path.resolve(process.cwd(), 'output'),
    save,
  };
}

async function main() {
  const args = parseArgs(process.argv.slice(2));
  if (!args) {
    console.error(
      'Usage: tsx scripts/run-navigator.ts <resume> [career choice] [--linkedin url] [--photo file] [--out dir] [--save]',
    );
    process.exit(1);
  }

  if (!(await defaultClient.isAvailable(OllamaModels.GENERAL))) {
    console.warn(`[WARN] Ollama model ${OllamaModels.GENERAL} not reachable; the run will likely fail.`);
  }

  const { text: resumeText } = await extractText(args.resumePath);
  console.log(`Resume: ${resumeText.length} characters`);

  let linkedinText = '';
  const linkedinUrl = args.linkedinUrl ?? extractLinkedIn(resumeText);
  if (linkedinUrl) {
    linkedinText = await scrapeWebContent(linkedinUrl);
    if (isScrapeError(linkedinText)) {
      console.warn(`[WARN] ${linkedinText}`);
      linkedinText = LINKEDIN_UNAVAILABLE_MESSAGE;
    }
  }

  const studentProfile = buildStudentProfile(resumeText, linkedinText);
  const { state, trace } = await runNavigator(studentProfile, args.roleChoice, {
    logSink: (agent, entry) => {
      if (entry.level === 'debug') return;
      console.log(`[${agent}] [${entry.level.toUpperCase()}] ${entry.message}`);
    },
    onStepUpdate: (step) => console.log(`  step ${step.name}: ${step.status}`),
  });

  const photo = args.photoPath ? new Uint8Array(await fs.readFile(args.photoPath)) : null;
  const pdf = await renderResumePdf(state.tailored_resume, { photo });

  await fs.mkdir(args.outDir, { recursive: true });
  const planFile = path.join(args.outDir, 'plan.json');
  const pdfFile = path.join(args.outDir, 'resume.pdf');
  await fs.writeFile(
    planFile,
    JSON.stringify(
      {
        final_plan: state.final_plan,
        market_analysis: state.market_analysis,
        profile_analysis: state.profile_analysis,
        tailored_resume: state.tailored_resume,
        trace,
      },
      null,
      2,
    ),
  );
  await fs.writeFile(pdfFile, pdf);
  console.log(`\nCareer: ${state.chosen_career}`);
  console.log(`Wrote ${planFile}`);
  console.log(`Wrote ${pdfFile}`);

  if (args.save) {
    const plan = await createCareerPlan(getDb(), {
      roleChoice: args.roleChoice,
      studentProfile,
      linkedinUrl,
      resumeFilename: path.basename(args.resumePath),
      marketAnalysis: state.market_analysis,
      profileAnalysis: state.profile_analysis,
      tailoredResume: state.tailored_resume,
      finalPlan: state.final_plan,
      trace,
    });
    console.log(`Saved plan id=${plan.id}`);
    await closeDb();
  }
}

main().catch((err) => {
  if (err instanceof NavigatorStepError) {
    console.error(err.message);
    for (const step of err.trace.steps) {
      console.error(`  ${step.name}: ${step.status}${step.error ? ` (${step.error})` : ''}`);
    }
  } else {
    console.error(err);
  }
  process.exit(1);
});
