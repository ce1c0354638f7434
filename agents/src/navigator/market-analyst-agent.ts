/**
 * Job Market Analyst Agent - the skills employers ask for in a given career.
 */

import { z } from 'zod';
import {
  completeStructured,
  createPromptTemplate,
  executeTemplate,
  jsonShapeInstruction,
} from '@careernav/llm';
import { skillAnalysisSchema, type SkillAnalysis } from '@careernav/schemas';
import { BaseAgent } from '../shared/base-agent.js';
import type { AgentConfig, AgentContext } from '../shared/types.js';

export const TOP_TECHNICAL_SKILLS = 5;
export const TOP_SOFT_SKILLS = 3;

const MarketAnalystInputSchema = z.object({
  career: z.string().min(1),
});
export type MarketAnalystInput = z.infer<typeof MarketAnalystInputSchema>;

const template = createPromptTemplate(
  `For the career "{career}", list the top ${TOP_TECHNICAL_SKILLS} technical skills and the top ${TOP_SOFT_SKILLS} soft skills employers look for in entry-level hires, most important first.

${jsonShapeInstruction('{ "technical_skills": ["..."], "soft_skills": ["..."] }')}`,
);

/** Trim, drop empties and case-insensitive duplicates, keep the first `limit`. */
export function topSkills(skills: string[], limit: number): string[] {
  const seen = new Set<string>();
  const out: string[] = [];
  for (const raw of skills) {
    const skill = raw.trim();
    const key = skill.toLowerCase();
    if (!skill || seen.has(key)) continue;
    seen.add(key);
    out.push(skill);
    if (out.length === limit) break;
  }
  return out;
}

export class MarketAnalystAgent extends BaseAgent<MarketAnalystInput, SkillAnalysis> {
  config: AgentConfig = {
    name: 'MarketAnalystAgent',
    description: 'Identifies the top technical and soft skills for a career',
    version: '1.0.0',
  };

  inputSchema = MarketAnalystInputSchema;
  outputSchema = skillAnalysisSchema;

  protected async run(input: MarketAnalystInput, _context: AgentContext): Promise<SkillAnalysis> {
    const { prompt } = executeTemplate(template, { career: input.career });
    const analysis = await completeStructured(prompt, skillAnalysisSchema);
    const result = {
      technical_skills: topSkills(analysis.technical_skills, TOP_TECHNICAL_SKILLS),
      soft_skills: topSkills(analysis.soft_skills, TOP_SOFT_SKILLS),
    };
    this.debug('Skills identified', result);
    return result;
  }
}
