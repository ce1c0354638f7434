import { describe, it, expect } from 'vitest';
import {
  buildPrompt,
  createPromptTemplate,
  executeTemplate,
  formatForPrompt,
  jsonShapeInstruction,
} from '@careernav/llm';

describe('buildPrompt', () => {
  it('substitutes known placeholders and leaves unknown ones', () => {
    expect(buildPrompt('Role: {career}, level {level}', { career: 'Data Analyst' })).toBe(
      'Role: Data Analyst, level {level}',
    );
  });

  it('does not re-expand placeholders inside substituted values', () => {
    expect(buildPrompt('{a}', { a: '{b}', b: 'x' })).toBe('{b}');
  });

  it('ignores JSON braces', () => {
    expect(buildPrompt('{ "career": "{career}" }', { career: 'UX Designer' })).toBe(
      '{ "career": "UX Designer" }',
    );
  });
});

describe('createPromptTemplate / executeTemplate', () => {
  const template = createPromptTemplate('Career {career}; skills {skills}; again {career}', {
    system: 'You are a career coach.',
  });

  it('collects each variable once', () => {
    expect(template.variables).toEqual(['career', 'skills']);
  });

  it('fills the template and passes the system prompt through', () => {
    expect(executeTemplate(template, { career: 'PM', skills: 'SQL' })).toEqual({
      prompt: 'Career PM; skills SQL; again PM',
      system: 'You are a career coach.',
    });
  });

  it('throws on missing variables', () => {
    expect(() => executeTemplate(template, {})).toThrow(
      'Missing template variables: career, skills',
    );
  });
});

describe('formatForPrompt', () => {
  it('passes strings through', () => {
    expect(formatForPrompt('plain')).toBe('plain');
  });

  it('pretty-prints structured values', () => {
    expect(formatForPrompt({ a: [1] })).toBe('{\n  "a": [\n    1\n  ]\n}');
  });
});

describe('jsonShapeInstruction', () => {
  it('appends the shape after the instruction', () => {
    expect(jsonShapeInstruction('{ "x": 1 }')).toBe(
      'Return ONLY valid JSON matching this shape. No markdown, no commentary.\n{ "x": 1 }',
    );
  });
});
