import { describe, it, expect } from 'vitest';
import {
  chatRequestSchema,
  isPlanId,
  isStrategyChoice,
  navigatorSubmissionSchema,
  resolveRoleChoice,
} from '@careernav/schemas';

describe('resolveRoleChoice', () => {
  it('uses the custom role when Other is chosen', () => {
    expect(resolveRoleChoice('Other', '  Robotics Engineer ')).toBe('Robotics Engineer');
  });

  it('keeps Other when the custom role is blank', () => {
    expect(resolveRoleChoice('Other', '   ')).toBe('Other');
    expect(resolveRoleChoice('Other')).toBe('Other');
  });

  it('ignores the custom role for any other choice', () => {
    expect(resolveRoleChoice('Data Scientist', 'Robotics Engineer')).toBe('Data Scientist');
  });
});

describe('isStrategyChoice', () => {
  it('recognises the two strategies only', () => {
    expect(isStrategyChoice('resume_based')).toBe(true);
    expect(isStrategyChoice('market_demand')).toBe(true);
    expect(isStrategyChoice('Data Analyst')).toBe(false);
    expect(isStrategyChoice('Resume_Based')).toBe(false);
  });
});

describe('navigatorSubmissionSchema', () => {
  it('trims fields', () => {
    const parsed = navigatorSubmissionSchema.parse({
      careerChoice: ' Data Analyst ',
      linkedinUrl: ' https://www.linkedin.com/in/test-student ',
    });
    expect(parsed).toEqual({
      careerChoice: 'Data Analyst',
      linkedinUrl: 'https://www.linkedin.com/in/test-student',
    });
  });

  it('rejects a malformed LinkedIn URL', () => {
    const result = navigatorSubmissionSchema.safeParse({
      careerChoice: 'resume_based',
      linkedinUrl: 'linkedin profile',
    });
    expect(result.success).toBe(false);
    expect(result.error?.issues[0]?.message).toBe('LinkedIn URL must be a valid URL');
  });

  it('requires a career choice', () => {
    expect(navigatorSubmissionSchema.safeParse({ careerChoice: '  ' }).success).toBe(false);
  });
});

describe('chatRequestSchema', () => {
  it('defaults history to an empty list', () => {
    expect(chatRequestSchema.parse({ message: 'hi' })).toEqual({ message: 'hi', history: [] });
  });

  it('rejects empty messages', () => {
    const result = chatRequestSchema.safeParse({ message: '   ' });
    expect(result.error?.issues[0]?.message).toBe('Message is required');
  });
});

describe('isPlanId', () => {
  it('accepts only uuids', () => {
    expect(isPlanId('6f1c2f7e-3a3b-4c55-9d1e-2b7f0c9a1d11')).toBe(true);
    expect(isPlanId('abc')).toBe(false);
    expect(isPlanId('')).toBe(false);
    expect(isPlanId(null)).toBe(false);
  });
});
