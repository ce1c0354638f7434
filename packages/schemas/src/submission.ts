import { z } from 'zod';
import { CUSTOM_ROLE_CHOICE, roleStrategyEnum, type RoleStrategy } from './enums';

/** A strategy or a concrete career name. */
export const roleChoiceSchema = z.string().trim().min(1, 'Choose a career direction');
export type RoleChoice = z.infer<typeof roleChoiceSchema>;

export function isStrategyChoice(choice: string): choice is RoleStrategy {
  return roleStrategyEnum.safeParse(choice).success;
}

/** "Other" plus a non-empty custom role resolves to the custom role; anything else is kept. */
export function resolveRoleChoice(careerChoice: string, customRole?: string | null): string {
  const custom = customRole?.trim() ?? '';
  if (careerChoice === CUSTOM_ROLE_CHOICE && custom) return custom;
  return careerChoice;
}

export const navigatorSubmissionSchema = z.object({
  careerChoice: roleChoiceSchema,
  customRole: z.string().trim().max(120).optional(),
  linkedinUrl: z.string().trim().url('LinkedIn URL must be a valid URL').optional(),
});
export type NavigatorSubmission = z.infer<typeof navigatorSubmissionSchema>;
