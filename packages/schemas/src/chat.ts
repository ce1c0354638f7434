import { z } from 'zod';
import { chatRoleEnum } from './enums';

/** Plans are keyed by uuid; anything else cannot name a stored plan. */
export const planIdSchema = z.string().uuid();

export function isPlanId(value: string | null | undefined): value is string {
  return planIdSchema.safeParse(value).success;
}

export const chatMessageSchema = z.object({
  role: chatRoleEnum,
  content: z.string(),
});
export type ChatMessage = z.infer<typeof chatMessageSchema>;

export const chatRequestSchema = z.object({
  message: z.string().trim().min(1, 'Message is required'),
  history: z.array(chatMessageSchema).optional().default([]),
  planId: planIdSchema.optional(),
});
export type ChatRequest = z.infer<typeof chatRequestSchema>;
