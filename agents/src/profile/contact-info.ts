/**
 * Contact details pulled from resume text with regex patterns.
 * Used to find a LinkedIn URL the student did not type in and to fill
 * contact fields the resume writer left blank.
 */

import type { TailoredResumeContent } from '@careernav/schemas';

export interface ContactInfo {
  name: string | null;
  email: string | null;
  phone: string | null;
  linkedinUrl: string | null;
}

export function extractEmail(text: string): string | null {
  const match = text.match(/[a-zA-Z0-9._%+-]+@[a-zA-Z0-9.-]+\.[a-zA-Z]{2,}/);
  return match?.[0] ?? null;
}

/**
 * Handles (XXX) XXX-XXXX, XXX-XXX-XXXX, XXX.XXX.XXXX and an optional +1 prefix.
 */
export function extractPhone(text: string): string | null {
  const match = text.match(/(?:\+1[-.\s]?)?\(?\d{3}\)?[-.\s]?\d{3}[-.\s]?\d{4}/);
  return match?.[0] ?? null;
}

export function extractLinkedIn(text: string): string | null {
  const match = text.match(/(?:https?:\/\/)?(?:[a-z]{2,3}\.)?linkedin\.com\/in\/[\w%-]+\/?/i);
  if (!match) return null;
  const url = match[0];
  return /^https?:\/\//i.test(url) ? url : `https://${url}`;
}

/**
 * First short line near the top that starts with a letter and is not contact details.
 * ALL CAPS names are title-cased.
 */
export function extractName(text: string): string | null {
  const lines = text
    .split('\n')
    .map((l) => l.trim())
    .filter((l) => l.length > 0)
    .slice(0, 5);

  for (const line of lines) {
    if (line.length < 3 || line.length > 50 || !/^\p{L}/u.test(line)) continue;
    if (line.includes('@') || /\d{3}/.test(line) || line.split('|').length > 2) continue;
    if (/^(resume|curriculum vitae|cv)$/i.test(line)) continue;

    const upper = (line.match(/[A-Z]/g) ?? []).length;
    const lower = (line.match(/[a-z]/g) ?? []).length;
    if (upper > lower) {
      return line
        .split(/\s+/)
        .map((word) => word.charAt(0).toUpperCase() + word.slice(1).toLowerCase())
        .join(' ');
    }
    return line;
  }
  return null;
}

export function extractContactInfo(text: string): ContactInfo {
  return {
    name: extractName(text),
    email: extractEmail(text),
    phone: extractPhone(text),
    linkedinUrl: extractLinkedIn(text),
  };
}

/** Fill blank name/email/phone on tailored content from the resume text. */
export function fillContactGaps(
  content: TailoredResumeContent,
  resumeText: string,
): TailoredResumeContent {
  const contact = extractContactInfo(resumeText);
  return {
    ...content,
    full_name: content.full_name.trim() || contact.name || content.full_name,
    email: content.email.trim() || contact.email || content.email,
    phone: content.phone.trim() || contact.phone || content.phone,
  };
}
