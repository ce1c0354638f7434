/**
 * The "student profile" is the single text blob every navigator prompt reads:
 * resume text followed by whatever the LinkedIn page yielded.
 */

export const LINKEDIN_UNAVAILABLE_MESSAGE =
  'Could not scrape LinkedIn profile. Proceeding with resume only.';

export function buildStudentProfile(resumeText: string, linkedinText = ''): string {
  return `--- RESUME ---\n${resumeText}\n\n--- LINKEDIN PROFILE ---\n${linkedinText}`;
}
