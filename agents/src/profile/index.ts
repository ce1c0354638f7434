/**
 * Profile inputs for the navigator.
 *
 * - extract-text:    resume PDF/text to plain text
 * - contact-info:    regex contact extraction and gap filling
 * - student-profile: resume + LinkedIn text composition
 */

export * from './extract-text.js';
export * from './contact-info.js';
export * from './student-profile.js';
