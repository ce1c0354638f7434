/**
 * @careernav/agents - Agent implementations
 *
 * - shared/    : BaseAgent and agent types
 * - profile/   : resume text, contact details, student profile assembly
 * - browser/   : LinkedIn / profile page scraping
 * - navigator/ : the career navigator graph and its agents
 * - chat/      : plan-grounded career chat
 */

export * from './shared/index.js';
export * from './profile/index.js';
export * from './browser/index.js';
export * from './navigator/index.js';
export * from './chat/index.js';
