export * from './types.js';
export * from './graph.js';
export * from './role-suggester-agent.js';
export * from './market-analyst-agent.js';
export * from './profile-reviewer-agent.js';
export * from './resume-tailor-agent.js';
export * from './lead-strategist-agent.js';
