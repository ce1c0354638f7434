export * from './types.js';
export { BaseAgent } from './base-agent.js';
