export * from './career-chat-agent.js';
