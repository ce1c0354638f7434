/**
 * @careernav/schemas - zod schemas shared by agents, persistence and the web app
 */

export * from './enums';
export * from './navigator';
export * from './submission';
export * from './chat';
