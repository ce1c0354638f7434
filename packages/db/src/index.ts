/**
 * @careernav/db - plan and chat persistence (drizzle-orm over node-postgres)
 */

export { getDb, closeDb, type Db } from './client';
export * from './schema';
export * from './career-plans';
