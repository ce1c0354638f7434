/**
 * Danger: wipe all stored career plans and their chat history.
 *
 * Run: npx tsx scripts/clear-plans.ts
 */
import './load-env';

import { careerPlans, closeDb, getDb, planChatMessages } from '@careernav/db';

async function main() {
  const db = getDb();

  console.log('Deleting plan_chat_messages…');
  await db.delete(planChatMessages);

  console.log('Deleting career_plans…');
  await db.delete(careerPlans);

  await closeDb();
  console.log('Done. All plans cleared.');
}

main().catch((err) => {
  console.error(err);
  process.exit(1);
});
