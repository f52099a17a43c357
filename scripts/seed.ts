// Seed script: demo hotels matching the stub PMS fixtures.
// Run with: npm run db:seed

import { logger } from '../src/config/logger';
import { db } from '../src/db/client';
import { seedHotels } from '../src/db/seed';

async function main(): Promise<void> {
  try {
    const inserted = await seedHotels(db);
    logger.info({ inserted }, 'Seeded demo hotels');
  } catch (err) {
    logger.error({ err }, 'Seeding failed');
    process.exitCode = 1;
  } finally {
    await db.destroy();
  }
}

void main();
