/**
 * Seed the rehabilitation catalog and resource pool.
 *
 * Run with: npm run db:seed
 */
import 'dotenv/config';
import { getDatabase, closeDatabase } from '../lib/db.js';
import { getRehabConfig } from '../lib/config/rehab.js';
import { officers, programs, rehabStations } from './schema.js';
import { SEED_OFFICERS, SEED_PROGRAMS, SEED_STATIONS } from './seed-data.js';

async function main() {
  const config = getRehabConfig();
  if (!config.databaseUrl) {
    throw new Error('DATABASE_URL is required to seed the database');
  }

  const db = getDatabase(config.databaseUrl);

  console.log('Seeding rehabilitation catalog...');
  await db.insert(programs).values(SEED_PROGRAMS).onConflictDoNothing();
  await db.insert(rehabStations).values(SEED_STATIONS).onConflictDoNothing();
  await db.insert(officers).values(SEED_OFFICERS).onConflictDoNothing();

  console.log(
    `Seeded ${SEED_PROGRAMS.length} programs, ${SEED_STATIONS.length} stations, ${SEED_OFFICERS.length} officers`
  );
}

main()
  .catch((error) => {
    console.error('Seed failed:', error);
    process.exitCode = 1;
  })
  .finally(() => closeDatabase());
