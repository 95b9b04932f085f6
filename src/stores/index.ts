import { getRehabConfig } from '../lib/config/rehab.js';
import { getDatabase } from '../lib/db.js';
import { SEED_OFFICERS, SEED_PROGRAMS, SEED_STATIONS } from '../db/seed-data.js';
import { DrizzleRehabStore } from './drizzle-store.js';
import { InMemoryRehabStore } from './memory-store.js';
import type { RehabStore } from './types.js';

let store: RehabStore | null = null;

/**
 * Get the configured store singleton: PostgreSQL when a database is
 * configured, otherwise an in-memory store holding the demo seed data.
 */
export function getRehabStore(): RehabStore {
  if (store) {
    return store;
  }

  const config = getRehabConfig();
  if (config.store === 'postgres' && config.databaseUrl) {
    store = new DrizzleRehabStore(getDatabase(config.databaseUrl));
  } else {
    store = new InMemoryRehabStore({
      programs: SEED_PROGRAMS,
      stations: SEED_STATIONS,
      officers: SEED_OFFICERS,
    });
  }

  return store;
}

export { DrizzleRehabStore } from './drizzle-store.js';
export { InMemoryRehabStore } from './memory-store.js';
export type { MemoryStoreSeed } from './memory-store.js';
export type {
  RehabStore,
  ProfileStore,
  ProgramCatalog,
  ResourcePool,
  RecommendationStore,
  ProgressLogStore,
  ClinicalRecordStore,
} from './types.js';
