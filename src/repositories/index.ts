import type { Pool } from 'pg';
import { createCallsRepository } from './calls.js';
import type { RepositoryBundle } from './contracts.js';
import { createEmergenciesRepository } from './emergencies.js';
import { createFragmentsRepository } from './fragments.js';
import { createMemoryStore } from './memoryStore.js';
import { createOrganizationsRepository } from './organizations.js';
import { createPatientsRepository } from './patients.js';
import { createReadingsRepository } from './readings.js';

export function createRepositories(pool: Pool | null): RepositoryBundle {
  const store = createMemoryStore();
  const db = pool;

  return {
    calls: createCallsRepository(db, store),
    fragments: createFragmentsRepository(db, store),
    patients: createPatientsRepository(db, store),
    organizations: createOrganizationsRepository(db, store),
    readings: createReadingsRepository(db, store),
    emergencies: createEmergenciesRepository(db, store)
  };
}
