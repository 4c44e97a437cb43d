import type { Pool } from 'pg';
import { createApprovalsRepository } from './approvals.js';
import { createAuditRepository } from './audit.js';
import type { RepositoryBundle, UnitOfWork } from './contracts.js';
import { createCountersRepository } from './counters.js';
import { createCustomersRepository } from './customers.js';
import { createMemoryStore } from './memoryStore.js';
import { createRepairsRepository } from './repairs.js';
import { createTechniciansRepository } from './technicians.js';
import { createUnitOfWork, type UnitOfWorkOptions } from './unitOfWork.js';

export type DataLayer = {
  repositories: RepositoryBundle;
  unitOfWork: UnitOfWork;
};

export function createDataLayer(pool: Pool | null, options: UnitOfWorkOptions): DataLayer {
  const store = createMemoryStore();
  const db = pool;

  return {
    repositories: {
      customers: createCustomersRepository(db, store),
      technicians: createTechniciansRepository(db, store),
      counters: createCountersRepository(db, store),
      repairs: createRepairsRepository(db, store),
      approvals: createApprovalsRepository(db, store),
      audit: createAuditRepository(db, store)
    },
    unitOfWork: createUnitOfWork(pool, store, options)
  };
}
