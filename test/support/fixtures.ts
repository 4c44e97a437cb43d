import { pino } from 'pino';
import type { FastifyBaseLogger } from 'fastify';
import type { ApprovalPolicy, RepositoryBundle } from '../../src/repositories/contracts.js';
import { createDataLayer, type DataLayer } from '../../src/repositories/index.js';
import { BatchCoordinator } from '../../src/services/batchCoordinator.js';
import { RepairWorkflow } from '../../src/services/repairWorkflow.js';

export const CUSTOMER_ID = 'cust-1';

export function silentLogger(): FastifyBaseLogger {
  return pino({ level: 'silent' });
}

/**
 * cust-1 with default pricing; tech-1 and tech-2 are plain technicians; mgr-1 manages
 * tech-1 and may override up to 150.00; mgr-2 manages nobody and cannot override.
 */
export async function seedAccounts(repositories: RepositoryBundle, policy?: ApprovalPolicy) {
  await repositories.customers.upsert({ customerId: CUSTOMER_ID, name: 'Test Fleet Co' });
  await repositories.customers.upsert({ customerId: 'cust-2', name: 'Other Fleet Co' });

  for (const technicianId of ['tech-1', 'tech-2']) {
    await repositories.technicians.upsert({
      technicianId,
      identity: { userId: `user-${technicianId}`, displayName: technicianId, email: null },
      manager: null
    });
  }

  await repositories.technicians.upsert({
    technicianId: 'mgr-1',
    identity: { userId: 'user-mgr-1', displayName: 'Manager One', email: null },
    manager: { isManager: true, canOverridePricing: true, approvalLimit: 15000 }
  });
  await repositories.technicians.upsert({
    technicianId: 'mgr-2',
    identity: { userId: 'user-mgr-2', displayName: 'Manager Two', email: null },
    manager: { isManager: true, canOverridePricing: false, approvalLimit: null }
  });
  await repositories.technicians.addTeamMember({ managerId: 'mgr-1', memberId: 'tech-1' });

  if (policy) {
    await repositories.customers.upsertApprovalPreference({ customerId: CUSTOMER_ID, policy });
  }
}

export type Harness = DataLayer & {
  coordinator: BatchCoordinator;
  workflow: RepairWorkflow;
};

export async function createHarness(options: { policy?: ApprovalPolicy; lockTimeoutMs?: number } = {}): Promise<Harness> {
  const layer = createDataLayer(null, { lockTimeoutMs: options.lockTimeoutMs ?? 1000 });
  await seedAccounts(layer.repositories, options.policy);

  const log = silentLogger();
  return {
    ...layer,
    coordinator: new BatchCoordinator({ repositories: layer.repositories, unitOfWork: layer.unitOfWork, log }),
    workflow: new RepairWorkflow({ repositories: layer.repositories, unitOfWork: layer.unitOfWork, log })
  };
}
