import 'fastify';
import type { RepairEventQueue } from '../queue/repairEventQueue.js';
import type { RepositoryBundle, UnitOfWork } from '../repositories/contracts.js';
import type { BatchCoordinator } from '../services/batchCoordinator.js';
import type { RepairWorkflow } from '../services/repairWorkflow.js';

declare module 'fastify' {
  interface FastifyInstance {
    repositories: RepositoryBundle;
    unitOfWork: UnitOfWork;
    repairEventQueue: RepairEventQueue;
    batchCoordinator: BatchCoordinator;
    repairWorkflow: RepairWorkflow;
  }
}
