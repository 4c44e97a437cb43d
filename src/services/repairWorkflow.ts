import type { FastifyBaseLogger } from 'fastify';
import { AuthorizationError, ConcurrencyError, NotFoundError, ValidationError } from '../lib/errors.js';
import { repairStatusChanged, type RepairStatusChangedEvent } from '../lib/repairEvents.js';
import {
  assertTransition,
  canView,
  describeActor,
  type RepairActor
} from '../lib/repairStatusMachine.js';
import type {
  ApprovalDecision,
  RepairListFilters,
  RepairRecord,
  RepairStatus,
  RepositoryBundle,
  TransactionScope,
  UnitOfWork
} from '../repositories/contracts.js';
import { MAX_BREAKS_PER_BATCH } from './batchCoordinator.js';

const ACTIVE_STATUSES: readonly RepairStatus[] = ['PENDING', 'APPROVED', 'IN_PROGRESS'];

export type ResolvePendingInput = {
  repairId: string;
  approved: boolean;
  decidedBy: string;
  notes?: string | null;
};

export type ResolveBatchInput = {
  batchId: string;
  approved: boolean;
  decidedBy: string;
  notes?: string | null;
};

export type AssignRequestedInput = {
  repairId: string;
  assignToTechnicianId: string;
  assignedByManagerId: string;
};

export type TransitionResult = {
  repairs: RepairRecord[];
  decisions: ApprovalDecision[];
  events: RepairStatusChangedEvent[];
};

export type RepairWorkflowDeps = {
  repositories: RepositoryBundle;
  unitOfWork: UnitOfWork;
  log: FastifyBaseLogger;
};

function compareNewestFirst(a: RepairRecord, b: RepairRecord): number {
  return b.createdAt.localeCompare(a.createdAt) || a.repairId.localeCompare(b.repairId);
}

async function moveOrConflict(
  scope: TransactionScope,
  repair: RepairRecord,
  to: RepairStatus,
  technicianId?: string
): Promise<RepairRecord> {
  const moved = await scope.repairs.transitionStatus(repair.repairId, { from: repair.status, to, technicianId });
  if (!moved) {
    throw new ConcurrencyError(`repair ${repair.repairId} changed while moving it to ${to}; reload and retry`);
  }
  return moved;
}

/**
 * Applies status-machine transitions to stored repairs. Each mutation is checked against
 * the transition table first, then written with a compare-and-set on the current status,
 * so a repair changed underneath the caller fails with ConcurrencyError instead of being
 * overwritten.
 */
export class RepairWorkflow {
  constructor(private readonly deps: RepairWorkflowDeps) {}

  /** Builds the acting party for a technician id, attaching manager scope where it exists. */
  async technicianActor(technicianId: string): Promise<RepairActor> {
    const authorization = await this.deps.repositories.technicians.getAuthorization(technicianId);
    if (!authorization) {
      throw new AuthorizationError(`unknown technician ${technicianId}`, 'ACTOR_UNKNOWN', 401);
    }
    return { kind: 'technician', technicianId, authorization };
  }

  async customerActor(customerId: string, userId: string): Promise<RepairActor> {
    const customer = await this.deps.repositories.customers.getById(customerId);
    if (!customer) {
      throw new AuthorizationError(`unknown customer ${customerId}`, 'ACTOR_UNKNOWN', 401);
    }
    return { kind: 'customer', customerId, userId };
  }

  async resolvePending(input: ResolvePendingInput, actor: RepairActor): Promise<TransitionResult> {
    const repair = await this.load(input.repairId);
    const to: RepairStatus = input.approved ? 'APPROVED' : 'DENIED';
    assertTransition(repair, to, actor);

    const result = await this.deps.unitOfWork.run(async (scope) => {
      const moved = await moveOrConflict(scope, repair, to);
      const decision = await scope.approvals.upsert(this.decisionFor(repair.repairId, input));
      return { moved, decision };
    });

    return this.finish([repair], [result.moved], [result.decision], actor);
  }

  /**
   * Resolves every PENDING repair of a batch in one transaction. Breaks that were
   * auto-approved or already decided are left alone; a batch with nothing pending
   * resolves to an empty result.
   */
  async resolveBatch(input: ResolveBatchInput, actor: RepairActor): Promise<TransitionResult> {
    const members = await this.deps.repositories.repairs.list({
      batchId: input.batchId,
      limit: MAX_BREAKS_PER_BATCH
    });
    if (!members.some((repair) => canView(actor, repair))) {
      throw new NotFoundError(`batch not found: ${input.batchId}`, 'BATCH_NOT_FOUND');
    }

    const to: RepairStatus = input.approved ? 'APPROVED' : 'DENIED';
    const pending = members
      .filter((repair) => repair.status === 'PENDING')
      .sort((a, b) => a.breakNumber - b.breakNumber);
    pending.forEach((repair) => assertTransition(repair, to, actor));

    if (pending.length === 0) {
      return { repairs: [], decisions: [], events: [] };
    }

    const result = await this.deps.unitOfWork.run(async (scope) => {
      const moved: RepairRecord[] = [];
      const decisions: ApprovalDecision[] = [];
      for (const repair of pending) {
        moved.push(await moveOrConflict(scope, repair, to));
        decisions.push(await scope.approvals.upsert(this.decisionFor(repair.repairId, input)));
      }
      return { moved, decisions };
    });

    return this.finish(pending, result.moved, result.decisions, actor);
  }

  /** Manager accepts a customer request and hands it to themselves or a team member. */
  async assignRequested(input: AssignRequestedInput): Promise<TransitionResult> {
    const repair = await this.load(input.repairId);
    const actor = await this.technicianActor(input.assignedByManagerId);
    assertTransition(repair, 'APPROVED', actor);

    const assignee = await this.deps.repositories.technicians.getById(input.assignToTechnicianId);
    if (!assignee) {
      throw new ValidationError(`technician not found: ${input.assignToTechnicianId}`, 'TECHNICIAN_NOT_FOUND');
    }

    const onTeam =
      actor.kind === 'technician' &&
      (input.assignToTechnicianId === actor.technicianId ||
        Boolean(actor.authorization?.managedTechnicianIds.has(input.assignToTechnicianId)));
    if (!onTeam) {
      throw new AuthorizationError(
        `technician ${input.assignToTechnicianId} is not on manager ${input.assignedByManagerId}'s team`,
        'ASSIGNEE_NOT_ON_TEAM'
      );
    }

    const moved = await this.deps.unitOfWork.run((scope) =>
      moveOrConflict(scope, repair, 'APPROVED', input.assignToTechnicianId)
    );
    return this.finish([repair], [moved], [], actor);
  }

  async startWork(repairId: string, actor: RepairActor): Promise<TransitionResult> {
    return this.advance(repairId, 'IN_PROGRESS', actor);
  }

  async completeWork(repairId: string, actor: RepairActor): Promise<TransitionResult> {
    return this.advance(repairId, 'COMPLETED', actor);
  }

  async getVisible(repairId: string, actor: RepairActor): Promise<RepairRecord> {
    const repair = await this.deps.repositories.repairs.getById(repairId);
    if (!repair || !canView(actor, repair)) {
      throw new NotFoundError(`repair not found: ${repairId}`, 'REPAIR_NOT_FOUND');
    }
    return repair;
  }

  async listVisible(actor: RepairActor, filters: Omit<RepairListFilters, 'technicianIds'> = {}): Promise<RepairRecord[]> {
    const { repairs } = this.deps.repositories;

    if (actor.kind === 'customer') {
      if (filters.customerId && filters.customerId !== actor.customerId) {
        return [];
      }
      return repairs.list({ ...filters, customerId: actor.customerId });
    }

    const isManager = Boolean(actor.authorization?.isManager);
    const wanted = filters.statuses ?? [];
    const includes = (status: RepairStatus) => wanted.length === 0 || wanted.includes(status);

    const assignedStatuses = (['APPROVED', 'IN_PROGRESS', 'COMPLETED', 'DENIED'] as const).filter(includes);
    const technicianIds = [actor.technicianId, ...(actor.authorization?.managedTechnicianIds ?? [])];

    const batches = await Promise.all([
      assignedStatuses.length > 0
        ? repairs.list({ ...filters, technicianIds, statuses: assignedStatuses })
        : Promise.resolve([]),
      isManager && includes('REQUESTED')
        ? repairs.list({ ...filters, statuses: ['REQUESTED'] })
        : Promise.resolve([])
    ]);

    return batches
      .flat()
      .filter((repair) => canView(actor, repair))
      .sort(compareNewestFirst)
      .slice(0, filters.limit ?? 100);
  }

  /** The open repair on a unit, if any; used to warn before creating a duplicate. */
  async findActiveForUnit(customerId: string, unitNumber: string): Promise<RepairRecord | null> {
    const [active] = await this.deps.repositories.repairs.list({
      customerId,
      unitNumber: unitNumber.trim(),
      statuses: ACTIVE_STATUSES,
      limit: 1
    });
    return active ?? null;
  }

  private async advance(repairId: string, to: RepairStatus, actor: RepairActor): Promise<TransitionResult> {
    const repair = await this.load(repairId);
    assertTransition(repair, to, actor);
    const moved = await this.deps.unitOfWork.run((scope) => moveOrConflict(scope, repair, to));
    return this.finish([repair], [moved], [], actor);
  }

  private async load(repairId: string): Promise<RepairRecord> {
    const repair = await this.deps.repositories.repairs.getById(repairId);
    if (!repair) {
      throw new NotFoundError(`repair not found: ${repairId}`, 'REPAIR_NOT_FOUND');
    }
    return repair;
  }

  private decisionFor(repairId: string, input: { approved: boolean; decidedBy: string; notes?: string | null }) {
    return {
      repairId,
      approved: input.approved,
      decidedBy: input.decidedBy,
      decidedAt: new Date().toISOString(),
      notes: input.notes?.trim() ?? ''
    };
  }

  private finish(
    before: RepairRecord[],
    after: RepairRecord[],
    decisions: ApprovalDecision[],
    actor: RepairActor
  ): TransitionResult {
    const actorLabel = describeActor(actor);
    const events = after.map((moved, index) => repairStatusChanged(before[index] ?? moved, moved, actorLabel));

    for (const event of events) {
      this.deps.log.info(
        { repairId: event.repairId, batchId: event.batchId, from: event.from, to: event.to, actor: actorLabel },
        'repair.status_changed'
      );
    }

    return { repairs: after, decisions, events };
  }
}
