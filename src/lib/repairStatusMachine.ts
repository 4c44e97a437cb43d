import type {
  ManagerAuthorization,
  RepairOrigin,
  RepairRecord,
  RepairStatus
} from '../repositories/contracts.js';
import { REPAIR_STATUSES } from '../repositories/contracts.js';
import { AuthorizationError, TransitionError } from './errors.js';

export type TransitionActor = 'customer' | 'manager' | 'technician';

export type RepairActor =
  | { kind: 'customer'; customerId: string; userId: string }
  | { kind: 'technician'; technicianId: string; authorization: ManagerAuthorization | null };

type TransitionTable = {
  readonly [From in RepairStatus]: Readonly<Partial<Record<RepairStatus, TransitionActor>>>;
};

// every status must appear here; DENIED and COMPLETED accept nothing
const TRANSITIONS: TransitionTable = {
  REQUESTED: { APPROVED: 'manager' },
  PENDING: { APPROVED: 'customer', DENIED: 'customer' },
  APPROVED: { IN_PROGRESS: 'technician' },
  IN_PROGRESS: { COMPLETED: 'technician' },
  COMPLETED: {},
  DENIED: {}
};

const INITIAL_STATUSES: { readonly [Origin in RepairOrigin]: readonly RepairStatus[] } = {
  CUSTOMER: ['REQUESTED'],
  FIELD: ['PENDING', 'APPROVED']
};

export function canTransition(from: RepairStatus, to: RepairStatus): boolean {
  return TRANSITIONS[from][to] !== undefined;
}

export function transitionsFrom(from: RepairStatus): RepairStatus[] {
  return REPAIR_STATUSES.filter((to) => canTransition(from, to));
}

export function isTerminal(status: RepairStatus): boolean {
  return transitionsFrom(status).length === 0;
}

export function isInitialStatus(origin: RepairOrigin, status: RepairStatus): boolean {
  return INITIAL_STATUSES[origin].includes(status);
}

export function assertInitialStatus(origin: RepairOrigin, status: RepairStatus) {
  if (!isInitialStatus(origin, status)) {
    throw new TransitionError(`${status} is not a legal initial status for ${origin} repairs`, 'NEW', status);
  }
}

function isManager(actor: RepairActor): boolean {
  return actor.kind === 'technician' && Boolean(actor.authorization?.isManager);
}

function managesTechnician(actor: RepairActor, technicianId: string): boolean {
  return (
    actor.kind === 'technician' &&
    Boolean(actor.authorization?.isManager) &&
    Boolean(actor.authorization?.managedTechnicianIds.has(technicianId))
  );
}

function actorMeets(required: TransitionActor, actor: RepairActor, repair: RepairRecord): boolean {
  switch (required) {
    case 'customer':
      return actor.kind === 'customer' && actor.customerId === repair.customerId;
    case 'manager':
      return isManager(actor);
    case 'technician':
      return (
        actor.kind === 'technician' &&
        (actor.technicianId === repair.technicianId || managesTechnician(actor, repair.technicianId))
      );
  }
}

/**
 * Checks that `repair` may move to `to` and that `actor` is the party allowed to move it.
 * Illegal edges fail with TransitionError before the actor is considered.
 */
export function assertTransition(repair: RepairRecord, to: RepairStatus, actor: RepairActor) {
  const required = TRANSITIONS[repair.status][to];
  if (required === undefined) {
    throw new TransitionError(
      `repair ${repair.repairId} cannot move from ${repair.status} to ${to}`,
      repair.status,
      to
    );
  }

  if (!actorMeets(required, actor, repair)) {
    throw new AuthorizationError(
      `${describeActor(actor)} may not move repair ${repair.repairId} from ${repair.status} to ${to}`
    );
  }
}

export function describeActor(actor: RepairActor): string {
  return actor.kind === 'customer'
    ? `customer user ${actor.userId}`
    : `${isManager(actor) ? 'manager' : 'technician'} ${actor.technicianId}`;
}

/**
 * Customers see every repair on their own account. Among technicians, PENDING repairs
 * are hidden from everyone until the customer decides, and REQUESTED repairs are shown
 * to managers only. Otherwise a technician sees their own repairs and a manager also
 * sees their team's.
 */
export function canView(actor: RepairActor, repair: RepairRecord): boolean {
  if (actor.kind === 'customer') {
    return actor.customerId === repair.customerId;
  }

  switch (repair.status) {
    case 'PENDING':
      return false;
    case 'REQUESTED':
      return isManager(actor);
    default:
      return actor.technicianId === repair.technicianId || managesTechnician(actor, repair.technicianId);
  }
}
