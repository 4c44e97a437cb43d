import { describe, expect, it } from 'vitest';
import { AuthorizationError, TransitionError } from '../src/lib/errors.js';
import {
  assertInitialStatus,
  assertTransition,
  canTransition,
  canView,
  isTerminal,
  transitionsFrom,
  type RepairActor
} from '../src/lib/repairStatusMachine.js';
import type { ManagerAuthorization, RepairRecord, RepairStatus } from '../src/repositories/contracts.js';

function repair(status: RepairStatus, overrides: Partial<RepairRecord> = {}): RepairRecord {
  return {
    repairId: 'rep-1',
    customerId: 'cust-1',
    technicianId: 'tech-1',
    unitNumber: 'TRUCK-1',
    damageType: 'chip',
    description: null,
    origin: 'FIELD',
    status,
    tierIndex: 0,
    basePrice: 5000,
    discount: 0,
    price: 5000,
    priceSource: 'TIER',
    overrideReason: null,
    overriddenBy: null,
    batchId: null,
    breakNumber: 1,
    totalBreaksInBatch: 1,
    createdAt: '2026-01-01T00:00:00.000Z',
    updatedAt: '2026-01-01T00:00:00.000Z',
    ...overrides
  };
}

function authorization(technicianId: string, isManager: boolean, team: string[] = []): ManagerAuthorization {
  return {
    technicianId,
    isManager,
    canOverridePricing: false,
    approvalLimit: null,
    managedTechnicianIds: new Set(team)
  };
}

const customer: RepairActor = { kind: 'customer', customerId: 'cust-1', userId: 'user-1' };
const otherCustomer: RepairActor = { kind: 'customer', customerId: 'cust-2', userId: 'user-2' };
const assigned: RepairActor = { kind: 'technician', technicianId: 'tech-1', authorization: authorization('tech-1', false) };
const stranger: RepairActor = { kind: 'technician', technicianId: 'tech-2', authorization: authorization('tech-2', false) };
const teamManager: RepairActor = {
  kind: 'technician',
  technicianId: 'mgr-1',
  authorization: authorization('mgr-1', true, ['tech-1'])
};
const otherManager: RepairActor = {
  kind: 'technician',
  technicianId: 'mgr-2',
  authorization: authorization('mgr-2', true)
};

describe('transition table', () => {
  it('lists the forward edges of every status', () => {
    expect(transitionsFrom('REQUESTED')).toEqual(['APPROVED']);
    expect(transitionsFrom('PENDING')).toEqual(['APPROVED', 'DENIED']);
    expect(transitionsFrom('APPROVED')).toEqual(['IN_PROGRESS']);
    expect(transitionsFrom('IN_PROGRESS')).toEqual(['COMPLETED']);
  });

  it('treats COMPLETED and DENIED as terminal', () => {
    expect(isTerminal('COMPLETED')).toBe(true);
    expect(isTerminal('DENIED')).toBe(true);
    expect(isTerminal('PENDING')).toBe(false);
    expect(canTransition('DENIED', 'APPROVED')).toBe(false);
    expect(canTransition('APPROVED', 'PENDING')).toBe(false);
  });

  it('only admits origin-specific initial statuses', () => {
    expect(() => assertInitialStatus('CUSTOMER', 'REQUESTED')).not.toThrow();
    expect(() => assertInitialStatus('FIELD', 'PENDING')).not.toThrow();
    expect(() => assertInitialStatus('FIELD', 'REQUESTED')).toThrow(TransitionError);
    expect(() => assertInitialStatus('CUSTOMER', 'APPROVED')).toThrow(TransitionError);
  });
});

describe('assertTransition', () => {
  it('lets the owning customer decide a pending repair', () => {
    expect(() => assertTransition(repair('PENDING'), 'DENIED', customer)).not.toThrow();
    expect(() => assertTransition(repair('PENDING'), 'APPROVED', otherCustomer)).toThrow(AuthorizationError);
    expect(() => assertTransition(repair('PENDING'), 'APPROVED', teamManager)).toThrow(AuthorizationError);
  });

  it('lets any manager accept a customer request', () => {
    const requested = repair('REQUESTED', { origin: 'CUSTOMER' });
    expect(() => assertTransition(requested, 'APPROVED', otherManager)).not.toThrow();
    expect(() => assertTransition(requested, 'APPROVED', assigned)).toThrow(AuthorizationError);
    expect(() => assertTransition(requested, 'APPROVED', customer)).toThrow(AuthorizationError);
  });

  it('lets the assigned technician or their manager do the work', () => {
    expect(() => assertTransition(repair('APPROVED'), 'IN_PROGRESS', assigned)).not.toThrow();
    expect(() => assertTransition(repair('IN_PROGRESS'), 'COMPLETED', teamManager)).not.toThrow();
    expect(() => assertTransition(repair('APPROVED'), 'IN_PROGRESS', stranger)).toThrow(AuthorizationError);
    expect(() => assertTransition(repair('APPROVED'), 'IN_PROGRESS', otherManager)).toThrow(AuthorizationError);
  });

  it('reports an illegal edge before checking the actor', () => {
    let caught: unknown;
    try {
      assertTransition(repair('DENIED'), 'APPROVED', stranger);
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(TransitionError);
    expect(caught).toMatchObject({ code: 'ILLEGAL_REPAIR_TRANSITION', from: 'DENIED', to: 'APPROVED' });
  });
});

describe('canView', () => {
  it('shows customers their whole account and nothing else', () => {
    expect(canView(customer, repair('PENDING'))).toBe(true);
    expect(canView(customer, repair('REQUESTED', { origin: 'CUSTOMER' }))).toBe(true);
    expect(canView(otherCustomer, repair('APPROVED'))).toBe(false);
  });

  it('hides pending repairs from every technician', () => {
    expect(canView(assigned, repair('PENDING'))).toBe(false);
    expect(canView(teamManager, repair('PENDING'))).toBe(false);
  });

  it('shows requested repairs to managers only', () => {
    const requested = repair('REQUESTED', { origin: 'CUSTOMER', technicianId: 'tech-2' });
    expect(canView(otherManager, requested)).toBe(true);
    expect(canView(assigned, requested)).toBe(false);
  });

  it('scopes other repairs to the assignee and their manager', () => {
    expect(canView(assigned, repair('IN_PROGRESS'))).toBe(true);
    expect(canView(teamManager, repair('COMPLETED'))).toBe(true);
    expect(canView(stranger, repair('APPROVED'))).toBe(false);
    expect(canView(otherManager, repair('APPROVED'))).toBe(false);
  });
});
