import { randomUUID } from 'node:crypto';
import type { RepairOrigin, RepairRecord, RepairStatus } from '../repositories/contracts.js';
import { sumCents, type Cents } from './money.js';

export type RepairCreatedEvent = {
  type: 'repair.created';
  eventId: string;
  batchId: string | null;
  customerId: string;
  unitNumber: string;
  technicianId: string;
  origin: RepairOrigin;
  repairs: RepairRecord[];
  total: Cents;
  occurredAt: string;
};

export type RepairStatusChangedEvent = {
  type: 'repair.status_changed';
  eventId: string;
  repairId: string;
  batchId: string | null;
  customerId: string;
  technicianId: string;
  from: RepairStatus;
  to: RepairStatus;
  actor: string;
  occurredAt: string;
};

export type RepairDomainEvent = RepairCreatedEvent | RepairStatusChangedEvent;

/** One event per creation call, carrying every record of the batch. */
export function repairCreated(repairs: RepairRecord[], occurredAt: string): RepairCreatedEvent {
  const [first] = repairs;
  if (!first) {
    throw new RangeError('a creation event needs at least one repair');
  }

  return {
    type: 'repair.created',
    eventId: randomUUID(),
    batchId: first.batchId,
    customerId: first.customerId,
    unitNumber: first.unitNumber,
    technicianId: first.technicianId,
    origin: first.origin,
    repairs,
    total: sumCents(repairs.map((repair) => repair.price)),
    occurredAt
  };
}

export function repairStatusChanged(
  before: RepairRecord,
  after: RepairRecord,
  actor: string
): RepairStatusChangedEvent {
  return {
    type: 'repair.status_changed',
    eventId: randomUUID(),
    repairId: after.repairId,
    batchId: after.batchId,
    customerId: after.customerId,
    technicianId: after.technicianId,
    from: before.status,
    to: after.status,
    actor,
    occurredAt: after.updatedAt
  };
}
