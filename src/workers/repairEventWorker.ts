import { randomUUID } from 'node:crypto';
import type { FastifyBaseLogger } from 'fastify';
import { fromCents } from '../lib/money.js';
import type { RepairCreatedEvent, RepairDomainEvent, RepairStatusChangedEvent } from '../lib/repairEvents.js';
import type { AuditEvent, AuditRepository } from '../repositories/contracts.js';

export type RepairEventOutcome = {
  auditEventsWritten: number;
};

type AuditInsert = Omit<AuditEvent, 'createdAt'>;

function createdAuditRows(event: RepairCreatedEvent): AuditInsert[] {
  return event.repairs.map((repair) => ({
    eventId: randomUUID(),
    repairId: repair.repairId,
    batchId: event.batchId,
    eventType: 'repair_created',
    actor: repair.overriddenBy ?? event.technicianId,
    payload: {
      sourceEventId: event.eventId,
      origin: repair.origin,
      unitNumber: repair.unitNumber,
      status: repair.status,
      tierIndex: repair.tierIndex,
      price: fromCents(repair.price),
      priceSource: repair.priceSource,
      overrideReason: repair.overrideReason,
      breakNumber: repair.breakNumber,
      totalBreaksInBatch: repair.totalBreaksInBatch,
      batchTotal: fromCents(event.total)
    }
  }));
}

function statusAuditRow(event: RepairStatusChangedEvent): AuditInsert {
  return {
    eventId: randomUUID(),
    repairId: event.repairId,
    batchId: event.batchId,
    eventType: 'repair_status_changed',
    actor: event.actor,
    payload: {
      sourceEventId: event.eventId,
      from: event.from,
      to: event.to,
      technicianId: event.technicianId
    }
  };
}

/**
 * Records dispatched repair events in the audit trail. Notification transport hangs off
 * this worker; today it only writes audit rows and logs.
 */
export function createRepairEventWorker(audit: AuditRepository, log: FastifyBaseLogger) {
  return async (event: RepairDomainEvent): Promise<RepairEventOutcome> => {
    const rows = event.type === 'repair.created' ? createdAuditRows(event) : [statusAuditRow(event)];

    for (const row of rows) {
      await audit.insert(row);
    }

    log.info(
      { eventId: event.eventId, eventType: event.type, customerId: event.customerId, auditEventsWritten: rows.length },
      'repair_event.processed'
    );
    return { auditEventsWritten: rows.length };
  };
}
