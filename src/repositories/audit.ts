import type { AuditEvent, AuditRepository } from './contracts.js';
import type { DbExecutor, DbRow } from './db.js';
import { mapTimestamps, nullableString } from './db.js';
import type { MemoryStore } from './memoryStore.js';

function toAuditEvent(row: DbRow): AuditEvent {
  const value = mapTimestamps(row);
  const payload = value.payload;
  return {
    eventId: String(value.event_id),
    repairId: nullableString(value.repair_id),
    batchId: nullableString(value.batch_id),
    eventType: String(value.event_type),
    actor: String(value.actor),
    payload: typeof payload === 'object' && payload !== null ? { ...payload } : {},
    createdAt: String(value.created_at)
  };
}

const AUDIT_COLUMNS = 'event_id, repair_id, batch_id, event_type, actor, payload, created_at';

export function createAuditRepository(db: DbExecutor | null, store: MemoryStore): AuditRepository {
  return {
    async insert(event) {
      if (!db) {
        const created: AuditEvent = { ...event, createdAt: new Date().toISOString() };
        store.audit.set(event.eventId, created);
        return created;
      }

      const result = await db.query(
        `
          INSERT INTO audit_events(event_id, repair_id, batch_id, event_type, actor, payload)
          VALUES ($1, $2, $3, $4, $5, $6::jsonb)
          RETURNING ${AUDIT_COLUMNS}
        `,
        [
          event.eventId,
          event.repairId,
          event.batchId,
          event.eventType,
          event.actor,
          JSON.stringify(event.payload)
        ]
      );

      return toAuditEvent(result.rows[0]);
    },

    async listByRepair(repairId) {
      if (!db) {
        return Array.from(store.audit.values()).filter((event) => event.repairId === repairId);
      }

      const result = await db.query(
        `SELECT ${AUDIT_COLUMNS} FROM audit_events WHERE repair_id = $1 ORDER BY created_at ASC`,
        [repairId]
      );
      return result.rows.map((row: DbRow) => toAuditEvent(row));
    },

    async listByBatch(batchId) {
      if (!db) {
        return Array.from(store.audit.values()).filter((event) => event.batchId === batchId);
      }

      const result = await db.query(
        `SELECT ${AUDIT_COLUMNS} FROM audit_events WHERE batch_id = $1 ORDER BY created_at ASC`,
        [batchId]
      );
      return result.rows.map((row: DbRow) => toAuditEvent(row));
    }
  };
}
