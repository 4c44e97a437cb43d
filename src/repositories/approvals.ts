import type { ApprovalDecision, ApprovalsRepository } from './contracts.js';
import type { DbExecutor, DbRow } from './db.js';
import { mapTimestamps, nullableString } from './db.js';
import type { MemoryStore } from './memoryStore.js';

function toDecision(row: DbRow): ApprovalDecision {
  const value = mapTimestamps(row);
  return {
    repairId: String(value.repair_id),
    approved: value.approved === null ? null : Boolean(value.approved),
    decidedBy: nullableString(value.decided_by),
    decidedAt: nullableString(value.decided_at),
    notes: String(value.notes ?? '')
  };
}

export function createApprovalsRepository(db: DbExecutor | null, store: MemoryStore): ApprovalsRepository {
  return {
    async upsert(decision) {
      if (!db) {
        store.approvals.set(decision.repairId, { ...decision });
        return decision;
      }

      const result = await db.query(
        `
          INSERT INTO repair_approvals(repair_id, approved, decided_by, decided_at, notes)
          VALUES ($1, $2, $3, $4, $5)
          ON CONFLICT(repair_id) DO UPDATE SET
            approved = EXCLUDED.approved,
            decided_by = EXCLUDED.decided_by,
            decided_at = EXCLUDED.decided_at,
            notes = EXCLUDED.notes
          RETURNING repair_id, approved, decided_by, decided_at, notes
        `,
        [decision.repairId, decision.approved, decision.decidedBy, decision.decidedAt, decision.notes]
      );
      return toDecision(result.rows[0]);
    },

    async getByRepair(repairId) {
      if (!db) {
        return store.approvals.get(repairId) ?? null;
      }

      const result = await db.query(
        `SELECT repair_id, approved, decided_by, decided_at, notes FROM repair_approvals WHERE repair_id = $1`,
        [repairId]
      );
      return result.rows.length === 0 ? null : toDecision(result.rows[0]);
    }
  };
}
