import { fromCents } from '../lib/money.js';
import type {
  PriceSource,
  RepairListFilters,
  RepairOrigin,
  RepairRecord,
  RepairsRepository,
  RepairStatus
} from './contracts.js';
import { REPAIR_STATUSES } from './contracts.js';
import type { DbExecutor, DbRow } from './db.js';
import { mapTimestamps, nullableString, numericToCents } from './db.js';
import type { MemoryStore } from './memoryStore.js';

const DEFAULT_LIST_LIMIT = 100;

const REPAIR_COLUMNS = `
  repair_id, customer_id, technician_id, unit_number, damage_type, description, origin, status,
  tier_index, base_price, discount, price, price_source, override_reason, overridden_by,
  batch_id, break_number, total_breaks_in_batch, created_at, updated_at
`;

function toStatus(value: unknown): RepairStatus {
  const status = REPAIR_STATUSES.find((candidate) => candidate === value);
  if (!status) {
    throw new TypeError(`unknown repair status: ${String(value)}`);
  }
  return status;
}

function toRepair(row: DbRow): RepairRecord {
  const value = mapTimestamps(row);
  const origin: RepairOrigin = value.origin === 'CUSTOMER' ? 'CUSTOMER' : 'FIELD';
  const priceSource: PriceSource = value.price_source === 'OVERRIDE' ? 'OVERRIDE' : 'TIER';
  return {
    repairId: String(value.repair_id),
    customerId: String(value.customer_id),
    technicianId: String(value.technician_id),
    unitNumber: String(value.unit_number),
    damageType: String(value.damage_type),
    description: nullableString(value.description),
    origin,
    status: toStatus(value.status),
    tierIndex: Number(value.tier_index),
    basePrice: numericToCents(value.base_price),
    discount: numericToCents(value.discount),
    price: numericToCents(value.price),
    priceSource,
    overrideReason: nullableString(value.override_reason),
    overriddenBy: nullableString(value.overridden_by),
    batchId: nullableString(value.batch_id),
    breakNumber: Number(value.break_number),
    totalBreaksInBatch: Number(value.total_breaks_in_batch),
    createdAt: String(value.created_at),
    updatedAt: String(value.updated_at)
  };
}

function compareRepairs(a: RepairRecord, b: RepairRecord): number {
  const byCreated = b.createdAt.localeCompare(a.createdAt);
  if (byCreated !== 0) {
    return byCreated;
  }
  if (a.batchId !== null && a.batchId === b.batchId) {
    return a.breakNumber - b.breakNumber;
  }
  return a.repairId.localeCompare(b.repairId);
}

function applyListFilters(repairs: RepairRecord[], filters: RepairListFilters): RepairRecord[] {
  const technicianIds = filters.technicianIds ? new Set(filters.technicianIds) : null;
  const statuses = filters.statuses ? new Set<RepairStatus>(filters.statuses) : null;

  return repairs
    .filter((repair) => (filters.customerId ? repair.customerId === filters.customerId : true))
    .filter((repair) => (technicianIds ? technicianIds.has(repair.technicianId) : true))
    .filter((repair) => (statuses ? statuses.has(repair.status) : true))
    .filter((repair) => (filters.unitNumber ? repair.unitNumber === filters.unitNumber : true))
    .filter((repair) => (filters.batchId ? repair.batchId === filters.batchId : true))
    .sort(compareRepairs)
    .slice(0, filters.limit ?? DEFAULT_LIST_LIMIT);
}

function buildListQuery(filters: RepairListFilters): { text: string; values: unknown[] } {
  const clauses: string[] = [];
  const values: unknown[] = [];
  const bind = (value: unknown) => {
    values.push(value);
    return `$${values.length}`;
  };

  if (filters.customerId) {
    clauses.push(`customer_id = ${bind(filters.customerId)}`);
  }
  if (filters.technicianIds) {
    clauses.push(`technician_id = ANY(${bind([...filters.technicianIds])}::text[])`);
  }
  if (filters.statuses) {
    clauses.push(`status = ANY(${bind([...filters.statuses])}::text[])`);
  }
  if (filters.unitNumber) {
    clauses.push(`unit_number = ${bind(filters.unitNumber)}`);
  }
  if (filters.batchId) {
    clauses.push(`batch_id = ${bind(filters.batchId)}`);
  }

  const where = clauses.length > 0 ? `WHERE ${clauses.join(' AND ')}` : '';
  const limit = bind(filters.limit ?? DEFAULT_LIST_LIMIT);
  return {
    text: `
      SELECT ${REPAIR_COLUMNS}
      FROM repairs
      ${where}
      ORDER BY created_at DESC, batch_id NULLS LAST, break_number ASC, repair_id ASC
      LIMIT ${limit}
    `,
    values
  };
}

export function createRepairsRepository(db: DbExecutor | null, store: MemoryStore): RepairsRepository {
  return {
    async insert(record) {
      if (!db) {
        if (store.repairs.has(record.repairId)) {
          throw new Error(`duplicate repair id ${record.repairId}`);
        }
        const now = new Date().toISOString();
        const created: RepairRecord = { ...record, createdAt: now, updatedAt: now };
        store.repairs.set(record.repairId, created);
        return created;
      }

      const result = await db.query(
        `
          INSERT INTO repairs(
            repair_id, customer_id, technician_id, unit_number, damage_type, description, origin,
            status, tier_index, base_price, discount, price, price_source, override_reason,
            overridden_by, batch_id, break_number, total_breaks_in_batch
          )
          VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11, $12, $13, $14, $15, $16, $17, $18)
          RETURNING ${REPAIR_COLUMNS}
        `,
        [
          record.repairId,
          record.customerId,
          record.technicianId,
          record.unitNumber,
          record.damageType,
          record.description,
          record.origin,
          record.status,
          record.tierIndex,
          fromCents(record.basePrice),
          fromCents(record.discount),
          fromCents(record.price),
          record.priceSource,
          record.overrideReason,
          record.overriddenBy,
          record.batchId,
          record.breakNumber,
          record.totalBreaksInBatch
        ]
      );
      return toRepair(result.rows[0]);
    },

    async getById(repairId) {
      if (!db) {
        return store.repairs.get(repairId) ?? null;
      }

      const result = await db.query(`SELECT ${REPAIR_COLUMNS} FROM repairs WHERE repair_id = $1`, [repairId]);
      return result.rows.length === 0 ? null : toRepair(result.rows[0]);
    },

    async list(filters) {
      if (!db) {
        return applyListFilters(Array.from(store.repairs.values()), filters);
      }

      const query = buildListQuery(filters);
      const result = await db.query(query.text, query.values);
      return result.rows.map((row: DbRow) => toRepair(row));
    },

    async transitionStatus(repairId, change) {
      if (!db) {
        const existing = store.repairs.get(repairId);
        if (!existing || existing.status !== change.from) {
          return null;
        }

        const next: RepairRecord = {
          ...existing,
          status: change.to,
          technicianId: change.technicianId ?? existing.technicianId,
          updatedAt: new Date().toISOString()
        };
        store.repairs.set(repairId, next);
        return next;
      }

      const result = await db.query(
        `
          UPDATE repairs
          SET status = $3,
              technician_id = COALESCE($4, technician_id),
              updated_at = NOW()
          WHERE repair_id = $1 AND status = $2
          RETURNING ${REPAIR_COLUMNS}
        `,
        [repairId, change.from, change.to, change.technicianId ?? null]
      );
      return result.rows.length === 0 ? null : toRepair(result.rows[0]);
    }
  };
}
