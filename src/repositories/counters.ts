import type { TransactionScope, UnitCountersRepository, UnitRepairCounter } from './contracts.js';
import type { DbExecutor, DbRow } from './db.js';
import type { MemoryStore } from './memoryStore.js';
import { counterKey } from './memoryStore.js';

export type CounterLockAcquirer = (key: string) => Promise<void>;

function toCounter(row: DbRow): UnitRepairCounter {
  return {
    customerId: String(row.customer_id),
    unitNumber: String(row.unit_number),
    count: Number(row.repair_count)
  };
}

export function createCountersRepository(db: DbExecutor | null, store: MemoryStore): UnitCountersRepository {
  return {
    async getCount(customerId, unitNumber) {
      if (!db) {
        return store.unitCounters.get(counterKey(customerId, unitNumber))?.count ?? 0;
      }

      const result = await db.query(
        `
          SELECT repair_count
          FROM unit_repair_counters
          WHERE customer_id = $1 AND unit_number = $2
        `,
        [customerId, unitNumber]
      );
      return result.rows.length === 0 ? 0 : Number(result.rows[0].repair_count);
    },

    async customerTotal(customerId) {
      if (!db) {
        let total = 0;
        for (const counter of store.unitCounters.values()) {
          if (counter.customerId === customerId) {
            total += counter.count;
          }
        }
        return total;
      }

      const result = await db.query(
        `SELECT COALESCE(SUM(repair_count), 0)::int AS total FROM unit_repair_counters WHERE customer_id = $1`,
        [customerId]
      );
      return Number(result.rows[0]?.total ?? 0);
    },

    async listForCustomer(customerId) {
      if (!db) {
        return Array.from(store.unitCounters.values())
          .filter((counter) => counter.customerId === customerId)
          .sort((a, b) => a.unitNumber.localeCompare(b.unitNumber));
      }

      const result = await db.query(
        `
          SELECT customer_id, unit_number, repair_count
          FROM unit_repair_counters
          WHERE customer_id = $1
          ORDER BY unit_number ASC
        `,
        [customerId]
      );
      return result.rows.map((row: DbRow) => toCounter(row));
    }
  };
}

/**
 * Counter access inside a unit of work. `nextIndex` returns the pre-increment count,
 * which is the 0-based tier index of the repair being created.
 *
 * In Postgres the upsert takes the row lock and keeps it until the surrounding
 * transaction ends. In memory the caller-supplied acquirer takes the per-key lock,
 * and the unit of work releases it after commit or rollback.
 */
export function createTransactionalCounters(
  db: DbExecutor | null,
  store: MemoryStore,
  acquireLock: CounterLockAcquirer
): TransactionScope['counters'] {
  const reads = createCountersRepository(db, store);

  return {
    ...reads,

    async nextIndex(customerId, unitNumber) {
      if (!db) {
        const key = counterKey(customerId, unitNumber);
        await acquireLock(key);
        const current = store.unitCounters.get(key)?.count ?? 0;
        store.unitCounters.set(key, { customerId, unitNumber, count: current + 1 });
        return current;
      }

      const result = await db.query(
        `
          INSERT INTO unit_repair_counters(customer_id, unit_number, repair_count)
          VALUES ($1, $2, 1)
          ON CONFLICT(customer_id, unit_number)
          DO UPDATE SET repair_count = unit_repair_counters.repair_count + 1, updated_at = NOW()
          RETURNING repair_count - 1 AS tier_index
        `,
        [customerId, unitNumber]
      );
      return Number(result.rows[0].tier_index);
    }
  };
}
