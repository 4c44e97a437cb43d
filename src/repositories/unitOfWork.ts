import { setTimeout as delay } from 'node:timers/promises';
import type { Pool, PoolClient } from 'pg';
import { ConcurrencyError, isSerializationConflict, toRepairEngineError } from '../lib/errors.js';
import type { LockRelease } from '../lib/keyedLock.js';
import { createApprovalsRepository } from './approvals.js';
import type { TransactionScope, UnitOfWork } from './contracts.js';
import { createTransactionalCounters } from './counters.js';
import type { MemoryStore } from './memoryStore.js';
import { createRepairsRepository } from './repairs.js';

export type UnitOfWorkOptions = {
  lockTimeoutMs: number;
};

type TransactionalMaps = Pick<MemoryStore, 'unitCounters' | 'repairs' | 'approvals'>;

function copyMaps(store: TransactionalMaps): TransactionalMaps {
  return {
    unitCounters: new Map(store.unitCounters),
    repairs: new Map(store.repairs),
    approvals: new Map(store.approvals)
  };
}

function changedKeys<V>(before: Map<string, V>, after: Map<string, V>): string[] {
  const keys: string[] = [];
  for (const [key, value] of after) {
    if (before.get(key) !== value) {
      keys.push(key);
    }
  }
  return keys;
}

function findConflict<V>(live: Map<string, V>, before: Map<string, V>, keys: string[]): string | undefined {
  return keys.find((key) => live.get(key) !== before.get(key));
}

function applyKeys<V>(live: Map<string, V>, draft: Map<string, V>, keys: string[]) {
  for (const key of keys) {
    const value = draft.get(key);
    if (value !== undefined) {
      live.set(key, value);
    }
  }
}

/**
 * Runs work against a private draft of the transactional maps and publishes it in one
 * synchronous step. Stored rows are replaced rather than mutated, so a row whose identity
 * differs from the snapshot was written by a concurrent transaction.
 */
class MemoryUnitOfWork implements UnitOfWork {
  constructor(
    private readonly store: MemoryStore,
    private readonly options: UnitOfWorkOptions
  ) {}

  async run<T>(work: (scope: TransactionScope) => Promise<T>): Promise<T> {
    const snapshot = copyMaps(this.store);
    const draftMaps = copyMaps(this.store);
    const draft: MemoryStore = { ...this.store, ...draftMaps };
    const releases: LockRelease[] = [];
    const heldKeys = new Set<string>();

    const acquireCounterLock = async (key: string) => {
      if (heldKeys.has(key)) {
        return;
      }
      releases.push(await this.store.counterLocks.acquire(key, this.options.lockTimeoutMs));
      heldKeys.add(key);

      // the previous holder may have committed after our snapshot was taken
      const committed = this.store.unitCounters.get(key);
      if (committed) {
        snapshot.unitCounters.set(key, committed);
        draftMaps.unitCounters.set(key, committed);
      }
    };

    const scope: TransactionScope = {
      counters: createTransactionalCounters(null, draft, acquireCounterLock),
      repairs: createRepairsRepository(null, draft),
      approvals: createApprovalsRepository(null, draft)
    };

    try {
      const result = await work(scope);
      this.commit(snapshot, draftMaps);
      return result;
    } catch (error) {
      throw toRepairEngineError(error);
    } finally {
      for (const release of releases.reverse()) {
        release();
      }
    }
  }

  private commit(snapshot: TransactionalMaps, draft: TransactionalMaps) {
    const counterKeys = changedKeys(snapshot.unitCounters, draft.unitCounters);
    const repairKeys = changedKeys(snapshot.repairs, draft.repairs);
    const approvalKeys = changedKeys(snapshot.approvals, draft.approvals);

    const conflict =
      findConflict(this.store.unitCounters, snapshot.unitCounters, counterKeys) ??
      findConflict(this.store.repairs, snapshot.repairs, repairKeys) ??
      findConflict(this.store.approvals, snapshot.approvals, approvalKeys);
    if (conflict) {
      throw new ConcurrencyError(`row ${conflict} changed concurrently; retry the request`);
    }

    applyKeys(this.store.unitCounters, draft.unitCounters, counterKeys);
    applyKeys(this.store.repairs, draft.repairs, repairKeys);
    applyKeys(this.store.approvals, draft.approvals, approvalKeys);
  }
}

const SERIALIZATION_RETRY_DELAY_MS = 25;

/**
 * Re-runs `attempt` while Postgres reports a serialization failure or deadlock, until
 * `budgetMs` has elapsed. A submission that waited on a counter row lock fails with 40001
 * once the holder commits; the next attempt starts from a fresh snapshot.
 */
export async function retrySerializationConflicts<T>(attempt: () => Promise<T>, budgetMs: number): Promise<T> {
  const deadline = Date.now() + budgetMs;
  for (let tries = 1; ; tries += 1) {
    try {
      return await attempt();
    } catch (error) {
      const remaining = deadline - Date.now();
      if (!isSerializationConflict(error) || remaining <= 0) {
        throw toRepairEngineError(error);
      }
      await delay(Math.min(SERIALIZATION_RETRY_DELAY_MS * tries, remaining));
    }
  }
}

class PgUnitOfWork implements UnitOfWork {
  constructor(
    private readonly pool: Pool,
    private readonly store: MemoryStore,
    private readonly options: UnitOfWorkOptions
  ) {}

  run<T>(work: (scope: TransactionScope) => Promise<T>): Promise<T> {
    return retrySerializationConflicts(() => this.attempt(work), this.options.lockTimeoutMs);
  }

  private async attempt<T>(work: (scope: TransactionScope) => Promise<T>): Promise<T> {
    const client: PoolClient = await this.pool.connect();

    try {
      await client.query('BEGIN ISOLATION LEVEL SERIALIZABLE');
      // SET takes no bind parameters; the timeout is an integer from config
      await client.query(`SET LOCAL lock_timeout = '${Math.trunc(this.options.lockTimeoutMs)}ms'`);

      // row locks are taken by the counter upsert itself
      const scope: TransactionScope = {
        counters: createTransactionalCounters(client, this.store, async () => undefined),
        repairs: createRepairsRepository(client, this.store),
        approvals: createApprovalsRepository(client, this.store)
      };

      const result = await work(scope);
      await client.query('COMMIT');
      return result;
    } catch (error) {
      await client.query('ROLLBACK').catch(() => undefined);
      throw error;
    } finally {
      client.release();
    }
  }
}

export function createUnitOfWork(
  pool: Pool | null,
  store: MemoryStore,
  options: UnitOfWorkOptions
): UnitOfWork {
  return pool ? new PgUnitOfWork(pool, store, options) : new MemoryUnitOfWork(store, options);
}
