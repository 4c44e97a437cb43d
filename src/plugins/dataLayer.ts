import fp from 'fastify-plugin';
import type { FastifyPluginAsync } from 'fastify';
import { Redis } from 'ioredis';
import { env } from '../config/env.js';
import { runMigrations, type MigrationResult } from '../db/migrator.js';
import { closePool, getPool } from '../db/pool.js';
import { createRepairEventQueue } from '../queue/repairEventQueue.js';
import { createDataLayer } from '../repositories/index.js';
import { BatchCoordinator } from '../services/batchCoordinator.js';
import { RepairWorkflow } from '../services/repairWorkflow.js';
import { createRepairEventWorker } from '../workers/repairEventWorker.js';

async function canReachRedis(redisUrl: string): Promise<boolean> {
  const client = new Redis(redisUrl, {
    lazyConnect: true,
    enableOfflineQueue: false,
    maxRetriesPerRequest: 0,
    connectTimeout: 500
  });
  client.on('error', () => {
    // reported through the fallback warning below
  });

  try {
    await client.connect();
    await client.ping();
    return true;
  } catch {
    return false;
  } finally {
    client.disconnect();
  }
}

const dataLayer: FastifyPluginAsync = async (app) => {
  let pool = getPool();
  let migrationResult: MigrationResult = { ran: false, applied: [] };

  if (pool) {
    try {
      migrationResult = await runMigrations();
    } catch (error) {
      if (env.NODE_ENV === 'development' || env.NODE_ENV === 'test') {
        app.log.warn(
          { error: error instanceof Error ? error.message : String(error) },
          'database unavailable; falling back to in-memory repositories for this runtime'
        );
        await closePool();
        pool = null;
      } else {
        throw error;
      }
    }
  }

  const { repositories, unitOfWork } = createDataLayer(pool, { lockTimeoutMs: env.COUNTER_LOCK_TIMEOUT_MS });
  const redisReachable = env.REDIS_URL ? await canReachRedis(env.REDIS_URL) : false;
  const repairEventQueue = createRepairEventQueue({
    redisUrl: env.REDIS_URL,
    log: app.log,
    forceInMemory: Boolean(env.REDIS_URL) && !redisReachable
  });
  repairEventQueue.registerProcessor(createRepairEventWorker(repositories.audit, app.log));

  if (!pool) {
    if (!env.DATABASE_URL) {
      app.log.warn('DATABASE_URL is not configured; running with in-memory repositories (non-persistent)');
    } else {
      app.log.warn('DATABASE_URL is configured but unavailable; running with in-memory repositories');
    }
  } else if (migrationResult.applied.length > 0) {
    app.log.info({ applied: migrationResult.applied }, 'database migrations applied');
  } else {
    app.log.info('database ready; no new migrations');
  }

  if (repairEventQueue.mode === 'in_memory') {
    if (!env.REDIS_URL) {
      app.log.warn('REDIS_URL is not configured; repair events are processed inline');
    } else {
      app.log.warn('REDIS_URL is configured but unavailable; repair events are processed inline');
    }
  } else {
    app.log.info('repair event queue initialized with BullMQ');
  }

  app.decorate('repositories', repositories);
  app.decorate('unitOfWork', unitOfWork);
  app.decorate('repairEventQueue', repairEventQueue);
  app.decorate('batchCoordinator', new BatchCoordinator({ repositories, unitOfWork, log: app.log }));
  app.decorate('repairWorkflow', new RepairWorkflow({ repositories, unitOfWork, log: app.log }));

  app.addHook('onClose', async () => {
    await repairEventQueue.close();
    await closePool();
  });
};

export const dataLayerPlugin = fp(dataLayer, { name: 'data-layer' });
