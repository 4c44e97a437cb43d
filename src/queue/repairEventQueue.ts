import { Queue, Worker } from 'bullmq';
import type { FastifyBaseLogger } from 'fastify';
import type { RepairDomainEvent } from '../lib/repairEvents.js';

export const REPAIR_EVENTS_QUEUE = 'repair-events';

export type RepairEventProcessor = (event: RepairDomainEvent) => Promise<unknown>;

export type EnqueueResult = {
  queued: boolean;
  jobId: string;
};

export interface RepairEventQueue {
  readonly mode: 'bullmq' | 'in_memory';
  registerProcessor(processor: RepairEventProcessor): void;
  enqueue(event: RepairDomainEvent): Promise<EnqueueResult>;
  enqueueAll(events: readonly RepairDomainEvent[]): Promise<EnqueueResult[]>;
  close(): Promise<void>;
}

async function enqueueInOrder(queue: RepairEventQueue, events: readonly RepairDomainEvent[]) {
  const results: EnqueueResult[] = [];
  for (const event of events) {
    results.push(await queue.enqueue(event));
  }
  return results;
}

/** Runs the processor inline, so events are handled before the request responds. */
export class InMemoryRepairEventQueue implements RepairEventQueue {
  readonly mode = 'in_memory' as const;
  private processor?: RepairEventProcessor;

  registerProcessor(processor: RepairEventProcessor) {
    this.processor = processor;
  }

  async enqueue(event: RepairDomainEvent) {
    if (this.processor) {
      await this.processor(event);
    }

    return { queued: true, jobId: event.eventId };
  }

  enqueueAll(events: readonly RepairDomainEvent[]) {
    return enqueueInOrder(this, events);
  }

  async close() {
    return;
  }
}

class BullRepairEventQueue implements RepairEventQueue {
  readonly mode = 'bullmq' as const;
  private readonly queue: Queue<RepairDomainEvent>;
  private readonly fallbackQueue = new InMemoryRepairEventQueue();
  private processor?: RepairEventProcessor;
  private worker: Worker<RepairDomainEvent> | null = null;

  constructor(
    private readonly redisUrl: string,
    private readonly log: FastifyBaseLogger
  ) {
    this.queue = new Queue<RepairDomainEvent>(REPAIR_EVENTS_QUEUE, {
      connection: { url: redisUrl }
    });
  }

  registerProcessor(processor: RepairEventProcessor) {
    this.processor = processor;
    this.fallbackQueue.registerProcessor(processor);
  }

  private ensureWorker() {
    if (!this.processor || this.worker) {
      return;
    }

    this.worker = new Worker<RepairDomainEvent>(
      REPAIR_EVENTS_QUEUE,
      async (job) => {
        await this.processor?.(job.data);
      },
      { connection: { url: this.redisUrl } }
    );
    this.worker.on('failed', (job, error) => {
      this.log.error({ jobId: job?.id, err: error }, 'repair_event.failed');
    });
  }

  async enqueue(event: RepairDomainEvent) {
    try {
      const added = await this.queue.add(event.type, event, {
        jobId: event.eventId,
        attempts: 3,
        backoff: { type: 'exponential', delay: 500 },
        removeOnComplete: true,
        removeOnFail: false
      });

      this.ensureWorker();
      return { queued: true, jobId: String(added.id) };
    } catch (error) {
      this.log.warn({ err: error, eventId: event.eventId }, 'redis enqueue failed; handling repair event inline');
      return this.fallbackQueue.enqueue(event);
    }
  }

  enqueueAll(events: readonly RepairDomainEvent[]) {
    return enqueueInOrder(this, events);
  }

  async close() {
    if (this.worker) {
      await this.worker.close();
      this.worker = null;
    }
    await this.queue.close();
  }
}

export function createRepairEventQueue(options: {
  redisUrl: string;
  log: FastifyBaseLogger;
  forceInMemory?: boolean;
}): RepairEventQueue {
  if (!options.redisUrl || options.forceInMemory) {
    return new InMemoryRepairEventQueue();
  }

  return new BullRepairEventQueue(options.redisUrl, options.log);
}
