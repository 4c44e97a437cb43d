import { ConcurrencyError } from './errors.js';

type Waiter = {
  grant: () => void;
  timer: NodeJS.Timeout;
};

export type LockRelease = () => void;

/**
 * Per-key mutual exclusion with a FIFO wait queue. Holders of different keys never
 * wait on each other; a waiter that is not granted within `timeoutMs` fails with a
 * retryable ConcurrencyError.
 */
export class KeyedLock {
  private readonly held = new Set<string>();
  private readonly waiters = new Map<string, Waiter[]>();

  isHeld(key: string): boolean {
    return this.held.has(key);
  }

  acquire(key: string, timeoutMs: number): Promise<LockRelease> {
    if (!this.held.has(key)) {
      this.held.add(key);
      return Promise.resolve(this.releaser(key));
    }

    return new Promise<LockRelease>((resolve, reject) => {
      const queue = this.waiters.get(key) ?? [];
      const waiter: Waiter = {
        grant: () => {
          clearTimeout(waiter.timer);
          resolve(this.releaser(key));
        },
        timer: setTimeout(() => {
          const current = this.waiters.get(key) ?? [];
          this.setQueue(
            key,
            current.filter((candidate) => candidate !== waiter)
          );
          reject(new ConcurrencyError(`timed out after ${timeoutMs}ms waiting for lock ${key}`));
        }, timeoutMs)
      };
      queue.push(waiter);
      this.waiters.set(key, queue);
    });
  }

  private releaser(key: string): LockRelease {
    let released = false;
    return () => {
      if (released) {
        return;
      }
      released = true;

      const queue = this.waiters.get(key) ?? [];
      const next = queue.shift();
      this.setQueue(key, queue);
      if (next) {
        // ownership passes straight to the next waiter; the key stays held
        next.grant();
        return;
      }

      this.held.delete(key);
    };
  }

  private setQueue(key: string, queue: Waiter[]) {
    if (queue.length === 0) {
      this.waiters.delete(key);
      return;
    }
    this.waiters.set(key, queue);
  }
}
