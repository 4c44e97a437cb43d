import { describe, expect, it } from 'vitest';
import { ConcurrencyError } from '../src/lib/errors.js';
import { KeyedLock } from '../src/lib/keyedLock.js';

describe('KeyedLock', () => {
  it('grants a free key immediately and frees it on release', async () => {
    const lock = new KeyedLock();

    const release = await lock.acquire('cust-1::TRUCK-1', 100);
    expect(lock.isHeld('cust-1::TRUCK-1')).toBe(true);
    expect(lock.isHeld('cust-1::TRUCK-2')).toBe(false);

    release();
    expect(lock.isHeld('cust-1::TRUCK-1')).toBe(false);
  });

  it('hands the key to waiters in arrival order', async () => {
    const lock = new KeyedLock();
    const order: string[] = [];

    const releaseFirst = await lock.acquire('unit', 1000);
    const second = lock.acquire('unit', 1000).then((release) => {
      order.push('second');
      release();
    });
    const third = lock.acquire('unit', 1000).then((release) => {
      order.push('third');
      release();
    });

    order.push('first');
    releaseFirst();
    await Promise.all([second, third]);

    expect(order).toEqual(['first', 'second', 'third']);
    expect(lock.isHeld('unit')).toBe(false);
  });

  it('fails a waiter with a retryable ConcurrencyError after the timeout', async () => {
    const lock = new KeyedLock();
    const release = await lock.acquire('unit', 1000);

    const error = await lock.acquire('unit', 20).catch((caught: unknown) => caught);
    expect(error).toBeInstanceOf(ConcurrencyError);
    expect(error instanceof ConcurrencyError && error.retryable).toBe(true);

    release();
    expect(lock.isHeld('unit')).toBe(false);
  });

  it('ignores a second call to the same release function', async () => {
    const lock = new KeyedLock();
    const releaseFirst = await lock.acquire('unit', 1000);
    const next = lock.acquire('unit', 1000);

    releaseFirst();
    const releaseSecond = await next;
    releaseFirst();

    expect(lock.isHeld('unit')).toBe(true);
    releaseSecond();
    expect(lock.isHeld('unit')).toBe(false);
  });
});
