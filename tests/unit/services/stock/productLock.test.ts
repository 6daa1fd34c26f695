import { setTimeout as sleep } from 'timers/promises';
import { describe, it, expect } from 'vitest';
import { KeyedMutex, RedisProductLock } from '../../../../src/services/stock/productLock';
import { ConcurrentReservationConflictError } from '../../../../src/utils/errors';
import { FakeLockClient } from '../../../fixtures/stock';

async function runPair(lock: { withLock<T>(key: string, fn: () => Promise<T>): Promise<T> }, keys: [string, string]) {
  const order: string[] = [];
  await Promise.all([
    lock.withLock(keys[0], async () => {
      order.push('a:start');
      await sleep(15);
      order.push('a:end');
    }),
    lock.withLock(keys[1], async () => {
      order.push('b:start');
      order.push('b:end');
    }),
  ]);
  return order;
}

describe('KeyedMutex', () => {
  it('runs callers for the same key one after another', async () => {
    const mutex = new KeyedMutex();
    expect(await runPair(mutex, ['p1', 'p1'])).toEqual(['a:start', 'a:end', 'b:start', 'b:end']);
    expect(mutex.pendingKeys).toBe(0);
  });

  it('does not block other keys', async () => {
    expect(await runPair(new KeyedMutex(), ['p1', 'p2'])).toEqual(['a:start', 'b:start', 'b:end', 'a:end']);
  });

  it('releases the key when the callback throws', async () => {
    const mutex = new KeyedMutex();
    await expect(mutex.withLock('p1', async () => Promise.reject(new Error('boom')))).rejects.toThrow('boom');
    expect(await mutex.withLock('p1', async () => 'next')).toBe('next');
  });
});

describe('RedisProductLock', () => {
  it('serializes callers through the shared key', async () => {
    const client = new FakeLockClient();
    const lock = new RedisProductLock({ ttlMs: 1000, retryDelayMs: 1, client });

    expect(await runPair(lock, ['p1', 'p1'])).toEqual(['a:start', 'a:end', 'b:start', 'b:end']);
    expect(client.store.size).toBe(0);
  });

  it('gives up with a retryable conflict when the lock stays taken', async () => {
    const client = new FakeLockClient();
    client.store.set('stock:lock:p1', 'another-instance');
    const lock = new RedisProductLock({ ttlMs: 1000, waitMs: 0, client });

    const err = await lock.withLock('p1', async () => 'never').catch((e: unknown) => e);
    expect(err).toBeInstanceOf(ConcurrentReservationConflictError);
    expect(err instanceof ConcurrentReservationConflictError && err.retryable).toBe(true);
    expect(client.store.get('stock:lock:p1')).toBe('another-instance');
  });

  it('releases the key when the callback throws', async () => {
    const client = new FakeLockClient();
    const lock = new RedisProductLock({ ttlMs: 1000, client });

    await expect(lock.withLock('p1', async () => Promise.reject(new Error('boom')))).rejects.toThrow('boom');
    expect(client.store.size).toBe(0);
  });

  it('returns the result when the release fails', async () => {
    const client = new FakeLockClient();
    client.eval = async () => Promise.reject(new Error('connection lost'));
    const lock = new RedisProductLock({ ttlMs: 1000, client });

    expect(await lock.withLock('p1', async () => 42)).toBe(42);
  });
});
