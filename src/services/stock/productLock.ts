import { randomUUID } from 'crypto';
import { lockKeys, releaseLock, waitForLock, type LockClient } from '../../infrastructure/redis';
import { logger } from '../../infrastructure/logger';
import { ConcurrentReservationConflictError } from '../../utils/errors';

/** Serializes stock mutations per product. */
export interface ProductLock {
  withLock<T>(productId: string, fn: () => Promise<T>): Promise<T>;
}

/** In-process lock: callers for the same key run one after another, other keys are unaffected. */
export class KeyedMutex implements ProductLock {
  private readonly tails = new Map<string, Promise<void>>();

  async withLock<T>(key: string, fn: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    let release: () => void = () => undefined;
    const current = new Promise<void>((resolve) => {
      release = resolve;
    });
    const tail = previous.then(() => current);
    this.tails.set(key, tail);

    await previous;
    try {
      return await fn();
    } finally {
      release();
      if (this.tails.get(key) === tail) this.tails.delete(key);
    }
  }

  get pendingKeys(): number {
    return this.tails.size;
  }
}

/**
 * Cross-instance lock on Redis (SET NX PX + compare-and-delete release).
 * Gives up after `waitMs` with a retryable STOCK_CHANGED conflict.
 */
export class RedisProductLock implements ProductLock {
  private readonly ttlMs: number;
  private readonly waitMs: number;
  private readonly retryDelayMs: number;
  private readonly client?: LockClient;

  constructor(opts: { ttlMs: number; waitMs?: number; retryDelayMs?: number; client?: LockClient }) {
    this.ttlMs = opts.ttlMs;
    this.waitMs = opts.waitMs ?? opts.ttlMs;
    this.retryDelayMs = opts.retryDelayMs ?? 25;
    this.client = opts.client;
  }

  async withLock<T>(productId: string, fn: () => Promise<T>): Promise<T> {
    const key = lockKeys.stock(productId);
    const value = randomUUID();

    const acquired = await waitForLock({
      key,
      value,
      ttlMs: this.ttlMs,
      waitMs: this.waitMs,
      retryDelayMs: this.retryDelayMs,
      client: this.client,
    });
    if (!acquired) {
      throw new ConcurrentReservationConflictError({ productId, lotIds: [] });
    }

    try {
      return await fn();
    } finally {
      // An expired lock releases as a no-op
      await releaseLock({ key, value, client: this.client }).catch((err: unknown) => {
        logger.warn({ event: 'stock_lock.release_failed', productId, err }, '[StockLock] Release failed');
        return false;
      });
    }
  }
}
