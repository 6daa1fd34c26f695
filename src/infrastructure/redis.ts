import Redis from 'ioredis';
import { setTimeout as sleep } from 'timers/promises';
import { config } from '../config/env';

let sharedClient: Redis | null = null;

export function isRedisConfigured(): boolean {
  return Boolean(config.REDIS_URL || config.REDIS_HOST);
}

/**
 * Shared connection for rate limiting, cron job locks and the Redis stock lock backend.
 * REDIS_URL wins over the host/port/password triple.
 */
export function getRedisClient(): Redis {
  if (!sharedClient) {
    sharedClient = config.REDIS_URL
      ? new Redis(config.REDIS_URL)
      : new Redis({
          host: config.REDIS_HOST || 'localhost',
          port: config.REDIS_PORT || 6379,
          password: config.REDIS_PASSWORD,
        });
  }
  return sharedClient;
}

export async function checkRedisReachable(
  client: Pick<Redis, 'ping'>,
  opts: { timeoutMs: number; attempts: number }
): Promise<{ ok: true } | { ok: false; error: string }> {
  let lastError = 'no attempt made';

  for (let attempt = 0; attempt < opts.attempts; attempt += 1) {
    try {
      const reply = await Promise.race([
        client.ping(),
        sleep(opts.timeoutMs).then(() => {
          throw new Error(`redis ping timeout after ${opts.timeoutMs}ms`);
        }),
      ]);
      if (reply === 'PONG') return { ok: true };
      lastError = `unexpected ping reply: ${String(reply)}`;
    } catch (err) {
      lastError = err instanceof Error ? err.message : String(err);
    }
  }

  return { ok: false, error: lastError };
}

/** Key layout shared by every lock holder, so instances agree on names. */
export const lockKeys = {
  stock: (productId: string) => `stock:lock:${productId}`,
  cronJob: (jobName: string) => `cron:${jobName}`,
};

// Deletes the key only while it still holds our token
const RELEASE_LOCK_LUA = `
if redis.call("GET", KEYS[1]) == ARGV[1] then
  return redis.call("DEL", KEYS[1])
else
  return 0
end
`;

/** The subset of the ioredis client the lock helpers use. */
export interface LockClient {
  set(key: string, value: string, px: 'PX', ttlMs: number, nx: 'NX'): Promise<string | null>;
  eval(script: string, numKeys: number, ...args: string[]): Promise<unknown>;
}

type LockParams = { key: string; value: string; client?: LockClient };

export async function acquireLock(params: LockParams & { ttlMs: number }): Promise<boolean> {
  const client = params.client ?? getRedisClient();
  return (await client.set(params.key, params.value, 'PX', params.ttlMs, 'NX')) === 'OK';
}

/** Polls until the lock is ours or `waitMs` has passed. */
export async function waitForLock(
  params: LockParams & { ttlMs: number; waitMs: number; retryDelayMs: number }
): Promise<boolean> {
  const deadline = Date.now() + params.waitMs;
  for (;;) {
    if (await acquireLock(params)) return true;
    if (Date.now() >= deadline) return false;
    await sleep(params.retryDelayMs);
  }
}

export async function releaseLock(params: LockParams): Promise<boolean> {
  const client = params.client ?? getRedisClient();
  return Number(await client.eval(RELEASE_LOCK_LUA, 1, params.key, params.value)) === 1;
}

export async function closeRedisClient(): Promise<void> {
  const client = sharedClient;
  sharedClient = null;
  if (client) await client.quit();
}
