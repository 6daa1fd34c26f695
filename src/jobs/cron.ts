import cron, { type ScheduledTask } from 'node-cron';
import os from 'os';
import { config } from '../config/env';
import { logger } from '../infrastructure/logger';
import { acquireLock, isRedisConfigured, lockKeys, releaseLock } from '../infrastructure/redis';
import type { AppServices } from '../container';

export function initCronJobs(services: AppServices): { stop: () => void } {
  logger.info({ event: 'cron.init' }, '[Cron] Initializing cron jobs...');

  // Mutex guards to prevent overlapping runs on this instance
  let isRefreshingCatalog = false;
  let isSweepingReservations = false;

  const instanceId = process.env.INSTANCE_ID || os.hostname();
  const schedules: ScheduledTask[] = [];

  // With several instances on one Redis, only one of them runs a given tick
  const withRedisLock = async (jobName: string, ttlMs: number, fn: () => Promise<void>) => {
    if (!isRedisConfigured()) {
      await fn();
      return;
    }

    const lockKey = lockKeys.cronJob(jobName);
    const lockValue = `${instanceId}:${Date.now()}`;
    const acquired = await acquireLock({ key: lockKey, value: lockValue, ttlMs }).catch((err: unknown) => {
      logger.warn({ event: 'cron.lock_failed', jobName, err }, '[Cron] Could not reach Redis for job lock');
      return false;
    });
    if (!acquired) return;

    const start = Date.now();
    try {
      await fn();
    } finally {
      // The lock expires on its own if this release does not reach Redis
      await releaseLock({ key: lockKey, value: lockValue }).catch((err: unknown) => {
        logger.warn({ event: 'cron.unlock_failed', jobName, err }, '[Cron] Could not release job lock');
        return false;
      });
      logger.debug({ event: 'cron.job_done', jobName, durationMs: Date.now() - start, instanceId }, '[Cron] Job done');
    }
  };

  // Catalog edits become visible to matching on the next snapshot
  schedules.push(
    cron.schedule(config.CATALOG_REFRESH_CRON, async () => {
      if (isRefreshingCatalog) return;
      isRefreshingCatalog = true;
      try {
        // Every instance holds its own snapshot, so no cross-instance lock here
        await services.catalog.rebuild();
      } catch (err) {
        // Logged by the holder; the previous snapshot stays in service
        logger.warn({ event: 'cron.catalog_refresh_failed', err }, '[Cron] Catalog refresh failed');
      } finally {
        isRefreshingCatalog = false;
      }
    })
  );

  schedules.push(
    cron.schedule(config.RESERVATION_SWEEP_CRON, async () => {
      if (isSweepingReservations) return;
      isSweepingReservations = true;
      try {
        await withRedisLock('expireStaleReservations', 5 * 60 * 1000, async () => {
          const released = await services.pipeline.expireStaleReservations();
          if (released > 0) {
            logger.info({ event: 'cron.reservations_expired', released }, '[Cron] Released stale reservations');
          }
          // Unconfirmed resolutions and forwarded ledger events would otherwise accumulate
          await services.pipeline.pruneExpiredRecords();
        });
      } catch (err) {
        logger.error({ event: 'cron.reservation_sweep_failed', err }, '[Cron] Reservation sweep failed');
      } finally {
        isSweepingReservations = false;
      }
    })
  );

  return {
    stop: () => {
      for (const task of schedules) task.stop();
    },
  };
}
