import z from 'zod';
import dotenv from 'dotenv';

if (process.env.NODE_ENV === 'development') {
  dotenv.config({ path: '.env.local' });
} else {
  dotenv.config();
}

export const envSchema = z.object({
  PORT: z.coerce.number().default(4001),
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  FRONTEND_URL: z.string().url().optional(),

  // Infrastructure
  REDIS_URL: z.string().optional(),
  REDIS_HOST: z.string().optional(),
  REDIS_PORT: z.coerce.number().optional(),
  REDIS_PASSWORD: z.string().optional(),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('info'),
  ENABLE_RATE_LIMIT: z.string().optional().default('true'),
  CRON_ENABLED: z.string().optional().default('true'),
  SENTRY_DSN: z.string().url().optional(),

  // Catalog snapshot rebuilds
  CATALOG_REFRESH_CRON: z.string().optional().default('*/5 * * * *'),
  // JSON file with catalog entries, stock lots and pricing rules for the in-memory repositories
  SEED_DATA_PATH: z.string().optional(),

  // Matching weights / thresholds override (JSON file, see config/matching.ts)
  MATCHING_CONFIG_PATH: z.string().optional(),

  // Stock reservations
  // - memory: in-process keyed mutex (single instance)
  // - redis: SET NX PX lock per product (several instances sharing one ledger)
  STOCK_LOCK_BACKEND: z.enum(['memory', 'redis']).default('memory'),
  STOCK_LOCK_TTL_MS: z.coerce.number().int().positive().default(5000),
  STOCK_SPLIT_PARTIAL_LOTS: z.string().optional().default('false'),
  RESERVATION_TTL_MINUTES: z.coerce.number().int().positive().default(120),
  RESERVATION_SWEEP_CRON: z.string().optional().default('*/10 * * * *'),

  // Retention, applied by the reservation sweep
  RESOLUTION_TTL_MINUTES: z.coerce.number().int().positive().default(1440),
  LEDGER_EVENT_RETENTION_MINUTES: z.coerce.number().int().positive().default(10080),
});

export type AppConfig = z.infer<typeof envSchema>;

const parsed = envSchema.safeParse(process.env);

if (!parsed.success) {
  console.error('❌ Invalid environment variables:', parsed.error.format());
  process.exit(1);
}

const baseConfig = parsed.data;

// Conditional validation:
// - A shared stock lock needs somewhere to live.
if (baseConfig.STOCK_LOCK_BACKEND === 'redis' && !baseConfig.REDIS_URL && !baseConfig.REDIS_HOST) {
  console.error('❌ Invalid environment variables: REDIS_URL or REDIS_HOST is required when STOCK_LOCK_BACKEND=redis');
  process.exit(1);
}

export const config = baseConfig;
