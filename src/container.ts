import { config } from './config/env';
import { loadMatchingConfig, type MatchingConfig } from './config/matching';
import { logger, type Logger } from './infrastructure/logger';
import { createInMemoryCatalogRepository, type CatalogRepository } from './repositories/catalogRepository';
import { createInMemoryLedgerEventRepository, type LedgerEventRepository } from './repositories/ledgerEventRepository';
import { createInMemoryOrderLineRepository, type OrderLineRepository } from './repositories/orderLineRepository';
import { createInMemoryPricingRuleRepository, type PricingRuleRepository } from './repositories/pricingRuleRepository';
import { createInMemoryResolutionRepository, type ResolutionRepository } from './repositories/resolutionRepository';
import { loadSeedFile } from './repositories/seed';
import { createInMemoryStockRepository, type StockRepository } from './repositories/stockRepository';
import { CatalogIndexHolder } from './services/catalog/catalogIndexHolder';
import { AliasTable } from './services/matching/aliases';
import { createOrderLinePipelineService, type OrderLinePipelineService } from './services/OrderLinePipelineService';
import { PricingRuleStore } from './services/pricing/pricingRuleStore';
import { KeyedMutex, RedisProductLock, type ProductLock } from './services/stock/productLock';
import { ReservationManager } from './services/stock/reservationManager';

export type AppDependencies = {
  catalogRepository: CatalogRepository;
  stockRepository: StockRepository;
  pricingRuleRepository: PricingRuleRepository;
  ledgerEvents: LedgerEventRepository;
  resolutions: ResolutionRepository;
  orderLines: OrderLineRepository;
  matching: MatchingConfig;
  aliases: AliasTable;
  lock: ProductLock;
  splitPartialLots: boolean;
  reservationTtlMinutes: number;
  resolutionTtlMinutes: number;
  ledgerEventRetentionMinutes: number;
  log: Logger;
  now: () => Date;
};

export type AppServices = {
  catalog: CatalogIndexHolder;
  pipeline: OrderLinePipelineService;
  reservations: ReservationManager;
  deps: AppDependencies;
};

function defaultLock(): ProductLock {
  return config.STOCK_LOCK_BACKEND === 'redis'
    ? new RedisProductLock({ ttlMs: config.STOCK_LOCK_TTL_MS })
    : new KeyedMutex();
}

/**
 * Wires repositories and services. Anything not overridden comes from configuration: in-memory
 * repositories seeded from SEED_DATA_PATH, matching weights from MATCHING_CONFIG_PATH.
 */
export function createServices(overrides: Partial<AppDependencies> = {}): AppServices {
  const needsSeed =
    !overrides.catalogRepository || !overrides.stockRepository || !overrides.pricingRuleRepository;
  const seed = needsSeed ? loadSeedFile(config.SEED_DATA_PATH) : null;
  const now = overrides.now ?? (() => new Date());

  const deps: AppDependencies = {
    catalogRepository: overrides.catalogRepository ?? createInMemoryCatalogRepository(seed?.catalog),
    stockRepository: overrides.stockRepository ?? createInMemoryStockRepository(seed?.stockLots),
    pricingRuleRepository: overrides.pricingRuleRepository ?? createInMemoryPricingRuleRepository(seed?.pricingRules),
    ledgerEvents: overrides.ledgerEvents ?? createInMemoryLedgerEventRepository(now),
    resolutions: overrides.resolutions ?? createInMemoryResolutionRepository(),
    orderLines: overrides.orderLines ?? createInMemoryOrderLineRepository(),
    matching: overrides.matching ?? loadMatchingConfig(config.MATCHING_CONFIG_PATH),
    aliases: overrides.aliases ?? AliasTable.fromDefaults(),
    lock: overrides.lock ?? defaultLock(),
    splitPartialLots: overrides.splitPartialLots ?? config.STOCK_SPLIT_PARTIAL_LOTS === 'true',
    reservationTtlMinutes: overrides.reservationTtlMinutes ?? config.RESERVATION_TTL_MINUTES,
    resolutionTtlMinutes: overrides.resolutionTtlMinutes ?? config.RESOLUTION_TTL_MINUTES,
    ledgerEventRetentionMinutes: overrides.ledgerEventRetentionMinutes ?? config.LEDGER_EVENT_RETENTION_MINUTES,
    log: overrides.log ?? logger,
    now,
  };

  const catalog = new CatalogIndexHolder(deps.catalogRepository, undefined, deps.log);
  const reservations = new ReservationManager({
    stockRepository: deps.stockRepository,
    ledgerEvents: deps.ledgerEvents,
    lock: deps.lock,
    splitPartialLots: deps.splitPartialLots,
    now: deps.now,
    log: deps.log,
  });

  const pipeline = createOrderLinePipelineService({
    catalog,
    aliases: deps.aliases,
    matching: deps.matching,
    stockRepository: deps.stockRepository,
    reservations,
    pricingRules: new PricingRuleStore(deps.pricingRuleRepository),
    resolutions: deps.resolutions,
    orderLines: deps.orderLines,
    ledgerEvents: deps.ledgerEvents,
    reservationTtlMinutes: deps.reservationTtlMinutes,
    resolutionTtlMinutes: deps.resolutionTtlMinutes,
    ledgerEventRetentionMinutes: deps.ledgerEventRetentionMinutes,
    log: deps.log,
    now: deps.now,
  });

  return { catalog, pipeline, reservations, deps };
}
