import { randomUUID } from 'crypto';
import { subMinutes } from 'date-fns';
import type { MatchingConfig } from '../config/matching';
import { logger as defaultLogger, type Logger } from '../infrastructure/logger';
import type { LedgerEventRepository } from '../repositories/ledgerEventRepository';
import type { OrderLineRepository } from '../repositories/orderLineRepository';
import type { ResolutionRepository } from '../repositories/resolutionRepository';
import type { StockRepository } from '../repositories/stockRepository';
import {
  ConcurrentReservationConflictError,
  InsufficientStockError,
  InvalidQuantityError,
  InvalidStateError,
  NotFoundError,
  UnitMismatchError,
  ValidationError,
} from '../utils/errors';
import { parseMoneyLike } from '../utils/numberParsing';
import type { CatalogIndex } from './catalog/catalogIndex';
import type { CatalogIndexHolder } from './catalog/catalogIndexHolder';
import { parseDecimal, splitNumberWithSuffix } from './catalog/normalize';
import type { IndexedEntry } from './catalog/types';
import { areUnitsCompatible, canonicalizeUnit, convertQuantity, roundQuantity } from './catalog/unitCategory';
import type { AliasTable } from './matching/aliases';
import { generateCandidates } from './matching/candidateGenerator';
import { parseLine } from './matching/lineParser';
import { scoreCandidates } from './matching/matchScorer';
import { resolve } from './matching/resolutionPolicy';
import type { DecisionTier, MatchCandidate, ParsedLine, ResolutionResult } from './matching/types';
import type {
  ResolutionSource,
  ResolutionView,
  ResolvedOrderLine,
  StoredResolution,
  SuggestionView,
} from './orderLines/types';
import { priceLine } from './pricing/pricingResolver';
import type { PricingRuleStore } from './pricing/pricingRuleStore';
import { KeyedMutex } from './stock/productLock';
import type { ReservationManager } from './stock/reservationManager';
import { planFulfillment, toStockPosition } from './stock/stockAvailability';
import type { FulfillmentPlan, Reservation, StockPosition } from './stock/types';

// One retry after a version conflict, then the caller has to reselect
const MAX_RESERVE_ATTEMPTS = 2;

export type OrderLinePipelineDeps = {
  catalog: CatalogIndexHolder;
  aliases: AliasTable;
  matching: MatchingConfig;
  stockRepository: StockRepository;
  reservations: ReservationManager;
  pricingRules: PricingRuleStore;
  resolutions: ResolutionRepository;
  orderLines: OrderLineRepository;
  ledgerEvents: LedgerEventRepository;
  reservationTtlMinutes: number;
  resolutionTtlMinutes: number;
  ledgerEventRetentionMinutes: number;
  log?: Logger;
  now?: () => Date;
};

export type ResolveOptions = {
  autoConfirm?: boolean;
  customerSegment?: string;
};

export type InvoiceLineInput = {
  description: string;
  quantity?: number | string | null;
  unit?: string | null;
  unitPrice?: number | string | null;
};

export type ConfirmMatchInput = {
  parsedLineId: string;
  chosenProductId: string;
  customerSegment: string;
  quantity?: number;
  unit?: string;
  allowProcurement?: boolean;
};

/** Pack size of a container named in the entry's descriptors: "bag" on "Carrots (10kg bag)" -> 10 (kg). */
function packSize(entry: IndexedEntry, container: string): number | null {
  if (!entry.descriptorSet.has(container)) return null;
  for (const descriptor of entry.baseDescriptors) {
    const fragment = splitNumberWithSuffix(descriptor);
    if (!fragment) continue;
    const size = convertQuantity(fragment.value, fragment.suffix, entry.unit);
    if (size !== null) return size;
  }
  return null;
}

/**
 * Expresses the requested quantity in the product's unit.
 *
 * Convertible units convert (g -> kg), compatible count units carry over (piece -> each) and a container
 * named in the product's packaging multiplies by its size. A measure or defaulted quantity that still
 * does not fit reads as one of the product's unit; an explicit one raises UnitMismatchError.
 */
export function toProductQuantity(params: {
  parsed: ParsedLine;
  entry: IndexedEntry;
  quantity?: number;
  unit?: string;
}): { quantity: number; requestedQuantity: number; requestedUnit: string } {
  const { parsed, entry } = params;
  const explicitOverride = params.quantity !== undefined || params.unit !== undefined;
  const requestedQuantity = params.quantity ?? parsed.quantity;
  const requestedUnit = canonicalizeUnit(params.unit) ?? parsed.unitToken ?? entry.unit;

  if (!Number.isFinite(requestedQuantity) || requestedQuantity <= 0) {
    throw new InvalidQuantityError({ quantity: requestedQuantity, unit: requestedUnit });
  }

  const result = (quantity: number) => ({ quantity: roundQuantity(quantity), requestedQuantity, requestedUnit });

  const converted = convertQuantity(requestedQuantity, requestedUnit, entry.unit);
  if (converted !== null) return result(converted);
  if (areUnitsCompatible(requestedUnit, entry.unit)) return result(requestedQuantity);

  const size = packSize(entry, requestedUnit);
  if (size !== null) return result(requestedQuantity * size);

  if (!explicitOverride && parsed.quantitySource !== 'explicit') return result(1);

  throw new UnitMismatchError({ productId: entry.id, requestedUnit, productUnit: entry.unit });
}

function candidateFor(result: ResolutionResult, productId: string): MatchCandidate | null {
  if (result.bestMatch?.catalogEntryId === productId) return result.bestMatch;
  return result.suggestions.find((s) => s.catalogEntryId === productId) ?? null;
}

export function createOrderLinePipelineService(deps: OrderLinePipelineDeps) {
  const log = deps.log ?? defaultLogger;
  const now = deps.now ?? (() => new Date());
  // A parsed line is consumed at most once
  const confirmations = new KeyedMutex();

  const canAutoApply = (tier: DecisionTier) =>
    tier === 'auto' || (tier === 'top_suggestion' && deps.matching.allowTopSuggestionAutoApply);

  async function positionsFor(index: CatalogIndex, productIds: string[]): Promise<Map<string, StockPosition>> {
    const positions = new Map<string, StockPosition>();
    for (const productId of new Set(productIds)) {
      const entry = index.get(productId);
      if (!entry) continue;
      positions.set(productId, toStockPosition(productId, entry.unit, await deps.stockRepository.listLots(productId)));
    }
    return positions;
  }

  function toView(candidate: MatchCandidate, positions: Map<string, StockPosition>): SuggestionView {
    const position = positions.get(candidate.catalogEntryId);
    const availableQuantity = position?.availableQuantity ?? 0;
    return {
      ...candidate,
      availableQuantity,
      stockUnit: position?.unit ?? '',
      outOfStock: availableQuantity <= 0,
    };
  }

  async function reserveWithRetry(params: {
    entry: IndexedEntry;
    quantity: number;
    orderLineId: string;
    allowProcurement: boolean;
  }): Promise<{ plan: FulfillmentPlan; reservation: Reservation }> {
    const { entry, quantity, orderLineId } = params;

    for (let attempt = 1; ; attempt += 1) {
      const lots = await deps.stockRepository.listLots(entry.id);
      const plan = planFulfillment({ productId: entry.id, quantity, unit: entry.unit, lots });

      if (plan.shortfall > 0 && !params.allowProcurement) {
        throw new InsufficientStockError({
          productId: entry.id,
          requested: plan.requestedQuantity,
          reservable: plan.reservableQuantity,
          unit: entry.unit,
        });
      }

      try {
        return { plan, reservation: await deps.reservations.reserve(plan, { orderLineId }) };
      } catch (err) {
        if (!(err instanceof ConcurrentReservationConflictError) || attempt >= MAX_RESERVE_ATTEMPTS) throw err;
        log.warn(
          { event: 'order_line.reservation_conflict', productId: entry.id, orderLineId, attempt, lotIds: err.details?.lotIds },
          '[OrderLine] Stock changed during reservation; retrying with fresh lots'
        );
      }
    }
  }

  async function runResolution(
    index: CatalogIndex,
    parsed: ParsedLine,
    meta: { source: ResolutionSource; invoiceUnitPrice: number | null },
    opts: ResolveOptions
  ): Promise<ResolutionView> {
    if (opts.autoConfirm && !opts.customerSegment) {
      throw new ValidationError('customerSegment is required when autoConfirm is set');
    }

    const entries = generateCandidates(parsed, index, deps.aliases, deps.matching.weights.phoneticMinSimilarity);
    const result = resolve(parsed, scoreCandidates(parsed, entries, deps.matching.weights, deps.aliases), deps.matching);

    const stored: StoredResolution = {
      id: randomUUID(),
      source: meta.source,
      result,
      invoiceUnitPrice: meta.invoiceUnitPrice,
      createdAt: now(),
      consumption: null,
    };
    await deps.resolutions.save(stored);

    log.info(
      {
        event: 'order_line.resolved',
        parsedLineId: stored.id,
        source: meta.source,
        decisionTier: result.decisionTier,
        candidates: entries.length,
        suggestions: result.suggestions.length,
        ...(result.decisionTier === 'auto' && result.bestMatch
          ? {
              bestMatch: result.bestMatch.catalogEntryId,
              totalScore: result.bestMatch.totalScore,
              strategyScores: result.bestMatch.strategyScores,
              matchedReasons: result.bestMatch.matchedReasons,
            }
          : {}),
      },
      `[OrderLine] Resolved (${result.decisionTier})`
    );

    const positions = await positionsFor(index, [
      ...(result.bestMatch ? [result.bestMatch.catalogEntryId] : []),
      ...result.suggestions.map((s) => s.catalogEntryId),
    ]);

    let resolvedLine: ResolvedOrderLine | null = null;
    if (opts.autoConfirm && opts.customerSegment && result.bestMatch && canAutoApply(result.decisionTier)) {
      resolvedLine = await confirm(
        { parsedLineId: stored.id, chosenProductId: result.bestMatch.catalogEntryId, customerSegment: opts.customerSegment },
        'auto'
      );
    }

    return {
      parsedLineId: stored.id,
      parsedLine: parsed,
      decisionTier: result.decisionTier,
      requiresConfirmation: result.requiresConfirmation && resolvedLine === null,
      bestMatch: result.bestMatch ? toView(result.bestMatch, positions) : null,
      suggestions: result.suggestions.map((s) => toView(s, positions)),
      resolvedLine,
    };
  }

  async function confirm(input: ConfirmMatchInput, decidedBy: 'auto' | 'human'): Promise<ResolvedOrderLine> {
    return confirmations.withLock(input.parsedLineId, async () => {
      const stored = await deps.resolutions.findById(input.parsedLineId);
      if (!stored) throw new NotFoundError('Parsed line', input.parsedLineId);
      if (stored.consumption) {
        throw new InvalidStateError('Parsed line has already been confirmed', {
          parsedLineId: input.parsedLineId,
          orderLineId: stored.consumption.orderLineId,
        });
      }

      const entry = deps.catalog.current().get(input.chosenProductId);
      if (!entry) throw new NotFoundError('Product', input.chosenProductId);

      const { quantity, requestedQuantity } = toProductQuantity({
        parsed: stored.result.parsedLine,
        entry,
        quantity: input.quantity,
        unit: input.unit,
      });

      // An invoice price is per invoice unit; the cost basis is per product unit
      const invoicePrice = stored.invoiceUnitPrice;
      const costBasis = invoicePrice !== null ? (invoicePrice * requestedQuantity) / quantity : entry.basePrice;
      const recentPriceChangePct =
        invoicePrice !== null && entry.basePrice > 0 ? ((costBasis - entry.basePrice) / entry.basePrice) * 100 : null;

      // Pricing is resolved before any stock moves: a misconfigured segment leaves stock untouched
      const context = await deps.pricingRules.resolveContext({
        customerSegment: input.customerSegment,
        entry,
        at: now(),
        recentPriceChangePct,
      });
      const { unitPrice, lineTotal } = priceLine(costBasis, quantity, context);

      const orderLineId = randomUUID();
      const { plan, reservation } = await reserveWithRetry({
        entry,
        quantity,
        orderLineId,
        allowProcurement: input.allowProcurement ?? true,
      });

      const at = now();
      const line: ResolvedOrderLine = {
        id: orderLineId,
        parsedLineId: stored.id,
        productId: entry.id,
        canonicalName: entry.canonicalName,
        quantity,
        unit: entry.unit,
        unitPrice,
        lineTotal,
        confidence: candidateFor(stored.result, entry.id)?.totalScore ?? 0,
        decisionTier: stored.result.decisionTier,
        fulfillmentMethod: plan.method,
        reservationId: reservation.id,
        shortfall: plan.shortfall,
        allocations: reservation.allocations,
        customerSegment: input.customerSegment,
        status: 'reserved',
        createdAt: at,
        updatedAt: at,
      };
      await deps.orderLines.save(line);
      await deps.resolutions.markConsumed(stored.id, {
        orderLineId,
        chosenProductId: entry.id,
        decidedBy,
        consumedAt: at,
      });

      log.info(
        {
          event: 'order_line.confirmed',
          orderLineId,
          parsedLineId: stored.id,
          productId: entry.id,
          decidedBy,
          quantity,
          unit: entry.unit,
          unitPrice,
          lineTotal,
          fulfillmentMethod: plan.method,
          shortfall: plan.shortfall,
        },
        '[OrderLine] Confirmed'
      );
      return line;
    });
  }

  async function loadLine(lineId: string): Promise<ResolvedOrderLine> {
    const line = await deps.orderLines.findById(lineId);
    if (!line) throw new NotFoundError('Order line', lineId);
    return line;
  }

  return {
    async resolveLine(rawText: string, opts: ResolveOptions = {}): Promise<ResolutionView> {
      const index = deps.catalog.current();
      return runResolution(index, parseLine(rawText, index.unitVocabulary()), { source: 'text', invoiceUnitPrice: null }, opts);
    },

    /**
     * OCR invoice line: the description is parsed like a text line, then the OCR quantity / unit columns
     * override what the parser found and the unit price becomes the cost basis on confirmation.
     */
    async resolveInvoiceLine(input: InvoiceLineInput, opts: ResolveOptions = {}): Promise<ResolutionView> {
      const index = deps.catalog.current();
      const parsed = parseLine(input.description, index.unitVocabulary());

      const quantity =
        typeof input.quantity === 'number'
          ? input.quantity
          : typeof input.quantity === 'string'
            ? parseDecimal(input.quantity.trim())
            : null;
      const unit = canonicalizeUnit(input.unit);

      let invoiceUnitPrice: number | null = null;
      if (input.unitPrice !== undefined && input.unitPrice !== null) {
        const money = parseMoneyLike(input.unitPrice, 'UNIT_PRICE');
        if (money.value === null || money.value < 0) {
          throw new ValidationError(`Unreadable unit price: ${String(input.unitPrice)}`, { reason: money.reason });
        }
        invoiceUnitPrice = money.value;
      }

      const merged = Object.freeze<ParsedLine>({
        ...parsed,
        quantity: quantity !== null && quantity >= 0 ? quantity : parsed.quantity,
        quantitySource: quantity !== null && quantity >= 0 ? 'explicit' : parsed.quantitySource,
        unitToken: unit ?? parsed.unitToken,
      });

      return runResolution(index, merged, { source: 'invoice', invoiceUnitPrice }, opts);
    },

    /** Reserve stock and price the chosen product. The only entry point that mutates stock for a line. */
    async confirmMatch(input: ConfirmMatchInput): Promise<ResolvedOrderLine> {
      return confirm(input, 'human');
    },

    async commitLine(lineId: string): Promise<ResolvedOrderLine> {
      const line = await loadLine(lineId);
      if (line.status === 'committed') return line;
      if (line.status === 'voided') {
        throw new InvalidStateError('Cannot commit a voided order line', { orderLineId: lineId });
      }

      await deps.reservations.sell(line.reservationId);
      const committed: ResolvedOrderLine = { ...line, status: 'committed', updatedAt: now() };
      await deps.orderLines.save(committed);
      log.info({ event: 'order_line.committed', orderLineId: lineId, productId: line.productId }, '[OrderLine] Committed');
      return committed;
    },

    /** Voids the line and returns its reserved stock. A committed line has left the ledger and cannot be cancelled. */
    async cancelLine(lineId: string): Promise<ResolvedOrderLine> {
      const line = await loadLine(lineId);
      if (line.status === 'voided') return line;
      if (line.status === 'committed') {
        throw new InvalidStateError('Cannot cancel a committed order line', { orderLineId: lineId });
      }

      await deps.reservations.release(line.reservationId, 'cancelled');
      const voided: ResolvedOrderLine = { ...line, status: 'voided', updatedAt: now() };
      await deps.orderLines.save(voided);
      log.info({ event: 'order_line.voided', orderLineId: lineId, productId: line.productId }, '[OrderLine] Voided');
      return voided;
    },

    async getStockPosition(productId: string): Promise<StockPosition> {
      const entry = deps.catalog.current().get(productId);
      if (!entry) throw new NotFoundError('Product', productId);
      return toStockPosition(productId, entry.unit, await deps.stockRepository.listLots(productId));
    },

    /** Releases reservations older than the TTL and voids their lines. Returns how many were released. */
    async expireStaleReservations(): Promise<number> {
      const cutoff = subMinutes(now(), deps.reservationTtlMinutes);
      const released = await deps.reservations.expireStale(cutoff);

      for (const reservation of released) {
        const line = await deps.orderLines.findByReservationId(reservation.id);
        if (line && line.status === 'reserved') {
          await deps.orderLines.save({ ...line, status: 'voided', updatedAt: now() });
        }
      }
      return released.length;
    },

    /** Drops unconfirmed resolution results and ledger events past their retention. */
    async pruneExpiredRecords(): Promise<{ resolutions: number; ledgerEvents: number }> {
      const at = now();
      const pruned = {
        resolutions: await deps.resolutions.deleteUnconsumedBefore(subMinutes(at, deps.resolutionTtlMinutes)),
        ledgerEvents: await deps.ledgerEvents.deleteBefore(subMinutes(at, deps.ledgerEventRetentionMinutes)),
      };
      if (pruned.resolutions > 0 || pruned.ledgerEvents > 0) {
        log.info({ event: 'order_line.records_pruned', ...pruned }, '[OrderLines] Pruned expired records');
      }
      return pruned;
    },
  };
}

export type OrderLinePipelineService = ReturnType<typeof createOrderLinePipelineService>;
