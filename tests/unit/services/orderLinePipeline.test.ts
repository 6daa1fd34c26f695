import { addMinutes } from 'date-fns';
import { beforeEach, describe, it, expect } from 'vitest';
import type { AppServices } from '../../../src/container';
import { createInMemoryStockRepository, type StockRepository } from '../../../src/repositories/stockRepository';
import {
  ConcurrentReservationConflictError,
  InsufficientStockError,
  InvalidPricingContextError,
  InvalidQuantityError,
  InvalidStateError,
  NotFoundError,
  UnitMismatchError,
  ValidationError,
} from '../../../src/utils/errors';
import { NOW, createTestServices, stockLots } from '../../fixtures/services';

/** Reports a version conflict for the first `failures` writes. */
function conflictingStock(inner: StockRepository, failures: number): StockRepository {
  let remaining = failures;
  return {
    ...inner,
    async applyLotUpdates(updates) {
      if (remaining > 0) {
        remaining -= 1;
        return false;
      }
      return inner.applyLotUpdates(updates);
    },
  };
}

describe('OrderLinePipelineService', () => {
  let services: AppServices;
  let clock: Date;

  const position = (productId: string) => services.pipeline.getStockPosition(productId);

  beforeEach(async () => {
    clock = NOW;
    services = createTestServices({ now: () => clock });
    await services.catalog.rebuild();
  });

  describe('resolveLine', () => {
    it('resolves without touching stock unless asked to confirm', async () => {
      const view = await services.pipeline.resolveLine('1 * packet rosemary 200g');

      expect(view.decisionTier).toBe('auto');
      expect(view.requiresConfirmation).toBe(false);
      expect(view.resolvedLine).toBeNull();
      expect(view.bestMatch).toMatchObject({
        catalogEntryId: 'rosemary-200g',
        totalScore: 75,
        availableQuantity: 12,
        stockUnit: 'packet',
        outOfStock: false,
      });
      expect(await position('rosemary-200g')).toMatchObject({ availableQuantity: 12, reservedQuantity: 0 });
    });

    it('flags out-of-stock suggestions without hiding them', async () => {
      const view = await services.pipeline.resolveLine('brocoli');
      expect(view.suggestions).toHaveLength(1);
      expect(view.suggestions[0]).toMatchObject({ catalogEntryId: 'broccoli', availableQuantity: 0, outOfStock: true });
    });

    it('confirms an auto match straight away when asked', async () => {
      const view = await services.pipeline.resolveLine('1 * packet rosemary 200g', {
        autoConfirm: true,
        customerSegment: 'restaurant',
      });

      expect(view.requiresConfirmation).toBe(false);
      expect(view.resolvedLine).toMatchObject({
        productId: 'rosemary-200g',
        quantity: 1,
        unit: 'packet',
        unitPrice: 24.05,
        lineTotal: 24.05,
        confidence: 75,
        decisionTier: 'auto',
        fulfillmentMethod: 'exact_match',
        shortfall: 0,
        status: 'reserved',
      });
      expect(await position('rosemary-200g')).toMatchObject({ availableQuantity: 11, reservedQuantity: 1 });
    });

    it('converts a measured quantity to the product unit', async () => {
      const view = await services.pipeline.resolveLine('500g tomatoes', { autoConfirm: true, customerSegment: 'restaurant' });

      expect(view.bestMatch?.totalScore).toBe(55.5);
      expect(view.resolvedLine).toMatchObject({ quantity: 0.5, unit: 'kg', unitPrice: 27, lineTotal: 13.5, fulfillmentMethod: 'partial_use' });
    });

    it('leaves lower tiers for a person to confirm', async () => {
      const view = await services.pipeline.resolveLine('2x tomatoes', { autoConfirm: true, customerSegment: 'restaurant' });
      expect(view.decisionTier).toBe('top_suggestion');
      expect(view.resolvedLine).toBeNull();
      expect(view.requiresConfirmation).toBe(true);
    });

    it('requires a customer segment to auto-confirm', async () => {
      await expect(services.pipeline.resolveLine('2x tomatoes', { autoConfirm: true })).rejects.toBeInstanceOf(ValidationError);
    });
  });

  describe('confirmMatch', () => {
    it('prices and reserves a chosen suggestion', async () => {
      const view = await services.pipeline.resolveLine('tomatoe');
      const line = await services.pipeline.confirmMatch({
        parsedLineId: view.parsedLineId,
        chosenProductId: 'tomatoes',
        customerSegment: 'restaurant',
        quantity: 3,
        unit: 'kg',
      });

      expect(line).toMatchObject({
        productId: 'tomatoes',
        quantity: 3,
        unitPrice: 27,
        lineTotal: 81,
        confidence: 20,
        decisionTier: 'suggestion_list',
        fulfillmentMethod: 'combination',
        allocations: [
          { lotId: 'lot-a', quantity: 2, unit: 'kg' },
          { lotId: 'lot-b', quantity: 1, unit: 'kg' },
        ],
      });
      expect(await position('tomatoes')).toMatchObject({ availableQuantity: 4, reservedQuantity: 3 });

      const audit = await services.deps.resolutions.listConsumed();
      expect(audit.map((r) => r.consumption)).toEqual([
        { orderLineId: line.id, chosenProductId: 'tomatoes', decidedBy: 'human', consumedAt: NOW },
      ]);
    });

    it('multiplies a container by its pack size', async () => {
      const view = await services.pipeline.resolveLine('2 bags carrots');
      const line = await services.pipeline.confirmMatch({
        parsedLineId: view.parsedLineId,
        chosenProductId: 'carrots-10kg',
        customerSegment: 'restaurant',
      });

      expect(line).toMatchObject({ quantity: 20, unit: 'kg', unitPrice: 14.38, lineTotal: 287.6 });
    });

    it('reads a measure that does not fit a count product as one unit', async () => {
      const view = await services.pipeline.resolveLine('3kg rosemary');
      const line = await services.pipeline.confirmMatch({
        parsedLineId: view.parsedLineId,
        chosenProductId: 'rosemary-200g',
        customerSegment: 'restaurant',
      });
      expect(line.quantity).toBe(1);
    });

    it('rejects an explicit quantity in a unit the product cannot take', async () => {
      const view = await services.pipeline.resolveLine('2 bunch tomatoes');
      await expect(
        services.pipeline.confirmMatch({ parsedLineId: view.parsedLineId, chosenProductId: 'tomatoes', customerSegment: 'restaurant' })
      ).rejects.toBeInstanceOf(UnitMismatchError);
    });

    it('rejects a non-positive quantity', async () => {
      const view = await services.pipeline.resolveLine('tomatoes');
      await expect(
        services.pipeline.confirmMatch({
          parsedLineId: view.parsedLineId,
          chosenProductId: 'tomatoes',
          customerSegment: 'restaurant',
          quantity: 0,
        })
      ).rejects.toBeInstanceOf(InvalidQuantityError);
    });

    it('consumes a parsed line only once', async () => {
      const view = await services.pipeline.resolveLine('tomatoes');
      const input = { parsedLineId: view.parsedLineId, chosenProductId: 'tomatoes', customerSegment: 'restaurant' };

      const results = await Promise.allSettled([services.pipeline.confirmMatch(input), services.pipeline.confirmMatch(input)]);

      expect(results.filter((r) => r.status === 'fulfilled')).toHaveLength(1);
      const rejected = results.find((r): r is PromiseRejectedResult => r.status === 'rejected');
      expect(rejected?.reason).toBeInstanceOf(InvalidStateError);
      expect(await position('tomatoes')).toMatchObject({ reservedQuantity: 1 });
    });

    it('reports unknown parsed lines and products', async () => {
      await expect(
        services.pipeline.confirmMatch({ parsedLineId: 'missing', chosenProductId: 'tomatoes', customerSegment: 'restaurant' })
      ).rejects.toBeInstanceOf(NotFoundError);

      const view = await services.pipeline.resolveLine('tomatoes');
      await expect(
        services.pipeline.confirmMatch({ parsedLineId: view.parsedLineId, chosenProductId: 'kale', customerSegment: 'restaurant' })
      ).rejects.toBeInstanceOf(NotFoundError);
    });

    it('records a shortfall for procurement by default', async () => {
      const view = await services.pipeline.resolveLine('10 kg tomatoes');
      const line = await services.pipeline.confirmMatch({
        parsedLineId: view.parsedLineId,
        chosenProductId: 'tomatoes',
        customerSegment: 'restaurant',
      });

      expect(line).toMatchObject({ fulfillmentMethod: 'procurement_needed', shortfall: 3 });
      const shortfalls = await services.deps.ledgerEvents.list({ type: 'procurement.shortfall' });
      expect(shortfalls.map((e) => e.payload.quantity)).toEqual([3]);
    });

    it('refuses a shortfall when procurement is not allowed', async () => {
      const view = await services.pipeline.resolveLine('10 kg tomatoes');
      await expect(
        services.pipeline.confirmMatch({
          parsedLineId: view.parsedLineId,
          chosenProductId: 'tomatoes',
          customerSegment: 'restaurant',
          allowProcurement: false,
        })
      ).rejects.toBeInstanceOf(InsufficientStockError);
      expect(await position('tomatoes')).toMatchObject({ availableQuantity: 7, reservedQuantity: 0 });
    });

    it('leaves stock untouched when the segment has no pricing rule', async () => {
      const view = await services.pipeline.resolveLine('tomatoes');
      const input = { parsedLineId: view.parsedLineId, chosenProductId: 'tomatoes' };

      await expect(services.pipeline.confirmMatch({ ...input, customerSegment: 'hotel' })).rejects.toBeInstanceOf(
        InvalidPricingContextError
      );
      expect(await position('tomatoes')).toMatchObject({ availableQuantity: 7, reservedQuantity: 0 });

      const line = await services.pipeline.confirmMatch({ ...input, customerSegment: 'restaurant' });
      expect(line.status).toBe('reserved');
    });

    it('retries once with fresh lots after a version conflict', async () => {
      services = createTestServices({ now: () => clock, stockRepository: conflictingStock(createInMemoryStockRepository(stockLots()), 1) });
      await services.catalog.rebuild();

      const view = await services.pipeline.resolveLine('tomatoes');
      const line = await services.pipeline.confirmMatch({
        parsedLineId: view.parsedLineId,
        chosenProductId: 'tomatoes',
        customerSegment: 'restaurant',
      });
      expect(line.status).toBe('reserved');
    });

    it('gives up after the second conflict and keeps the parsed line open', async () => {
      services = createTestServices({ now: () => clock, stockRepository: conflictingStock(createInMemoryStockRepository(stockLots()), 2) });
      await services.catalog.rebuild();

      const view = await services.pipeline.resolveLine('tomatoes');
      const input = { parsedLineId: view.parsedLineId, chosenProductId: 'tomatoes', customerSegment: 'restaurant' };

      await expect(services.pipeline.confirmMatch(input)).rejects.toBeInstanceOf(ConcurrentReservationConflictError);
      expect((await services.pipeline.confirmMatch(input)).status).toBe('reserved');
    });
  });

  describe('commitLine / cancelLine', () => {
    const confirmTomatoes = async () => {
      const view = await services.pipeline.resolveLine('3 kg tomatoes');
      return services.pipeline.confirmMatch({ parsedLineId: view.parsedLineId, chosenProductId: 'tomatoes', customerSegment: 'restaurant' });
    };

    it('commits a reserved line and sells its stock', async () => {
      const line = await confirmTomatoes();
      const committed = await services.pipeline.commitLine(line.id);

      expect(committed.status).toBe('committed');
      expect(await position('tomatoes')).toMatchObject({ availableQuantity: 4, reservedQuantity: 0 });
      expect((await services.pipeline.commitLine(line.id)).status).toBe('committed');
      await expect(services.pipeline.cancelLine(line.id)).rejects.toBeInstanceOf(InvalidStateError);
    });

    it('cancels a reserved line and returns its stock', async () => {
      const line = await confirmTomatoes();
      const voided = await services.pipeline.cancelLine(line.id);

      expect(voided.status).toBe('voided');
      expect(await position('tomatoes')).toMatchObject({ availableQuantity: 7, reservedQuantity: 0 });
      expect((await services.pipeline.cancelLine(line.id)).status).toBe('voided');
      await expect(services.pipeline.commitLine(line.id)).rejects.toBeInstanceOf(InvalidStateError);
    });

    it('reports an unknown line', async () => {
      await expect(services.pipeline.commitLine('missing')).rejects.toBeInstanceOf(NotFoundError);
    });
  });

  describe('resolveInvoiceLine', () => {
    it('uses the invoice columns and prices from the invoice unit price', async () => {
      const view = await services.pipeline.resolveInvoiceLine(
        { description: 'Tomatoes', quantity: '3', unit: 'kg', unitPrice: 'R22,00' },
        { autoConfirm: true, customerSegment: 'restaurant' }
      );

      expect(view.parsedLine).toMatchObject({ quantity: 3, unitToken: 'kg', quantitySource: 'explicit' });
      expect(view.decisionTier).toBe('auto');
      expect(view.resolvedLine).toMatchObject({ productId: 'tomatoes', quantity: 3, unitPrice: 29.7, lineTotal: 89.1 });
    });

    it('derives volatility from the invoice price change', async () => {
      const view = await services.pipeline.resolveInvoiceLine(
        { description: 'Cocktail Tomatoes', quantity: 1, unit: 'kg', unitPrice: 36 },
        { autoConfirm: true, customerSegment: 'restaurant' }
      );
      // +12.5% on the catalog price reads as volatile
      expect(view.resolvedLine).toMatchObject({ unitPrice: 48.6, fulfillmentMethod: 'procurement_needed', shortfall: 1 });
    });

    it('rejects an unreadable unit price', async () => {
      await expect(
        services.pipeline.resolveInvoiceLine({ description: 'Tomatoes', unitPrice: 'n/a' })
      ).rejects.toBeInstanceOf(ValidationError);
    });
  });

  describe('expireStaleReservations', () => {
    it('releases reservations past the TTL and voids their lines', async () => {
      const view = await services.pipeline.resolveLine('3 kg tomatoes');
      const line = await services.pipeline.confirmMatch({
        parsedLineId: view.parsedLineId,
        chosenProductId: 'tomatoes',
        customerSegment: 'restaurant',
      });

      clock = addMinutes(NOW, 119);
      expect(await services.pipeline.expireStaleReservations()).toBe(0);

      clock = addMinutes(NOW, 121);
      expect(await services.pipeline.expireStaleReservations()).toBe(1);
      expect((await services.deps.orderLines.findById(line.id))?.status).toBe('voided');
      expect(await position('tomatoes')).toMatchObject({ availableQuantity: 7, reservedQuantity: 0 });
    });
  });

  describe('pruneExpiredRecords', () => {
    it('drops unconfirmed results after their TTL and keeps the confirmed audit', async () => {
      const pending = await services.pipeline.resolveLine('tomatoe');
      const confirmed = await services.pipeline.resolveLine('3 kg tomatoes');
      await services.pipeline.confirmMatch({
        parsedLineId: confirmed.parsedLineId,
        chosenProductId: 'tomatoes',
        customerSegment: 'restaurant',
      });

      clock = addMinutes(NOW, 59);
      expect(await services.pipeline.pruneExpiredRecords()).toEqual({ resolutions: 0, ledgerEvents: 0 });

      clock = addMinutes(NOW, 61);
      expect(await services.pipeline.pruneExpiredRecords()).toEqual({ resolutions: 1, ledgerEvents: 0 });
      await expect(
        services.pipeline.confirmMatch({ parsedLineId: pending.parsedLineId, chosenProductId: 'tomatoes', customerSegment: 'restaurant' })
      ).rejects.toBeInstanceOf(NotFoundError);
      expect((await services.deps.resolutions.listConsumed()).map((r) => r.id)).toEqual([confirmed.parsedLineId]);
    });

    it('drops ledger events past their retention', async () => {
      const view = await services.pipeline.resolveLine('3 kg tomatoes');
      await services.pipeline.confirmMatch({ parsedLineId: view.parsedLineId, chosenProductId: 'tomatoes', customerSegment: 'restaurant' });
      expect(await services.deps.ledgerEvents.list()).toHaveLength(1);

      clock = addMinutes(NOW, 24 * 60 + 1);
      expect(await services.pipeline.pruneExpiredRecords()).toEqual({ resolutions: 0, ledgerEvents: 1 });
      expect(await services.deps.ledgerEvents.list()).toEqual([]);
    });
  });

  describe('getStockPosition', () => {
    it('sums the product lots', async () => {
      expect(await position('tomatoes')).toEqual({
        productId: 'tomatoes',
        unit: 'kg',
        availableQuantity: 7,
        reservedQuantity: 0,
        lotCount: 2,
      });
      await expect(position('kale')).rejects.toBeInstanceOf(NotFoundError);
    });
  });
});
