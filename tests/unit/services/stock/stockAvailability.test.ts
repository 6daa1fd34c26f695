import { describe, it, expect } from 'vitest';
import { planFulfillment, toStockPosition } from '../../../../src/services/stock/stockAvailability';
import { lot } from '../../../fixtures/stock';

const lots = [lot('lot-b', 5), lot('lot-a', 2)];

describe('planFulfillment', () => {
  it('combines the smallest lots first', () => {
    expect(planFulfillment({ productId: 'tomatoes', quantity: 3, unit: 'kg', lots })).toEqual({
      productId: 'tomatoes',
      method: 'combination',
      requestedQuantity: 3,
      unit: 'kg',
      allocations: [
        { lotId: 'lot-a', quantity: 2, unit: 'kg', expectedVersion: 0 },
        { lotId: 'lot-b', quantity: 1, unit: 'kg', expectedVersion: 0 },
      ],
      reservableQuantity: 3,
      shortfall: 0,
    });
  });

  it('prefers a lot holding exactly the request', () => {
    const plan = planFulfillment({ productId: 'tomatoes', quantity: 5, unit: 'kg', lots });
    expect(plan.method).toBe('exact_match');
    expect(plan.allocations).toEqual([{ lotId: 'lot-b', quantity: 5, unit: 'kg', expectedVersion: 0 }]);
  });

  it('takes part of a single lot', () => {
    const plan = planFulfillment({ productId: 'tomatoes', quantity: 1.5, unit: 'kg', lots });
    expect(plan.method).toBe('partial_use');
    expect(plan.allocations).toEqual([{ lotId: 'lot-a', quantity: 1.5, unit: 'kg', expectedVersion: 0 }]);
  });

  it('converts between weight units and allocates in the lot unit', () => {
    const plan = planFulfillment({ productId: 'tomatoes', quantity: 2500, unit: 'g', lots });
    expect(plan.method).toBe('combination');
    expect(plan.allocations).toEqual([
      { lotId: 'lot-a', quantity: 2, unit: 'kg', expectedVersion: 0 },
      { lotId: 'lot-b', quantity: 0.5, unit: 'kg', expectedVersion: 0 },
    ]);
  });

  it('lets one covering lot serve a count unit', () => {
    const heads = [lot('h-1', 3, 'head', 'broccoli'), lot('h-2', 10, 'head', 'broccoli')];
    const plan = planFulfillment({ productId: 'broccoli', quantity: 4, unit: 'head', lots: heads });
    expect(plan.method).toBe('exact_match');
    expect(plan.allocations).toEqual([{ lotId: 'h-2', quantity: 4, unit: 'head', expectedVersion: 0 }]);
  });

  it('reports the shortfall when stock runs out', () => {
    const plan = planFulfillment({ productId: 'tomatoes', quantity: 10, unit: 'kg', lots });
    expect(plan.method).toBe('procurement_needed');
    expect(plan.reservableQuantity).toBe(7);
    expect(plan.shortfall).toBe(3);
    expect(plan.allocations.map((a) => a.lotId)).toEqual(['lot-a', 'lot-b']);
  });

  it('needs procurement for the whole quantity when nothing is in stock', () => {
    const plan = planFulfillment({ productId: 'tomatoes', quantity: 2, unit: 'kg', lots: [lot('empty', 0)] });
    expect(plan).toMatchObject({ method: 'procurement_needed', allocations: [], reservableQuantity: 0, shortfall: 2 });
  });

  it('ignores lots in a unit that cannot be converted', () => {
    const plan = planFulfillment({ productId: 'tomatoes', quantity: 2, unit: 'kg', lots: [lot('crate', 4, 'crate'), lot('lot-a', 2)] });
    expect(plan.allocations.map((a) => a.lotId)).toEqual(['lot-a']);
  });

  it('plans nothing for a zero request', () => {
    const plan = planFulfillment({ productId: 'tomatoes', quantity: 0, unit: 'kg', lots });
    expect(plan).toMatchObject({ method: 'exact_match', allocations: [], shortfall: 0 });
  });

  it('never allocates more than a lot holds or than was requested', () => {
    for (const quantity of [0.25, 1, 2, 2.75, 6.999, 7, 12]) {
      const plan = planFulfillment({ productId: 'tomatoes', quantity, unit: 'kg', lots });
      const allocated = plan.allocations.reduce((sum, a) => sum + a.quantity, 0);
      expect(allocated).toBeCloseTo(plan.reservableQuantity, 9);
      expect(plan.reservableQuantity + plan.shortfall).toBeCloseTo(quantity, 9);
      for (const a of plan.allocations) {
        const source = lots.find((l) => l.lotId === a.lotId);
        expect(a.quantity).toBeLessThanOrEqual(source?.availableQuantity ?? 0);
      }
    }
  });
});

describe('toStockPosition', () => {
  it('sums lots in the requested unit', () => {
    const position = toStockPosition('tomatoes', 'g', [
      { ...lot('lot-a', 2), reservedQuantity: 1 },
      lot('lot-b', 0.5),
      lot('crate', 4, 'crate'),
    ]);
    expect(position).toEqual({ productId: 'tomatoes', unit: 'g', availableQuantity: 2500, reservedQuantity: 1000, lotCount: 2 });
  });
});
