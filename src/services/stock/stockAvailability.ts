import { convertQuantity, isMeasureUnit, roundQuantity } from '../catalog/unitCategory';
import type { FulfillmentPlan, LotAllocation, StockLot, StockPosition } from './types';

type UsableLot = { lot: StockLot; available: number };

function compareUsable(a: UsableLot, b: UsableLot): number {
  if (a.available !== b.available) return a.available - b.available;
  return a.lot.lotId < b.lot.lotId ? -1 : a.lot.lotId > b.lot.lotId ? 1 : 0;
}

/** Lots with stock, with their available quantity in the requested unit, smallest first. */
function usableLots(lots: StockLot[], unit: string): UsableLot[] {
  return lots
    .flatMap((lot) => {
      const available = convertQuantity(lot.availableQuantity, lot.unit, unit);
      return available !== null && available > 0 ? [{ lot, available }] : [];
    })
    .sort(compareUsable);
}

function allocate(usable: UsableLot, take: number, unit: string): LotAllocation {
  // Taking the whole lot uses its own figure so unit round-trips cannot leave dust behind
  const quantity =
    take >= usable.available ? usable.lot.availableQuantity : (convertQuantity(take, unit, usable.lot.unit) ?? take);
  return { lotId: usable.lot.lotId, quantity, unit: usable.lot.unit, expectedVersion: usable.lot.version };
}

/**
 * Decides how a requested quantity is drawn from a product's lots. Pure: nothing is reserved here.
 *
 * - exact_match: one lot holds exactly the request (or, for count units, one lot covers it)
 * - combination / partial_use: smallest lots first, each giving min(available, remaining)
 * - procurement_needed: everything reservable is allocated and the rest is the shortfall
 */
export function planFulfillment(params: {
  productId: string;
  quantity: number;
  unit: string;
  lots: StockLot[];
}): FulfillmentPlan {
  const { productId, unit } = params;
  const requested = roundQuantity(Math.max(0, params.quantity));
  const base = { productId, requestedQuantity: requested, unit };

  if (requested === 0) {
    return { ...base, method: 'exact_match', allocations: [], reservableQuantity: 0, shortfall: 0 };
  }

  const usable = usableLots(params.lots, unit);

  const exact =
    usable.find((u) => u.available === requested) ??
    (isMeasureUnit(unit) ? undefined : usable.find((u) => u.available >= requested));
  if (exact) {
    return {
      ...base,
      method: 'exact_match',
      allocations: [allocate(exact, requested, unit)],
      reservableQuantity: requested,
      shortfall: 0,
    };
  }

  const allocations: LotAllocation[] = [];
  let remaining = requested;
  for (const u of usable) {
    if (remaining <= 0) break;
    const take = roundQuantity(Math.min(u.available, remaining));
    allocations.push(allocate(u, take, unit));
    remaining = roundQuantity(remaining - take);
  }

  const reservable = roundQuantity(requested - remaining);
  if (remaining > 0) {
    return { ...base, method: 'procurement_needed', allocations, reservableQuantity: reservable, shortfall: remaining };
  }

  return {
    ...base,
    method: allocations.length > 1 ? 'combination' : 'partial_use',
    allocations,
    reservableQuantity: reservable,
    shortfall: 0,
  };
}

/** Sums a product's lots into one position; lots in a unit that cannot be converted are left out. */
export function toStockPosition(productId: string, unit: string, lots: StockLot[]): StockPosition {
  let availableQuantity = 0;
  let reservedQuantity = 0;
  let lotCount = 0;

  for (const lot of lots) {
    const available = convertQuantity(lot.availableQuantity, lot.unit, unit);
    const reserved = convertQuantity(lot.reservedQuantity, lot.unit, unit);
    if (available === null || reserved === null) continue;
    availableQuantity += available;
    reservedQuantity += reserved;
    lotCount += 1;
  }

  return {
    productId,
    unit,
    availableQuantity: roundQuantity(availableQuantity),
    reservedQuantity: roundQuantity(reservedQuantity),
    lotCount,
  };
}
