import { randomUUID } from 'crypto';
import { logger as defaultLogger, type Logger } from '../../infrastructure/logger';
import type { LedgerEventRepository } from '../../repositories/ledgerEventRepository';
import type { LotUpdate, StockRepository } from '../../repositories/stockRepository';
import { ConcurrentReservationConflictError, InvalidStateError, NotFoundError } from '../../utils/errors';
import { roundQuantity } from '../catalog/unitCategory';
import type { ProductLock } from './productLock';
import type { FulfillmentPlan, Reservation, StockLot } from './types';

// Float dust tolerated when comparing quantities
const EPSILON = 1e-9;

export type ReservationManagerDeps = {
  stockRepository: StockRepository;
  ledgerEvents: LedgerEventRepository;
  lock: ProductLock;
  splitPartialLots?: boolean;
  now?: () => Date;
  log?: Logger;
};

/**
 * Two-phase stock reservation: reserve -> sell (commit) | release.
 *
 * Every mutation runs under the product lock and writes lots with a version check, so a plan computed
 * from a stale snapshot fails with ConcurrentReservationConflictError instead of overselling.
 */
export class ReservationManager {
  private readonly stock: StockRepository;
  private readonly events: LedgerEventRepository;
  private readonly lock: ProductLock;
  private readonly splitPartialLots: boolean;
  private readonly now: () => Date;
  private readonly log: Logger;

  constructor(deps: ReservationManagerDeps) {
    this.stock = deps.stockRepository;
    this.events = deps.ledgerEvents;
    this.lock = deps.lock;
    this.splitPartialLots = deps.splitPartialLots ?? false;
    this.now = deps.now ?? (() => new Date());
    this.log = deps.log ?? defaultLogger;
  }

  async reserve(plan: FulfillmentPlan, opts: { orderLineId?: string | null } = {}): Promise<Reservation> {
    return this.lock.withLock(plan.productId, async () => {
      const lots = new Map((await this.stock.listLots(plan.productId)).map((lot) => [lot.lotId, lot]));

      const stale = plan.allocations.filter((a) => {
        const lot = lots.get(a.lotId);
        return !lot || lot.version !== a.expectedVersion || lot.availableQuantity + EPSILON < a.quantity;
      });
      if (stale.length > 0) {
        throw new ConcurrentReservationConflictError({ productId: plan.productId, lotIds: stale.map((a) => a.lotId) });
      }

      const updates: LotUpdate[] = [];
      const splits: StockLot[] = [];
      const allocations: Reservation['allocations'] = [];

      for (const allocation of plan.allocations) {
        const lot = lots.get(allocation.lotId);
        if (!lot) continue;
        const availableQuantity = roundQuantity(Math.max(0, lot.availableQuantity - allocation.quantity));

        if (this.splitPartialLots && availableQuantity > 0) {
          // The reserved part moves to its own lot record
          const split: StockLot = {
            lotId: `${lot.lotId}/${randomUUID().slice(0, 8)}`,
            productId: lot.productId,
            unit: lot.unit,
            availableQuantity: 0,
            reservedQuantity: allocation.quantity,
            version: 0,
          };
          splits.push(split);
          updates.push({ lotId: lot.lotId, expectedVersion: lot.version, availableQuantity, reservedQuantity: lot.reservedQuantity });
          allocations.push({ lotId: split.lotId, quantity: allocation.quantity, unit: allocation.unit });
          continue;
        }

        updates.push({
          lotId: lot.lotId,
          expectedVersion: lot.version,
          availableQuantity,
          reservedQuantity: roundQuantity(lot.reservedQuantity + allocation.quantity),
        });
        allocations.push({ lotId: lot.lotId, quantity: allocation.quantity, unit: allocation.unit });
      }

      if (!(await this.stock.applyLotUpdates(updates))) {
        throw new ConcurrentReservationConflictError({ productId: plan.productId, lotIds: updates.map((u) => u.lotId) });
      }
      for (const split of splits) {
        await this.stock.insertLot(split);
      }

      const at = this.now();
      const reservation: Reservation = {
        id: randomUUID(),
        productId: plan.productId,
        orderLineId: opts.orderLineId ?? null,
        method: plan.method,
        allocations,
        shortfall: plan.shortfall,
        unit: plan.unit,
        status: 'held',
        createdAt: at,
        updatedAt: at,
      };
      await this.stock.saveReservation(reservation);

      await this.events.append({
        type: 'stock.reserved',
        productId: plan.productId,
        reservationId: reservation.id,
        payload: { method: plan.method, allocations, orderLineId: reservation.orderLineId },
      });
      if (plan.shortfall > 0) {
        await this.events.append({
          type: 'procurement.shortfall',
          productId: plan.productId,
          reservationId: reservation.id,
          payload: { quantity: plan.shortfall, unit: plan.unit, orderLineId: reservation.orderLineId },
        });
      }

      this.log.info(
        {
          event: 'stock.reserved',
          productId: plan.productId,
          reservationId: reservation.id,
          method: plan.method,
          reserved: plan.reservableQuantity,
          shortfall: plan.shortfall,
          unit: plan.unit,
        },
        '[Stock] Reserved'
      );
      return reservation;
    });
  }

  /** Commit: the reserved quantity leaves the ledger. */
  async sell(reservationId: string): Promise<Reservation> {
    return this.transition(reservationId, 'sold', (lot, quantity) => ({
      availableQuantity: lot.availableQuantity,
      reservedQuantity: roundQuantity(Math.max(0, lot.reservedQuantity - quantity)),
    }));
  }

  /** The reserved quantity returns to available. Releasing twice is a no-op. */
  async release(reservationId: string, reason: 'cancelled' | 'expired' = 'cancelled'): Promise<Reservation> {
    return this.transition(
      reservationId,
      'released',
      (lot, quantity) => ({
        availableQuantity: roundQuantity(lot.availableQuantity + quantity),
        reservedQuantity: roundQuantity(Math.max(0, lot.reservedQuantity - quantity)),
      }),
      reason
    );
  }

  /** Releases held reservations created before the cutoff. Returns the ones it released. */
  async expireStale(olderThan: Date): Promise<Reservation[]> {
    const stale = await this.stock.listHeldReservationsCreatedBefore(olderThan);
    const released: Reservation[] = [];
    for (const reservation of stale) {
      try {
        released.push(await this.release(reservation.id, 'expired'));
      } catch (err) {
        // Sold between listing and release
        if (!(err instanceof InvalidStateError)) throw err;
      }
    }
    if (released.length > 0) {
      this.log.info(
        { event: 'stock.reservations_expired', count: released.length, olderThan: olderThan.toISOString() },
        '[Stock] Expired stale reservations'
      );
    }
    return released;
  }

  private async transition(
    reservationId: string,
    target: 'sold' | 'released',
    apply: (lot: StockLot, quantity: number) => { availableQuantity: number; reservedQuantity: number },
    reason?: string
  ): Promise<Reservation> {
    const found = await this.stock.findReservation(reservationId);
    if (!found) throw new NotFoundError('Reservation', reservationId);

    return this.lock.withLock(found.productId, async () => {
      // Re-read under the lock
      const reservation = await this.stock.findReservation(reservationId);
      if (!reservation) throw new NotFoundError('Reservation', reservationId);
      if (reservation.status === target) return reservation;
      if (reservation.status !== 'held') {
        throw new InvalidStateError(`Reservation ${reservationId} is already ${reservation.status}`, {
          reservationId,
          status: reservation.status,
        });
      }

      const lots = new Map((await this.stock.listLots(reservation.productId)).map((lot) => [lot.lotId, lot]));
      const updates: LotUpdate[] = [];
      for (const allocation of reservation.allocations) {
        const lot = lots.get(allocation.lotId);
        if (!lot) {
          throw new ConcurrentReservationConflictError({ productId: reservation.productId, lotIds: [allocation.lotId] });
        }
        updates.push({ lotId: lot.lotId, expectedVersion: lot.version, ...apply(lot, allocation.quantity) });
      }

      if (!(await this.stock.applyLotUpdates(updates))) {
        throw new ConcurrentReservationConflictError({
          productId: reservation.productId,
          lotIds: updates.map((u) => u.lotId),
        });
      }

      const updated: Reservation = { ...reservation, status: target, updatedAt: this.now() };
      await this.stock.saveReservation(updated);

      const type = target === 'sold' ? 'stock.sold' : 'stock.released';
      await this.events.append({
        type,
        productId: reservation.productId,
        reservationId,
        payload: { allocations: reservation.allocations, orderLineId: reservation.orderLineId, ...(reason ? { reason } : {}) },
      });
      this.log.info({ event: type, productId: reservation.productId, reservationId, reason }, `[Stock] ${target}`);
      return updated;
    });
  }
}
