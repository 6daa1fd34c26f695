import type { Reservation, StockLot } from '../services/stock/types';

export type LotUpdate = {
  lotId: string;
  expectedVersion: number;
  availableQuantity: number;
  reservedQuantity: number;
};

/**
 * Inventory ledger as the reservation core sees it. A persistent ledger implements the same contract;
 * `applyLotUpdates` must be all-or-nothing and version-checked.
 */
export interface StockRepository {
  listLots(productId: string): Promise<StockLot[]>;
  /** Applies every update (bumping versions) or none; false when any expected version is stale. */
  applyLotUpdates(updates: LotUpdate[]): Promise<boolean>;
  insertLot(lot: StockLot): Promise<void>;
  saveReservation(reservation: Reservation): Promise<void>;
  findReservation(id: string): Promise<Reservation | null>;
  listHeldReservationsCreatedBefore(cutoff: Date): Promise<Reservation[]>;
}

function copyReservation(r: Reservation): Reservation {
  return { ...r, allocations: r.allocations.map((a) => ({ ...a })) };
}

export function createInMemoryStockRepository(seed: StockLot[] = []): StockRepository {
  const lots = new Map<string, StockLot>(seed.map((lot) => [lot.lotId, { ...lot }]));
  const reservations = new Map<string, Reservation>();

  return {
    async listLots(productId) {
      return Array.from(lots.values())
        .filter((lot) => lot.productId === productId)
        .map((lot) => ({ ...lot }));
    },

    async applyLotUpdates(updates) {
      for (const update of updates) {
        const current = lots.get(update.lotId);
        if (!current || current.version !== update.expectedVersion) return false;
      }
      for (const update of updates) {
        const current = lots.get(update.lotId);
        if (!current) continue;
        lots.set(update.lotId, {
          ...current,
          availableQuantity: update.availableQuantity,
          reservedQuantity: update.reservedQuantity,
          version: current.version + 1,
        });
      }
      return true;
    },

    async insertLot(lot) {
      if (lots.has(lot.lotId)) {
        throw new Error(`[StockRepository] Lot already exists: ${lot.lotId}`);
      }
      lots.set(lot.lotId, { ...lot });
    },

    async saveReservation(reservation) {
      reservations.set(reservation.id, copyReservation(reservation));
    },

    async findReservation(id) {
      const found = reservations.get(id);
      return found ? copyReservation(found) : null;
    },

    async listHeldReservationsCreatedBefore(cutoff) {
      return Array.from(reservations.values())
        .filter((r) => r.status === 'held' && r.createdAt.getTime() < cutoff.getTime())
        .map(copyReservation);
    },
  };
}
