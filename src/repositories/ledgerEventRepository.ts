import { randomUUID } from 'crypto';

export type LedgerEventType = 'stock.reserved' | 'stock.released' | 'stock.sold' | 'procurement.shortfall';

export type LedgerEvent = {
  id: string;
  type: LedgerEventType;
  productId: string;
  reservationId: string | null;
  occurredAt: Date;
  payload: Record<string, unknown>;
};

export type NewLedgerEvent = Omit<LedgerEvent, 'id' | 'occurredAt'>;

/** Outbox of events for the inventory ledger and procurement; a relay drains it. */
export interface LedgerEventRepository {
  append(event: NewLedgerEvent): Promise<LedgerEvent>;
  list(filter?: { productId?: string; type?: LedgerEventType }): Promise<LedgerEvent[]>;
  /** Retention: events the relay has had time to forward. */
  deleteBefore(cutoff: Date): Promise<number>;
}

export function createInMemoryLedgerEventRepository(now: () => Date = () => new Date()): LedgerEventRepository {
  let events: LedgerEvent[] = [];

  return {
    async append(event) {
      const stored: LedgerEvent = { ...event, id: randomUUID(), occurredAt: now() };
      events.push(stored);
      return stored;
    },

    async list(filter = {}) {
      return events.filter(
        (e) => (!filter.productId || e.productId === filter.productId) && (!filter.type || e.type === filter.type)
      );
    },

    async deleteBefore(cutoff) {
      const kept = events.filter((e) => e.occurredAt >= cutoff);
      const deleted = events.length - kept.length;
      events = kept;
      return deleted;
    },
  };
}
