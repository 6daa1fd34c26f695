import type { ResolvedOrderLine } from '../services/orderLines/types';

export interface OrderLineRepository {
  save(line: ResolvedOrderLine): Promise<void>;
  findById(id: string): Promise<ResolvedOrderLine | null>;
  findByReservationId(reservationId: string): Promise<ResolvedOrderLine | null>;
}

export function createInMemoryOrderLineRepository(): OrderLineRepository {
  const lines = new Map<string, ResolvedOrderLine>();

  const copy = (line: ResolvedOrderLine): ResolvedOrderLine => ({
    ...line,
    allocations: line.allocations.map((a) => ({ ...a })),
  });

  return {
    async save(line) {
      lines.set(line.id, copy(line));
    },

    async findById(id) {
      const found = lines.get(id);
      return found ? copy(found) : null;
    },

    async findByReservationId(reservationId) {
      for (const line of lines.values()) {
        if (line.reservationId === reservationId) return copy(line);
      }
      return null;
    },
  };
}
