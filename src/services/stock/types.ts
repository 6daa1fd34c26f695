export type StockLot = {
  lotId: string;
  productId: string;
  unit: string;
  availableQuantity: number;
  reservedQuantity: number;
  // Bumped on every write; reservations compare-and-set against it
  version: number;
};

/** Per-product aggregate of its lots, expressed in one unit. */
export type StockPosition = {
  productId: string;
  unit: string;
  availableQuantity: number;
  reservedQuantity: number;
  lotCount: number;
};

export const FULFILLMENT_METHODS = ['exact_match', 'combination', 'partial_use', 'procurement_needed'] as const;
export type FulfillmentMethod = (typeof FULFILLMENT_METHODS)[number];

export type LotAllocation = {
  lotId: string;
  /** In the lot's own unit */
  quantity: number;
  unit: string;
  expectedVersion: number;
};

export type FulfillmentPlan = {
  productId: string;
  method: FulfillmentMethod;
  requestedQuantity: number;
  unit: string;
  allocations: LotAllocation[];
  reservableQuantity: number;
  shortfall: number;
};

export type ReservationStatus = 'held' | 'sold' | 'released';

export type Reservation = {
  id: string;
  productId: string;
  orderLineId: string | null;
  method: FulfillmentMethod;
  allocations: Array<Omit<LotAllocation, 'expectedVersion'>>;
  shortfall: number;
  unit: string;
  status: ReservationStatus;
  createdAt: Date;
  updatedAt: Date;
};
