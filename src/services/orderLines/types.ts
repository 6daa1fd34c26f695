import type { DecisionTier, MatchCandidate, ParsedLine, ResolutionResult } from '../matching/types';
import type { FulfillmentMethod, Reservation } from '../stock/types';

export type OrderLineStatus = 'reserved' | 'committed' | 'voided';

export type ResolvedOrderLine = {
  id: string;
  parsedLineId: string;
  productId: string;
  canonicalName: string;
  quantity: number;
  unit: string;
  unitPrice: number;
  lineTotal: number;
  confidence: number;
  decisionTier: DecisionTier;
  fulfillmentMethod: FulfillmentMethod;
  reservationId: string;
  shortfall: number;
  allocations: Reservation['allocations'];
  customerSegment: string;
  status: OrderLineStatus;
  createdAt: Date;
  updatedAt: Date;
};

/** A suggestion as shown to the person choosing, with informational stock flags. */
export type SuggestionView = MatchCandidate & {
  availableQuantity: number;
  stockUnit: string;
  outOfStock: boolean;
};

export type ResolutionView = {
  parsedLineId: string;
  parsedLine: ParsedLine;
  decisionTier: DecisionTier;
  requiresConfirmation: boolean;
  bestMatch: SuggestionView | null;
  suggestions: SuggestionView[];
  resolvedLine: ResolvedOrderLine | null;
};

export type ResolutionSource = 'text' | 'invoice';

/** Audit record of one resolution, kept until (and after) someone consumes it. */
export type StoredResolution = {
  id: string;
  source: ResolutionSource;
  result: ResolutionResult;
  invoiceUnitPrice: number | null;
  createdAt: Date;
  consumption: {
    orderLineId: string;
    chosenProductId: string;
    decidedBy: 'auto' | 'human';
    consumedAt: Date;
  } | null;
};
