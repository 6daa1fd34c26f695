import { InvalidPricingContextError } from '../../utils/errors';
import { MARKET_VOLATILITY_LEVELS, type MarketVolatilityLevel } from '../catalog/types';

export type PricingContext = {
  customerSegment: string;
  marketVolatilityLevel: MarketVolatilityLevel;
  baseMarkupPct: number;
  volatilityAdjustmentPct: number;
  categoryAdjustmentPct: number;
  minimumMarginPct: number;
  trendMultiplier: number;
};

const NUMERIC_FIELDS = [
  'baseMarkupPct',
  'volatilityAdjustmentPct',
  'categoryAdjustmentPct',
  'minimumMarginPct',
  'trendMultiplier',
] as const;

export function assertValidPricingContext(ctx: PricingContext): void {
  if (!ctx.customerSegment) {
    throw new InvalidPricingContextError('Pricing context has no customer segment');
  }
  for (const field of NUMERIC_FIELDS) {
    if (!Number.isFinite(ctx[field])) {
      throw new InvalidPricingContextError(`Pricing context field ${field} is not a finite number`, {
        customerSegment: ctx.customerSegment,
        field,
      });
    }
  }
  if (ctx.minimumMarginPct < 0) {
    throw new InvalidPricingContextError('Minimum margin cannot be negative', {
      customerSegment: ctx.customerSegment,
      minimumMarginPct: ctx.minimumMarginPct,
    });
  }
  if (ctx.trendMultiplier < 0) {
    throw new InvalidPricingContextError('Trend multiplier cannot be negative', {
      customerSegment: ctx.customerSegment,
      trendMultiplier: ctx.trendMultiplier,
    });
  }
  if (!MARKET_VOLATILITY_LEVELS.some((level) => level === ctx.marketVolatilityLevel)) {
    throw new InvalidPricingContextError(`Unknown market volatility level ${String(ctx.marketVolatilityLevel)}`, {
      customerSegment: ctx.customerSegment,
    });
  }
}

export function totalMarkupPct(ctx: PricingContext): number {
  const volatility = ctx.marketVolatilityLevel === 'stable' ? 0 : ctx.volatilityAdjustmentPct;
  return (ctx.baseMarkupPct + volatility + ctx.categoryAdjustmentPct) * ctx.trendMultiplier;
}

export function minimumPrice(costBasis: number, ctx: PricingContext): number {
  return costBasis * (1 + ctx.minimumMarginPct / 100);
}

/**
 * Unit price for a cost basis: the marked-up price, never below the minimum-margin price.
 * Pure; money rounding happens when the order line is built (see priceLine).
 */
export function price(costBasis: number, ctx: PricingContext): number {
  assertValidPricingContext(ctx);
  if (!Number.isFinite(costBasis) || costBasis < 0) {
    throw new InvalidPricingContextError('Cost basis must be a non-negative number', {
      customerSegment: ctx.customerSegment,
      costBasis,
    });
  }

  const candidate = costBasis * (1 + totalMarkupPct(ctx) / 100);
  return Math.max(candidate, minimumPrice(costBasis, ctx));
}

/** Rounds to cents; rounds up instead whenever rounding to nearest would fall below `floor`. */
export function toMoney(amount: number, floor = 0): number {
  const rounded = Math.round(amount * 100) / 100;
  if (rounded + 1e-9 >= floor) return rounded;
  return Math.ceil(floor * 100 - 1e-9) / 100;
}

export function priceLine(
  costBasis: number,
  quantity: number,
  ctx: PricingContext
): { unitPrice: number; lineTotal: number } {
  const unitPrice = toMoney(price(costBasis, ctx), minimumPrice(costBasis, ctx));
  return { unitPrice, lineTotal: toMoney(unitPrice * quantity) };
}
