import { compareDesc, isAfter, isBefore } from 'date-fns';
import type { PricingRule, PricingRuleRepository } from '../../repositories/pricingRuleRepository';
import { InvalidPricingContextError } from '../../utils/errors';
import type { CatalogEntry, MarketVolatilityLevel } from '../catalog/types';
import type { PricingContext } from './pricingResolver';

/** Magnitude of a recent price change (in %) -> volatility tier. */
export function classifyVolatility(priceChangePct: number): MarketVolatilityLevel {
  const change = Math.abs(priceChangePct);
  if (!Number.isFinite(change) || change >= 50) return 'extremely_volatile';
  if (change >= 25) return 'highly_volatile';
  if (change >= 10) return 'volatile';
  return 'stable';
}

function isEffective(rule: PricingRule, at: Date): boolean {
  if (!rule.active) return false;
  if (isAfter(rule.effectiveFrom, at)) return false;
  return rule.effectiveUntil === null || isBefore(at, rule.effectiveUntil);
}

export class PricingRuleStore {
  constructor(private readonly rules: PricingRuleRepository) {}

  /** The active rule in effect at `at`; the most recently started one wins. */
  async findEffectiveRule(customerSegment: string, at: Date): Promise<PricingRule | null> {
    const effective = (await this.rules.listForSegment(customerSegment))
      .filter((rule) => isEffective(rule, at))
      .sort((a, b) => compareDesc(a.effectiveFrom, b.effectiveFrom));
    return effective.length > 0 ? effective[0] : null;
  }

  /**
   * Builds the pricing context for a product and segment. A segment without a rule is a configuration
   * error: it raises rather than falling back to some default markup.
   */
  async resolveContext(params: {
    customerSegment: string;
    entry: Pick<CatalogEntry, 'id' | 'category' | 'marketVolatility'>;
    at?: Date;
    recentPriceChangePct?: number | null;
  }): Promise<PricingContext> {
    const at = params.at ?? new Date();
    const rule = await this.findEffectiveRule(params.customerSegment, at);
    if (!rule) {
      throw new InvalidPricingContextError(`No active pricing rule for customer segment "${params.customerSegment}"`, {
        customerSegment: params.customerSegment,
        at: at.toISOString(),
      });
    }

    const volatility =
      params.entry.marketVolatility ??
      (params.recentPriceChangePct !== undefined && params.recentPriceChangePct !== null
        ? classifyVolatility(params.recentPriceChangePct)
        : 'stable');
    const category = params.entry.category;

    return {
      customerSegment: rule.customerSegment,
      marketVolatilityLevel: volatility,
      baseMarkupPct: rule.baseMarkupPct,
      volatilityAdjustmentPct: rule.volatilityAdjustmentPct,
      categoryAdjustmentPct: category ? (rule.categoryAdjustments[category] ?? 0) : 0,
      minimumMarginPct: rule.minimumMarginPct,
      trendMultiplier: rule.trendMultiplier,
    };
  }
}
