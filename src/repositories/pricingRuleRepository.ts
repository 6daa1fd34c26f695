import z from 'zod';

// Seed files carry ISO strings, callers in code may pass Dates
const ruleDate = z.union([z.string(), z.date()]).pipe(z.coerce.date());

/** Externally administered markup rule for one customer segment. */
export const pricingRuleSchema = z.object({
  id: z.string().min(1),
  customerSegment: z.string().min(1),
  baseMarkupPct: z.number(),
  volatilityAdjustmentPct: z.number().default(0),
  minimumMarginPct: z.number(),
  trendMultiplier: z.number().default(1),
  // category -> extra markup percentage points
  categoryAdjustments: z.record(z.number()).default({}),
  effectiveFrom: ruleDate,
  effectiveUntil: ruleDate.nullable().default(null),
  active: z.boolean().default(true),
});

export type PricingRule = z.infer<typeof pricingRuleSchema>;
export type PricingRuleInput = z.input<typeof pricingRuleSchema>;

export interface PricingRuleRepository {
  listForSegment(customerSegment: string): Promise<PricingRule[]>;
}

export function createInMemoryPricingRuleRepository(rules: PricingRuleInput[] = []): PricingRuleRepository {
  const stored = rules.map((rule) => pricingRuleSchema.parse(rule));

  return {
    async listForSegment(customerSegment) {
      return stored.filter((rule) => rule.customerSegment === customerSegment).map((rule) => ({ ...rule }));
    },
  };
}
