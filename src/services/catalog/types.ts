import z from 'zod';

export const MARKET_VOLATILITY_LEVELS = ['stable', 'volatile', 'highly_volatile', 'extremely_volatile'] as const;
export type MarketVolatilityLevel = (typeof MARKET_VOLATILITY_LEVELS)[number];

/** A catalog record as the product catalog hands it over. */
export const catalogEntrySchema = z.object({
  id: z.string().min(1),
  canonicalName: z.string().min(1),
  unit: z.string().min(1),
  // Derived from the name's parenthetical when absent
  baseDescriptors: z.array(z.string()).optional(),
  basePrice: z.number().finite(),
  active: z.boolean().default(true),
  category: z.string().nullable().optional(),
  marketVolatility: z.enum(MARKET_VOLATILITY_LEVELS).nullable().optional(),
});

export type CatalogEntryInput = z.input<typeof catalogEntrySchema>;

export type CatalogEntry = {
  id: string;
  canonicalName: string;
  unit: string;
  baseDescriptors: string[];
  basePrice: number;
  active: boolean;
  category: string | null;
  marketVolatility: MarketVolatilityLevel | null;
};

/** CatalogEntry plus the lookup fields the index derives once per build. */
export type IndexedEntry = CatalogEntry & {
  nameLower: string;
  coreName: string;
  coreWords: string[];
  descriptorSet: ReadonlySet<string>;
};
