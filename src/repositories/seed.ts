import { readFileSync } from 'fs';
import z from 'zod';
import { catalogEntrySchema } from '../services/catalog/types';
import { pricingRuleSchema } from './pricingRuleRepository';

const stockLotSchema = z.object({
  lotId: z.string().min(1),
  productId: z.string().min(1),
  unit: z.string().min(1),
  availableQuantity: z.number().nonnegative(),
  reservedQuantity: z.number().nonnegative().default(0),
  version: z.number().int().nonnegative().default(0),
});

export const seedDataSchema = z.object({
  catalog: z.array(catalogEntrySchema).default([]),
  stockLots: z.array(stockLotSchema).default([]),
  pricingRules: z.array(pricingRuleSchema).default([]),
});

export type SeedData = z.infer<typeof seedDataSchema>;

export const EMPTY_SEED: SeedData = { catalog: [], stockLots: [], pricingRules: [] };

export function loadSeedFile(path?: string): SeedData {
  if (!path) return EMPTY_SEED;

  const raw: unknown = JSON.parse(readFileSync(path, 'utf8'));
  const parsed = seedDataSchema.safeParse(raw);
  if (!parsed.success) {
    throw new Error(`[Seed] Invalid seed data at ${path}: ${parsed.error.message}`);
  }
  return parsed.data;
}
