import { readFileSync } from 'fs';
import z from 'zod';

/**
 * Scoring weights and decision thresholds for order-line matching.
 *
 * The defaults were calibrated by hand against historical order lines; deployments can override any
 * subset through a JSON file named by MATCHING_CONFIG_PATH.
 */
export const matchingConfigSchema = z.object({
  weights: z
    .object({
      exactNameMatch: z.number().min(0).default(45),
      wordOverlapMatch: z.number().min(0).default(25),
      unitMatch: z.number().min(0).default(15),
      // Share of unitMatch awarded for a compatible unit / container named in descriptors
      compatibleUnitShare: z.number().min(0).max(1).default(0.7),
      descriptorMatch: z.number().min(0).default(15),
      descriptorMatchCap: z.number().min(0).default(30),
      aliasMatch: z.number().min(0).default(20),
      phoneticMatch: z.number().min(0).default(20),
      phoneticMinSimilarity: z.number().min(0).max(1).default(0.75),
    })
    .default({}),
  thresholds: z
    .object({
      auto: z.number().default(50),
      topSuggestion: z.number().default(25),
      suggestion: z.number().default(10),
    })
    .default({})
    .refine((t) => t.auto > t.topSuggestion && t.topSuggestion > t.suggestion, {
      message: 'thresholds must be strictly descending: auto > topSuggestion > suggestion',
    }),
  maxSuggestions: z.number().int().positive().default(20),
  // Unattended contexts (e.g. reprocessing historical invoices) may opt into applying top_suggestion
  allowTopSuggestionAutoApply: z.boolean().default(false),
});

export type MatchingConfig = z.infer<typeof matchingConfigSchema>;
export type MatchingWeights = MatchingConfig['weights'];
export type MatchingThresholds = MatchingConfig['thresholds'];

export const DEFAULT_MATCHING_CONFIG: MatchingConfig = matchingConfigSchema.parse({});

export function loadMatchingConfig(path?: string): MatchingConfig {
  if (!path) return DEFAULT_MATCHING_CONFIG;

  const raw: unknown = JSON.parse(readFileSync(path, 'utf8'));
  const parsed = matchingConfigSchema.safeParse(raw);
  if (!parsed.success) {
    throw new Error(`[MatchingConfig] Invalid matching config at ${path}: ${parsed.error.message}`);
  }
  return parsed.data;
}
