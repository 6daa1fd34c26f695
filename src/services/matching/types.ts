export type QuantitySource = 'explicit' | 'measure' | 'default';

/** One tokenized order line. Never mutated after parsing. */
export type ParsedLine = Readonly<{
  rawText: string;
  quantity: number;
  unitToken: string | null;
  productTokens: readonly string[];
  descriptorTokens: readonly string[];
  quantitySource: QuantitySource;
}>;

export const STRATEGY_NAMES = [
  'exact_name_match',
  'word_overlap_match',
  'unit_match',
  'descriptor_match',
  'alias_match',
  'phonetic_match',
] as const;

export type StrategyName = (typeof STRATEGY_NAMES)[number];

export type MatchCandidate = {
  catalogEntryId: string;
  canonicalName: string;
  strategyScores: Partial<Record<StrategyName, number>>;
  totalScore: number;
  matchedReasons: StrategyName[];
  descriptorMatches: number;
};

export const DECISION_TIERS = ['auto', 'top_suggestion', 'suggestion_list', 'none'] as const;
export type DecisionTier = (typeof DECISION_TIERS)[number];

export type ResolutionResult = {
  parsedLine: ParsedLine;
  bestMatch: MatchCandidate | null;
  suggestions: MatchCandidate[];
  decisionTier: DecisionTier;
  requiresConfirmation: boolean;
};
