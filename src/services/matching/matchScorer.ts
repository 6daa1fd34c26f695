import type { MatchingWeights } from '../../config/matching';
import { acceptsUnit } from '../catalog/catalogIndex';
import type { IndexedEntry } from '../catalog/types';
import { bestSoundsLike } from '../../utils/phonetic';
import { singularize, type AliasTable } from './aliases';
import type { MatchCandidate, ParsedLine, StrategyName } from './types';

type ScoringContext = {
  parsed: ParsedLine;
  entry: IndexedEntry;
  weights: MatchingWeights;
  aliases: AliasTable;
  tokens: string[];
  phrase: string;
  coreWords: ReadonlySet<string>;
  corePhrase: string;
};

type StrategyScores = Partial<Record<StrategyName, number>>;

type Strategy = {
  name: StrategyName;
  score: (ctx: ScoringContext, prior: StrategyScores) => number;
};

function countDescriptorMatches(ctx: ScoringContext): number {
  return ctx.parsed.descriptorTokens.filter((d) => ctx.entry.descriptorSet.has(d)).length;
}

/** Applied in this order; each sees the scores of the ones before it. Phonetic must stay last. */
const STRATEGIES: readonly Strategy[] = [
  {
    name: 'exact_name_match',
    score: (ctx) => (ctx.phrase !== '' && ctx.phrase === ctx.corePhrase ? ctx.weights.exactNameMatch : 0),
  },
  {
    name: 'word_overlap_match',
    score: (ctx, prior) => {
      if ((prior.exact_name_match ?? 0) > 0 || ctx.tokens.length === 0) return 0;
      const found = ctx.tokens.filter((t) => ctx.coreWords.has(t)).length;
      return (ctx.weights.wordOverlapMatch * found) / ctx.tokens.length;
    },
  },
  {
    name: 'unit_match',
    score: ({ parsed, entry, weights }) => {
      const unit = parsed.unitToken;
      if (!unit) return 0;
      if (entry.unit === unit) return weights.unitMatch;
      return acceptsUnit(entry, unit) ? weights.unitMatch * weights.compatibleUnitShare : 0;
    },
  },
  {
    name: 'descriptor_match',
    score: (ctx) => Math.min(countDescriptorMatches(ctx) * ctx.weights.descriptorMatch, ctx.weights.descriptorMatchCap),
  },
  {
    name: 'alias_match',
    score: (ctx) => {
      const targets = ctx.aliases.expand(ctx.parsed.productTokens);
      const hit = targets.some((t) => t === ctx.corePhrase || ctx.coreWords.has(t));
      return hit ? ctx.weights.aliasMatch : 0;
    },
  },
  {
    name: 'phonetic_match',
    score: (ctx, prior) => {
      // Fallback only: any other strategy scoring rules it out
      if (Object.values(prior).some((p) => (p ?? 0) > 0) || ctx.tokens.length === 0) return 0;
      const sound = bestSoundsLike(ctx.phrase, ctx.tokens, ctx.entry.coreName, ctx.entry.coreWords);
      if (!sound.soundexEqual && sound.similarity < ctx.weights.phoneticMinSimilarity) return 0;
      return ctx.weights.phoneticMatch * sound.similarity;
    },
  },
];

function round2(n: number): number {
  return Math.round(n * 100) / 100;
}

export function scoreCandidate(
  parsed: ParsedLine,
  entry: IndexedEntry,
  weights: MatchingWeights,
  aliases: AliasTable
): MatchCandidate {
  const tokens = parsed.productTokens.map((t) => singularize(t.toLowerCase()));
  const coreSingular = entry.coreWords.map(singularize);
  const ctx: ScoringContext = {
    parsed,
    entry,
    weights,
    aliases,
    tokens,
    phrase: tokens.join(' '),
    coreWords: new Set(coreSingular),
    corePhrase: coreSingular.join(' '),
  };

  const strategyScores: StrategyScores = {};
  const matchedReasons: StrategyName[] = [];
  let total = 0;

  for (const strategy of STRATEGIES) {
    const points = round2(strategy.score(ctx, strategyScores));
    if (points <= 0) continue;
    strategyScores[strategy.name] = points;
    matchedReasons.push(strategy.name);
    total += points;
  }

  return {
    catalogEntryId: entry.id,
    canonicalName: entry.canonicalName,
    strategyScores,
    totalScore: Math.min(100, Math.max(0, round2(total))),
    matchedReasons,
    descriptorMatches: countDescriptorMatches(ctx),
  };
}

export function scoreCandidates(
  parsed: ParsedLine,
  entries: readonly IndexedEntry[],
  weights: MatchingWeights,
  aliases: AliasTable
): MatchCandidate[] {
  return entries.map((entry) => scoreCandidate(parsed, entry, weights, aliases));
}
