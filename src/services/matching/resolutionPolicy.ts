import type { MatchingConfig } from '../../config/matching';
import type { DecisionTier, MatchCandidate, ParsedLine, ResolutionResult } from './types';

/**
 * Total score desc, then exact-name matches first, then more descriptor matches,
 * then smallest canonical name (code-point order, locale independent).
 */
export function compareCandidates(a: MatchCandidate, b: MatchCandidate): number {
  if (a.totalScore !== b.totalScore) return b.totalScore - a.totalScore;

  const aExact = a.matchedReasons.includes('exact_name_match') ? 1 : 0;
  const bExact = b.matchedReasons.includes('exact_name_match') ? 1 : 0;
  if (aExact !== bExact) return bExact - aExact;

  if (a.descriptorMatches !== b.descriptorMatches) return b.descriptorMatches - a.descriptorMatches;

  if (a.canonicalName < b.canonicalName) return -1;
  if (a.canonicalName > b.canonicalName) return 1;
  return a.catalogEntryId < b.catalogEntryId ? -1 : a.catalogEntryId > b.catalogEntryId ? 1 : 0;
}

export function decisionTierFor(score: number | null, config: Pick<MatchingConfig, 'thresholds'>): DecisionTier {
  if (score === null) return 'none';
  const { auto, topSuggestion, suggestion } = config.thresholds;
  if (score >= auto) return 'auto';
  if (score >= topSuggestion) return 'top_suggestion';
  if (score >= suggestion) return 'suggestion_list';
  return 'none';
}

/** Ranks the scored candidates and assigns the decision tier. "No match" is the `none` tier, never an error. */
export function resolve(
  parsedLine: ParsedLine,
  candidates: readonly MatchCandidate[],
  config: Pick<MatchingConfig, 'thresholds' | 'maxSuggestions'>
): ResolutionResult {
  const ranked = [...candidates].sort(compareCandidates);
  const top = ranked.length > 0 ? ranked[0] : null;
  const decisionTier = decisionTierFor(top ? top.totalScore : null, config);

  if (decisionTier === 'none') {
    return { parsedLine, bestMatch: null, suggestions: [], decisionTier, requiresConfirmation: true };
  }

  const suggestions = ranked
    .filter((c) => c.totalScore >= config.thresholds.suggestion)
    .slice(0, config.maxSuggestions);

  return {
    parsedLine,
    bestMatch: decisionTier === 'auto' || decisionTier === 'top_suggestion' ? top : null,
    suggestions,
    decisionTier,
    requiresConfirmation: decisionTier !== 'auto',
  };
}
