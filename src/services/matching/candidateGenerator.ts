import type { CatalogIndex } from '../catalog/catalogIndex';
import type { IndexedEntry } from '../catalog/types';
import type { AliasTable } from './aliases';
import type { ParsedLine } from './types';

/**
 * Containment candidates for the product words and their alias targets, narrowed by unit and
 * descriptors inside the index. When nothing contains any word ("brocoli"), falls back to
 * sound-alike entries so a misspelling still reaches the scorer.
 */
export function generateCandidates(
  parsed: ParsedLine,
  index: CatalogIndex,
  aliases: AliasTable,
  phoneticMinSimilarity: number
): IndexedEntry[] {
  if (parsed.productTokens.length === 0) return [];

  const tokens = Array.from(new Set([...parsed.productTokens, ...aliases.expand(parsed.productTokens)]));
  const contained = index.candidatesFor(tokens, parsed.unitToken, [...parsed.descriptorTokens]);
  if (contained.length > 0) return contained;

  return index.phoneticCandidates([...parsed.productTokens], phoneticMinSimilarity);
}
