import { CatalogIntegrityError } from '../../utils/errors';
import { bestSoundsLike } from '../../utils/phonetic';
import { normalizeDescriptor, splitCatalogName, splitNumberWithSuffix } from './normalize';
import { areUnitsCompatible, canonicalizeUnit } from './unitCategory';
import { catalogEntrySchema, type CatalogEntry, type CatalogEntryInput, type IndexedEntry } from './types';

const MIN_CONTAINMENT_TOKEN_LENGTH = 2;

/**
 * Immutable snapshot of the active catalog.
 *
 * Built in one pass from catalog records; the unit vocabulary is derived from the data (entry units,
 * number+unit descriptor suffixes and container words such as "bag" in "Carrots (10kg bag)"), so new
 * products and packagings need no code change. Rebuilds produce a new instance; nothing mutates an
 * existing one.
 */
export class CatalogIndex {
  private readonly byId: ReadonlyMap<string, IndexedEntry>;
  private readonly ordered: readonly IndexedEntry[];
  private readonly units: ReadonlySet<string>;
  readonly builtAt: Date;

  private constructor(entries: IndexedEntry[], units: Set<string>, builtAt: Date) {
    this.ordered = Object.freeze(entries);
    this.byId = new Map(entries.map((e) => [e.id, e]));
    this.units = units;
    this.builtAt = builtAt;
  }

  static empty(): CatalogIndex {
    return new CatalogIndex([], new Set(), new Date(0));
  }

  /**
   * Validates and indexes the active entries. Inactive records are skipped.
   * Throws CatalogIntegrityError on a negative base price or a duplicate active canonical name.
   */
  static build(records: CatalogEntryInput[], builtAt: Date = new Date()): CatalogIndex {
    const entries: IndexedEntry[] = [];
    const units = new Set<string>();
    const seenNames = new Map<string, string>();

    for (const record of records) {
      const parsed = catalogEntrySchema.safeParse(record);
      if (!parsed.success) {
        throw new CatalogIntegrityError(`Invalid catalog entry ${String(record.id)}`, {
          issues: parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`),
        });
      }
      const data = parsed.data;
      if (!data.active) continue;

      if (data.basePrice < 0) {
        throw new CatalogIntegrityError(`Negative base price for ${data.id}`, { id: data.id, basePrice: data.basePrice });
      }

      const nameKey = data.canonicalName.trim().toLowerCase();
      const clash = seenNames.get(nameKey);
      if (clash) {
        throw new CatalogIntegrityError(`Duplicate active canonical name "${data.canonicalName}"`, {
          ids: [clash, data.id],
        });
      }
      seenNames.set(nameKey, data.id);

      const split = splitCatalogName(data.canonicalName);
      const descriptors = data.baseDescriptors ? data.baseDescriptors.map(normalizeDescriptor) : split.descriptors;
      const unit = canonicalizeUnit(data.unit) ?? data.unit.toLowerCase();

      units.add(unit);
      for (const descriptor of descriptors) {
        const fragment = splitNumberWithSuffix(descriptor);
        if (fragment) units.add(fragment.suffix);
      }
      for (const container of split.containerWords) units.add(container);

      const entry: CatalogEntry = {
        id: data.id,
        canonicalName: data.canonicalName.trim(),
        unit,
        baseDescriptors: descriptors,
        basePrice: data.basePrice,
        active: true,
        category: data.category ?? null,
        marketVolatility: data.marketVolatility ?? null,
      };

      entries.push({
        ...entry,
        nameLower: entry.canonicalName.toLowerCase(),
        coreName: split.coreName,
        coreWords: split.coreName.split(' ').filter(Boolean),
        descriptorSet: new Set(descriptors),
      });
    }

    entries.sort((a, b) => (a.canonicalName < b.canonicalName ? -1 : a.canonicalName > b.canonicalName ? 1 : 0));
    return new CatalogIndex(entries, units, builtAt);
  }

  get size(): number {
    return this.ordered.length;
  }

  unitVocabulary(): ReadonlySet<string> {
    return this.units;
  }

  get(id: string): IndexedEntry | undefined {
    return this.byId.get(id);
  }

  entries(): readonly IndexedEntry[] {
    return this.ordered;
  }

  /**
   * Containment superset for the product tokens, optionally narrowed by unit and descriptors.
   * Neither narrowing step may empty a non-empty set; when it would, it is skipped.
   */
  candidatesFor(productTokens: string[], unit: string | null, descriptorTokens: string[]): IndexedEntry[] {
    const tokens = Array.from(
      new Set(productTokens.map((t) => t.toLowerCase()).filter((t) => t.length >= MIN_CONTAINMENT_TOKEN_LENGTH))
    );
    if (tokens.length === 0) return [];

    let candidates = this.ordered.filter((e) => tokens.some((t) => e.nameLower.includes(t)));

    if (unit && candidates.length > 0) {
      const byUnit = candidates.filter((e) => acceptsUnit(e, unit));
      if (byUnit.length > 0) candidates = byUnit;
    }

    if (descriptorTokens.length > 0 && candidates.length > 0) {
      const byDescriptor = candidates.filter((e) => descriptorTokens.some((d) => e.descriptorSet.has(d)));
      if (byDescriptor.length > 0) candidates = byDescriptor;
    }

    return candidates;
  }

  /** Entries whose core name sounds like the tokens (Soundex) or is within edit-distance similarity. */
  phoneticCandidates(productTokens: string[], minSimilarity: number): IndexedEntry[] {
    const words = productTokens.map((t) => t.toLowerCase()).filter(Boolean);
    if (words.length === 0) return [];
    const phrase = words.join(' ');

    return this.ordered.filter((e) => {
      const best = bestSoundsLike(phrase, words, e.coreName, e.coreWords);
      return best.soundexEqual || best.similarity >= minSimilarity;
    });
  }
}

export function acceptsUnit(entry: Pick<IndexedEntry, 'unit' | 'descriptorSet'>, unit: string): boolean {
  return entry.unit === unit || entry.descriptorSet.has(unit) || areUnitsCompatible(entry.unit, unit);
}
