import aliasData from '../../resources/aliases.json';

/** "tomatoes" -> "tomato", "cherries" -> "cherry", "grass" stays. */
export function singularize(word: string): string {
  if (word.length <= 3) return word;
  if (word.endsWith('ies')) return `${word.slice(0, -3)}y`;
  if (/(?:oes|ses|xes|ches|shes)$/.test(word)) return word.slice(0, -2);
  if (word.endsWith('s') && !word.endsWith('ss')) return word.slice(0, -1);
  return word;
}

/**
 * Synonym and common-misspelling table (eggplant -> aubergine, dhania -> coriander, tomatoe -> tomato).
 * Keys and targets are lower-case; lookups tolerate a plural on either side.
 */
export class AliasTable {
  private readonly targets: ReadonlyMap<string, string>;

  constructor(entries: Record<string, string>) {
    const map = new Map<string, string>();
    for (const [from, to] of Object.entries(entries)) {
      const key = from.trim().toLowerCase();
      const target = to.trim().toLowerCase();
      if (!key || !target) continue;
      map.set(key, target);
      map.set(singularize(key), target);
    }
    this.targets = map;
  }

  static fromDefaults(): AliasTable {
    return new AliasTable(aliasData);
  }

  get size(): number {
    return this.targets.size;
  }

  /** Canonical (singular) target for a word or phrase, or null when it has no alias or already is the target. */
  resolve(term: string): string | null {
    const key = term.trim().toLowerCase();
    if (!key) return null;
    const singular = singularize(key);
    const target = this.targets.get(key) ?? this.targets.get(singular);
    if (!target) return null;
    const canonical = singularize(target);
    // "tomatos" singularizes onto its own target; correct spellings earn no alias points
    return canonical === singular ? null : canonical;
  }

  /** Alias targets reachable from the whole phrase or any single token, deduplicated. */
  expand(tokens: readonly string[]): string[] {
    const out = new Set<string>();
    const phraseTarget = this.resolve(tokens.join(' '));
    if (phraseTarget) out.add(phraseTarget);
    for (const token of tokens) {
      const target = this.resolve(token);
      if (target) out.add(target);
    }
    return Array.from(out);
  }
}
