import { canonicalizeUnit } from './unitCategory';

const WHITESPACE_RE = /\s+/g;
const PUNCT_LIGHT_RE = /[.,;:(){}\[\]<>|!?"]/g;
const PARENTHETICAL_RE = /\(([^)]*)\)/g;
const NUMBER_RE = /^\d+(?:[.,]\d+)?$/;
const NUMBER_WITH_SUFFIX_RE = /^(\d+(?:[.,]\d+)?)([a-z]+)$/;

export function normalizeText(raw: string): string {
  return String(raw || '')
    .trim()
    .toLowerCase()
    .replace(WHITESPACE_RE, ' ')
    .replace(PUNCT_LIGHT_RE, '')
    .trim();
}

/** "1,5" -> 1.5; returns null for anything that is not a plain decimal. */
export function parseDecimal(raw: string): number | null {
  if (!NUMBER_RE.test(raw)) return null;
  const n = Number(raw.replace(',', '.'));
  return Number.isFinite(n) ? n : null;
}

/** Splits "200g" into its number and (canonicalized) suffix. */
export function splitNumberWithSuffix(token: string): { value: number; suffix: string } | null {
  const m = token.match(NUMBER_WITH_SUFFIX_RE);
  if (!m) return null;
  const value = parseDecimal(m[1]);
  const suffix = canonicalizeUnit(m[2]);
  if (value === null || !suffix) return null;
  return { value, suffix };
}

/** Writes number+unit fragments one way: "200 g" / "200G" / "200grams" -> "200g". */
export function normalizeDescriptor(token: string): string {
  const t = token.trim().toLowerCase();
  const split = splitNumberWithSuffix(t);
  if (!split) return t;
  return `${split.value}${split.suffix}`;
}

export type SplitCatalogName = {
  /** Name without its packaging parenthetical, normalized: "carrots" */
  coreName: string;
  /** Parenthetical words, number+unit pairs joined: ["10kg", "bag"] */
  descriptors: string[];
  /** Descriptor words that follow a number+unit fragment ("bag" in "10kg bag") */
  containerWords: string[];
};

export function splitCatalogName(name: string): SplitCatalogName {
  const descriptors: string[] = [];
  const containerWords: string[] = [];

  for (const match of String(name || '').matchAll(PARENTHETICAL_RE)) {
    const words = match[1]
      .toLowerCase()
      // "1,5l" keeps its decimal comma
      .replace(/(?<!\d),|,(?!\d)|[;/]/g, ' ')
      .split(WHITESPACE_RE)
      .filter(Boolean);
    const merged: string[] = [];
    for (let i = 0; i < words.length; i += 1) {
      const next = words[i + 1];
      // "10 kg" -> "10kg"
      if (parseDecimal(words[i]) !== null && next && /^[a-z]+$/.test(next)) {
        merged.push(normalizeDescriptor(`${words[i]}${next}`));
        i += 1;
        continue;
      }
      merged.push(normalizeDescriptor(words[i]));
    }

    merged.forEach((word, i) => {
      if (i > 0 && /^[a-z]+$/.test(word) && splitNumberWithSuffix(merged[i - 1])) {
        containerWords.push(canonicalizeUnit(word) ?? word);
      }
    });
    descriptors.push(...merged);
  }

  const coreName = normalizeText(String(name || '').replace(PARENTHETICAL_RE, ' '));
  return { coreName, descriptors: Array.from(new Set(descriptors)), containerWords };
}
