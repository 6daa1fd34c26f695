import { parseDecimal, splitNumberWithSuffix } from '../catalog/normalize';
import { canonicalizeUnit, isMeasureUnit } from '../catalog/unitCategory';
import type { ParsedLine, QuantitySource } from './types';

const STOP_WORDS: ReadonlySet<string> = new Set([
  'a', 'an', 'and', 'the', 'of', 'for', 'to', 'with', 'per',
  'please', 'pls', 'plz', 'thanks', 'thank', 'you',
  'i', 'we', 'me', 'us', 'need', 'want', 'can', 'get', 'some', 'order',
]);

// "2x" / "x2" are multipliers written against the number
const MULTIPLIER_RE = /^(?:x(\d+(?:[.,]\d+)?)|(\d+(?:[.,]\d+)?)x)$/;
const WORD_RE = /^\p{L}[\p{L}'-]*$/u;

type Fragment = { value: number; suffix: string; text: string };

function tokenize(rawText: string): string[] {
  return String(rawText || '')
    .toLowerCase()
    .replace(/[×*]/g, ' ')
    // keep decimal separators between digits ("1,5kg", "2.5")
    .replace(/(?<!\d)[.,]|[.,](?!\d)/g, ' ')
    .replace(/[()[\]{}:;!?"/\\+&|]/g, ' ')
    .split(/\s+/)
    .filter(Boolean);
}

/**
 * Tokenizes one order line into quantity, unit, product words and descriptor fragments.
 *
 * `vocabulary` is the catalog's discovered unit vocabulary; weight / volume units are always recognised.
 * Never throws: anything unrecognised is dropped and the quantity falls back to 1.
 */
export function parseLine(rawText: string, vocabulary: ReadonlySet<string>): ParsedLine {
  let quantity: number | null = null;
  let unitToken: string | null = null;
  const productTokens: string[] = [];
  const fragments: Fragment[] = [];

  const isUnit = (u: string) => vocabulary.has(u) || isMeasureUnit(u);

  for (const token of tokenize(rawText)) {
    if (token === 'x') continue;

    const multiplier = token.match(MULTIPLIER_RE);
    const bare = multiplier ? parseDecimal(multiplier[1] ?? multiplier[2]) : parseDecimal(token);
    if (bare !== null) {
      // later bare numbers are ignored
      if (quantity === null) quantity = bare;
      continue;
    }

    const fragment = splitNumberWithSuffix(token);
    if (fragment) {
      if (isUnit(fragment.suffix)) {
        fragments.push({ ...fragment, text: `${fragment.value}${fragment.suffix}` });
      }
      continue;
    }

    const unit = canonicalizeUnit(token);
    if (unit && isUnit(unit)) {
      if (unitToken === null) unitToken = unit;
      continue;
    }

    if (WORD_RE.test(token) && !STOP_WORDS.has(token)) {
      productTokens.push(token);
    }
  }

  let quantitySource: QuantitySource = quantity === null ? 'default' : 'explicit';

  // "3kg tomatoes": the measure is the quantity, not a packaging descriptor
  if (quantity === null && unitToken === null) {
    const measureIdx = fragments.findIndex((f) => isMeasureUnit(f.suffix));
    if (measureIdx >= 0) {
      const [measure] = fragments.splice(measureIdx, 1);
      quantity = measure.value;
      unitToken = measure.suffix;
      quantitySource = 'measure';
    }
  }

  return Object.freeze({
    rawText,
    quantity: quantity !== null && quantity >= 0 ? quantity : 1,
    unitToken,
    productTokens: Object.freeze(productTokens),
    descriptorTokens: Object.freeze(Array.from(new Set(fragments.map((f) => f.text)))),
    quantitySource,
  });
}
