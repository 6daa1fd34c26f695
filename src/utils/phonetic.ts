import * as levenshtein from 'fast-levenshtein';

const SOUNDEX_CODES: Record<string, string> = {
  b: '1', f: '1', p: '1', v: '1',
  c: '2', g: '2', j: '2', k: '2', q: '2', s: '2', x: '2', z: '2',
  d: '3', t: '3',
  l: '4',
  m: '5', n: '5',
  r: '6',
};

/**
 * American Soundex ("broccoli" and "brocoli" both -> B624).
 * Returns '' for input without letters.
 */
export function soundex(word: string): string {
  const letters = String(word || '').toLowerCase().replace(/[^a-z]/g, '');
  if (!letters) return '';

  let code = letters[0].toUpperCase();
  let prev = SOUNDEX_CODES[letters[0]] ?? '';

  for (let i = 1; i < letters.length && code.length < 4; i += 1) {
    const ch = letters[i];
    const digit = SOUNDEX_CODES[ch];
    if (digit) {
      if (digit !== prev) code += digit;
      prev = digit;
    } else if (ch !== 'h' && ch !== 'w') {
      // vowels separate repeated codes; h / w do not
      prev = '';
    }
  }

  return code.padEnd(4, '0');
}

/**
 * Computes similarity score between 0 and 1.
 * 1 = identical, 0 = nothing in common.
 */
export function editSimilarity(a: string, b: string): number {
  const normalizedA = a.toLowerCase();
  const normalizedB = b.toLowerCase();

  if (normalizedA === normalizedB) return 1.0;
  if (!normalizedA || !normalizedB) return 0.0;

  const distance = levenshtein.get(normalizedA, normalizedB);
  const maxLength = Math.max(normalizedA.length, normalizedB.length);
  return 1.0 - distance / maxLength;
}

export type SoundsLike = { similarity: number; soundexEqual: boolean };

/**
 * Best sound-alike comparison of a phrase against a catalog name, comparing both the whole phrase and
 * word pairs (so "brocoli" finds "broccoli" inside "tenderstem broccoli").
 */
export function bestSoundsLike(phrase: string, phraseWords: string[], name: string, nameWords: string[]): SoundsLike {
  let best: SoundsLike = {
    similarity: editSimilarity(phrase, name),
    soundexEqual: soundex(phrase) !== '' && soundex(phrase) === soundex(name),
  };

  for (const p of phraseWords) {
    if (p.length < 3) continue;
    for (const n of nameWords) {
      const similarity = editSimilarity(p, n);
      const soundexEqual = soundex(p) === soundex(n);
      if (similarity > best.similarity || (similarity === best.similarity && soundexEqual)) {
        best = { similarity, soundexEqual };
      }
    }
  }

  return best;
}
