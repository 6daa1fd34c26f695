import { describe, it, expect } from 'vitest';
import { bestSoundsLike, editSimilarity, soundex } from '../../../src/utils/phonetic';

describe('soundex', () => {
  it('codes common names', () => {
    expect(soundex('Robert')).toBe('R163');
    expect(soundex('Ashcraft')).toBe('A261');
    expect(soundex('Pfister')).toBe('P236');
    expect(soundex('Tymczak')).toBe('T522');
  });

  it('codes produce misspellings alike', () => {
    expect(soundex('brocoli')).toBe('B624');
    expect(soundex('broccoli')).toBe('B624');
  });

  it('returns empty for input without letters', () => {
    expect(soundex('123')).toBe('');
  });
});

describe('editSimilarity', () => {
  it('is 1 for identical strings and 0 against empty', () => {
    expect(editSimilarity('Kale', 'kale')).toBe(1);
    expect(editSimilarity('', 'kale')).toBe(0);
  });

  it('scales the edit distance by the longer string', () => {
    expect(editSimilarity('brocoli', 'broccoli')).toBe(0.875);
  });
});

describe('bestSoundsLike', () => {
  it('compares word pairs inside longer names', () => {
    const best = bestSoundsLike('brocoli', ['brocoli'], 'tenderstem broccoli', ['tenderstem', 'broccoli']);
    expect(best).toEqual({ similarity: 0.875, soundexEqual: true });
  });
});
