import { describe, it, expect } from 'vitest';
import { normalizeDescriptor, parseDecimal, splitCatalogName } from '../../../../src/services/catalog/normalize';
import {
  areUnitsCompatible,
  canonicalizeUnit,
  convertQuantity,
  mapUnitCategory,
} from '../../../../src/services/catalog/unitCategory';

describe('splitCatalogName', () => {
  it('splits the packaging parenthetical', () => {
    expect(splitCatalogName('Rosemary (200g packet)')).toEqual({
      coreName: 'rosemary',
      descriptors: ['200g', 'packet'],
      containerWords: ['packet'],
    });
  });

  it('joins a spaced number and unit', () => {
    expect(splitCatalogName('Carrots (10 kg bag)').descriptors).toEqual(['10kg', 'bag']);
  });

  it('keeps decimal descriptors intact', () => {
    expect(splitCatalogName('Olive Oil (1,5l tin)').descriptors).toEqual(['1.5l', 'tin']);
  });

  it('handles names without a parenthetical', () => {
    expect(splitCatalogName('Cherry Tomatoes')).toEqual({ coreName: 'cherry tomatoes', descriptors: [], containerWords: [] });
  });
});

describe('normalizeDescriptor / parseDecimal', () => {
  it('writes number+unit fragments one way', () => {
    expect(normalizeDescriptor('200G')).toBe('200g');
    expect(normalizeDescriptor('2kgs')).toBe('2kg');
    expect(normalizeDescriptor('Bag')).toBe('bag');
  });

  it('accepts decimal commas', () => {
    expect(parseDecimal('1,5')).toBe(1.5);
    expect(parseDecimal('2')).toBe(2);
    expect(parseDecimal('2kg')).toBeNull();
  });
});

describe('units', () => {
  it('canonicalizes abbreviations and plurals', () => {
    expect(canonicalizeUnit('pkt')).toBe('packet');
    expect(canonicalizeUnit('KGS')).toBe('kg');
    expect(canonicalizeUnit('pcs')).toBe('piece');
    expect(canonicalizeUnit('  ')).toBeNull();
  });

  it('converts within a measure and refuses across', () => {
    expect(convertQuantity(2500, 'g', 'kg')).toBe(2.5);
    expect(convertQuantity(1.5, 'l', 'ml')).toBe(1500);
    expect(convertQuantity(2, 'kg', 'l')).toBeNull();
    expect(convertQuantity(2, 'bag', 'kg')).toBeNull();
    expect(convertQuantity(3, 'each', 'each')).toBe(3);
  });

  it('groups compatible units', () => {
    expect(areUnitsCompatible('pcs', 'each')).toBe(true);
    expect(areUnitsCompatible('bag', 'packet')).toBe(true);
    expect(areUnitsCompatible('bag', 'kg')).toBe(false);
  });

  it('maps categories', () => {
    expect(mapUnitCategory('grams')).toBe('WEIGHT');
    expect(mapUnitCategory('ml')).toBe('VOLUME');
    expect(mapUnitCategory('punnet')).toBe('UNIT');
  });
});
