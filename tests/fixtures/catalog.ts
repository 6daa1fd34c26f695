import { CatalogIndex } from '../../src/services/catalog/catalogIndex';
import type { CatalogEntryInput } from '../../src/services/catalog/types';

export const CATALOG: CatalogEntryInput[] = [
  { id: 'rosemary-200g', canonicalName: 'Rosemary (200g packet)', unit: 'packet', basePrice: 18.5, category: 'herbs' },
  { id: 'tomatoes', canonicalName: 'Tomatoes', unit: 'kg', basePrice: 20, marketVolatility: 'volatile' },
  { id: 'cherry-tomatoes', canonicalName: 'Cherry Tomatoes', unit: 'punnet', basePrice: 16 },
  { id: 'cocktail-tomatoes', canonicalName: 'Cocktail Tomatoes', unit: 'kg', basePrice: 32 },
  { id: 'broccoli', canonicalName: 'Broccoli', unit: 'head', basePrice: 12 },
  { id: 'carrots-10kg', canonicalName: 'Carrots (10kg bag)', unit: 'kg', basePrice: 11.5 },
  { id: 'aubergine', canonicalName: 'Aubergine', unit: 'each', basePrice: 7.5 },
  { id: 'coriander', canonicalName: 'Coriander (bunch)', unit: 'bunch', basePrice: 9, category: 'herbs' },
];

export function buildIndex(entries: CatalogEntryInput[] = CATALOG): CatalogIndex {
  return CatalogIndex.build(entries, new Date('2026-03-01T00:00:00.000Z'));
}
