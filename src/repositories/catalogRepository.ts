import type { CatalogEntryInput } from '../services/catalog/types';

/** Source of catalog records for index rebuilds; the product catalog's CRUD layer owns the data. */
export interface CatalogRepository {
  listAll(): Promise<CatalogEntryInput[]>;
}

export type InMemoryCatalogRepository = CatalogRepository & {
  replaceAll(entries: CatalogEntryInput[]): void;
  upsert(entry: CatalogEntryInput): void;
};

export function createInMemoryCatalogRepository(seed: CatalogEntryInput[] = []): InMemoryCatalogRepository {
  let entries = seed.map((e) => ({ ...e }));

  return {
    async listAll() {
      return entries.map((e) => ({ ...e }));
    },

    replaceAll(next) {
      entries = next.map((e) => ({ ...e }));
    },

    upsert(entry) {
      const idx = entries.findIndex((e) => e.id === entry.id);
      if (idx >= 0) entries[idx] = { ...entry };
      else entries.push({ ...entry });
    },
  };
}
