import { logger as defaultLogger, type Logger } from '../../infrastructure/logger';
import type { CatalogRepository } from '../../repositories/catalogRepository';
import { CatalogIndex } from './catalogIndex';

/**
 * Holds the current CatalogIndex snapshot. Readers always get a complete index: rebuilds build aside and
 * swap the reference in one assignment, and a failed rebuild leaves the previous snapshot in place.
 */
export class CatalogIndexHolder {
  private index: CatalogIndex;
  private rebuilding: Promise<CatalogIndex> | null = null;

  constructor(
    private readonly catalogRepository: CatalogRepository,
    initial: CatalogIndex = CatalogIndex.empty(),
    private readonly log: Logger = defaultLogger
  ) {
    this.index = initial;
  }

  current(): CatalogIndex {
    return this.index;
  }

  swap(next: CatalogIndex): void {
    this.index = next;
  }

  /** Concurrent callers share one in-flight rebuild. */
  async rebuild(): Promise<CatalogIndex> {
    if (this.rebuilding) return this.rebuilding;

    this.rebuilding = this.doRebuild();
    try {
      return await this.rebuilding;
    } finally {
      this.rebuilding = null;
    }
  }

  private async doRebuild(): Promise<CatalogIndex> {
    const startedAt = Date.now();
    const previous = this.index;
    try {
      const records = await this.catalogRepository.listAll();
      const next = CatalogIndex.build(records);
      this.swap(next);
      this.log.info(
        {
          event: 'catalog_index.rebuilt',
          entries: next.size,
          units: next.unitVocabulary().size,
          previousEntries: previous.size,
          durationMs: Date.now() - startedAt,
        },
        '[CatalogIndex] Rebuilt'
      );
      return next;
    } catch (err) {
      this.log.error(
        { event: 'catalog_index.rebuild_failed', err, keptEntries: previous.size },
        '[CatalogIndex] Rebuild failed; keeping previous snapshot'
      );
      throw err;
    }
  }
}
