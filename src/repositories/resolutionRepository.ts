import type { StoredResolution } from '../services/orderLines/types';

export interface ResolutionRepository {
  save(resolution: StoredResolution): Promise<void>;
  findById(id: string): Promise<StoredResolution | null>;
  markConsumed(id: string, consumption: NonNullable<StoredResolution['consumption']>): Promise<StoredResolution>;
  listConsumed(): Promise<StoredResolution[]>;
  /** Drops results nobody confirmed that were created before `cutoff`; consumed ones are the audit trail. */
  deleteUnconsumedBefore(cutoff: Date): Promise<number>;
}

export function createInMemoryResolutionRepository(): ResolutionRepository {
  const resolutions = new Map<string, StoredResolution>();

  return {
    async save(resolution) {
      resolutions.set(resolution.id, { ...resolution });
    },

    async findById(id) {
      const found = resolutions.get(id);
      return found ? { ...found } : null;
    },

    async markConsumed(id, consumption) {
      const found = resolutions.get(id);
      if (!found) throw new Error(`[ResolutionRepository] Unknown resolution ${id}`);
      const updated = { ...found, consumption: { ...consumption } };
      resolutions.set(id, updated);
      return { ...updated };
    },

    async listConsumed() {
      return Array.from(resolutions.values())
        .filter((r) => r.consumption !== null)
        .map((r) => ({ ...r }));
    },

    async deleteUnconsumedBefore(cutoff) {
      let deleted = 0;
      for (const [id, r] of resolutions) {
        if (r.consumption === null && r.createdAt < cutoff) {
          resolutions.delete(id);
          deleted += 1;
        }
      }
      return deleted;
    },
  };
}
