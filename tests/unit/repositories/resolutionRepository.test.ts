import { describe, it, expect } from 'vitest';
import { createInMemoryResolutionRepository } from '../../../src/repositories/resolutionRepository';
import type { StoredResolution } from '../../../src/services/orderLines/types';

const T0 = new Date('2026-03-02T08:00:00.000Z');

function stored(id: string, createdAt: Date): StoredResolution {
  return {
    id,
    source: 'text',
    result: {
      parsedLine: { rawText: 'kale', quantity: 1, quantitySource: 'default', unitToken: null, descriptorTokens: [], productTokens: ['kale'] },
      bestMatch: null,
      suggestions: [],
      decisionTier: 'none',
      requiresConfirmation: true,
    },
    invoiceUnitPrice: null,
    createdAt,
    consumption: null,
  };
}

describe('createInMemoryResolutionRepository', () => {
  it('deletes only unconsumed results created before the cutoff', async () => {
    const repo = createInMemoryResolutionRepository();
    await repo.save(stored('old', T0));
    await repo.save(stored('old-confirmed', T0));
    await repo.save(stored('fresh', new Date(T0.getTime() + 60_000)));
    await repo.markConsumed('old-confirmed', { orderLineId: 'line-1', chosenProductId: 'kale', decidedBy: 'human', consumedAt: T0 });

    expect(await repo.deleteUnconsumedBefore(new Date(T0.getTime() + 1))).toBe(1);
    expect(await repo.findById('old')).toBeNull();
    expect((await repo.findById('old-confirmed'))?.consumption?.orderLineId).toBe('line-1');
    expect(await repo.findById('fresh')).not.toBeNull();
  });
});
