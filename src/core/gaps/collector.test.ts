/**
 * Tests for concurrent collector runs
 */

import { describe, it, expect, vi } from 'vitest';
import { runCollectors, type GapCollector } from './collector.js';
import { createGap } from './gap-scoring.js';
import { errors } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';

vi.mock('../../utils/logger.js', () => ({
  logger: {
    warning: vi.fn(),
    debug: vi.fn(),
  },
}));

const now = new Date('2026-04-01T00:00:00.000Z');

const codeGap = createGap(
  {
    source: 'CodeChange',
    title: 'Document endpoint GET /orders',
    description: 'Undocumented endpoint in src/routes/orders.ts',
    suggestedDocType: 'reference',
    category: 'api',
    detectedAt: now,
    volume: 1,
    evidence: ['src/routes/orders.ts'],
  },
  now
);

describe('runCollectors', () => {
  it('should keep successful batches and record failures', async () => {
    const collectors: GapCollector[] = [
      { source: 'CodeChange', collect: async () => [codeGap] },
      {
        source: 'Community',
        collect: async () => {
          throw new Error('feed down');
        },
      },
    ];

    const run = await runCollectors(collectors);

    expect(run.batches.CodeChange).toEqual([codeGap]);
    expect(run.batches.Community).toEqual([]);
    expect(run.batches.Staleness).toEqual([]);
    expect(run.failures).toEqual([{ source: 'Community', message: 'feed down' }]);
    expect(run.succeeded).toEqual(['CodeChange']);
    expect(logger.warning).toHaveBeenCalledWith('Community collection failed: feed down');
  });

  it('should not repeat the source for collection failures', async () => {
    const run = await runCollectors([
      {
        source: 'SearchAnalytics',
        collect: () => Promise.reject(errors.collectionFailed('Search analytics', 'export missing')),
      },
    ]);

    expect(run.failures).toEqual([
      { source: 'SearchAnalytics', message: 'Search analytics collection failed: export missing' },
    ]);
    expect(logger.warning).toHaveBeenCalledWith('Search analytics collection failed: export missing');
  });

  it('should record non-Error rejections', async () => {
    const run = await runCollectors([{ source: 'SearchAnalytics', collect: () => Promise.reject('bad export') }]);

    expect(run.failures).toEqual([{ source: 'SearchAnalytics', message: 'bad export' }]);
    expect(run.succeeded).toEqual([]);
  });

  it('should complete with no collectors', async () => {
    const run = await runCollectors([]);

    expect(run.failures).toEqual([]);
    expect(run.succeeded).toEqual([]);
  });
});
