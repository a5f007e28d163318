/**
 * Gap collector contract
 *
 * Every signal source implements GapCollector. Collectors run concurrently;
 * one that rejects contributes nothing and is recorded as a failure so the
 * rest of the run completes.
 */

import type { CollectionFailure, Gap, GapSource } from '../../types/index.js';
import { CollectionFailureError } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';

export interface GapCollector {
  readonly source: GapSource;
  collect(): Promise<Gap[]>;
}

export interface CollectorRun {
  batches: Record<GapSource, Gap[]>;
  failures: CollectionFailure[];
  /** Sources whose collector finished */
  succeeded: GapSource[];
}

export async function runCollectors(collectors: readonly GapCollector[]): Promise<CollectorRun> {
  const batches: Record<GapSource, Gap[]> = {
    CodeChange: [],
    Community: [],
    Staleness: [],
    SearchAnalytics: [],
  };
  const failures: CollectionFailure[] = [];
  const succeeded: GapSource[] = [];

  const settled = await Promise.allSettled(collectors.map((collector) => collector.collect()));

  settled.forEach((outcome, index) => {
    const { source } = collectors[index];
    if (outcome.status === 'fulfilled') {
      batches[source] = [...batches[source], ...outcome.value];
      succeeded.push(source);
      logger.debug(`${source}: ${outcome.value.length} candidate gap(s)`);
    } else {
      const message = outcome.reason instanceof Error ? outcome.reason.message : String(outcome.reason);
      failures.push({ source, message });
      // Collection failures already name their source
      logger.warning(
        outcome.reason instanceof CollectionFailureError ? message : `${source} collection failed: ${message}`
      );
    }
  });

  return { batches, failures, succeeded };
}
