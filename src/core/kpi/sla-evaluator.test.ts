/**
 * Tests for the KPI/SLA evaluator
 */

import { describe, it, expect } from 'vitest';
import type { KPISnapshot, SlaThresholds } from '../../types/index.js';
import { evaluateSla, formatNumber } from './sla-evaluator.js';

const THRESHOLDS: SlaThresholds = {
  minQualityScore: 80,
  maxStalePct: 15.0,
  maxHighPriorityGaps: 8,
  maxQualityScoreDrop: 5,
};

function makeSnapshot(overrides: Partial<KPISnapshot>): KPISnapshot {
  return {
    qualityScore: 90,
    totalDocs: 20,
    docsWithFrontmatter: 20,
    staleDocs: 0,
    openGaps: 0,
    highPriorityGaps: 0,
    generatedAt: '2026-04-01T00:00:00.000Z',
    notes: [],
    ...overrides,
  };
}

describe('evaluateSla', () => {
  it('should report three breaches for a low, stale, regressing snapshot', () => {
    const verdict = evaluateSla(
      makeSnapshot({ qualityScore: 79, staleDocs: 1, totalDocs: 2, highPriorityGaps: 2 }),
      makeSnapshot({ qualityScore: 88 }),
      THRESHOLDS
    );

    expect(verdict).toEqual({
      status: 'BREACH',
      summary: 'SLA thresholds breached.',
      breaches: [
        'Quality score breach: 79 < 80.',
        'Stale docs breach: 50.0% > 15.0%.',
        'Quality trend breach: dropped by 9 points (max allowed 5).',
      ],
      trendNotes: ['Quality score trend: previous 88, current 79.'],
      metrics: { qualityScore: 79, stalePct: 50, highPriorityGaps: 2, qualityScoreDelta: -9 },
    });
  });

  it('should pass a healthy snapshot without a previous one', () => {
    const verdict = evaluateSla(makeSnapshot({}), null, THRESHOLDS);

    expect(verdict.status).toBe('OK');
    expect(verdict.summary).toBe('KPI SLA check passed.');
    expect(verdict.breaches).toEqual([]);
    expect(verdict.trendNotes).toEqual([]);
    expect(verdict.metrics.qualityScoreDelta).toBeNull();
  });

  it('should flag too many high-priority gaps', () => {
    const verdict = evaluateSla(makeSnapshot({ highPriorityGaps: 9 }), null, THRESHOLDS);

    expect(verdict.breaches).toEqual(['High-priority gap breach: 9 > 8.']);
  });

  it('should treat thresholds as inclusive limits', () => {
    const verdict = evaluateSla(
      makeSnapshot({ qualityScore: 80, staleDocs: 3, totalDocs: 20, highPriorityGaps: 8 }),
      makeSnapshot({ qualityScore: 85 }),
      THRESHOLDS
    );

    expect(verdict.status).toBe('OK');
    expect(verdict.trendNotes).toEqual(['Quality score trend: previous 85, current 80.']);
  });

  it('should not breach when quality improves', () => {
    const verdict = evaluateSla(makeSnapshot({ qualityScore: 95 }), makeSnapshot({ qualityScore: 80 }), THRESHOLDS);

    expect(verdict.status).toBe('OK');
    expect(verdict.metrics.qualityScoreDelta).toBe(15);
  });

  it('should use 0% stale for an empty inventory', () => {
    const verdict = evaluateSla(makeSnapshot({ totalDocs: 0, staleDocs: 0 }), null, THRESHOLDS);

    expect(verdict.metrics.stalePct).toBe(0);
    expect(verdict.status).toBe('OK');
  });

  it('should format fractional thresholds', () => {
    const verdict = evaluateSla(makeSnapshot({ qualityScore: 80 }), null, { ...THRESHOLDS, minQualityScore: 82.5 });

    expect(verdict.breaches).toEqual(['Quality score breach: 80 < 82.5.']);
  });
});

describe('formatNumber', () => {
  it('should print integers bare and round fractions to two places', () => {
    expect(formatNumber(8)).toBe('8');
    expect(formatNumber(15.0)).toBe('15');
    expect(formatNumber(2 / 3)).toBe('0.67');
  });
});
