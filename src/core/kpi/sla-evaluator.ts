/**
 * KPI/SLA evaluator
 *
 * Compares a KPI snapshot against the policy pack's thresholds and, when a
 * previous snapshot is given, against its quality score. Every check runs;
 * breaches are reported together. Never throws.
 */

import type { KPISnapshot, SLAVerdict, SlaThresholds } from '../../types/index.js';
import { stalePercentage } from './kpi-snapshot.js';

export const SLA_SUMMARIES = {
  ok: 'KPI SLA check passed.',
  breach: 'SLA thresholds breached.',
} as const;

/** Integers print bare; fractional values keep up to two decimals */
export function formatNumber(value: number): string {
  return Number.isInteger(value) ? String(value) : String(Math.round(value * 100) / 100);
}

export function evaluateSla(
  current: KPISnapshot,
  previous: KPISnapshot | null,
  thresholds: SlaThresholds
): SLAVerdict {
  const breaches: string[] = [];
  const trendNotes: string[] = [];

  const quality = current.qualityScore;
  const stalePct = stalePercentage(current);
  const highGaps = current.highPriorityGaps;

  if (quality < thresholds.minQualityScore) {
    breaches.push(`Quality score breach: ${formatNumber(quality)} < ${formatNumber(thresholds.minQualityScore)}.`);
  }

  if (stalePct > thresholds.maxStalePct) {
    breaches.push(`Stale docs breach: ${stalePct.toFixed(1)}% > ${thresholds.maxStalePct.toFixed(1)}%.`);
  }

  if (highGaps > thresholds.maxHighPriorityGaps) {
    breaches.push(
      `High-priority gap breach: ${formatNumber(highGaps)} > ${formatNumber(thresholds.maxHighPriorityGaps)}.`
    );
  }

  let qualityScoreDelta: number | null = null;
  if (previous) {
    qualityScoreDelta = quality - previous.qualityScore;
    const drop = previous.qualityScore - quality;
    if (drop > thresholds.maxQualityScoreDrop) {
      breaches.push(
        `Quality trend breach: dropped by ${formatNumber(drop)} points ` +
          `(max allowed ${formatNumber(thresholds.maxQualityScoreDrop)}).`
      );
    }
    trendNotes.push(
      `Quality score trend: previous ${formatNumber(previous.qualityScore)}, current ${formatNumber(quality)}.`
    );
  }

  const status = breaches.length > 0 ? 'BREACH' : 'OK';

  return {
    status,
    summary: status === 'BREACH' ? SLA_SUMMARIES.breach : SLA_SUMMARIES.ok,
    breaches,
    trendNotes,
    metrics: {
      qualityScore: quality,
      stalePct: Math.round(stalePct * 10) / 10,
      highPriorityGaps: highGaps,
      qualityScoreDelta,
    },
  };
}
