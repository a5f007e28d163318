/**
 * Gap aggregator
 *
 * Merges the four collector batches into one prioritized backlog. Gaps whose
 * normalized titles match are merged across sources; the merged score is the
 * sum of the per-source scores, so corroborated gaps rise. Duplicates from
 * one source keep the best candidate and pool their evidence. Pure and
 * deterministic: the clock is never read here.
 */

import type {
  CollectionFailure,
  DocType,
  Gap,
  GapPriority,
  GapReport,
  GapSource,
  GapSummary,
} from '../../types/index.js';
import { BASE_WEIGHTS, gapId, normalizeTitle, priorityFor, round2 } from './gap-scoring.js';

// ============================================================================
// HELPER FUNCTIONS
// ============================================================================

function byWeightDesc(a: GapSource, b: GapSource): number {
  return BASE_WEIGHTS[b] - BASE_WEIGHTS[a];
}

/** Higher score wins; on a tie the older detection wins */
function isBetter(candidate: Gap, current: Gap): boolean {
  if (candidate.score !== current.score) return candidate.score > current.score;
  return candidate.detectedAt < current.detectedAt;
}

export function compareGaps(a: Gap, b: Gap): number {
  if (a.score !== b.score) return b.score - a.score;
  if (a.detectedAt !== b.detectedAt) return a.detectedAt < b.detectedAt ? -1 : 1;
  if (a.id === b.id) return 0;
  return a.id < b.id ? -1 : 1;
}

function mergeGroup(key: string, perSource: Map<GapSource, Gap>): Gap {
  const sources = [...perSource.keys()].sort(byWeightDesc);
  const candidates = sources.flatMap((source) => {
    const gap = perSource.get(source);
    return gap ? [gap] : [];
  });
  const [primary] = candidates;

  if (candidates.length === 1) {
    return { ...primary, id: gapId(primary.source, key), sources: [primary.source] };
  }

  const score = round2(candidates.reduce((sum, gap) => sum + gap.score, 0));
  const detectedAt = candidates
    .map((gap) => gap.detectedAt)
    .reduce((earliest, value) => (value < earliest ? value : earliest));

  return {
    ...primary,
    id: gapId(primary.source, key),
    sources,
    score,
    priority: priorityFor(score),
    detectedAt,
    evidence: [...new Set(candidates.flatMap((gap) => gap.evidence))],
    contributions: candidates.flatMap((gap) => gap.contributions),
  };
}

// ============================================================================
// PUBLIC API
// ============================================================================

/**
 * Deduplicate, merge and rank the collector batches
 */
export function aggregate(
  codeChangeGaps: readonly Gap[],
  communityGaps: readonly Gap[],
  stalenessGaps: readonly Gap[],
  searchGaps: readonly Gap[]
): Gap[] {
  const groups = new Map<string, Map<GapSource, Gap>>();

  for (const gap of [...codeChangeGaps, ...communityGaps, ...stalenessGaps, ...searchGaps]) {
    const key = normalizeTitle(gap.title);
    let perSource = groups.get(key);
    if (!perSource) {
      perSource = new Map();
      groups.set(key, perSource);
    }
    const current = perSource.get(gap.source);
    if (!current) {
      perSource.set(gap.source, gap);
    } else {
      const [kept, dropped] = isBetter(gap, current) ? [gap, current] : [current, gap];
      perSource.set(gap.source, { ...kept, evidence: [...new Set([...kept.evidence, ...dropped.evidence])] });
    }
  }

  return [...groups.entries()].map(([key, perSource]) => mergeGroup(key, perSource)).sort(compareGaps);
}

export function summarizeGaps(gaps: readonly Gap[]): GapSummary {
  const byPriority: Record<GapPriority, number> = { high: 0, medium: 0, low: 0 };
  const bySource: Partial<Record<GapSource, number>> = {};
  const byDocType: Partial<Record<DocType, number>> = {};

  for (const gap of gaps) {
    byPriority[gap.priority] += 1;
    bySource[gap.source] = (bySource[gap.source] ?? 0) + 1;
    byDocType[gap.suggestedDocType] = (byDocType[gap.suggestedDocType] ?? 0) + 1;
  }

  return { totalGaps: gaps.length, byPriority, bySource, byDocType };
}

export interface GapReportInput {
  gaps: Gap[];
  generatedAt: Date;
  sinceDays: number;
  sourcesAnalyzed: GapSource[];
  collectionFailures: CollectionFailure[];
}

export function buildGapReport(input: GapReportInput): GapReport {
  return {
    generatedAt: input.generatedAt.toISOString(),
    sinceDays: input.sinceDays,
    sourcesAnalyzed: [...input.sourcesAnalyzed].sort(byWeightDesc),
    collectionFailures: input.collectionFailures,
    summary: summarizeGaps(input.gaps),
    gaps: input.gaps,
  };
}
