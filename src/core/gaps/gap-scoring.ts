/**
 * Gap scoring
 *
 * Linear, auditable scoring shared by every collector and the aggregator:
 * score = base weight of the source + recency bonus + volume bonus.
 * Priority bands are fixed reporting constants, not policy settings.
 */

import { createHash } from 'node:crypto';
import type { DocType, Gap, GapPriority, GapSource, ScoreContribution } from '../../types/index.js';

// ============================================================================
// CONSTANTS
// ============================================================================

/** Code-derived gaps are structurally certain; staleness is the weakest signal */
export const BASE_WEIGHTS: Readonly<Record<GapSource, number>> = {
  CodeChange: 45,
  SearchAnalytics: 30,
  Community: 20,
  Staleness: 10,
};

export const RECENCY_WINDOW_DAYS = 30;
export const RECENCY_POINTS_PER_DAY = 0.25;
export const VOLUME_CAP = 40;
export const VOLUME_POINTS = 0.5;

export const PRIORITY_CUTOFFS = {
  high: 50,
  medium: 30,
} as const;

const ID_PREFIXES: Readonly<Record<GapSource, string>> = {
  CodeChange: 'CODE',
  SearchAnalytics: 'SRCH',
  Community: 'COMM',
  Staleness: 'STALE',
};

const MS_PER_DAY = 24 * 60 * 60 * 1000;

// ============================================================================
// TYPES
// ============================================================================

/** What a collector knows about a gap before scoring */
export interface GapDraft {
  source: GapSource;
  title: string;
  description: string;
  suggestedDocType: DocType;
  category: string;
  detectedAt: Date;
  volume: number;
  evidence: string[];
}

// ============================================================================
// SCORING
// ============================================================================

export function round2(value: number): number {
  return Math.round(value * 100) / 100;
}

/**
 * Whole days between detection and `now`; never negative
 */
export function ageInDays(detectedAt: Date, now: Date): number {
  return Math.max(0, Math.floor((now.getTime() - detectedAt.getTime()) / MS_PER_DAY));
}

export function scoreContribution(
  source: GapSource,
  detectedAt: Date,
  volume: number,
  now: Date
): ScoreContribution {
  const age = ageInDays(detectedAt, now);
  return {
    source,
    baseWeight: BASE_WEIGHTS[source],
    recencyBonus: round2(Math.max(0, RECENCY_WINDOW_DAYS - age) * RECENCY_POINTS_PER_DAY),
    volumeBonus: round2(Math.min(Math.max(volume, 0), VOLUME_CAP) * VOLUME_POINTS),
  };
}

export function contributionTotal(contribution: ScoreContribution): number {
  return round2(contribution.baseWeight + contribution.recencyBonus + contribution.volumeBonus);
}

export function priorityFor(score: number): GapPriority {
  if (score >= PRIORITY_CUTOFFS.high) return 'high';
  if (score >= PRIORITY_CUTOFFS.medium) return 'medium';
  return 'low';
}

// ============================================================================
// IDENTITY
// ============================================================================

/**
 * Dedup key: lowercase, punctuation stripped, whitespace collapsed
 */
export function normalizeTitle(title: string): string {
  return title
    .toLowerCase()
    .replace(/[^\p{L}\p{N}\s]/gu, '')
    .replace(/\s+/g, ' ')
    .trim();
}

/**
 * Stable id from the source and the dedup key
 */
export function gapId(source: GapSource, dedupKey: string): string {
  const digest = createHash('sha256').update(`${source}\u0000${dedupKey}`).digest('hex');
  return `${ID_PREFIXES[source]}-${digest.slice(0, 10)}`;
}

/**
 * Score a collector draft into a single-source Gap
 */
export function createGap(draft: GapDraft, now: Date): Gap {
  const contribution = scoreContribution(draft.source, draft.detectedAt, draft.volume, now);
  const score = contributionTotal(contribution);
  return {
    id: gapId(draft.source, normalizeTitle(draft.title)),
    source: draft.source,
    sources: [draft.source],
    title: draft.title,
    description: draft.description,
    suggestedDocType: draft.suggestedDocType,
    category: draft.category,
    priority: priorityFor(score),
    score,
    detectedAt: draft.detectedAt.toISOString(),
    volume: draft.volume,
    evidence: [...draft.evidence],
    contributions: [contribution],
  };
}
