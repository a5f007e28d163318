/**
 * KPI snapshot
 *
 * Builds the documentation scorecard from the docs inventory and the latest
 * gap report, and reads snapshots back for SLA evaluation. Snapshot files are
 * camelCase; the older snake_case keys are accepted as aliases.
 */

import { readFile } from 'node:fs/promises';
import type { DocumentRecord, KPISnapshot } from '../../types/index.js';
import { errors } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import { isStale } from '../docs/doc-inventory.js';
import { isRecord } from '../policy/policy-pack.js';

// ============================================================================
// CONSTANTS
// ============================================================================

/** Frontmatter fields every page should carry */
export const REQUIRED_METADATA_FIELDS = ['title', 'description', 'content_type'] as const;

const METADATA_PENALTY = 0.35;
const STALE_PENALTY = 0.3;
const HIGH_GAP_PENALTY = 3;
const HIGH_GAP_PENALTY_CAP = 25;

// ============================================================================
// TYPES
// ============================================================================

export interface GapCounts {
  total: number;
  high: number;
}

export interface KpiSnapshotInput {
  documents: readonly DocumentRecord[];
  gapCounts: GapCounts;
  staleDays: number;
  now: Date;
  notes?: string[];
}

// ============================================================================
// SCORING
// ============================================================================

function round1(value: number): number {
  return Math.round(value * 10) / 10;
}

/** Ties go to the even neighbour: 10.5 -> 10, 11.5 -> 12 */
export function roundHalfEven(value: number): number {
  const floor = Math.floor(value);
  const fraction = value - floor;
  if (fraction > 0.5) return floor + 1;
  if (fraction < 0.5) return floor;
  return floor % 2 === 0 ? floor : floor + 1;
}

function isPresent(value: unknown): boolean {
  if (value === undefined || value === null || value === false) return false;
  if (typeof value === 'string') return value.trim() !== '';
  if (Array.isArray(value)) return value.length > 0;
  return true;
}

/**
 * 100 minus weighted penalties for missing metadata, stale pages and
 * high-priority gaps, clamped to 0..100
 */
export function computeQualityScore(metadataPct: number, stalePct: number, highGaps: number): number {
  let score = 100;
  score -= roundHalfEven((100 - metadataPct) * METADATA_PENALTY);
  score -= roundHalfEven(stalePct * STALE_PENALTY);
  score -= Math.min(highGaps * HIGH_GAP_PENALTY, HIGH_GAP_PENALTY_CAP);
  return Math.max(0, Math.min(100, score));
}

/** Stale share of all documents; 0 for an empty inventory */
export function stalePercentage(snapshot: Pick<KPISnapshot, 'staleDocs' | 'totalDocs'>): number {
  return snapshot.totalDocs > 0 ? (snapshot.staleDocs / snapshot.totalDocs) * 100 : 0;
}

export function debtTrendNote(counts: GapCounts): string {
  if (counts.total === 0) return 'No active gaps in the latest report.';
  if (counts.high === 0) return `${counts.total} total gaps, no high-priority gaps.`;
  return `${counts.total} total gaps, ${counts.high} high-priority gaps need SLA attention.`;
}

export function buildKpiSnapshot(input: KpiSnapshotInput): KPISnapshot {
  const { documents, gapCounts, staleDays, now } = input;

  let docsWithFrontmatter = 0;
  let requiredTotal = 0;
  let requiredPresent = 0;
  let staleDocs = 0;

  for (const doc of documents) {
    if (!doc.hasFrontmatter) continue;
    docsWithFrontmatter += 1;
    for (const field of REQUIRED_METADATA_FIELDS) {
      requiredTotal += 1;
      if (isPresent(doc.frontmatter[field])) requiredPresent += 1;
    }
    if (isStale(doc, now, staleDays)) staleDocs += 1;
  }

  const metadataPct = requiredTotal > 0 ? (requiredPresent / requiredTotal) * 100 : 0;
  const stalePct = stalePercentage({ staleDocs, totalDocs: documents.length });

  return {
    qualityScore: computeQualityScore(metadataPct, stalePct, gapCounts.high),
    totalDocs: documents.length,
    docsWithFrontmatter,
    staleDocs,
    openGaps: gapCounts.total,
    highPriorityGaps: gapCounts.high,
    generatedAt: now.toISOString(),
    metadataCompletenessPct: round1(metadataPct),
    notes: [debtTrendNote(gapCounts), ...(input.notes ?? [])],
  };
}

// ============================================================================
// READING
// ============================================================================

/**
 * Open and high-priority gap counts from a gap report. A missing or
 * unreadable report counts as no gaps.
 */
export function countGaps(report: unknown): GapCounts {
  if (!isRecord(report) || !Array.isArray(report.gaps)) {
    return { total: 0, high: 0 };
  }
  const gaps: unknown[] = report.gaps;
  const high = gaps.filter(
    (gap) => isRecord(gap) && typeof gap.priority === 'string' && gap.priority.toLowerCase() === 'high'
  ).length;
  return { total: gaps.length, high };
}

export async function readGapCounts(path: string): Promise<GapCounts> {
  let content: string;
  try {
    content = await readFile(path, 'utf-8');
  } catch (error) {
    logger.warning(`Gap report ${path} not readable; counting no gaps (${error instanceof Error ? error.message : String(error)})`);
    return { total: 0, high: 0 };
  }
  try {
    return countGaps(JSON.parse(content));
  } catch (error) {
    logger.warning(`Gap report ${path} is not valid JSON; counting no gaps (${error instanceof Error ? error.message : String(error)})`);
    return { total: 0, high: 0 };
  }
}

function pick(data: Record<string, unknown>, keys: readonly string[]): unknown {
  for (const key of keys) {
    if (data[key] !== undefined && data[key] !== null) return data[key];
  }
  return undefined;
}

/**
 * Validate snapshot JSON. `source` names the file in errors.
 */
export function parseKpiSnapshot(data: unknown, source: string): KPISnapshot {
  const fail = (details: string): Error => errors.invalidSnapshot(source, details);

  if (!isRecord(data)) {
    throw fail('snapshot must be a JSON object');
  }
  const record: Record<string, unknown> = data;

  const count = (label: string, keys: readonly string[], required = false): number => {
    const value = pick(record, keys);
    if (value === undefined) {
      if (required) throw fail(`${label} is missing`);
      return 0;
    }
    if (typeof value !== 'number' || !Number.isFinite(value) || value < 0) {
      throw fail(`${label} must be a non-negative number, got ${JSON.stringify(value)}`);
    }
    return value;
  };

  const qualityScore = count('qualityScore', ['qualityScore', 'quality_score'], true);
  if (!Number.isInteger(qualityScore) || qualityScore > 100) {
    throw fail(`qualityScore must be an integer from 0 to 100, got ${qualityScore}`);
  }
  const totalDocs = count('totalDocs', ['totalDocs', 'total_docs']);
  const staleDocs = count('staleDocs', ['staleDocs', 'stale_docs']);
  if (staleDocs > totalDocs) {
    throw fail(`staleDocs (${staleDocs}) exceeds totalDocs (${totalDocs})`);
  }

  const metadata = pick(record, ['metadataCompletenessPct', 'metadata_completeness_pct']);
  const generatedAt = pick(record, ['generatedAt', 'generated_at']);

  const notes: string[] = [];
  const rawNotes = record.notes;
  if (Array.isArray(rawNotes)) {
    for (const note of rawNotes) {
      if (typeof note === 'string') notes.push(note);
    }
  }
  for (const key of ['debt_trend_note', 'before_after_note']) {
    const note = record[key];
    if (typeof note === 'string' && note.trim() !== '') notes.push(note);
  }

  return {
    qualityScore,
    totalDocs,
    docsWithFrontmatter: count('docsWithFrontmatter', ['docsWithFrontmatter', 'docs_with_frontmatter']),
    staleDocs,
    openGaps: count('openGaps', ['openGaps', 'open_gaps', 'gap_total']),
    highPriorityGaps: count('highPriorityGaps', ['highPriorityGaps', 'high_priority_gaps', 'gap_high']),
    generatedAt: typeof generatedAt === 'string' ? generatedAt : '',
    ...(typeof metadata === 'number' && Number.isFinite(metadata) ? { metadataCompletenessPct: metadata } : {}),
    notes,
  };
}

export async function loadKpiSnapshot(path: string): Promise<KPISnapshot> {
  let content: string;
  try {
    content = await readFile(path, 'utf-8');
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      throw errors.snapshotNotFound(path);
    }
    throw errors.fileReadError(path, error instanceof Error ? error.message : String(error));
  }

  let data: unknown;
  try {
    data = JSON.parse(content);
  } catch (error) {
    throw errors.invalidSnapshot(path, `not valid JSON (${error instanceof Error ? error.message : String(error)})`);
  }
  return parseKpiSnapshot(data, path);
}
