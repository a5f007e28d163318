/**
 * Staleness collector
 *
 * Proposes a review for every page whose `last_reviewed` date is older than
 * the review window.
 */

import { posix } from 'node:path';
import type { DocType, DocumentRecord, Gap } from '../../types/index.js';
import type { GapCollector } from './collector.js';
import { createGap, type GapDraft } from './gap-scoring.js';
import { documentTitle, isStale, lastReviewedAt, loadDocuments } from '../docs/doc-inventory.js';

const MS_PER_DAY = 24 * 60 * 60 * 1000;
const DAYS_PER_MONTH = 30;

const DOC_TYPES: readonly DocType[] = ['tutorial', 'how-to', 'concept', 'reference', 'troubleshooting'];

export interface StalenessCollectorOptions {
  docsDir: string;
  staleDays: number;
  now: Date;
  /** Inventory override; the docs directory is walked otherwise */
  loadDocs?: (docsDir: string) => Promise<DocumentRecord[]>;
}

function isDocType(value: unknown): value is DocType {
  return DOC_TYPES.some((docType) => docType === value);
}

function isoDay(date: Date): string {
  return date.toISOString().slice(0, 10);
}

/**
 * Draft for one stale page. The gap is detected the day the review fell due;
 * volume counts the whole months since.
 */
export function stalenessDraft(record: DocumentRecord, docsDir: string, staleDays: number, now: Date): GapDraft | null {
  const reviewed = lastReviewedAt(record);
  if (!reviewed || !isStale(record, now, staleDays)) return null;

  const dueAt = new Date(reviewed.getTime() + staleDays * MS_PER_DAY);
  const overdueDays = Math.max(0, Math.floor((now.getTime() - dueAt.getTime()) / MS_PER_DAY));
  const contentType = record.frontmatter.content_type;

  return {
    source: 'Staleness',
    title: `Review ${documentTitle(record)}`,
    description: `Last reviewed ${isoDay(reviewed)}, ${overdueDays} day(s) past the ${staleDays}-day review window`,
    suggestedDocType: isDocType(contentType) ? contentType : 'reference',
    category: 'stale_content',
    detectedAt: dueAt,
    volume: Math.floor(overdueDays / DAYS_PER_MONTH),
    evidence: [posix.join(docsDir.split('\\').join('/'), record.path)],
  };
}

export class StalenessCollector implements GapCollector {
  readonly source = 'Staleness' as const;

  constructor(private readonly options: StalenessCollectorOptions) {}

  async collect(): Promise<Gap[]> {
    const { docsDir, staleDays, now } = this.options;
    const documents = await (this.options.loadDocs ?? loadDocuments)(docsDir);

    const gaps: Gap[] = [];
    for (const record of documents) {
      const draft = stalenessDraft(record, docsDir, staleDays, now);
      if (draft) gaps.push(createGap(draft, now));
    }
    return gaps;
  }
}
