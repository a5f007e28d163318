/**
 * Search analytics collector
 *
 * Reads a search analytics export and proposes a gap for every query that
 * returned nothing often enough to matter. Accepts the `queries` shape of a
 * dashboard export, the `searches` shape of the analytics API, and the
 * dashboard's CSV download.
 */

import { readFile } from 'node:fs/promises';
import { extname } from 'node:path';
import type { DocType, Gap } from '../../types/index.js';
import { errors } from '../../utils/errors.js';
import { isRecord } from '../policy/policy-pack.js';
import type { GapCollector } from './collector.js';
import { createGap, type GapDraft } from './gap-scoring.js';
import { categorize, loadLexicon, type Lexicon } from './lexicon.js';

export interface SearchQuery {
  query: string;
  count: number;
  nbHits: number;
  clickThroughRate: number;
}

export type SearchExportFormat = 'json' | 'csv';

export interface SearchCollectorOptions {
  exportPath: string;
  /** Defaults to `csv` for a `.csv` path, `json` otherwise */
  format?: SearchExportFormat;
  minOccurrences: number;
  now: Date;
  lexicon?: Lexicon;
}

function numberOf(...values: unknown[]): number {
  for (const value of values) {
    if (typeof value === 'number' && Number.isFinite(value)) return value;
  }
  return 0;
}

export function parseSearchExport(data: unknown, source: string): SearchQuery[] {
  const items = isRecord(data) ? (data.queries ?? data.searches) : undefined;
  if (!Array.isArray(items)) {
    throw errors.collectionFailed('SearchAnalytics', `${source} holds no 'queries' list`);
  }

  const queries: SearchQuery[] = [];
  for (const item of items) {
    if (!isRecord(item)) continue;
    const text = item.query ?? item.search;
    if (typeof text !== 'string' || text.trim() === '') continue;
    queries.push({
      query: text.trim(),
      count: numberOf(item.count),
      nbHits: numberOf(item.nbHits, item.results_count),
      clickThroughRate: numberOf(item.clickThroughRate, item.ctr),
    });
  }
  return queries;
}

// ============================================================================
// CSV
// ============================================================================

const CSV_COLUMNS = {
  query: ['search', 'query'],
  count: ['count', 'searches'],
  nbHits: ['results', 'nbhits', 'hits'],
  clickThroughRate: ['ctr', 'click-through rate', 'clickthroughrate'],
} as const;

type CsvColumn = keyof typeof CSV_COLUMNS;

/** Rows of a comma-separated file; quoted fields may hold commas, quotes and line breaks */
export function splitCsv(content: string): string[][] {
  const text = content.replace(/^\uFEFF/, '');
  const rows: string[][] = [];
  let row: string[] = [];
  let field = '';
  let quoted = false;

  for (let i = 0; i < text.length; i++) {
    const char = text[i];
    if (quoted) {
      if (char !== '"') {
        field += char;
      } else if (text[i + 1] === '"') {
        field += '"';
        i++;
      } else {
        quoted = false;
      }
    } else if (char === '"') {
      quoted = true;
    } else if (char === ',') {
      row.push(field);
      field = '';
    } else if (char === '\n' || char === '\r') {
      if (char === '\r' && text[i + 1] === '\n') i++;
      row.push(field);
      rows.push(row);
      row = [];
      field = '';
    } else {
      field += char;
    }
  }
  if (field !== '' || row.length > 0) {
    row.push(field);
    rows.push(row);
  }

  return rows.filter((cells) => cells.some((cell) => cell.trim() !== ''));
}

function csvNumber(cell: string | undefined): number {
  if (cell === undefined) return 0;
  const value = Number(cell.trim().replace(/,/g, ''));
  return cell.trim() !== '' && Number.isFinite(value) ? value : 0;
}

/** `12.5%` and `12.5` both read as 0.125; fractions up to 1 are kept */
export function parseClickThroughRate(cell: string | undefined): number {
  if (cell === undefined) return 0;
  const percent = cell.includes('%');
  const value = csvNumber(cell.replace('%', ''));
  return percent || value > 1 ? value / 100 : value;
}

export function parseSearchCsv(content: string, source: string): SearchQuery[] {
  const [header, ...rows] = splitCsv(content);
  const names = (header ?? []).map((name) => name.trim().toLowerCase());
  const indexOf = (column: CsvColumn): number => names.findIndex((name) => CSV_COLUMNS[column].some((alias) => alias === name));

  const queryIndex = indexOf('query');
  if (queryIndex === -1) {
    throw errors.collectionFailed('SearchAnalytics', `${source} has no Search or query column`);
  }
  const countIndex = indexOf('count');
  const hitsIndex = indexOf('nbHits');
  const ctrIndex = indexOf('clickThroughRate');
  const cell = (cells: string[], index: number): string | undefined => (index === -1 ? undefined : cells[index]);

  const queries: SearchQuery[] = [];
  for (const cells of rows) {
    const text = (cells[queryIndex] ?? '').trim();
    if (text === '') continue;
    queries.push({
      query: text,
      count: csvNumber(cell(cells, countIndex)),
      nbHits: csvNumber(cell(cells, hitsIndex)),
      clickThroughRate: parseClickThroughRate(cell(cells, ctrIndex)),
    });
  }
  return queries;
}

// ============================================================================
// GAPS
// ============================================================================

export function searchDocType(query: string): DocType {
  const lower = query.toLowerCase();
  const has = (words: string[]): boolean => words.some((word) => lower.includes(word));
  if (has(['error', 'fail', 'not working', 'issue'])) return 'troubleshooting';
  if (has(['how to', 'how do', 'configure', 'setup'])) return 'how-to';
  if (has(['what is', 'explain', 'understand'])) return 'concept';
  return 'reference';
}

/** Zero-result queries searched at least `minOccurrences` times */
export function searchDrafts(
  queries: readonly SearchQuery[],
  minOccurrences: number,
  now: Date,
  lexicon: Lexicon
): GapDraft[] {
  return queries
    .filter((query) => query.nbHits === 0 && query.count >= minOccurrences)
    .map((query): GapDraft => ({
      source: 'SearchAnalytics',
      title: query.query,
      description: `No results - ${query.count} searches`,
      suggestedDocType: searchDocType(query.query),
      category: categorize(query.query, lexicon.searchCategories),
      detectedAt: now,
      volume: query.count,
      evidence: [`"${query.query}" searched ${query.count} time(s) with no results`],
    }));
}

function parseJsonExport(content: string, source: string): SearchQuery[] {
  let data: unknown;
  try {
    data = JSON.parse(content);
  } catch (error) {
    throw errors.collectionFailed(
      'SearchAnalytics',
      `${source} is not valid JSON (${error instanceof Error ? error.message : String(error)})`
    );
  }
  return parseSearchExport(data, source);
}

export class SearchAnalyticsCollector implements GapCollector {
  readonly source = 'SearchAnalytics' as const;

  constructor(private readonly options: SearchCollectorOptions) {}

  async collect(): Promise<Gap[]> {
    const { exportPath, minOccurrences, now } = this.options;

    let content: string;
    try {
      content = await readFile(exportPath, 'utf-8');
    } catch (error) {
      throw errors.collectionFailed(
        'SearchAnalytics',
        `cannot read ${exportPath}: ${error instanceof Error ? error.message : String(error)}`
      );
    }

    const format = this.options.format ?? (extname(exportPath).toLowerCase() === '.csv' ? 'csv' : 'json');
    const queries = format === 'csv' ? parseSearchCsv(content, exportPath) : parseJsonExport(content, exportPath);

    const lexicon = this.options.lexicon ?? loadLexicon();
    return searchDrafts(queries, minOccurrences, now, lexicon).map((draft) => createGap(draft, now));
  }
}
