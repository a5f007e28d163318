/**
 * Topic lexicon
 *
 * Stop words and keyword categories used to classify community topics and
 * search queries. Loaded once from data/community-lexicon.json.
 */

import { readFileSync } from 'node:fs';
import type { DocType } from '../../types/index.js';
import { errors } from '../../utils/errors.js';
import { isRecord } from '../policy/policy-pack.js';

export interface KeywordCategory {
  category: string;
  keywords: string[];
}

export interface Lexicon {
  stopWords: ReadonlySet<string>;
  communityCategories: KeywordCategory[];
  searchCategories: KeywordCategory[];
}

/** Same depth from src/ and dist/ */
const LEXICON_URL = new URL('../../../data/community-lexicon.json', import.meta.url);

export const DEFAULT_CATEGORY = 'general';

/** Checked in order; the first match wins, how-to otherwise */
export const QUESTION_PATTERNS: ReadonlyArray<[DocType, RegExp[]]> = [
  [
    'troubleshooting',
    [
      /not working/,
      /error/,
      /fail(ed|ing|s)?/,
      /issue/,
      /problem/,
      /can'?t/,
      /doesn'?t/,
      /won'?t/,
      /help/,
      /stuck/,
    ],
  ],
  ['how-to', [/how (do|can|to)/, /way to/, /possible to/, /want to/, /need to/, /trying to/, /looking for/]],
  ['concept', [/what is/, /what are/, /difference between/, /explain/, /understand/, /why (does|is|do)/]],
  ['reference', [/documentation/, /parameters?/, /options?/, /configuration/, /settings?/, /list of/]],
];

let cached: Lexicon | null = null;

function readStrings(value: unknown, label: string): string[] {
  if (!Array.isArray(value) || !value.every((item): item is string => typeof item === 'string')) {
    throw errors.fileReadError(LEXICON_URL.pathname, `${label} must be a list of strings`);
  }
  return value;
}

function readCategories(value: unknown, label: string): KeywordCategory[] {
  if (!Array.isArray(value)) {
    throw errors.fileReadError(LEXICON_URL.pathname, `${label} must be a list`);
  }
  return value.map((entry, index) => {
    if (!isRecord(entry) || typeof entry.category !== 'string') {
      throw errors.fileReadError(LEXICON_URL.pathname, `${label}[${index}] needs a category`);
    }
    return { category: entry.category, keywords: readStrings(entry.keywords, `${label}[${index}].keywords`) };
  });
}

export function parseLexicon(data: unknown): Lexicon {
  if (!isRecord(data)) {
    throw errors.fileReadError(LEXICON_URL.pathname, 'lexicon must be a JSON object');
  }
  return {
    stopWords: new Set(readStrings(data.stopWords, 'stopWords')),
    communityCategories: readCategories(data.communityCategories, 'communityCategories'),
    searchCategories: readCategories(data.searchCategories, 'searchCategories'),
  };
}

export function loadLexicon(): Lexicon {
  if (!cached) {
    cached = parseLexicon(JSON.parse(readFileSync(LEXICON_URL, 'utf-8')));
  }
  return cached;
}

// ============================================================================
// CLASSIFICATION
// ============================================================================

/** First category with a keyword contained in the lowercased text */
export function categorize(text: string, categories: readonly KeywordCategory[]): string {
  const lower = text.toLowerCase();
  const match = categories.find(({ keywords }) => keywords.some((keyword) => lower.includes(keyword)));
  return match ? match.category : DEFAULT_CATEGORY;
}

export function questionDocType(text: string): DocType {
  const lower = text.toLowerCase();
  const match = QUESTION_PATTERNS.find(([, patterns]) => patterns.some((pattern) => pattern.test(lower)));
  return match ? match[0] : 'how-to';
}

/** Up to ten words from the text, stop words and short words removed */
export function extractKeywords(text: string, stopWords: ReadonlySet<string>): string[] {
  const words = text.toLowerCase().match(/\b[a-zA-Z][a-zA-Z0-9_-]*\b/g) ?? [];
  return words.filter((word) => !stopWords.has(word) && word.length > 2).slice(0, 10);
}
