/**
 * Community collector
 *
 * Turns forum questions into documentation gaps. Topics come from RSS/Atom
 * feeds listed in the policy pack and, optionally, from a JSON export of
 * forum posts. Topics are clustered on category and leading keyword; a
 * cluster asked often enough becomes one gap.
 */

import { readFile } from 'node:fs/promises';
import { XMLParser } from 'fast-xml-parser';
import type { CommunityFeed, DocType, Gap } from '../../types/index.js';
import { errors } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import { isRecord } from '../policy/policy-pack.js';
import type { GapCollector } from './collector.js';
import { createGap, type GapDraft } from './gap-scoring.js';
import { categorize, extractKeywords, loadLexicon, questionDocType, type Lexicon } from './lexicon.js';

export const USER_AGENT = 'docgov/1.0';
export const FETCH_TIMEOUT_MS = 15_000;
export const ITEMS_PER_FEED = 50;

const MS_PER_DAY = 24 * 60 * 60 * 1000;
const MAX_EVIDENCE = 5;

// ============================================================================
// TYPES
// ============================================================================

/** A feed item or exported post before classification */
export interface RawTopic {
  title: string;
  url: string;
  published: Date | null;
  feed: string;
}

export interface CommunityTopic extends RawTopic {
  category: string;
  keywords: string[];
  docType: DocType;
}

export type FetchFn = typeof fetch;

export interface CommunityCollectorOptions {
  feeds: readonly CommunityFeed[];
  /** JSON export of forum posts */
  exportPath?: string;
  minRepetitions: number;
  sinceDays: number;
  now: Date;
  fetchFn?: FetchFn;
  timeoutMs?: number;
  lexicon?: Lexicon;
}

// ============================================================================
// PARSING
// ============================================================================

const parser = new XMLParser({
  ignoreAttributes: false,
  attributeNamePrefix: '@_',
  removeNSPrefix: true,
  parseTagValue: false,
  isArray: (name) => name === 'item' || name === 'entry' || name === 'link',
});

/** Text content of a parsed XML node */
function textOf(node: unknown): string | null {
  if (typeof node === 'string') return node;
  if (typeof node === 'number') return String(node);
  if (Array.isArray(node)) {
    for (const entry of node) {
      const text = textOf(entry);
      if (text) return text;
    }
    return null;
  }
  if (isRecord(node)) {
    const text = node['#text'];
    if (typeof text === 'string') return text;
    const href = node['@_href'];
    if (typeof href === 'string') return href;
  }
  return null;
}

function parseDate(value: unknown): Date | null {
  if (typeof value !== 'string' || value.trim() === '') return null;
  const date = new Date(value.trim());
  return Number.isNaN(date.getTime()) ? null : date;
}

/** Strip markup and collapse whitespace */
export function cleanTitle(title: string): string {
  return title.replace(/<[^>]+>/g, '').split(/\s+/).filter(Boolean).join(' ');
}

function itemsOf(value: unknown): unknown[] {
  return Array.isArray(value) ? value : [];
}

/**
 * Items of an RSS 2.0 or Atom document. Items without a title are dropped.
 */
export function parseFeed(xml: string, feed: string, limit = ITEMS_PER_FEED): RawTopic[] {
  const document: unknown = parser.parse(xml);
  if (!isRecord(document)) return [];

  let items: unknown[] = [];
  const { rss, feed: atom } = document;
  if (isRecord(rss) && isRecord(rss.channel)) {
    items = itemsOf(rss.channel.item);
  } else if (isRecord(atom)) {
    items = itemsOf(atom.entry);
  }

  const topics: RawTopic[] = [];
  for (const item of items.slice(0, limit)) {
    if (!isRecord(item)) continue;
    const title = cleanTitle(textOf(item.title) ?? '');
    if (!title) continue;
    topics.push({
      title,
      url: textOf(item.link) ?? '',
      published: parseDate(item.pubDate ?? item.published ?? item.updated),
      feed,
    });
  }
  return topics;
}

/**
 * Topics from a post export: a list of posts, or an object holding one
 * under `posts` or `topics`
 */
export function parseCommunityExport(data: unknown, source: string): RawTopic[] {
  let posts: unknown = data;
  if (isRecord(data)) posts = data.posts ?? data.topics;
  if (!Array.isArray(posts)) {
    throw new Error('export holds no list of posts');
  }

  const topics: RawTopic[] = [];
  for (const post of posts) {
    if (!isRecord(post) || typeof post.title !== 'string') continue;
    const title = cleanTitle(post.title);
    if (!title) continue;
    const url = post.url ?? post.link;
    topics.push({
      title,
      url: typeof url === 'string' ? url : '',
      published: parseDate(post.published ?? post.created_date ?? post.created_at),
      feed: source,
    });
  }
  return topics;
}

// ============================================================================
// CLUSTERING
// ============================================================================

export function classifyTopic(topic: RawTopic, lexicon: Lexicon): CommunityTopic {
  return {
    ...topic,
    category: categorize(topic.title, lexicon.communityCategories),
    keywords: extractKeywords(topic.title, lexicon.stopWords),
    docType: questionDocType(topic.title),
  };
}

export function clusterKey(topic: CommunityTopic): string {
  return topic.keywords.length > 0 ? `${topic.category}:${topic.keywords[0]}` : topic.category;
}

/** Most frequent doc type; ties go to the first seen */
function dominantDocType(topics: readonly CommunityTopic[]): DocType {
  const counts = new Map<DocType, number>();
  for (const topic of topics) counts.set(topic.docType, (counts.get(topic.docType) ?? 0) + 1);
  let best: DocType = topics[0].docType;
  for (const [docType, count] of counts) {
    if (count > (counts.get(best) ?? 0)) best = docType;
  }
  return best;
}

function newest(topics: readonly CommunityTopic[]): Date | null {
  let latest: Date | null = null;
  for (const { published } of topics) {
    if (published && (!latest || published.getTime() > latest.getTime())) latest = published;
  }
  return latest;
}

/**
 * One draft per cluster with at least `minRepetitions` topics, in order of
 * first appearance
 */
export function clusterTopics(topics: readonly CommunityTopic[], minRepetitions: number, now: Date): GapDraft[] {
  const clusters = new Map<string, CommunityTopic[]>();
  for (const topic of topics) {
    const key = clusterKey(topic);
    const cluster = clusters.get(key);
    if (cluster) cluster.push(topic);
    else clusters.set(key, [topic]);
  }

  const drafts: GapDraft[] = [];
  for (const cluster of clusters.values()) {
    if (cluster.length < minRepetitions) continue;
    const [first] = cluster;
    drafts.push({
      source: 'Community',
      title: first.title,
      description: `Frequently asked topic (${cluster.length} questions)`,
      suggestedDocType: dominantDocType(cluster),
      category: first.category,
      detectedAt: newest(cluster) ?? now,
      volume: cluster.length,
      evidence: cluster.slice(0, MAX_EVIDENCE).map((topic) => (topic.url ? `${topic.title} (${topic.url})` : topic.title)),
    });
  }
  return drafts;
}

// ============================================================================
// COLLECTOR
// ============================================================================

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export class CommunityCollector implements GapCollector {
  readonly source = 'Community' as const;

  constructor(private readonly options: CommunityCollectorOptions) {}

  private async fetchFeed(feed: CommunityFeed): Promise<RawTopic[]> {
    const fetchFn = this.options.fetchFn ?? fetch;
    const response = await fetchFn(feed.url, {
      headers: { 'User-Agent': USER_AGENT },
      signal: AbortSignal.timeout(this.options.timeoutMs ?? FETCH_TIMEOUT_MS),
    });
    if (!response.ok) {
      throw new Error(`HTTP ${response.status} ${response.statusText}`.trim());
    }
    return parseFeed(await response.text(), feed.name);
  }

  private async readExport(path: string): Promise<RawTopic[]> {
    let content: string;
    try {
      content = await readFile(path, 'utf-8');
    } catch (error) {
      throw new Error(`cannot read export (${describe(error)})`);
    }
    try {
      return parseCommunityExport(JSON.parse(content), path);
    } catch (error) {
      if (error instanceof SyntaxError) {
        throw new Error(`export is not valid JSON (${error.message})`);
      }
      throw error;
    }
  }

  /**
   * A feed that fails is skipped with a warning; the collector fails only
   * when every configured source failed
   */
  async collect(): Promise<Gap[]> {
    const { feeds, exportPath, minRepetitions, sinceDays, now } = this.options;
    const lexicon = this.options.lexicon ?? loadLexicon();

    const loads: Array<{ name: string; run: () => Promise<RawTopic[]> }> = feeds.map((feed) => ({
      name: feed.name,
      run: () => this.fetchFeed(feed),
    }));
    if (exportPath) loads.push({ name: exportPath, run: () => this.readExport(exportPath) });
    if (loads.length === 0) return [];

    const settled = await Promise.allSettled(loads.map((load) => load.run()));
    const raw: RawTopic[] = [];
    const failures: string[] = [];
    settled.forEach((outcome, index) => {
      if (outcome.status === 'fulfilled') {
        raw.push(...outcome.value);
      } else {
        const message = `${loads[index].name}: ${describe(outcome.reason)}`;
        failures.push(message);
        logger.warning(`Community source failed, skipping (${message})`);
      }
    });
    if (failures.length === loads.length) {
      throw errors.collectionFailed('Community', failures.join('; '));
    }

    const cutoff = now.getTime() - sinceDays * MS_PER_DAY;
    const recent = raw.filter((topic) => !topic.published || topic.published.getTime() >= cutoff);
    logger.debug(`Community: ${recent.length} of ${raw.length} topic(s) inside the ${sinceDays}-day window`);

    const topics = recent.map((topic) => classifyTopic(topic, lexicon));
    return clusterTopics(topics, minRepetitions, now).map((draft) => createGap(draft, now));
  }
}
