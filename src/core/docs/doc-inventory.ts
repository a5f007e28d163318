/**
 * Documentation inventory
 *
 * Walks the docs tree for markdown pages and reads their YAML frontmatter.
 * Shared by the staleness collector and the KPI snapshot builder.
 */

import { opendir, readFile } from 'node:fs/promises';
import { join, relative, sep } from 'node:path';
import matter from 'gray-matter';
import type { DocumentRecord } from '../../types/index.js';
import { errors } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';

/** Directories never treated as documentation */
const SKIP_DIRECTORIES = new Set(['assets', 'node_modules']);

const MS_PER_DAY = 24 * 60 * 60 * 1000;

// ============================================================================
// FRONTMATTER
// ============================================================================

/**
 * Parse frontmatter from page content. Invalid YAML counts as no frontmatter.
 */
export function parseFrontmatter(content: string, path: string): Pick<DocumentRecord, 'hasFrontmatter' | 'frontmatter'> {
  if (!content.startsWith('---')) {
    return { hasFrontmatter: false, frontmatter: {} };
  }
  try {
    // Passing options bypasses gray-matter's content cache
    const { data } = matter(content, {});
    const frontmatter: Record<string, unknown> = { ...data };
    return { hasFrontmatter: true, frontmatter };
  } catch (error) {
    logger.warning(`Invalid frontmatter in ${path}: ${error instanceof Error ? error.message : String(error)}`);
    return { hasFrontmatter: false, frontmatter: {} };
  }
}

/**
 * `last_reviewed` as a UTC date. YAML dates arrive as Date objects, quoted
 * ones as strings; anything unparsable is null.
 */
export function lastReviewedAt(record: DocumentRecord): Date | null {
  const value = record.frontmatter.last_reviewed;
  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? null : value;
  }
  if (typeof value === 'string' && value.trim() !== '') {
    const parsed = new Date(value.trim());
    return Number.isNaN(parsed.getTime()) ? null : parsed;
  }
  return null;
}

/**
 * The day before which a review counts as stale
 */
export function staleCutoff(now: Date, staleDays: number): Date {
  const today = Date.UTC(now.getUTCFullYear(), now.getUTCMonth(), now.getUTCDate());
  return new Date(today - staleDays * MS_PER_DAY);
}

export function isStale(record: DocumentRecord, now: Date, staleDays: number): boolean {
  const reviewed = lastReviewedAt(record);
  return reviewed !== null && reviewed.getTime() < staleCutoff(now, staleDays).getTime();
}

/** Human title of a page: frontmatter title, else its path */
export function documentTitle(record: DocumentRecord): string {
  const title = record.frontmatter.title;
  return typeof title === 'string' && title.trim() !== '' ? title.trim() : record.path;
}

// ============================================================================
// WALKER
// ============================================================================

async function walk(dirPath: string, rootPath: string, found: string[]): Promise<void> {
  const dir = await opendir(dirPath);
  const directories: string[] = [];

  for await (const entry of dir) {
    if (entry.name.startsWith('.')) continue;
    const entryPath = join(dirPath, entry.name);
    if (entry.isDirectory()) {
      if (!SKIP_DIRECTORIES.has(entry.name)) directories.push(entryPath);
    } else if (entry.isFile() && entry.name.toLowerCase().endsWith('.md')) {
      found.push(relative(rootPath, entryPath).split(sep).join('/'));
    }
  }

  for (const subPath of directories) {
    await walk(subPath, rootPath, found);
  }
}

/**
 * Every markdown page under `docsDir`, sorted by path
 */
export async function loadDocuments(docsDir: string): Promise<DocumentRecord[]> {
  const paths: string[] = [];
  try {
    await walk(docsDir, docsDir, paths);
  } catch (error) {
    throw errors.fileReadError(docsDir, error instanceof Error ? error.message : String(error));
  }
  paths.sort();

  const records: DocumentRecord[] = [];
  for (const path of paths) {
    const content = await readFile(join(docsDir, path), 'utf-8');
    records.push({ path, ...parseFrontmatter(content, path) });
  }
  logger.debug(`Inventoried ${records.length} document(s) under ${docsDir}`);
  return records;
}
