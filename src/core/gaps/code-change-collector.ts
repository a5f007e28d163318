/**
 * Code change collector
 *
 * Finds public-interface changes in the recent history that shipped without
 * matching documentation. Each interface file's patch is scanned for the
 * surfaces a reader would look up: HTTP endpoints, environment variables,
 * CLI commands and options, exported symbols and deprecations.
 */

import { basename, extname } from 'node:path';
import type { DocType, Gap, PolicyPack } from '../../types/index.js';
import { logger } from '../../utils/logger.js';
import type { VersionControl } from '../changes/git-diff.js';
import { classifyChanges, pathsWithLabel } from '../changes/change-classifier.js';
import type { GapCollector } from './collector.js';
import { createGap, type GapDraft } from './gap-scoring.js';

// ============================================================================
// SURFACES
// ============================================================================

export type SurfaceKind = 'endpoint' | 'env_var' | 'cli_command' | 'cli_option' | 'public_symbol' | 'deprecation';

export interface InterfaceSurface {
  kind: SurfaceKind;
  name: string;
  /** Added line the surface was found on */
  line: string;
}

const ENDPOINT_PATTERNS: RegExp[] = [
  /@(get|post|put|patch|delete)\s*\(\s*['"]([^'"]+)/i,
  /router\.(get|post|put|patch|delete)\s*\(\s*['"]([^'"]+)/,
  /app\.(get|post|put|patch|delete)\s*\(\s*['"]([^'"]+)/,
];
const REQUEST_MAPPING = /@RequestMapping\s*\(\s*['"]([^'"]+)/;

const ENV_PATTERNS: RegExp[] = [
  /process\.env\.([A-Z][A-Z0-9_]+)/,
  /os\.environ\[['"]([A-Z][A-Z0-9_]+)/,
  /getenv\(['"]([A-Z][A-Z0-9_]+)/,
  /ENV\[['"]([A-Z][A-Z0-9_]+)/,
];

const CLI_COMMAND_PATTERNS: RegExp[] = [/\.command\(\s*['"]([^'"\s]+)/];
const CLI_OPTION_PATTERNS: RegExp[] = [/\.option\(\s*['"](?:-\w,\s*)?--([\w-]+)/, /add_argument\(\s*['"]--([\w-]+)/];

const SYMBOL_PATTERNS: RegExp[] = [
  /^export\s+(?:default\s+)?(?:async\s+)?function\s+(\w+)/,
  /^export\s+const\s+(\w+)\s*=/,
  /^export\s+(?:abstract\s+)?class\s+(\w+)/,
  /^export\s+interface\s+(\w+)/,
  /^export\s+type\s+(\w+)/,
  /^interface\s+([A-Z]\w*)/,
  /^type\s+([A-Z]\w*)\s*=/,
];

const DEPRECATION_PATTERNS: RegExp[] = [/@deprecated/i, /BREAKING(\s+CHANGE)?:/, /\.deprecated\s*=\s*true/];

const DOC_TYPES: Readonly<Record<SurfaceKind, DocType>> = {
  endpoint: 'reference',
  env_var: 'reference',
  cli_command: 'reference',
  cli_option: 'reference',
  public_symbol: 'reference',
  deprecation: 'how-to',
};

const CATEGORIES: Readonly<Record<SurfaceKind, string>> = {
  endpoint: 'api',
  env_var: 'config',
  cli_command: 'cli',
  cli_option: 'cli',
  public_symbol: 'api',
  deprecation: 'breaking',
};

function firstMatch(text: string, patterns: readonly RegExp[]): RegExpMatchArray | null {
  for (const pattern of patterns) {
    const match = text.match(pattern);
    if (match) return match;
  }
  return null;
}

/** Surfaces found on one added line, in a fixed kind order */
function scanLine(line: string): InterfaceSurface[] {
  const found: InterfaceSurface[] = [];
  const code = line.trim();

  const endpoint = firstMatch(code, ENDPOINT_PATTERNS);
  if (endpoint) {
    found.push({ kind: 'endpoint', name: `${endpoint[1].toUpperCase()} ${endpoint[2]}`, line: code });
  } else {
    const mapping = code.match(REQUEST_MAPPING);
    if (mapping) found.push({ kind: 'endpoint', name: mapping[1], line: code });
  }

  for (const pattern of ENV_PATTERNS) {
    for (const match of code.matchAll(new RegExp(pattern.source, 'g'))) {
      found.push({ kind: 'env_var', name: match[1], line: code });
    }
  }

  const command = firstMatch(code, CLI_COMMAND_PATTERNS);
  if (command) found.push({ kind: 'cli_command', name: command[1], line: code });
  const option = firstMatch(code, CLI_OPTION_PATTERNS);
  if (option) found.push({ kind: 'cli_option', name: `--${option[1]}`, line: code });

  const symbol = firstMatch(code, SYMBOL_PATTERNS);
  if (symbol) found.push({ kind: 'public_symbol', name: symbol[1], line: code });

  if (firstMatch(code, DEPRECATION_PATTERNS)) {
    found.push({ kind: 'deprecation', name: 'deprecation', line: code });
  }
  return found;
}

/**
 * Surfaces introduced by the added lines of a unified diff, one per
 * kind and name
 */
export function scanSurfaces(patch: string): InterfaceSurface[] {
  const surfaces = new Map<string, InterfaceSurface>();
  for (const raw of patch.split('\n')) {
    if (!raw.startsWith('+') || raw.startsWith('+++')) continue;
    for (const surface of scanLine(raw.slice(1))) {
      const key = `${surface.kind}:${surface.name}`;
      if (!surfaces.has(key)) surfaces.set(key, surface);
    }
  }
  return [...surfaces.values()];
}

export function surfaceTitle(surface: InterfaceSurface, path: string): string {
  switch (surface.kind) {
    case 'endpoint': return `Document endpoint ${surface.name}`;
    case 'env_var': return `Document environment variable ${surface.name}`;
    case 'cli_command': return `Document CLI command ${surface.name}`;
    case 'cli_option': return `Document CLI option ${surface.name}`;
    case 'public_symbol': return `Document ${surface.name}`;
    case 'deprecation': return `Document deprecation in ${path}`;
  }
}

/** File name without directory or extension, lowercased */
export function fileStem(path: string): string {
  return basename(path, extname(path)).toLowerCase();
}

function clip(text: string, max = 120): string {
  return text.length > max ? `${text.slice(0, max - 3)}...` : text;
}

// ============================================================================
// COLLECTOR
// ============================================================================

export interface CodeChangeCollectorOptions {
  vcs: VersionControl;
  pack: PolicyPack;
  sinceDays: number;
  now: Date;
  head?: string;
}

export class CodeChangeCollector implements GapCollector {
  readonly source = 'CodeChange' as const;

  constructor(private readonly options: CodeChangeCollectorOptions) {}

  async collect(): Promise<Gap[]> {
    const { vcs, pack, sinceDays, now } = this.options;
    const head = this.options.head ?? 'HEAD';

    const base = await vcs.revisionBefore(sinceDays);
    const classified = classifyChanges(await vcs.diff(base, head), pack);
    const docPaths = pathsWithLabel(classified, 'doc').map((path) => path.toLowerCase());

    const drafts: GapDraft[] = [];
    for (const change of classified) {
      if (!change.labels.includes('interface') || change.file.changeType === 'deleted') continue;

      const { path } = change.file;
      const stem = fileStem(path);
      const documentedBy = docPaths.find((docPath) => docPath.includes(stem));
      if (documentedBy) {
        logger.debug(`${path} documented by ${documentedBy}`);
        continue;
      }

      const surfaces = scanSurfaces(await vcs.fileDiff(base, head, path));
      if (surfaces.length === 0) {
        drafts.push({
          source: this.source,
          title: `Document changes to ${path}`,
          description: `Public interface file ${change.file.changeType} without a matching documentation change`,
          suggestedDocType: 'reference',
          category: 'api',
          detectedAt: now,
          volume: 1,
          evidence: [path],
        });
        continue;
      }

      for (const surface of surfaces) {
        drafts.push({
          source: this.source,
          title: surfaceTitle(surface, path),
          description: `Undocumented ${surface.kind.replace('_', ' ')} in ${path}`,
          suggestedDocType: DOC_TYPES[surface.kind],
          category: CATEGORIES[surface.kind],
          detectedAt: now,
          volume: 1,
          evidence: [`${path}: ${clip(surface.line)}`],
        });
      }
    }

    return drafts.map((draft) => createGap(draft, now));
  }
}
