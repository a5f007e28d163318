/**
 * Policy pack loader
 *
 * Reads the YAML policy pack that parameterizes every governance check:
 * pattern groups for the contract and drift gates, KPI/SLA thresholds and
 * gap collector tuning. Validation is strict: an empty pattern list silently
 * disables a gate, so it is rejected at load time.
 */

import { readFile } from 'node:fs/promises';
import { basename } from 'node:path';
import YAML from 'yaml';
import { minimatch } from 'minimatch';
import type { CommunityFeed, GapSettings, PolicyPack, SlaThresholds } from '../../types/index.js';
import { ConfigError, errors } from '../../utils/errors.js';

// ============================================================================
// DEFAULTS
// ============================================================================

export const DEFAULT_GAP_SETTINGS: GapSettings = {
  staleDays: 90,
  communityMinRepetitions: 2,
  searchMinOccurrences: 5,
  docsDir: 'docs',
  communityFeeds: [],
};

/** Where `docgov init` writes the pack and commands look for it */
export const DEFAULT_POLICY_PACK_PATH = 'docgov-policy.yml';

/** Options every pattern is compiled and matched with */
export const GLOB_OPTIONS = { nocase: true, dot: true } as const;

export const DEFAULT_POLICY_PACK_YAML = `# docgov policy pack
name: default

docs_contract:
  # Files whose change alters the public interface
  interface_patterns:
    - "api/**"
    - "**/*openapi*.{yaml,yml,json}"
    - "**/*swagger*.{yaml,yml,json}"
    - "**/*api-spec*.{yaml,yml,json}"
    - "src/**/{routes,controllers,handlers,public,sdk}/**"
    - "sdk/**"
    - "clients/**"
  # Any change here satisfies the contract gate
  doc_patterns:
    - "docs/**"
    - "templates/**"
    - "README*.md"

drift:
  openapi_patterns:
    - "**/*openapi*.{yaml,yml,json}"
    - "**/*swagger*.{yaml,yml,json}"
    - "**/*api-spec*.{yaml,yml,json}"
  sdk_patterns:
    - "sdk/**"
    - "clients/**"
    - "**/generated/{sdk,client}*/**"
  reference_doc_patterns:
    - "docs/reference/**"
    - "templates/api-reference.md"
    - "templates/sdk-reference.md"
    - "docs/how-to/**/*api*"

kpi_sla:
  min_quality_score: 80
  max_stale_pct: 15.0
  max_high_priority_gaps: 8
  max_quality_score_drop: 5

gaps:
  stale_days: 90
  community_min_repetitions: 2
  search_min_occurrences: 5
  docs_dir: docs
  community_feeds: []
`;

const THRESHOLD_KEYS: ReadonlyArray<[string, keyof SlaThresholds]> = [
  ['min_quality_score', 'minQualityScore'],
  ['max_stale_pct', 'maxStalePct'],
  ['max_high_priority_gaps', 'maxHighPriorityGaps'],
  ['max_quality_score_drop', 'maxQualityScoreDrop'],
];

// ============================================================================
// HELPER FUNCTIONS
// ============================================================================

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * A glob is valid when it is a non-blank string minimatch can compile.
 */
export function isValidGlob(pattern: unknown): pattern is string {
  if (typeof pattern !== 'string' || pattern.trim() === '') return false;
  return minimatch.makeRe(pattern, GLOB_OPTIONS) !== false;
}

function readSection(
  root: Record<string, unknown>,
  key: string,
  fail: (details: string) => Error
): Record<string, unknown> {
  const section = root[key];
  if (section === undefined || section === null) {
    throw fail(`missing section '${key}'`);
  }
  if (!isRecord(section)) {
    throw fail(`section '${key}' must be a mapping`);
  }
  return section;
}

function readPatterns(
  section: Record<string, unknown>,
  path: string,
  key: string,
  fail: (details: string) => Error
): string[] {
  const value = section[key];
  if (value === undefined || value === null) {
    throw fail(`${path}.${key} is missing`);
  }
  if (!Array.isArray(value)) {
    throw fail(`${path}.${key} must be a list of glob patterns`);
  }
  if (value.length === 0) {
    throw fail(`${path}.${key} cannot be empty`);
  }
  const patterns: string[] = [];
  for (const [index, pattern] of value.entries()) {
    if (!isValidGlob(pattern)) {
      throw fail(`${path}.${key}[${index}] is not a valid glob: ${JSON.stringify(pattern)}`);
    }
    patterns.push(pattern);
  }
  return patterns;
}

function readThresholds(
  section: Record<string, unknown>,
  fail: (details: string) => Error
): SlaThresholds {
  const thresholds: SlaThresholds = {
    minQualityScore: 0,
    maxStalePct: 0,
    maxHighPriorityGaps: 0,
    maxQualityScoreDrop: 0,
  };
  for (const [yamlKey, field] of THRESHOLD_KEYS) {
    const value = section[yamlKey];
    if (value === undefined || value === null) {
      throw fail(`kpi_sla.${yamlKey} is missing`);
    }
    if (typeof value !== 'number' || !Number.isFinite(value) || value < 0) {
      throw fail(`kpi_sla.${yamlKey} must be a non-negative number, got ${JSON.stringify(value)}`);
    }
    thresholds[field] = value;
  }
  return thresholds;
}

function readPositiveInteger(
  section: Record<string, unknown>,
  key: string,
  fallback: number,
  fail: (details: string) => Error
): number {
  const value = section[key];
  if (value === undefined || value === null) return fallback;
  if (typeof value !== 'number' || !Number.isInteger(value) || value < 1) {
    throw fail(`gaps.${key} must be a positive integer, got ${JSON.stringify(value)}`);
  }
  return value;
}

function readFeeds(section: Record<string, unknown>, fail: (details: string) => Error): CommunityFeed[] {
  const value = section.community_feeds;
  if (value === undefined || value === null) return [];
  if (!Array.isArray(value)) {
    throw fail('gaps.community_feeds must be a list');
  }
  return value.map((feed: unknown, index) => {
    if (!isRecord(feed) || typeof feed.url !== 'string' || feed.url.trim() === '') {
      throw fail(`gaps.community_feeds[${index}] needs a url`);
    }
    const name = typeof feed.name === 'string' && feed.name.trim() !== '' ? feed.name : feed.url;
    return { url: feed.url, name };
  });
}

function readGapSettings(root: Record<string, unknown>, fail: (details: string) => Error): GapSettings {
  const section = root.gaps;
  if (section === undefined || section === null) {
    return { ...DEFAULT_GAP_SETTINGS, communityFeeds: [] };
  }
  if (!isRecord(section)) {
    throw fail("section 'gaps' must be a mapping");
  }

  const docsDir = section.docs_dir ?? DEFAULT_GAP_SETTINGS.docsDir;
  if (typeof docsDir !== 'string' || docsDir.trim() === '') {
    throw fail('gaps.docs_dir must be a non-empty string');
  }

  return {
    staleDays: readPositiveInteger(section, 'stale_days', DEFAULT_GAP_SETTINGS.staleDays, fail),
    communityMinRepetitions: readPositiveInteger(
      section,
      'community_min_repetitions',
      DEFAULT_GAP_SETTINGS.communityMinRepetitions,
      fail
    ),
    searchMinOccurrences: readPositiveInteger(
      section,
      'search_min_occurrences',
      DEFAULT_GAP_SETTINGS.searchMinOccurrences,
      fail
    ),
    docsDir,
    communityFeeds: readFeeds(section, fail),
  };
}

function freezePack(pack: PolicyPack): PolicyPack {
  Object.freeze(pack.interfacePatterns);
  Object.freeze(pack.docPatterns);
  Object.freeze(pack.openapiPatterns);
  Object.freeze(pack.sdkPatterns);
  Object.freeze(pack.referenceDocPatterns);
  Object.freeze(pack.slaThresholds);
  pack.gapSettings.communityFeeds.forEach((feed) => Object.freeze(feed));
  Object.freeze(pack.gapSettings.communityFeeds);
  Object.freeze(pack.gapSettings);
  return Object.freeze(pack);
}

// ============================================================================
// PUBLIC API
// ============================================================================

/**
 * Parse and validate policy pack YAML. `source` names the file in errors.
 */
export function parsePolicyPack(content: string, source: string): PolicyPack {
  const fail = (details: string): Error => errors.invalidPolicyPack(source, details);

  let data: unknown;
  try {
    data = YAML.parse(content);
  } catch (error) {
    throw fail(`unparsable YAML (${error instanceof Error ? error.message : String(error)})`);
  }

  if (!isRecord(data)) {
    throw fail('policy pack must be a mapping');
  }

  const contract = readSection(data, 'docs_contract', fail);
  const drift = readSection(data, 'drift', fail);
  const sla = readSection(data, 'kpi_sla', fail);

  const name = typeof data.name === 'string' && data.name.trim() !== ''
    ? data.name
    : basename(source).replace(/\.ya?ml$/i, '');

  return freezePack({
    name,
    source,
    interfacePatterns: readPatterns(contract, 'docs_contract', 'interface_patterns', fail),
    docPatterns: readPatterns(contract, 'docs_contract', 'doc_patterns', fail),
    openapiPatterns: readPatterns(drift, 'drift', 'openapi_patterns', fail),
    sdkPatterns: readPatterns(drift, 'drift', 'sdk_patterns', fail),
    referenceDocPatterns: readPatterns(drift, 'drift', 'reference_doc_patterns', fail),
    slaThresholds: readThresholds(sla, fail),
    gapSettings: readGapSettings(data, fail),
  });
}

/**
 * Load a policy pack from disk.
 */
export async function loadPolicyPack(path: string): Promise<PolicyPack> {
  let content: string;
  try {
    content = await readFile(path, 'utf-8');
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      throw errors.policyPackNotFound(path);
    }
    throw errors.fileReadError(path, error instanceof Error ? error.message : String(error));
  }
  return parsePolicyPack(content, path);
}

/** The pack `docgov init` writes, for runs without a pack file */
export function defaultPolicyPack(): PolicyPack {
  return parsePolicyPack(DEFAULT_POLICY_PACK_YAML, 'built-in defaults');
}

/**
 * An explicit path must load. Without one, `docgov-policy.yml` in the working
 * directory is used when present, else the built-in defaults.
 */
export async function resolvePolicyPack(path: string | undefined): Promise<PolicyPack> {
  if (path) return loadPolicyPack(path);
  try {
    return await loadPolicyPack(DEFAULT_POLICY_PACK_PATH);
  } catch (error) {
    if (error instanceof ConfigError && error.code === 'CONFIG_NOT_FOUND') {
      return defaultPolicyPack();
    }
    throw error;
  }
}
