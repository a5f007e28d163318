/**
 * Tests for the policy pack loader
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdir, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import {
  DEFAULT_POLICY_PACK_YAML,
  defaultPolicyPack,
  isValidGlob,
  loadPolicyPack,
  parsePolicyPack,
} from './policy-pack.js';
import { ConfigError } from '../../utils/errors.js';

const MINIMAL_PACK = `
name: payments-team
docs_contract:
  interface_patterns: ["api/**"]
  doc_patterns: ["docs/**"]
drift:
  openapi_patterns: ["**/openapi.yaml"]
  sdk_patterns: ["sdk/**"]
  reference_doc_patterns: ["docs/reference/**"]
kpi_sla:
  min_quality_score: 80
  max_stale_pct: 15.0
  max_high_priority_gaps: 8
  max_quality_score_drop: 5
`;

function expectConfigError(content: string, fragment: string): void {
  let caught: unknown;
  try {
    parsePolicyPack(content, 'policy.yml');
  } catch (error) {
    caught = error;
  }
  expect(caught).toBeInstanceOf(ConfigError);
  expect(caught instanceof Error ? caught.message : '').toContain(fragment);
}

describe('parsePolicyPack', () => {
  it('should read patterns and thresholds', () => {
    const pack = parsePolicyPack(MINIMAL_PACK, 'policy.yml');

    expect(pack.name).toBe('payments-team');
    expect(pack.source).toBe('policy.yml');
    expect(pack.interfacePatterns).toEqual(['api/**']);
    expect(pack.docPatterns).toEqual(['docs/**']);
    expect(pack.openapiPatterns).toEqual(['**/openapi.yaml']);
    expect(pack.sdkPatterns).toEqual(['sdk/**']);
    expect(pack.referenceDocPatterns).toEqual(['docs/reference/**']);
    expect(pack.slaThresholds).toEqual({
      minQualityScore: 80,
      maxStalePct: 15,
      maxHighPriorityGaps: 8,
      maxQualityScoreDrop: 5,
    });
  });

  it('should apply gap defaults when the section is absent', () => {
    const pack = parsePolicyPack(MINIMAL_PACK, 'policy.yml');

    expect(pack.gapSettings).toEqual({
      staleDays: 90,
      communityMinRepetitions: 2,
      searchMinOccurrences: 5,
      docsDir: 'docs',
      communityFeeds: [],
    });
  });

  it('should read the gaps section', () => {
    const pack = parsePolicyPack(
      `${MINIMAL_PACK}
gaps:
  stale_days: 30
  docs_dir: site/docs
  community_feeds:
    - url: https://forum.example.com/latest.rss
      name: Forum
    - url: https://forum.example.com/c/help.rss
`,
      'policy.yml'
    );

    expect(pack.gapSettings.staleDays).toBe(30);
    expect(pack.gapSettings.communityMinRepetitions).toBe(2);
    expect(pack.gapSettings.docsDir).toBe('site/docs');
    expect(pack.gapSettings.communityFeeds).toEqual([
      { url: 'https://forum.example.com/latest.rss', name: 'Forum' },
      { url: 'https://forum.example.com/c/help.rss', name: 'https://forum.example.com/c/help.rss' },
    ]);
  });

  it('should fall back to the file name when the pack has no name', () => {
    const pack = parsePolicyPack(MINIMAL_PACK.replace('name: payments-team', ''), 'packs/strict.yaml');

    expect(pack.name).toBe('strict');
  });

  it('should freeze the loaded pack', () => {
    const pack = parsePolicyPack(MINIMAL_PACK, 'policy.yml');

    expect(Object.isFrozen(pack)).toBe(true);
    expect(Object.isFrozen(pack.interfacePatterns)).toBe(true);
    expect(Object.isFrozen(pack.slaThresholds)).toBe(true);
    expect(Object.isFrozen(pack.gapSettings)).toBe(true);
  });

  it('should parse the default pack written by init', () => {
    const pack = parsePolicyPack(DEFAULT_POLICY_PACK_YAML, 'policy.yml');

    expect(pack.name).toBe('default');
    expect(pack.interfacePatterns).toContain('api/**');
    expect(pack.slaThresholds.maxStalePct).toBe(15);
  });

  it('should expose the default pack for runs without a pack file', () => {
    const pack = defaultPolicyPack();

    expect(pack.source).toBe('built-in defaults');
    expect(pack.gapSettings.docsDir).toBe('docs');
  });

  describe('validation', () => {
    it('should reject unparsable YAML', () => {
      expectConfigError('docs_contract: [unclosed', 'unparsable YAML');
    });

    it('should reject a document that is not a mapping', () => {
      expectConfigError('- just\n- a list\n', 'policy pack must be a mapping');
    });

    it('should reject a missing section', () => {
      expectConfigError(MINIMAL_PACK.replace(/drift:[\s\S]*?kpi_sla:/, 'kpi_sla:'), "missing section 'drift'");
    });

    it('should reject a missing threshold key', () => {
      expectConfigError(
        MINIMAL_PACK.replace('  max_stale_pct: 15.0\n', ''),
        'kpi_sla.max_stale_pct is missing'
      );
    });

    it('should reject a non-numeric threshold', () => {
      expectConfigError(
        MINIMAL_PACK.replace('max_high_priority_gaps: 8', 'max_high_priority_gaps: lots'),
        'kpi_sla.max_high_priority_gaps must be a non-negative number'
      );
    });

    it('should reject a negative threshold', () => {
      expectConfigError(
        MINIMAL_PACK.replace('max_quality_score_drop: 5', 'max_quality_score_drop: -1'),
        'kpi_sla.max_quality_score_drop must be a non-negative number'
      );
    });

    it('should reject an empty pattern list', () => {
      expectConfigError(
        MINIMAL_PACK.replace('doc_patterns: ["docs/**"]', 'doc_patterns: []'),
        'docs_contract.doc_patterns cannot be empty'
      );
    });

    it('should reject a pattern list that is not a list', () => {
      expectConfigError(
        MINIMAL_PACK.replace('sdk_patterns: ["sdk/**"]', 'sdk_patterns: "sdk/**"'),
        'drift.sdk_patterns must be a list of glob patterns'
      );
    });

    it('should reject a missing pattern list', () => {
      expectConfigError(
        MINIMAL_PACK.replace('  reference_doc_patterns: ["docs/reference/**"]\n', ''),
        'drift.reference_doc_patterns is missing'
      );
    });

    it('should reject a blank glob', () => {
      expectConfigError(
        MINIMAL_PACK.replace('interface_patterns: ["api/**"]', 'interface_patterns: ["api/**", "   "]'),
        'docs_contract.interface_patterns[1] is not a valid glob'
      );
    });

    it('should reject a non-string glob', () => {
      expectConfigError(
        MINIMAL_PACK.replace('interface_patterns: ["api/**"]', 'interface_patterns: [42]'),
        'docs_contract.interface_patterns[0] is not a valid glob: 42'
      );
    });

    it('should reject a feed without a url', () => {
      expectConfigError(
        `${MINIMAL_PACK}\ngaps:\n  community_feeds:\n    - name: Forum\n`,
        'gaps.community_feeds[0] needs a url'
      );
    });

    it('should reject a zero stale_days', () => {
      expectConfigError(`${MINIMAL_PACK}\ngaps:\n  stale_days: 0\n`, 'gaps.stale_days must be a positive integer');
    });
  });
});

describe('isValidGlob', () => {
  it('should accept common globs', () => {
    expect(isValidGlob('docs/**/*.md')).toBe(true);
    expect(isValidGlob('**/*openapi*.{yaml,yml,json}')).toBe(true);
  });

  it('should reject blank strings and non-strings', () => {
    expect(isValidGlob('')).toBe(false);
    expect(isValidGlob(' \t')).toBe(false);
    expect(isValidGlob(null)).toBe(false);
  });
});

describe('loadPolicyPack', () => {
  let testDir: string;

  beforeEach(async () => {
    testDir = join(tmpdir(), `policy-pack-test-${Date.now()}-${Math.random().toString(36).slice(2)}`);
    await mkdir(testDir, { recursive: true });
  });

  afterEach(async () => {
    await rm(testDir, { recursive: true, force: true });
  });

  it('should load a pack from disk', async () => {
    const path = join(testDir, 'policy.yml');
    await writeFile(path, MINIMAL_PACK, 'utf-8');

    const pack = await loadPolicyPack(path);

    expect(pack.name).toBe('payments-team');
    expect(pack.source).toBe(path);
  });

  it('should raise CONFIG_NOT_FOUND for a missing file', async () => {
    const path = join(testDir, 'missing.yml');

    await expect(loadPolicyPack(path)).rejects.toMatchObject({
      code: 'CONFIG_NOT_FOUND',
      message: `Policy pack not found at ${path}`,
    });
  });
});
