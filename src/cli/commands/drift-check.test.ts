/**
 * Tests for drift-check command
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdir, readFile, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import type { ChangedFile, DriftCheckOptions } from '../../types/index.js';
import type { VersionControl } from '../../core/changes/git-diff.js';
import { DEFAULT_POLICY_PACK_YAML } from '../../core/policy/policy-pack.js';

vi.mock('../../utils/logger.js', () => ({
  logger: {
    info: vi.fn(),
    warning: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
  },
}));

function fakeVcs(files: ChangedFile[]): VersionControl {
  return {
    resolveRef: vi.fn(async (ref: string) => ref),
    diff: vi.fn(async () => files),
    revisionBefore: vi.fn(async () => 'base'),
    fileDiff: vi.fn(async () => ''),
  } satisfies VersionControl;
}

describe('drift-check command', () => {
  let testDir: string;
  let options: DriftCheckOptions;

  beforeEach(async () => {
    testDir = join(tmpdir(), `drift-check-test-${Date.now()}-${Math.random().toString(36).slice(2)}`);
    await mkdir(testDir, { recursive: true });
    await writeFile(join(testDir, 'policy.yml'), DEFAULT_POLICY_PACK_YAML, 'utf-8');
    options = {
      base: 'v1.0.0',
      head: 'HEAD',
      policyPack: join(testDir, 'policy.yml'),
      repo: testDir,
      jsonOutput: join(testDir, 'reports', 'drift.json'),
      mdOutput: join(testDir, 'reports', 'drift.md'),
      quiet: false,
      verbose: false,
      noColor: true,
    };
    vi.spyOn(console, 'log').mockImplementation(() => {});
  });

  afterEach(async () => {
    await rm(testDir, { recursive: true, force: true });
    vi.restoreAllMocks();
  });

  describe('command configuration', () => {
    it('should have correct name', async () => {
      const { driftCheckCommand } = await import('./drift-check.js');

      expect(driftCheckCommand.name()).toBe('drift-check');
    });

    it('should default both report paths under reports/', async () => {
      const { driftCheckCommand } = await import('./drift-check.js');

      expect(driftCheckCommand.options.find((opt) => opt.long === '--json-output')?.defaultValue).toBe(
        'reports/api_sdk_drift_report.json'
      );
      expect(driftCheckCommand.options.find((opt) => opt.long === '--md-output')?.defaultValue).toBe(
        'reports/api_sdk_drift_report.md'
      );
    });
  });

  describe('runDriftCheck', () => {
    it('should report drift and write both reports', async () => {
      const { runDriftCheck } = await import('./drift-check.js');

      const report = await runDriftCheck(
        options,
        fakeVcs([
          { path: 'api/openapi.yaml', changeType: 'modified' },
          { path: 'sdk/python/client.py', changeType: 'modified' },
        ])
      );

      expect(report.status).toBe('DRIFT');
      const json: unknown = JSON.parse(await readFile(options.jsonOutput, 'utf-8'));
      expect(json).toEqual({
        status: 'DRIFT',
        summary: 'API/SDK changes detected without reference documentation updates.',
        openapiChanges: ['api/openapi.yaml'],
        sdkChanges: ['sdk/python/client.py'],
        referenceDocChanges: [],
      });
      const markdown = await readFile(options.mdOutput, 'utf-8');
      expect(markdown.split('\n').slice(0, 3)).toEqual(['# API/SDK Drift Report', '', 'Status: **DRIFT**']);
      expect(console.log).toHaveBeenCalledWith('Drift status: DRIFT');
    });

    it('should be OK when reference docs changed too', async () => {
      const { runDriftCheck } = await import('./drift-check.js');

      const report = await runDriftCheck(
        options,
        fakeVcs([
          { path: 'api/openapi.yaml', changeType: 'modified' },
          { path: 'docs/reference/orders.md', changeType: 'modified' },
        ])
      );

      expect(report.status).toBe('OK');
      expect(report.referenceDocChanges).toEqual(['docs/reference/orders.md']);
    });

    it('should write reports for an empty change set', async () => {
      const { runDriftCheck } = await import('./drift-check.js');

      const report = await runDriftCheck(options, fakeVcs([]));

      expect(report.summary).toBe('No API/SDK signature changes detected.');
      expect(await readFile(options.mdOutput, 'utf-8')).toContain('Status: **OK**');
    });
  });
});
