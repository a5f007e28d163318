/**
 * Tests for kpi-sla-evaluate command
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdir, readFile, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import type { KpiSlaOptions } from '../../types/index.js';
import { DEFAULT_POLICY_PACK_YAML } from '../../core/policy/policy-pack.js';

vi.mock('../../utils/logger.js', () => ({
  logger: {
    info: vi.fn(),
    warning: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
  },
}));

describe('kpi-sla-evaluate command', () => {
  let testDir: string;
  let options: KpiSlaOptions;

  async function writeSnapshot(name: string, snapshot: Record<string, unknown>): Promise<string> {
    const path = join(testDir, name);
    await writeFile(path, JSON.stringify(snapshot), 'utf-8');
    return path;
  }

  beforeEach(async () => {
    testDir = join(tmpdir(), `kpi-sla-test-${Date.now()}-${Math.random().toString(36).slice(2)}`);
    await mkdir(testDir, { recursive: true });
    await writeFile(join(testDir, 'policy.yml'), DEFAULT_POLICY_PACK_YAML, 'utf-8');
    options = {
      current: join(testDir, 'current.json'),
      policyPack: join(testDir, 'policy.yml'),
      jsonOutput: join(testDir, 'out', 'sla.json'),
      mdOutput: join(testDir, 'out', 'sla.md'),
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
    it('should require the current snapshot', async () => {
      const { kpiSlaEvaluateCommand } = await import('./kpi-sla-evaluate.js');

      expect(kpiSlaEvaluateCommand.name()).toBe('kpi-sla-evaluate');
      expect(kpiSlaEvaluateCommand.options.find((opt) => opt.long === '--current')?.mandatory).toBe(true);
      expect(kpiSlaEvaluateCommand.options.find((opt) => opt.long === '--previous')?.mandatory).toBe(false);
    });
  });

  describe('runKpiSlaEvaluate', () => {
    it('should report breaches against the pack thresholds and the previous snapshot', async () => {
      const { runKpiSlaEvaluate } = await import('./kpi-sla-evaluate.js');
      await writeSnapshot('current.json', { qualityScore: 79, totalDocs: 2, staleDocs: 1, highPriorityGaps: 2 });
      const previous = await writeSnapshot('previous.json', { quality_score: 88, total_docs: 2 });

      const verdict = await runKpiSlaEvaluate({ ...options, previous });

      expect(verdict.status).toBe('BREACH');
      expect(verdict.breaches).toHaveLength(3);
      expect(verdict.metrics.qualityScoreDelta).toBe(-9);
      expect(console.log).toHaveBeenCalledWith('SLA status: BREACH');

      const json: unknown = JSON.parse(await readFile(options.jsonOutput, 'utf-8'));
      expect(json).toMatchObject({ status: 'BREACH', metrics: { stalePct: 50 } });
      const markdown = await readFile(options.mdOutput, 'utf-8');
      expect(markdown).toContain('- Minimum quality score: 80');
      expect(markdown).toContain('- Quality score breach: 79 < 80.');
    });

    it('should pass a healthy snapshot', async () => {
      const { runKpiSlaEvaluate } = await import('./kpi-sla-evaluate.js');
      await writeSnapshot('current.json', { qualityScore: 92, totalDocs: 40, staleDocs: 2, highPriorityGaps: 1 });

      const verdict = await runKpiSlaEvaluate(options);

      expect(verdict.status).toBe('OK');
      expect(verdict.trendNotes).toEqual([]);
    });

    it('should fail before writing reports when the snapshot is missing', async () => {
      const { runKpiSlaEvaluate } = await import('./kpi-sla-evaluate.js');

      await expect(runKpiSlaEvaluate(options)).rejects.toMatchObject({ code: 'CONFIG_NOT_FOUND' });
      await expect(readFile(options.jsonOutput, 'utf-8')).rejects.toThrow();
    });
  });
});
