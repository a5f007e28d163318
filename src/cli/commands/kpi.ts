/**
 * docgov kpi command
 *
 * `kpi snapshot` builds the documentation KPI wall from the docs tree and the
 * latest gap report. The JSON output is what `kpi-sla-evaluate` reads.
 */

import { Command } from 'commander';
import { logger } from '../../utils/logger.js';
import { handleError } from '../../utils/errors.js';
import type { KPISnapshot, KpiSnapshotOptions } from '../../types/index.js';
import { resolvePolicyPack } from '../../core/policy/policy-pack.js';
import { loadDocuments } from '../../core/docs/doc-inventory.js';
import { buildKpiSnapshot, readGapCounts } from '../../core/kpi/kpi-snapshot.js';
import { render } from '../../core/report/report-emitter.js';
import { writeReportFile } from '../../core/report/report-files.js';
import { collect, parsePositiveInt } from '../options.js';

export async function runKpiSnapshot(options: KpiSnapshotOptions, now: Date = new Date()): Promise<KPISnapshot> {
  const pack = await resolvePolicyPack(options.policyPack);
  const docsDir = options.docsDir ?? pack.gapSettings.docsDir;
  const staleDays = options.staleDays ?? pack.gapSettings.staleDays;

  logger.discovery(`Reading docs under ${docsDir}...`);
  const documents = await loadDocuments(docsDir);
  const gapCounts = await readGapCounts(options.gapReport);

  const snapshot = buildKpiSnapshot({ documents, gapCounts, staleDays, now, notes: options.note });

  await writeReportFile(options.jsonOutput, render({ kind: 'kpi', data: snapshot }, 'json'));
  await writeReportFile(options.mdOutput, render({ kind: 'kpi', data: snapshot }, 'markdown'));

  logger.info('Quality score', `${snapshot.qualityScore}/100`);
  logger.info('Docs', `${snapshot.totalDocs} (${snapshot.staleDocs} stale)`);
  logger.info('Open gaps', `${snapshot.openGaps} (${snapshot.highPriorityGaps} high)`);
  logger.success(`KPI wall written to ${options.mdOutput}`);
  return snapshot;
}

const kpiSnapshotCommand = new Command('snapshot')
  .description('Build the KPI wall (quality score, staleness, gap counts)')
  .option('--policy-pack <path>', 'Policy pack file (default: docgov-policy.yml if present)')
  .option('--docs-dir <path>', 'Docs directory (default: from the policy pack)')
  .option('--stale-days <n>', 'Review window in days (default: from the policy pack)', parsePositiveInt)
  .option('--gap-report <path>', 'Gap report JSON to count gaps from', 'reports/doc_gaps_report.json')
  .option('--json-output <path>', 'JSON snapshot path', 'reports/kpi-wall.json')
  .option('--md-output <path>', 'Markdown KPI wall path', 'reports/kpi-wall.md')
  .option('--note <text>', 'Executive note to include (repeatable)', collect, [])
  .action(async function (this: Command) {
    const options = this.optsWithGlobals<KpiSnapshotOptions>();
    try {
      await runKpiSnapshot(options);
    } catch (error) {
      handleError(error);
    }
  });

export const kpiCommand = new Command('kpi')
  .description('Documentation KPI reporting')
  .addCommand(kpiSnapshotCommand)
  .addHelpText(
    'after',
    `
Examples:
  $ docgov kpi snapshot
  $ docgov kpi snapshot --docs-dir site/docs --note "Migration docs landed this sprint"
  $ docgov kpi-sla-evaluate --current reports/kpi-wall.json
`
  );
