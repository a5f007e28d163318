/**
 * docgov kpi-sla-evaluate command
 *
 * Checks a KPI snapshot against the policy pack's SLA thresholds and,
 * optionally, against the previous snapshot's quality score.
 */

import { Command } from 'commander';
import { logger } from '../../utils/logger.js';
import { handleError } from '../../utils/errors.js';
import type { KpiSlaOptions, SLAVerdict } from '../../types/index.js';
import { DEFAULT_POLICY_PACK_PATH, loadPolicyPack } from '../../core/policy/policy-pack.js';
import { loadKpiSnapshot } from '../../core/kpi/kpi-snapshot.js';
import { evaluateSla } from '../../core/kpi/sla-evaluator.js';
import { render } from '../../core/report/report-emitter.js';
import type { ReportDocument } from '../../core/report/report-emitter.js';
import { writeReportFile } from '../../core/report/report-files.js';

export async function runKpiSlaEvaluate(options: KpiSlaOptions): Promise<SLAVerdict> {
  const pack = await loadPolicyPack(options.policyPack);
  const current = await loadKpiSnapshot(options.current);
  const previous = options.previous ? await loadKpiSnapshot(options.previous) : null;

  const verdict = evaluateSla(current, previous, pack.slaThresholds);
  const report: ReportDocument = { kind: 'sla', data: verdict, thresholds: pack.slaThresholds };

  await writeReportFile(options.jsonOutput, render(report, 'json'));
  await writeReportFile(options.mdOutput, render(report, 'markdown'));

  console.log(`SLA status: ${verdict.status}`);
  for (const breach of verdict.breaches) {
    logger.warning(breach);
  }
  for (const note of verdict.trendNotes) {
    logger.debug(note);
  }
  return verdict;
}

export const kpiSlaEvaluateCommand = new Command('kpi-sla-evaluate')
  .description('Evaluate a KPI snapshot against the SLA thresholds')
  .requiredOption('--current <path>', 'Current KPI snapshot (JSON)')
  .option('--previous <path>', 'Previous KPI snapshot, for the trend check')
  .option('--policy-pack <path>', 'Policy pack file', DEFAULT_POLICY_PACK_PATH)
  .option('--json-output <path>', 'JSON report path', 'reports/kpi-sla-report.json')
  .option('--md-output <path>', 'Markdown report path', 'reports/kpi-sla-report.md')
  .addHelpText(
    'after',
    `
Examples:
  $ docgov kpi-sla-evaluate --current reports/kpi-wall.json
  $ docgov kpi-sla-evaluate --current reports/kpi-wall.json --previous baseline/kpi-wall.json

Exit codes:
  0  All thresholds met
  1  BREACH: one or more thresholds failed
  2  Bad policy pack or snapshot, or other error
`
  )
  .action(async function (this: Command) {
    const options = this.optsWithGlobals<KpiSlaOptions>();
    try {
      const verdict = await runKpiSlaEvaluate(options);
      process.exitCode = verdict.status === 'BREACH' ? 1 : 0;
    } catch (error) {
      handleError(error);
    }
  });
