/**
 * docgov drift-check command
 *
 * Flags a change set where the OpenAPI contract or SDK moved but the
 * reference docs did not. Writes paired JSON and Markdown reports.
 */

import { Command } from 'commander';
import { logger } from '../../utils/logger.js';
import { handleError } from '../../utils/errors.js';
import type { DriftCheckOptions, DriftReport } from '../../types/index.js';
import { DEFAULT_POLICY_PACK_PATH, loadPolicyPack } from '../../core/policy/policy-pack.js';
import { GitVersionControl } from '../../core/changes/git-diff.js';
import type { VersionControl } from '../../core/changes/git-diff.js';
import { ChangeSetClassifier } from '../../core/changes/change-classifier.js';
import { evaluateDrift } from '../../core/drift/drift-detector.js';
import { render } from '../../core/report/report-emitter.js';
import { writeReportFile } from '../../core/report/report-files.js';

export async function runDriftCheck(
  options: DriftCheckOptions,
  vcs: VersionControl = new GitVersionControl(options.repo)
): Promise<DriftReport> {
  const pack = await loadPolicyPack(options.policyPack);
  const classified = await new ChangeSetClassifier(vcs, pack).classify(options.base, options.head);
  const report = evaluateDrift(classified);

  await writeReportFile(options.jsonOutput, render({ kind: 'drift', data: report }, 'json'));
  await writeReportFile(options.mdOutput, render({ kind: 'drift', data: report }, 'markdown'));

  logger.info('OpenAPI changes', String(report.openapiChanges.length));
  logger.info('SDK changes', String(report.sdkChanges.length));
  logger.info('Reference doc changes', String(report.referenceDocChanges.length));
  console.log(`Drift status: ${report.status}`);
  console.log(report.summary);
  return report;
}

export const driftCheckCommand = new Command('drift-check')
  .description('Detect API/SDK changes that are missing reference docs updates')
  .requiredOption('--base <ref>', 'Base revision of the change set')
  .requiredOption('--head <ref>', 'Head revision of the change set')
  .option('--policy-pack <path>', 'Policy pack file', DEFAULT_POLICY_PACK_PATH)
  .option('--repo <path>', 'Repository to diff', '.')
  .option('--json-output <path>', 'JSON report path', 'reports/api_sdk_drift_report.json')
  .option('--md-output <path>', 'Markdown report path', 'reports/api_sdk_drift_report.md')
  .addHelpText(
    'after',
    `
Examples:
  $ docgov drift-check --base origin/main --head HEAD
  $ docgov drift-check --base HEAD~5 --head HEAD --md-output drift.md

Exit codes:
  0  OK
  1  DRIFT: OpenAPI or SDK changed without reference docs
  2  Bad policy pack, unresolvable ref or other error
`
  )
  .action(async function (this: Command) {
    const options = this.optsWithGlobals<DriftCheckOptions>();
    try {
      const report = await runDriftCheck(options);
      process.exitCode = report.status === 'DRIFT' ? 1 : 0;
    } catch (error) {
      handleError(error);
    }
  });
