/**
 * docgov gaps command
 *
 * `gaps analyze` merges code changes, community questions, stale pages and
 * zero-result searches into one ranked documentation backlog. A source that
 * fails is listed as a caveat; the reports are always written.
 */

import { Command } from 'commander';
import { join } from 'node:path';
import { logger } from '../../utils/logger.js';
import { handleError } from '../../utils/errors.js';
import type { GapReport, GapsAnalyzeOptions, PolicyPack } from '../../types/index.js';
import { resolvePolicyPack } from '../../core/policy/policy-pack.js';
import { GitVersionControl } from '../../core/changes/git-diff.js';
import type { VersionControl } from '../../core/changes/git-diff.js';
import { runCollectors } from '../../core/gaps/collector.js';
import type { GapCollector } from '../../core/gaps/collector.js';
import { CodeChangeCollector } from '../../core/gaps/code-change-collector.js';
import { CommunityCollector } from '../../core/gaps/community-collector.js';
import type { FetchFn } from '../../core/gaps/community-collector.js';
import { StalenessCollector } from '../../core/gaps/staleness-collector.js';
import { SearchAnalyticsCollector } from '../../core/gaps/search-collector.js';
import { aggregate, buildGapReport } from '../../core/gaps/gap-aggregator.js';
import { render, renderGapCsv } from '../../core/report/report-emitter.js';
import { renderGapWorkbook } from '../../core/report/xlsx-writer.js';
import { writeReportFile } from '../../core/report/report-files.js';
import { parsePositiveInt } from '../options.js';

// ============================================================================
// TYPES
// ============================================================================

export interface GapsAnalyzeDeps {
  vcs?: VersionControl;
  fetchFn?: FetchFn;
  now?: Date;
}

export const GAP_REPORT_BASENAME = 'doc_gaps_report';

const TOP_GAPS_SHOWN = 5;

// ============================================================================
// HELPER FUNCTIONS
// ============================================================================

/**
 * Code changes and staleness always run; community and search only when
 * they have something to read
 */
export function buildCollectors(
  options: GapsAnalyzeOptions,
  pack: PolicyPack,
  vcs: VersionControl,
  now: Date,
  fetchFn?: FetchFn
): GapCollector[] {
  const settings = pack.gapSettings;
  const collectors: GapCollector[] = [
    new CodeChangeCollector({ vcs, pack, sinceDays: options.since, now }),
    new StalenessCollector({ docsDir: join(options.repo, settings.docsDir), staleDays: settings.staleDays, now }),
  ];

  if (settings.communityFeeds.length > 0 || options.communityJson) {
    collectors.push(
      new CommunityCollector({
        feeds: settings.communityFeeds,
        exportPath: options.communityJson,
        minRepetitions: settings.communityMinRepetitions,
        sinceDays: options.since,
        now,
        fetchFn,
      })
    );
  } else {
    logger.debug('No community feeds or export configured; skipping community signals');
  }

  const searchExport = options.algoliaCsv
    ? { exportPath: options.algoliaCsv, format: 'csv' as const }
    : options.algoliaJson
      ? { exportPath: options.algoliaJson, format: 'json' as const }
      : undefined;
  if (options.algoliaCsv && options.algoliaJson) {
    logger.warning(`Both search exports given; reading ${options.algoliaCsv}`);
  }
  if (searchExport) {
    collectors.push(
      new SearchAnalyticsCollector({
        ...searchExport,
        minOccurrences: settings.searchMinOccurrences,
        now,
      })
    );
  } else {
    logger.debug('No search analytics export given; skipping search signals');
  }

  return collectors;
}

// ============================================================================
// RUNNER
// ============================================================================

export async function runGapsAnalyze(options: GapsAnalyzeOptions, deps: GapsAnalyzeDeps = {}): Promise<GapReport> {
  const now = deps.now ?? new Date();
  const pack = await resolvePolicyPack(options.policyPack);
  const vcs = deps.vcs ?? new GitVersionControl(options.repo);

  logger.section('Documentation Gap Analysis');
  logger.info('Policy pack', `${pack.name} (${pack.source})`);
  logger.info('Window', `last ${options.since} day(s)`);

  const collectors = buildCollectors(options, pack, vcs, now, deps.fetchFn);
  const spinner = logger.spinner(`Collecting from ${collectors.map((collector) => collector.source).join(', ')}...`);
  const run = await runCollectors(collectors);
  spinner.succeed(`Collected from ${run.succeeded.length}/${collectors.length} source(s)`);

  logger.inference('Merging gap signals...');

  const gaps = aggregate(
    run.batches.CodeChange,
    run.batches.Community,
    run.batches.Staleness,
    run.batches.SearchAnalytics
  );
  const report = buildGapReport({
    gaps,
    generatedAt: now,
    sinceDays: options.since,
    sourcesAnalyzed: run.succeeded,
    collectionFailures: run.failures,
  });

  const base = join(options.outputDir, GAP_REPORT_BASENAME);
  await writeReportFile(`${base}.json`, render({ kind: 'gaps', data: report }, 'json'));
  await writeReportFile(`${base}.md`, render({ kind: 'gaps', data: report }, 'markdown'));
  await writeReportFile(`${base}.csv`, renderGapCsv(report));
  if (options.xlsx) {
    await writeReportFile(`${base}.xlsx`, await renderGapWorkbook(report));
  }

  logger.blank();
  logger.info('Total gaps', String(report.summary.totalGaps));
  logger.info('High priority', String(report.summary.byPriority.high));
  for (const gap of report.gaps.slice(0, TOP_GAPS_SHOWN)) {
    logger.listItem(`[${gap.priority}] ${gap.title}`, 1);
  }
  if (report.collectionFailures.length > 0) {
    logger.warning(`${report.collectionFailures.length} source(s) failed; see the report caveats`);
  }
  logger.success(`Reports written to ${options.outputDir}`);
  return report;
}

// ============================================================================
// COMMAND
// ============================================================================

const gapsAnalyzeCommand = new Command('analyze')
  .description('Build the prioritized documentation gap backlog')
  .option('--since <days>', 'Look back this many days', parsePositiveInt, 7)
  .option('--repo <path>', 'Repository to analyze', '.')
  .option('--output-dir <path>', 'Directory for the reports', './reports')
  .option('--policy-pack <path>', 'Policy pack file (default: docgov-policy.yml if present)')
  .option('--algolia-json <path>', 'Search analytics export (JSON)')
  .option('--algolia-csv <path>', 'Search analytics export (CSV download); wins over --algolia-json')
  .option('--community-json <path>', 'Community forum export (JSON)')
  .option('--no-xlsx', 'Skip the Excel workbook')
  .action(async function (this: Command) {
    const options = this.optsWithGlobals<GapsAnalyzeOptions>();
    try {
      await runGapsAnalyze(options);
    } catch (error) {
      handleError(error);
    }
  });

export const gapsCommand = new Command('gaps')
  .description('Documentation gap analysis')
  .addCommand(gapsAnalyzeCommand)
  .addHelpText(
    'after',
    `
Examples:
  $ docgov gaps analyze
  $ docgov gaps analyze --since 14 --algolia-json exports/searches.json
  $ docgov gaps analyze --algolia-csv exports/searches.csv
  $ docgov gaps analyze --community-json exports/forum.json --no-xlsx

Outputs (in --output-dir):
  doc_gaps_report.json   Machine-readable backlog
  doc_gaps_report.md     Summary table
  doc_gaps_report.csv    One row per gap
  doc_gaps_report.xlsx   Workbook with summary, priority and per-source sheets
`
  );
