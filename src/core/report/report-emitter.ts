/**
 * Report emitter
 *
 * Serializes verdicts and reports as JSON or Markdown, and gap reports as
 * CSV. Pure string building; commands decide where the output goes.
 */

import type {
  ContractViolation,
  DriftReport,
  Gap,
  GapReport,
  KPISnapshot,
  ScoreContribution,
  SLAVerdict,
  SlaThresholds,
} from '../../types/index.js';
import { formatNumber } from '../kpi/sla-evaluator.js';
import { stalePercentage } from '../kpi/kpi-snapshot.js';

// ============================================================================
// TYPES
// ============================================================================

export type ReportFormat = 'json' | 'markdown';

export type ReportDocument =
  | { kind: 'contract'; data: ContractViolation }
  | { kind: 'drift'; data: DriftReport }
  | { kind: 'sla'; data: SLAVerdict; thresholds: SlaThresholds }
  | { kind: 'gaps'; data: GapReport }
  | { kind: 'kpi'; data: KPISnapshot };

// ============================================================================
// MARKDOWN HELPERS
// ============================================================================

function codeList(items: readonly string[]): string {
  return items.length === 0 ? '- none' : items.map((item) => `- \`${item}\``).join('\n');
}

function plainList(items: readonly string[]): string {
  return items.length === 0 ? '- none' : items.map((item) => `- ${item}`).join('\n');
}

function tableCell(text: string): string {
  return text.replace(/\|/g, '\\|').replace(/\s*\n\s*/g, ' ');
}

// ============================================================================
// RENDERERS
// ============================================================================

function renderContract(report: ContractViolation): string {
  return [
    '# Docs Contract Check',
    '',
    `Status: **${report.satisfied ? 'SATISFIED' : 'VIOLATION'}**`,
    '',
    report.explanation,
    '',
    '## Interface files changed',
    '',
    codeList(report.interfaceFilesChanged),
    '',
    '## Documentation files changed',
    '',
    codeList(report.docFilesChanged),
    '',
  ].join('\n');
}

function renderDrift(report: DriftReport): string {
  return [
    '# API/SDK Drift Report',
    '',
    `Status: **${report.status}**`,
    '',
    report.summary,
    '',
    '## OpenAPI changes',
    '',
    codeList(report.openapiChanges),
    '',
    '## SDK/client changes',
    '',
    codeList(report.sdkChanges),
    '',
    '## Reference docs changes',
    '',
    codeList(report.referenceDocChanges),
    '',
  ].join('\n');
}

function renderSla(verdict: SLAVerdict, thresholds: SlaThresholds): string {
  const delta = verdict.metrics.qualityScoreDelta;
  return [
    '# KPI SLA Evaluation',
    '',
    `Status: **${verdict.status}**`,
    '',
    verdict.summary,
    '',
    '## Metrics',
    '',
    `- Quality score: ${formatNumber(verdict.metrics.qualityScore)}`,
    `- Stale percent: ${verdict.metrics.stalePct.toFixed(1)}%`,
    `- High-priority gaps: ${formatNumber(verdict.metrics.highPriorityGaps)}`,
    `- Quality score delta: ${delta === null ? 'n/a' : formatNumber(delta)}`,
    '',
    '## Thresholds',
    '',
    `- Minimum quality score: ${formatNumber(thresholds.minQualityScore)}`,
    `- Maximum stale percent: ${thresholds.maxStalePct.toFixed(1)}%`,
    `- Maximum high-priority gaps: ${formatNumber(thresholds.maxHighPriorityGaps)}`,
    `- Maximum quality score drop: ${formatNumber(thresholds.maxQualityScoreDrop)}`,
    '',
    '## Breaches',
    '',
    plainList(verdict.breaches),
    '',
    '## Trend notes',
    '',
    plainList(verdict.trendNotes),
    '',
  ].join('\n');
}

function renderKpi(snapshot: KPISnapshot): string {
  const metadata =
    snapshot.metadataCompletenessPct === undefined ? 'n/a' : `${formatNumber(snapshot.metadataCompletenessPct)}%`;
  return [
    '# Documentation KPI Wall',
    '',
    `Generated at: ${snapshot.generatedAt}`,
    '',
    '## Scorecard',
    '',
    `- Quality score: **${formatNumber(snapshot.qualityScore)}/100**`,
    `- Total docs: **${snapshot.totalDocs}**`,
    `- Docs with frontmatter: **${snapshot.docsWithFrontmatter}**`,
    `- Metadata completeness: **${metadata}**`,
    `- Stale docs: **${snapshot.staleDocs} (${stalePercentage(snapshot).toFixed(1)}%)**`,
    `- Open doc gaps: **${snapshot.openGaps}**`,
    `- High-priority doc gaps: **${snapshot.highPriorityGaps}**`,
    '',
    '## Executive Notes',
    '',
    plainList(snapshot.notes),
    '',
    '## Suggested Focus This Week',
    '',
    '1. Resolve high-priority gaps first.',
    '1. Reduce stale-doc ratio below 10%.',
    '1. Keep metadata completeness above 95%.',
    '',
  ].join('\n');
}

function gapRow(gap: Gap): string {
  return `| ${gap.id} | ${gap.priority} | ${formatNumber(gap.score)} | ${tableCell(gap.title)} | ${gap.suggestedDocType} | ${gap.sources.join(', ')} |`;
}

function countList(counts: Partial<Record<string, number>>): string {
  const entries = Object.entries(counts);
  return entries.length === 0 ? '- none' : entries.map(([key, count]) => `- ${key}: ${count ?? 0}`).join('\n');
}

function contributionText(contribution: ScoreContribution): string {
  return (
    `${contribution.source} (base ${formatNumber(contribution.baseWeight)}, ` +
    `recency ${formatNumber(contribution.recencyBonus)}, volume ${formatNumber(contribution.volumeBonus)})`
  );
}

function gapDetail(gap: Gap): string[] {
  const lines = [
    `### ${gap.id}: ${gap.title}`,
    '',
    gap.description,
    '',
    `- Category: ${gap.category}`,
    `- Detected at: ${gap.detectedAt}`,
    `- Volume: ${gap.volume}`,
    `- Score: ${gap.contributions.map(contributionText).join(' + ')}`,
  ];
  if (gap.evidence.length === 0) {
    lines.push('- Evidence: none');
  } else {
    lines.push('- Evidence:', ...gap.evidence.map((item) => `  - ${item}`));
  }
  lines.push('');
  return lines;
}

function renderGaps(report: GapReport): string {
  const { summary } = report;
  const lines = [
    '# Documentation Gap Report',
    '',
    `Generated at: ${report.generatedAt}`,
    `Window: last ${report.sinceDays} day(s)`,
    `Sources analyzed: ${report.sourcesAnalyzed.length > 0 ? report.sourcesAnalyzed.join(', ') : 'none'}`,
    '',
    '## Summary',
    '',
    `- Total gaps: **${summary.totalGaps}**`,
    `- High priority: **${summary.byPriority.high}**`,
    `- Medium priority: **${summary.byPriority.medium}**`,
    `- Low priority: **${summary.byPriority.low}**`,
    '',
    '### By source',
    '',
    countList(summary.bySource),
    '',
    '### By doc type',
    '',
    countList(summary.byDocType),
    '',
  ];

  if (report.collectionFailures.length > 0) {
    lines.push('## Collection failures', '');
    for (const failure of report.collectionFailures) {
      lines.push(`- ${failure.source}: ${failure.message}`);
    }
    lines.push('');
  }

  lines.push('## Gaps', '');
  if (report.gaps.length === 0) {
    lines.push('No documentation gaps found.');
  } else {
    lines.push('| ID | Priority | Score | Title | Doc type | Sources |', '|---|---|---|---|---|---|');
    lines.push(...report.gaps.map(gapRow));
    lines.push('', '## Gap details', '');
    for (const gap of report.gaps) {
      lines.push(...gapDetail(gap));
    }
  }
  if (lines[lines.length - 1] !== '') lines.push('');
  return lines.join('\n');
}

function renderMarkdown(report: ReportDocument): string {
  switch (report.kind) {
    case 'contract': return renderContract(report.data);
    case 'drift': return renderDrift(report.data);
    case 'sla': return renderSla(report.data, report.thresholds);
    case 'gaps': return renderGaps(report.data);
    case 'kpi': return renderKpi(report.data);
  }
}

// ============================================================================
// PUBLIC API
// ============================================================================

export function render(report: ReportDocument, format: ReportFormat): string {
  if (format === 'json') {
    return `${JSON.stringify(report.data, null, 2)}\n`;
  }
  return renderMarkdown(report);
}

export const GAP_CSV_HEADERS = [
  'ID',
  'Title',
  'Description',
  'Source',
  'Sources',
  'Category',
  'Suggested Doc Type',
  'Priority',
  'Score',
  'Frequency',
  'Action Required',
  'Status',
] as const;

/** Quote a field when it holds a delimiter, quote or line break */
export function csvField(value: string | number): string {
  const text = String(value);
  return /[",\r\n]/.test(text) ? `"${text.replace(/"/g, '""')}"` : text;
}

export function actionFor(gap: Gap): string {
  return `Create ${gap.suggestedDocType} document: ${gap.title}`;
}

export function renderGapCsv(report: GapReport): string {
  const rows = report.gaps.map((gap) => [
    gap.id,
    gap.title,
    gap.description,
    gap.source,
    gap.sources.join(', '),
    gap.category,
    gap.suggestedDocType,
    gap.priority,
    gap.score,
    gap.volume,
    actionFor(gap),
    'open',
  ]);
  return [[...GAP_CSV_HEADERS], ...rows].map((row) => row.map(csvField).join(',')).join('\r\n') + '\r\n';
}
