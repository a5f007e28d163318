/**
 * Gap report workbook
 *
 * Builds the spreadsheet handed to documentation teams: a summary sheet,
 * the full backlog, the high-priority subset and a per-source breakdown.
 */

import ExcelJS from 'exceljs';
import type { Column, Fill, Workbook, Worksheet } from 'exceljs';
import type { Gap, GapPriority, GapReport, GapSource } from '../../types/index.js';
import { actionFor } from './report-emitter.js';

export const SHEET_NAMES = {
  summary: 'Summary',
  gaps: 'Documentation Gaps',
  highPriority: 'High Priority',
  bySource: 'By Source',
} as const;

const HEADER_FILL: Fill = { type: 'pattern', pattern: 'solid', fgColor: { argb: 'FF4472C4' } };

const PRIORITY_FILLS: Readonly<Record<GapPriority, Fill>> = {
  high: { type: 'pattern', pattern: 'solid', fgColor: { argb: 'FFFFE0E0' } },
  medium: { type: 'pattern', pattern: 'solid', fgColor: { argb: 'FFFFF3E0' } },
  low: { type: 'pattern', pattern: 'solid', fgColor: { argb: 'FFE8F5E9' } },
};

const GAP_COLUMNS: Array<Partial<Column>> = [
  { header: 'ID', key: 'id', width: 18 },
  { header: 'Title', key: 'title', width: 50 },
  { header: 'Source', key: 'source', width: 16 },
  { header: 'Category', key: 'category', width: 15 },
  { header: 'Doc Type', key: 'docType', width: 15 },
  { header: 'Priority', key: 'priority', width: 10 },
  { header: 'Score', key: 'score', width: 10 },
  { header: 'Frequency', key: 'volume', width: 10 },
  { header: 'Action', key: 'action', width: 60 },
];

/** Rows listed per source on the breakdown sheet */
const TOP_PER_SOURCE = 10;

function writeSummarySheet(sheet: Worksheet, report: GapReport): void {
  sheet.getCell('A1').value = 'Documentation Gap Analysis Report';
  sheet.getCell('A1').font = { bold: true, size: 14 };

  sheet.getCell('A3').value = 'Generated:';
  sheet.getCell('B3').value = report.generatedAt;
  sheet.getCell('A4').value = 'Window (days):';
  sheet.getCell('B4').value = report.sinceDays;
  sheet.getCell('A5').value = 'Sources Analyzed:';
  sheet.getCell('B5').value = report.sourcesAnalyzed.join(', ');

  sheet.getCell('A7').value = 'Summary';
  sheet.getCell('A7').font = { bold: true, size: 12 };

  const { summary } = report;
  const rows: Array<[string, number]> = [
    ['Total Gaps', summary.totalGaps],
    ['High Priority', summary.byPriority.high],
    ['Medium Priority', summary.byPriority.medium],
    ['Low Priority', summary.byPriority.low],
  ];
  let row = 8;
  for (const [label, value] of rows) {
    sheet.getCell(`A${row}`).value = label;
    sheet.getCell(`B${row}`).value = value;
    row += 1;
  }

  for (const failure of report.collectionFailures) {
    sheet.getCell(`A${row}`).value = `${failure.source} failed`;
    sheet.getCell(`B${row}`).value = failure.message;
    row += 1;
  }

  sheet.getColumn(1).width = 25;
  sheet.getColumn(2).width = 40;
}

function writeGapSheet(sheet: Worksheet, gaps: readonly Gap[]): void {
  sheet.columns = GAP_COLUMNS;
  const header = sheet.getRow(1);
  header.font = { bold: true, color: { argb: 'FFFFFFFF' } };
  header.eachCell((cell) => {
    cell.fill = HEADER_FILL;
  });

  for (const gap of gaps) {
    const row = sheet.addRow({
      id: gap.id,
      title: gap.title,
      source: gap.source,
      category: gap.category,
      docType: gap.suggestedDocType,
      priority: gap.priority,
      score: gap.score,
      volume: gap.volume,
      action: actionFor(gap),
    });
    row.eachCell((cell) => {
      cell.fill = PRIORITY_FILLS[gap.priority];
    });
  }
}

function writeBySourceSheet(sheet: Worksheet, gaps: readonly Gap[]): void {
  const bySource = new Map<GapSource, Gap[]>();
  for (const gap of gaps) {
    const list = bySource.get(gap.source);
    if (list) list.push(gap);
    else bySource.set(gap.source, [gap]);
  }

  let row = 1;
  for (const [source, sourceGaps] of bySource) {
    const heading = sheet.getCell(row, 1);
    heading.value = `Source: ${source}`;
    heading.font = { bold: true, size: 12 };
    sheet.getCell(row, 2).value = `(${sourceGaps.length} gaps)`;
    row += 2;

    for (const gap of sourceGaps.slice(0, TOP_PER_SOURCE)) {
      sheet.getCell(row, 1).value = gap.id;
      sheet.getCell(row, 2).value = gap.title;
      sheet.getCell(row, 3).value = gap.priority;
      row += 1;
    }
    row += 2;
  }

  sheet.getColumn(1).width = 25;
  sheet.getColumn(2).width = 50;
}

export function buildGapWorkbook(report: GapReport): Workbook {
  const workbook = new ExcelJS.Workbook();
  workbook.creator = 'docgov';
  workbook.created = new Date(report.generatedAt);

  writeSummarySheet(workbook.addWorksheet(SHEET_NAMES.summary), report);
  writeGapSheet(workbook.addWorksheet(SHEET_NAMES.gaps), report.gaps);
  writeGapSheet(
    workbook.addWorksheet(SHEET_NAMES.highPriority),
    report.gaps.filter((gap) => gap.priority === 'high')
  );
  writeBySourceSheet(workbook.addWorksheet(SHEET_NAMES.bySource), report.gaps);
  return workbook;
}

export async function renderGapWorkbook(report: GapReport): Promise<Buffer> {
  const data = await buildGapWorkbook(report).xlsx.writeBuffer();
  return Buffer.from(data);
}
