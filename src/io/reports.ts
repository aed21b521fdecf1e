import { promises as fsp } from 'node:fs';
import path from 'node:path';
import ExcelJS from 'exceljs';
import { TABLE_NAMES } from '../schema/columns.js';
import type { AnalysisTables, SummaryMetric } from '../services/analysis.js';
import type { MismatchEntry } from '../services/validator.js';

export const MISMATCH_HEADERS = [
  'Table',
  'Column',
  'Total Mismatches',
  'Sample Mismatch Raw',
  'Sample Mismatch Normalized',
] as const;

function styleHeader(sheet: ExcelJS.Worksheet): void {
  const headerRow = sheet.getRow(1);
  headerRow.font = { bold: true };
  headerRow.alignment = { vertical: 'middle' };
}

async function saveWorkbook(workbook: ExcelJS.Workbook, filePath: string): Promise<string> {
  await fsp.mkdir(path.dirname(filePath), { recursive: true });
  await workbook.xlsx.writeFile(filePath);
  return filePath;
}

export function mismatchRows(mismatches: readonly MismatchEntry[]): Array<[string, string, number, string, string]> {
  return mismatches.map((entry) => [
    entry.table,
    entry.column,
    entry.mismatchCount,
    entry.sampleRaw.join('; '),
    entry.sampleNormalized.join('; '),
  ]);
}

export function buildMismatchWorkbook(mismatches: readonly MismatchEntry[]): ExcelJS.Workbook {
  const workbook = new ExcelJS.Workbook();
  workbook.created = new Date();
  const sheet = workbook.addWorksheet('Mismatches');
  sheet.addRow([...MISMATCH_HEADERS]);
  styleHeader(sheet);
  for (const row of mismatchRows(mismatches)) {
    sheet.addRow(row);
  }
  sheet.columns = [{ width: 14 }, { width: 24 }, { width: 18 }, { width: 48 }, { width: 48 }];
  return workbook;
}

export async function writeMismatchWorkbook(filePath: string, mismatches: readonly MismatchEntry[]): Promise<string> {
  return saveWorkbook(buildMismatchWorkbook(mismatches), filePath);
}

/** One sheet per normalized table, then a flattened Summary sheet. */
export function buildAnalysisWorkbook(tables: AnalysisTables, summary: readonly SummaryMetric[]): ExcelJS.Workbook {
  const workbook = new ExcelJS.Workbook();
  workbook.created = new Date();

  for (const table of TABLE_NAMES) {
    const data = tables[table];
    const sheet = workbook.addWorksheet(table);
    if (!data) continue;
    sheet.addRow(data.columns);
    styleHeader(sheet);
    for (const row of data.rows) {
      sheet.addRow(data.columns.map((column) => row[column] ?? null));
    }
  }

  const sheet = workbook.addWorksheet('Summary');
  sheet.addRow(['Metric', 'Value']);
  styleHeader(sheet);
  for (const entry of summary) {
    sheet.addRow([entry.metric, entry.value]);
  }
  sheet.columns = [{ width: 48 }, { width: 20 }];
  return workbook;
}

export async function writeAnalysisWorkbook(
  filePath: string,
  tables: AnalysisTables,
  summary: readonly SummaryMetric[]
): Promise<string> {
  return saveWorkbook(buildAnalysisWorkbook(tables, summary), filePath);
}
