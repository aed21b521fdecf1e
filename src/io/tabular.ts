import { promises as fsp } from 'node:fs';
import path from 'node:path';
import ExcelJS, { type CellValue } from 'exceljs';
import { SourceFileMissingError } from '../errors.js';
import { createChildLogger } from '../logger.js';
import { TABLE_NAMES, columnNames, type TableName } from '../schema/columns.js';
import { SNAPSHOT_ID_COLUMN, SNAPSHOT_ROW_COLUMN, type Snapshots } from '../services/loader.js';
import { isMissing, type RawRecord, type RawValue } from '../services/transformer.js';

export type TabularData = {
  columns: string[];
  rows: RawRecord[];
};

const log = createChildLogger('tabular');

export async function fileExists(filePath: string): Promise<boolean> {
  try {
    await fsp.access(filePath);
    return true;
  } catch {
    return false;
  }
}

function cellToRaw(value: CellValue): RawValue {
  if (value === null || value === undefined) return null;
  if (typeof value === 'string' || typeof value === 'number') return value;
  if (typeof value === 'boolean') return String(value);
  if (value instanceof Date) return value.toISOString();
  return null;
}

/**
 * Reads a CSV with a header row. Cells are kept as text; empty cells and
 * missing-value markers such as `NaN` or `N/A` become null.
 */
export async function readCsvTable(filePath: string): Promise<TabularData> {
  if (!(await fileExists(filePath))) {
    throw new SourceFileMissingError(filePath);
  }

  const workbook = new ExcelJS.Workbook();
  const worksheet = await workbook.csv.readFile(filePath, {
    map: (value: string) => (isMissing(value) ? null : value),
  });

  const header = worksheet.getRow(1);
  const columns: string[] = [];
  for (let index = 1; index <= header.cellCount; index += 1) {
    const name = cellToRaw(header.getCell(index).value);
    columns.push(name == null ? '' : String(name).replace(/^\uFEFF/, '').trim());
  }

  const rows: RawRecord[] = [];
  for (let rowNumber = 2; rowNumber <= worksheet.rowCount; rowNumber += 1) {
    const row = worksheet.getRow(rowNumber);
    if (!row.hasValues) continue;
    const record: Record<string, RawValue> = {};
    columns.forEach((column, index) => {
      if (column) {
        record[column] = cellToRaw(row.getCell(index + 1).value);
      }
    });
    rows.push(record);
  }

  log.debug({ filePath, columns: columns.length, rows: rows.length }, 'csv loaded');
  return { columns, rows };
}

export async function writeCsvTable(filePath: string, columns: readonly string[], rows: readonly RawRecord[]): Promise<void> {
  const workbook = new ExcelJS.Workbook();
  const worksheet = workbook.addWorksheet(path.parse(filePath).name);
  worksheet.addRow([...columns]);
  for (const row of rows) {
    worksheet.addRow(columns.map((column) => row[column] ?? null));
  }
  await fsp.mkdir(path.dirname(filePath), { recursive: true });
  await workbook.csv.writeFile(filePath);
}

export function snapshotColumns(table: TableName): string[] {
  return [SNAPSHOT_ID_COLUMN, SNAPSHOT_ROW_COLUMN, ...columnNames(table)];
}

export function snapshotPath(dir: string, table: TableName): string {
  return path.join(dir, `${table}.csv`);
}

export async function writeSnapshots(dir: string, snapshots: Snapshots): Promise<string[]> {
  const written: string[] = [];
  for (const table of TABLE_NAMES) {
    const filePath = snapshotPath(dir, table);
    await writeCsvTable(filePath, snapshotColumns(table), snapshots[table]);
    written.push(filePath);
  }
  log.info({ dir, tables: written.length }, 'normalized snapshots written');
  return written;
}

/** Missing snapshot files are logged and left out of the result. */
export async function readSnapshots(dir: string): Promise<Partial<Record<TableName, TabularData>>> {
  const tables: Partial<Record<TableName, TabularData>> = {};
  for (const table of TABLE_NAMES) {
    const filePath = snapshotPath(dir, table);
    if (!(await fileExists(filePath))) {
      log.error({ filePath }, 'snapshot file missing');
      continue;
    }
    tables[table] = await readCsvTable(filePath);
  }
  return tables;
}
