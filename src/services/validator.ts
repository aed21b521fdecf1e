import type { TabularData } from '../io/tabular.js';
import { createChildLogger, type Logger } from '../logger.js';
import { TABLE_NAMES, columnNames, type TableName } from '../schema/columns.js';
import { SNAPSHOT_ROW_COLUMN } from './loader.js';
import { isMissing, type RawRecord, type RawValue } from './transformer.js';

// Whole-value replacements applied after trim + lower-case.
const CANONICAL_SYNONYMS: ReadonlyMap<string, string> = new Map([
  ['true', '1'],
  ['false', '0'],
  ['yes', '1'],
  ['no', '0'],
  ['minimal flood', '1'],
  ['flood zone', '0'],
  ['near', '1'],
  ['far', '0'],
  ['city', '1'],
  ['well', '0'],
  ['septic', '0'],
]);

export const DEFAULT_SAMPLE_SIZE = 5;

export type MismatchEntry = {
  table: TableName;
  column: string;
  mismatchCount: number;
  sampleRaw: string[];
  sampleNormalized: string[];
};

export type SkippedCheck = {
  table: TableName;
  column?: string;
  reason: 'snapshot_missing' | 'column_not_in_raw' | 'column_not_in_snapshot';
};

export type ValidationResult = {
  passed: boolean;
  comparedColumns: number;
  mismatches: MismatchEntry[];
  skipped: SkippedCheck[];
};

export type ValidateOptions = {
  sampleSize?: number;
  logger?: Logger;
};

type RowPair = { raw: RawRecord; persisted: RawRecord };

export function canonicalize(value: RawValue): string {
  if (isMissing(value)) return '';
  const text = String(value).trim().toLowerCase();
  return CANONICAL_SYNONYMS.get(text) ?? text;
}

function parseRowNumber(value: RawValue): number | null {
  if (isMissing(value)) return null;
  const parsed = Number(value);
  return Number.isInteger(parsed) && parsed > 0 ? parsed : null;
}

/**
 * Pairs raw rows with snapshot rows. Snapshots that carry a row number are
 * joined on it; older snapshots without one fall back to position.
 */
export function alignRows(table: TableName, raw: TabularData, snapshot: TabularData, log: Logger): RowPair[] {
  if (snapshot.columns.includes(SNAPSHOT_ROW_COLUMN)) {
    const byRowNumber = new Map<number, RawRecord>();
    for (const row of snapshot.rows) {
      const rowNumber = parseRowNumber(row[SNAPSHOT_ROW_COLUMN]);
      if (rowNumber !== null) byRowNumber.set(rowNumber, row);
    }
    const pairs: RowPair[] = [];
    raw.rows.forEach((rawRow, index) => {
      const persisted = byRowNumber.get(index + 1);
      if (persisted) pairs.push({ raw: rawRow, persisted });
    });
    if (pairs.length !== byRowNumber.size) {
      log.warn({ table, unmatched: byRowNumber.size - pairs.length }, 'snapshot rows without a raw counterpart');
    }
    return pairs;
  }

  if (raw.rows.length !== snapshot.rows.length) {
    log.warn(
      { table, rawRows: raw.rows.length, snapshotRows: snapshot.rows.length },
      'row counts differ; comparing common prefix by position'
    );
  }
  const length = Math.min(raw.rows.length, snapshot.rows.length);
  const pairs: RowPair[] = [];
  for (let index = 0; index < length; index += 1) {
    pairs.push({ raw: raw.rows[index], persisted: snapshot.rows[index] });
  }
  return pairs;
}

export function compareColumn(
  table: TableName,
  column: string,
  pairs: readonly RowPair[],
  sampleSize = DEFAULT_SAMPLE_SIZE
): MismatchEntry | null {
  let mismatchCount = 0;
  const sampleRaw: string[] = [];
  const sampleNormalized: string[] = [];

  for (const pair of pairs) {
    const expected = canonicalize(pair.raw[column]);
    const actual = canonicalize(pair.persisted[column]);
    if (expected === actual) continue;
    mismatchCount += 1;
    if (sampleRaw.length < sampleSize) {
      sampleRaw.push(expected);
      sampleNormalized.push(actual);
    }
  }

  return mismatchCount > 0 ? { table, column, mismatchCount, sampleRaw, sampleNormalized } : null;
}

/**
 * Recomputes canonical values from the raw extract and diffs them against the
 * persisted snapshots. Read-only: nothing is corrected.
 */
export function validate(
  raw: TabularData,
  snapshots: Partial<Record<TableName, TabularData>>,
  options: ValidateOptions = {}
): ValidationResult {
  const log = options.logger ?? createChildLogger('validator');
  const sampleSize = options.sampleSize ?? DEFAULT_SAMPLE_SIZE;
  const result: ValidationResult = { passed: true, comparedColumns: 0, mismatches: [], skipped: [] };
  const rawColumns = new Set(raw.columns);

  for (const table of TABLE_NAMES) {
    const snapshot = snapshots[table];
    if (!snapshot) {
      log.error({ table }, 'snapshot missing; table skipped');
      result.skipped.push({ table, reason: 'snapshot_missing' });
      continue;
    }

    const persistedColumns = new Set(snapshot.columns);
    const pairs = alignRows(table, raw, snapshot, log);

    for (const column of columnNames(table)) {
      if (!rawColumns.has(column)) {
        log.debug({ table, column }, 'column absent from raw extract');
        result.skipped.push({ table, column, reason: 'column_not_in_raw' });
        continue;
      }
      if (!persistedColumns.has(column)) {
        log.warn({ table, column }, 'column missing in normalized snapshot');
        result.skipped.push({ table, column, reason: 'column_not_in_snapshot' });
        continue;
      }

      result.comparedColumns += 1;
      const mismatch = compareColumn(table, column, pairs, sampleSize);
      if (mismatch) {
        log.warn(
          {
            table,
            column,
            mismatches: mismatch.mismatchCount,
            sampleRaw: mismatch.sampleRaw,
            sampleNormalized: mismatch.sampleNormalized,
          },
          'column mismatch'
        );
        result.mismatches.push(mismatch);
      }
    }
  }

  result.passed = result.comparedColumns > 0 && result.mismatches.length === 0;
  if (result.comparedColumns === 0) {
    log.error({ skipped: result.skipped.length }, 'nothing compared; every table or column was skipped');
  } else if (result.passed) {
    log.info({ comparedColumns: result.comparedColumns }, 'all normalized snapshots match the raw extract');
  } else {
    log.warn({ columns: result.mismatches.length }, 'mismatches found');
  }
  return result;
}
