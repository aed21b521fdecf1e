import type { UnmappedCategoryPolicy } from '../config.js';
import { UnmappedCategoryError } from '../errors.js';
import { createChildLogger, type Logger } from '../logger.js';
import {
  CATEGORY_MAPS,
  FLAG_TRUTHY_VALUES,
  MISSING_VALUE_TOKENS,
  tableColumns,
  type BinaryValue,
  type ColumnSpec,
  type TableName,
} from '../schema/columns.js';

export type RawValue = string | number | null | undefined;
export type RawRecord = Readonly<Record<string, RawValue>>;

export type NormalizedValue = string | number | null;
export type NormalizedRow = Record<string, NormalizedValue>;
export type NormalizedRecord = Record<TableName, NormalizedRow>;

export type WarnLogger = Pick<Logger, 'warn'>;

export type TransformOptions = {
  unmappedCategoryPolicy?: UnmappedCategoryPolicy;
  logger?: WarnLogger;
};

const defaultLogger = createChildLogger('transformer');

/** Null, undefined, empty text, a non-finite number, or a missing-value marker such as `N/A`. */
export function isMissing(value: RawValue): value is null | undefined | '' {
  if (value === null || value === undefined || value === '') return true;
  if (typeof value === 'number') return !Number.isFinite(value);
  return MISSING_VALUE_TOKENS.has(value.trim().toLowerCase());
}

function normalizeText(value: string | number): string {
  return String(value).trim().toLowerCase();
}

export function coerceCategorical(
  column: string,
  value: RawValue,
  policy: UnmappedCategoryPolicy = 'coerceToNull',
  log: WarnLogger = defaultLogger
): BinaryValue | null {
  const map = CATEGORY_MAPS[column];
  if (!map) {
    throw new Error(`column ${column} has no category map`);
  }
  if (isMissing(value)) return null;

  const key = normalizeText(value);
  if (Object.prototype.hasOwnProperty.call(map, key)) {
    return map[key];
  }

  switch (policy) {
    case 'reject':
      throw new UnmappedCategoryError(column, String(value));
    case 'warn':
      log.warn({ column, value }, 'unmapped categorical value coerced to null');
      return null;
    case 'coerceToNull':
      return null;
  }
}

/**
 * Generic truthy-text parser shared by every flag column. Missing values stay
 * null; anything outside the truthy set is false.
 */
export function parseBoolean(value: RawValue): boolean | null {
  if (isMissing(value)) return null;
  return FLAG_TRUTHY_VALUES.has(normalizeText(value));
}

export function toFlag(value: RawValue): BinaryValue | null {
  const parsed = parseBoolean(value);
  if (parsed === null) return null;
  return parsed ? 1 : 0;
}

export function passthrough(value: RawValue): NormalizedValue {
  return isMissing(value) ? null : value;
}

function coerceColumn(column: ColumnSpec, value: RawValue, options: TransformOptions): NormalizedValue {
  switch (column.coercion) {
    case 'categorical':
      return coerceCategorical(column.name, value, options.unmappedCategoryPolicy, options.logger ?? defaultLogger);
    case 'flag':
      return toFlag(value);
    case 'passthrough':
      return passthrough(value);
  }
}

export function normalizeTable(table: TableName, record: RawRecord, options: TransformOptions = {}): NormalizedRow {
  const row: NormalizedRow = {};
  for (const column of tableColumns(table)) {
    row[column.name] = coerceColumn(column, record[column.name], options);
  }
  return row;
}

export function normalize(record: RawRecord, options: TransformOptions = {}): NormalizedRecord {
  return {
    property: normalizeTable('property', record, options),
    leads: normalizeTable('leads', record, options),
    valuation: normalizeTable('valuation', record, options),
    rehab: normalizeTable('rehab', record, options),
    hoa: normalizeTable('hoa', record, options),
    taxes: normalizeTable('taxes', record, options),
  };
}

export function rowValues(table: TableName, row: NormalizedRow): NormalizedValue[] {
  return tableColumns(table).map((column) => row[column.name] ?? null);
}

export function emptyTables<T>(): Record<TableName, T[]> {
  return { property: [], leads: [], valuation: [], rehab: [], hoa: [], taxes: [] };
}
