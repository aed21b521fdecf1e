import type { TabularData } from '../io/tabular.js';
import { tableColumns, type TableName } from '../schema/columns.js';
import { isMissing, type RawRecord } from './transformer.js';

export type SummaryValue = string | number | null;

export type SummaryMetric = {
  metric: string;
  value: SummaryValue;
};

export type AnalysisTables = Partial<Record<TableName, TabularData>>;

function numbers(rows: readonly RawRecord[], column: string): number[] {
  const values: number[] = [];
  for (const row of rows) {
    const value = row[column];
    if (isMissing(value)) continue;
    const parsed = Number(value);
    if (Number.isFinite(parsed)) values.push(parsed);
  }
  return values;
}

export function mean(values: readonly number[]): number | null {
  if (!values.length) return null;
  return values.reduce((sum, value) => sum + value, 0) / values.length;
}

export function median(values: readonly number[]): number | null {
  if (!values.length) return null;
  const sorted = [...values].sort((a, b) => a - b);
  const middle = Math.floor(sorted.length / 2);
  return sorted.length % 2 ? sorted[middle] : (sorted[middle - 1] + sorted[middle]) / 2;
}

/** Sample standard deviation (n - 1). */
export function standardDeviation(values: readonly number[]): number | null {
  if (values.length < 2) return null;
  const average = values.reduce((sum, value) => sum + value, 0) / values.length;
  const squared = values.reduce((sum, value) => sum + (value - average) ** 2, 0);
  return Math.sqrt(squared / (values.length - 1));
}

function max(values: readonly number[]): number | null {
  return values.length ? Math.max(...values) : null;
}

function min(values: readonly number[]): number | null {
  return values.length ? Math.min(...values) : null;
}

/** Value counts, most frequent first; ties keep first-seen order. */
export function valueCounts(rows: readonly RawRecord[], column: string): Array<[string, number]> {
  const counts = new Map<string, number>();
  for (const row of rows) {
    const value = row[column];
    if (isMissing(value)) continue;
    const key = String(value);
    counts.set(key, (counts.get(key) ?? 0) + 1);
  }
  return [...counts.entries()].sort((a, b) => b[1] - a[1]);
}

function countEqual(rows: readonly RawRecord[], column: string, expected: string): number {
  return rows.filter((row) => {
    const value = row[column];
    return !isMissing(value) && String(value).trim() === expected;
  }).length;
}

function has(table: TabularData | undefined, column: string): table is TabularData {
  return table !== undefined && table.columns.includes(column);
}

export function summarizeSnapshots(tables: AnalysisTables): SummaryMetric[] {
  const summary: SummaryMetric[] = [];
  const add = (metric: string, value: SummaryValue) => summary.push({ metric, value });
  const addCounts = (prefix: string, counts: Array<[string, number]>) => {
    for (const [key, count] of counts) add(`${prefix} - ${key}`, count);
  };

  const property = tables.property;
  add('Total Properties', property?.rows.length ?? 0);
  if (has(property, 'Property_Type')) {
    const types = valueCounts(property.rows, 'Property_Type');
    add('Unique Property Types', types.length);
    addCounts('Top Property Types', types.slice(0, 3));
  }
  if (has(property, 'Pool')) {
    add('Pool - Yes Count', countEqual(property.rows, 'Pool', '1'));
  }
  if (has(property, 'Flood')) {
    add('Flood Zone - Count', countEqual(property.rows, 'Flood', '0'));
  }

  const leads = tables.leads;
  if (has(leads, 'Reviewed_Status')) {
    addCounts('Reviewed_Status Breakdown', valueCounts(leads.rows, 'Reviewed_Status'));
  }
  if (has(leads, 'Source')) {
    addCounts('Top 5 Lead Sources', valueCounts(leads.rows, 'Source').slice(0, 5));
  }

  const valuation = tables.valuation;
  if (has(valuation, 'Expected_Rent')) {
    const rent = numbers(valuation.rows, 'Expected_Rent');
    add('Expected Rent - Mean', mean(rent));
    add('Expected Rent - Median', median(rent));
    add('Expected Rent - Max', max(rent));
    add('Expected Rent - Min', min(rent));
    add('Expected Rent - Std Dev', standardDeviation(rent));
    add('Expected Rent - Total Sum', rent.reduce((sum, value) => sum + value, 0));
  }
  if (has(valuation, 'ARV')) {
    add('ARV - Average', mean(numbers(valuation.rows, 'ARV')));
  }
  if (has(valuation, 'Expected_Rent') && has(valuation, 'ARV')) {
    const ratios: number[] = [];
    for (const row of valuation.rows) {
      const [rent] = numbers([row], 'Expected_Rent');
      const [arv] = numbers([row], 'ARV');
      if (rent !== undefined && arv !== undefined && arv !== 0) ratios.push(rent / arv);
    }
    add('Rent to ARV Ratio - Mean', mean(ratios));
    add('Rent to ARV Ratio - Median', median(ratios));
    add('Rent to ARV Ratio - Max', max(ratios));
    add('Rent to ARV Ratio - Min', min(ratios));
  }

  const hoa = tables.hoa;
  if (has(hoa, 'HOA')) {
    add('Properties with HOA Info', hoa.rows.filter((row) => !isMissing(row.HOA)).length);
    addCounts('HOA Breakdown', valueCounts(hoa.rows, 'HOA'));
  }

  const rehab = tables.rehab;
  if (rehab) {
    for (const column of tableColumns('rehab')) {
      if (column.coercion !== 'flag' || !rehab.columns.includes(column.name)) continue;
      add(`Rehab Flags True Counts - ${column.name}`, countEqual(rehab.rows, column.name, '1'));
    }
  }

  const taxes = tables.taxes;
  if (has(taxes, 'Taxes')) {
    const values = numbers(taxes.rows, 'Taxes');
    add('Taxes - Mean', mean(values));
    add('Taxes - Median', median(values));
    add('Taxes - Max', max(values));
    add('Taxes - Min', min(values));
    add('Taxes - Std Dev', standardDeviation(values));
  }

  return summary;
}
