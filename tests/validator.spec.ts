import { describe, it, expect } from 'vitest';
import { TABLE_NAMES, columnNames, type TableName } from '../src/schema/columns.js';
import { loadRecords, type Snapshots } from '../src/services/loader.js';
import { coerceCategorical, type RawRecord } from '../src/services/transformer.js';
import { canonicalize, compareColumn, validate } from '../src/services/validator.js';
import type { TabularData } from '../src/io/tabular.js';
import { snapshotColumns } from '../src/io/tabular.js';
import { FakeStore } from './helpers/fake-store.js';
import { makeRawRecord, makeRawRecords, rawTable, tabular } from './helpers/records.js';

function snapshotTables(snapshots: Snapshots): Record<TableName, TabularData> {
  return {
    property: tabular(snapshotColumns('property'), snapshots.property),
    leads: tabular(snapshotColumns('leads'), snapshots.leads),
    valuation: tabular(snapshotColumns('valuation'), snapshots.valuation),
    rehab: tabular(snapshotColumns('rehab'), snapshots.rehab),
    hoa: tabular(snapshotColumns('hoa'), snapshots.hoa),
    taxes: tabular(snapshotColumns('taxes'), snapshots.taxes),
  };
}

async function loadAndSnapshot(records: RawRecord[]) {
  const result = await loadRecords(new FakeStore(), records, { onRecordError: 'continue' });
  return snapshotTables(result.snapshots);
}

describe('canonicalize', () => {
  it('trims, lower-cases and replaces whole-value synonyms', () => {
    expect(canonicalize(' TRUE ')).toBe('1');
    expect(canonicalize('No')).toBe('0');
    expect(canonicalize('Minimal Flood')).toBe('1');
    expect(canonicalize('flood zone')).toBe('0');
    expect(canonicalize('Near')).toBe('1');
    expect(canonicalize('far')).toBe('0');
    expect(canonicalize('City')).toBe('1');
    expect(canonicalize('well')).toBe('0');
    expect(canonicalize('Septic')).toBe('0');
  });

  it('leaves other text alone apart from case and padding', () => {
    expect(canonicalize(' Garage ')).toBe('garage');
    expect(canonicalize('no flooding')).toBe('no flooding');
    expect(canonicalize('city center')).toBe('city center');
  });

  it('maps missing values to an empty token and numbers to text', () => {
    expect(canonicalize(null)).toBe('');
    expect(canonicalize('')).toBe('');
    expect(canonicalize(Number.NaN)).toBe('');
    expect(canonicalize('N/A')).toBe('');
    expect(canonicalize(1)).toBe('1');
    expect(canonicalize(0)).toBe('0');
  });

  it.each([
    ['Flood', 'Minimal Flood'],
    ['Flood', 'Flood Zone'],
    ['Highway', 'Near'],
    ['Train', 'far'],
    ['Water', 'City'],
    ['Water', 'Well'],
    ['Sewage', 'Septic'],
    ['Pool', 'Yes'],
    ['Pool', 'NO'],
    ['Pool', ''],
  ])('agrees on %s=%j before and after coercion', (column, value) => {
    expect(canonicalize(coerceCategorical(column, value))).toBe(canonicalize(value));
  });
});

describe('compareColumn', () => {
  it('counts disagreements and keeps the first five samples', () => {
    const pairs = Array.from({ length: 7 }, (_, index) => ({
      raw: { Pool: `value ${index}` },
      persisted: { Pool: null },
    }));
    const mismatch = compareColumn('property', 'Pool', pairs);
    expect(mismatch).toEqual({
      table: 'property',
      column: 'Pool',
      mismatchCount: 7,
      sampleRaw: ['value 0', 'value 1', 'value 2', 'value 3', 'value 4'],
      sampleNormalized: ['', '', '', '', ''],
    });
  });

  it('returns null when every pair agrees', () => {
    expect(compareColumn('hoa', 'HOA_Flag', [{ raw: { HOA_Flag: 'Yes' }, persisted: { HOA_Flag: 1 } }])).toBeNull();
  });
});

describe('validate', () => {
  it('passes when snapshots were produced from the same extract', async () => {
    const records = makeRawRecords(5);
    const snapshots = await loadAndSnapshot(records);

    const result = validate(rawTable(records), snapshots);

    expect(result.passed).toBe(true);
    expect(result.mismatches).toEqual([]);
    expect(result.skipped).toEqual([]);
    expect(result.comparedColumns).toBe(66);
  });

  it('reports values that coercion dropped or changed', async () => {
    const records = [
      makeRawRecord(),
      makeRawRecord({ Pool: 'Y', Paint: 'no flooding' }),
      makeRawRecord({ Pool: 'N' }),
    ];
    const snapshots = await loadAndSnapshot(records);

    const result = validate(rawTable(records), snapshots);

    expect(result.passed).toBe(false);
    expect(result.mismatches).toEqual([
      { table: 'property', column: 'Pool', mismatchCount: 2, sampleRaw: ['y', 'n'], sampleNormalized: ['', ''] },
      { table: 'rehab', column: 'Paint', mismatchCount: 1, sampleRaw: ['no flooding'], sampleNormalized: ['1'] },
    ]);
  });

  it('detects persisted values that drifted from the source', async () => {
    const records = makeRawRecords(3);
    const snapshots = await loadAndSnapshot(records);
    snapshots.taxes.rows[1] = { ...snapshots.taxes.rows[1], Taxes: '9999' };

    const result = validate(rawTable(records), snapshots);

    expect(result.mismatches).toEqual([
      { table: 'taxes', column: 'Taxes', mismatchCount: 1, sampleRaw: ['2400'], sampleNormalized: ['9999'] },
    ]);
  });

  it('skips tables without a snapshot and columns missing from one', async () => {
    const records = makeRawRecords(2);
    const snapshots: Partial<Record<TableName, TabularData>> = await loadAndSnapshot(records);
    delete snapshots.leads;
    const hoa = snapshots.hoa;
    if (!hoa) throw new Error('hoa snapshot expected');
    snapshots.hoa = { ...hoa, columns: hoa.columns.filter((column) => column !== 'HOA_Flag') };

    const result = validate(rawTable(records), snapshots);

    expect(result.passed).toBe(true);
    expect(result.skipped).toEqual([
      { table: 'leads', reason: 'snapshot_missing' },
      { table: 'hoa', column: 'HOA_Flag', reason: 'column_not_in_snapshot' },
    ]);
    expect(result.comparedColumns).toBe(66 - columnNames('leads').length - 1);
  });

  it('skips catalogue columns the raw extract does not carry', async () => {
    const records = makeRawRecords(2);
    const snapshots = await loadAndSnapshot(records);
    const columns = rawTable(records).columns.filter((column) => column !== 'Taxes');

    const result = validate(rawTable(records, columns), snapshots);

    expect(result.skipped).toEqual([{ table: 'taxes', column: 'Taxes', reason: 'column_not_in_raw' }]);
    expect(result.comparedColumns).toBe(65);
  });

  it('joins on row number so records that failed to load do not shift alignment', async () => {
    const records = [makeRawRecord({ Taxes: '100' }), makeRawRecord({ Taxes: 'bad' }), makeRawRecord({ Taxes: '300' })];
    const store = new FakeStore();
    store.failWhen = (table, params) => table === 'taxes' && params[1] === 'bad';
    const loaded = await loadRecords(store, records, { onRecordError: 'continue' });

    const result = validate(rawTable(records), snapshotTables(loaded.snapshots));

    expect(loaded.snapshots.taxes).toHaveLength(2);
    expect(result.passed).toBe(true);
  });

  it('does not pass when nothing could be compared', () => {
    const result = validate(rawTable(makeRawRecords(2)), {});

    expect(result.passed).toBe(false);
    expect(result.comparedColumns).toBe(0);
    expect(result.mismatches).toEqual([]);
    expect(result.skipped).toHaveLength(6);
  });

  it('falls back to position for snapshots without a row number', () => {
    const records = [makeRawRecord({ Taxes: '100' }), makeRawRecord({ Taxes: '200' })];
    const snapshots: Partial<Record<TableName, TabularData>> = {
      taxes: tabular(['Taxes'], [{ Taxes: '100' }, { Taxes: '250' }, { Taxes: '300' }]),
    };

    const result = validate(rawTable(records), snapshots);

    expect(result.mismatches).toEqual([
      { table: 'taxes', column: 'Taxes', mismatchCount: 1, sampleRaw: ['200'], sampleNormalized: ['250'] },
    ]);
    expect(result.skipped.filter((entry) => entry.reason === 'snapshot_missing').map((entry) => entry.table)).toEqual(
      TABLE_NAMES.filter((table) => table !== 'taxes')
    );
  });
});
