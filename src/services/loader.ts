import type { LoadErrorPolicy, UnmappedCategoryPolicy } from '../config.js';
import type { Database, SqlClient } from '../db.js';
import { EtlError, RecordLoadError, StoreUnavailableError, errorMessage, isEtlError } from '../errors.js';
import { createChildLogger, type Logger } from '../logger.js';
import { SATELLITE_TABLES, TABLE_NAMES, type TableName } from '../schema/columns.js';
import { INSERT_STATEMENTS } from '../schema/ddl.js';
import {
  emptyTables,
  normalize,
  rowValues,
  type NormalizedRecord,
  type NormalizedValue,
  type RawRecord,
} from './transformer.js';

export const SNAPSHOT_ID_COLUMN = 'property_id';
export const SNAPSHOT_ROW_COLUMN = 'row_number';

export type SnapshotRow = Record<string, NormalizedValue>;
export type Snapshots = Record<TableName, SnapshotRow[]>;

export type LoadFailure = {
  rowNumber: number;
  code: string | null;
  message: string;
};

export type LoadResult = {
  total: number;
  committed: number;
  failed: number;
  failures: LoadFailure[];
  snapshots: Snapshots;
};

export type LoadOptions = {
  onRecordError?: LoadErrorPolicy;
  unmappedCategoryPolicy?: UnmappedCategoryPolicy;
  logger?: Logger;
};

export class LoadAbortedError extends EtlError {
  readonly result: LoadResult;

  constructor(message: string, result: LoadResult, cause: unknown) {
    super('load_aborted', message, { committed: result.committed, failed: result.failed }, { cause });
    this.result = result;
  }
}

async function insertRecord(client: SqlClient, record: NormalizedRecord): Promise<number> {
  const { rows } = await client.query(INSERT_STATEMENTS.property.text, rowValues('property', record.property));
  const propertyId: unknown = rows[0]?.id;
  if (typeof propertyId !== 'number') {
    throw new Error('property insert returned no id');
  }
  for (const table of SATELLITE_TABLES) {
    await client.query(INSERT_STATEMENTS[table].text, [propertyId, ...rowValues(table, record[table])]);
  }
  return propertyId;
}

function appendSnapshots(snapshots: Snapshots, propertyId: number, rowNumber: number, record: NormalizedRecord): void {
  for (const table of TABLE_NAMES) {
    snapshots[table].push({
      [SNAPSHOT_ID_COLUMN]: propertyId,
      [SNAPSHOT_ROW_COLUMN]: rowNumber,
      ...record[table],
    });
  }
}

/**
 * Writes each raw record as one transaction: the property row, then its five
 * satellites keyed by the generated id. Records are processed in order, one
 * at a time.
 */
export async function loadRecords(
  db: Database,
  records: readonly RawRecord[],
  options: LoadOptions = {}
): Promise<LoadResult> {
  const log = options.logger ?? createChildLogger('loader');
  const policy = options.onRecordError ?? 'abort';
  const result: LoadResult = {
    total: records.length,
    committed: 0,
    failed: 0,
    failures: [],
    snapshots: emptyTables<SnapshotRow>(),
  };

  for (const [index, raw] of records.entries()) {
    const rowNumber = index + 1;
    try {
      const record = normalize(raw, { unmappedCategoryPolicy: options.unmappedCategoryPolicy, logger: log });
      const propertyId = await db.withTransaction((client) => insertRecord(client, record));
      appendSnapshots(result.snapshots, propertyId, rowNumber, record);
      result.committed += 1;
    } catch (error) {
      if (error instanceof StoreUnavailableError) {
        log.error({ rowNumber, err: error }, 'store unavailable; aborting batch');
        throw new LoadAbortedError(`load aborted at record ${rowNumber}: ${error.message}`, result, error);
      }

      const failure = new RecordLoadError(rowNumber, error);
      result.failed += 1;
      result.failures.push({
        rowNumber,
        code: isEtlError(error) ? error.code : null,
        message: errorMessage(error),
      });
      log.error({ rowNumber, err: error }, 'record rolled back');

      if (policy === 'abort') {
        throw new LoadAbortedError(`load aborted: ${failure.message}`, result, failure);
      }
    }
  }

  log.info({ total: result.total, committed: result.committed, failed: result.failed }, 'load finished');
  return result;
}
