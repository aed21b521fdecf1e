import path from 'node:path';
import type { DbConfig, LoadErrorPolicy, UnmappedCategoryPolicy } from '../config.js';
import { createDatabase, withDatabase, type Database } from '../db.js';
import { NothingComparedError } from '../errors.js';
import { readCsvTable, readSnapshots, writeSnapshots } from '../io/tabular.js';
import { writeAnalysisWorkbook, writeMismatchWorkbook } from '../io/reports.js';
import { createChildLogger } from '../logger.js';
import { knownRawColumns } from '../schema/columns.js';
import { ensureSchema } from '../schema/ddl.js';
import { summarizeSnapshots, type SummaryMetric } from './analysis.js';
import { loadRecords, type LoadResult } from './loader.js';
import { validate, type ValidationResult } from './validator.js';

const log = createChildLogger('pipeline');

export type OpenDatabase = (config: DbConfig) => Database;

export type LoadJob = {
  db: DbConfig;
  inputPath: string;
  snapshotDir: string;
  onRecordError: LoadErrorPolicy;
  unmappedCategoryPolicy: UnmappedCategoryPolicy;
  createSchema?: boolean;
};

export type ValidateJob = {
  inputPath: string;
  snapshotDir: string;
  reportPath: string;
};

export type ValidateOutcome = {
  result: ValidationResult;
  reportPath: string | null;
};

export type AnalyzeJob = {
  snapshotDir: string;
  outputPath: string;
};

export type AnalyzeOutcome = {
  summary: SummaryMetric[];
  outputPath: string;
};

export async function runSchema(config: DbConfig, open: OpenDatabase = createDatabase): Promise<void> {
  await withDatabase(config, (db) => ensureSchema(db), open);
  log.info('schema ensured');
}

export async function runLoad(job: LoadJob, open: OpenDatabase = createDatabase): Promise<LoadResult> {
  const raw = await readCsvTable(job.inputPath);
  log.info({ inputPath: job.inputPath, rows: raw.rows.length }, 'raw extract loaded');

  const present = new Set(raw.columns);
  const absent = knownRawColumns().filter((column) => !present.has(column));
  if (absent.length) {
    log.warn({ columns: absent }, 'known columns absent from raw extract; they load as null');
  }

  return withDatabase(
    job.db,
    async (db) => {
      if (job.createSchema) {
        await ensureSchema(db);
      }
      const result = await loadRecords(db, raw.rows, {
        onRecordError: job.onRecordError,
        unmappedCategoryPolicy: job.unmappedCategoryPolicy,
      });
      await writeSnapshots(job.snapshotDir, result.snapshots);
      return result;
    },
    open
  );
}

export async function runValidate(job: ValidateJob): Promise<ValidateOutcome> {
  const raw = await readCsvTable(job.inputPath);
  log.info({ inputPath: job.inputPath, rows: raw.rows.length }, 'raw extract loaded');

  const snapshots = await readSnapshots(job.snapshotDir);
  const result = validate(raw, snapshots);
  if (result.comparedColumns === 0) {
    throw new NothingComparedError({ snapshotDir: job.snapshotDir, skipped: result.skipped });
  }
  if (result.passed) {
    return { result, reportPath: null };
  }

  const reportPath = await writeMismatchWorkbook(job.reportPath, result.mismatches);
  log.info({ reportPath }, 'mismatch summary exported');
  return { result, reportPath };
}

export async function runAnalyze(job: AnalyzeJob): Promise<AnalyzeOutcome> {
  const tables = await readSnapshots(job.snapshotDir);
  const summary = summarizeSnapshots(tables);
  const outputPath = await writeAnalysisWorkbook(job.outputPath, tables, summary);
  log.info({ outputPath, metrics: summary.length }, 'analysis report written');
  return { summary, outputPath };
}

export function defaultReportPath(reportDir: string, filename: string): string {
  return path.join(reportDir, filename);
}
