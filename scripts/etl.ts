#!/usr/bin/env node
import { Command, Option } from 'commander';
import { LOAD_ERROR_POLICIES, UNMAPPED_CATEGORY_POLICIES, loadConfig, type LoadErrorPolicy, type UnmappedCategoryPolicy } from '../src/config.js';
import { isEtlError } from '../src/errors.js';
import { logger } from '../src/logger.js';
import { LoadAbortedError } from '../src/services/loader.js';
import { defaultReportPath, runAnalyze, runLoad, runSchema, runValidate } from '../src/services/pipeline.js';

const EXIT_SYSTEM_ERROR = 1;
const EXIT_MISMATCHES = 2;

type LoadCommandOptions = {
  input?: string;
  snapshots?: string;
  onError?: LoadErrorPolicy;
  unmapped?: UnmappedCategoryPolicy;
  createSchema?: boolean;
};

type ValidateCommandOptions = {
  input?: string;
  snapshots?: string;
  report?: string;
};

type AnalyzeCommandOptions = {
  snapshots?: string;
  output?: string;
};

const program = new Command();

program
  .name('property-etl')
  .description('Normalize the flat property extract into Postgres and reconcile it against the source')
  .version('0.1.0');

program
  .command('schema')
  .description('Create the six normalized tables when they do not exist')
  .action(async () => {
    const config = loadConfig();
    await runSchema(config.db);
  });

program
  .command('load')
  .description('Normalize every raw record and write it as one transaction')
  .option('-i, --input <path>', 'raw extract CSV')
  .option('-s, --snapshots <dir>', 'directory for the normalized CSV snapshots')
  .addOption(new Option('--on-error <policy>', 'what to do when a record fails').choices(LOAD_ERROR_POLICIES))
  .addOption(new Option('--unmapped <policy>', 'handling of unmapped categorical values').choices(UNMAPPED_CATEGORY_POLICIES))
  .option('--create-schema', 'create missing tables before loading', false)
  .action(async (options: LoadCommandOptions) => {
    const config = loadConfig();
    const result = await runLoad({
      db: config.db,
      inputPath: options.input ?? config.rawCsvPath,
      snapshotDir: options.snapshots ?? config.snapshotDir,
      onRecordError: options.onError ?? config.loadErrorPolicy,
      unmappedCategoryPolicy: options.unmapped ?? config.unmappedCategoryPolicy,
      createSchema: options.createSchema,
    });
    if (result.failed > 0) {
      process.exitCode = EXIT_SYSTEM_ERROR;
    }
  });

program
  .command('validate')
  .description('Recompute canonical values from the raw extract and diff them against the snapshots')
  .option('-i, --input <path>', 'raw extract CSV')
  .option('-s, --snapshots <dir>', 'directory holding the normalized CSV snapshots')
  .option('-r, --report <path>', 'mismatch workbook path')
  .action(async (options: ValidateCommandOptions) => {
    const config = loadConfig();
    const { result } = await runValidate({
      inputPath: options.input ?? config.rawCsvPath,
      snapshotDir: options.snapshots ?? config.snapshotDir,
      reportPath: options.report ?? defaultReportPath(config.reportDir, 'mismatch_report.xlsx'),
    });
    if (!result.passed) {
      process.exitCode = EXIT_MISMATCHES;
    }
  });

program
  .command('analyze')
  .description('Summarize the normalized snapshots into a workbook')
  .option('-s, --snapshots <dir>', 'directory holding the normalized CSV snapshots')
  .option('-o, --output <path>', 'summary workbook path')
  .action(async (options: AnalyzeCommandOptions) => {
    const config = loadConfig();
    await runAnalyze({
      snapshotDir: options.snapshots ?? config.snapshotDir,
      outputPath: options.output ?? defaultReportPath(config.reportDir, 'full_summary_report.xlsx'),
    });
  });

program.parseAsync(process.argv).catch((error: unknown) => {
  if (error instanceof LoadAbortedError) {
    logger.error(
      { err: error, committed: error.result.committed, failed: error.result.failed },
      'load aborted; committed records were kept'
    );
  } else if (isEtlError(error)) {
    logger.error({ err: error, code: error.code, details: error.details }, error.message);
  } else {
    logger.error({ err: error }, 'unexpected failure');
  }
  process.exitCode = EXIT_SYSTEM_ERROR;
});
