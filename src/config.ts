import 'dotenv/config';
import { z } from 'zod';
import { ConfigError } from './errors.js';

export const LOAD_ERROR_POLICIES = ['abort', 'continue'] as const;
export type LoadErrorPolicy = (typeof LOAD_ERROR_POLICIES)[number];

export const UNMAPPED_CATEGORY_POLICIES = ['coerceToNull', 'warn', 'reject'] as const;
export type UnmappedCategoryPolicy = (typeof UNMAPPED_CATEGORY_POLICIES)[number];

const envSchema = z.object({
  POSTGRES_HOST: z.string().min(1).default('localhost'),
  POSTGRES_PORT: z.coerce.number().int().positive().default(5432),
  POSTGRES_USER: z.string().min(1).default('etl'),
  POSTGRES_PASSWORD: z.string().default('etlpass'),
  POSTGRES_DB: z.string().min(1).default('propertydb'),
  RAW_CSV_PATH: z.string().min(1).default('data/raw.csv'),
  SNAPSHOT_DIR: z.string().min(1).default('normalized_csvs'),
  REPORT_DIR: z.string().min(1).default('reports'),
  LOAD_ERROR_POLICY: z.enum(LOAD_ERROR_POLICIES).default('abort'),
  UNMAPPED_CATEGORY_POLICY: z.enum(UNMAPPED_CATEGORY_POLICIES).default('coerceToNull'),
});

export type DbConfig = {
  host: string;
  port: number;
  user: string;
  password: string;
  database: string;
};

export type EtlConfig = {
  db: DbConfig;
  rawCsvPath: string;
  snapshotDir: string;
  reportDir: string;
  loadErrorPolicy: LoadErrorPolicy;
  unmappedCategoryPolicy: UnmappedCategoryPolicy;
};

export function loadConfig(env: NodeJS.ProcessEnv = process.env): EtlConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError('invalid environment configuration', parsed.error.flatten().fieldErrors);
  }
  const values = parsed.data;
  return {
    db: {
      host: values.POSTGRES_HOST,
      port: values.POSTGRES_PORT,
      user: values.POSTGRES_USER,
      password: values.POSTGRES_PASSWORD,
      database: values.POSTGRES_DB,
    },
    rawCsvPath: values.RAW_CSV_PATH,
    snapshotDir: values.SNAPSHOT_DIR,
    reportDir: values.REPORT_DIR,
    loadErrorPolicy: values.LOAD_ERROR_POLICY,
    unmappedCategoryPolicy: values.UNMAPPED_CATEGORY_POLICY,
  };
}
