export type EtlErrorCode =
  | 'invalid_config'
  | 'source_missing'
  | 'unmapped_category'
  | 'store_unavailable'
  | 'record_failed'
  | 'load_aborted'
  | 'nothing_compared';

export class EtlError extends Error {
  readonly code: EtlErrorCode;
  readonly details?: unknown;

  constructor(code: EtlErrorCode, message: string, details?: unknown, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
    this.details = details;
  }
}

export class ConfigError extends EtlError {
  constructor(message: string, details?: unknown) {
    super('invalid_config', message, details);
  }
}

export class SourceFileMissingError extends EtlError {
  readonly path: string;

  constructor(path: string) {
    super('source_missing', `source file not found: ${path}`, { path });
    this.path = path;
  }
}

export class UnmappedCategoryError extends EtlError {
  readonly column: string;
  readonly value: string;

  constructor(column: string, value: string) {
    super('unmapped_category', `unmapped value "${value}" for categorical column ${column}`, { column, value });
    this.column = column;
    this.value = value;
  }
}

export class StoreUnavailableError extends EtlError {
  constructor(cause: unknown) {
    super('store_unavailable', `store unavailable: ${errorMessage(cause)}`, undefined, { cause });
  }
}

export class RecordLoadError extends EtlError {
  readonly rowNumber: number;

  constructor(rowNumber: number, cause: unknown) {
    super('record_failed', `record ${rowNumber} failed: ${errorMessage(cause)}`, { rowNumber }, { cause });
    this.rowNumber = rowNumber;
  }
}

export class NothingComparedError extends EtlError {
  constructor(details?: unknown) {
    super('nothing_compared', 'no column could be compared; check the snapshot directory and the raw extract', details);
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function isEtlError(error: unknown): error is EtlError {
  return error instanceof EtlError;
}
