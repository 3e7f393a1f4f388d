export class EmissionsError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'EmissionsError';
  }
}

export class WarehouseConnectionError extends EmissionsError {
  readonly code = 'WAREHOUSE_CONNECTION_FAILED';

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'WarehouseConnectionError';
  }
}

export class WarehouseQueryError extends EmissionsError {
  readonly code = 'WAREHOUSE_QUERY_FAILED';
  readonly sql: string;

  constructor(sql: string, message: string, options?: { cause?: unknown }) {
    super(`Query failed: ${message}`, options);
    this.name = 'WarehouseQueryError';
    this.sql = sql;
  }
}

export class AlignmentError extends EmissionsError {
  readonly code = 'ALIGNMENT_FAILED';
  readonly column: string | null;

  constructor(message: string, column: string | null = null) {
    super(message);
    this.name = 'AlignmentError';
    this.column = column;
  }
}

export type UploadPhase = 'staging' | 'copying';

export type UploadStep =
  | 'connect'
  | 'use_schema'
  | 'remove_stage'
  | 'serialize'
  | 'put'
  | 'truncate'
  | 'create_shadow'
  | 'copy_into'
  | 'swap'
  | 'drop_shadow'
  | 'notify';

export class UploadError extends EmissionsError {
  readonly code = 'UPLOAD_FAILED';
  readonly step: UploadStep;
  readonly phase: UploadPhase;
  readonly targetTable: string;

  constructor(params: { step: UploadStep; phase: UploadPhase; targetTable: string; cause: unknown }) {
    const reason = params.cause instanceof Error ? params.cause.message : String(params.cause);
    super(`Upload to ${params.targetTable} failed during ${params.step}: ${reason}`, { cause: params.cause });
    this.name = 'UploadError';
    this.step = params.step;
    this.phase = params.phase;
    this.targetTable = params.targetTable;
  }
}

export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
