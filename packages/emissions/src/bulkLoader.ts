import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';

import { TZDate } from '@date-fns/tz';
import { format } from 'date-fns';

import { renderCsv } from './csv';
import { UploadError, type UploadPhase, type UploadStep } from './errors';
import { qualifiedName } from './sql';
import type { Table } from './table';
import { withWarehouseConnection } from './warehouse/scope';
import type { WarehouseConnection, WarehouseConnector, WarehouseResult } from './warehouse/types';

export type UploadState = 'idle' | 'staging' | 'copying' | 'done' | 'failed';

export type UploadStrategy = 'truncate' | 'swap';

export interface UploadTransition {
  from: UploadState;
  to: UploadState;
  targetTable: string;
  error?: UploadError;
}

export interface UploadRequest {
  table: Table;
  database: string;
  schema: string;
  targetTable: string;
  /** Keep previously staged files and append to the table instead of replacing its rows. */
  incremental?: boolean;
  stagingSuffix?: string | null;
  /**
   * How a non-incremental upload replaces the table. `truncate` empties the
   * table before the copy and is not atomic; `swap` loads a shadow table and
   * swaps it in.
   */
  strategy?: UploadStrategy;
  tempDirectory?: string;
  now?: () => Date;
  /**
   * Called after each state change. An error thrown before the load completes
   * fails the upload at step `notify`; one thrown for `done` reaches the caller
   * with the state left at `done`.
   */
  onTransition?: (transition: UploadTransition) => void;
  /** Receives cleanup and observer failures that happen while another error is already propagating. */
  onReleaseError?: (error: unknown) => void;
}

export interface UploadReport {
  targetTable: string;
  stage: string;
  stagedFile: string;
  rowsStaged: number;
  rowsLoaded: number | null;
  incremental: boolean;
  strategy: UploadStrategy;
}

const COPY_FILE_FORMAT = 'FILE_FORMAT = (TYPE = CSV skip_header = 1 EMPTY_FIELD_AS_NULL = TRUE)';

export function resolveStagingSuffix(stagingSuffix: string | null | undefined, now: Date): string {
  if (stagingSuffix) {
    return `_${stagingSuffix}`;
  }
  return format(new TZDate(now.getTime(), 'UTC'), "'_'yyyyMMdd'_'HHmm");
}

function sumRowsLoaded(result: WarehouseResult): number | null {
  const index = result.columns.findIndex((column) => column.name.toLowerCase() === 'rows_loaded');
  if (index < 0) {
    return null;
  }
  let total = 0;
  for (const row of result.rows) {
    const value = Number(row[index]);
    if (Number.isFinite(value)) {
      total += value;
    }
  }
  return total;
}

/**
 * Writes a table into a warehouse table through a stage:
 * `idle -> staging -> copying -> done`, or `failed` from any step.
 *
 * Each phase runs on its own connection after pointing the session at the
 * target schema. The steps are not one transaction: with the `truncate`
 * strategy a failure after the truncate leaves the target empty. Concurrent
 * uploads to the same table must be serialized by the caller.
 */
export class TableUploader {
  private currentState: UploadState = 'idle';
  private readonly incremental: boolean;
  private readonly strategy: UploadStrategy;
  private readonly stage: string;
  private readonly target: string;

  constructor(
    private readonly connector: WarehouseConnector,
    private readonly request: UploadRequest
  ) {
    this.incremental = request.incremental ?? false;
    this.strategy = request.strategy ?? 'truncate';
    this.stage = request.targetTable;
    this.target = qualifiedName(request.schema, request.targetTable);
  }

  get state(): UploadState {
    return this.currentState;
  }

  async run(): Promise<UploadReport> {
    if (this.currentState !== 'idle') {
      throw new Error(`Upload to ${this.target} already ran (state: ${this.currentState})`);
    }
    let report: UploadReport;
    try {
      this.transition('staging');
      const staged = await this.stageTable();
      this.transition('copying');
      const rowsLoaded = await this.copyIntoTable();
      report = {
        targetTable: this.target,
        stage: qualifiedName(this.request.schema, this.stage),
        stagedFile: staged.fileName,
        rowsStaged: staged.rowCount,
        rowsLoaded,
        incremental: this.incremental,
        strategy: this.incremental ? 'truncate' : this.strategy
      };
    } catch (error) {
      // Steps always throw UploadError; anything else came from onTransition.
      const failure = error instanceof UploadError
        ? error
        : new UploadError({
          step: 'notify',
          phase: this.state === 'copying' ? 'copying' : 'staging',
          targetTable: this.target,
          cause: error
        });
      try {
        this.transition('failed', failure);
      } catch (hookError) {
        this.request.onReleaseError?.(hookError);
      }
      throw failure;
    }
    // The load is complete: a throwing observer does not turn it into a failure.
    this.transition('done');
    return report;
  }

  private transition(to: UploadState, error?: UploadError): void {
    const from = this.currentState;
    this.currentState = to;
    this.request.onTransition?.({ from, to, targetTable: this.target, error });
  }

  private async step<T>(step: UploadStep, phase: UploadPhase, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (error) {
      throw new UploadError({ step, phase, targetTable: this.target, cause: error });
    }
  }

  private useSchema(connection: WarehouseConnection, phase: UploadPhase): Promise<WarehouseResult> {
    const { database, schema } = this.request;
    return this.step('use_schema', phase, () => connection.execute(`USE ${qualifiedName(database, schema)}`));
  }

  private async stageTable(): Promise<{ fileName: string; rowCount: number }> {
    const { schema, table } = this.request;
    const now = this.request.now?.() ?? new Date();
    const fileName = `${this.stage}${resolveStagingSuffix(this.request.stagingSuffix, now)}.csv`;

    const directory = await this.step('serialize', 'staging', () =>
      mkdtemp(path.join(this.request.tempDirectory ?? os.tmpdir(), 'gridcarbon-stage-'))
    );
    const filePath = path.join(directory, fileName);

    try {
      await this.step('serialize', 'staging', () => writeFile(filePath, renderCsv(table), 'utf8'));

      await withWarehouseConnection(
        this.connector,
        async (connection) => {
          await this.useSchema(connection, 'staging');
          if (!this.incremental) {
            await this.step('remove_stage', 'staging', () =>
              connection.execute(`REMOVE @${qualifiedName(schema, this.stage)}`)
            );
          }
          await this.step('put', 'staging', () => connection.execute(`PUT file://${filePath} @${this.stage}`));
        },
        { onReleaseError: this.request.onReleaseError }
      ).catch((error: unknown) => {
        if (error instanceof UploadError) {
          throw error;
        }
        throw new UploadError({ step: 'connect', phase: 'staging', targetTable: this.target, cause: error });
      });
    } finally {
      await rm(directory, { recursive: true, force: true }).catch((error: unknown) => {
        this.request.onReleaseError?.(error);
      });
    }

    return { fileName, rowCount: table.rows.length };
  }

  private async copyIntoTable(): Promise<number | null> {
    const { schema } = this.request;
    const source = `@${qualifiedName(schema, this.stage)}`;

    return withWarehouseConnection(
      this.connector,
      async (connection) => {
        await this.useSchema(connection, 'copying');

        if (this.incremental) {
          const result = await this.step('copy_into', 'copying', () =>
            connection.execute(`COPY INTO ${this.target} FROM ${source} ${COPY_FILE_FORMAT}`)
          );
          return sumRowsLoaded(result);
        }

        if (this.strategy === 'swap') {
          const shadow = `${this.target}__load`;
          await this.step('create_shadow', 'copying', () =>
            connection.execute(`CREATE OR REPLACE TABLE ${shadow} LIKE ${this.target}`)
          );
          const result = await this.step('copy_into', 'copying', () =>
            connection.execute(`COPY INTO ${shadow} FROM ${source} ${COPY_FILE_FORMAT}`)
          );
          await this.step('swap', 'copying', () =>
            connection.execute(`ALTER TABLE ${this.target} SWAP WITH ${shadow}`)
          );
          await this.step('drop_shadow', 'copying', () => connection.execute(`DROP TABLE IF EXISTS ${shadow}`));
          return sumRowsLoaded(result);
        }

        await this.step('truncate', 'copying', () =>
          connection.execute(`TRUNCATE TABLE IF EXISTS ${this.target}`)
        );
        const result = await this.step('copy_into', 'copying', () =>
          connection.execute(`COPY INTO ${this.target} FROM ${source} ${COPY_FILE_FORMAT}`)
        );
        return sumRowsLoaded(result);
      },
      { onReleaseError: this.request.onReleaseError }
    ).catch((error: unknown) => {
      if (error instanceof UploadError) {
        throw error;
      }
      throw new UploadError({ step: 'connect', phase: 'copying', targetTable: this.target, cause: error });
    });
  }
}

export function uploadTable(connector: WarehouseConnector, request: UploadRequest): Promise<UploadReport> {
  return new TableUploader(connector, request).run();
}
