import { format } from 'date-fns';
import type { FastifyBaseLogger } from 'fastify';
import {
  EmissionsPipeline,
  uploadTable,
  type AggregatedTable,
  type Bucket,
  type Table,
  type UploadReport,
  type WarehouseConnector
} from '@gridcarbon/emissions';

import { ServiceConfigError, type ServiceConfig } from '../config';
import type { EmissionsMetrics } from '../metrics';

type Logger = Pick<FastifyBaseLogger, 'info' | 'warn' | 'error'>;

export interface PublishAggregatesOptions {
  config: ServiceConfig;
  connector: WarehouseConnector;
  logger: Logger;
  pipeline?: EmissionsPipeline;
  metrics?: EmissionsMetrics;
  bucket?: Bucket;
  now?: () => Date;
  tempDirectory?: string;
}

export const BUCKET_END_COLUMN = 'bucket_end';
export const BUCKET_END_FORMAT = 'yyyy-MM-dd HH:mm:ss';
export const ROW_COUNT_COLUMN = 'row_count';

/**
 * Flattens an aggregated table into rows keyed by bucket end. The bucket end is
 * written as its wall-clock label in the aggregation time zone
 * (`2024-01-31 00:00:00`), the form a TIMESTAMP_NTZ column stores.
 */
export const toPublishedTable = (aggregated: AggregatedTable): Table => ({
  columns: [BUCKET_END_COLUMN, ROW_COUNT_COLUMN, ...aggregated.columns],
  rows: aggregated.rows.map((row) => ({
    [BUCKET_END_COLUMN]: format(row.bucketEnd, BUCKET_END_FORMAT),
    [ROW_COUNT_COLUMN]: row.rowCount,
    ...row.values
  }))
});

export const publishAggregates = async (options: PublishAggregatesOptions): Promise<UploadReport> => {
  const { config, connector, logger, metrics } = options;
  const { schema, table: targetTable, incremental } = config.publish;
  if (!schema || !targetTable) {
    throw new ServiceConfigError([
      'EMISSIONS_PUBLISH_SCHEMA and EMISSIONS_PUBLISH_TABLE are required to publish aggregates'
    ]);
  }
  const bucket = options.bucket ?? config.publish.bucket;

  const pipeline =
    options.pipeline ??
    new EmissionsPipeline({
      connector,
      schema: config.sourceSchema,
      timeZone: config.timeZone,
      cacheTtlMs: config.cacheTtlSeconds * 1000,
      hooks: {
        onReleaseError: (error) => logger.warn({ err: error }, 'Failed to close warehouse connection')
      }
    });

  const aggregated = await pipeline.aggregate(bucket);
  const table = toPublishedTable(aggregated);
  logger.info(
    { bucket, rows: table.rows.length, schema, targetTable, incremental },
    'Publishing emissions aggregates'
  );

  try {
    const report = await uploadTable(connector, {
      table,
      database: config.warehouse.database,
      schema,
      targetTable,
      incremental,
      now: options.now,
      tempDirectory: options.tempDirectory,
      onTransition: (transition) => {
        if (transition.error) {
          logger.error(
            { err: transition.error, from: transition.from, to: transition.to, targetTable: transition.targetTable },
            'Aggregate upload failed'
          );
          return;
        }
        logger.info(
          { from: transition.from, to: transition.to, targetTable: transition.targetTable },
          'Aggregate upload state changed'
        );
      },
      onReleaseError: (error) => logger.warn({ err: error }, 'Failed to release upload resources')
    });
    metrics?.uploads.inc({ outcome: 'success' });
    return report;
  } catch (error) {
    metrics?.uploads.inc({ outcome: 'failure' });
    throw error;
  }
};
