import { formatISO } from 'date-fns';
import type { FastifyInstance } from 'fastify';
import { z } from 'zod';

import { parseBucket, type AggregatedTable, type MarginalSpread } from '@gridcarbon/emissions';

import { publishAggregates } from '../jobs/publishAggregates';
import { mapErrorToResponse } from '../errors';
import type { AppContext } from '../types';

const bucketQuerySchema = z.object({
  bucket: z
    .string()
    .default('month')
    .transform((value, refinement) => {
      const bucket = parseBucket(value);
      if (!bucket) {
        refinement.addIssue({
          code: z.ZodIssueCode.custom,
          message: `Unsupported bucket '${value}'; expected week, month or year`
        });
        return z.NEVER;
      }
      return bucket;
    })
});

export const serializeAggregates = (table: AggregatedTable) => ({
  bucket: table.bucket,
  timeZone: table.timeZone,
  columns: table.columns,
  rows: table.rows.map((row) => ({
    bucketEnd: formatISO(row.bucketEnd),
    rowCount: row.rowCount,
    values: row.values
  }))
});

export const serializeSpread = (spread: MarginalSpread) => ({
  bucket: spread.bucket,
  timeZone: spread.timeZone,
  traces: spread.traces.map((trace) => ({
    bucketEnd: formatISO(trace.bucketEnd),
    points: trace.points.map((point) => ({ datetime: formatISO(point.datetime), value: point.value }))
  })),
  mean: spread.mean.map((entry) => ({ bucketEnd: formatISO(entry.bucketEnd), value: entry.value })),
  skipped: spread.skipped.map((bucketEnd) => formatISO(bucketEnd))
});

export const registerEmissionsRoutes = (app: FastifyInstance, ctx: AppContext) => {
  app.get('/emissions/aggregates', async (request, reply) => {
    const parseResult = bucketQuerySchema.safeParse(request.query);
    if (!parseResult.success) {
      const mapped = mapErrorToResponse(parseResult.error);
      return reply.status(mapped.statusCode).send({ message: mapped.message, details: mapped.details });
    }

    const aggregated = await ctx.pipeline.aggregate(parseResult.data.bucket);
    return serializeAggregates(aggregated);
  });

  app.get('/emissions/marginal-spread', async (request, reply) => {
    const parseResult = bucketQuerySchema.safeParse(request.query);
    if (!parseResult.success) {
      const mapped = mapErrorToResponse(parseResult.error);
      return reply.status(mapped.statusCode).send({ message: mapped.message, details: mapped.details });
    }

    const spread = await ctx.pipeline.marginalSpread(parseResult.data.bucket);
    return serializeSpread(spread);
  });

  app.post('/emissions/cache/invalidate', async (request) => {
    ctx.pipeline.invalidate();
    request.log.info('Emissions query cache invalidated');
    return { invalidated: true };
  });

  const { publish } = ctx.config;
  if (publish.schema && publish.table) {
    app.post('/emissions/publish', async (request) => {
      const report = await publishAggregates({
        config: ctx.config,
        connector: ctx.connector,
        pipeline: ctx.pipeline,
        metrics: ctx.metrics,
        logger: request.log
      });
      return { report };
    });
  }
};
