import cors from '@fastify/cors';
import fastify, { type FastifyInstance } from 'fastify';

import { EmissionsPipeline, type WarehouseConnector } from '@gridcarbon/emissions';

import { createLoggerOptions } from './logger';
import { createMetrics } from './metrics';
import { registerHealthRoutes } from './routes/health';
import { registerEmissionsRoutes } from './routes/emissions';
import { mapErrorToResponse } from './errors';
import { createWarehouseConnector } from './warehouse';
import type { AppContext } from './types';
import type { ServiceConfig } from './config';

interface CreateAppResult {
  app: FastifyInstance;
  ctx: AppContext;
}

export interface CreateAppOptions {
  connector?: WarehouseConnector;
  now?: () => number;
}

export const createApp = async (
  config: ServiceConfig,
  options: CreateAppOptions = {}
): Promise<CreateAppResult> => {
  const app = fastify({ logger: createLoggerOptions(config.logLevel) });
  await app.register(cors, { origin: true, credentials: true });

  const metrics = createMetrics();
  metrics.readinessGauge.set({ component: 'warehouse' }, 0);

  const connector = options.connector ?? (await createWarehouseConnector(config.warehouse));
  const pipeline = new EmissionsPipeline({
    connector,
    schema: config.sourceSchema,
    timeZone: config.timeZone,
    cacheTtlMs: config.cacheTtlSeconds * 1000,
    now: options.now,
    hooks: {
      onCacheLookup: (target, lookup) => {
        metrics.cacheLookups.inc({ target, result: lookup });
      },
      onFetch: (sql, durationMs, outcome) => {
        metrics.fetchDuration.observe({ outcome }, durationMs / 1000);
        app.log.debug({ sql, durationMs, outcome }, 'Warehouse query finished');
      },
      onReleaseError: (error) => {
        app.log.warn({ err: error }, 'Failed to close warehouse connection');
      }
    }
  });

  const ctx: AppContext = {
    config,
    connector,
    pipeline,
    metrics,
    readiness: { warehouse: false }
  };

  registerHealthRoutes(app, ctx);
  registerEmissionsRoutes(app, ctx);

  app.setErrorHandler((error, request, reply) => {
    const mapped = mapErrorToResponse(error);
    if (mapped.statusCode >= 500) {
      request.log.error({ err: error }, 'Unhandled error');
    }
    reply.status(mapped.statusCode).send({ message: mapped.message, details: mapped.details });
  });

  return { app, ctx };
};
