import type { FastifyInstance } from 'fastify';
import { withWarehouseConnection } from '@gridcarbon/emissions';

import type { AppContext } from '../types';

export const registerHealthRoutes = (app: FastifyInstance, ctx: AppContext) => {
  app.get('/healthz', async () => ({ status: 'ok' }));

  app.get('/readyz', async (request, reply) => {
    try {
      await withWarehouseConnection(ctx.connector, async () => undefined, {
        onReleaseError: (error) => request.log.warn({ err: error }, 'Failed to close readiness check connection')
      });
      ctx.readiness.warehouse = true;
    } catch (error) {
      request.log.warn({ err: error }, 'Warehouse readiness check failed');
      ctx.readiness.warehouse = false;
    }

    const components: Record<string, boolean> = {
      warehouse: ctx.readiness.warehouse
    };
    ctx.metrics.readinessGauge.set({ component: 'warehouse' }, ctx.readiness.warehouse ? 1 : 0);

    if (!ctx.readiness.warehouse) {
      return reply.status(503).send({ status: 'not_ready', components });
    }
    return { status: 'ready', components };
  });

  app.get('/metrics', async (request, reply) => {
    reply.header('Content-Type', ctx.metrics.register.contentType);
    return ctx.metrics.register.metrics();
  });
};
